import { Transform } from 'class-transformer';
import {
  IsEmail,
  IsNotEmpty,
  IsOptional,
  IsString,
  Length,
  Matches,
  MaxLength,
} from 'class-validator';
import { i18nValidationMessage } from 'nestjs-i18n';

/**
 * Custom transform functions
 */
const trim = ({ value }: { value: unknown }): unknown =>
  typeof value === 'string' ? value.trim() : value;

const trimLower = ({ value }: { value: unknown }): unknown =>
  typeof value === 'string' ? value.trim().toLowerCase() : value;

/**
 * Shared email field. Normalized (trimmed, lower-cased) before validation.
 */
class EmailDto {
  @IsEmail(
    {},
    {
      message: i18nValidationMessage('validation.EMAIL'),
    },
  )
  @MaxLength(255, {
    message: i18nValidationMessage('validation.MAX_LENGTH'),
  })
  @IsNotEmpty({
    message: i18nValidationMessage('validation.NOT_EMPTY'),
  })
  @Transform(trimLower)
  email: string;
}

/**
 * DTO for starting a signup
 */
export class SendCodeDto extends EmailDto {
  @Length(8, 72, {
    message: i18nValidationMessage('validation.PASSWORD_LENGTH'),
  })
  @IsString({
    message: i18nValidationMessage('validation.STRING'),
  })
  @IsNotEmpty({
    message: i18nValidationMessage('validation.NOT_EMPTY'),
  })
  password: string;
}

/**
 * DTO for resending a signup code
 */
export class ResendCodeDto extends EmailDto {}

/**
 * DTO for completing a signup
 */
export class VerifyCodeDto extends EmailDto {
  @Matches(/^\d{6}$/, {
    message: i18nValidationMessage('validation.CODE_INVALID'),
  })
  @IsNotEmpty({
    message: i18nValidationMessage('validation.NOT_EMPTY'),
  })
  @Transform(trim)
  code: string;

  @MaxLength(255, {
    message: i18nValidationMessage('validation.MAX_LENGTH'),
  })
  @IsString({
    message: i18nValidationMessage('validation.STRING'),
  })
  @IsNotEmpty({
    message: i18nValidationMessage('validation.NOT_EMPTY'),
  })
  client_id: string;
}

/**
 * DTO for login
 */
export class LoginDto extends EmailDto {
  @IsString({
    message: i18nValidationMessage('validation.STRING'),
  })
  @IsNotEmpty({
    message: i18nValidationMessage('validation.NOT_EMPTY'),
  })
  password: string;

  @MaxLength(255, {
    message: i18nValidationMessage('validation.MAX_LENGTH'),
  })
  @IsString({
    message: i18nValidationMessage('validation.STRING'),
  })
  @IsNotEmpty({
    message: i18nValidationMessage('validation.NOT_EMPTY'),
  })
  client_id: string;
}

/**
 * DTO for refreshing tokens
 */
export class RefreshTokenDto {
  @IsString({
    message: i18nValidationMessage('validation.STRING'),
  })
  @IsNotEmpty({
    message: i18nValidationMessage('validation.NOT_EMPTY'),
  })
  refresh_token: string;

  @MaxLength(255, {
    message: i18nValidationMessage('validation.MAX_LENGTH'),
  })
  @IsString({
    message: i18nValidationMessage('validation.STRING'),
  })
  @IsNotEmpty({
    message: i18nValidationMessage('validation.NOT_EMPTY'),
  })
  client_id: string;
}

/**
 * DTO for logout. A missing token is reported as missing_refresh_token by
 * AuthService rather than as a validation error.
 */
export class LogoutDto {
  @IsOptional()
  @IsString({
    message: i18nValidationMessage('validation.STRING'),
  })
  refresh_token?: string;
}
