import { Transform } from 'class-transformer';
import {
  IsNotEmpty,
  IsOptional,
  IsString,
  Length,
  MaxLength,
} from 'class-validator';
import { i18nValidationMessage } from 'nestjs-i18n';

const trim = ({ value }: { value: unknown }): unknown =>
  typeof value === 'string' ? value.trim() : value;

/**
 * DTO for creating the caller's profile
 */
export class CreateUserProfileDto {
  @Length(1, 100, {
    message: i18nValidationMessage('validation.LENGTH'),
  })
  @IsString({
    message: i18nValidationMessage('validation.STRING'),
  })
  @IsNotEmpty({
    message: i18nValidationMessage('validation.NOT_EMPTY'),
  })
  @Transform(trim)
  name: string;

  @Length(1, 50, {
    message: i18nValidationMessage('validation.LENGTH'),
  })
  @IsString({
    message: i18nValidationMessage('validation.STRING'),
  })
  @IsNotEmpty({
    message: i18nValidationMessage('validation.NOT_EMPTY'),
  })
  @Transform(trim)
  username: string;

  /** Object key of an already uploaded icon; "" means none. */
  @MaxLength(255, {
    message: i18nValidationMessage('validation.MAX_LENGTH'),
  })
  @IsString({
    message: i18nValidationMessage('validation.STRING'),
  })
  @IsOptional()
  icon_path?: string;
}

/**
 * Query for GET /user-profiles/check-username
 */
export class CheckUsernameDto {
  @Length(1, 50, {
    message: i18nValidationMessage('validation.LENGTH'),
  })
  @IsString({
    message: i18nValidationMessage('validation.STRING'),
  })
  @IsNotEmpty({
    message: i18nValidationMessage('validation.NOT_EMPTY'),
  })
  @Transform(trim)
  username: string;
}
