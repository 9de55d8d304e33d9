import { RateLimitOperation } from '@/common/constants/auth.constants';
import { ERRORS } from '@/common/exceptions/errors-factory';
import { MailService } from '@/modules/mail/mail.service';
import { normalizeEmail, UsersService } from '@/modules/users/users.service';
import { Injectable, Logger } from '@nestjs/common';
import { timingSafeEqual } from 'crypto';
import { I18nContext, I18nService } from 'nestjs-i18n';
import {
  LoginDto,
  LogoutDto,
  RefreshTokenDto,
  ResendCodeDto,
  SendCodeDto,
  VerifyCodeDto,
} from './dto/auth.dto';
import { PasswordService } from './services/password.service';
import { RateLimiterService } from './services/rate-limiter.service';
import { RefreshTokenService } from './services/refresh-token.service';
import { SignupSessionService } from './services/signup-session.service';
import { TokenService } from './services/token.service';
import {
  CodeSentResponse,
  LoginResponse,
  MessageResponse,
  RefreshResponse,
  TokenPair,
  VerifyCodeResponse,
} from './types/auth-response.type';
import { generateVerificationCode } from './utils/verification-code';

@Injectable()
export class AuthService {
  private readonly logger = new Logger(AuthService.name);

  constructor(
    private readonly i18n: I18nService,
    private readonly users: UsersService,
    private readonly mailService: MailService,
    private readonly rateLimiter: RateLimiterService,
    private readonly signupSessions: SignupSessionService,
    private readonly refreshTokens: RefreshTokenService,
    private readonly tokens: TokenService,
    private readonly passwords: PasswordService,
  ) {}

  // ============================================================================
  // SIGNUP — STEP 1: SEND CODE (POST /auth/signup/send-code)
  // ============================================================================

  /**
   * Starts (or restarts) a signup for an unregistered email.
   *
   * Steps:
   *  1. Reject emails that already belong to a user.
   *  2. Count the attempt against the shared send_code limit.
   *  3. Hash the password and store it with a fresh code as the pending
   *     signup, replacing any earlier one.
   *  4. Mail the code. A delivery failure is logged, not returned.
   *
   * @throws AppError email_already_exists | rate_limit_exceeded
   */
  async sendCode(dto: SendCodeDto): Promise<CodeSentResponse> {
    const email = normalizeEmail(dto.email);

    if (await this.users.getByEmail(email)) {
      throw ERRORS.EmailAlreadyExists();
    }

    await this.rateLimiter.checkLimit(RateLimitOperation.SEND_CODE, email);

    const passwordHash = await this.passwords.hash(dto.password);
    const code = generateVerificationCode();
    await this.signupSessions.save(email, passwordHash, code);

    await this.dispatchCode(email, code);

    return this.codeSent(email, 'auth.success.codeSent');
  }

  // ============================================================================
  // SIGNUP — RESEND CODE (POST /auth/signup/resend-code)
  // ============================================================================

  /**
   * Replaces the code of a pending signup with one that differs from it. The
   * previous code stops working and the pending signup gets a full TTL again.
   *
   * @throws AppError rate_limit_exceeded | session_not_found
   */
  async resendCode(dto: ResendCodeDto): Promise<CodeSentResponse> {
    const email = normalizeEmail(dto.email);

    await this.rateLimiter.checkLimit(RateLimitOperation.SEND_CODE, email);

    const session = await this.signupSessions.get(email);
    if (!session) {
      throw ERRORS.SessionNotFound();
    }

    const code = generateVerificationCode(session.code);
    await this.signupSessions.save(email, session.password_hash, code);

    await this.dispatchCode(email, code);

    return this.codeSent(email, 'auth.success.codeResent');
  }

  // ============================================================================
  // SIGNUP — STEP 2: VERIFY CODE (POST /auth/signup/verify-code)
  // ============================================================================

  /**
   * Creates the user from the pending signup and logs them in.
   *
   * A wrong code leaves the pending signup in place, so the user can retry
   * until it expires.
   *
   * @throws AppError session_not_found | invalid_code | email_already_exists
   */
  async verifyCode(dto: VerifyCodeDto): Promise<VerifyCodeResponse> {
    const email = normalizeEmail(dto.email);

    const session = await this.signupSessions.get(email);
    if (!session) {
      throw ERRORS.SessionNotFound();
    }

    if (!this.codesMatch(session.code, dto.code)) {
      throw ERRORS.InvalidCode();
    }

    const user = await this.users.create({
      email,
      passwordHash: session.password_hash,
    });

    const tokens = await this.issueTokenPair(
      user.id,
      user.email,
      dto.client_id,
    );

    try {
      await this.signupSessions.delete(email);
    } catch (error) {
      this.logger.warn(
        `Failed to delete signup session for ${email}: ${
          error instanceof Error ? error.message : String(error)
        }`,
      );
    }

    this.logger.log(`User ${user.id} registered`);

    return { ...tokens, user: { id: user.id, email: user.email } };
  }

  // ============================================================================
  // LOGIN (POST /auth/login)
  // ============================================================================

  /**
   * Every attempt counts against the login limit, successful or not. An
   * unknown email and a wrong password fail identically.
   *
   * @throws AppError rate_limit_exceeded | invalid_credentials
   */
  async login(dto: LoginDto): Promise<LoginResponse> {
    const email = normalizeEmail(dto.email);

    await this.rateLimiter.checkLimit(RateLimitOperation.LOGIN, email);

    const user = await this.users.getByEmail(email);
    if (!user) {
      throw ERRORS.InvalidCredentials();
    }

    const passwordValid = await this.passwords.verify(
      user.passwordHash,
      dto.password,
    );
    if (!passwordValid) {
      throw ERRORS.InvalidCredentials();
    }

    const tokens = await this.issueTokenPair(
      user.id,
      user.email,
      dto.client_id,
    );

    return {
      message: this.t('auth.success.loggedIn'),
      ...tokens,
      user: { id: user.id, email: user.email },
    };
  }

  // ============================================================================
  // TOKEN ROTATION (POST /auth/refresh)
  // ============================================================================

  /**
   * Exchanges a refresh token for a new pair bound to the same client.
   *
   * The presented token is consumed before the user is looked up, so it can
   * never be used twice. Presenting it from another client also consumes it.
   *
   * @throws AppError refresh_token_invalid | client_id_mismatch
   */
  async refreshToken(dto: RefreshTokenDto): Promise<RefreshResponse> {
    const record = await this.refreshTokens.get(dto.refresh_token);
    if (!record) {
      throw ERRORS.RefreshTokenInvalid();
    }

    if (record.client_id !== dto.client_id) {
      await this.refreshTokens.delete(dto.refresh_token);
      this.logger.warn(
        `Refresh token for user ${record.user_id} presented by another client`,
      );
      throw ERRORS.ClientIdMismatch();
    }

    await this.refreshTokens.delete(dto.refresh_token);

    const user = await this.users.getById(record.user_id);
    if (!user) {
      throw ERRORS.RefreshTokenInvalid();
    }

    return this.issueTokenPair(user.id, user.email, record.client_id);
  }

  // ============================================================================
  // LOGOUT (POST /auth/logout)
  // ============================================================================

  /**
   * Revokes one refresh token. Access tokens already issued stay valid until
   * they expire. Logging out twice with the same token fails the second time.
   *
   * @throws AppError missing_refresh_token | token_not_found
   */
  async logout(dto: LogoutDto): Promise<MessageResponse> {
    if (!dto.refresh_token) {
      throw ERRORS.MissingRefreshToken();
    }

    const record = await this.refreshTokens.get(dto.refresh_token);
    if (!record) {
      throw ERRORS.TokenNotFound();
    }

    await this.refreshTokens.delete(dto.refresh_token);

    return { message: this.t('auth.success.loggedOut') };
  }

  // ============================================================================
  // PRIVATE HELPERS
  // ============================================================================

  private async issueTokenPair(
    userId: number,
    email: string,
    clientId: string,
  ): Promise<TokenPair> {
    const accessToken = await this.tokens.issueAccessToken(userId, email);
    const refreshToken = this.tokens.issueRefreshToken();
    await this.refreshTokens.save(refreshToken, userId, clientId);

    return {
      access_token: accessToken,
      refresh_token: refreshToken,
      token_type: 'Bearer',
      expires_in: this.tokens.accessTokenTtl,
    };
  }

  // timingSafeEqual throws on unequal lengths
  private codesMatch(expected: string, actual: string): boolean {
    const a = Buffer.from(expected);
    const b = Buffer.from(actual);
    return a.length === b.length && timingSafeEqual(a, b);
  }

  private async dispatchCode(email: string, code: string): Promise<void> {
    try {
      await this.mailService.sendVerificationCode(
        email,
        code,
        I18nContext.current()?.lang,
      );
    } catch (error) {
      this.logger.error(
        `Verification code for ${email} was not delivered`,
        error instanceof Error ? error.stack : String(error),
      );
    }
  }

  private codeSent(email: string, messageKey: string): CodeSentResponse {
    return {
      message: this.t(messageKey),
      email,
      expires_in: this.signupSessions.ttl,
    };
  }

  private t(key: string): string {
    return this.i18n.translate<string, string>(key, {
      lang: I18nContext.current()?.lang,
    });
  }
}
