import { Public } from '@/common/decorators/public.decorator';
import { Body, Controller, HttpCode, HttpStatus, Post } from '@nestjs/common';
import { AuthService } from './auth.service';
import {
  LoginDto,
  LogoutDto,
  RefreshTokenDto,
  ResendCodeDto,
  SendCodeDto,
  VerifyCodeDto,
} from './dto/auth.dto';
import {
  CodeSentResponse,
  LoginResponse,
  MessageResponse,
  RefreshResponse,
  VerifyCodeResponse,
} from './types/auth-response.type';

/**
 * Handles all authentication flows:
 *
 *  Signup (email verification)
 *  ├─ POST   /auth/signup/send-code     ← step 1 – email + password
 *  ├─ POST   /auth/signup/resend-code   ← step 1 – new code, same password
 *  └─ POST   /auth/signup/verify-code   ← step 2 – creates the user
 *
 *  Login
 *  └─ POST   /auth/login
 *
 *  Session management
 *  ├─ POST   /auth/refresh              ← single-use rotation
 *  └─ POST   /auth/logout
 */
@Public()
@Controller('auth')
export class AuthController {
  constructor(private readonly authService: AuthService) {}

  // ──────────────────────────────────────────────────────────────────────────
  // SIGNUP
  // ──────────────────────────────────────────────────────────────────────────

  /**
   * POST /auth/signup/send-code
   *
   * Stores the hashed password with a 6-digit code and mails the code.
   * Rate-limited: 3 sends / 5 min per email, shared with resend-code.
   */
  @Post('signup/send-code')
  @HttpCode(HttpStatus.OK)
  sendCode(@Body() dto: SendCodeDto): Promise<CodeSentResponse> {
    return this.authService.sendCode(dto);
  }

  /**
   * POST /auth/signup/resend-code
   */
  @Post('signup/resend-code')
  @HttpCode(HttpStatus.OK)
  resendCode(@Body() dto: ResendCodeDto): Promise<CodeSentResponse> {
    return this.authService.resendCode(dto);
  }

  /**
   * POST /auth/signup/verify-code
   *
   * On success the account exists and the caller holds a token pair bound to
   * `client_id`.
   */
  @Post('signup/verify-code')
  @HttpCode(HttpStatus.CREATED)
  verifyCode(@Body() dto: VerifyCodeDto): Promise<VerifyCodeResponse> {
    return this.authService.verifyCode(dto);
  }

  // ──────────────────────────────────────────────────────────────────────────
  // LOGIN
  // ──────────────────────────────────────────────────────────────────────────

  /**
   * POST /auth/login
   *
   * Rate-limited: 5 attempts / 15 min per email, successful ones included.
   */
  @Post('login')
  @HttpCode(HttpStatus.OK)
  login(@Body() dto: LoginDto): Promise<LoginResponse> {
    return this.authService.login(dto);
  }

  // ──────────────────────────────────────────────────────────────────────────
  // SESSION MANAGEMENT
  // ──────────────────────────────────────────────────────────────────────────

  @Post('refresh')
  @HttpCode(HttpStatus.OK)
  refresh(@Body() dto: RefreshTokenDto): Promise<RefreshResponse> {
    return this.authService.refreshToken(dto);
  }

  @Post('logout')
  @HttpCode(HttpStatus.OK)
  logout(@Body() dto: LogoutDto): Promise<MessageResponse> {
    return this.authService.logout(dto);
  }
}
