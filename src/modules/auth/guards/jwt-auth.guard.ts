import { IS_PUBLIC_KEY } from '@/common/decorators/public.decorator';
import { ERRORS } from '@/common/exceptions/errors-factory';
import { AuthUser } from '@/common/types/jwt.type';
import { CanActivate, ExecutionContext, Injectable } from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { Request } from 'express';
import { ExtractJwt } from 'passport-jwt';
import { TokenService } from '../services/token.service';

/**
 * Global guard. Every route requires a valid access token unless it (or its
 * controller) is marked @Public().
 *
 *  no Authorization header       → unauthorized
 *  header not "Bearer <token>"   → invalid_token_format
 *  bad signature, expired, ...   → invalid_token
 *
 * On success `request.user` holds the token's user id and email.
 */
@Injectable()
export class JwtAuthGuard implements CanActivate {
  private readonly jwtExtractor = ExtractJwt.fromAuthHeaderAsBearerToken();

  constructor(
    private readonly reflector: Reflector,
    private readonly tokenService: TokenService,
  ) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    const isPublic = this.reflector.getAllAndOverride<boolean>(IS_PUBLIC_KEY, [
      context.getHandler(),
      context.getClass(),
    ]);
    if (isPublic) return true;

    const request = context
      .switchToHttp()
      .getRequest<Request & { user?: AuthUser }>();

    if (!request.headers.authorization) {
      throw ERRORS.Unauthorized();
    }

    const rawToken = this.jwtExtractor(request);
    if (!rawToken) {
      throw ERRORS.InvalidTokenFormat();
    }

    const claims = await this.tokenService.validateAccessToken(rawToken);
    if (!claims) {
      throw ERRORS.InvalidToken();
    }

    request.user = { id: claims.userId, email: claims.email };
    return true;
  }
}
