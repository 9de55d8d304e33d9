import { JwtPayload, TokenType } from '@/common/types/jwt.type';
import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { JwtService } from '@nestjs/jwt';
import { randomUUID } from 'crypto';

export interface AccessTokenClaims {
  userId: number;
  email: string;
}

/**
 * Access tokens are HS256 JWTs signed with `jwt.secret`; refresh tokens are
 * random UUIDs with no embedded meaning.
 */
@Injectable()
export class TokenService {
  constructor(
    private readonly jwtService: JwtService,
    private readonly config: ConfigService,
  ) {}

  get accessTokenTtl(): number {
    return this.config.get<number>('jwt.accessTokenTtl', 900);
  }

  issueAccessToken(userId: number, email: string): Promise<string> {
    const payload: JwtPayload = { sub: userId, email, type: TokenType.ACCESS };
    return this.jwtService.signAsync(payload, {
      expiresIn: this.accessTokenTtl,
    });
  }

  issueRefreshToken(): string {
    return randomUUID();
  }

  /**
   * Returns the claims of a well-formed, correctly signed, unexpired access
   * token, or null. The reason for a rejection is not exposed.
   */
  async validateAccessToken(token: string): Promise<AccessTokenClaims | null> {
    let payload: JwtPayload;
    try {
      payload = await this.jwtService.verifyAsync<JwtPayload>(token);
    } catch {
      return null;
    }

    if (payload.type !== TokenType.ACCESS || typeof payload.sub !== 'number') {
      return null;
    }

    return { userId: payload.sub, email: payload.email };
  }
}
