/**
 * JWT Token Types
 * Only access tokens are JWTs; refresh tokens are opaque and live in the KV store.
 */
export enum TokenType {
  ACCESS = 'access',
}

export interface JwtPayload {
  /** User id. */
  sub: number;
  email: string;
  type: TokenType;
  exp?: number;
  iat?: number;
}

/**
 * The shape attached to `request.user` by JwtAuthGuard.
 */
export interface AuthUser {
  id: number;
  email: string;
}
