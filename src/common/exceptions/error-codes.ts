/**
 * Machine-readable codes serialized as the `error` field of every failure
 * response. Each code has a matching `errors.<code>` entry in the i18n
 * catalogs.
 */
export enum ErrorCode {
  // Signup
  EmailAlreadyExists = 'email_already_exists',
  SessionNotFound = 'session_not_found',
  InvalidCode = 'invalid_code',

  // Login & tokens
  InvalidCredentials = 'invalid_credentials',
  RefreshTokenInvalid = 'refresh_token_invalid',
  ClientIdMismatch = 'client_id_mismatch',
  TokenNotFound = 'token_not_found',
  MissingRefreshToken = 'missing_refresh_token',

  // Bearer authentication
  Unauthorized = 'unauthorized',
  InvalidTokenFormat = 'invalid_token_format',
  InvalidToken = 'invalid_token',
  UserNotFound = 'user_not_found',

  // Profiles
  UsernameAlreadyExists = 'username_already_exists',
  ProfileAlreadyExists = 'profile_already_exists',
  ProfileNotFound = 'profile_not_found',

  // Throttling
  RateLimitExceeded = 'rate_limit_exceeded',

  // General
  ValidationError = 'validation_error',
  InvalidRequest = 'invalid_request',
  NotFound = 'not_found',
  InternalError = 'internal_server_error',
}
