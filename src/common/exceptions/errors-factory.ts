import { HttpStatus } from '@nestjs/common';
import { AppError } from './app-error';
import { ErrorCode } from './error-codes';

export const ERRORS = {
  // Signup
  EmailAlreadyExists: (e?: Error) =>
    new AppError({
      code: ErrorCode.EmailAlreadyExists,
      message: 'Email is already registered',
      httpStatusCode: HttpStatus.BAD_REQUEST,
      originalError: e,
    }),

  SessionNotFound: () =>
    new AppError({
      code: ErrorCode.SessionNotFound,
      message: 'Signup session not found or expired',
      httpStatusCode: HttpStatus.BAD_REQUEST,
    }),

  InvalidCode: () =>
    new AppError({
      code: ErrorCode.InvalidCode,
      message: 'Verification code does not match',
      httpStatusCode: HttpStatus.BAD_REQUEST,
    }),

  // Login & tokens
  InvalidCredentials: () =>
    new AppError({
      code: ErrorCode.InvalidCredentials,
      message: 'Invalid email or password',
      httpStatusCode: HttpStatus.UNAUTHORIZED,
    }),

  RefreshTokenInvalid: () =>
    new AppError({
      code: ErrorCode.RefreshTokenInvalid,
      message: 'Refresh token is invalid or expired',
      httpStatusCode: HttpStatus.UNAUTHORIZED,
    }),

  ClientIdMismatch: () =>
    new AppError({
      code: ErrorCode.ClientIdMismatch,
      message: 'Refresh token was issued to a different client',
      httpStatusCode: HttpStatus.UNAUTHORIZED,
    }),

  TokenNotFound: () =>
    new AppError({
      code: ErrorCode.TokenNotFound,
      message: 'Refresh token not found',
      httpStatusCode: HttpStatus.BAD_REQUEST,
    }),

  MissingRefreshToken: () =>
    new AppError({
      code: ErrorCode.MissingRefreshToken,
      message: 'Refresh token is required',
      httpStatusCode: HttpStatus.BAD_REQUEST,
    }),

  // Bearer authentication
  Unauthorized: () =>
    new AppError({
      code: ErrorCode.Unauthorized,
      message: 'Authentication required',
      httpStatusCode: HttpStatus.UNAUTHORIZED,
    }),

  InvalidTokenFormat: () =>
    new AppError({
      code: ErrorCode.InvalidTokenFormat,
      message: 'Authorization header must be a Bearer token',
      httpStatusCode: HttpStatus.UNAUTHORIZED,
    }),

  InvalidToken: () =>
    new AppError({
      code: ErrorCode.InvalidToken,
      message: 'Access token is invalid or expired',
      httpStatusCode: HttpStatus.UNAUTHORIZED,
    }),

  UserNotFound: (userId: number) =>
    new AppError({
      code: ErrorCode.UserNotFound,
      message: `User ${userId} not found`,
      httpStatusCode: HttpStatus.UNAUTHORIZED,
    }),

  // Profiles
  UsernameAlreadyExists: (e?: Error) =>
    new AppError({
      code: ErrorCode.UsernameAlreadyExists,
      message: 'Username is already taken',
      httpStatusCode: HttpStatus.CONFLICT,
      originalError: e,
    }),

  ProfileAlreadyExists: (e?: Error) =>
    new AppError({
      code: ErrorCode.ProfileAlreadyExists,
      message: 'User already has a profile',
      httpStatusCode: HttpStatus.CONFLICT,
      originalError: e,
    }),

  ProfileNotFound: (userId: number) =>
    new AppError({
      code: ErrorCode.ProfileNotFound,
      message: `User ${userId} has no profile`,
      httpStatusCode: HttpStatus.NOT_FOUND,
    }),

  // Throttling
  RateLimitExceeded: (operation: string) =>
    new AppError({
      code: ErrorCode.RateLimitExceeded,
      message: `Too many ${operation} attempts`,
      httpStatusCode: HttpStatus.TOO_MANY_REQUESTS,
    }),

  // General
  InternalError: (message: string, e?: Error) =>
    new AppError({
      code: ErrorCode.InternalError,
      message: message || 'Internal server error',
      httpStatusCode: HttpStatus.INTERNAL_SERVER_ERROR,
      originalError: e,
    }),
};
