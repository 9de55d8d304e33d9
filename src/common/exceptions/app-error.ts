import { HttpStatus } from '@nestjs/common';
import { ErrorCode } from './error-codes';

export interface AppErrorOptions {
  code: ErrorCode;
  message: string;
  httpStatusCode: HttpStatus;
  originalError?: Error;
}

/**
 * Domain failure raised by services. Carries its own HTTP status so the
 * exception filter can map it without knowing the flow that raised it.
 */
export class AppError extends Error {
  readonly code: ErrorCode;
  readonly httpStatusCode: HttpStatus;
  readonly originalError?: Error;

  constructor(options: AppErrorOptions) {
    super(options.message);
    this.name = 'AppError';
    this.code = options.code;
    this.httpStatusCode = options.httpStatusCode;
    this.originalError = options.originalError;

    Error.captureStackTrace(this, this.constructor);
  }
}
