import { AppError } from '@/common/exceptions/app-error';
import { ErrorCode } from '@/common/exceptions/error-codes';
import {
  FieldError,
  ValidationException,
} from '@/common/exceptions/validation.exception';
import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { Request, Response } from 'express';
import { I18nContext, I18nService } from 'nestjs-i18n';

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null;

export interface ErrorResponseBody {
  error: string;
  message: string;
  details?: FieldError[];
}

/**
 * Turns every exception into `{ error, message, details? }`.
 *
 *  AppError             → its own status and code
 *  ValidationException  → 400 validation_error with per-field details
 *  other HttpException  → invalid_request (400), not_found (404) or the
 *                         status' generic code
 *  anything else        → 500 internal_server_error, logged with its stack
 *
 * Messages are looked up in the `errors` / `validation` i18n namespaces for the
 * request language; internal details never reach the body.
 */
@Catch()
export class AppExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(AppExceptionFilter.name);

  constructor(private readonly i18n: I18nService) {}

  catch(exception: unknown, host: ArgumentsHost): void {
    const http = host.switchToHttp();
    const response = http.getResponse<Response>();
    const lang =
      I18nContext.current(host)?.lang ??
      this.requestLanguage(http.getRequest<Request>());

    const { status, body } = this.toResponse(exception, lang);
    response.status(status).json(body);
  }

  toResponse(
    exception: unknown,
    lang?: string,
  ): { status: number; body: ErrorResponseBody } {
    if (exception instanceof AppError) {
      if (exception.httpStatusCode >= HttpStatus.INTERNAL_SERVER_ERROR) {
        this.logger.error(
          `${exception.code}: ${exception.message}`,
          exception.originalError?.stack ?? exception.stack,
        );
      } else {
        this.logger.debug(`${exception.code}: ${exception.message}`);
      }

      return {
        status: exception.httpStatusCode,
        body: this.body(exception.code, lang),
      };
    }

    if (exception instanceof ValidationException) {
      return {
        status: HttpStatus.BAD_REQUEST,
        body: {
          ...this.body(ErrorCode.ValidationError, lang),
          details: exception.validationErrors.map(({ field, message }) => ({
            field,
            message: this.translateConstraint(message, lang),
          })),
        },
      };
    }

    if (exception instanceof HttpException) {
      const status = exception.getStatus();
      const code =
        status === HttpStatus.NOT_FOUND
          ? ErrorCode.NotFound
          : status === HttpStatus.UNAUTHORIZED
            ? ErrorCode.Unauthorized
            : status === HttpStatus.TOO_MANY_REQUESTS
              ? ErrorCode.RateLimitExceeded
              : status < HttpStatus.INTERNAL_SERVER_ERROR
                ? ErrorCode.InvalidRequest
                : ErrorCode.InternalError;

      return { status, body: this.body(code, lang) };
    }

    this.logger.error(
      exception instanceof Error ? exception.message : String(exception),
      exception instanceof Error ? exception.stack : undefined,
    );

    return {
      status: HttpStatus.INTERNAL_SERVER_ERROR,
      body: this.body(ErrorCode.InternalError, lang),
    };
  }

  /**
   * Language for exceptions raised before the i18n middleware ran, such as a
   * body that fails to parse. Same order as the app's resolvers: `?lang`,
   * `x-lang`, then each `Accept-Language` tag.
   */
  private requestLanguage(request: Request): string | undefined {
    const supported = this.i18n.getSupportedLanguages();
    const candidates: unknown[] = [
      request.query?.lang,
      request.headers['x-lang'],
      ...(request.headers['accept-language'] ?? '').split(','),
    ];

    for (const candidate of candidates) {
      if (typeof candidate !== 'string') continue;
      const tag = candidate.split(';')[0].trim().toLowerCase();
      const match = supported.find(
        (language) => language === tag || language === tag.split('-')[0],
      );
      if (match) return match;
    }
    return undefined;
  }

  /**
   * Constraint messages come from `i18nValidationMessage` as
   * `<key>|<json args>`; plain keys are accepted too.
   */
  private translateConstraint(message: string, lang?: string): string {
    const separator = message.indexOf('|');
    if (separator === -1) {
      return this.i18n.translate<string, string>(message, { lang });
    }

    const parsed: unknown = JSON.parse(message.slice(separator + 1));
    return this.i18n.translate<string, string>(message.slice(0, separator), {
      lang,
      args: isRecord(parsed) ? parsed : undefined,
    });
  }

  private body(code: ErrorCode, lang?: string): ErrorResponseBody {
    return {
      error: code,
      message: this.i18n.translate(`errors.${code}`, { lang }),
    };
  }
}
