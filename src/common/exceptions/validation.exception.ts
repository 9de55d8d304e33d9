import { BadRequestException } from '@nestjs/common';
import { ValidationError } from 'class-validator';

export type FieldError = { field: string; message: string };

export const validationExceptionFactory = (
  errors: ValidationError[],
): ValidationException => {
  const result: FieldError[] = [];

  const walk = (errs: ValidationError[], parentPath = ''): void => {
    errs.forEach((error: ValidationError) => {
      const path = parentPath
        ? `${parentPath}.${error.property}`
        : error.property;

      if (error.constraints) {
        Object.values(error.constraints).forEach((message) =>
          result.push({ field: path, message }),
        );
      }

      if (error.children?.length) {
        walk(error.children, path);
      }
    });
  };

  walk(errors);

  return new ValidationException(result);
};

/**
 * Raised by the global ValidationPipe. `message` of each entry is an i18n key
 * (e.g. `validation.EMAIL`) resolved by AppExceptionFilter.
 */
export class ValidationException extends BadRequestException {
  constructor(public validationErrors: FieldError[]) {
    super({
      success: false,
      errors: validationErrors,
    });
  }
}
