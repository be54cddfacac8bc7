import { HttpException, HttpStatus } from '@nestjs/common';
import type { ValidationError } from 'class-validator';

export interface ValidationIssue {
  path: string;
  message: string;
}

export class ValidationHttpException extends HttpException {
  constructor(details: ValidationIssue[]) {
    super(
      {
        error: 'Validation failed',
        code: 'VALIDATION_FAILED',
        details,
      },
      HttpStatus.BAD_REQUEST,
    );
    this.name = 'ValidationHttpException';
  }

  /** exceptionFactory for ValidationPipe: flattens nested class-validator errors. */
  static fromValidationErrors(
    errors: ValidationError[],
  ): ValidationHttpException {
    return new ValidationHttpException(flatten(errors, ''));
  }
}

function flatten(errors: ValidationError[], prefix: string): ValidationIssue[] {
  const out: ValidationIssue[] = [];
  for (const e of errors) {
    const path = prefix ? `${prefix}.${e.property}` : e.property;
    for (const message of Object.values(e.constraints ?? {})) {
      out.push({ path, message });
    }
    if (e.children && e.children.length > 0) {
      out.push(...flatten(e.children, path));
    }
  }
  return out;
}
