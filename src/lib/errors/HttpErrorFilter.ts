import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import type { Response } from 'express';
import { MongoActionError } from './MongoActionError';

export interface ErrorBody {
  error: string;
  code?: string;
  details?: unknown;
}

/**
 * Renders every error as `{ error, code?, details? }`.
 * Bodies that already carry a `code` are sent as they are; unhandled errors
 * become a generic 500 and their detail goes to the log only.
 */
@Catch()
export class HttpErrorFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpErrorFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const res = host.switchToHttp().getResponse<Response>();
    const { status, body } = this.toResponse(exception);
    res.status(status).json(body);
  }

  toResponse(exception: unknown): { status: number; body: ErrorBody } {
    if (exception instanceof HttpException) {
      return {
        status: exception.getStatus(),
        body: toErrorBody(exception.getResponse(), exception.message),
      };
    }

    if (exception instanceof MongoActionError) {
      this.logger.error(exception.summary(), exception.stack);
    } else if (exception instanceof Error) {
      this.logger.error(exception.message, exception.stack);
    } else {
      this.logger.error(`Non-error thrown: ${String(exception)}`);
    }
    return {
      status: HttpStatus.INTERNAL_SERVER_ERROR,
      body: { error: 'Internal server error', code: 'INTERNAL_ERROR' },
    };
  }
}

function toErrorBody(response: string | object, fallback: string): ErrorBody {
  if (typeof response === 'string') return { error: response };

  const fields = new Map<string, unknown>(Object.entries(response));
  const error = fields.get('error');
  const code = fields.get('code');
  if (typeof error === 'string' && typeof code === 'string') {
    const body: ErrorBody = { error, code };
    if (fields.has('details')) body.details = fields.get('details');
    return body;
  }

  // Nest's default shape: { statusCode, message, error: 'Bad Request' }
  const message = fields.get('message');
  if (typeof message === 'string') return { error: message };
  if (Array.isArray(message)) return { error: message.map(String).join('; ') };
  return { error: fallback };
}
