import {
  BadRequestException,
  ConflictException,
  NotFoundException,
} from '@nestjs/common';
import {
  DeleteRestrictedError,
  EmptyUpdateError,
  EntityNotFoundError,
  InvalidQueryError,
  MissingReferenceError,
  UnknownEntityError,
} from '../../../lib/errors/EntitiesError';

/**
 * Domain error -> HTTP exception with an `{ error, code }` body.
 * Anything unrecognised is rethrown untouched for the global filter.
 */
export function mapDomainError(err: unknown): never {
  if (err instanceof EntityNotFoundError) {
    throw new NotFoundException({ error: err.message, code: err.code });
  }
  if (err instanceof DeleteRestrictedError) {
    throw new ConflictException({ error: err.message, code: err.code });
  }
  if (
    err instanceof InvalidQueryError ||
    err instanceof MissingReferenceError ||
    err instanceof EmptyUpdateError ||
    err instanceof UnknownEntityError
  ) {
    throw new BadRequestException({ error: err.message, code: err.code });
  }
  throw err;
}
