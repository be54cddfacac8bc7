import { AppError } from './AppError';

/**
 * Entities module domain errors.
 * Controllers map each class to one HTTP status (see mapDomainError).
 */

export class UnknownEntityError extends AppError {
  constructor(readonly entityKey: string) {
    super(`Unknown entity: ${entityKey}`, 'ENTITIES_UNKNOWN_ENTITY');
  }
}

export class EntityNotFoundError extends AppError {
  constructor(
    readonly label: string,
    readonly id: number,
  ) {
    super(`${label} not found`, 'ENTITIES_NOT_FOUND');
  }
}

/** Sort or pagination input the translator refuses (filters never land here). */
export class InvalidQueryError extends AppError {
  constructor(
    message: string,
    readonly param: string,
  ) {
    super(message, 'ENTITIES_INVALID_QUERY');
  }
}

export class MissingReferenceError extends AppError {
  constructor(
    readonly field: string,
    readonly targetLabel: string,
    readonly value: unknown,
  ) {
    super(
      `${field} references a ${targetLabel} that does not exist: ${String(value)}`,
      'ENTITIES_MISSING_REFERENCE',
    );
  }
}

export class EmptyUpdateError extends AppError {
  constructor(readonly label: string) {
    super(`No ${label} fields to update`, 'ENTITIES_EMPTY_UPDATE');
  }
}

export class DeleteRestrictedError extends AppError {
  constructor(
    readonly label: string,
    readonly id: number,
    readonly relationship: string,
    readonly count: number,
  ) {
    super(
      `${label} ${id} still has ${count} related ${relationship}`,
      'ENTITIES_DELETE_RESTRICTED',
    );
  }
}
