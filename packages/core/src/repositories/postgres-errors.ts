/**
 * Translation of PostgreSQL error codes into application errors
 */

import { ConflictError, ReferentialIntegrityError, ValidationError } from '../errors.js';

interface PgDatabaseError extends Error {
  code: string;
  constraint?: string;
  column?: string;
}

function toFieldName(column: string): string {
  return column.replace(/_([a-z0-9])/g, (_match, char: string) => char.toUpperCase());
}

function isPgDatabaseError(error: unknown): error is PgDatabaseError {
  return error instanceof Error && 'code' in error && typeof error.code === 'string';
}

/**
 * Map a driver error to the application error it stands for
 *
 * - 23503 foreign_key_violation -> ReferentialIntegrityError
 * - 23505 unique_violation -> ConflictError
 * - 23502 not_null_violation, 22P02 invalid_text_representation,
 *   23514 check_violation -> ValidationError
 *
 * Anything else is returned unchanged.
 */
export function translatePgError(error: unknown, table: string, resourceType: string): unknown {
  if (!isPgDatabaseError(error)) {
    return error;
  }

  switch (error.code) {
    case '23503':
      return new ReferentialIntegrityError(
        table,
        `${resourceType} violates a reference to another record`,
        error.constraint
      );
    case '23505':
      return new ConflictError(table, `${resourceType} already exists`, error.constraint);
    case '23502':
      return new ValidationError(`${toFieldName(error.column ?? 'field')} is required`);
    case '22P02':
      return new ValidationError(`invalid value for ${resourceType}`);
    case '23514':
      return new ValidationError(`${resourceType} violates constraint ${error.constraint ?? ''}`.trim());
    default:
      return error;
  }
}
