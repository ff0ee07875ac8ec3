/**
 * Database error translation
 *
 * Driver errors (postgres-js, PGlite, or drizzle wrapping either) carry the
 * SQLSTATE in `code`, sometimes one or two `cause` levels down.
 */

import {
  AppError,
  ConflictError,
  InternalError,
  InvalidReferenceError,
} from '@/errors/appErrors';

export const PG_UNIQUE_VIOLATION = '23505';
export const PG_FOREIGN_KEY_VIOLATION = '23503';

const MAX_CAUSE_DEPTH = 5;

/**
 * Find the SQLSTATE code on an error or anywhere along its cause chain
 */
export function findSqlState(error: unknown): string | undefined {
  let current: unknown = error;
  for (let depth = 0; depth < MAX_CAUSE_DEPTH && current; depth += 1) {
    if (typeof current !== 'object') return undefined;
    if ('code' in current && typeof current.code === 'string' && /^[0-9A-Z]{5}$/.test(current.code)) {
      return current.code;
    }
    current = 'cause' in current ? current.cause : undefined;
  }
  return undefined;
}

export interface DbErrorMessages {
  operation: string;
  conflict?: string;
  invalidReference?: string;
}

/**
 * Translate a driver error into the application taxonomy.
 * AppErrors thrown inside a transaction callback pass through unchanged.
 */
export function translateDbError(error: unknown, messages: DbErrorMessages): AppError {
  if (error instanceof AppError) {
    return error;
  }

  const sqlState = findSqlState(error);

  if (sqlState === PG_UNIQUE_VIOLATION) {
    return new ConflictError(messages.conflict ?? 'Resource already exists', { cause: error });
  }

  if (sqlState === PG_FOREIGN_KEY_VIOLATION) {
    return new InvalidReferenceError(
      messages.invalidReference ?? 'Referenced resource not found',
      { cause: error }
    );
  }

  return new InternalError(`Storage operation failed: ${messages.operation}`, { cause: error });
}
