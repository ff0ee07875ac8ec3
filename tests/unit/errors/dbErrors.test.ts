import { describe, it, expect } from 'vitest';
import {
  ConflictError,
  InternalError,
  InvalidReferenceError,
  NotFoundError,
  UnauthorizedError,
} from '@/errors/appErrors';
import { findSqlState, translateDbError } from '@/errors/dbErrors';

function pgError(code: string): Error {
  return Object.assign(new Error('driver error'), { code });
}

describe('findSqlState', () => {
  it('reads the code from the error or its causes', () => {
    expect(findSqlState(pgError('23505'))).toBe('23505');
    expect(findSqlState(new Error('wrapped', { cause: pgError('23503') }))).toBe('23503');
    expect(
      findSqlState(new Error('outer', { cause: new Error('inner', { cause: pgError('40001') }) }))
    ).toBe('40001');
  });

  it('ignores codes that are not SQLSTATEs', () => {
    expect(findSqlState(pgError('ECONNREFUSED'))).toBeUndefined();
    expect(findSqlState('23505')).toBeUndefined();
    expect(findSqlState(undefined)).toBeUndefined();
  });
});

describe('translateDbError', () => {
  it('maps unique violations to ConflictError', () => {
    const error = translateDbError(pgError('23505'), {
      operation: 'create user',
      conflict: 'Email already registered',
    });
    expect(error).toBeInstanceOf(ConflictError);
    expect(error.message).toBe('Email already registered');
    expect(error.status).toBe(409);
  });

  it('maps foreign key violations to InvalidReferenceError', () => {
    const error = translateDbError(pgError('23503'), { operation: 'create session' });
    expect(error).toBeInstanceOf(InvalidReferenceError);
    expect(error).toBeInstanceOf(NotFoundError);
    expect(error.code).toBe('INVALID_REFERENCE');
    expect(error.status).toBe(404);
  });

  it('maps anything else to InternalError and keeps the cause', () => {
    const cause = pgError('08006');
    const error = translateDbError(cause, { operation: 'find user' });
    expect(error).toBeInstanceOf(InternalError);
    expect(error.message).toBe('Storage operation failed: find user');
    expect(error.cause).toBe(cause);
  });

  it('passes application errors through', () => {
    const original = new UnauthorizedError();
    expect(translateDbError(original, { operation: 'x' })).toBe(original);
  });
});
