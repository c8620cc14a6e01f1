// Tests for Postgres error translation

import { describe, it, expect } from 'vitest';
import { translatePgError } from './errors.js';
import {
  StorageUnreachableError,
  UniqueViolationError,
  WriteConflictError,
} from '../errors.js';

function pgError(fields: Record<string, unknown>): Error {
  return Object.assign(new Error('driver error'), fields);
}

describe('translatePgError', () => {
  it('maps unique violations on known constraints to their field', () => {
    const translated = translatePgError(
      pgError({ code: '23505', constraint_name: 'employees_email_key' })
    );

    expect(translated).toBeInstanceOf(UniqueViolationError);
    expect(translated).toMatchObject({ field: 'email', code: 'UNIQUE_VIOLATION' });
  });

  it('maps the employee number constraint', () => {
    const translated = translatePgError(
      pgError({ code: '23505', constraint_name: 'employees_employee_number_key' })
    );

    expect(translated).toMatchObject({ field: 'employeeNumber' });
  });

  it('leaves unique violations on other constraints alone', () => {
    const original = pgError({ code: '23505', constraint_name: 'something_else' });

    expect(translatePgError(original)).toBe(original);
  });

  it('maps serialization failures and deadlocks to write conflicts', () => {
    expect(translatePgError(pgError({ code: '40001' }))).toBeInstanceOf(WriteConflictError);
    expect(translatePgError(pgError({ code: '40P01' }))).toBeInstanceOf(WriteConflictError);
  });

  it('maps connection failures to unreachable storage', () => {
    expect(translatePgError(pgError({ code: 'ECONNREFUSED' }))).toBeInstanceOf(
      StorageUnreachableError
    );
    expect(translatePgError(pgError({ code: 'CONNECT_TIMEOUT' }))).toBeInstanceOf(
      StorageUnreachableError
    );
    expect(translatePgError(pgError({ code: '08006' }))).toBeInstanceOf(StorageUnreachableError);
  });

  it('looks through a wrapping cause', () => {
    const wrapped = Object.assign(new Error('query failed'), {
      cause: pgError({ code: '40001' }),
    });

    expect(translatePgError(wrapped)).toBeInstanceOf(WriteConflictError);
  });

  it('keeps the original error as the cause', () => {
    const original = pgError({ code: '40001' });
    const translated = translatePgError(original);

    expect(translated).toBeInstanceOf(WriteConflictError);
    if (translated instanceof WriteConflictError) {
      expect(translated.cause).toBe(original);
    }
  });

  it('passes through errors it does not recognise', () => {
    const plain = new Error('plain');

    expect(translatePgError(plain)).toBe(plain);
    expect(translatePgError('not an error')).toBe('not an error');
    expect(translatePgError(pgError({ code: '22P02' }))).toBeInstanceOf(Error);
  });

  it('returns repository errors unchanged', () => {
    const conflict = new WriteConflictError();

    expect(translatePgError(conflict)).toBe(conflict);
  });
});
