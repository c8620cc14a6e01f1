// Postgres error translation
//
// postgres.js raises PostgresError for server-side failures (with a SQLSTATE
// code) and plain errors with string codes for client-side connection
// failures. Drizzle may wrap either in `cause`.

import {
  RepositoryError,
  StorageUnreachableError,
  UniqueViolationError,
  WriteConflictError,
  type UniqueField,
} from '../errors.js';

const UNIQUE_VIOLATION = '23505';

const WRITE_CONFLICT_CODES = new Set([
  '40001', // serialization_failure
  '40P01', // deadlock_detected
]);

const UNREACHABLE_CODES = new Set([
  '57P01', // admin_shutdown
  '57P02', // crash_shutdown
  '57P03', // cannot_connect_now
  '53300', // too_many_connections
  'CONNECTION_CLOSED',
  'CONNECTION_ENDED',
  'CONNECTION_DESTROYED',
  'CONNECT_TIMEOUT',
  'ECONNREFUSED',
  'ECONNRESET',
  'ETIMEDOUT',
  'ENOTFOUND',
]);

const UNIQUE_CONSTRAINTS: Partial<Record<string, UniqueField>> = {
  employees_employee_number_key: 'employeeNumber',
  employees_email_key: 'email',
};

type PgErrorFields = {
  code: string;
  constraint?: string;
};

function readFields(value: unknown): PgErrorFields | null {
  if (typeof value !== 'object' || value === null) return null;
  if (!('code' in value) || typeof value.code !== 'string') return null;

  const constraint =
    'constraint_name' in value && typeof value.constraint_name === 'string'
      ? value.constraint_name
      : undefined;
  return { code: value.code, constraint };
}

function findFields(error: unknown): PgErrorFields | null {
  const direct = readFields(error);
  if (direct) return direct;
  if (typeof error === 'object' && error !== null && 'cause' in error) {
    return readFields(error.cause);
  }
  return null;
}

/**
 * Map a driver error onto a RepositoryError where one applies.
 * Errors that match nothing are returned unchanged.
 */
export function translatePgError(error: unknown): unknown {
  if (error instanceof RepositoryError) return error;

  const fields = findFields(error);
  if (!fields) return error;

  if (fields.code === UNIQUE_VIOLATION && fields.constraint) {
    const field = UNIQUE_CONSTRAINTS[fields.constraint];
    return field ? new UniqueViolationError(field, { cause: error }) : error;
  }

  if (WRITE_CONFLICT_CODES.has(fields.code)) {
    return new WriteConflictError({ cause: error });
  }

  if (UNREACHABLE_CODES.has(fields.code) || fields.code.startsWith('08')) {
    return new StorageUnreachableError(`Database unreachable (${fields.code})`, {
      cause: error,
    });
  }

  return error;
}
