// Store error types
//
// Every failure a store or query operation reports to its caller. The
// transport layer maps these to user-facing responses by `code`.

import type { FieldIssue, Id, ParseResult } from '@stafftrail/protocol';
import {
  RepositoryError,
  StorageUnreachableError,
  UniqueViolationError,
  WriteConflictError,
} from '@stafftrail/repositories';

export type StoreErrorCode =
  | 'NOT_FOUND'
  | 'DUPLICATE_KEY'
  | 'VERSION_CONFLICT'
  | 'CYCLE_DETECTED'
  | 'DEPENDENTS_EXIST'
  | 'INTEGRITY_VIOLATION'
  | 'STORAGE_UNAVAILABLE'
  | 'VALIDATION_ERROR';

/**
 * Base class for all store errors.
 * Provides structured error information for callers and logging.
 */
export class StoreError extends Error {
  readonly code: StoreErrorCode;

  constructor(code: StoreErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StoreError';
    this.code = code;
  }
}

/**
 * A referenced employee does not exist.
 */
export class NotFoundError extends StoreError {
  readonly resource: 'employee' | 'supervisor';
  readonly id: Id;

  constructor(resource: 'employee' | 'supervisor', id: Id) {
    super('NOT_FOUND', `${resource === 'employee' ? 'Employee' : 'Supervisor'} not found: ${id}`);
    this.name = 'NotFoundError';
    this.resource = resource;
    this.id = id;
  }
}

/**
 * The business key or contact identifier is already taken.
 */
export class DuplicateKeyError extends StoreError {
  readonly field: 'employeeNumber' | 'email';
  readonly value?: string;

  constructor(field: 'employeeNumber' | 'email', value?: string, options?: { cause?: unknown }) {
    super(
      'DUPLICATE_KEY',
      value === undefined
        ? `Duplicate ${field}`
        : `Duplicate ${field}: "${value}" is already in use`,
      options
    );
    this.name = 'DuplicateKeyError';
    this.field = field;
    this.value = value;
  }
}

/**
 * The stored version no longer matches what the caller read.
 * Recoverable: re-fetch and retry.
 */
export class VersionConflictError extends StoreError {
  readonly employeeId?: Id;
  readonly expectedVersion?: number;
  readonly actualVersion?: number;

  constructor(
    details: { employeeId?: Id; expectedVersion?: number; actualVersion?: number },
    options?: { cause?: unknown }
  ) {
    const subject = details.employeeId ? `Employee ${details.employeeId}` : 'Employee';
    const versions =
      details.expectedVersion === undefined
        ? 'was modified concurrently'
        : details.actualVersion === undefined
          ? `is no longer at version ${details.expectedVersion}`
          : `is at version ${details.actualVersion}, expected ${details.expectedVersion}`;
    super('VERSION_CONFLICT', `${subject} ${versions}`, options);
    this.name = 'VersionConflictError';
    this.employeeId = details.employeeId;
    this.expectedVersion = details.expectedVersion;
    this.actualVersion = details.actualVersion;
  }
}

/**
 * Applying the proposed supervisor would make the employee supervise itself.
 */
export class CycleDetectedError extends StoreError {
  readonly employeeId: Id;
  readonly proposedSupervisorId: Id;

  constructor(employeeId: Id, proposedSupervisorId: Id) {
    super(
      'CYCLE_DETECTED',
      `Supervisor ${proposedSupervisorId} for employee ${employeeId} would create a supervision cycle`
    );
    this.name = 'CycleDetectedError';
    this.employeeId = employeeId;
    this.proposedSupervisorId = proposedSupervisorId;
  }
}

/**
 * Delete refused while ACTIVE employees report to the target.
 */
export class DependentsExistError extends StoreError {
  readonly employeeId: Id;
  readonly activeDependents: number;

  constructor(employeeId: Id, activeDependents: number) {
    super(
      'DEPENDENTS_EXIST',
      `Employee ${employeeId} still supervises ${activeDependents} active employee(s)`
    );
    this.name = 'DependentsExistError';
    this.employeeId = employeeId;
    this.activeDependents = activeDependents;
  }
}

/**
 * Stored supervision data is corrupt. Not recovered automatically.
 */
export class IntegrityViolationError extends StoreError {
  readonly details: Record<string, unknown>;

  constructor(message: string, details: Record<string, unknown>) {
    super('INTEGRITY_VIOLATION', message);
    this.name = 'IntegrityViolationError';
    this.details = details;
  }
}

/**
 * The persistent store cannot be reached. Retryable with backoff.
 */
export class StorageUnavailableError extends StoreError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('STORAGE_UNAVAILABLE', message, options);
    this.name = 'StorageUnavailableError';
  }
}

/**
 * Malformed or invalid input.
 */
export class ValidationError extends StoreError {
  readonly issues: FieldIssue[];

  constructor(message: string, issues: FieldIssue[]) {
    super('VALIDATION_ERROR', message);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

/**
 * Unwrap a protocol parse result.
 *
 * @throws ValidationError listing every issue
 */
export function validated<T>(result: ParseResult<T>, subject: string): T {
  if (!result.valid) {
    const details = result.issues
      .map((issue) => (issue.path ? `${issue.path}: ${issue.message}` : issue.message))
      .join('; ');
    throw new ValidationError(`Invalid ${subject}: ${details}`, result.issues);
  }
  return result.value;
}

export function isStoreError(error: unknown): error is StoreError {
  return error instanceof StoreError;
}

/**
 * Translate repository errors into store errors.
 * Anything else is returned unchanged.
 */
export function translateRepositoryError(error: unknown, employeeId?: Id): unknown {
  if (error instanceof StoreError || !(error instanceof RepositoryError)) {
    return error;
  }

  if (error instanceof UniqueViolationError) {
    return new DuplicateKeyError(error.field, undefined, { cause: error });
  }

  if (error instanceof WriteConflictError) {
    return new VersionConflictError({ employeeId }, { cause: error });
  }

  if (error instanceof StorageUnreachableError) {
    return new StorageUnavailableError(error.message, { cause: error });
  }

  return new StorageUnavailableError(`Storage failure: ${error.message}`, { cause: error });
}
