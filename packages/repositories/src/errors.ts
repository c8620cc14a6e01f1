// Repository error types
//
// Storage-level failures, independent of the backend that raised them.
// The runtime translates these into its own error taxonomy.

/**
 * Base class for all repository errors.
 */
export class RepositoryError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RepositoryError';
    this.code = code;
  }
}

export type UniqueField = 'employeeNumber' | 'email';

/**
 * A write collided with a uniqueness constraint.
 */
export class UniqueViolationError extends RepositoryError {
  readonly field: UniqueField;

  constructor(field: UniqueField, options?: { cause?: unknown }) {
    super('UNIQUE_VIOLATION', `Unique constraint violated on ${field}`, options);
    this.name = 'UniqueViolationError';
    this.field = field;
  }
}

/**
 * A transaction lost a race with a concurrent writer and was aborted.
 */
export class WriteConflictError extends RepositoryError {
  constructor(options?: { cause?: unknown }) {
    super('WRITE_CONFLICT', 'Transaction aborted by a concurrent write', options);
    this.name = 'WriteConflictError';
  }
}

/**
 * The backing store could not be reached.
 */
export class StorageUnreachableError extends RepositoryError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('STORAGE_UNREACHABLE', message, options);
    this.name = 'StorageUnreachableError';
  }
}
