import type { EmployeeRepository } from './employee-repository.js';
import type { RevisionRepository } from './revision-repository.js';

/**
 * RepositoryContext bundles all repository interfaces together.
 *
 * This is the dependency injection point for the runtime. Swap
 * implementations (Postgres, in-memory) without changing consuming code.
 *
 * Example usage:
 * ```typescript
 * const repos = createTransactionalPgRepositoryContext(db);
 * const store = new EmployeeStore({ repos });
 * ```
 */
export interface RepositoryContext {
  readonly employees: EmployeeRepository;
  readonly revisions: RevisionRepository;
}

/**
 * Function run against transaction-scoped repositories.
 */
export type TransactionFn<T> = (repos: RepositoryContext) => Promise<T>;

export type TransactionOptions = {
  /** The function only reads; nothing it does is committed */
  readOnly?: boolean;
};

/**
 * Extended context with transaction support.
 */
export interface TransactionalRepositoryContext extends RepositoryContext {
  /**
   * Execute a function within a transaction.
   *
   * Every read and write made through the repositories passed to `fn` sees
   * one consistent snapshot and commits as one unit.
   *
   * @throws Rolls back the transaction if the function throws
   */
  transaction<T>(fn: TransactionFn<T>, options?: TransactionOptions): Promise<T>;
}
