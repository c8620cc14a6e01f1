import type { Database, DatabaseExecutor } from '../db.js';
import type {
  RepositoryContext,
  TransactionalRepositoryContext,
  TransactionFn,
  TransactionOptions,
} from '../../interfaces/index.js';
import { translatePgError } from '../errors.js';
import { PgEmployeeRepository } from './employee-repository.js';
import { PgRevisionRepository } from './revision-repository.js';

function createRepositories(db: DatabaseExecutor): RepositoryContext {
  return {
    employees: new PgEmployeeRepository(db),
    revisions: new PgRevisionRepository(db),
  };
}

/**
 * Create a RepositoryContext backed by Postgres.
 *
 * Usage:
 * ```ts
 * const { db } = createDatabase(loadDatabaseConfig());
 * const repos = createPgRepositoryContext(db);
 * const employee = await repos.employees.get(id);
 * ```
 */
export function createPgRepositoryContext(db: Database): RepositoryContext {
  return createRepositories(db);
}

/**
 * Create a TransactionalRepositoryContext backed by Postgres.
 *
 * This extends the basic RepositoryContext with transaction support,
 * allowing multiple operations to be executed atomically.
 */
export function createTransactionalPgRepositoryContext(
  db: Database
): TransactionalRepositoryContext {
  return new TransactionalPgRepositoryContext(db);
}

/**
 * TransactionalRepositoryContext implementation for Postgres.
 *
 * Transactions run at SERIALIZABLE isolation, so checks made inside one
 * (uniqueness, hierarchy walks, dependent counts) hold at commit or the
 * transaction fails with a serialization error. Driver errors leave this
 * class translated into RepositoryErrors.
 */
class TransactionalPgRepositoryContext implements TransactionalRepositoryContext {
  readonly employees: PgEmployeeRepository;
  readonly revisions: PgRevisionRepository;

  constructor(private db: Database) {
    this.employees = new PgEmployeeRepository(db);
    this.revisions = new PgRevisionRepository(db);
  }

  /**
   * Execute a function within a database transaction.
   *
   * - If the function returns successfully, all changes are committed
   * - If the function throws, all changes are rolled back
   *
   * @throws The function's error, or a RepositoryError for driver failures
   */
  async transaction<T>(fn: TransactionFn<T>, options?: TransactionOptions): Promise<T> {
    try {
      return await this.db.transaction((tx) => fn(createRepositories(tx)), {
        isolationLevel: 'serializable',
        accessMode: options?.readOnly ? 'read only' : 'read write',
      });
    } catch (error) {
      throw translatePgError(error);
    }
  }
}
