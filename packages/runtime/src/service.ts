// Composition root for embedding the store in a transport

import type { TransactionalRepositoryContext } from '@stafftrail/repositories';
import { DEFAULT_STORE_CONFIG, type StoreConfig } from './config.js';
import { consoleLogger, createLevelLogger, type StoreLogger } from './logging.js';
import { EmployeeQueryEngine } from './query/query-engine.js';
import { EmployeeStore } from './store/employee-store.js';

export type StaffTrailOptions = {
  repos: TransactionalRepositoryContext;
  config?: Partial<StoreConfig>;

  /** Receives entries at or above `config.logLevel`; defaults to the console */
  logger?: StoreLogger;

  clock?: () => Date;
};

export type StaffTrail = {
  store: EmployeeStore;
  queries: EmployeeQueryEngine;
  config: StoreConfig;
};

/**
 * Wire a store and query engine over one repository context.
 *
 * @example
 * ```ts
 * const { db } = createDatabase(loadDatabaseConfig());
 * const { store, queries } = createStaffTrail({
 *   repos: postgres.createTransactionalPgRepositoryContext(db),
 *   config: loadStoreConfig(),
 * });
 * ```
 */
export function createStaffTrail(options: StaffTrailOptions): StaffTrail {
  const config: StoreConfig = { ...DEFAULT_STORE_CONFIG, ...options.config };
  const logger = createLevelLogger(options.logger ?? consoleLogger, config.logLevel);

  return {
    store: new EmployeeStore({ repos: options.repos, logger, clock: options.clock }),
    queries: new EmployeeQueryEngine({ repos: options.repos, config }),
    config,
  };
}
