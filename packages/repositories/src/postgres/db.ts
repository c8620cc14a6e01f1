import { drizzle, type PostgresJsQueryResultHKT } from 'drizzle-orm/postgres-js';
import type { PgDatabase } from 'drizzle-orm/pg-core';
import postgres from 'postgres';
import * as schema from './schema/index.js';
import type { DatabaseConfig } from './config.js';

/**
 * Create a database connection and Drizzle instance.
 *
 * Usage:
 * ```ts
 * const { db, client } = createDatabase(loadDatabaseConfig());
 * ```
 */
export function createDatabase(config: DatabaseConfig) {
  const client = postgres(config.connectionString, {
    max: config.maxConnections,
  });

  const db = drizzle(client, { schema });

  return { db, client };
}

export type Database = ReturnType<typeof createDatabase>['db'];

/**
 * Anything queries can run against: the database itself or an open
 * transaction on it.
 */
export type DatabaseExecutor = PgDatabase<PostgresJsQueryResultHKT, typeof schema>;
