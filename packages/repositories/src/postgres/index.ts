// Postgres backend: schema, connection, configuration and repositories

export { createDatabase, type Database, type DatabaseExecutor } from './db.js';
export { loadDatabaseConfig, DatabaseConfigError, type DatabaseConfig } from './config.js';
export { translatePgError } from './errors.js';
export * as schema from './schema/index.js';
export * from './repositories/index.js';
