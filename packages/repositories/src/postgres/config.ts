import { z } from 'zod';

export type DatabaseConfig = {
  connectionString: string;
  maxConnections: number;
};

const DatabaseEnvSchema = z.object({
  DATABASE_URL: z
    .string({ required_error: 'DATABASE_URL environment variable is not set' })
    .url(),
  DATABASE_MAX_CONNECTIONS: z.coerce.number().int().positive().default(10),
});

/**
 * Raised when the environment does not describe a usable database.
 */
export class DatabaseConfigError extends Error {
  readonly keys: string[];

  constructor(message: string, keys: string[]) {
    super(message);
    this.name = 'DatabaseConfigError';
    this.keys = keys;
  }
}

/**
 * Read database settings from the environment.
 *
 * @throws DatabaseConfigError naming every invalid key
 */
export function loadDatabaseConfig(
  env: Record<string, string | undefined> = process.env
): DatabaseConfig {
  const result = DatabaseEnvSchema.safeParse(env);
  if (!result.success) {
    const keys = [...new Set(result.error.issues.map((issue) => issue.path.join('.')))];
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new DatabaseConfigError(`Invalid database configuration: ${details}`, keys);
  }

  return {
    connectionString: result.data.DATABASE_URL,
    maxConnections: result.data.DATABASE_MAX_CONNECTIONS,
  };
}
