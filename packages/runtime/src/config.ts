// Store configuration

import { z } from 'zod';
import { LOG_LEVELS, type LogLevel } from './logging.js';

export type StoreConfig = {
  /** Page size used when a search does not ask for one */
  defaultPageSize: number;

  /** Larger requested page sizes are capped to this */
  maxPageSize: number;

  /** Minimum level the default logger emits */
  logLevel: LogLevel;
};

export const DEFAULT_STORE_CONFIG: StoreConfig = {
  defaultPageSize: 20,
  maxPageSize: 100,
  logLevel: 'info',
};

const StoreEnvSchema = z
  .object({
    STORE_DEFAULT_PAGE_SIZE: z.coerce
      .number()
      .int()
      .positive()
      .default(DEFAULT_STORE_CONFIG.defaultPageSize),
    STORE_MAX_PAGE_SIZE: z.coerce.number().int().positive().default(DEFAULT_STORE_CONFIG.maxPageSize),
    LOG_LEVEL: z.enum(LOG_LEVELS).default(DEFAULT_STORE_CONFIG.logLevel),
  })
  .refine((env) => env.STORE_DEFAULT_PAGE_SIZE <= env.STORE_MAX_PAGE_SIZE, {
    message: 'must not exceed STORE_MAX_PAGE_SIZE',
    path: ['STORE_DEFAULT_PAGE_SIZE'],
  });

/**
 * Raised when the environment holds invalid store settings.
 */
export class ConfigError extends Error {
  readonly keys: string[];

  constructor(message: string, keys: string[]) {
    super(message);
    this.name = 'ConfigError';
    this.keys = keys;
  }
}

/**
 * Read store settings from the environment. Unset keys take defaults.
 *
 * @throws ConfigError naming every invalid key
 */
export function loadStoreConfig(
  env: Record<string, string | undefined> = process.env
): StoreConfig {
  const result = StoreEnvSchema.safeParse(env);
  if (!result.success) {
    const keys = [...new Set(result.error.issues.map((issue) => issue.path.join('.')))];
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid store configuration: ${details}`, keys);
  }

  return {
    defaultPageSize: result.data.STORE_DEFAULT_PAGE_SIZE,
    maxPageSize: result.data.STORE_MAX_PAGE_SIZE,
    logLevel: result.data.LOG_LEVEL,
  };
}
