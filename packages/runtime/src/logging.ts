// Structured logging for store operations

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Structured logger interface.
 * Implementations can route to console, file, or external services.
 */
export type StoreLogger = {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
};

/**
 * Default console logger implementation
 */
export const consoleLogger: StoreLogger = {
  debug(message: string, data?: Record<string, unknown>) {
    console.debug(`[DEBUG] ${message}`, data ?? '');
  },
  info(message: string, data?: Record<string, unknown>) {
    console.info(`[INFO] ${message}`, data ?? '');
  },
  warn(message: string, data?: Record<string, unknown>) {
    console.warn(`[WARN] ${message}`, data ?? '');
  },
  error(message: string, data?: Record<string, unknown>) {
    console.error(`[ERROR] ${message}`, data ?? '');
  },
};

/**
 * Silent logger for testing
 */
export const silentLogger: StoreLogger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};

/**
 * Drop entries below `minLevel` before they reach `base`.
 */
export function createLevelLogger(base: StoreLogger, minLevel: LogLevel): StoreLogger {
  const threshold = LOG_LEVELS.indexOf(minLevel);
  const gate =
    (level: LogLevel) => (message: string, data?: Record<string, unknown>) => {
      if (LOG_LEVELS.indexOf(level) >= threshold) {
        base[level](message, data);
      }
    };

  return {
    debug: gate('debug'),
    info: gate('info'),
    warn: gate('warn'),
    error: gate('error'),
  };
}

/**
 * Create a capturing logger that stores log entries for inspection
 */
export type LogEntry = {
  level: LogLevel;
  message: string;
  data?: Record<string, unknown>;
  timestamp: string;
};

export function createCapturingLogger(): StoreLogger & { entries: LogEntry[] } {
  const entries: LogEntry[] = [];

  const log = (level: LogEntry['level']) => (message: string, data?: Record<string, unknown>) => {
    entries.push({
      level,
      message,
      data,
      timestamp: new Date().toISOString(),
    });
  };

  return {
    entries,
    debug: log('debug'),
    info: log('info'),
    warn: log('warn'),
    error: log('error'),
  };
}
