export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

const SEVERITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function currentThreshold(): number {
  const configured = process.env.LOG_LEVEL ?? 'info';
  return SEVERITY[isLogLevel(configured) ? configured : 'info'];
}

/**
 * Creates a structured logger that writes one JSON line per entry.
 * Every entry carries the given context so output from the store, cache
 * and service can be filtered apart.
 *
 * The threshold is read from LOG_LEVEL on each call, so tests and the
 * server can change verbosity without rebuilding loggers.
 */
export function createLogger(context: string): Logger {
  const write = (level: Exclude<LogLevel, 'silent'>, message: string, data?: Record<string, unknown>) => {
    if (SEVERITY[level] < currentThreshold()) return;

    const line = JSON.stringify({
      level,
      context,
      message,
      ...data,
      timestamp: new Date().toISOString(),
    });

    if (level === 'error') console.error(line);
    else if (level === 'warn') console.warn(line);
    else if (level === 'debug') console.debug(line);
    else console.log(line);
  };

  return {
    debug: (message, data) => write('debug', message, data),
    info: (message, data) => write('info', message, data),
    warn: (message, data) => write('warn', message, data),
    error: (message, data) => write('error', message, data),
  };
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
