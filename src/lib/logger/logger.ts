/**
 * Logger
 *
 * Console logger shared by the indexer, the API server and the scripts.
 * Lines look like `2024-01-01T00:00:00.000Z INFO [Service][req:id] message`,
 * followed by any data, error and extra context as separate arguments.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  /** Service or module name */
  service?: string;
  /** Request ID for tracing */
  requestId?: string;
  [key: string]: unknown;
}

export interface FormattedError {
  name: string;
  message: string;
  stack?: string;
}

const LEVELS: Record<LogLevel, { priority: number; write: (...args: unknown[]) => void }> = {
  debug: { priority: 0, write: (...args) => console.debug(...args) },
  info: { priority: 1, write: (...args) => console.info(...args) },
  warn: { priority: 2, write: (...args) => console.warn(...args) },
  error: { priority: 3, write: (...args) => console.error(...args) },
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value === 'debug' || value === 'info' || value === 'warn' || value === 'error';
}

/**
 * Level from LOG_LEVEL; `debug` outside production, `info` in production
 */
export function getLogLevel(): LogLevel {
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();
  if (isLogLevel(envLevel)) {
    return envLevel;
  }
  return process.env.NODE_ENV === 'production' ? 'info' : 'debug';
}

/**
 * Reduce any thrown value to name, message and stack
 */
export function formatError(error: unknown): FormattedError | undefined {
  if (error === undefined || error === null) return undefined;

  if (error instanceof Error) {
    return { name: error.name, message: error.message, stack: error.stack };
  }

  if (typeof error === 'object') {
    const name = 'name' in error ? error.name : undefined;
    const message = 'message' in error ? error.message : undefined;
    return {
      name: typeof name === 'string' ? name : 'UnknownError',
      message: typeof message === 'string' ? message : JSON.stringify(error),
    };
  }

  return { name: 'UnknownError', message: String(error) };
}

export class Logger {
  constructor(private readonly context: LogContext = {}) {}

  child(additionalContext: LogContext): Logger {
    return new Logger({ ...this.context, ...additionalContext });
  }

  debug(message: string, data?: unknown): void {
    this.write('debug', message, undefined, data);
  }

  info(message: string, data?: unknown): void {
    this.write('info', message, undefined, data);
  }

  warn(message: string, data?: unknown): void {
    this.write('warn', message, undefined, data);
  }

  error(message: string, error?: unknown, data?: unknown): void {
    this.write('error', message, error, data);
  }

  /**
   * Run an async operation, logging its start, duration and failure
   */
  async withTiming<T>(operationName: string, fn: () => Promise<T>, data?: Record<string, unknown>): Promise<T> {
    const startTime = Date.now();
    this.debug(`Starting: ${operationName}`, data);
    try {
      const result = await fn();
      this.debug(`Completed: ${operationName}`, { duration: `${Date.now() - startTime}ms`, ...data });
      return result;
    } catch (error) {
      this.error(`Failed: ${operationName}`, error, data);
      throw error;
    }
  }

  private write(level: LogLevel, message: string, error: unknown, data: unknown): void {
    const { priority, write } = LEVELS[level];
    if (priority < LEVELS[getLogLevel()].priority) return;

    const { service, requestId, ...extra } = this.context;
    const prefix = `${service ? `[${service}]` : ''}${requestId ? `[req:${requestId}]` : ''}`;
    const args: unknown[] = [`${new Date().toISOString()} ${level.toUpperCase()} ${prefix} ${message}`];

    if (data !== undefined) {
      args.push('\nData:', data);
    }
    const formatted = formatError(error);
    if (formatted) {
      args.push('\nError:', formatted);
    }
    if (Object.keys(extra).length > 0) {
      args.push('\nContext:', extra);
    }

    write(...args);
  }
}

export function createLogger(service: string): Logger {
  return new Logger({ service });
}
