/**
 * Log levels for structured logging
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Structured log entry
 */
export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: number;
  context?: string;
  data?: Record<string, unknown>;
  error?: Error;
}

/**
 * Logger interface accepted by every sync component
 */
export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, error?: Error, data?: Record<string, unknown>): void;
  /** Derive a logger that tags entries with another context (e.g. 'SyncQueue') */
  child(context: string): Logger;
}

/**
 * Logger options
 */
export interface LoggerOptions {
  /** Minimum log level to output (default: 'info') */
  level?: LogLevel;
  /** Context name (e.g., 'SyncService', 'ConnectivityMonitor') */
  context?: string;
  /** Custom log handler */
  handler?: (entry: LogEntry) => void;
  /** Enable logging (default: false in production) */
  enabled?: boolean;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Default log handler that writes one timestamped line per entry
 */
export function consoleLogHandler(entry: LogEntry): void {
  const prefix = entry.context ? `[${entry.context}]` : '';
  const timestamp = new Date(entry.timestamp).toISOString();
  const dataStr = entry.data ? ` ${JSON.stringify(entry.data)}` : '';
  const line = `${timestamp} ${entry.level.toUpperCase()}${prefix} ${entry.message}${dataStr}`;

  switch (entry.level) {
    case 'debug':
      console.debug(line);
      break;
    case 'info':
      console.info(line);
      break;
    case 'warn':
      console.warn(line);
      break;
    case 'error':
      console.error(line, entry.error ?? '');
      break;
  }
}

/**
 * Create a structured logger
 *
 * @example
 * ```typescript
 * const logger = createLogger({ context: 'SyncService', level: 'debug' });
 * logger.info('Drain finished', { pending: 0 });
 * logger.child('SyncQueue').warn('Persist failed');
 * ```
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const {
    level = 'info',
    context,
    handler = consoleLogHandler,
    enabled = process.env.NODE_ENV !== 'production',
  } = options;

  const minPriority = LOG_LEVEL_PRIORITY[level];

  function log(
    logLevel: LogLevel,
    message: string,
    data?: Record<string, unknown>,
    error?: Error
  ): void {
    if (!enabled || LOG_LEVEL_PRIORITY[logLevel] < minPriority) return;

    handler({
      level: logLevel,
      message,
      timestamp: Date.now(),
      context,
      data,
      error,
    });
  }

  return {
    debug(message, data) {
      log('debug', message, data);
    },
    info(message, data) {
      log('info', message, data);
    },
    warn(message, data) {
      log('warn', message, data);
    },
    error(message, error, data) {
      log('error', message, data, error);
    },
    child(childContext) {
      return createLogger({
        level,
        handler,
        enabled,
        context: context ? `${context}:${childContext}` : childContext,
      });
    },
  };
}

/**
 * No-op logger that doesn't output anything
 */
export const noopLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  child: () => noopLogger,
};
