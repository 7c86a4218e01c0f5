/**
 * Leveled logger used by the builder, sample collector and CLI.
 *
 * @module logger
 * @category Logging
 */

/**
 * Log level type.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Log level priorities.
 */
const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Sink receiving formatted log lines.
 */
export type LogSink = (level: LogLevel, message: string, data?: unknown) => void;

/**
 * Logger interface accepted throughout graphseed.
 */
export interface Logger {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
}

/**
 * Configuration options for {@link createLogger}.
 */
export interface LoggerConfig {
  /** Minimum log level (default: 'info') */
  level?: LogLevel;
  /** Custom sink (default: console) */
  log?: LogSink;
  /** Prefix prepended to every message (default: '[graphseed]') */
  prefix?: string;
}

function consoleSink(level: LogLevel, message: string, data?: unknown): void {
  const args: unknown[] = data === undefined ? [message] : [message, data];
  switch (level) {
    case 'error':
      console.error(...args);
      break;
    case 'warn':
      console.warn(...args);
      break;
    default:
      console.log(...args);
  }
}

/**
 * Create a leveled logger.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'debug' });
 * logger.debug('Built factory', { entity: 'job' });
 * // => [graphseed] Built factory { entity: 'job' }
 * ```
 */
export function createLogger(config: LoggerConfig = {}): Logger {
  const threshold = LOG_LEVELS[config.level ?? 'info'];
  const sink = config.log ?? consoleSink;
  const prefix = config.prefix ?? '[graphseed]';

  const emit = (level: LogLevel) => (message: string, data?: unknown): void => {
    if (LOG_LEVELS[level] < threshold) {
      return;
    }
    sink(level, prefix ? `${prefix} ${message}` : message, data);
  };

  return {
    debug: emit('debug'),
    info: emit('info'),
    warn: emit('warn'),
    error: emit('error'),
  };
}

/**
 * Logger that discards everything. Default for generation sessions.
 */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
