/**
 * Scoped, level-filtered logging.
 *
 * Library code takes a `Logger` and defaults to the no-op logger, so nothing
 * is printed unless the caller asks for it.
 *
 * @example
 * ```typescript
 * const logger = createScopedLogger('executor', 'DEBUG');
 * logger.debug('Phase completed', { phase: 'VALIDATE' });
 * // [executor] Phase completed {"phase":"VALIDATE"}
 * ```
 */

import chalk from 'chalk';

export const LOG_LEVELS = ['DEBUG', 'INFO', 'WARN', 'ERROR', 'SILENT'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  DEBUG: 0,
  INFO: 1,
  WARN: 2,
  ERROR: 3,
  SILENT: 4,
};

export const DEFAULT_LOG_LEVEL: LogLevel = 'WARN';

export type LogData = Record<string, unknown>;

export interface Logger {
  debug(message: string, data?: LogData): void;
  info(message: string, data?: LogData): void;
  warn(message: string, data?: LogData): void;
  error(message: string, data?: LogData): void;
}

/**
 * True if a message at `messageLevel` passes a logger set to `configuredLevel`.
 */
export function shouldLog(messageLevel: LogLevel, configuredLevel: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[messageLevel] >= LOG_LEVEL_PRIORITY[configuredLevel];
}

/**
 * Render a log line without color.
 */
export function formatLogLine(scope: string, message: string, data?: LogData): string {
  const prefix = `[${scope}]`;
  if (data && Object.keys(data).length > 0) {
    return `${prefix} ${message} ${JSON.stringify(data)}`;
  }
  return `${prefix} ${message}`;
}

const LEVEL_COLOR: Record<Exclude<LogLevel, 'SILENT'>, (text: string) => string> = {
  DEBUG: chalk.gray,
  INFO: chalk.cyan,
  WARN: chalk.yellow,
  ERROR: chalk.red,
};

/**
 * Create a logger that prefixes messages with `[scope]` and writes to stderr.
 */
export function createScopedLogger(scope: string, level: LogLevel = DEFAULT_LOG_LEVEL): Logger {
  const emit =
    (messageLevel: Exclude<LogLevel, 'SILENT'>) =>
    (message: string, data?: LogData): void => {
      if (!shouldLog(messageLevel, level)) return;
      console.error(LEVEL_COLOR[messageLevel](formatLogLine(scope, message, data)));
    };

  return {
    debug: emit('DEBUG'),
    info: emit('INFO'),
    warn: emit('WARN'),
    error: emit('ERROR'),
  };
}

/**
 * Logger that discards everything.
 */
export function createNoOpLogger(): Logger {
  return {
    debug: () => {},
    info: () => {},
    warn: () => {},
    error: () => {},
  };
}
