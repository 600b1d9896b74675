/**
 * Logger that records calls, for assertions in tests.
 *
 * @example
 * ```typescript
 * const logger = createMockLogger();
 * const executor = new TransitionExecutor({ logger });
 * executor.execute(transition, active);
 * expect(logger.hasLoggedAt('WARN', 'failed')).toBe(true);
 * ```
 */

import type { LogData, Logger, LogLevel } from './logger.js';

export interface LogCall {
  level: Exclude<LogLevel, 'SILENT'>;
  message: string;
  data: LogData | undefined;
}

export interface MockLogger extends Logger {
  readonly calls: ReadonlyArray<LogCall>;
  clear(): void;
  getCallsAtLevel(level: LogCall['level']): ReadonlyArray<LogCall>;
  /** Partial match on the message. */
  hasLoggedAt(level: LogCall['level'], message: string): boolean;
}

export function createMockLogger(): MockLogger {
  const calls: LogCall[] = [];

  const record =
    (level: LogCall['level']) =>
    (message: string, data?: LogData): void => {
      calls.push({ level, message, data });
    };

  return {
    get calls(): ReadonlyArray<LogCall> {
      return calls;
    },
    clear(): void {
      calls.length = 0;
    },
    getCallsAtLevel(level: LogCall['level']): ReadonlyArray<LogCall> {
      return calls.filter((call) => call.level === level);
    },
    hasLoggedAt(level: LogCall['level'], message: string): boolean {
      return calls.some((call) => call.level === level && call.message.includes(message));
    },
    debug: record('DEBUG'),
    info: record('INFO'),
    warn: record('WARN'),
    error: record('ERROR'),
  };
}
