/**
 * @module logger
 * Leveled, scoped logging.
 *
 * Every level writes to stderr: on the stdio transport stdout carries the
 * protocol stream and must stay clean.
 */

import type { LogContext, LogLevel, Logger } from '@draftcast/types';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

let currentLevel: LogLevel = 'info';

/** Set the minimum level emitted by every logger. */
export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

/** Current minimum level. */
export function getLogLevel(): LogLevel {
  return currentLevel;
}

/** Create a logger whose lines are tagged with `scope`. */
export function createLogger(scope: string): Logger {
  const log = (level: LogLevel, message: string, context?: LogContext): void => {
    if (LOG_LEVELS[level] < LOG_LEVELS[currentLevel]) return;

    const timestamp = new Date().toISOString();
    const line = `[${timestamp}] [${level.toUpperCase()}] [${scope}] ${message}`;

    if (context && Object.keys(context).length > 0) {
      console.error(line, context);
    } else {
      console.error(line);
    }
  };

  return {
    debug: (message, context) => log('debug', message, context),
    info: (message, context) => log('info', message, context),
    warn: (message, context) => log('warn', message, context),
    error: (message, context) => log('error', message, context),
  };
}
