/**
 * Structured console logging for the lifecycle mock.
 *
 * Filters by level and prefixes every line with its context.
 */

import { config } from './config';
import type { LogLevelName } from './config';

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

const LOG_LEVEL_NAMES: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: 'DEBUG',
  [LogLevel.INFO]: 'INFO',
  [LogLevel.WARN]: 'WARN',
  [LogLevel.ERROR]: 'ERROR',
};

const LOG_LEVEL_COLORS: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: '\x1b[36m', // Cyan
  [LogLevel.INFO]: '\x1b[32m',  // Green
  [LogLevel.WARN]: '\x1b[33m',  // Yellow
  [LogLevel.ERROR]: '\x1b[31m', // Red
};

const RESET_COLOR = '\x1b[0m';

const LEVELS_BY_NAME: Record<LogLevelName, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
};

const currentLogLevel = LEVELS_BY_NAME[config.logging.level];

/**
 * Render a log line. Exported for tests.
 */
export function formatLogLine(
  level: LogLevel,
  context: string,
  message: string,
  meta: unknown,
  timestamp: string,
  colorize: boolean
): string {
  const levelName = LOG_LEVEL_NAMES[level];
  const contextStr = context ? `[${context}]` : '';

  let line = colorize
    ? `${LOG_LEVEL_COLORS[level]}${timestamp} ${levelName.padEnd(5)}${RESET_COLOR} ${contextStr} ${message}`
    : `${timestamp} ${levelName.padEnd(5)} ${contextStr} ${message}`;

  if (meta !== undefined) {
    line += ` ${JSON.stringify(meta)}`;
  }
  return line;
}

/**
 * Logger bound to a context
 */
export class Logger {
  constructor(private context: string) {}

  debug(message: string, meta?: unknown) {
    this.log(LogLevel.DEBUG, message, meta);
  }

  info(message: string, meta?: unknown) {
    this.log(LogLevel.INFO, message, meta);
  }

  warn(message: string, meta?: unknown) {
    this.log(LogLevel.WARN, message, meta);
  }

  error(message: string, meta?: unknown) {
    this.log(LogLevel.ERROR, message, meta);
  }

  private log(level: LogLevel, message: string, meta?: unknown) {
    if (level < currentLogLevel) {
      return;
    }

    const line = formatLogLine(
      level,
      this.context,
      message,
      meta,
      new Date().toISOString(),
      config.logging.colorize
    );

    switch (level) {
      case LogLevel.DEBUG:
      case LogLevel.INFO:
        console.log(line);
        break;
      case LogLevel.WARN:
        console.warn(line);
        break;
      case LogLevel.ERROR:
        console.error(line);
        break;
    }
  }
}

export function createLogger(context: string): Logger {
  return new Logger(context);
}
