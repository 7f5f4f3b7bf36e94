// Log levels enum
export enum LogLevel {
  SILLY = 0,
  TRACE = 1,
  DEBUG = 2,
  INFO = 3,
  WARN = 4,
  ERROR = 5,
  FATAL = 6,
}

// Helper function to get formatted timestamp
const getTimestamp = (): string => {
  const now = new Date();
  const year = now.getFullYear();
  const month = String(now.getMonth() + 1).padStart(2, '0');
  const day = String(now.getDate()).padStart(2, '0');
  const hours = String(now.getHours()).padStart(2, '0');
  const minutes = String(now.getMinutes()).padStart(2, '0');
  const seconds = String(now.getSeconds()).padStart(2, '0');
  const milliseconds = String(now.getMilliseconds()).padStart(3, '0');

  return `${year}-${month}-${day} ${hours}:${minutes}:${seconds}.${milliseconds}`;
};

export function parseLogLevel(raw: string | undefined): LogLevel {
  switch (raw?.trim().toLowerCase()) {
    case 'silly':
      return LogLevel.SILLY;
    case 'trace':
      return LogLevel.TRACE;
    case 'debug':
      return LogLevel.DEBUG;
    case 'info':
      return LogLevel.INFO;
    case 'warn':
    case 'warning':
      return LogLevel.WARN;
    case 'error':
      return LogLevel.ERROR;
    case 'fatal':
      return LogLevel.FATAL;
    default:
      return LogLevel.INFO; // Default to INFO level
  }
}

// Read on every call so LOG_LEVEL can be changed after import (tests, dotenv)
const shouldLog = (level: LogLevel): boolean => {
  return level >= parseLogLevel(process.env.LOG_LEVEL);
};

export type LogFn = (message: string, ...args: unknown[]) => void;

export interface Logger {
  silly: LogFn;
  trace: LogFn;
  debug: LogFn;
  info: LogFn;
  warn: LogFn;
  error: LogFn;
  fatal: LogFn;
  child(scope: string): Logger;
}

// Console-based logger with timestamps, level filtering and an optional [scope] tag
export const createLogger = (scope?: string): Logger => {
  const tag = scope ? ` [${scope}]` : '';
  const line = (label: string, message: string) =>
    `${getTimestamp()} [${label}]${tag} ${message}`;

  return {
    silly: (message, ...args) => {
      if (shouldLog(LogLevel.SILLY)) console.debug(line('SILLY', message), ...args);
    },
    trace: (message, ...args) => {
      if (shouldLog(LogLevel.TRACE)) console.debug(line('TRACE', message), ...args);
    },
    debug: (message, ...args) => {
      if (shouldLog(LogLevel.DEBUG)) console.debug(line('DEBUG', message), ...args);
    },
    info: (message, ...args) => {
      if (shouldLog(LogLevel.INFO)) console.info(line('INFO', message), ...args);
    },
    warn: (message, ...args) => {
      if (shouldLog(LogLevel.WARN)) console.warn(line('WARN', message), ...args);
    },
    error: (message, ...args) => {
      if (shouldLog(LogLevel.ERROR)) console.error(line('ERROR', message), ...args);
    },
    fatal: (message, ...args) => {
      if (shouldLog(LogLevel.FATAL)) console.error(line('FATAL', message), ...args);
    },
    child: (childScope) => createLogger(scope ? `${scope}:${childScope}` : childScope),
  };
};

// Export the root logger instance
export const log = createLogger();
