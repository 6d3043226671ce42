/**
 * Minimal levelled logger used across the CLI and the repodata layer.
 * Messages go to the console; the threshold is set once at startup.
 */

export enum LogLevel {
  ERROR = 0,
  WARN = 1,
  INFO = 2,
  DEBUG = 3,
}

function levelFromEnv(value: string | undefined): LogLevel {
  switch (value?.toUpperCase()) {
    case "ERROR":
      return LogLevel.ERROR;
    case "WARN":
      return LogLevel.WARN;
    case "DEBUG":
      return LogLevel.DEBUG;
    default:
      return LogLevel.INFO;
  }
}

let currentLogLevel: LogLevel = levelFromEnv(process.env.LOG_LEVEL);

/**
 * Sets the maximum level that will be written.
 */
export function setLogLevel(level: LogLevel): void {
  currentLogLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLogLevel;
}

export const logger = {
  debug: (message: string): void => {
    if (currentLogLevel >= LogLevel.DEBUG) {
      console.debug(message);
    }
  },
  info: (message: string): void => {
    if (currentLogLevel >= LogLevel.INFO) {
      console.log(message);
    }
  },
  warn: (message: string): void => {
    if (currentLogLevel >= LogLevel.WARN) {
      console.warn(message);
    }
  },
  error: (message: string): void => {
    if (currentLogLevel >= LogLevel.ERROR) {
      console.error(message);
    }
  },
};
