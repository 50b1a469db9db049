/**
 * Defines the available log levels.
 */
export const LogLevel = {
  ERROR: 0,
  WARN: 1,
  INFO: 2,
  DEBUG: 3,
} as const;

export type LogLevel = (typeof LogLevel)[keyof typeof LogLevel];

const LOG_LEVEL_MAP: Record<string, LogLevel> = {
  ERROR: LogLevel.ERROR,
  WARN: LogLevel.WARN,
  INFO: LogLevel.INFO,
  DEBUG: LogLevel.DEBUG,
};

function getLogLevelFromEnv(): LogLevel {
  const envLevel = process.env.LOG_LEVEL?.toUpperCase();
  return envLevel && envLevel in LOG_LEVEL_MAP ? LOG_LEVEL_MAP[envLevel] : LogLevel.INFO;
}

let currentLogLevel: LogLevel = getLogLevelFromEnv();

export function setLogLevel(level: LogLevel): void {
  currentLogLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLogLevel;
}

/**
 * Writes a line to stderr when `level` is enabled.
 * stdout is reserved for normalized text and command results.
 */
function write(level: LogLevel, label: string, message: string): void {
  if (currentLogLevel < level || process.env.VITEST_WORKER_ID) {
    return;
  }
  process.stderr.write(level === LogLevel.INFO ? `${message}\n` : `${label} ${message}\n`);
}

/**
 * Provides logging functionalities with level control.
 */
export const logger = {
  debug: (message: string) => write(LogLevel.DEBUG, "[debug]", message),
  info: (message: string) => write(LogLevel.INFO, "", message),
  warn: (message: string) => write(LogLevel.WARN, "[warn]", message),
  error: (message: string) => write(LogLevel.ERROR, "[error]", message),
};
