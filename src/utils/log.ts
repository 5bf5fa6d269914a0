/**
 * Leveled console logging. The threshold comes from LOG_LEVEL (debug, info,
 * warn, error) and defaults to info.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3
};

export function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVELS;
}

function resolveLevel(value: string | undefined): LogLevel {
  const lower = value?.toLowerCase() ?? "";
  return isLogLevel(lower) ? lower : "info";
}

let threshold = LOG_LEVELS[resolveLevel(process.env.LOG_LEVEL)];

export function setLogLevel(level: LogLevel): void {
  threshold = LOG_LEVELS[level];
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS[level] >= threshold;
}

export const log = {
  debug: (message: string): void => {
    if (shouldLog("debug")) console.debug(message);
  },

  info: (message: string): void => {
    if (shouldLog("info")) console.info(message);
  },

  success: (message: string): void => {
    if (shouldLog("info")) console.info(`✓ ${message}`);
  },

  warn: (message: string): void => {
    if (shouldLog("warn")) console.warn(`⚠ ${message}`);
  },

  error: (message: string): void => {
    if (shouldLog("error")) console.error(`✗ ${message}`);
  }
};
