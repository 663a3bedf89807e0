// Log levels for structured workflow logging
export enum LogLevel {
  DEBUG = "DEBUG",
  INFO = "INFO",
  WARN = "WARN",
  ERROR = "ERROR",
  WORKFLOW = "WORKFLOW",
  AI_USAGE = "AI_USAGE",
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WORKFLOW]: 1,
  [LogLevel.AI_USAGE]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3,
};

/**
 * True when an entry at `level` passes the configured `threshold`.
 */
export function meetsThreshold(level: LogLevel, threshold: LogLevel): boolean {
  return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[threshold];
}
