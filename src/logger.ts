// CHANGE: Structured console logger with DEBUG/INFO/WARN/SUCCESS/ERROR levels.
// WHY: Log lines are the only user-visible report of a run.

import chalk from "chalk";

export type LogLevel = "debug" | "info" | "warn" | "error";

const levelWeight: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.prototype.hasOwnProperty.call(levelWeight, value);
}

const envLevel = process.env.MIRROR_LOG_LEVEL?.toLowerCase();
let activeLevel: LogLevel = isLogLevel(envLevel) ? envLevel : "info";

const formatters = {
  debug: (message: string) => chalk.gray(`[DEBUG] ${message}`),
  info: (message: string) => chalk.blue(`[INFO] ${message}`),
  warn: (message: string) => chalk.yellow(`[WARN] ${message}`),
  success: (message: string) => chalk.green(`[SUCCESS] ${message}`),
  error: (message: string) => chalk.red(`[ERROR] ${message}`)
} as const;

function shouldLog(level: LogLevel): boolean {
  return levelWeight[level] >= levelWeight[activeLevel];
}

/**
 * Change the threshold below which lines are dropped.
 *
 * @param level - One of `debug`, `info`, `warn` or `error`.
 * @throws Error if level is not recognised.
 */
export function setLogLevel(level: string): void {
  if (!isLogLevel(level)) {
    throw new Error(`Unsupported log level: ${level}`);
  }
  activeLevel = level;
}

export function getLogLevel(): LogLevel {
  return activeLevel;
}

/**
 * Emit a progress line for a pipeline stage.
 *
 * @param message - Summary shown to the operator.
 */
export function info(message: string): void {
  if (shouldLog("info")) {
    console.log(formatters.info(message));
  }
}

/**
 * Emit request and storage detail, shown only at the `debug` threshold.
 *
 * @param message - Diagnostic detail.
 */
export function debug(message: string): void {
  if (shouldLog("debug")) {
    console.log(formatters.debug(message));
  }
}

/**
 * Emit warning for degraded but recoverable situations (retries, skipped entries).
 */
export function warn(message: string): void {
  if (shouldLog("warn")) {
    console.error(formatters.warn(message));
  }
}

/**
 * Emit completion message. Shares the info threshold.
 */
export function success(message: string): void {
  if (shouldLog("info")) {
    console.log(formatters.success(message));
  }
}

/**
 * Emit error-level log entry.
 */
export function error(message: string): void {
  if (shouldLog("error")) {
    console.error(formatters.error(message));
  }
}

/**
 * Render a caught value for log output without assuming its shape.
 */
export function describeError(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.message;
  }
  return String(cause);
}
