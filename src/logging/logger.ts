/**
 * Process-wide logger.
 *
 * Every line carries the caller's `file:line` and goes to the console method
 * of the same level. Messages below the configured threshold are dropped.
 */

import type { IOLogger } from "../shared/io/types";

import type { LogLevel } from "./loggerUtils";
import { formatMessage, getCallerFileLine, isLevelEnabled } from "./loggerUtils";

let threshold: LogLevel = "info";

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function getLogLevel(): LogLevel {
  return threshold;
}

/**
 * Core logging routine. Callers reach it through exactly one wrapper frame,
 * which getCallerFileLine skips.
 */
function logMessage(level: LogLevel, message: unknown): void {
  if (!isLevelEnabled(level, threshold)) return;

  const formatted = formatMessage(message);
  const fileLine = getCallerFileLine();
  const text = `${new Date().toISOString()} ${level.toUpperCase()} ${fileLine} - ${formatted}`;

  switch (level) {
    case "error":
      console.error(text);
      break;
    case "warn":
      console.warn(text);
      break;
    case "debug":
      console.debug(text);
      break;
    default:
      console.info(text);
  }
}

/**
 * Logger with convenience methods for all log levels.
 */
export const log = {
  info(msg: unknown): void {
    logMessage("info", msg);
  },
  debug(msg: unknown): void {
    logMessage("debug", msg);
  },
  warn(msg: unknown): void {
    logMessage("warn", msg);
  },
  error(msg: unknown): void {
    logMessage("error", msg);
  }
};

/**
 * Logger for a store or service, prefixing each message with `[prefix]`.
 */
export function createScopedLogger(prefix: string): IOLogger {
  return {
    debug: (msg: string) => logMessage("debug", `[${prefix}] ${msg}`),
    info: (msg: string) => logMessage("info", `[${prefix}] ${msg}`),
    warn: (msg: string) => logMessage("warn", `[${prefix}] ${msg}`),
    error: (msg: string) => logMessage("error", `[${prefix}] ${msg}`),
  };
}
