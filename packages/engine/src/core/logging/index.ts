/**
 * Logging
 *
 * Structured JSON logger. Every line carries the level and a context
 * identifier; warnings and errors are also forwarded to the observability
 * provider.
 */

import type { Logger, LogLevel } from "@arbor/contracts";
import { LOG_LEVELS } from "@arbor/contracts";
import { captureMessage } from "../observability/index.js";

function enabled(threshold: LogLevel, level: LogLevel): boolean {
  return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(threshold);
}

/**
 * Creates a structured logger.
 * Prefixes all messages with a context identifier and drops messages
 * below `level`.
 */
export function createLogger(context: string, level: LogLevel = "info"): Logger {
  return {
    info(message, data) {
      if (!enabled(level, "info")) return;
      console.log(
        JSON.stringify({ level: "info", context, message, ...data })
      );
    },
    warn(message, data) {
      if (!enabled(level, "warn")) return;
      console.warn(
        JSON.stringify({ level: "warn", context, message, ...data })
      );
      captureMessage(`[${context}] ${message}`, "warning", data);
    },
    error(message, data) {
      console.error(
        JSON.stringify({ level: "error", context, message, ...data })
      );
      captureMessage(`[${context}] ${message}`, "error", data);
    },
    debug(message, data) {
      if (!enabled(level, "debug")) return;
      console.debug(
        JSON.stringify({ level: "debug", context, message, ...data })
      );
    },
  };
}

/**
 * Logs the outcome of one engine operation with its duration.
 */
export function logOperation(
  logger: Logger,
  operation: string,
  durationMs: number,
  success: boolean,
  error?: string
): void {
  const entry = {
    event: "operation.executed",
    operation,
    durationMs,
    success,
    ...(error ? { error } : {}),
  };

  if (success) {
    logger.debug("Operation completed", entry);
  } else {
    logger.info("Operation failed", entry);
  }
}
