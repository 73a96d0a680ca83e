/**
 * Logging Types
 *
 * The dispatcher logs through this interface so hosts can plug in any sink.
 * Levels, most to least verbose:
 * - DEBUG: stage transitions inside a dispatch
 * - TRACE: handler timings
 * - INFO: message dispatched
 * - REPORT: aggregated summaries (JSON)
 * - WARN: skipped and rejected messages
 * - ERROR: unprocessable, failed and unknown messages
 */

import type { UnknownRecord } from "../types.js";

export type LogLevel = "DEBUG" | "TRACE" | "INFO" | "REPORT" | "WARN" | "ERROR";

/**
 * Priority mapping for log levels (lower = more verbose).
 */
export const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  DEBUG: 0,
  TRACE: 1,
  INFO: 2,
  REPORT: 3,
  WARN: 4,
  ERROR: 5,
};

export const LOG_LEVELS = ["DEBUG", "TRACE", "INFO", "REPORT", "WARN", "ERROR"] as const;

export const DEFAULT_LOG_LEVEL: LogLevel = "INFO";

/**
 * Logger used by the message bus, the boundaries and the example domain.
 *
 * Each method takes a short message and optional structured data.
 *
 * @example
 * ```typescript
 * const logger = createScopedLogger("Bus:allocation", "DEBUG");
 *
 * logger.info("Message dispatched", { messageType: "Allocate", messageId });
 * logger.warn("Message skipped", { reason: "Batch b1 already exists" });
 * ```
 */
export interface Logger {
  debug(message: string, data?: UnknownRecord): void;
  trace(message: string, data?: UnknownRecord): void;
  info(message: string, data?: UnknownRecord): void;
  report(message: string, data?: UnknownRecord): void;
  warn(message: string, data?: UnknownRecord): void;
  error(message: string, data?: UnknownRecord): void;
}

/**
 * Check if a message at the given level should be logged.
 *
 * @example
 * ```typescript
 * shouldLog("DEBUG", "INFO"); // false
 * shouldLog("WARN", "INFO");  // true
 * ```
 */
export function shouldLog(messageLevel: LogLevel, configuredLevel: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[messageLevel] >= LOG_LEVEL_PRIORITY[configuredLevel];
}

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}
