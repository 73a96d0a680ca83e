/**
 * ## Scoped Loggers
 *
 * Factory for component loggers with a scope prefix and level filtering.
 * Writes through the global console, looked up on every call so tests can
 * spy on `console.*` after the logger is created.
 *
 * @example
 * ```typescript
 * const logger = createScopedLogger("Bus:allocation", "INFO");
 *
 * logger.debug("This is suppressed");
 * logger.info("Message dispatched");   // [Bus:allocation] Message dispatched
 * ```
 */

import type { UnknownRecord } from "../types.js";
import type { Logger, LogLevel } from "./types.js";
import { DEFAULT_LOG_LEVEL, shouldLog } from "./types.js";

/**
 * Create a scoped logger with level filtering.
 *
 * Messages are prefixed with `[scope]` and structured data is appended as
 * JSON. REPORT emits a single JSON object for log aggregation.
 *
 * @param scope - Prefix for log messages (e.g., "Bus:allocation")
 * @param level - Minimum log level to emit (default: INFO)
 */
export function createScopedLogger(scope: string, level: LogLevel = DEFAULT_LOG_LEVEL): Logger {
  const prefix = `[${scope}]`;

  const formatMessage = (message: string, data?: UnknownRecord): string => {
    if (data && Object.keys(data).length > 0) {
      return `${prefix} ${message} ${JSON.stringify(data)}`;
    }
    return `${prefix} ${message}`;
  };

  return {
    debug(message: string, data?: UnknownRecord): void {
      if (shouldLog("DEBUG", level)) {
        globalThis.console.debug(formatMessage(message, data));
      }
    },

    trace(message: string, data?: UnknownRecord): void {
      if (shouldLog("TRACE", level)) {
        globalThis.console.debug(formatMessage(message, data));
      }
    },

    info(message: string, data?: UnknownRecord): void {
      if (shouldLog("INFO", level)) {
        globalThis.console.info(formatMessage(message, data));
      }
    },

    report(message: string, data?: UnknownRecord): void {
      if (shouldLog("REPORT", level)) {
        globalThis.console.log(
          JSON.stringify({
            scope,
            message,
            ...data,
            timestamp: Date.now(),
          })
        );
      }
    },

    warn(message: string, data?: UnknownRecord): void {
      if (shouldLog("WARN", level)) {
        globalThis.console.warn(formatMessage(message, data));
      }
    },

    error(message: string, data?: UnknownRecord): void {
      if (shouldLog("ERROR", level)) {
        globalThis.console.error(formatMessage(message, data));
      }
    },
  };
}

/**
 * Create a logger that discards all messages.
 *
 * For tests and hosts that log elsewhere.
 */
export function createNoOpLogger(): Logger {
  return {
    debug: () => {},
    trace: () => {},
    info: () => {},
    report: () => {},
    warn: () => {},
    error: () => {},
  };
}

/**
 * Create a child logger with the combined scope `parentScope:childScope`.
 *
 * @example
 * ```typescript
 * const handlerLogger = createChildLogger("Bus", "Allocate", "DEBUG");
 * // Logs as [Bus:Allocate]
 * ```
 */
export function createChildLogger(
  parentScope: string,
  childScope: string,
  level: LogLevel = DEFAULT_LOG_LEVEL
): Logger {
  return createScopedLogger(`${parentScope}:${childScope}`, level);
}
