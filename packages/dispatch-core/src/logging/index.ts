/**
 * Logging Module
 *
 * Configurable logging with a 6-level hierarchy. Provides scoped loggers for
 * the bus and the boundaries, plus dispatch helpers with fixed data keys.
 *
 * @example
 * ```typescript
 * import { createScopedLogger, createNoOpLogger, type LogLevel } from "@gatehouse/dispatch-core";
 *
 * const LOG_LEVEL: LogLevel = "INFO";
 *
 * const busLogger = createScopedLogger("Bus:allocation", LOG_LEVEL);
 * const consumerLogger = createScopedLogger("Consumer:allocation", LOG_LEVEL);
 *
 * // Use no-op logger for testing or when logging is disabled
 * const silentLogger = createNoOpLogger();
 * ```
 */

// Types
export type { Logger, LogLevel } from "./types.js";
export { LOG_LEVEL_PRIORITY, LOG_LEVELS, DEFAULT_LOG_LEVEL, shouldLog, isLogLevel } from "./types.js";

// Factories
export {
  createScopedLogger,
  createNoOpLogger,
  createChildLogger,
} from "./scoped.js";

// Testing utilities
export type { LogCall, MockLogger } from "./testing.js";
export { createMockLogger, createFilteredMockLogger } from "./testing.js";

// Dispatch logging helpers
export type { DispatchLogContext } from "./dispatch.js";
export {
  describeError,
  logDispatchStart,
  logDispatched,
  logSkipped,
  logRejected,
  logUnprocessable,
  logFailed,
  logUnknownType,
} from "./dispatch.js";
