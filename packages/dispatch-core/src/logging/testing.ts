/**
 * Testing utilities for logging.
 *
 * A mock logger records every call so tests can assert on what the bus and
 * the boundaries logged, at which level, with which data.
 *
 * @example
 * ```typescript
 * const logger = createMockLogger();
 * const bus = createMessageBusBuilder({ unitOfWork, logger })...build();
 *
 * await bus.dispatch("Allocate", { orderid: "o1", sku: "LAMP", qty: 1 });
 *
 * expect(logger.hasLoggedAt("INFO", "Message dispatched")).toBe(true);
 * ```
 */

import type { Logger, LogLevel } from "./types.js";
import { shouldLog } from "./types.js";
import type { UnknownRecord } from "../types.js";

/**
 * A single captured log call.
 */
export interface LogCall {
  level: LogLevel;
  message: string;
  data: UnknownRecord | undefined;
  timestamp: number;
}

export interface MockLogger extends Logger {
  /** All captured log calls, oldest first */
  readonly calls: ReadonlyArray<LogCall>;

  clear(): void;

  getCallsAtLevel(level: LogLevel): ReadonlyArray<LogCall>;

  /** Partial match on the message, any level */
  hasLoggedMessage(message: string): boolean;

  /** Partial match on the message at one level */
  hasLoggedAt(level: LogLevel, message: string): boolean;

  getLastCallAt(level: LogLevel): LogCall | undefined;
}

/**
 * Create a mock logger, optionally dropping calls below `minLevel`.
 *
 * The `calls` array is unbounded; call `clear()` between cases in long suites.
 */
export function createMockLogger(minLevel: LogLevel = "DEBUG"): MockLogger {
  const calls: LogCall[] = [];

  const capture =
    (level: LogLevel) =>
    (message: string, data?: UnknownRecord): void => {
      if (!shouldLog(level, minLevel)) {
        return;
      }
      calls.push({ level, message, data, timestamp: Date.now() });
    };

  const atLevel = (level: LogLevel): LogCall[] => calls.filter((call) => call.level === level);

  return {
    get calls(): ReadonlyArray<LogCall> {
      return calls;
    },

    clear(): void {
      calls.length = 0;
    },

    getCallsAtLevel: atLevel,

    hasLoggedMessage(message: string): boolean {
      return calls.some((call) => call.message.includes(message));
    },

    hasLoggedAt(level: LogLevel, message: string): boolean {
      return atLevel(level).some((call) => call.message.includes(message));
    },

    getLastCallAt(level: LogLevel): LogCall | undefined {
      return atLevel(level).at(-1);
    },

    debug: capture("DEBUG"),
    trace: capture("TRACE"),
    info: capture("INFO"),
    report: capture("REPORT"),
    warn: capture("WARN"),
    error: capture("ERROR"),
  };
}

/**
 * Mock logger that only captures calls at or above `minLevel`.
 */
export function createFilteredMockLogger(minLevel: LogLevel): MockLogger {
  return createMockLogger(minLevel);
}
