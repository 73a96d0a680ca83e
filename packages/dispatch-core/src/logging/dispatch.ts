/**
 * Dispatch logging helpers.
 *
 * Every line the bus writes about a message goes through one of these, so
 * the data keys (`messageType`, `messageId`, `correlationId`) are the same
 * across stages and can be queried in aggregation.
 *
 * | Helper             | Level |
 * |--------------------|-------|
 * | logDispatchStart   | DEBUG |
 * | logDispatched      | INFO  |
 * | logSkipped         | WARN  |
 * | logRejected        | WARN  |
 * | logUnprocessable   | ERROR |
 * | logFailed          | ERROR |
 * | logUnknownType     | ERROR |
 */
import { DispatchError } from "../errors/DispatchError.js";
import type { FieldError } from "../messages/types.js";
import type { HandlerReport } from "../outcomes/types.js";
import type { UnknownRecord } from "../types.js";
import type { Logger } from "./types.js";

/**
 * Base context for dispatch logging. Callers may add keys.
 */
export type DispatchLogContext = {
  messageType: string;
  messageId?: string;
  correlationId?: string;
  [key: string]: unknown;
};

/**
 * Serialize an error for log data, following `cause` chains.
 */
export function describeError(error: unknown): UnknownRecord {
  if (!(error instanceof Error)) {
    return { message: String(error) };
  }

  const described: UnknownRecord = {
    name: error.name,
    message: error.message,
  };
  if (error instanceof DispatchError) {
    described["code"] = error.code;
    described["category"] = error.category;
    described["retryable"] = error.retryable;
    if (error.context !== undefined) {
      described["context"] = error.context;
    }
  }
  if (error.stack !== undefined) {
    described["stack"] = error.stack;
  }
  if (error.cause !== undefined) {
    described["cause"] = describeError(error.cause);
  }
  return described;
}

function summarizeReports(reports: readonly HandlerReport[]): UnknownRecord[] {
  return reports.map((report) =>
    report.status === "failed"
      ? { handler: report.handler, status: report.status, error: describeError(report.error) }
      : { handler: report.handler, status: report.status }
  );
}

export function logDispatchStart(logger: Logger, context: DispatchLogContext): void {
  logger.debug("Dispatch started", context);
}

export function logDispatched(
  logger: Logger,
  context: DispatchLogContext,
  handlers: readonly HandlerReport[]
): void {
  logger.info("Message dispatched", {
    ...context,
    handlers: handlers.map((report) => report.handler),
  });
}

/**
 * A skip is a successful no-op, logged so duplicates stay visible.
 */
export function logSkipped(
  logger: Logger,
  context: DispatchLogContext,
  skip: { reason: string; precondition: string }
): void {
  logger.warn("Message skipped", { ...context, reason: skip.reason, precondition: skip.precondition });
}

export function logRejected(
  logger: Logger,
  context: DispatchLogContext,
  fieldErrors: readonly FieldError[]
): void {
  logger.warn("Message rejected", { ...context, fieldErrors });
}

export function logUnprocessable(
  logger: Logger,
  context: DispatchLogContext,
  failure: { kind: string; detail: string; precondition?: string }
): void {
  logger.error("Message unprocessable", {
    ...context,
    kind: failure.kind,
    detail: failure.detail,
    ...(failure.precondition !== undefined && { precondition: failure.precondition }),
  });
}

/**
 * Unexpected failure. Logs the full error, including stack and cause.
 */
export function logFailed(
  logger: Logger,
  context: DispatchLogContext,
  error: unknown,
  handlers: readonly HandlerReport[] = []
): void {
  logger.error("Message failed", {
    ...context,
    error: describeError(error),
    ...(handlers.length > 0 && { handlers: summarizeReports(handlers) }),
  });
}

export function logUnknownType(logger: Logger, context: DispatchLogContext): void {
  logger.error("Unknown message type", context);
}
