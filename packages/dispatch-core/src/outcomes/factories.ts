/**
 * Outcome factories.
 *
 * The bus builds every outcome through these, so the shape of each status
 * is decided in one place.
 */
import { DispatchError, ErrorCategory } from "../errors/DispatchError.js";
import type { CorrelationId, MessageId } from "../ids/branded.js";
import type { FieldError, MessageKind } from "../messages/types.js";
import { assertNever } from "../types.js";
import type {
  DispatchedOutcome,
  FailedOutcome,
  HandlerReport,
  Outcome,
  RejectedOutcome,
  SkippedOutcome,
  UnknownTypeOutcome,
  UnprocessableOutcome,
} from "./types.js";

/**
 * Identity of the message an outcome describes.
 */
export interface OutcomeIdentity {
  messageType: string;
  messageKind: MessageKind;
  messageId: MessageId;
  correlationId: CorrelationId;
}

export function unknownTypeOutcome(messageType: string): UnknownTypeOutcome {
  return { status: "unknown_type", messageType };
}

export function rejectedOutcome(
  messageType: string,
  messageKind: MessageKind | undefined,
  fieldErrors: FieldError[]
): RejectedOutcome {
  return {
    status: "rejected",
    messageType,
    ...(messageKind !== undefined && { messageKind }),
    fieldErrors,
  };
}

export function failedOutcome(
  identity: Omit<OutcomeIdentity, "messageKind"> & { messageKind?: MessageKind },
  error: DispatchError,
  handlers: HandlerReport[] = []
): FailedOutcome {
  const { messageType, messageId, correlationId, messageKind } = identity;
  return {
    status: "failed",
    messageType,
    ...(messageKind !== undefined && { messageKind }),
    messageId,
    correlationId,
    error,
    handlers,
    followUps: [],
  };
}

/**
 * Outcome of a command, from the report of its single handler scope.
 */
export function commandOutcome(identity: OutcomeIdentity, report: HandlerReport): Outcome {
  const handlers = [report];
  switch (report.status) {
    case "completed":
      return { status: "dispatched", ...identity, result: report.result, handlers, followUps: [] };
    case "skipped":
      return {
        status: "skipped",
        ...identity,
        reason: report.reason,
        precondition: report.precondition,
        handlers,
      };
    case "unprocessable":
      return unprocessableOutcome(identity, report, handlers);
    case "failed":
      return failedOutcome(identity, report.error, handlers);
    default:
      return assertNever(report);
  }
}

function unprocessableOutcome(
  identity: OutcomeIdentity,
  report: Extract<HandlerReport, { status: "unprocessable" }>,
  handlers: HandlerReport[]
): UnprocessableOutcome {
  return {
    status: "unprocessable",
    ...identity,
    kind: report.kind,
    detail: report.detail,
    ...(report.precondition !== undefined && { precondition: report.precondition }),
    ...(report.context !== undefined && { context: report.context }),
    handlers,
  };
}

/**
 * Aggregate the reports of an event's handler scopes.
 *
 * - no handlers: dispatched, empty result list
 * - any handler failed or unprocessable: failed, carrying every report;
 *   the abort error when the dispatch was cancelled
 * - every handler skipped: skipped, with the first reason
 * - otherwise: dispatched, `result` is the completed results in order
 */
export function eventOutcome(
  identity: OutcomeIdentity,
  reports: HandlerReport[]
): DispatchedOutcome | SkippedOutcome | FailedOutcome {
  const broken = reports.filter(
    (report) => report.status === "failed" || report.status === "unprocessable"
  );

  if (broken.length > 0) {
    const cancelled = broken.find(
      (report) => report.status === "failed" && report.error.category === ErrorCategory.CANCELLED
    );
    if (cancelled?.status === "failed") {
      return failedOutcome(identity, cancelled.error, reports);
    }

    const retryable = broken.some(
      (report) => report.status === "failed" && report.error.retryable
    );
    const names = broken.map((report) => report.handler);
    const error = new DispatchError(
      ErrorCategory.INTERNAL,
      "EVENT_HANDLER_FAILED",
      `${broken.length} of ${reports.length} handlers failed for event "${identity.messageType}": ${names.join(", ")}`,
      retryable,
      { messageType: identity.messageType, failedHandlers: names }
    );
    return failedOutcome(identity, error, reports);
  }

  const [first] = reports;
  if (first?.status === "skipped" && reports.every((report) => report.status === "skipped")) {
    return {
      status: "skipped",
      ...identity,
      reason: first.reason,
      precondition: first.precondition,
      handlers: reports,
    };
  }

  const result: unknown[] = [];
  for (const report of reports) {
    if (report.status === "completed") {
      result.push(report.result);
    }
  }
  return { status: "dispatched", ...identity, result, handlers: reports, followUps: [] };
}
