/**
 * Dispatch Outcome Types
 *
 * Every `dispatch()` call resolves to exactly one Outcome. Boundaries map
 * the `status` discriminant to their own representation.
 *
 * | Status          | Meaning                                                    |
 * |-----------------|------------------------------------------------------------|
 * | `dispatched`    | handlers ran and the unit of work committed                |
 * | `skipped`       | a precondition judged the message a harmless no-op         |
 * | `rejected`      | the payload failed syntax validation                       |
 * | `unprocessable` | well-formed, but cannot be applied to the current state    |
 * | `failed`        | an unexpected error, a failed commit, or an abort          |
 * | `unknown_type`  | no schema is registered for the type name                  |
 */
import type { DispatchError } from "../errors/DispatchError.js";
import type { CorrelationId, MessageId } from "../ids/branded.js";
import type { FieldError, MessageKind } from "../messages/types.js";
import type { UnknownRecord } from "../types.js";

// ============================================================================
// Handler Reports
// ============================================================================

export interface CompletedReport {
  handler: string;
  status: "completed";
  result: unknown;
}

export interface SkippedReport {
  handler: string;
  status: "skipped";
  reason: string;
  precondition: string;
}

export interface UnprocessableReport {
  handler: string;
  status: "unprocessable";
  kind: string;
  detail: string;
  /** Absent when the handler itself threw UnprocessableError */
  precondition?: string;
  context?: UnknownRecord;
}

export interface FailedReport {
  handler: string;
  status: "failed";
  error: DispatchError;
}

/**
 * What happened in one handler's scope: its preconditions, its invocation
 * and the commit.
 */
export type HandlerReport = CompletedReport | SkippedReport | UnprocessableReport | FailedReport;

export type HandlerReportStatus = HandlerReport["status"];

// ============================================================================
// Outcomes
// ============================================================================

interface IdentifiedOutcome {
  messageType: string;
  messageKind: MessageKind;
  messageId: MessageId;
  correlationId: CorrelationId;
}

export interface DispatchedOutcome extends IdentifiedOutcome {
  status: "dispatched";
  /** Command: the handler's return value. Event: completed results in order. */
  result: unknown;
  handlers: HandlerReport[];
  /** Outcomes of events raised during this dispatch, breadth-first */
  followUps: Outcome[];
}

export interface SkippedOutcome extends IdentifiedOutcome {
  status: "skipped";
  reason: string;
  precondition: string;
  handlers: HandlerReport[];
}

export interface RejectedOutcome {
  status: "rejected";
  messageType: string;
  /** Absent when the envelope itself was malformed */
  messageKind?: MessageKind;
  fieldErrors: FieldError[];
}

export interface UnprocessableOutcome extends IdentifiedOutcome {
  status: "unprocessable";
  kind: string;
  detail: string;
  precondition?: string;
  context?: UnknownRecord;
  handlers: HandlerReport[];
}

export interface FailedOutcome {
  status: "failed";
  messageType: string;
  /** Absent when the failure happened before the type was resolved */
  messageKind?: MessageKind;
  messageId: MessageId;
  correlationId: CorrelationId;
  error: DispatchError;
  handlers: HandlerReport[];
  /** Events raised by event handler scopes that did commit */
  followUps: Outcome[];
}

export interface UnknownTypeOutcome {
  status: "unknown_type";
  messageType: string;
}

export type Outcome =
  | DispatchedOutcome
  | SkippedOutcome
  | RejectedOutcome
  | UnprocessableOutcome
  | FailedOutcome
  | UnknownTypeOutcome;

export type OutcomeStatus = Outcome["status"];
