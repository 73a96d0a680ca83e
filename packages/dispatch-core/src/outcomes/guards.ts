/**
 * Type guards for outcomes and handler reports.
 */
import type {
  DispatchedOutcome,
  FailedOutcome,
  Outcome,
  RejectedOutcome,
  SkippedOutcome,
  UnknownTypeOutcome,
  UnprocessableOutcome,
} from "./types.js";

export function isDispatched(outcome: Outcome): outcome is DispatchedOutcome {
  return outcome.status === "dispatched";
}

export function isSkipped(outcome: Outcome): outcome is SkippedOutcome {
  return outcome.status === "skipped";
}

export function isRejected(outcome: Outcome): outcome is RejectedOutcome {
  return outcome.status === "rejected";
}

export function isUnprocessable(outcome: Outcome): outcome is UnprocessableOutcome {
  return outcome.status === "unprocessable";
}

export function isFailed(outcome: Outcome): outcome is FailedOutcome {
  return outcome.status === "failed";
}

export function isUnknownType(outcome: Outcome): outcome is UnknownTypeOutcome {
  return outcome.status === "unknown_type";
}

/**
 * Dispatched and skipped outcomes are successes; everything else is an error
 * the caller must surface.
 */
export function isSuccessOutcome(
  outcome: Outcome
): outcome is DispatchedOutcome | SkippedOutcome {
  return outcome.status === "dispatched" || outcome.status === "skipped";
}

/**
 * Follow-up outcomes attached to an outcome (empty for statuses that carry none).
 */
export function followUpsOf(outcome: Outcome): readonly Outcome[] {
  return outcome.status === "dispatched" || outcome.status === "failed" ? outcome.followUps : [];
}

/**
 * Depth-first list of an outcome and all its follow-ups.
 */
export function flattenOutcomes(outcome: Outcome): Outcome[] {
  return [outcome, ...followUpsOf(outcome).flatMap(flattenOutcomes)];
}
