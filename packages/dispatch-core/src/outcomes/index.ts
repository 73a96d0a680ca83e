export type {
  CompletedReport,
  SkippedReport,
  UnprocessableReport,
  FailedReport,
  HandlerReport,
  HandlerReportStatus,
  DispatchedOutcome,
  SkippedOutcome,
  RejectedOutcome,
  UnprocessableOutcome,
  FailedOutcome,
  UnknownTypeOutcome,
  Outcome,
  OutcomeStatus,
} from "./types.js";

export type { OutcomeIdentity } from "./factories.js";
export {
  unknownTypeOutcome,
  rejectedOutcome,
  failedOutcome,
  commandOutcome,
  eventOutcome,
} from "./factories.js";

export {
  isDispatched,
  isSkipped,
  isRejected,
  isUnprocessable,
  isFailed,
  isUnknownType,
  isSuccessOutcome,
  followUpsOf,
  flattenOutcomes,
} from "./guards.js";
