import { raceAbort } from "../cancellation.js";
import { DispatchError, ErrorCategory } from "../errors/DispatchError.js";
import { UnprocessableError } from "../errors/UnprocessableError.js";
import { assertNever } from "../types.js";
import type { Precondition, PreconditionResult, PreconditionVerdict } from "./types.js";

const PROGRAMMING_ERRORS = [TypeError, ReferenceError, RangeError, SyntaxError];

function isProgrammingError(error: unknown): boolean {
  return PROGRAMMING_ERRORS.some((type) => error instanceof type);
}

export interface RunPreconditionsOptions {
  /** Stops waiting on a pending check when aborted */
  signal?: AbortSignal;
}

/**
 * Evaluate preconditions in order, stopping at the first one that does not pass.
 *
 * A check that throws `UnprocessableError` counts as an unprocessable verdict.
 * Any other throw is an internal error and propagates as a DispatchError with
 * code PRECONDITION_ERROR, retryable unless the check itself is broken.
 */
export async function runPreconditions<TMessage, TUow>(
  preconditions: ReadonlyArray<Precondition<TMessage, TUow>>,
  message: TMessage,
  uow: TUow,
  options: RunPreconditionsOptions = {}
): Promise<PreconditionVerdict> {
  for (const precondition of preconditions) {
    let result: PreconditionResult;
    try {
      const pending = precondition.check(message, uow);
      result = options.signal ? await raceAbort(pending, options.signal) : await pending;
    } catch (error) {
      if (UnprocessableError.isUnprocessable(error)) {
        return {
          status: "unprocessable",
          kind: error.kind,
          detail: error.detail,
          precondition: precondition.name,
          ...(error.context !== undefined && { context: error.context }),
        };
      }
      if (error instanceof DispatchError) {
        throw error;
      }
      throw new DispatchError(
        ErrorCategory.INTERNAL,
        "PRECONDITION_ERROR",
        `Precondition "${precondition.name}" threw: ${error instanceof Error ? error.message : String(error)}`,
        !isProgrammingError(error),
        { precondition: precondition.name },
        { cause: error }
      );
    }

    switch (result.status) {
      case "pass":
        continue;
      case "skip":
        return { status: "skip", reason: result.reason, precondition: precondition.name };
      case "unprocessable":
        return {
          status: "unprocessable",
          kind: result.kind,
          detail: result.detail,
          precondition: precondition.name,
          ...(result.context !== undefined && { context: result.context }),
        };
      default:
        return assertNever(result);
    }
  }

  return { status: "pass" };
}
