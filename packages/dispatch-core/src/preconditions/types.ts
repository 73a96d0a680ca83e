import type { UnknownRecord } from "../types.js";

/**
 * Result of a single precondition check.
 *
 * - `pass`: continue with the next precondition, then the handler
 * - `skip`: the message is a harmless no-op (duplicate, stale); stop successfully
 * - `unprocessable`: the message is well-formed but cannot be applied
 */
export type PreconditionResult =
  | { status: "pass" }
  | { status: "skip"; reason: string }
  | { status: "unprocessable"; kind: string; detail: string; context?: UnknownRecord };

export type PreconditionStatus = PreconditionResult["status"];

/**
 * A named check run before a handler, inside the handler's unit of work.
 *
 * Checks read state; they never write.
 */
export interface Precondition<TMessage = unknown, TUow = unknown> {
  readonly name: string;
  check(message: TMessage, uow: TUow): PreconditionResult | Promise<PreconditionResult>;
}

/**
 * Outcome of a precondition run: pass, or the first non-pass result tagged
 * with the name of the precondition that produced it.
 */
export type PreconditionVerdict =
  | { status: "pass" }
  | { status: "skip"; reason: string; precondition: string }
  | {
      status: "unprocessable";
      kind: string;
      detail: string;
      precondition: string;
      context?: UnknownRecord;
    };
