import { DispatchError, ErrorCategory } from "./DispatchError.js";
import type { UnknownRecord } from "../types.js";

/**
 * Kinds the HTTP boundary maps to specific statuses out of the box.
 * Domains may use any other string.
 */
export const UnprocessableKinds = {
  NOT_FOUND: "not_found",
  CONFLICT: "conflict",
  INVALID_STATE: "invalid_state",
} as const;

/**
 * Semantic failure discovered while handling a well-formed message.
 *
 * Preconditions report semantic failures as data; domain code that only
 * finds out mid-handler throws this instead. The bus turns it into an
 * `unprocessable` outcome and rolls the unit of work back.
 *
 * @example
 * ```typescript
 * throw new UnprocessableError("invalid_state", `Batch ${ref} is already shipped`, { ref });
 * ```
 */
export class UnprocessableError<TKind extends string = string> extends DispatchError {
  public override name = "UnprocessableError";

  constructor(
    public readonly kind: TKind,
    detail: string,
    context?: UnknownRecord
  ) {
    super(ErrorCategory.SEMANTIC, "UNPROCESSABLE", detail, false, context);
  }

  get detail(): string {
    return this.message;
  }

  static isUnprocessable(error: unknown): error is UnprocessableError {
    return error instanceof UnprocessableError;
  }

  static hasKind<T extends string>(error: unknown, kind: T): error is UnprocessableError<T> {
    return UnprocessableError.isUnprocessable(error) && error.kind === kind;
  }
}
