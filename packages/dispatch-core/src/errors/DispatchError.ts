/**
 * Dispatch error categorization and structured error types.
 *
 * Categories give each error a fixed meaning for the boundaries:
 *
 * | Category      | Raised when                                   | Retry        |
 * |---------------|-----------------------------------------------|--------------|
 * | configuration | registration or config is inconsistent        | never        |
 * | unknown_type  | no schema is registered for the type name     | never        |
 * | syntax        | the payload does not match the schema         | never        |
 * | semantic      | a well-formed message cannot be applied       | never        |
 * | internal      | a handler, precondition or commit threw       | yes (1)      |
 * | cancelled     | the caller abandoned the dispatch or timed out | yes          |
 *
 * (1) A precondition that throws a TypeError, ReferenceError, RangeError or
 * SyntaxError has a bug that a retry would hit again; that PRECONDITION_ERROR
 * is not retryable.
 */

import type { UnknownRecord } from "../types.js";

export const ErrorCategory = {
  CONFIGURATION: "configuration",
  UNKNOWN_TYPE: "unknown_type",
  SYNTAX: "syntax",
  SEMANTIC: "semantic",
  INTERNAL: "internal",
  CANCELLED: "cancelled",
} as const;

export type ErrorCategoryType = (typeof ErrorCategory)[keyof typeof ErrorCategory];

export const ERROR_CATEGORIES: readonly ErrorCategoryType[] = Object.values(ErrorCategory);

export function isErrorCategory(value: unknown): value is ErrorCategoryType {
  return ERROR_CATEGORIES.some((category) => category === value);
}

/**
 * JSON representation of a DispatchError, safe to put in logs and outcomes.
 */
export interface DispatchErrorJSON {
  name: string;
  category: ErrorCategoryType;
  code: string;
  message: string;
  retryable: boolean;
  context?: UnknownRecord;
}

/**
 * Structured error with a category, a machine-readable code and retry semantics.
 *
 * @example
 * ```typescript
 * throw new DispatchError(
 *   ErrorCategory.INTERNAL,
 *   "COMMIT_FAILED",
 *   "Unit of work commit failed",
 *   true,
 *   { messageType: "Allocate" }
 * );
 * ```
 */
export class DispatchError extends Error {
  public override name = "DispatchError";

  constructor(
    public readonly category: ErrorCategoryType,
    /** Machine-readable error code (e.g., "COMMIT_FAILED") */
    public readonly code: string,
    message: string,
    /** Whether trying the same message again may succeed */
    public readonly retryable: boolean,
    public readonly context?: UnknownRecord,
    options?: { cause?: unknown }
  ) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
  }

  /**
   * Wrap an unknown thrown value as an internal DispatchError.
   *
   * DispatchErrors pass through unchanged; the original value is kept as `cause`.
   */
  static from(error: unknown, defaultCode = "INTERNAL_ERROR"): DispatchError {
    if (error instanceof DispatchError) {
      return error;
    }

    if (error instanceof Error) {
      return new DispatchError(
        ErrorCategory.INTERNAL,
        defaultCode,
        error.message,
        true,
        { originalError: error.name },
        { cause: error }
      );
    }

    return new DispatchError(
      ErrorCategory.INTERNAL,
      defaultCode,
      String(error),
      true,
      { originalValue: error },
      { cause: error }
    );
  }

  toJSON(): DispatchErrorJSON {
    const json: DispatchErrorJSON = {
      name: this.name,
      category: this.category,
      code: this.code,
      message: this.message,
      retryable: this.retryable,
    };
    if (this.context !== undefined) {
      json.context = this.context;
    }
    return json;
  }
}

/**
 * Thrown at startup when registrations or configuration are inconsistent.
 *
 * Never produced during dispatch: a bus that built successfully cannot
 * raise it.
 */
export class ConfigurationError extends DispatchError {
  public override name = "ConfigurationError";

  constructor(code: string, message: string, context?: UnknownRecord) {
    super(ErrorCategory.CONFIGURATION, code, message, false, context);
  }
}

/**
 * Thrown when the syntax validator is asked about a type it does not know.
 *
 * The bus never throws it; it reports an `unknown_type` outcome instead.
 */
export class UnknownMessageTypeError extends DispatchError {
  public override name = "UnknownMessageTypeError";

  constructor(public readonly messageType: string) {
    super(ErrorCategory.UNKNOWN_TYPE, "UNKNOWN_MESSAGE_TYPE", `Unknown message type: ${messageType}`, false, {
      messageType,
    });
  }
}

/**
 * Factory functions for the errors the bus itself produces.
 */
export const DispatchErrors = {
  aborted(reason: unknown, context?: UnknownRecord): DispatchError {
    const message =
      reason instanceof Error ? `Dispatch aborted: ${reason.message}` : "Dispatch aborted";
    return new DispatchError(ErrorCategory.CANCELLED, "DISPATCH_ABORTED", message, true, context, {
      cause: reason,
    });
  },

  followUpDepthExceeded(messageType: string, maxDepth: number): DispatchError {
    return new DispatchError(
      ErrorCategory.INTERNAL,
      "FOLLOW_UP_DEPTH_EXCEEDED",
      `Follow-up event "${messageType}" exceeds the maximum depth of ${maxDepth}`,
      false,
      { messageType, maxDepth }
    );
  },

  commitFailed(error: unknown, context?: UnknownRecord): DispatchError {
    return new DispatchError(
      ErrorCategory.INTERNAL,
      "COMMIT_FAILED",
      error instanceof Error ? `Commit failed: ${error.message}` : "Commit failed",
      true,
      context,
      { cause: error }
    );
  },

  internal(error: unknown, code = "HANDLER_ERROR"): DispatchError {
    return DispatchError.from(error, code);
  },
} as const;

/**
 * Whether retrying the same message may succeed.
 *
 * Errors that are not DispatchErrors count as retryable.
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof DispatchError) {
    return error.retryable;
  }
  return true;
}

export function isDispatchErrorOfCategory(
  error: unknown,
  category: ErrorCategoryType
): error is DispatchError {
  return error instanceof DispatchError && error.category === category;
}
