/**
 * Unit tests for the error classes and factories.
 */
import { describe, it, expect } from "vitest";
import {
  ConfigurationError,
  DispatchError,
  DispatchErrors,
  ErrorCategory,
  UnknownMessageTypeError,
  UnprocessableError,
  UnprocessableKinds,
  isDispatchErrorOfCategory,
  isErrorCategory,
  isRetryableError,
} from "../../../src/index.js";

describe("DispatchError.from", () => {
  it("passes DispatchErrors through unchanged", () => {
    const original = new ConfigurationError("BROKEN", "broken");

    expect(DispatchError.from(original)).toBe(original);
  });

  it("wraps an Error as a retryable internal error", () => {
    const original = new TypeError("x is not a function");

    const error = DispatchError.from(original, "HANDLER_ERROR");

    expect(error).toMatchObject({
      category: "internal",
      code: "HANDLER_ERROR",
      message: "x is not a function",
      retryable: true,
      context: { originalError: "TypeError" },
    });
    expect(error.cause).toBe(original);
  });

  it("wraps a thrown non-error value", () => {
    const error = DispatchError.from("boom");

    expect(error).toMatchObject({
      code: "INTERNAL_ERROR",
      message: "boom",
      context: { originalValue: "boom" },
    });
  });
});

describe("DispatchError.toJSON", () => {
  it("omits an absent context", () => {
    expect(new ConfigurationError("BROKEN", "broken").toJSON()).toEqual({
      name: "ConfigurationError",
      category: "configuration",
      code: "BROKEN",
      message: "broken",
      retryable: false,
    });
  });

  it("includes the context when present", () => {
    expect(new UnknownMessageTypeError("Nope").toJSON()).toEqual({
      name: "UnknownMessageTypeError",
      category: "unknown_type",
      code: "UNKNOWN_MESSAGE_TYPE",
      message: "Unknown message type: Nope",
      retryable: false,
      context: { messageType: "Nope" },
    });
  });
});

describe("UnprocessableError", () => {
  const error = new UnprocessableError(UnprocessableKinds.CONFLICT, "Batch b1 is taken", {
    ref: "b1",
  });

  it("is a non-retryable semantic error", () => {
    expect(error).toMatchObject({
      category: "semantic",
      code: "UNPROCESSABLE",
      retryable: false,
      kind: "conflict",
      detail: "Batch b1 is taken",
      context: { ref: "b1" },
    });
  });

  it("narrows by kind", () => {
    expect(UnprocessableError.hasKind(error, "conflict")).toBe(true);
    expect(UnprocessableError.hasKind(error, "not_found")).toBe(false);
    expect(UnprocessableError.isUnprocessable(new Error("x"))).toBe(false);
  });
});

describe("DispatchErrors", () => {
  it("describes an abort by its reason", () => {
    expect(DispatchErrors.aborted(new Error("client went away"))).toMatchObject({
      category: "cancelled",
      code: "DISPATCH_ABORTED",
      message: "Dispatch aborted: client went away",
      retryable: true,
    });
    expect(DispatchErrors.aborted("gone").message).toBe("Dispatch aborted");
  });

  it("names the follow-up that went too deep", () => {
    expect(DispatchErrors.followUpDepthExceeded("Pinged", 2)).toMatchObject({
      code: "FOLLOW_UP_DEPTH_EXCEEDED",
      message: 'Follow-up event "Pinged" exceeds the maximum depth of 2',
      retryable: false,
      context: { messageType: "Pinged", maxDepth: 2 },
    });
  });

  it("prefixes commit failures", () => {
    const cause = new Error("deadlock");

    const error = DispatchErrors.commitFailed(cause, { messageType: "Deposit" });

    expect(error).toMatchObject({
      code: "COMMIT_FAILED",
      message: "Commit failed: deadlock",
      retryable: true,
      context: { messageType: "Deposit" },
    });
    expect(error.cause).toBe(cause);
  });

  it("wraps handler errors as HANDLER_ERROR by default", () => {
    expect(DispatchErrors.internal(new Error("nope")).code).toBe("HANDLER_ERROR");
  });
});

describe("guards", () => {
  it("treats unknown errors as retryable", () => {
    expect(isRetryableError(new Error("x"))).toBe(true);
    expect(isRetryableError(new ConfigurationError("BROKEN", "broken"))).toBe(false);
  });

  it("matches the category", () => {
    const error = DispatchErrors.aborted(undefined);

    expect(isDispatchErrorOfCategory(error, ErrorCategory.CANCELLED)).toBe(true);
    expect(isDispatchErrorOfCategory(error, ErrorCategory.INTERNAL)).toBe(false);
    expect(isDispatchErrorOfCategory(new Error("x"), ErrorCategory.CANCELLED)).toBe(false);
  });

  it("recognises category names", () => {
    expect(isErrorCategory("syntax")).toBe(true);
    expect(isErrorCategory("validation")).toBe(false);
  });
});
