/**
 * Unit tests for the consumer boundary mapping.
 */
import { describe, it, expect, beforeEach } from "vitest";
import {
  DispatchError,
  DispatchErrors,
  ErrorCategory,
  createMockLogger,
  failedOutcome,
  rejectedOutcome,
  toConsumerDisposition,
  toCorrelationId,
  toMessageId,
  unknownTypeOutcome,
  type MockLogger,
  type OutcomeIdentity,
} from "../../../src/index.js";

const identity: OutcomeIdentity = {
  messageType: "Allocated",
  messageKind: "event",
  messageId: toMessageId("m-1"),
  correlationId: toCorrelationId("c-1"),
};

describe("toConsumerDisposition", () => {
  let logger: MockLogger;

  beforeEach(() => {
    logger = createMockLogger();
  });

  it("acks dispatched messages", () => {
    const disposition = toConsumerDisposition(
      { status: "dispatched", ...identity, result: [], handlers: [], followUps: [] },
      logger
    );

    expect(disposition).toEqual({ action: "ack", reason: "dispatched" });
    expect(logger.calls).toEqual([
      expect.objectContaining({
        level: "INFO",
        message: "Consumer ack",
        data: { messageType: "Allocated", status: "dispatched" },
      }),
    ]);
  });

  it("acks skipped messages with the reason", () => {
    const disposition = toConsumerDisposition(
      {
        status: "skipped",
        ...identity,
        reason: "already recorded",
        precondition: "notRecorded",
        handlers: [],
      },
      logger
    );

    expect(disposition).toEqual({ action: "ack", reason: "skipped: already recorded" });
  });

  it("drops rejected messages", () => {
    const disposition = toConsumerDisposition(
      rejectedOutcome("Allocated", "event", [
        { field: "qty", reason: "must be > 0" },
        { field: "sku", reason: "is required" },
      ]),
      logger
    );

    expect(disposition).toEqual({
      action: "drop",
      reason: "rejected: qty must be > 0; sku is required",
    });
    expect(logger.getLastCallAt("ERROR")?.message).toBe("Consumer drop");
  });

  it("drops unknown types", () => {
    expect(toConsumerDisposition(unknownTypeOutcome("Shipped"), logger)).toEqual({
      action: "drop",
      reason: "unknown message type: Shipped",
    });
  });

  it("drops unprocessable messages", () => {
    const disposition = toConsumerDisposition(
      {
        status: "unprocessable",
        ...identity,
        kind: "not_found",
        detail: "Unknown batch b-9",
        handlers: [],
      },
      logger
    );

    expect(disposition).toEqual({ action: "drop", reason: "not_found: Unknown batch b-9" });
  });

  it("retries retryable failures and logs at WARN", () => {
    const outcome = failedOutcome(identity, DispatchErrors.commitFailed(new Error("deadlock")));

    expect(toConsumerDisposition(outcome, logger)).toEqual({
      action: "retry",
      reason: "COMMIT_FAILED: Commit failed: deadlock",
    });
    const call = logger.getLastCallAt("WARN");
    expect(call?.message).toBe("Consumer retry");
    expect(call?.data).toMatchObject({
      messageType: "Allocated",
      status: "failed",
      messageId: "m-1",
      error: { code: "COMMIT_FAILED", cause: { message: "deadlock" } },
    });
  });

  it("drops failures that are not retryable", () => {
    const outcome = failedOutcome(
      identity,
      new DispatchError(ErrorCategory.INTERNAL, "FOLLOW_UP_DEPTH_EXCEEDED", "too deep", false)
    );

    expect(toConsumerDisposition(outcome, logger)).toEqual({
      action: "drop",
      reason: "FOLLOW_UP_DEPTH_EXCEEDED: too deep",
    });
    expect(logger.hasLoggedAt("ERROR", "Consumer drop")).toBe(true);
  });
});
