/**
 * Unit tests for logging testing utilities.
 */
import { describe, it, expect } from "vitest";
import { createMockLogger, createFilteredMockLogger } from "../../../src/logging/testing.js";

describe("createMockLogger", () => {
  it("captures level, message and data in order", () => {
    const logger = createMockLogger();

    logger.debug("Dispatch started", { messageType: "Deposit" });
    logger.trace("Timing");
    logger.info("Message dispatched");
    logger.report("Summary");
    logger.warn("Message skipped");
    logger.error("Message failed", { code: "HANDLER_ERROR" });

    expect(logger.calls.map((call) => call.level)).toEqual([
      "DEBUG",
      "TRACE",
      "INFO",
      "REPORT",
      "WARN",
      "ERROR",
    ]);
    expect(logger.calls[0]).toMatchObject({
      message: "Dispatch started",
      data: { messageType: "Deposit" },
    });
    expect(logger.calls[1]?.data).toBeUndefined();
  });

  it("filters by level", () => {
    const logger = createMockLogger();
    logger.warn("first");
    logger.info("between");
    logger.warn("second");

    expect(logger.getCallsAtLevel("WARN").map((call) => call.message)).toEqual([
      "first",
      "second",
    ]);
    expect(logger.getLastCallAt("WARN")?.message).toBe("second");
    expect(logger.getLastCallAt("ERROR")).toBeUndefined();
  });

  it("matches messages partially", () => {
    const logger = createMockLogger();
    logger.error("Unit of work rollback failed");

    expect(logger.hasLoggedMessage("rollback")).toBe(true);
    expect(logger.hasLoggedAt("ERROR", "rollback")).toBe(true);
    expect(logger.hasLoggedAt("WARN", "rollback")).toBe(false);
    expect(logger.hasLoggedMessage("commit")).toBe(false);
  });

  it("clears captured calls", () => {
    const logger = createMockLogger();
    logger.info("one");

    logger.clear();

    expect(logger.calls).toHaveLength(0);
  });
});

describe("createFilteredMockLogger", () => {
  it("ignores calls below the minimum level", () => {
    const logger = createFilteredMockLogger("WARN");

    logger.debug("d");
    logger.info("i");
    logger.warn("w");
    logger.error("e");

    expect(logger.calls.map((call) => call.message)).toEqual(["w", "e"]);
  });
});
