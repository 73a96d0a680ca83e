/**
 * Unit tests for bus configuration loading.
 */
import { describe, it, expect } from "vitest";
import {
  ConfigurationError,
  DEFAULT_BUS_CONFIG,
  MAX_DISPATCH_TIMEOUT_MS,
  loadBusConfig,
  resolveBusConfig,
} from "../../../src/index.js";
import { thrownBy } from "../../support/ledger.js";

describe("loadBusConfig", () => {
  it("uses the defaults for an empty environment", () => {
    expect(loadBusConfig({})).toEqual({ logLevel: "INFO", maxFollowUpDepth: 10 });
  });

  it("reads and coerces every variable", () => {
    expect(
      loadBusConfig({
        GATEHOUSE_LOG_LEVEL: "DEBUG",
        GATEHOUSE_DISPATCH_TIMEOUT_MS: "2500",
        GATEHOUSE_MAX_FOLLOW_UP_DEPTH: "3",
        UNRELATED: "ignored",
      })
    ).toEqual({ logLevel: "DEBUG", dispatchTimeoutMs: 2500, maxFollowUpDepth: 3 });
  });

  it("treats empty values as unset", () => {
    expect(
      loadBusConfig({ GATEHOUSE_LOG_LEVEL: "", GATEHOUSE_DISPATCH_TIMEOUT_MS: "" })
    ).toEqual(DEFAULT_BUS_CONFIG);
  });

  it("lists every invalid variable", () => {
    const error = thrownBy(() =>
      loadBusConfig({
        GATEHOUSE_LOG_LEVEL: "LOUD",
        GATEHOUSE_MAX_FOLLOW_UP_DEPTH: "500",
      })
    );

    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error).toMatchObject({ code: "INVALID_CONFIGURATION" });
    expect(error).toHaveProperty("context.issues", [
      { field: "GATEHOUSE_LOG_LEVEL", reason: expect.any(String) },
      { field: "GATEHOUSE_MAX_FOLLOW_UP_DEPTH", reason: expect.any(String) },
    ]);
  });

  it("rejects a timeout longer than a timer can wait", () => {
    const error = thrownBy(() =>
      loadBusConfig({ GATEHOUSE_DISPATCH_TIMEOUT_MS: "3000000000" })
    );

    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error).toHaveProperty("context.issues", [
      { field: "GATEHOUSE_DISPATCH_TIMEOUT_MS", reason: expect.any(String) },
    ]);
  });

  it("returns a frozen config", () => {
    expect(Object.isFrozen(loadBusConfig({}))).toBe(true);
  });
});

describe("resolveBusConfig", () => {
  it("merges overrides onto the base", () => {
    const base = resolveBusConfig({ dispatchTimeoutMs: 1000, logLevel: "WARN" });

    expect(resolveBusConfig({ maxFollowUpDepth: 0 }, base)).toEqual({
      logLevel: "WARN",
      dispatchTimeoutMs: 1000,
      maxFollowUpDepth: 0,
    });
  });

  it("rejects a non-positive timeout", () => {
    const error = thrownBy(() => resolveBusConfig({ dispatchTimeoutMs: 0 }));

    expect(error).toMatchObject({ code: "INVALID_CONFIGURATION" });
    expect(error).toHaveProperty("message", expect.stringMatching(/^Invalid bus configuration: dispatchTimeoutMs: /));
  });

  it("rejects a timeout longer than a timer can wait", () => {
    expect(resolveBusConfig({ dispatchTimeoutMs: MAX_DISPATCH_TIMEOUT_MS })).toMatchObject({
      dispatchTimeoutMs: MAX_DISPATCH_TIMEOUT_MS,
    });

    const error = thrownBy(() => resolveBusConfig({ dispatchTimeoutMs: 3_000_000_000 }));

    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error).toHaveProperty(
      "message",
      expect.stringMatching(/^Invalid bus configuration: dispatchTimeoutMs: /)
    );
  });
});
