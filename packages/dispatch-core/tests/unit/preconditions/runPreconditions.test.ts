/**
 * Unit tests for the precondition factories, runner and registry.
 */
import { describe, it, expect } from "vitest";
import {
  DispatchError,
  ErrorCategory,
  PreconditionRegistry,
  UnprocessableError,
  definePrecondition,
  pass,
  requireThat,
  runPreconditions,
  skip,
  skipWhen,
  unprocessable,
  type Precondition,
} from "../../../src/index.js";
import { never, thrownBy } from "../../support/ledger.js";

interface Order {
  id: string;
  qty: number;
}

interface Stock {
  available: number;
  shipped: Set<string>;
}

const stock: Stock = { available: 10, shipped: new Set(["o-shipped"]) };

const notShipped = skipWhen<Order, Stock>({
  name: "notShipped",
  test: (order, s) => s.shipped.has(order.id),
  reason: (order) => `Order ${order.id} already shipped`,
});

const enoughStock = requireThat<Order, Stock>({
  name: "enoughStock",
  kind: "insufficient_stock",
  test: (order, s) => s.available >= order.qty,
  detail: "Not enough stock",
  context: (order) => ({ requested: order.qty }),
});

describe("precondition factories", () => {
  it("builds results", () => {
    expect(pass()).toEqual({ status: "pass" });
    expect(skip("dup")).toEqual({ status: "skip", reason: "dup" });
    expect(unprocessable("conflict", "taken")).toEqual({
      status: "unprocessable",
      kind: "conflict",
      detail: "taken",
    });
    expect(unprocessable("conflict", "taken", { id: 1 })).toEqual({
      status: "unprocessable",
      kind: "conflict",
      detail: "taken",
      context: { id: 1 },
    });
  });

  it("skipWhen skips when the test holds", async () => {
    expect(await notShipped.check({ id: "o-shipped", qty: 1 }, stock)).toEqual({
      status: "skip",
      reason: "Order o-shipped already shipped",
    });
    expect(await notShipped.check({ id: "o-1", qty: 1 }, stock)).toEqual({ status: "pass" });
  });

  it("requireThat is unprocessable unless the test holds", async () => {
    expect(await enoughStock.check({ id: "o-1", qty: 11 }, stock)).toEqual({
      status: "unprocessable",
      kind: "insufficient_stock",
      detail: "Not enough stock",
      context: { requested: 11 },
    });
    expect(await enoughStock.check({ id: "o-1", qty: 10 }, stock)).toEqual({ status: "pass" });
  });

  it("accepts async tests", async () => {
    const remote = requireThat<Order, Stock>({
      name: "remote",
      kind: "not_found",
      test: async () => false,
      detail: (order) => `Unknown order ${order.id}`,
    });

    expect(await remote.check({ id: "o-7", qty: 1 }, stock)).toEqual({
      status: "unprocessable",
      kind: "not_found",
      detail: "Unknown order o-7",
    });
  });
});

describe("runPreconditions", () => {
  it("passes when every precondition passes", async () => {
    expect(await runPreconditions([notShipped, enoughStock], { id: "o-1", qty: 2 }, stock)).toEqual({
      status: "pass",
    });
  });

  it("passes with no preconditions", async () => {
    expect(await runPreconditions([], { id: "o-1", qty: 2 }, stock)).toEqual({ status: "pass" });
  });

  it("returns the first non-pass result tagged with its precondition", async () => {
    expect(
      await runPreconditions([notShipped, enoughStock], { id: "o-shipped", qty: 99 }, stock)
    ).toEqual({
      status: "skip",
      reason: "Order o-shipped already shipped",
      precondition: "notShipped",
    });
    expect(await runPreconditions([notShipped, enoughStock], { id: "o-1", qty: 99 }, stock)).toEqual({
      status: "unprocessable",
      kind: "insufficient_stock",
      detail: "Not enough stock",
      precondition: "enoughStock",
      context: { requested: 99 },
    });
  });

  it("turns a thrown UnprocessableError into a verdict", async () => {
    const strict = definePrecondition<Order, Stock>({
      name: "strict",
      check: () => {
        throw new UnprocessableError("invalid_state", "Stock is being counted");
      },
    });

    expect(await runPreconditions([strict], { id: "o-1", qty: 1 }, stock)).toEqual({
      status: "unprocessable",
      kind: "invalid_state",
      detail: "Stock is being counted",
      precondition: "strict",
    });
  });

  it("wraps any other throw as PRECONDITION_ERROR", async () => {
    const cause = new Error("connection reset");
    const broken = definePrecondition<Order, Stock>({
      name: "broken",
      check: () => {
        throw cause;
      },
    });

    const error = await runPreconditions([broken], { id: "o-1", qty: 1 }, stock).catch(
      (e: unknown) => e
    );

    expect(error).toBeInstanceOf(DispatchError);
    expect(error).toMatchObject({
      category: ErrorCategory.INTERNAL,
      code: "PRECONDITION_ERROR",
      message: 'Precondition "broken" threw: connection reset',
      retryable: true,
      context: { precondition: "broken" },
      cause,
    });
  });

  it("does not retry a check that is broken", async () => {
    const buggy = definePrecondition<Order, Stock>({
      name: "buggy",
      check: (order) => {
        throw new TypeError(`Cannot read properties of undefined (reading '${order.id}')`);
      },
    });

    const error = await runPreconditions([buggy], { id: "o-1", qty: 1 }, stock).catch(
      (e: unknown) => e
    );

    expect(error).toMatchObject({
      code: "PRECONDITION_ERROR",
      message: "Precondition \"buggy\" threw: Cannot read properties of undefined (reading 'o-1')",
      retryable: false,
    });
  });

  it("stops waiting on a pending check when the signal aborts", async () => {
    const controller = new AbortController();
    const hanging: Precondition<Order, Stock> = {
      name: "hanging",
      check: () => never(),
    };

    const pending = runPreconditions([hanging], { id: "o-1", qty: 1 }, stock, {
      signal: controller.signal,
    });
    controller.abort();

    await expect(pending).rejects.toMatchObject({ code: "DISPATCH_ABORTED" });
  });
});

describe("PreconditionRegistry", () => {
  it("keeps preconditions per type in registration order", () => {
    const registry = new PreconditionRegistry<Stock>();
    registry.register("Ship", notShipped);
    registry.register("Ship", enoughStock);

    expect(registry.names("Ship")).toEqual(["notShipped", "enoughStock"]);
    expect(registry.get("Cancel")).toEqual([]);
  });

  it("rejects registrations once frozen", () => {
    const registry = new PreconditionRegistry<Stock>();
    registry.freeze();

    expect(thrownBy(() => registry.register("Ship", notShipped))).toMatchObject({
      code: "REGISTRY_FROZEN",
    });
  });
});
