/**
 * Stock Allocation - Step Definitions
 *
 * Drives the allocation bus through its commands and checks the read model
 * kept up to date by the follow-up events.
 */
import { fileURLToPath } from "node:url";
import { loadFeature, describeFeature } from "@amiceli/vitest-cucumber";
import { expect } from "vitest";
import { createNoOpLogger, type Outcome } from "@gatehouse/dispatch-core";

import { createAllocationBus } from "../../src/bootstrap.js";
import { InMemoryAllocationStore } from "../../src/infrastructure/store.js";
import { allocationsFor } from "../../src/views/allocations.js";

// =============================================================================
// Test State
// =============================================================================

interface TestState {
  store: InMemoryAllocationStore;
  bus: ReturnType<typeof createAllocationBus>;
  outcome: Outcome | null;
}

function createInitialState(): TestState {
  const store = new InMemoryAllocationStore();
  return {
    store,
    bus: createAllocationBus({ store, logger: createNoOpLogger() }),
    outcome: null,
  };
}

let state: TestState = createInitialState();

async function send(type: string, payload: Record<string, unknown>): Promise<Outcome> {
  const outcome = await state.bus.dispatch(type, payload);
  if (outcome.status !== "dispatched" && outcome.status !== "skipped") {
    throw new Error(`Setup dispatch of ${type} ended ${outcome.status}`);
  }
  return outcome;
}

// =============================================================================
// Feature
// =============================================================================

const feature = await loadFeature(
  fileURLToPath(new URL("../features/allocation.feature", import.meta.url))
);

describeFeature(feature, ({ Scenario, Background }) => {
  Background(({ Given, And }) => {
    Given('a warehouse batch "b1" of 10 "LAMP"', async () => {
      state = createInitialState();
      await send("CreateBatch", { ref: "b1", sku: "LAMP", qty: 10 });
    });

    And('a shipment batch "b2" of 10 "LAMP" arriving "2030-01-01"', async () => {
      await send("CreateBatch", { ref: "b2", sku: "LAMP", qty: 10, eta: "2030-01-01" });
    });
  });

  Scenario("Allocating an order line", ({ When, Then, And }) => {
    When('order "o1" asks for 4 "LAMP"', async () => {
      state.outcome = await state.bus.dispatch("Allocate", { orderid: "o1", sku: "LAMP", qty: 4 });
    });

    Then('the outcome is "dispatched"', () => {
      expect(state.outcome?.status).toBe("dispatched");
    });

    And('order "o1" is allocated to "b1"', () => {
      expect(allocationsFor(state.store, "o1")).toEqual([{ sku: "LAMP", batchref: "b1" }]);
    });
  });

  Scenario("Allocating the same order line twice", ({ Given, When, Then, And }) => {
    Given('order "o1" asked for 4 "LAMP"', async () => {
      await send("Allocate", { orderid: "o1", sku: "LAMP", qty: 4 });
    });

    When('order "o1" asks for 4 "LAMP"', async () => {
      state.outcome = await state.bus.dispatch("Allocate", { orderid: "o1", sku: "LAMP", qty: 4 });
    });

    Then('the outcome is "skipped"', () => {
      expect(state.outcome?.status).toBe("skipped");
    });

    And('order "o1" is allocated to "b1"', () => {
      expect(allocationsFor(state.store, "o1")).toEqual([{ sku: "LAMP", batchref: "b1" }]);
    });
  });

  Scenario("Shrinking a batch moves its lines elsewhere", ({ Given, When, Then, And }) => {
    Given('order "o1" asked for 6 "LAMP"', async () => {
      await send("Allocate", { orderid: "o1", sku: "LAMP", qty: 6 });
    });

    When('batch "b1" is reduced to 4', async () => {
      state.outcome = await state.bus.dispatch("ChangeBatchQuantity", { ref: "b1", qty: 4 });
    });

    Then('the outcome is "dispatched"', () => {
      expect(state.outcome?.status).toBe("dispatched");
    });

    And('order "o1" is allocated to "b2"', () => {
      expect(allocationsFor(state.store, "o1")).toEqual([{ sku: "LAMP", batchref: "b2" }]);
    });
  });

  Scenario("Running out of stock", ({ When, Then, And }) => {
    When('order "o2" asks for 25 "LAMP"', async () => {
      state.outcome = await state.bus.dispatch("Allocate", { orderid: "o2", sku: "LAMP", qty: 25 });
    });

    Then('the outcome is "dispatched"', () => {
      expect(state.outcome?.status).toBe("dispatched");
    });

    And('the warehouse was notified that "LAMP" is out of stock', () => {
      expect(state.store.listNotifications()).toEqual([
        { sku: "LAMP", message: "Out of stock for LAMP" },
      ]);
    });
  });
});
