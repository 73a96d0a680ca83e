/**
 * Allocation preconditions.
 *
 * Each runs inside the handler's unit of work, so it sees the same state the
 * handler will write to.
 */
import { UnprocessableKinds, requireThat, skipWhen } from "@gatehouse/dispatch-core";
import type { InMemoryUnitOfWork } from "../infrastructure/unitOfWork.js";
import type { Allocate, Allocated, ChangeBatchQuantity, CreateBatch } from "./messages.js";

// ============================================================================
// CreateBatch
// ============================================================================

export const batchRefAvailable = requireThat<CreateBatch, InMemoryUnitOfWork>({
  name: "batchRefAvailable",
  kind: UnprocessableKinds.CONFLICT,
  test: (cmd, uow) => {
    const owner = uow.products.getByBatchref(cmd.ref);
    return owner === undefined || owner.sku === cmd.sku;
  },
  detail: (cmd) => `Batch ${cmd.ref} already exists for another sku`,
  context: (cmd) => ({ ref: cmd.ref }),
});

export const batchIsNew = skipWhen<CreateBatch, InMemoryUnitOfWork>({
  name: "batchIsNew",
  test: (cmd, uow) => uow.products.get(cmd.sku)?.hasBatch(cmd.ref) ?? false,
  reason: (cmd) => `Batch ${cmd.ref} already exists`,
});

// ============================================================================
// Allocate
// ============================================================================

export const productExists = requireThat<Allocate, InMemoryUnitOfWork>({
  name: "productExists",
  kind: UnprocessableKinds.NOT_FOUND,
  test: (cmd, uow) => uow.products.get(cmd.sku) !== undefined,
  detail: (cmd) => `Invalid sku ${cmd.sku}`,
  context: (cmd) => ({ sku: cmd.sku }),
});

export const lineNotYetAllocated = skipWhen<Allocate, InMemoryUnitOfWork>({
  name: "lineNotYetAllocated",
  test: (cmd, uow) => uow.products.get(cmd.sku)?.allocationOf(cmd.orderid) !== undefined,
  reason: (cmd) => `Order line ${cmd.orderid} is already allocated`,
});

// ============================================================================
// ChangeBatchQuantity
// ============================================================================

export const batchExists = requireThat<ChangeBatchQuantity, InMemoryUnitOfWork>({
  name: "batchExists",
  kind: UnprocessableKinds.NOT_FOUND,
  test: (cmd, uow) => uow.products.getByBatchref(cmd.ref) !== undefined,
  detail: (cmd) => `Unknown batch ${cmd.ref}`,
  context: (cmd) => ({ ref: cmd.ref }),
});

// ============================================================================
// Allocated
// ============================================================================

export const allocationNotYetRecorded = skipWhen<Allocated, InMemoryUnitOfWork>({
  name: "allocationNotYetRecorded",
  test: (event, uow) =>
    uow.allocations.has({ orderid: event.orderid, sku: event.sku, batchref: event.batchref }),
  reason: (event) => `Allocation of ${event.orderid} to ${event.batchref} is already recorded`,
});
