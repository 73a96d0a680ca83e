/**
 * Allocations read model queries.
 */
import type { InMemoryAllocationStore } from "../infrastructure/store.js";

export interface AllocationView {
  sku: string;
  batchref: string;
}

/**
 * Batches an order's lines are allocated to, as recorded by the Allocated
 * and Deallocated event handlers.
 */
export function allocationsFor(store: InMemoryAllocationStore, orderid: string): AllocationView[] {
  return store
    .listAllocations()
    .filter((row) => row.orderid === orderid)
    .map(({ sku, batchref }) => ({ sku, batchref }));
}
