/**
 * Wires the allocation messages, preconditions and handlers into a bus.
 */
import {
  createMessageBusBuilder,
  type BusConfigOverrides,
  type Logger,
  type MessageBus,
} from "@gatehouse/dispatch-core";
import {
  addBatch,
  allocate,
  changeBatchQuantity,
  notifyOutOfStock,
  reallocate,
  recordAllocation,
  removeAllocation,
} from "./domain/handlers.js";
import {
  Allocate,
  Allocated,
  ALL_MESSAGES,
  ChangeBatchQuantity,
  CreateBatch,
  Deallocated,
  OutOfStock,
} from "./domain/messages.js";
import {
  allocationNotYetRecorded,
  batchExists,
  batchIsNew,
  batchRefAvailable,
  lineNotYetAllocated,
  productExists,
} from "./domain/preconditions.js";
import type { InMemoryAllocationStore } from "./infrastructure/store.js";
import type { InMemoryUnitOfWork } from "./infrastructure/unitOfWork.js";

export interface AllocationBusOptions {
  store: InMemoryAllocationStore;
  logger?: Logger;
  config?: BusConfigOverrides;
}

export function createAllocationBus(options: AllocationBusOptions): MessageBus<InMemoryUnitOfWork> {
  const builder = createMessageBusBuilder<InMemoryUnitOfWork>({
    unitOfWork: options.store.begin,
    ...(options.logger !== undefined && { logger: options.logger }),
    ...(options.config !== undefined && { config: options.config }),
  });

  for (const definition of ALL_MESSAGES) {
    builder.registerSchema(definition);
  }

  return builder
    .registerPrecondition(CreateBatch, batchRefAvailable)
    .registerPrecondition(CreateBatch, batchIsNew)
    .registerHandler(CreateBatch, addBatch, "command")
    .registerPrecondition(Allocate, productExists)
    .registerPrecondition(Allocate, lineNotYetAllocated)
    .registerHandler(Allocate, allocate, "command")
    .registerPrecondition(ChangeBatchQuantity, batchExists)
    .registerHandler(ChangeBatchQuantity, changeBatchQuantity, "command")
    .registerPrecondition(Allocated, allocationNotYetRecorded)
    .registerHandler(Allocated, recordAllocation, "event")
    .registerHandler(Deallocated, removeAllocation, "event")
    .registerHandler(Deallocated, reallocate, "event")
    .registerHandler(OutOfStock, notifyOutOfStock, "event")
    .build();
}
