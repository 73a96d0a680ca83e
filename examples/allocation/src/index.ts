export { createAllocationBus, type AllocationBusOptions } from "./bootstrap.js";
export * from "./domain/messages.js";
export { Batch, OrderLine, Product } from "./domain/model.js";
export type { BatchState, OrderLineState, ProductState } from "./domain/model.js";
export {
  InMemoryAllocationStore,
  ConcurrentModificationError,
  type AllocationRow,
  type OutOfStockNotification,
} from "./infrastructure/store.js";
export { InMemoryUnitOfWork } from "./infrastructure/unitOfWork.js";
export { allocationsFor, type AllocationView } from "./views/allocations.js";
