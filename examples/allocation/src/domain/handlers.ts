/**
 * Allocation handlers.
 *
 * Command handlers change the Product aggregate; the events it raises are
 * collected from the unit of work after commit and dispatched to the event
 * handlers below, each in its own unit of work.
 */
import { UnprocessableError, UnprocessableKinds } from "@gatehouse/dispatch-core";
import type { HandlerContext, MessageHandler } from "@gatehouse/dispatch-core";
import type { InMemoryUnitOfWork } from "../infrastructure/unitOfWork.js";
import type {
  Allocate,
  Allocated,
  ChangeBatchQuantity,
  CreateBatch,
  Deallocated,
  OutOfStock,
} from "./messages.js";
import { Batch, OrderLine, Product } from "./model.js";

type Uow = InMemoryUnitOfWork;

// ============================================================================
// Command Handlers
// ============================================================================

export function addBatch(cmd: CreateBatch, uow: Uow): string {
  let product = uow.products.get(cmd.sku);
  if (!product) {
    product = new Product(cmd.sku);
    uow.products.add(product);
  }
  product.addBatch(new Batch(cmd.ref, cmd.sku, cmd.qty, cmd.eta ?? null));
  return cmd.ref;
}

interface LineFields {
  orderid: string;
  sku: string;
  qty: number;
}

function allocateLine(line: LineFields, uow: Uow, context: HandlerContext): string | null {
  const product = uow.products.get(line.sku);
  if (!product) {
    throw new UnprocessableError(UnprocessableKinds.NOT_FOUND, `Invalid sku ${line.sku}`, {
      sku: line.sku,
    });
  }
  const batchref = product.allocate(new OrderLine(line.orderid, line.sku, line.qty));
  if (batchref === undefined) {
    context.logger.info("Out of stock", { sku: line.sku, orderid: line.orderid });
  }
  return batchref ?? null;
}

/**
 * @returns the batch reference, or null when out of stock
 */
export function allocate(cmd: Allocate, uow: Uow, context: HandlerContext): string | null {
  return allocateLine(cmd, uow, context);
}

/**
 * @returns the number of order lines deallocated
 */
export function changeBatchQuantity(cmd: ChangeBatchQuantity, uow: Uow): number {
  const product = uow.products.getByBatchref(cmd.ref);
  if (!product) {
    throw new UnprocessableError(UnprocessableKinds.NOT_FOUND, `Unknown batch ${cmd.ref}`, {
      ref: cmd.ref,
    });
  }
  return product.changeBatchQuantity(cmd.ref, cmd.qty);
}

// ============================================================================
// Event Handlers
// ============================================================================

export function recordAllocation(event: Allocated, uow: Uow): void {
  uow.allocations.add({ orderid: event.orderid, sku: event.sku, batchref: event.batchref });
}

export function removeAllocation(event: Deallocated, uow: Uow): void {
  uow.allocations.remove(event.orderid, event.sku);
}

/**
 * Allocate a deallocated line again, to whichever batch now has room.
 */
export const reallocate: MessageHandler<Deallocated, Uow, string | null> = {
  name: "reallocate",
  handle(event, uow, context) {
    return allocateLine(event, uow, context);
  },
};

export function notifyOutOfStock(event: OutOfStock, uow: Uow): void {
  uow.notify({ sku: event.sku, message: `Out of stock for ${event.sku}` });
}
