/**
 * Allocation message declarations.
 *
 * Commands arrive from the outside world; events are raised by the Product
 * aggregate and dispatched by the bus after the unit of work commits.
 */
import { defineCommand, defineEvent, fields, type MessageOf } from "@gatehouse/dispatch-core";

const sku = fields.string({ minLength: 1, maxLength: 64 });
const reference = fields.string({ minLength: 1, maxLength: 64 });

// ============================================================================
// Commands
// ============================================================================

export const CreateBatch = defineCommand(
  "CreateBatch",
  {
    ref: reference,
    sku,
    qty: fields.integer({ gt: 0 }),
    eta: fields.optional(fields.isoDate()),
  },
  { description: "Register incoming stock; a batch without eta is already in the warehouse" }
);
export type CreateBatch = MessageOf<typeof CreateBatch>;

export const Allocate = defineCommand("Allocate", {
  orderid: reference,
  sku,
  qty: fields.integer({ gt: 0 }),
});
export type Allocate = MessageOf<typeof Allocate>;

export const ChangeBatchQuantity = defineCommand("ChangeBatchQuantity", {
  ref: reference,
  qty: fields.integer({ gte: 0 }),
});
export type ChangeBatchQuantity = MessageOf<typeof ChangeBatchQuantity>;

// ============================================================================
// Events
// ============================================================================

export const Allocated = defineEvent("Allocated", {
  orderid: reference,
  sku,
  qty: fields.integer({ gt: 0 }),
  batchref: reference,
});
export type Allocated = MessageOf<typeof Allocated>;

export const Deallocated = defineEvent("Deallocated", {
  orderid: reference,
  sku,
  qty: fields.integer({ gt: 0 }),
});
export type Deallocated = MessageOf<typeof Deallocated>;

export const OutOfStock = defineEvent("OutOfStock", { sku });
export type OutOfStock = MessageOf<typeof OutOfStock>;

export const ALL_MESSAGES = [
  CreateBatch,
  Allocate,
  ChangeBatchQuantity,
  Allocated,
  Deallocated,
  OutOfStock,
] as const;
