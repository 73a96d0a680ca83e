/**
 * ## Allocation Domain Model
 *
 * A Product is the consistency boundary: it owns every Batch of one SKU and
 * decides which batch an order line is allocated to. Batches already in the
 * warehouse (no eta) are preferred, then the batch arriving soonest.
 *
 * The aggregate records the events it raises; the unit of work hands them to
 * the bus after commit.
 */
import type { RaisedMessage } from "@gatehouse/dispatch-core";
import { Allocated, Deallocated, OutOfStock } from "./messages.js";

// ============================================================================
// Persistent State
// ============================================================================

export interface OrderLineState {
  orderid: string;
  sku: string;
  qty: number;
}

export interface BatchState {
  reference: string;
  sku: string;
  purchasedQuantity: number;
  /** ISO-8601, or null for stock already in the warehouse */
  eta: string | null;
  allocations: OrderLineState[];
}

export interface ProductState {
  sku: string;
  version: number;
  batches: BatchState[];
}

// ============================================================================
// Entities
// ============================================================================

export class OrderLine {
  constructor(
    public readonly orderid: string,
    public readonly sku: string,
    public readonly qty: number
  ) {}

  toState(): OrderLineState {
    return { orderid: this.orderid, sku: this.sku, qty: this.qty };
  }
}

export class Batch {
  private readonly allocations = new Map<string, OrderLine>();

  constructor(
    public readonly reference: string,
    public readonly sku: string,
    public purchasedQuantity: number,
    public readonly eta: Date | null = null
  ) {}

  static fromState(state: BatchState): Batch {
    const batch = new Batch(
      state.reference,
      state.sku,
      state.purchasedQuantity,
      state.eta === null ? null : new Date(state.eta)
    );
    for (const line of state.allocations) {
      batch.allocations.set(line.orderid, new OrderLine(line.orderid, line.sku, line.qty));
    }
    return batch;
  }

  get allocatedQuantity(): number {
    let total = 0;
    for (const line of this.allocations.values()) {
      total += line.qty;
    }
    return total;
  }

  get availableQuantity(): number {
    return this.purchasedQuantity - this.allocatedQuantity;
  }

  canAllocate(line: OrderLine): boolean {
    return (
      this.sku === line.sku &&
      !this.allocations.has(line.orderid) &&
      this.availableQuantity >= line.qty
    );
  }

  allocate(line: OrderLine): void {
    if (this.canAllocate(line)) {
      this.allocations.set(line.orderid, line);
    }
  }

  isAllocated(orderid: string): boolean {
    return this.allocations.has(orderid);
  }

  /**
   * Remove the most recently allocated line.
   */
  deallocateOne(): OrderLine | undefined {
    const last = Array.from(this.allocations.keys()).at(-1);
    if (last === undefined) {
      return undefined;
    }
    const line = this.allocations.get(last);
    this.allocations.delete(last);
    return line;
  }

  toState(): BatchState {
    return {
      reference: this.reference,
      sku: this.sku,
      purchasedQuantity: this.purchasedQuantity,
      eta: this.eta === null ? null : this.eta.toISOString(),
      allocations: Array.from(this.allocations.values(), (line) => line.toState()),
    };
  }
}

function byArrival(a: Batch, b: Batch): number {
  if (a.eta === null) return b.eta === null ? 0 : -1;
  if (b.eta === null) return 1;
  return a.eta.getTime() - b.eta.getTime();
}

// ============================================================================
// Aggregate
// ============================================================================

export class Product {
  /** Events raised since the product was loaded, drained by the unit of work */
  public readonly events: RaisedMessage[] = [];

  constructor(
    public readonly sku: string,
    private readonly batches: Batch[] = [],
    public version = 0
  ) {}

  static fromState(state: ProductState): Product {
    return new Product(state.sku, state.batches.map(Batch.fromState), state.version);
  }

  addBatch(batch: Batch): void {
    this.batches.push(batch);
    this.version += 1;
  }

  getBatch(reference: string): Batch | undefined {
    return this.batches.find((batch) => batch.reference === reference);
  }

  hasBatch(reference: string): boolean {
    return this.getBatch(reference) !== undefined;
  }

  /**
   * Batch the order line is allocated to, if any.
   */
  allocationOf(orderid: string): Batch | undefined {
    return this.batches.find((batch) => batch.isAllocated(orderid));
  }

  /**
   * Allocate to the earliest batch with room.
   *
   * @returns the batch reference, or undefined when out of stock (OutOfStock is raised)
   */
  allocate(line: OrderLine): string | undefined {
    const batch = [...this.batches].sort(byArrival).find((candidate) => candidate.canAllocate(line));
    if (!batch) {
      this.events.push({ type: OutOfStock.type, payload: { sku: line.sku } });
      return undefined;
    }

    batch.allocate(line);
    this.version += 1;
    this.events.push({
      type: Allocated.type,
      payload: { orderid: line.orderid, sku: line.sku, qty: line.qty, batchref: batch.reference },
    });
    return batch.reference;
  }

  /**
   * Change a batch's purchased quantity, deallocating lines until it fits.
   *
   * @returns the number of lines deallocated
   */
  changeBatchQuantity(reference: string, qty: number): number {
    const batch = this.getBatch(reference);
    if (!batch) {
      return 0;
    }

    batch.purchasedQuantity = qty;
    this.version += 1;

    let deallocated = 0;
    while (batch.availableQuantity < 0) {
      const line = batch.deallocateOne();
      if (!line) break;
      deallocated += 1;
      this.events.push({
        type: Deallocated.type,
        payload: { orderid: line.orderid, sku: line.sku, qty: line.qty },
      });
    }
    return deallocated;
  }

  toState(): ProductState {
    return {
      sku: this.sku,
      version: this.version,
      batches: this.batches.map((batch) => batch.toState()),
    };
  }
}
