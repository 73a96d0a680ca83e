/**
 * In-memory allocation store.
 *
 * Holds committed state only. Reads and writes go through an
 * InMemoryUnitOfWork, which stages its changes and applies them here in one
 * step on commit.
 */
import type { UnitOfWorkScopeInfo } from "@gatehouse/dispatch-core";
import type { ProductState } from "../domain/model.js";
import { InMemoryUnitOfWork } from "./unitOfWork.js";

/**
 * Row of the allocations read model.
 */
export interface AllocationRow {
  orderid: string;
  sku: string;
  batchref: string;
}

export interface OutOfStockNotification {
  sku: string;
  message: string;
}

/**
 * Changes staged by one unit of work.
 */
export interface StagedChanges {
  products: ProductState[];
  /** Version each product had when the unit of work loaded it; absent for new products */
  expectedVersions: ReadonlyMap<string, number | undefined>;
  allocationsAdded: AllocationRow[];
  allocationsRemoved: Array<Pick<AllocationRow, "orderid" | "sku">>;
  notifications: OutOfStockNotification[];
}

export class ConcurrentModificationError extends Error {
  public override name = "ConcurrentModificationError";

  constructor(public readonly sku: string) {
    super(`Product ${sku} was modified by another unit of work`);
  }
}

function clone<T>(value: T): T {
  return structuredClone(value);
}

export class InMemoryAllocationStore {
  private readonly products = new Map<string, ProductState>();
  private allocations: AllocationRow[] = [];
  private readonly notifications: OutOfStockNotification[] = [];

  /** Units of work opened, committed and rolled back, for tests and diagnostics */
  readonly stats = { begun: 0, committed: 0, rolledBack: 0 };

  /**
   * Open a unit of work. Matches the bus's UnitOfWorkFactory signature.
   */
  begin = (scope?: UnitOfWorkScopeInfo): InMemoryUnitOfWork => {
    this.stats.begun += 1;
    return new InMemoryUnitOfWork(this, scope);
  };

  getProduct(sku: string): ProductState | undefined {
    const state = this.products.get(sku);
    return state === undefined ? undefined : clone(state);
  }

  findSkuByBatchref(reference: string): string | undefined {
    for (const product of this.products.values()) {
      if (product.batches.some((batch) => batch.reference === reference)) {
        return product.sku;
      }
    }
    return undefined;
  }

  listAllocations(): AllocationRow[] {
    return this.allocations.map((row) => ({ ...row }));
  }

  listNotifications(): OutOfStockNotification[] {
    return this.notifications.map((notification) => ({ ...notification }));
  }

  /**
   * Apply staged changes atomically.
   *
   * @throws ConcurrentModificationError if a product changed since it was loaded
   */
  apply(changes: StagedChanges): void {
    for (const product of changes.products) {
      const expected = changes.expectedVersions.get(product.sku);
      const current = this.products.get(product.sku)?.version;
      if (current !== expected) {
        throw new ConcurrentModificationError(product.sku);
      }
    }

    for (const product of changes.products) {
      this.products.set(product.sku, clone(product));
    }
    this.allocations = this.allocations.filter(
      (row) =>
        !changes.allocationsRemoved.some(
          (removed) => removed.orderid === row.orderid && removed.sku === row.sku
        )
    );
    this.allocations.push(...changes.allocationsAdded);
    this.notifications.push(...changes.notifications);
    this.stats.committed += 1;
  }

  recordRollback(): void {
    this.stats.rolledBack += 1;
  }

  /**
   * Committed state as a JSON string with products ordered by SKU.
   */
  snapshot(): string {
    const products = Array.from(this.products.values()).sort((a, b) => a.sku.localeCompare(b.sku));
    return JSON.stringify({
      products,
      allocations: this.allocations,
      notifications: this.notifications,
    });
  }
}
