/**
 * In-memory unit of work over InMemoryAllocationStore.
 *
 * Products are loaded as copies; nothing reaches the store until `commit()`.
 * After commit, `collectNewEvents()` drains the events raised by every
 * product the unit of work touched.
 */
import type { RaisedMessage, UnitOfWork, UnitOfWorkScopeInfo } from "@gatehouse/dispatch-core";
import { Product } from "../domain/model.js";
import type {
  AllocationRow,
  InMemoryAllocationStore,
  OutOfStockNotification,
} from "./store.js";

type UnitOfWorkState = "open" | "committed" | "rolled_back";

export class UnitOfWorkClosedError extends Error {
  public override name = "UnitOfWorkClosedError";

  constructor(state: UnitOfWorkState) {
    super(`Unit of work is already ${state === "committed" ? "committed" : "rolled back"}`);
  }
}

/**
 * Product repository scoped to one unit of work.
 */
export class ProductRepository {
  /** Products loaded or added in this unit of work, by SKU */
  readonly seen = new Map<string, Product>();
  /** Version at load time; undefined for products created in this unit of work */
  readonly loadedVersions = new Map<string, number | undefined>();

  constructor(private readonly store: InMemoryAllocationStore) {}

  get(sku: string): Product | undefined {
    const seen = this.seen.get(sku);
    if (seen) {
      return seen;
    }
    const state = this.store.getProduct(sku);
    if (!state) {
      return undefined;
    }
    const product = Product.fromState(state);
    this.track(product, state.version);
    return product;
  }

  getByBatchref(reference: string): Product | undefined {
    for (const product of this.seen.values()) {
      if (product.hasBatch(reference)) {
        return product;
      }
    }
    const sku = this.store.findSkuByBatchref(reference);
    return sku === undefined ? undefined : this.get(sku);
  }

  add(product: Product): void {
    if (!this.seen.has(product.sku)) {
      this.track(product, undefined);
    }
  }

  private track(product: Product, version: number | undefined): void {
    this.seen.set(product.sku, product);
    this.loadedVersions.set(product.sku, version);
  }
}

/**
 * Staged writes to the allocations read model.
 */
export class AllocationsView {
  readonly added: AllocationRow[] = [];
  readonly removed: Array<Pick<AllocationRow, "orderid" | "sku">> = [];

  constructor(private readonly store: InMemoryAllocationStore) {}

  has(row: AllocationRow): boolean {
    const staged = this.added.some(
      (r) => r.orderid === row.orderid && r.sku === row.sku && r.batchref === row.batchref
    );
    return (
      staged ||
      this.store
        .listAllocations()
        .some((r) => r.orderid === row.orderid && r.sku === row.sku && r.batchref === row.batchref)
    );
  }

  add(row: AllocationRow): void {
    this.added.push({ ...row });
  }

  remove(orderid: string, sku: string): void {
    this.removed.push({ orderid, sku });
  }
}

export class InMemoryUnitOfWork implements UnitOfWork {
  readonly products: ProductRepository;
  readonly allocations: AllocationsView;
  private readonly notifications: OutOfStockNotification[] = [];
  private state: UnitOfWorkState = "open";

  constructor(
    private readonly store: InMemoryAllocationStore,
    readonly scope?: UnitOfWorkScopeInfo
  ) {
    this.products = new ProductRepository(store);
    this.allocations = new AllocationsView(store);
  }

  /**
   * Stage an out-of-stock notification for delivery on commit.
   */
  notify(notification: OutOfStockNotification): void {
    this.notifications.push({ ...notification });
  }

  get isOpen(): boolean {
    return this.state === "open";
  }

  commit(): void {
    this.assertOpen();
    this.store.apply({
      products: Array.from(this.products.seen.values(), (product) => product.toState()),
      expectedVersions: this.products.loadedVersions,
      allocationsAdded: this.allocations.added,
      allocationsRemoved: this.allocations.removed,
      notifications: this.notifications,
    });
    this.state = "committed";
  }

  rollback(): void {
    if (this.state !== "open") {
      return;
    }
    this.state = "rolled_back";
    this.store.recordRollback();
  }

  *collectNewEvents(): Iterable<RaisedMessage> {
    for (const product of this.products.seen.values()) {
      yield* product.events.splice(0);
    }
  }

  private assertOpen(): void {
    if (this.state !== "open") {
      throw new UnitOfWorkClosedError(this.state);
    }
  }
}
