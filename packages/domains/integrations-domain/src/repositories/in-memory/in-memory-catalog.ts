import type { NormalizedProduct } from '../../connectors/types.js';
import type { SyncScope } from '../../entities/sync-job.js';
import type {
  CatalogSource,
  InternalOrder,
  OrderStateChange,
  OrderStateStore,
} from '../catalog-source.js';

interface Timestamped<T> {
  value: T;
  updatedAt: Date;
}

function select<T extends { id: string }>(
  rows: Map<string, Timestamped<T>>,
  scope: SyncScope,
): T[] {
  switch (scope.kind) {
    case 'all':
      return [...rows.values()].map((row) => row.value);
    case 'ids':
      return scope.ids.flatMap((id) => {
        const row = rows.get(id);
        return row ? [row.value] : [];
      });
    case 'changed_since':
      return [...rows.values()]
        .filter((row) => row.updatedAt > scope.since)
        .map((row) => row.value);
  }
}

/** Process-local catalog and order store for tests and database-less runs. */
export class InMemoryCatalog implements CatalogSource, OrderStateStore {
  private readonly products = new Map<string, Timestamped<NormalizedProduct>>();
  private readonly orders = new Map<string, Timestamped<InternalOrder>>();

  putProduct(product: NormalizedProduct, updatedAt: Date = new Date()): void {
    this.products.set(product.id, { value: { ...product }, updatedAt });
  }

  putOrder(order: InternalOrder): void {
    this.orders.set(order.id, { value: { ...order }, updatedAt: order.updatedAt });
  }

  async loadProducts(scope: SyncScope): Promise<NormalizedProduct[]> {
    return select(this.products, scope);
  }

  async loadOrders(scope: SyncScope): Promise<InternalOrder[]> {
    return select(this.orders, scope);
  }

  async listChangedSince(kind: 'product' | 'order', since: Date): Promise<string[]> {
    const rows: Map<string, Timestamped<{ id: string }>> =
      kind === 'product' ? this.products : this.orders;
    return [...rows.values()].filter((row) => row.updatedAt > since).map((row) => row.value.id);
  }

  async apply(change: OrderStateChange): Promise<boolean> {
    const current = this.orders.get(change.orderId);
    if (current && current.updatedAt > change.occurredAt) return false;
    const order: InternalOrder = {
      ...(current?.value ?? { id: change.orderId }),
      status: change.status,
      updatedAt: change.occurredAt,
    };
    this.orders.set(change.orderId, { value: order, updatedAt: change.occurredAt });
    return true;
  }

  async get(orderId: string): Promise<InternalOrder | null> {
    const row = this.orders.get(orderId);
    return row ? { ...row.value } : null;
  }
}
