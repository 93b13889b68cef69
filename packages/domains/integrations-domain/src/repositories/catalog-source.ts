import type { NormalizedProduct, OrderStatus } from '../connectors/types.js';
import type { SyncScope } from '../entities/sync-job.js';

/** Read side of the internal store that outbound sync pushes from. */
export interface CatalogSource {
  loadProducts(scope: SyncScope): Promise<NormalizedProduct[]>;
  loadOrders(scope: SyncScope): Promise<InternalOrder[]>;
  listChangedSince(kind: 'product' | 'order', since: Date): Promise<string[]>;
}

export interface InternalOrder {
  id: string;
  status: OrderStatus;
  trackingNumber?: string;
  carrier?: string;
  updatedAt: Date;
}

export interface OrderStateChange {
  orderId: string;
  status: OrderStatus;
  source: { integrationId: string; externalId: string };
  occurredAt: Date;
}

/** Write side for inbound order and payment events. */
export interface OrderStateStore {
  /** Returns false when the change is older than the stored state and was not applied. */
  apply(change: OrderStateChange): Promise<boolean>;
  get(orderId: string): Promise<InternalOrder | null>;
}
