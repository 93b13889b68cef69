import { createHash } from 'node:crypto';
import stableStringify from 'fast-json-stable-stringify';
import type {
  Capability,
  ConnectorOperations,
  ConnectorResult,
  OperationContext,
} from '../connectors/connector.js';
import type { ExternalRef, NormalizedProduct } from '../connectors/types.js';
import type { EntityKind, SyncAspect } from '../entities/mapping-record.js';
import type { SyncEntityType, SyncScope } from '../entities/sync-job.js';
import type { CatalogSource, InternalOrder } from '../repositories/catalog-source.js';

export const ENTITY_CAPABILITY: Record<SyncEntityType, Capability> = {
  product: 'upsertProduct',
  stock: 'updateStock',
  price: 'updatePrice',
  order_status: 'updateOrderStatus',
};

export const ENTITY_KIND: Record<SyncEntityType, EntityKind> = {
  product: 'product',
  stock: 'product',
  price: 'product',
  order_status: 'order',
};

export const ENTITY_ASPECT: Record<SyncEntityType, SyncAspect> = {
  product: 'product',
  stock: 'stock',
  price: 'price',
  order_status: 'order_status',
};

export type PreparedCall = (ref: ExternalRef, ctx: OperationContext) => ConnectorResult<ExternalRef>;

/** One item of a sync job, ready to be paired with each target integration. */
export interface SyncWork {
  itemId: string;
  entityKind: EntityKind;
  aspect: SyncAspect;
  capability: Capability;
  /** Hash of the payload this work pushes. */
  hash: string;
  /** Hashes recorded on the mapping after a successful push. */
  hashes: Partial<Record<SyncAspect, string>>;
  /** Updates address an existing listing; only product upserts can create one. */
  requiresExternalId: boolean;
  prepare(operations: Partial<ConnectorOperations>): PreparedCall | null;
}

export function payloadHash(value: unknown): string {
  return createHash('sha256').update(stableStringify(value)).digest('hex');
}

export const projectStock = (product: NormalizedProduct) => ({ sku: product.sku, quantity: product.stock });

export const projectPrice = (product: NormalizedProduct) => ({
  sku: product.sku,
  price: product.price,
  listPrice: product.listPrice ?? null,
  currency: product.currency,
});

export const projectOrderStatus = (order: InternalOrder) => ({
  status: order.status,
  trackingNumber: order.trackingNumber ?? null,
  carrier: order.carrier ?? null,
});

function productWork(product: NormalizedProduct): SyncWork {
  const hash = payloadHash(product);
  return {
    itemId: product.id,
    entityKind: 'product',
    aspect: 'product',
    capability: 'upsertProduct',
    hash,
    hashes: {
      product: hash,
      stock: payloadHash(projectStock(product)),
      price: payloadHash(projectPrice(product)),
    },
    requiresExternalId: false,
    prepare: (operations) => {
      const upsert = operations.upsertProduct;
      return upsert ? (ref, ctx) => upsert(product, ref, ctx) : null;
    },
  };
}

function stockWork(product: NormalizedProduct): SyncWork {
  const hash = payloadHash(projectStock(product));
  return {
    itemId: product.id,
    entityKind: 'product',
    aspect: 'stock',
    capability: 'updateStock',
    hash,
    hashes: { stock: hash },
    requiresExternalId: true,
    prepare: (operations) => {
      const update = operations.updateStock;
      return update
        ? (ref, ctx) => update({ id: product.id, sku: product.sku, quantity: product.stock }, ref, ctx)
        : null;
    },
  };
}

function priceWork(product: NormalizedProduct): SyncWork {
  const hash = payloadHash(projectPrice(product));
  return {
    itemId: product.id,
    entityKind: 'product',
    aspect: 'price',
    capability: 'updatePrice',
    hash,
    hashes: { price: hash },
    requiresExternalId: true,
    prepare: (operations) => {
      const update = operations.updatePrice;
      return update
        ? (ref, ctx) =>
            update(
              {
                id: product.id,
                sku: product.sku,
                price: product.price,
                listPrice: product.listPrice,
                currency: product.currency,
              },
              ref,
              ctx,
            )
        : null;
    },
  };
}

function orderStatusWork(order: InternalOrder): SyncWork {
  const hash = payloadHash(projectOrderStatus(order));
  return {
    itemId: order.id,
    entityKind: 'order',
    aspect: 'order_status',
    capability: 'updateOrderStatus',
    hash,
    hashes: { order_status: hash },
    requiresExternalId: true,
    prepare: (operations) => {
      const update = operations.updateOrderStatus;
      return update
        ? (ref, ctx) =>
            update(
              {
                id: order.id,
                status: order.status,
                trackingNumber: order.trackingNumber,
                carrier: order.carrier,
              },
              ref,
              ctx,
            )
        : null;
    },
  };
}

export async function loadWork(
  catalog: CatalogSource,
  entityType: SyncEntityType,
  scope: SyncScope,
): Promise<SyncWork[]> {
  switch (entityType) {
    case 'product':
      return (await catalog.loadProducts(scope)).map(productWork);
    case 'stock':
      return (await catalog.loadProducts(scope)).map(stockWork);
    case 'price':
      return (await catalog.loadProducts(scope)).map(priceWork);
    case 'order_status':
      return (await catalog.loadOrders(scope)).map(orderStatusWork);
  }
}
