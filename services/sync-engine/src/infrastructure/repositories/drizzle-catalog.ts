import {
  NormalizedProductSchema,
  OrderStatusSchema,
  type CatalogSource,
  type InternalOrder,
  type NormalizedProduct,
  type OrderStateChange,
  type OrderStateStore,
  type SyncScope,
} from '@marketsync/integrations-domain';
import { catalogItems, orderStates } from '@marketsync/integrations-domain/drizzle';
import type { Database } from '@marketsync/process-lib';
import { eq, gt, inArray, lte, type SQL } from 'drizzle-orm';
import type { AnyPgColumn } from 'drizzle-orm/pg-core';

type OrderRow = typeof orderStates.$inferSelect;

function toOrder(row: OrderRow): InternalOrder {
  return {
    id: row.id,
    status: OrderStatusSchema.parse(row.status),
    trackingNumber: row.trackingNumber ?? undefined,
    carrier: row.carrier ?? undefined,
    updatedAt: row.updatedAt,
  };
}

function scopeFilter(
  scope: SyncScope,
  columns: { id: AnyPgColumn; updatedAt: AnyPgColumn },
): SQL | undefined {
  switch (scope.kind) {
    case 'all':
      return undefined;
    case 'ids':
      return inArray(columns.id, scope.ids);
    case 'changed_since':
      return gt(columns.updatedAt, scope.since);
  }
}

/** Reads the internal catalog and writes inbound order state. */
export class DrizzleCatalog implements CatalogSource, OrderStateStore {
  constructor(private readonly db: Database) {}

  async loadProducts(scope: SyncScope): Promise<NormalizedProduct[]> {
    const rows = await this.db.select().from(catalogItems).where(scopeFilter(scope, catalogItems));
    return rows.map((row) => NormalizedProductSchema.parse(row.payload));
  }

  async loadOrders(scope: SyncScope): Promise<InternalOrder[]> {
    const rows = await this.db.select().from(orderStates).where(scopeFilter(scope, orderStates));
    return rows.map(toOrder);
  }

  async listChangedSince(kind: 'product' | 'order', since: Date): Promise<string[]> {
    const rows =
      kind === 'product'
        ? await this.db
            .select({ id: catalogItems.id })
            .from(catalogItems)
            .where(gt(catalogItems.updatedAt, since))
        : await this.db
            .select({ id: orderStates.id })
            .from(orderStates)
            .where(gt(orderStates.updatedAt, since));
    return rows.map((row) => row.id);
  }

  /** Applies the change unless the stored row is newer. */
  async apply(change: OrderStateChange): Promise<boolean> {
    const applied = await this.db
      .insert(orderStates)
      .values({
        id: change.orderId,
        status: change.status,
        source: change.source,
        updatedAt: change.occurredAt,
      })
      .onConflictDoUpdate({
        target: orderStates.id,
        set: { status: change.status, source: change.source, updatedAt: change.occurredAt },
        setWhere: lte(orderStates.updatedAt, change.occurredAt),
      })
      .returning({ id: orderStates.id });
    return applied.length > 0;
  }

  async get(orderId: string): Promise<InternalOrder | null> {
    const [row] = await this.db.select().from(orderStates).where(eq(orderStates.id, orderId));
    return row ? toOrder(row) : null;
  }
}
