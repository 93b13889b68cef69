import { describe, expect, it } from 'vitest';
import { InMemoryCatalog } from '../repositories/in-memory/in-memory-catalog.js';
import { InMemoryMappingRepository } from '../repositories/in-memory/in-memory-mapping-repository.js';
import { MappingStore } from './mapping-store.js';
import { OrderStatusReconciler } from './order-status-reconciler.js';

const INTEGRATION = 'int-1';

function setup() {
  const orders = new InMemoryCatalog();
  const repository = new InMemoryMappingRepository();
  const mappings = new MappingStore(repository);
  return { orders, repository, reconciler: new OrderStatusReconciler({ orders, mappings }) };
}

const at = (iso: string) => new Date(iso);

describe('OrderStatusReconciler', () => {
  it('creates one internal order when the same platform order arrives twice at once', async () => {
    const { repository, reconciler } = setup();
    const state = { externalId: '900', status: 'created' as const, occurredAt: at('2026-02-01T00:00:00.000Z') };

    const outcomes = await Promise.all([
      reconciler.reconcile(INTEGRATION, state, { createMissing: true }),
      reconciler.reconcile(INTEGRATION, state, { createMissing: true }),
    ]);

    expect(outcomes.filter((outcome) => outcome === 'created')).toHaveLength(1);
    expect(await repository.findByIntegration(INTEGRATION)).toHaveLength(1);
  });

  it('leaves unknown orders alone unless asked to create them', async () => {
    const { repository, reconciler } = setup();

    const outcome = await reconciler.reconcile(
      INTEGRATION,
      { externalId: '901', status: 'shipped', occurredAt: at('2026-02-01T00:00:00.000Z') },
      { createMissing: false },
    );

    expect(outcome).toBe('unmapped');
    expect(await repository.findByIntegration(INTEGRATION)).toEqual([]);
  });

  it('does not link a platform id that already belongs to a product', async () => {
    const { orders, repository, reconciler } = setup();
    await new MappingStore(repository).link({
      internalEntityId: 'p1',
      entityKind: 'product',
      integrationId: INTEGRATION,
      externalId: 'SKU-1',
    });

    const outcome = await reconciler.reconcile(
      INTEGRATION,
      { externalId: 'SKU-1', status: 'created', occurredAt: at('2026-02-01T00:00:00.000Z') },
      { createMissing: true },
    );

    expect(outcome).toBe('unmapped');
    expect(await orders.get('p1')).toBeNull();
  });

  it('reports an older state as stale and keeps the newer one', async () => {
    const { orders, reconciler } = setup();
    await reconciler.reconcile(
      INTEGRATION,
      { externalId: '902', status: 'delivered', occurredAt: at('2026-03-01T00:00:00.000Z') },
      { createMissing: true },
    );

    const outcome = await reconciler.reconcile(
      INTEGRATION,
      { externalId: '902', status: 'shipped', occurredAt: at('2026-02-01T00:00:00.000Z') },
      { createMissing: false },
    );

    expect(outcome).toBe('stale');
    const [order] = await orders.loadOrders({ kind: 'all' });
    expect(order?.status).toBe('delivered');
  });
});
