import { describe, expect, it } from 'vitest';
import { jsonResponse, type FakeHandler } from '../testing/fake-fetch.js';
import { createTestCore } from '../testing/test-core.js';

const ORDER_DATE = Date.parse('2026-02-01T00:00:00.000Z');

function platformOrder(orderNumber: string, status: string) {
  return { orderNumber, status, currencyCode: 'TRY', totalPrice: 120, orderDate: ORDER_DATE, lines: [] };
}

const pages: FakeHandler = (request) =>
  request.url.includes('page=1')
    ? jsonResponse({ page: 1, totalPages: 2, content: [platformOrder('555', 'Shipped')] })
    : jsonResponse({
        page: 0,
        totalPages: 2,
        content: [platformOrder('900', 'Created'), platformOrder('901', 'Shipped')],
      });

describe('OrderImporter', () => {
  it('links orders seen for the first time and updates known ones', async () => {
    const core = createTestCore(pages);
    const integrationId = await core.addIntegration('trendyol');
    await core.mappings.link({ internalEntityId: 'o1', entityKind: 'order', integrationId, externalId: '555' });
    core.catalog.putOrder({ id: 'o1', status: 'created', updatedAt: new Date('2026-01-01T00:00:00.000Z') });

    const result = await core.orderImport.importOrders(integrationId);

    expect(result.getValue()).toEqual({
      integrationId,
      pages: 2,
      fetched: 3,
      created: 2,
      updated: 1,
      unchanged: 0,
      stale: 0,
      unmapped: 0,
      error: null,
    });
    expect(core.requests.map((request) => new URL(request.url).pathname)).toEqual([
      '/sapigw/suppliers/1234/orders',
      '/sapigw/suppliers/1234/orders',
    ]);

    const mapping = await core.mappings.findByExternalId(integrationId, '900');
    expect(mapping?.entityKind).toBe('order');
    expect(mapping?.syncState).toBe('synced');
    const imported = await core.catalog.get(mapping?.internalEntityId ?? '');
    expect(imported).toEqual({
      id: mapping?.internalEntityId,
      status: 'created',
      updatedAt: new Date(ORDER_DATE),
    });
    expect((await core.catalog.get('o1'))?.status).toBe('shipped');

    const echo = await core.orchestrator.runSync('order_status', { kind: 'all' });
    expect(echo.entries.map((entry) => entry.errorKind)).toEqual(['unchanged', 'unchanged', 'unchanged']);
    expect(core.requests).toHaveLength(2);
  });

  it('reports known orders as unchanged on a second import', async () => {
    const core = createTestCore(pages);
    const integrationId = await core.addIntegration('trendyol');
    await core.orderImport.importOrders(integrationId);

    const again = await core.orderImport.importOrders(integrationId);

    expect(again.getValue()).toMatchObject({ fetched: 3, created: 0, updated: 0, unchanged: 3 });
    expect(await core.repositories.mappings.findByIntegration(integrationId)).toHaveLength(3);
  });

  it('passes the since filter and keeps the pages read before a failure', async () => {
    const core = createTestCore((request) =>
      request.url.includes('page=1') ? jsonResponse({ errors: ['bad page'] }, 400) : pages(request),
    );
    const integrationId = await core.addIntegration('trendyol');
    const since = new Date('2026-01-15T00:00:00.000Z');

    const result = await core.orderImport.importOrders(integrationId, { since, pageSize: 2 });

    expect(result.getValue()).toMatchObject({
      pages: 1,
      fetched: 2,
      created: 2,
      error: { kind: 'remote_validation', message: 'Remote rejected request (HTTP 400)' },
    });
    const first = new URL(core.requests[0]?.url ?? '');
    expect(first.searchParams.get('startDate')).toBe(String(since.getTime()));
    expect(first.searchParams.get('size')).toBe('2');
  });

  it('refuses platforms without order listing and unknown integrations', async () => {
    const core = createTestCore();
    const stripeId = await core.addIntegration('stripe');

    const unsupported = await core.orderImport.importOrders(stripeId);
    expect(unsupported.isFailure).toBe(true);
    expect(unsupported.getError()).toMatchObject({
      kind: 'unsupported_operation',
      message: 'stripe does not support listOrders',
    });

    const missing = await core.orderImport.importOrders('00000000-0000-4000-8000-000000000000');
    expect(missing.getError()).toMatchObject({ kind: 'not_configured' });
    expect(core.requests).toHaveLength(0);
  });
});
