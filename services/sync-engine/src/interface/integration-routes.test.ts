import { jsonResponse, TEST_CREDENTIALS } from '@marketsync/integrations-domain/testing';
import { describe, expect, it, vi } from 'vitest';
import { z } from 'zod';
import { createTestApp, jsonRequest } from './test-app.js';

const CreatedSchema = z.object({ id: z.string() });

async function createIntegration(app: ReturnType<typeof createTestApp>['app'], body: unknown) {
  const res = await app.request('/integrations', jsonRequest('POST', body));
  expect(res.status).toBe(201);
  return CreatedSchema.parse(await res.json()).id;
}

describe('integration routes', () => {
  it('creates an integration with a closed circuit and no credentials', async () => {
    const { app } = createTestApp();

    const res = await app.request('/integrations', jsonRequest('POST', { platformName: 'trendyol', name: 'Main store' }));

    expect(res.status).toBe(201);
    expect(await res.json()).toMatchObject({
      platformName: 'trendyol',
      category: 'marketplace',
      name: 'Main store',
      credentialsConfigured: false,
      circuitState: 'closed',
      healthState: 'unknown',
      lastSyncAt: null,
    });
  });

  it('rejects an unknown platform', async () => {
    const { app } = createTestApp();
    const res = await app.request('/integrations', jsonRequest('POST', { platformName: 'amazon' }));
    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ error: 'VALIDATION_ERROR' });
  });

  it('answers 400 when credentials fail validation and stores nothing', async () => {
    const { app, core } = createTestApp();
    const id = await createIntegration(app, { platformName: 'n11' });

    const res = await app.request(
      `/integrations/${id}/credentials`,
      jsonRequest('PUT', { apiKey: 'YOUR_API_KEY', apiSecret: 'changeme' }),
    );

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ error: 'VALIDATION_ERROR', message: 'Credentials failed validation' });
    expect(await core.repositories.credentials.findByIntegration(id)).toBeNull();
  });

  it('stores valid credentials and lists the integration as usable', async () => {
    const { app } = createTestApp();
    const id = await createIntegration(app, { platformName: 'n11' });

    const res = await app.request(`/integrations/${id}/credentials`, jsonRequest('PUT', TEST_CREDENTIALS.n11));
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ valid: true, warnings: [] });

    const list = await app.request('/integrations');
    const body = z
      .object({ data: z.array(z.object({ id: z.string(), credentialsValid: z.boolean() })), total: z.number() })
      .parse(await list.json());
    expect(body.total).toBe(1);
    expect(body.data[0]).toEqual(expect.objectContaining({ id, credentialsValid: true }));
  });

  it('never echoes secrets back', async () => {
    const { app } = createTestApp();
    const id = await createIntegration(app, { platformName: 'trendyol' });
    await app.request(`/integrations/${id}/credentials`, jsonRequest('PUT', TEST_CREDENTIALS.trendyol));

    const text = await (await app.request(`/integrations/${id}`)).text();
    expect(text).not.toContain('test-secret');
    expect(text).not.toContain('test-webhook-secret');
  });

  it('updates settings in place', async () => {
    const { app } = createTestApp();
    const id = await createIntegration(app, { platformName: 'etsy' });

    const res = await app.request(
      `/integrations/${id}/settings`,
      jsonRequest('PUT', { name: 'Etsy shop', settings: { rateLimitPerSecond: 2, sandboxMode: true } }),
    );

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      name: 'Etsy shop',
      sandboxMode: true,
      settings: { rateLimitPerSecond: 2, sandboxMode: true },
    });
  });

  it('rejects out-of-range settings', async () => {
    const { app } = createTestApp();
    const id = await createIntegration(app, { platformName: 'etsy' });
    const res = await app.request(`/integrations/${id}/settings`, jsonRequest('PUT', { settings: { retryMaxAttempts: 0 } }));
    expect(res.status).toBe(400);
  });

  it('soft-deletes and then reports the integration as missing', async () => {
    const { app, core } = createTestApp();
    const id = await createIntegration(app, { platformName: 'stripe' });

    expect((await app.request(`/integrations/${id}`, { method: 'DELETE' })).status).toBe(204);
    expect((await app.request(`/integrations/${id}`)).status).toBe(404);
    expect((await core.repositories.integrations.findById(id))?.deletedAt).toBeInstanceOf(Date);
  });

  it('answers 404 for ids that cannot exist', async () => {
    const { app } = createTestApp();
    const res = await app.request('/integrations/42');
    expect(res.status).toBe(404);
    expect(await res.json()).toMatchObject({ error: 'NOT_FOUND', message: 'Integration 42 not found' });
  });

  it('runs a health check through the connector', async () => {
    const { app, core } = createTestApp({
      handler: () => jsonResponse({ page: 0, totalPages: 0, content: [] }),
    });
    const id = await core.addIntegration('trendyol');

    const res = await app.request(`/integrations/${id}/health-check`, { method: 'POST' });

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ healthState: 'healthy', error: null });
    expect(core.requests[0]?.url).toBe('https://api.trendyol.com/sapigw/suppliers/1234/products?page=0&size=1');
  });

  it('imports platform orders since a given instant', async () => {
    const { app, core } = createTestApp({
      handler: () =>
        jsonResponse({
          page: 0,
          totalPages: 1,
          content: [
            { orderNumber: '900', status: 'Created', totalPrice: 40, orderDate: Date.parse('2026-02-01T00:00:00.000Z') },
          ],
        }),
    });
    const id = await core.addIntegration('trendyol');

    const res = await app.request(
      `/integrations/${id}/orders/import`,
      jsonRequest('POST', { since: '2026-01-15T00:00:00.000Z' }),
    );

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      integrationId: id,
      pages: 1,
      fetched: 1,
      created: 1,
      updated: 0,
      unchanged: 0,
      stale: 0,
      unmapped: 0,
      error: null,
    });
    expect(new URL(core.requests[0]?.url ?? '').searchParams.get('startDate')).toBe(
      String(Date.parse('2026-01-15T00:00:00.000Z')),
    );
    expect((await core.mappings.findByExternalId(id, '900'))?.entityKind).toBe('order');
  });

  it('answers 501 for an order import on a platform without order listing', async () => {
    const { app, core } = createTestApp();
    const id = await core.addIntegration('stripe');

    const res = await app.request(`/integrations/${id}/orders/import`, { method: 'POST' });

    expect(res.status).toBe(501);
    expect(await res.json()).toMatchObject({
      error: 'UNSUPPORTED_OPERATION',
      message: 'stripe does not support listOrders',
    });
  });

  it('hides unexpected failures behind a 500 and logs them', async () => {
    const { app, core } = createTestApp();
    vi.spyOn(core.integrations, 'list').mockRejectedValue(new Error('connection reset'));

    const res = await app.request('/integrations', { headers: { 'X-Request-Id': 'req-1' } });

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({
      error: 'INTERNAL_ERROR',
      message: 'An unexpected error occurred',
      requestId: 'req-1',
    });
    expect(
      core.logEntries.some((entry) => entry.level === 'error' && entry.msg === 'Unhandled error'),
    ).toBe(true);
  });
});
