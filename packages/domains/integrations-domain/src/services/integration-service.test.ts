import { NotFoundError, ValidationError } from '@marketsync/domain-kernel';
import { describe, expect, it } from 'vitest';
import { jsonResponse } from '../testing/fake-fetch.js';
import { createTestCore, TEST_CREDENTIALS } from '../testing/test-core.js';

describe('IntegrationService', () => {
  it('creates integrations with the platform category and reports missing credentials', async () => {
    const core = createTestCore();
    const integration = await core.integrations.create({ platformName: 'stripe', settings: {} });

    expect(integration.category).toBe('payment');
    expect(integration.name).toBe('stripe');

    const status = await core.integrations.status(integration.id);
    expect(status).toMatchObject({
      platformName: 'stripe',
      credentialsConfigured: false,
      credentialsValid: false,
      credentialsError: `Integration ${integration.id} is not configured: no credentials stored`,
      circuitState: 'closed',
      healthState: 'unknown',
      capabilities: [],
    });
    expect(status.settings.rateLimitPerSecond).toBe(25);
  });

  it('lists capabilities once credentials are stored', async () => {
    const core = createTestCore();
    const id = await core.addIntegration('trendyol');
    const status = await core.integrations.status(id);
    expect(status.credentialsValid).toBe(true);
    expect(status.capabilities).toEqual([
      'listProducts',
      'upsertProduct',
      'updateStock',
      'updatePrice',
      'listOrders',
      'updateOrderStatus',
      'listCategories',
    ]);
  });

  it('rejects credentials that fail validation', async () => {
    const core = createTestCore();
    const integration = await core.integrations.create({ platformName: 'n11', settings: {} });
    const result = await core.integrations.configureCredentials({
      integrationId: integration.id,
      credentials: { apiKey: 'test-key' },
    });
    expect(result.getError()).toBeInstanceOf(ValidationError);
    expect((await core.integrations.status(integration.id)).credentialsConfigured).toBe(false);
  });

  it('applies settings patches and renames', async () => {
    const core = createTestCore();
    const id = await core.addIntegration('etsy');

    await core.integrations.updateSettings({ integrationId: id, name: 'Etsy shop', settings: { maxConcurrency: 2 } });

    const status = await core.integrations.status(id);
    expect(status.name).toBe('Etsy shop');
    expect(status.settings.maxConcurrency).toBe(2);
    expect(status.settings.rateLimitBurst).toBe(10);
  });

  it('hides removed integrations', async () => {
    const core = createTestCore();
    const id = await core.addIntegration('n11');
    await core.integrations.remove(id);

    expect(await core.integrations.list()).toEqual([]);
    await expect(core.integrations.status(id)).rejects.toBeInstanceOf(NotFoundError);
    expect((await core.registry.resolve(id)).isFailure).toBe(true);
  });

  it('classifies health check results', async () => {
    let status = 200;
    const core = createTestCore(() => jsonResponse({ page: 0, totalPages: 0, content: [] }, status));
    const id = await core.addIntegration('trendyol');

    expect(await core.integrations.healthCheck(id)).toMatchObject({ healthState: 'healthy', error: null });
    expect(core.requests[0]?.url).toBe('https://api.trendyol.com/sapigw/suppliers/1234/products?page=0&size=1');

    status = 500;
    expect(await core.integrations.healthCheck(id)).toMatchObject({
      healthState: 'unreachable',
      error: 'Remote server error (HTTP 500)',
    });

    status = 401;
    expect(await core.integrations.healthCheck(id)).toMatchObject({ healthState: 'degraded' });
    expect((await core.integrations.status(id)).healthState).toBe('degraded');
  });

  it('does not bring back an integration removed while its health check ran', async () => {
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    let markStarted: () => void = () => undefined;
    const started = new Promise<void>((resolve) => {
      markStarted = resolve;
    });
    const core = createTestCore(async () => {
      markStarted();
      await gate;
      return jsonResponse({ page: 0, totalPages: 0, content: [] });
    });
    const id = await core.addIntegration('trendyol');

    const check = core.integrations.healthCheck(id);
    await started;
    await core.integrations.remove(id);
    release();

    expect((await check).healthState).toBe('healthy');
    const stored = await core.repositories.integrations.findById(id);
    expect(stored?.deletedAt).toBeInstanceOf(Date);
    expect(stored?.healthState).toBe('unknown');
    expect(await core.integrations.list()).toEqual([]);
  });

  it('keeps settings changed while its health check ran', async () => {
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    let markStarted: () => void = () => undefined;
    const started = new Promise<void>((resolve) => {
      markStarted = resolve;
    });
    const core = createTestCore(async () => {
      markStarted();
      await gate;
      return jsonResponse({ page: 0, totalPages: 0, content: [] });
    });
    const id = await core.addIntegration('trendyol');

    const check = core.integrations.healthCheck(id);
    await started;
    await core.integrations.updateSettings({ integrationId: id, name: 'Renamed', settings: { maxConcurrency: 3 } });
    release();
    await check;

    const status = await core.integrations.status(id);
    expect(status.name).toBe('Renamed');
    expect(status.settings.maxConcurrency).toBe(3);
    expect(status.healthState).toBe('healthy');
  });

  it('reports an unresolvable integration as degraded', async () => {
    const core = createTestCore();
    const integration = await core.integrations.create({ platformName: 'trendyol', settings: {} });
    const result = await core.integrations.healthCheck(integration.id);
    expect(result.healthState).toBe('degraded');
    expect(core.requests).toHaveLength(0);
  });

  it('never stores plaintext or logs secrets', async () => {
    const core = createTestCore();
    const id = await core.addIntegration('stripe');
    const row = await core.repositories.credentials.findByIntegration(id);
    const secret = String(TEST_CREDENTIALS.stripe.secretKey);
    expect(row?.ciphertext).not.toContain(secret);
    expect(JSON.stringify(core.logEntries)).not.toContain(secret);
  });
});
