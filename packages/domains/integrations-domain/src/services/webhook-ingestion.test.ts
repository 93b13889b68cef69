import { NotFoundError } from '@marketsync/domain-kernel';
import { describe, expect, it, vi } from 'vitest';
import { hmac } from '../connectors/signing.js';
import { createTestCore } from '../testing/test-core.js';
import type { WebhookHandler } from './webhook-handlers.js';

function delivery(overrides: Record<string, unknown> = {}) {
  const body = JSON.stringify({
    eventId: 'evt-1',
    eventType: 'OrderStatusChanged',
    orderNumber: '555',
    status: 'Shipped',
    timestamp: Date.parse('2026-01-01T00:00:00.000Z'),
    ...overrides,
  });
  return { body, headers: { 'x-trendyol-signature': hmac('sha256', 'test-webhook-secret', body, 'hex') } };
}

async function setup() {
  const core = createTestCore();
  const integrationId = await core.addIntegration('trendyol');
  return { core, integrationId };
}

describe('WebhookIngestion', () => {
  it('applies a verified order event and suppresses the outbound echo', async () => {
    const { core, integrationId } = await setup();
    await core.mappings.link({ internalEntityId: 'o1', entityKind: 'order', integrationId, externalId: '555' });
    core.catalog.putOrder({ id: 'o1', status: 'created', updatedAt: new Date('2025-12-31T00:00:00.000Z') });

    const { body, headers } = delivery();
    const receipt = await core.webhooks.receive(integrationId, body, headers);
    expect(receipt).toMatchObject({ kind: 'ack', duplicate: false });
    await core.queue.drain();

    expect((await core.catalog.get('o1'))?.status).toBe('shipped');
    if (receipt.kind !== 'ack') throw new Error('expected an ack');
    const stored = await core.repositories.webhookEvents.findById(receipt.eventId);
    expect(stored?.outcome).toBe('processed');
    expect(stored?.attempts).toBe(1);

    const echo = await core.orchestrator.runSync('order_status', { kind: 'ids', ids: ['o1'] });
    expect(echo.entries[0]?.errorKind).toBe('unchanged');
    expect(core.requests).toHaveLength(0);
  });

  it('acknowledges a replay without processing it twice', async () => {
    const { core, integrationId } = await setup();
    const handler = vi.fn<WebhookHandler>(async () => 'processed');
    core.handlers.register('order.status_changed', handler, { integrationId });
    const { body, headers } = delivery();

    const first = await core.webhooks.receive(integrationId, body, headers);
    const second = await core.webhooks.receive(integrationId, body, headers);
    await core.queue.drain();

    if (first.kind !== 'ack') throw new Error('expected an ack');
    expect(second).toEqual({ kind: 'ack', eventId: first.eventId, duplicate: true });
    expect(handler).toHaveBeenCalledTimes(1);
    expect(handler).toHaveBeenCalledWith(
      expect.objectContaining({ type: 'order.status_changed', externalId: '555', status: 'shipped' }),
      { integrationId, eventId: first.eventId },
    );
  });

  it('rejects a bad signature without persisting anything', async () => {
    const { core, integrationId } = await setup();
    const { body } = delivery();

    const receipt = await core.webhooks.receive(integrationId, body, { 'x-trendyol-signature': 'deadbeef' });

    expect(receipt).toEqual({ kind: 'reject', reason: 'invalid_signature', message: 'Signature mismatch' });
    const stored = await core.repositories.webhookEvents.findUnprocessed({
      receivedBefore: new Date(Date.now() + 60_000),
      limit: 10,
    });
    expect(stored).toEqual([]);
    expect(core.logEntries.some((entry) => entry.level === 'warn' && entry.msg === 'webhook rejected')).toBe(true);
  });

  it('keeps a failed event for the sweep to retry', async () => {
    const { core, integrationId } = await setup();
    const handler = vi
      .fn<WebhookHandler>()
      .mockRejectedValueOnce(new Error('order store offline'))
      .mockResolvedValue('processed');
    core.handlers.register('order.status_changed', handler, { integrationId });
    const { body, headers } = delivery();

    const receipt = await core.webhooks.receive(integrationId, body, headers);
    await core.queue.drain();
    if (receipt.kind !== 'ack') throw new Error('expected an ack');

    const failed = await core.repositories.webhookEvents.findById(receipt.eventId);
    expect(failed?.isProcessed()).toBe(false);
    expect(failed?.attempts).toBe(1);
    expect(failed?.lastError).toBe('order store offline');

    const requeued = await core.webhooks.sweep({ minAgeMs: 0, now: new Date(Date.now() + 1_000) });
    await core.queue.drain();

    expect(requeued).toBe(1);
    const processed = await core.repositories.webhookEvents.findById(receipt.eventId);
    expect(processed?.outcome).toBe('processed');
    expect(processed?.attempts).toBe(2);
    expect(handler).toHaveBeenCalledTimes(2);
  });

  it('links an order first announced by an order-created event', async () => {
    const { core, integrationId } = await setup();
    const { body, headers } = delivery({ eventId: 'evt-new', eventType: 'OrderCreated', orderNumber: '900' });

    const receipt = await core.webhooks.receive(integrationId, body, headers);
    await core.queue.drain();
    if (receipt.kind !== 'ack') throw new Error('expected an ack');

    expect((await core.repositories.webhookEvents.findById(receipt.eventId))?.outcome).toBe('processed');
    const mapping = await core.mappings.findByExternalId(integrationId, '900');
    expect(mapping?.entityKind).toBe('order');
    expect(mapping?.syncState).toBe('synced');
    expect(await core.catalog.get(mapping?.internalEntityId ?? '')).toEqual({
      id: mapping?.internalEntityId,
      status: 'created',
      updatedAt: new Date('2026-01-01T00:00:00.000Z'),
    });
  });

  it('keeps sweeping when one event cannot be re-queued', async () => {
    const { core, integrationId } = await setup();
    const handler = vi
      .fn<WebhookHandler>()
      .mockRejectedValueOnce(new Error('order store offline'))
      .mockRejectedValueOnce(new Error('order store offline'))
      .mockResolvedValue('processed');
    core.handlers.register('order.status_changed', handler, { integrationId });
    const eventIds: string[] = [];
    for (const eventId of ['evt-a', 'evt-b']) {
      const { body, headers } = delivery({ eventId });
      const receipt = await core.webhooks.receive(integrationId, body, headers);
      if (receipt.kind !== 'ack') throw new Error('expected an ack');
      eventIds.push(receipt.eventId);
    }
    await core.queue.drain();

    vi.spyOn(core.queue, 'enqueue').mockRejectedValueOnce(new Error('queue unavailable'));
    const requeued = await core.webhooks.sweep({ minAgeMs: 0, now: new Date(Date.now() + 1_000) });
    await core.queue.drain();

    expect(requeued).toBe(1);
    const stored = await Promise.all(eventIds.map((id) => core.repositories.webhookEvents.findById(id)));
    expect(stored.filter((event) => event?.isProcessed())).toHaveLength(1);
    expect(
      core.logEntries.some((entry) => entry.level === 'error' && entry.msg === 'webhook re-queue failed'),
    ).toBe(true);
  });

  it('records unmapped, stale and unknown events without failing', async () => {
    const { core, integrationId } = await setup();
    await core.mappings.link({ internalEntityId: 'o2', entityKind: 'order', integrationId, externalId: '777' });
    core.catalog.putOrder({ id: 'o2', status: 'delivered', updatedAt: new Date('2026-06-01T00:00:00.000Z') });

    const outcomes: Array<string | null> = [];
    for (const overrides of [
      { eventId: 'evt-unmapped', orderNumber: '999' },
      { eventId: 'evt-stale', orderNumber: '777' },
      { eventId: 'evt-claim', eventType: 'ClaimCreated' },
    ]) {
      const { body, headers } = delivery(overrides);
      const receipt = await core.webhooks.receive(integrationId, body, headers);
      await core.queue.drain();
      if (receipt.kind !== 'ack') throw new Error('expected an ack');
      outcomes.push((await core.repositories.webhookEvents.findById(receipt.eventId))?.outcome ?? null);
    }

    expect(outcomes).toEqual(['unmapped', 'ignored', 'ignored']);
    expect((await core.catalog.get('o2'))?.status).toBe('delivered');
  });

  it('routes platform deliveries to the single active integration', async () => {
    const core = createTestCore();
    const { body, headers } = delivery();

    expect(await core.webhooks.receiveForPlatform('trendyol', body, headers)).toEqual({
      kind: 'reject',
      reason: 'unknown_integration',
      message: 'No active trendyol integration',
    });

    const first = await core.addIntegration('trendyol');
    expect(await core.webhooks.receiveForPlatform('trendyol', body, headers)).toMatchObject({ kind: 'ack' });

    await core.addIntegration('trendyol');
    expect(await core.webhooks.receiveForPlatform('trendyol', body, headers)).toMatchObject({
      kind: 'reject',
      reason: 'unknown_integration',
    });
    expect(await core.webhooks.receiveForPlatform('trendyol', body, headers, first)).toMatchObject({
      kind: 'ack',
      duplicate: true,
    });
    expect(await core.webhooks.receiveForPlatform('stripe', body, headers, first)).toMatchObject({
      kind: 'reject',
      reason: 'unknown_integration',
    });
    await core.queue.drain();
  });

  it('refuses platforms that do not deliver webhooks', async () => {
    const core = createTestCore();
    const n11Id = await core.addIntegration('n11');
    expect(await core.webhooks.receive(n11Id, '{}', {})).toEqual({
      kind: 'reject',
      reason: 'not_configured',
      message: 'n11 does not deliver webhooks',
    });
  });

  it('throws for an unknown event id', async () => {
    const core = createTestCore();
    await expect(core.webhooks.process('00000000-0000-4000-8000-000000000000')).rejects.toBeInstanceOf(
      NotFoundError,
    );
  });
});
