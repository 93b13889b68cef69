import Stripe from 'stripe';
import { describe, expect, it } from 'vitest';
import { connectorFor, ctx, fakeFetch, jsonResponse, operation, type FakeHandler } from '../testing/fake-fetch.js';
import { capabilitiesOf } from './connector.js';
import { mapStripeError, stripePlatform } from './stripe.js';

const credentials = { secretKey: 'test-secret-key', webhookSecret: 'test-webhook-secret' };

function setup(handler: FakeHandler = () => jsonResponse({})) {
  const { fetch, requests } = fakeFetch(handler);
  const connector = connectorFor(stripePlatform, credentials, { fetch, settings: { requestTimeoutMs: 5_000 } });
  return { connector, requests };
}

function signedHeaders(payload: string, secret = 'test-webhook-secret'): Record<string, string> {
  const header = new Stripe('test-secret-key').webhooks.generateTestHeaderString({ payload, secret });
  return { 'Stripe-Signature': header };
}

describe('StripeConnector', () => {
  it('supports only payment operations', () => {
    const { connector } = setup();
    expect(capabilitiesOf(connector)).toEqual(['cancelOrder', 'refund']);
  });

  it('refunds the mapped payment intent with a stable idempotency key', async () => {
    const { connector, requests } = setup(() =>
      jsonResponse({ id: 're_1', object: 'refund', status: 'succeeded' }),
    );

    const result = await operation(connector, 'refund')({ id: 'order-1' }, { externalId: 'pi_1' }, ctx());

    expect(result.getValue()).toEqual({ externalId: 're_1', status: 'succeeded' });
    expect(requests).toHaveLength(1);
    expect(requests[0]?.method).toBe('POST');
    expect(requests[0]?.url).toBe('https://api.stripe.com/v1/refunds');
    expect(requests[0]?.headers['idempotency-key']).toBe('refund:order-1:full');
    expect(requests[0]?.body).toContain('payment_intent=pi_1');
  });

  it('refuses to refund an order without a payment', async () => {
    const { connector, requests } = setup();
    const result = await operation(connector, 'refund')({ id: 'order-1' }, { externalId: null }, ctx());
    expect(result.getError().message).toBe('Order order-1 has no stripe payment');
    expect(requests).toHaveLength(0);
  });

  it('maps SDK failures onto connector errors', async () => {
    const responses = [
      jsonResponse({ error: { type: 'invalid_request_error', message: 'Invalid API Key provided' } }, 401),
      jsonResponse({ error: { type: 'invalid_request_error', message: 'Too many requests' } }, 429, {
        'retry-after': '3',
      }),
      jsonResponse({ error: { type: 'invalid_request_error', message: 'No such payment_intent' } }, 404),
    ];
    const { connector } = setup(() => responses.shift() ?? jsonResponse({}));
    const cancel = () => operation(connector, 'cancelOrder')({ id: 'order-1' }, { externalId: 'pi_1' }, ctx());

    const auth = (await cancel()).getError();
    expect(auth.kind).toBe('auth');
    expect(auth.message).toBe('Invalid API Key provided');
    expect((await cancel()).getError().kind).toBe('rate_limited');
    const validation = (await cancel()).getError();
    expect(validation.kind).toBe('remote_validation');
    expect(validation.message).toBe('No such payment_intent');
  });

  it('rethrows errors that are not from the SDK', () => {
    expect(() => mapStripeError(new Error('programming error'))).toThrow('programming error');
  });

  describe('webhooks', () => {
    const payload = JSON.stringify({
      id: 'evt_1',
      object: 'event',
      type: 'payment_intent.succeeded',
      created: 1767225600,
      data: { object: { id: 'pi_1', object: 'payment_intent' } },
    });

    it('verifies the signature and normalizes payment events', () => {
      const { connector } = setup();
      const parsed = connector.webhooks?.verify(payload, signedHeaders(payload)).getValue();
      expect(parsed?.platformEventId).toBe('evt_1');
      expect(parsed?.eventType).toBe('payment_intent.succeeded');
      expect(parsed?.event).toEqual({
        type: 'payment.succeeded',
        externalId: 'pi_1',
        status: 'paid',
        occurredAt: new Date('2026-01-01T00:00:00.000Z'),
      });
    });

    it('maps a refunded charge to its payment intent', () => {
      const { connector } = setup();
      const raw = JSON.stringify({
        id: 'evt_2',
        object: 'event',
        type: 'charge.refunded',
        created: 1767225600,
        data: { object: { id: 'ch_1', object: 'charge', payment_intent: 'pi_2', refunded: true } },
      });
      const parsed = connector.webhooks?.verify(raw, signedHeaders(raw)).getValue();
      expect(parsed?.event).toMatchObject({ type: 'payment.refunded', externalId: 'pi_2', status: 'refunded' });
    });

    it('rejects missing and mismatched signatures', () => {
      const { connector } = setup();
      expect(connector.webhooks?.verify(payload, {}).getError()).toEqual({
        reason: 'invalid_signature',
        message: 'Missing Stripe-Signature header',
      });
      expect(connector.webhooks?.verify(payload, signedHeaders(payload, 'other-secret')).getError()).toEqual({
        reason: 'invalid_signature',
        message: 'Signature mismatch',
      });
    });

    it('ignores event types the core does not handle', () => {
      const { connector } = setup();
      const raw = JSON.stringify({
        id: 'evt_3',
        object: 'event',
        type: 'customer.created',
        created: 1767225600,
        data: { object: { id: 'cus_1', object: 'customer' } },
      });
      expect(connector.webhooks?.verify(raw, signedHeaders(raw)).getValue().event).toBeNull();
    });
  });
});
