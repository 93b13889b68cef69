import { describe, expect, it, vi } from 'vitest';
import { connectorFor, ctx, fakeFetch, jsonResponse, operation, type FakeHandler } from '../testing/fake-fetch.js';
import { OAuth2RefreshAuth } from './auth.js';
import type { Connector } from './connector.js';
import { ETSY_TOKEN_URL, etsyPlatform } from './etsy.js';

const credentials = {
  clientId: 'test-client',
  accessToken: 'test-access-1',
  refreshToken: 'test-refresh-1',
  shopId: 42,
};

function setup(handler: FakeHandler) {
  const { fetch, requests } = fakeFetch(handler);
  const rotateCredentials = vi.fn<(patch: Record<string, unknown>) => Promise<void>>(async () => undefined);
  const connector = connectorFor(etsyPlatform, credentials, { fetch, rotateCredentials });
  return { connector, requests, rotateCredentials };
}

function oauth(connector: Connector): OAuth2RefreshAuth {
  if (!(connector.auth instanceof OAuth2RefreshAuth)) throw new Error('expected oauth2 auth');
  return connector.auth;
}

describe('EtsyConnector', () => {
  it('refreshes tokens, persists them and uses the new bearer', async () => {
    const { connector, requests, rotateCredentials } = setup((request) =>
      request.url === ETSY_TOKEN_URL
        ? jsonResponse({ access_token: 'test-access-2', refresh_token: 'test-refresh-2', expires_in: 3600 })
        : new Response(null, { status: 200 }),
    );

    const refreshed = await oauth(connector).forceRefresh();
    expect(refreshed.isSuccess).toBe(true);

    expect(requests[0]?.method).toBe('POST');
    expect(requests[0]?.headers['content-type']).toBe('application/x-www-form-urlencoded');
    expect(requests[0]?.body).toBe('grant_type=refresh_token&client_id=test-client&refresh_token=test-refresh-1');
    expect(rotateCredentials).toHaveBeenCalledTimes(1);
    expect(rotateCredentials).toHaveBeenCalledWith({
      accessToken: 'test-access-2',
      refreshToken: 'test-refresh-2',
      expiresAt: expect.any(String),
    });

    await operation(connector, 'updateStock')({ id: 'p1', sku: 'SKU-1', quantity: 4 }, { externalId: '9' }, ctx());
    expect(requests[1]?.method).toBe('PUT');
    expect(requests[1]?.url).toBe('https://openapi.etsy.com/v3/application/listings/9/inventory');
    expect(requests[1]?.headers.authorization).toBe('Bearer test-access-2');
    expect(requests[1]?.headers['x-api-key']).toBe('test-client');
  });

  it('shares one refresh between concurrent callers', async () => {
    const { connector, requests } = setup(() =>
      jsonResponse({ access_token: 'test-access-2', refresh_token: 'test-refresh-2', expires_in: 3600 }),
    );
    const auth = oauth(connector);
    await Promise.all([auth.forceRefresh(), auth.forceRefresh()]);
    expect(requests).toHaveLength(1);
  });

  it('treats a rejected refresh token as an auth error', async () => {
    const { connector, rotateCredentials } = setup(() => jsonResponse({ error: 'invalid_grant' }, 400));
    const error = (await oauth(connector).forceRefresh()).getError();
    expect(error.kind).toBe('auth');
    expect(error.message).toBe('Token refresh rejected: Remote rejected request (HTTP 400)');
    expect(rotateCredentials).not.toHaveBeenCalled();
  });

  it('pages listings by offset and converts money', async () => {
    const { connector, requests } = setup(() =>
      jsonResponse({
        count: 30,
        results: [
          { listing_id: 9, title: 'Vase', quantity: 2, price: { amount: 1250, divisor: 100 }, skus: ['SKU-9'] },
        ],
      }),
    );
    const page = (await operation(connector, 'listProducts')({}, ctx())).getValue();
    expect(requests[0]?.url).toBe('https://openapi.etsy.com/v3/application/shops/42/listings?limit=25&offset=0');
    expect(page).toEqual({
      items: [{ externalId: '9', sku: 'SKU-9', title: 'Vase', price: 12.5, stock: 2 }],
      nextCursor: '25',
    });
  });

  it('only accepts shipment status updates', async () => {
    const { connector, requests } = setup(() => new Response(null, { status: 200 }));
    const result = await operation(connector, 'updateOrderStatus')(
      { id: 'order-1', status: 'delivered' },
      { externalId: '77' },
      ctx(),
    );
    expect(result.getError().message).toBe('etsy only accepts shipment updates, got delivered');
    expect(requests).toHaveLength(0);
  });
});
