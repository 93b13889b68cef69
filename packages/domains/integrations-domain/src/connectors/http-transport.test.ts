import { describe, expect, it } from 'vitest';
import { z } from 'zod';
import { fakeFetch, jsonResponse } from '../testing/fake-fetch.js';
import { HttpTransport, errorForStatus, parseRetryAfter } from './http-transport.js';

const NOW = Date.parse('2026-01-01T00:00:00.000Z');

describe('parseRetryAfter', () => {
  it('reads delta seconds', () => {
    expect(parseRetryAfter(new Headers({ 'retry-after': '3' }), NOW)).toBe(3000);
  });

  it('reads an HTTP date relative to now', () => {
    expect(parseRetryAfter(new Headers({ 'retry-after': 'Thu, 01 Jan 2026 00:00:05 GMT' }), NOW)).toBe(5000);
  });

  it('reads X-RateLimit-Reset as seconds or epoch seconds', () => {
    expect(parseRetryAfter(new Headers({ 'x-ratelimit-reset': '10' }), NOW)).toBe(10_000);
    expect(parseRetryAfter(new Headers({ 'x-ratelimit-reset': String(NOW / 1000 + 10) }), NOW)).toBe(10_000);
  });

  it('returns null without a hint', () => {
    expect(parseRetryAfter(new Headers(), NOW)).toBeNull();
  });
});

describe('errorForStatus', () => {
  const kindOf = (status: number) => errorForStatus(status, new Headers(), '', NOW)?.kind ?? null;

  it('classifies statuses', () => {
    expect(kindOf(200)).toBeNull();
    expect(kindOf(204)).toBeNull();
    expect(kindOf(401)).toBe('auth');
    expect(kindOf(403)).toBe('auth');
    expect(kindOf(429)).toBe('rate_limited');
    expect(kindOf(400)).toBe('remote_validation');
    expect(kindOf(404)).toBe('remote_validation');
    expect(kindOf(422)).toBe('remote_validation');
    expect(kindOf(500)).toBe('transient_network');
    expect(kindOf(503)).toBe('transient_network');
    expect(kindOf(302)).toBe('remote_validation');
  });

  it('carries the retry hint on 429', () => {
    const error = errorForStatus(429, new Headers({ 'retry-after': '2' }), '', NOW);
    expect(error?.message).toBe('Remote rate limit exceeded (HTTP 429)');
    expect(error?.details).toEqual({ retryAfterMs: 2000, source: 'remote' });
  });
});

describe('HttpTransport', () => {
  const signal = new AbortController().signal;

  it('joins the base url, path and defined query values', () => {
    const transport = new HttpTransport({ baseUrl: 'https://api.example.test/v1/' });
    expect(transport.url('/items', { page: 2, since: undefined, q: 'a b' })).toBe(
      'https://api.example.test/v1/items?page=2&q=a+b',
    );
  });

  it('sends JSON with the default headers', async () => {
    const { fetch, requests } = fakeFetch(() => jsonResponse({ ok: true }));
    const transport = new HttpTransport({
      baseUrl: 'https://api.example.test',
      fetch,
      headers: () => ({ authorization: 'Bearer test-token' }),
    });

    const result = await transport.json(
      { method: 'POST', path: '/things', json: { a: 1 }, signal },
      z.object({ ok: z.boolean() }),
    );

    expect(result.getValue()).toEqual({ ok: true });
    expect(requests).toHaveLength(1);
    expect(requests[0]).toEqual({
      method: 'POST',
      url: 'https://api.example.test/things',
      headers: {
        accept: 'application/json',
        authorization: 'Bearer test-token',
        'content-type': 'application/json',
      },
      body: '{"a":1}',
    });
  });

  it('maps a thrown fetch to a transient network error', async () => {
    const transport = new HttpTransport({
      baseUrl: 'https://api.example.test',
      fetch: () => Promise.reject(new TypeError('fetch failed')),
    });
    const error = (await transport.send({ method: 'GET', path: '/', signal })).getError();
    expect(error.kind).toBe('transient_network');
    expect(error.message).toBe('Network error: fetch failed');
  });

  it('reports an aborted request', async () => {
    const controller = new AbortController();
    controller.abort();
    const transport = new HttpTransport({
      baseUrl: 'https://api.example.test',
      fetch: () => Promise.reject(new Error('The operation was aborted')),
    });
    const error = (await transport.send({ method: 'GET', path: '/', signal: controller.signal })).getError();
    expect(error.message).toBe('Request aborted');
  });

  it('rejects bodies that are not JSON or do not match the schema', async () => {
    const { fetch } = fakeFetch((request) =>
      request.url.endsWith('/text') ? new Response('<html/>') : jsonResponse({ count: 'many' }),
    );
    const transport = new HttpTransport({ baseUrl: 'https://api.example.test', fetch });
    const schema = z.object({ count: z.number() });

    const notJson = await transport.json({ method: 'GET', path: '/text', signal }, schema);
    expect(notJson.getError().message).toBe('Response body is not JSON');

    const wrongShape = await transport.json({ method: 'GET', path: '/shape', signal }, schema);
    expect(wrongShape.getError().kind).toBe('remote_validation');
    expect(wrongShape.getError().details).toEqual({ issues: ['count: Expected number, received string'] });
  });
});
