import { Result } from '@marketsync/domain-kernel';
import { describe, expect, it, vi } from 'vitest';
import { OAuth2RefreshAuth, type ConnectorAuth, type OAuth2Tokens } from '../connectors/auth.js';
import {
  resolveSettings,
  type IntegrationSettingsPatch,
} from '../entities/integration-settings.js';
import {
  AuthError,
  RateLimitedError,
  RemoteValidationError,
  TransientNetworkError,
  type ConnectorError,
} from '../errors/connector-errors.js';
import { InMemoryCircuitBreakerStateRepository } from '../repositories/in-memory/in-memory-circuit-breaker-state-repository.js';
import { ManualClock } from '../testing/manual-clock.js';
import { CircuitBreaker } from './circuit-breaker.js';
import { ResilienceLayer, type GuardedCall, type InvocationTarget } from './resilience-layer.js';

const integrationId = '0d3e2a51-64b7-4d0c-a3f1-7c2b9e6a4d10';

function setup() {
  const clock = new ManualClock();
  const repository = new InMemoryCircuitBreakerStateRepository();
  const breaker = new CircuitBreaker({ repository, clock });
  const layer = new ResilienceLayer({ breaker, clock, random: () => 0 });
  return { clock, repository, breaker, layer };
}

function target(
  overrides: IntegrationSettingsPatch = {},
  auth: ConnectorAuth = { kind: 'static_key' },
): InvocationTarget {
  return {
    integrationId,
    platformName: 'trendyol',
    auth,
    settings: resolveSettings(
      {},
      {
        rateLimitPerSecond: 100,
        retryBaseDelayMs: 100,
        circuitBreakerThreshold: 3,
        circuitBreakerBaseBackoffMs: 5_000,
        requestTimeoutMs: 1_000,
        ...overrides,
      },
    ),
  };
}

const succeed = () => vi.fn<GuardedCall<string>>(async () => Result.ok('done'));
const failWith = (error: ConnectorError) =>
  vi.fn<GuardedCall<string>>(async () => Result.fail(error));

describe('ResilienceLayer circuit handling', () => {
  it('opens after three transient failures and short-circuits the fourth call', async () => {
    const { layer, repository } = setup();
    const settings = target({ retryMaxAttempts: 1 });
    const call = failWith(new TransientNetworkError('connection reset'));

    for (let i = 0; i < 3; i++) {
      const outcome = await layer.invoke(settings, 'updateStock', call);
      expect(outcome.result.getError().kind).toBe('transient_network');
    }
    expect(await repository.find(integrationId)).toMatchObject({
      state: 'open',
      consecutiveFailures: 3,
      openCount: 1,
    });

    const fourth = await layer.invoke(settings, 'updateStock', call);
    expect(fourth.result.getError().kind).toBe('circuit_open');
    expect(fourth.attempts).toBe(1);
    expect(call).toHaveBeenCalledTimes(3);
  });

  it('lets exactly one trial through after the backoff and closes on success', async () => {
    const { layer, repository, clock } = setup();
    const settings = target({ retryMaxAttempts: 1 });
    const failing = failWith(new TransientNetworkError('timeout'));
    for (let i = 0; i < 3; i++) await layer.invoke(settings, 'updateStock', failing);

    clock.advance(4_999);
    const early = succeed();
    expect((await layer.invoke(settings, 'updateStock', early)).result.isFailure).toBe(true);
    expect(early).not.toHaveBeenCalled();

    clock.advance(1);
    const trial = succeed();
    const outcome = await layer.invoke(settings, 'updateStock', trial);
    expect(outcome.result.getValue()).toBe('done');
    expect(trial).toHaveBeenCalledTimes(1);
    expect((await repository.find(integrationId))?.state).toBe('closed');
  });

  it('reopens with a doubled backoff when the trial fails', async () => {
    const { layer, repository, clock } = setup();
    const settings = target({ retryMaxAttempts: 1 });
    const failing = failWith(new TransientNetworkError('timeout'));
    for (let i = 0; i < 3; i++) await layer.invoke(settings, 'updateStock', failing);

    clock.advance(5_000);
    await layer.invoke(settings, 'updateStock', failing);
    const state = await repository.find(integrationId);
    expect(state?.state).toBe('open');
    expect(state?.openCount).toBe(2);
    expect(state?.nextTrialAt).toEqual(new Date(clock.now() + 10_000));
  });

  it('does not count remote validation errors toward the threshold', async () => {
    const { layer, repository } = setup();
    const settings = target({ retryMaxAttempts: 1 });
    const rejected = failWith(new RemoteValidationError('barcode already used'));
    for (let i = 0; i < 5; i++) await layer.invoke(settings, 'upsertProduct', rejected);
    expect((await repository.find(integrationId))?.state ?? 'closed').toBe('closed');
    expect(rejected).toHaveBeenCalledTimes(5);
  });
});

describe('ResilienceLayer retries', () => {
  it('retries transient failures with exponential backoff', async () => {
    const { layer, clock } = setup();
    const call = vi
      .fn<GuardedCall<string>>()
      .mockResolvedValueOnce(Result.fail(new TransientNetworkError('reset')))
      .mockResolvedValueOnce(Result.fail(new TransientNetworkError('reset')))
      .mockResolvedValueOnce(Result.ok('done'));

    const outcome = await layer.invoke(target(), 'updateStock', call);
    expect(outcome.result.getValue()).toBe('done');
    expect(outcome.attempts).toBe(3);
    expect(clock.sleeps).toEqual([50, 100]);
  });

  it('stops after the configured number of attempts', async () => {
    const { layer } = setup();
    const call = failWith(new TransientNetworkError('reset'));
    const outcome = await layer.invoke(target({ retryMaxAttempts: 2, circuitBreakerThreshold: 10 }), 'updateStock', call);
    expect(outcome.attempts).toBe(2);
    expect(outcome.result.getError().kind).toBe('transient_network');
  });

  it('never retries remote validation errors', async () => {
    const { layer, clock } = setup();
    const outcome = await layer.invoke(target(), 'upsertProduct', failWith(new RemoteValidationError('bad')));
    expect(outcome.attempts).toBe(1);
    expect(clock.sleeps).toEqual([]);
  });

  it('honours the retry-after hint of a remote rate limit', async () => {
    const { layer, clock } = setup();
    const call = vi
      .fn<GuardedCall<string>>()
      .mockResolvedValueOnce(Result.fail(new RateLimitedError('slow down', { retryAfterMs: 1_500 })))
      .mockResolvedValueOnce(Result.ok('done'));
    const outcome = await layer.invoke(target(), 'updatePrice', call);
    expect(outcome.result.isSuccess).toBe(true);
    expect(clock.sleeps).toEqual([1_500]);
  });

  it('fails with a local rate limit when no token arrives in time', async () => {
    const { layer, repository } = setup();
    const settings = target({ rateLimitPerSecond: 1, rateLimitTimeoutMs: 0 });
    const call = succeed();

    expect((await layer.invoke(settings, 'updateStock', call)).result.isSuccess).toBe(true);
    const limited = await layer.invoke(settings, 'updateStock', call);
    const error = limited.result.getError();
    expect(error).toBeInstanceOf(RateLimitedError);
    expect(error instanceof RateLimitedError && error.source).toBe('local');
    expect(limited.attempts).toBe(1);
    expect(call).toHaveBeenCalledTimes(1);
    expect((await repository.find(integrationId))?.consecutiveFailures ?? 0).toBe(0);
  });

  it('turns an expired deadline into a transient failure and aborts the call', async () => {
    const { layer } = setup();
    const seen: { signal?: AbortSignal } = {};
    const hanging = vi.fn<GuardedCall<string>>((ctx) => {
      seen.signal = ctx.signal;
      return new Promise(() => undefined);
    });
    const outcome = await layer.invoke(target({ requestTimeoutMs: 20, retryMaxAttempts: 1 }), 'listOrders', hanging);
    expect(outcome.result.getError()).toBeInstanceOf(TransientNetworkError);
    expect(outcome.result.getError().message).toBe('Deadline of 20ms exceeded');
    expect(seen.signal?.aborted).toBe(true);
  });
});

describe('ResilienceLayer auth refresh', () => {
  const tokens: OAuth2Tokens = { accessToken: 'test-access', refreshToken: 'test-refresh', expiresAt: null };

  it('forces one refresh on an auth error without spending the retry budget', async () => {
    const { layer } = setup();
    const refresher = vi.fn(async () =>
      Result.ok({ accessToken: 'test-access-2', refreshToken: 'test-refresh-2', expiresAt: null }),
    );
    const auth = new OAuth2RefreshAuth({ tokens, refresher });
    const call = vi
      .fn<GuardedCall<string>>()
      .mockResolvedValueOnce(Result.fail(new AuthError('token expired')))
      .mockResolvedValueOnce(Result.ok('done'));

    const outcome = await layer.invoke(target({ retryMaxAttempts: 1 }, auth), 'listOrders', call);
    expect(outcome.result.getValue()).toBe('done');
    expect(outcome.attempts).toBe(2);
    expect(refresher).toHaveBeenCalledWith('test-refresh');
    expect(auth.bearer()).toBe('Bearer test-access-2');
  });

  it('treats an auth error as terminal for static keys', async () => {
    const { layer } = setup();
    const call = failWith(new AuthError('bad key'));
    const outcome = await layer.invoke(target(), 'listOrders', call);
    expect(outcome.attempts).toBe(1);
    expect(outcome.result.getError().kind).toBe('auth');
  });
});
