import { Result } from '@marketsync/domain-kernel';
import type { ConnectorAuth } from '../connectors/auth.js';
import type { IntegrationSettings } from '../entities/integration-settings.js';
import {
  RateLimitedError,
  TransientNetworkError,
  type ConnectorError,
} from '../errors/connector-errors.js';
import { silentLogger, type Logger } from '../logger.js';
import {
  classifyOutcome,
  type CircuitBreaker,
  type CircuitBreakerPolicy,
} from './circuit-breaker.js';
import { systemClock, type Clock } from './clock.js';
import { RetryPolicy } from './retry-policy.js';
import { TokenBucket } from './token-bucket.js';

export interface InvocationTarget {
  integrationId: string;
  platformName: string;
  auth: ConnectorAuth;
  settings: IntegrationSettings;
}

export interface CallContext {
  /** Aborted when the per-call deadline expires. */
  signal: AbortSignal;
  attempt: number;
}

export type GuardedCall<T> = (ctx: CallContext) => Promise<Result<T, ConnectorError>>;

export interface InvocationOutcome<T> {
  result: Result<T, ConnectorError>;
  attempts: number;
  durationMs: number;
}

export interface ResilienceLayerDeps {
  breaker: CircuitBreaker;
  clock?: Clock;
  logger?: Logger;
  random?: () => number;
}

export function breakerPolicyFor(settings: IntegrationSettings): CircuitBreakerPolicy {
  return {
    threshold: settings.circuitBreakerThreshold,
    baseBackoffMs: settings.circuitBreakerBaseBackoffMs,
    maxBackoffMs: settings.circuitBreakerMaxBackoffMs,
    trialTimeoutMs: settings.requestTimeoutMs * 2,
  };
}

/**
 * Wraps every outbound call: circuit check, rate-limit token, deadline,
 * breaker bookkeeping and retry. Connector failures come back as values;
 * exceptions thrown by `fn` propagate untouched.
 */
export class ResilienceLayer {
  private readonly buckets = new Map<string, { key: string; bucket: TokenBucket }>();
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(private readonly deps: ResilienceLayerDeps) {
    this.clock = deps.clock ?? systemClock;
    this.logger = deps.logger ?? silentLogger;
  }

  async invoke<T>(
    target: InvocationTarget,
    operation: string,
    fn: GuardedCall<T>,
  ): Promise<InvocationOutcome<T>> {
    const startedAt = this.clock.now();
    const retry = new RetryPolicy({
      maxAttempts: target.settings.retryMaxAttempts,
      baseDelayMs: target.settings.retryBaseDelayMs,
      random: this.deps.random,
    });
    const log = this.logger.child({ integrationId: target.integrationId, operation });

    let attempts = 0;
    let retries = 0;
    let refreshed = false;

    for (;;) {
      attempts += 1;
      const result = await this.attempt(target, fn, attempts);
      if (result.isSuccess) {
        return { result, attempts, durationMs: this.clock.now() - startedAt };
      }

      const error = result.getError();
      if (error.kind === 'auth' && target.auth.kind === 'oauth2_refresh' && !refreshed) {
        refreshed = true;
        log.info({ attempt: attempts }, 'auth rejected, forcing token refresh');
        const refresh = await target.auth.forceRefresh();
        if (refresh.isSuccess) continue;
        return {
          result: Result.fail(refresh.getError()),
          attempts,
          durationMs: this.clock.now() - startedAt,
        };
      }

      retries += 1;
      if (!retry.shouldRetry(error, retries)) {
        return { result, attempts, durationMs: this.clock.now() - startedAt };
      }
      const delay = retry.delayFor(retries, error);
      log.debug({ attempt: attempts, kind: error.kind, delayMs: delay }, 'retrying after failure');
      await this.clock.sleep(delay);
    }
  }

  /** Drops cached limiters, e.g. after settings change. */
  forget(integrationId: string): void {
    const entry = this.buckets.get(integrationId);
    if (!entry) return;
    entry.bucket.dispose();
    this.buckets.delete(integrationId);
  }

  private async attempt<T>(
    target: InvocationTarget,
    fn: GuardedCall<T>,
    attempt: number,
  ): Promise<Result<T, ConnectorError>> {
    const policy = breakerPolicyFor(target.settings);
    const blocked = await this.deps.breaker.precheck(target.integrationId, policy);
    if (blocked) return Result.fail(blocked);

    const admitted = await this.bucketFor(target).acquire(target.settings.rateLimitTimeoutMs);
    if (!admitted) {
      return Result.fail(
        new RateLimitedError(
          `No rate-limit token for ${target.platformName} within ${target.settings.rateLimitTimeoutMs}ms`,
          { source: 'local' },
        ),
      );
    }

    const admission = await this.deps.breaker.admit(target.integrationId, policy);
    if (admission.isFailure) return Result.fail(admission.getError());

    let result: Result<T, ConnectorError>;
    if (target.auth.kind === 'oauth2_refresh') {
      const refresh = await target.auth.refreshIfExpired();
      result = refresh.isSuccess
        ? await this.withDeadline(fn, target.settings.requestTimeoutMs, attempt)
        : Result.fail(refresh.getError());
    } else {
      result = await this.withDeadline(fn, target.settings.requestTimeoutMs, attempt);
    }

    await this.deps.breaker.record(
      target.integrationId,
      policy,
      classifyOutcome(result.isFailure ? result.getError() : null),
      admission.getValue(),
    );
    return result;
  }

  private async withDeadline<T>(
    fn: GuardedCall<T>,
    timeoutMs: number,
    attempt: number,
  ): Promise<Result<T, ConnectorError>> {
    const controller = new AbortController();
    let expire: () => void = () => undefined;
    const deadline = new Promise<Result<T, ConnectorError>>((resolve) => {
      expire = () =>
        resolve(Result.fail(new TransientNetworkError(`Deadline of ${timeoutMs}ms exceeded`)));
    });
    const timer = setTimeout(() => {
      controller.abort();
      expire();
    }, timeoutMs);
    try {
      return await Promise.race([fn({ signal: controller.signal, attempt }), deadline]);
    } finally {
      clearTimeout(timer);
    }
  }

  private bucketFor(target: InvocationTarget): TokenBucket {
    const { rateLimitPerSecond, rateLimitBurst } = target.settings;
    const key = `${rateLimitPerSecond}:${rateLimitBurst ?? ''}`;
    const existing = this.buckets.get(target.integrationId);
    if (existing && existing.key === key) return existing.bucket;
    existing?.bucket.dispose();
    const bucket = new TokenBucket({
      ratePerSecond: rateLimitPerSecond,
      burst: rateLimitBurst,
      clock: this.clock,
    });
    this.buckets.set(target.integrationId, { key, bucket });
    return bucket;
  }
}
