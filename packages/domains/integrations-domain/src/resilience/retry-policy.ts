import { RateLimitedError, type ConnectorError } from '../errors/connector-errors.js';

export interface RetryPolicyOptions {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs?: number;
  /** Source of jitter in [0, 1). */
  random?: () => number;
}

const DEFAULT_MAX_DELAY_MS = 30_000;

/** Only failures that say "try again later" are retried; local rate limiting is not. */
export function isRetryable(error: ConnectorError): boolean {
  if (error instanceof RateLimitedError) return error.source === 'remote';
  return error.kind === 'transient_network';
}

export class RetryPolicy {
  readonly maxAttempts: number;
  private readonly baseDelayMs: number;
  private readonly maxDelayMs: number;
  private readonly random: () => number;

  constructor(options: RetryPolicyOptions) {
    this.maxAttempts = Math.max(1, options.maxAttempts);
    this.baseDelayMs = options.baseDelayMs;
    this.maxDelayMs = options.maxDelayMs ?? DEFAULT_MAX_DELAY_MS;
    this.random = options.random ?? Math.random;
  }

  /** `attempt` is the 1-based number of the attempt that just failed. */
  shouldRetry(error: ConnectorError, attempt: number): boolean {
    return attempt < this.maxAttempts && isRetryable(error);
  }

  /**
   * Delay before the attempt after `attempt`. A remote retry-after hint wins;
   * otherwise exponential backoff with jitter in [d/2, d].
   */
  delayFor(attempt: number, error?: ConnectorError): number {
    if (error instanceof RateLimitedError && error.retryAfterMs !== null) {
      return Math.min(this.maxDelayMs, Math.max(0, error.retryAfterMs));
    }
    const ceiling = Math.min(this.maxDelayMs, this.baseDelayMs * 2 ** (attempt - 1));
    return Math.round(ceiling / 2 + this.random() * (ceiling / 2));
  }
}
