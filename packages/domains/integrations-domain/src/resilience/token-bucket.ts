import { systemClock, type Clock } from './clock.js';

export interface TokenBucketOptions {
  /** Tokens added per refill interval. */
  ratePerSecond: number;
  /** Bucket capacity; defaults to one interval's worth of tokens. */
  burst?: number;
  clock?: Clock;
}

interface Waiter {
  resolve: (admitted: boolean) => void;
  timer: ReturnType<typeof setTimeout> | null;
}

const REFILL_INTERVAL_MS = 1_000;

/**
 * Interval-refill token bucket with a FIFO wait queue. Tokens are added in
 * whole intervals, so a saturated bucket admits `ratePerSecond` callers at
 * the start of each second.
 */
export class TokenBucket {
  readonly ratePerSecond: number;
  readonly capacity: number;
  private tokens: number;
  private lastRefill: number;
  private readonly waiters: Waiter[] = [];
  private refillTimer: ReturnType<typeof setTimeout> | null = null;
  private readonly clock: Clock;

  constructor(options: TokenBucketOptions) {
    if (!(options.ratePerSecond > 0)) {
      throw new RangeError(`ratePerSecond must be positive, got ${options.ratePerSecond}`);
    }
    this.clock = options.clock ?? systemClock;
    this.ratePerSecond = options.ratePerSecond;
    this.capacity = options.burst ?? Math.max(1, Math.ceil(options.ratePerSecond));
    this.tokens = this.capacity;
    this.lastRefill = this.clock.now();
  }

  get available(): number {
    this.refill();
    return Math.floor(this.tokens);
  }

  get queued(): number {
    return this.waiters.length;
  }

  /** Resolves true once a token is taken, or false when `timeoutMs` elapses first. */
  acquire(timeoutMs: number): Promise<boolean> {
    this.refill();
    if (this.waiters.length === 0 && this.tokens >= 1) {
      this.tokens -= 1;
      return Promise.resolve(true);
    }
    if (timeoutMs <= 0) return Promise.resolve(false);

    return new Promise<boolean>((resolve) => {
      const waiter: Waiter = { resolve, timer: null };
      waiter.timer = setTimeout(() => {
        const index = this.waiters.indexOf(waiter);
        if (index >= 0) this.waiters.splice(index, 1);
        resolve(false);
      }, timeoutMs);
      this.waiters.push(waiter);
      this.scheduleRefill();
    });
  }

  /** Rejects every queued waiter. */
  dispose(): void {
    if (this.refillTimer) {
      clearTimeout(this.refillTimer);
      this.refillTimer = null;
    }
    for (const waiter of this.waiters.splice(0)) {
      if (waiter.timer) clearTimeout(waiter.timer);
      waiter.resolve(false);
    }
  }

  private refill(): void {
    const now = this.clock.now();
    const intervals = Math.floor((now - this.lastRefill) / REFILL_INTERVAL_MS);
    if (intervals <= 0) return;
    this.tokens = Math.min(this.capacity, this.tokens + intervals * this.ratePerSecond);
    this.lastRefill += intervals * REFILL_INTERVAL_MS;
  }

  private drain(): void {
    this.refill();
    while (this.waiters.length > 0 && this.tokens >= 1) {
      const waiter = this.waiters.shift();
      if (!waiter) break;
      if (waiter.timer) clearTimeout(waiter.timer);
      this.tokens -= 1;
      waiter.resolve(true);
    }
    if (this.waiters.length > 0) this.scheduleRefill();
  }

  private scheduleRefill(): void {
    if (this.refillTimer) return;
    const wait = Math.max(0, this.lastRefill + REFILL_INTERVAL_MS - this.clock.now());
    this.refillTimer = setTimeout(() => {
      this.refillTimer = null;
      this.drain();
    }, wait);
  }
}
