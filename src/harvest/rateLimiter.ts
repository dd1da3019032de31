import type { Clock } from './clock.js';
import { systemClock } from './clock.js';
import type { PermitGate } from './types.js';
import { CancelledError, ConfigError } from '../shared/errors.js';

export interface RateLimiterOptions {
  /** Maximum tokens held at once. */
  capacity?: number;
  /** One token is added per interval. */
  intervalMs?: number;
  clock?: Clock;
}

/**
 * Token bucket shared by every task of a run.
 *
 * Tokens accrue continuously at one per `intervalMs` and are capped at
 * `capacity`; the bucket starts full. The level is kept as milliseconds of
 * credit (one token = `intervalMs`). Refill and take happen in one
 * synchronous step, so concurrent callers on the event loop never observe
 * or consume the same token. Waiters are not served in FIFO order.
 */
export class TokenBucketRateLimiter implements PermitGate {
  readonly capacity: number;
  readonly intervalMs: number;
  private readonly clock: Clock;
  private creditMs: number;
  private lastRefill: number;

  constructor(options: RateLimiterOptions = {}) {
    const capacity = options.capacity ?? 1;
    const intervalMs = options.intervalMs ?? 1000;
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new ConfigError(`Rate limiter capacity must be a positive integer, got ${capacity}`);
    }
    if (!(intervalMs > 0)) {
      throw new ConfigError(`Rate limiter interval must be > 0ms, got ${intervalMs}`);
    }

    this.capacity = capacity;
    this.intervalMs = intervalMs;
    this.clock = options.clock ?? systemClock;
    this.creditMs = capacity * intervalMs;
    this.lastRefill = this.clock.now();
  }

  /**
   * Wait for a token and take it. Rejects with CancelledError if `signal`
   * aborts first.
   */
  async acquire(signal?: AbortSignal): Promise<void> {
    for (;;) {
      if (signal?.aborted) {
        throw new CancelledError('Rate limiter wait cancelled');
      }
      if (this.tryAcquire()) return;
      await this.clock.sleep(this.waitTimeMs(), signal);
    }
  }

  /** Take a token if one is available right now. */
  tryAcquire(): boolean {
    this.refill();
    if (this.creditMs < this.intervalMs) return false;
    this.creditMs -= this.intervalMs;
    return true;
  }

  /** Whole tokens currently available. */
  available(): number {
    this.refill();
    return Math.floor(this.creditMs / this.intervalMs);
  }

  private waitTimeMs(): number {
    return Math.max(1, Math.ceil(this.intervalMs - this.creditMs));
  }

  private refill(): void {
    const now = this.clock.now();
    // clock moved backwards: keep the old reference point
    if (now <= this.lastRefill) return;
    this.creditMs = Math.min(this.capacity * this.intervalMs, this.creditMs + (now - this.lastRefill));
    this.lastRefill = now;
  }
}
