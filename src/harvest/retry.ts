import type { Clock } from './clock.js';
import { systemClock } from './clock.js';
import { CancelledError, PermanentError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

export interface BackoffPolicy {
  initialIntervalMs: number;
  multiplier: number;
  /** Delays are spread uniformly over ±factor of the current interval. */
  randomizationFactor: number;
  maxIntervalMs: number;
  /** 0 means no elapsed-time limit. */
  maxElapsedMs: number;
  /** 0 means no attempt limit. */
  maxAttempts: number;
}

export const DEFAULT_BACKOFF: BackoffPolicy = {
  initialIntervalMs: 500,
  multiplier: 1.5,
  randomizationFactor: 0.5,
  maxIntervalMs: 60_000,
  maxElapsedMs: 15 * 60_000,
  maxAttempts: 0,
};

export class ExponentialBackoff {
  private currentMs: number;

  constructor(
    private readonly policy: BackoffPolicy,
    private readonly random: () => number = Math.random,
  ) {
    this.currentMs = policy.initialIntervalMs;
  }

  nextDelayMs(): number {
    const delta = this.policy.randomizationFactor * this.currentMs;
    const min = this.currentMs - delta;
    const delay = min + this.random() * 2 * delta;
    this.currentMs = Math.min(this.currentMs * this.policy.multiplier, this.policy.maxIntervalMs);
    return Math.round(delay);
  }
}

export interface RetryEvent {
  attempt: number;
  delayMs: number;
  error: unknown;
}

export interface RetryingFetcherOptions extends Partial<BackoffPolicy> {
  clock?: Clock;
  random?: () => number;
  onRetry?: (event: RetryEvent) => void;
}

/**
 * Runs an operation until it resolves or the backoff budget is spent.
 *
 * Every thrown error is retried except CancelledError, which ends the loop
 * at once, and PermanentError, whose wrapped error is rethrown. When the
 * budget runs out the last error is rethrown unchanged.
 */
export class RetryingFetcher {
  readonly policy: BackoffPolicy;
  private readonly clock: Clock;
  private readonly random: () => number;
  private readonly onRetry?: (event: RetryEvent) => void;

  constructor(options: RetryingFetcherOptions = {}) {
    const { clock, random, onRetry, ...policy } = options;
    this.policy = { ...DEFAULT_BACKOFF, ...policy };
    this.clock = clock ?? systemClock;
    this.random = random ?? Math.random;
    this.onRetry = onRetry;
  }

  async execute<T>(operation: (attempt: number) => Promise<T>, signal?: AbortSignal): Promise<T> {
    const backoff = new ExponentialBackoff(this.policy, this.random);
    const startedAt = this.clock.now();
    const { maxAttempts, maxElapsedMs } = this.policy;

    for (let attempt = 1; ; attempt++) {
      if (signal?.aborted) {
        throw new CancelledError('Retry loop cancelled', { attempt });
      }

      try {
        return await operation(attempt);
      } catch (err) {
        if (err instanceof CancelledError) throw err;
        if (err instanceof PermanentError) throw err.error;
        if (maxAttempts > 0 && attempt >= maxAttempts) throw err;

        const delayMs = backoff.nextDelayMs();
        const elapsedMs = this.clock.now() - startedAt;
        if (maxElapsedMs > 0 && elapsedMs + delayMs > maxElapsedMs) throw err;

        logger.debug({ attempt, delayMs, error: errorMessage(err) }, 'Attempt failed, backing off');
        this.onRetry?.({ attempt, delayMs, error: err });
        await this.clock.sleep(delayMs, signal);
      }
    }
  }
}
