/**
 * Embedding Resilience
 * ====================
 *
 * Retry with exponential backoff around an embedding provider.
 * Transient provider failures (rate limits, timeouts, 5xx) are retried;
 * everything else surfaces immediately.
 */

import { setTimeout as delay } from 'node:timers/promises';
import {
  ConfigError,
  OperationCancelledError,
  ProviderError,
  throwIfCancelled,
  toProviderError,
} from './errors.js';
import type { EmbedOptions, EmbeddingAdapter, EmbeddingResult } from './types.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Retry configuration.
 */
export interface RetryConfig {
  /**
   * Maximum attempts, including the first.
   */
  max_attempts: number;

  /**
   * Delay before the first retry in ms.
   */
  initial_delay_ms: number;

  /**
   * Maximum delay in ms.
   */
  max_delay_ms: number;

  /**
   * Backoff multiplier.
   */
  backoff_multiplier: number;

  /**
   * Jitter as a fraction of the delay (0-1).
   */
  jitter: number;

  /**
   * Which errors to retry.
   */
  retry_on: (error: ProviderError) => boolean;
}

/**
 * Injectable timing primitives.
 */
export interface RetryClock {
  sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  random: () => number;
}

/**
 * Retry statistics.
 */
export interface RetryStats {
  totalAttempts: number;
  firstTrySuccesses: number;
  retrySuccesses: number;
  exhaustedFailures: number;
  avgAttempts: number;
}

export const DEFAULT_RETRY_CONFIG: Readonly<RetryConfig> = {
  max_attempts: 3,
  initial_delay_ms: 1000,
  max_delay_ms: 30000,
  backoff_multiplier: 2,
  jitter: 0.1,
  retry_on: (error) => error.retryable,
};

async function abortableSleep(ms: number, signal?: AbortSignal): Promise<void> {
  try {
    await delay(ms, undefined, signal ? { signal } : {});
  } catch (error) {
    if (signal?.aborted) {
      throw new OperationCancelledError();
    }
    throw error;
  }
}

const SYSTEM_CLOCK: RetryClock = {
  sleep: abortableSleep,
  random: Math.random,
};

// =============================================================================
// Retry Policy
// =============================================================================

/**
 * Retry policy with exponential backoff and jitter.
 */
export class RetryPolicy {
  readonly config: Readonly<RetryConfig>;
  private readonly clock: RetryClock;
  private stats = {
    totalAttempts: 0,
    firstTrySuccesses: 0,
    retrySuccesses: 0,
    exhaustedFailures: 0,
  };

  constructor(config: Partial<RetryConfig> = {}, clock: Partial<RetryClock> = {}) {
    this.config = { ...DEFAULT_RETRY_CONFIG, ...config };
    this.clock = { ...SYSTEM_CLOCK, ...clock };

    if (!Number.isInteger(this.config.max_attempts) || this.config.max_attempts < 1) {
      throw new ConfigError(
        'retry.max_attempts',
        `max_attempts must be a positive integer, got ${this.config.max_attempts}`
      );
    }
  }

  /**
   * Run `fn` until it succeeds, fails with a non-retryable error,
   * or the attempt budget runs out.
   */
  async execute<T>(fn: (attempt: number) => Promise<T>, signal?: AbortSignal): Promise<T> {
    let lastError: ProviderError | undefined;
    let attempt = 0;

    while (attempt < this.config.max_attempts) {
      throwIfCancelled(signal);
      attempt++;
      this.stats.totalAttempts++;

      try {
        const result = await fn(attempt);

        if (attempt === 1) {
          this.stats.firstTrySuccesses++;
        } else {
          this.stats.retrySuccesses++;
        }

        return result;
      } catch (error) {
        if (error instanceof OperationCancelledError) {
          throw error;
        }
        lastError = toProviderError(error);

        if (!this.config.retry_on(lastError)) {
          throw lastError;
        }

        if (attempt >= this.config.max_attempts) {
          break;
        }

        await this.clock.sleep(this.delayFor(attempt), signal);
      }
    }

    this.stats.exhaustedFailures++;
    throw new ProviderError(
      'RETRY_EXHAUSTED',
      `Embedding call failed after ${attempt} attempts: ${lastError?.message ?? 'unknown error'}`,
      false,
      { attempts: attempt, last_kind: lastError?.kind },
      { cause: lastError }
    );
  }

  /**
   * Backoff before the retry that follows attempt `attempt` (1-based).
   */
  delayFor(attempt: number): number {
    let ms = this.config.initial_delay_ms * Math.pow(this.config.backoff_multiplier, attempt - 1);
    ms = Math.min(ms, this.config.max_delay_ms);

    const jitterRange = ms * this.config.jitter;
    ms += this.clock.random() * jitterRange * 2 - jitterRange;

    return Math.max(0, Math.round(ms));
  }

  getStats(): RetryStats {
    const total = this.stats.firstTrySuccesses + this.stats.retrySuccesses + this.stats.exhaustedFailures;
    return {
      ...this.stats,
      avgAttempts: total > 0 ? this.stats.totalAttempts / total : 0,
    };
  }

  resetStats(): void {
    this.stats = {
      totalAttempts: 0,
      firstTrySuccesses: 0,
      retrySuccesses: 0,
      exhaustedFailures: 0,
    };
  }
}

// =============================================================================
// Retrying Adapter
// =============================================================================

/**
 * Wraps an embedding adapter so every call goes through a retry policy.
 */
export class RetryingEmbeddingAdapter implements EmbeddingAdapter {
  readonly adapter_id: string;
  readonly model_id: string;
  readonly dimensions: number;

  constructor(
    private readonly inner: EmbeddingAdapter,
    readonly policy: RetryPolicy = new RetryPolicy()
  ) {
    this.adapter_id = `retrying_${inner.adapter_id}`;
    this.model_id = inner.model_id;
    this.dimensions = inner.dimensions;
  }

  embed(texts: string[], options: EmbedOptions = {}): Promise<EmbeddingResult> {
    return this.policy.execute(() => this.inner.embed(texts, options), options.signal);
  }

  isReady(): Promise<boolean> {
    return this.inner.isReady();
  }
}

/**
 * Create a retry policy.
 */
export function createRetryPolicy(config?: Partial<RetryConfig>, clock?: Partial<RetryClock>): RetryPolicy {
  return new RetryPolicy(config, clock);
}
