/**
 * Exponential backoff with bounded jitter.
 *
 * @module exponential-backoff
 */

// ────────────────────────────── Types ──────────────────────────────

/**
 * Configuration for {@link ExponentialBackoff}.
 */
export interface BackoffConfig {
  /** Delay for attempt 0 in ms (default: 1000) */
  baseDelay?: number;

  /** Upper bound of the un-jittered delay in ms (default: 300000) */
  maxDelay?: number;

  /** Relative jitter amplitude in [0, 1] (default: 0.2) */
  jitterFactor?: number;

  /** Uniform source in [0, 1) (default: Math.random) */
  random?: () => number;
}

// ────────────────────────────── Constants ──────────────────────────────

export const DEFAULT_BASE_DELAY = 1_000;
export const DEFAULT_MAX_DELAY = 300_000;
export const DEFAULT_JITTER_FACTOR = 0.2;

/** Exponents above this are clamped so 2^n stays finite and exact */
const MAX_EXPONENT = 20;

// ────────────────────────────── ExponentialBackoff ──────────────────────────────

/**
 * Computes retry delays that double per attempt up to a ceiling.
 *
 * @example
 * ```typescript
 * const backoff = new ExponentialBackoff({ baseDelay: 500, maxDelay: 10_000 });
 * backoff.delay(3); // 4000
 * backoff.delayWithJitter(3); // somewhere in [3200, 4800]
 * ```
 */
export class ExponentialBackoff {
  readonly baseDelay: number;
  readonly maxDelay: number;
  readonly jitterFactor: number;
  private readonly random: () => number;

  constructor(config?: BackoffConfig) {
    this.baseDelay = config?.baseDelay ?? DEFAULT_BASE_DELAY;
    this.maxDelay = config?.maxDelay ?? DEFAULT_MAX_DELAY;
    this.jitterFactor = config?.jitterFactor ?? DEFAULT_JITTER_FACTOR;
    this.random = config?.random ?? Math.random;
  }

  /**
   * Un-jittered delay: `min(baseDelay * 2^attempt, maxDelay)`, with the
   * attempt clamped to [0, 20].
   */
  delay(attempt: number): number {
    const exponent = Math.min(Math.max(attempt, 0), MAX_EXPONENT);
    return Math.min(this.baseDelay * Math.pow(2, exponent), this.maxDelay);
  }

  /**
   * {@link delay} shifted by up to `±jitterFactor` of itself, never negative.
   */
  delayWithJitter(attempt: number): number {
    const base = this.delay(attempt);
    if (this.jitterFactor === 0) return base;

    const spread = this.random() * 2 - 1;
    return Math.max(0, base + base * this.jitterFactor * spread);
  }

  /**
   * Jittered delays for attempts `0..count-1`.
   */
  delaySequence(count: number): number[] {
    return Array.from({ length: Math.max(0, count) }, (_, attempt) =>
      this.delayWithJitter(attempt)
    );
  }
}

export function createExponentialBackoff(config?: BackoffConfig): ExponentialBackoff {
  return new ExponentialBackoff(config);
}
