/**
 * Retry Policy
 *
 * How many times a unit is retried, how long to wait between attempts and
 * whether its fallbacks are tried afterwards.
 *
 * @module automation
 */

import { FailureKind, type RetryPolicyOverrides, type UnitSpec } from '../types/core-types.js';
import { BackoffStrategy } from './BackoffStrategy.js';

export interface RetryPolicyConfig {
  /** Retries after the first attempt; total attempts = maxRetries + 1 */
  maxRetries: number;
  baseBackoffMs: number;
  backoffMultiplier: number;
  maxBackoffMs: number;
  useFallback: boolean;
  /** How many fallback levels are followed */
  maxFallbackHops: number;
}

/**
 * Engine-wide defaults; maxRetries is normally taken from the UnitSpec
 */
export const DEFAULT_RETRY_POLICY: Readonly<RetryPolicyConfig> = {
  maxRetries: 2,
  baseBackoffMs: 1000,
  backoffMultiplier: 2,
  maxBackoffMs: 30000,
  useFallback: true,
  maxFallbackHops: 1,
};

export class RetryPolicy {
  private readonly config: Readonly<RetryPolicyConfig>;
  private readonly backoff: BackoffStrategy;

  constructor(config: RetryPolicyConfig) {
    this.config = { ...config };
    this.backoff = new BackoffStrategy({
      baseDelayMs: config.baseBackoffMs,
      maxDelayMs: config.maxBackoffMs,
      multiplier: config.backoffMultiplier,
    });
  }

  /**
   * Policy for one unit: call overrides, then the unit's own retry budget,
   * then the engine defaults
   */
  static forUnit(
    spec: UnitSpec,
    overrides: RetryPolicyOverrides = {},
    defaults: Readonly<RetryPolicyConfig> = DEFAULT_RETRY_POLICY
  ): RetryPolicy {
    return new RetryPolicy({
      maxRetries: overrides.maxRetries ?? spec.maxRetries,
      baseBackoffMs: overrides.baseBackoffMs ?? defaults.baseBackoffMs,
      backoffMultiplier: overrides.backoffMultiplier ?? defaults.backoffMultiplier,
      maxBackoffMs: overrides.maxBackoffMs ?? defaults.maxBackoffMs,
      useFallback: overrides.useFallback ?? defaults.useFallback,
      maxFallbackHops: overrides.maxFallbackHops ?? defaults.maxFallbackHops,
    });
  }

  /**
   * Retry after a failed attempt?
   *
   * @param attempt - Attempt that just failed (1-indexed)
   */
  shouldRetry(kind: FailureKind, attempt: number): boolean {
    return kind === FailureKind.RETRYABLE && attempt < this.getMaxAttempts();
  }

  /**
   * Delay to wait after the given failed attempt
   */
  getDelay(attempt: number): number {
    return this.backoff.calculateDelay(attempt);
  }

  getMaxAttempts(): number {
    return this.config.maxRetries + 1;
  }

  get useFallback(): boolean {
    return this.config.useFallback;
  }

  /**
   * Same policy reduced to a single attempt, used for half-open trials
   */
  singleAttempt(): RetryPolicy {
    return new RetryPolicy({ ...this.config, maxRetries: 0 });
  }

  toJSON(): RetryPolicyConfig {
    return { ...this.config };
  }
}
