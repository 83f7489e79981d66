/**
 * Backoff Strategy
 *
 * Calculates delays between retry attempts. Delays are deterministic: the
 * delay before retry k is min(base * multiplier^(k-1), cap).
 *
 * @module automation
 */

import { ConfigError } from '../errors/index.js';

export interface BackoffConfig {
  /** Base delay in milliseconds */
  baseDelayMs: number;

  /** Maximum delay cap in milliseconds (default: 30s) */
  maxDelayMs?: number;

  /** Growth factor between consecutive retries (default: 2) */
  multiplier?: number;
}

export class BackoffStrategy {
  private readonly config: Required<BackoffConfig>;

  constructor(config: BackoffConfig) {
    this.config = {
      baseDelayMs: config.baseDelayMs,
      maxDelayMs: config.maxDelayMs ?? 30000,
      multiplier: config.multiplier ?? 2,
    };

    this.validateConfig();
  }

  /**
   * Delay before the given retry
   *
   * @param retry - Retry number (1 = the first retry after the first attempt)
   */
  calculateDelay(retry: number): number {
    if (retry < 1) {
      throw ConfigError.invalid(`Retry number must be >= 1, got: ${retry}`);
    }

    const delayMs = this.config.baseDelayMs * Math.pow(this.config.multiplier, retry - 1);
    return Math.round(Math.min(delayMs, this.config.maxDelayMs));
  }

  /**
   * Delays for retries 1..count
   */
  calculateDelays(count: number): number[] {
    const delays: number[] = [];
    for (let retry = 1; retry <= count; retry++) {
      delays.push(this.calculateDelay(retry));
    }
    return delays;
  }

  private validateConfig(): void {
    if (this.config.baseDelayMs < 0) {
      throw ConfigError.invalid(`Base delay must be >= 0, got: ${this.config.baseDelayMs}`, 'policy.baseBackoffMs');
    }

    if (this.config.maxDelayMs < 0) {
      throw ConfigError.invalid(`Max delay must be >= 0, got: ${this.config.maxDelayMs}`, 'policy.maxBackoffMs');
    }

    if (this.config.multiplier <= 0) {
      throw ConfigError.invalid(`Multiplier must be > 0, got: ${this.config.multiplier}`, 'policy.backoffMultiplier');
    }
  }
}

/**
 * Format a delay for logging
 */
export function formatDelay(delayMs: number): string {
  if (delayMs < 1000) {
    return `${delayMs}ms`;
  }
  if (delayMs < 60000) {
    return `${(delayMs / 1000).toFixed(1)}s`;
  }
  return `${(delayMs / 60000).toFixed(1)}m`;
}
