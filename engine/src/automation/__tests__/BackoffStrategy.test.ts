import { describe, expect, it } from 'vitest';
import { ConfigError } from '../../errors/index.js';
import { BackoffStrategy, formatDelay } from '../BackoffStrategy.js';
import { DEFAULT_RETRY_POLICY, RetryPolicy } from '../RetryPolicy.js';
import { FailureKind } from '../../types/core-types.js';

describe('BackoffStrategy', () => {
  it('should double the delay until the cap', () => {
    const strategy = new BackoffStrategy({ baseDelayMs: 1000, maxDelayMs: 30000 });

    expect(strategy.calculateDelays(7)).toEqual([1000, 2000, 4000, 8000, 16000, 30000, 30000]);
  });

  it('should produce strictly increasing delays below the cap', () => {
    const strategy = new BackoffStrategy({ baseDelayMs: 250, multiplier: 3, maxDelayMs: 60000 });
    const delays = strategy.calculateDelays(5);

    for (let i = 1; i < delays.length; i++) {
      expect(delays[i]).toBeGreaterThan(delays[i - 1] ?? 0);
    }
    expect(Math.max(...delays)).toBeLessThanOrEqual(60000);
  });

  it('should reject a retry number below one', () => {
    expect(() => new BackoffStrategy({ baseDelayMs: 500 }).calculateDelay(0)).toThrow(ConfigError);
  });

  it('should reject invalid configuration', () => {
    expect(() => new BackoffStrategy({ baseDelayMs: -1 })).toThrow(ConfigError);
    expect(() => new BackoffStrategy({ baseDelayMs: 1, multiplier: 0 })).toThrow(ConfigError);
  });

  it('should format delays for logs', () => {
    expect(formatDelay(250)).toBe('250ms');
    expect(formatDelay(1500)).toBe('1.5s');
    expect(formatDelay(90000)).toBe('1.5m');
  });
});

describe('RetryPolicy', () => {
  const spec = {
    name: 'scan',
    description: '',
    keywords: [],
    fallback: [],
    timeoutMs: 1000,
    maxRetries: 4,
  };

  it('should take maxRetries from the unit and the rest from defaults', () => {
    const policy = RetryPolicy.forUnit(spec);

    expect(policy.toJSON()).toEqual({ ...DEFAULT_RETRY_POLICY, maxRetries: 4 });
    expect(policy.getMaxAttempts()).toBe(5);
  });

  it('should let call overrides win', () => {
    const policy = RetryPolicy.forUnit(spec, { maxRetries: 1, useFallback: false });

    expect(policy.getMaxAttempts()).toBe(2);
    expect(policy.useFallback).toBe(false);
  });

  it('should retry only retryable failures with attempts left', () => {
    const policy = RetryPolicy.forUnit(spec, { maxRetries: 2 });

    expect(policy.shouldRetry(FailureKind.RETRYABLE, 1)).toBe(true);
    expect(policy.shouldRetry(FailureKind.RETRYABLE, 2)).toBe(true);
    expect(policy.shouldRetry(FailureKind.RETRYABLE, 3)).toBe(false);
    expect(policy.shouldRetry(FailureKind.FATAL, 1)).toBe(false);
    expect(policy.shouldRetry(FailureKind.CANCELLED, 1)).toBe(false);
  });

  it('should reduce to one attempt for a trial', () => {
    expect(RetryPolicy.forUnit(spec).singleAttempt().getMaxAttempts()).toBe(1);
  });

  it('should back off from the configured base and multiplier', () => {
    const policy = RetryPolicy.forUnit(spec, { baseBackoffMs: 100, backoffMultiplier: 3, maxBackoffMs: 1000 });

    expect([1, 2, 3, 4].map((attempt) => policy.getDelay(attempt))).toEqual([100, 300, 900, 1000]);
  });
});
