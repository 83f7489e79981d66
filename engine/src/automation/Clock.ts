/**
 * Time source for backoff sleeps, circuit cooldowns and timestamps.
 * Tests substitute ManualClock so retries and cooldowns run instantly.
 *
 * @module automation
 */

import { CancelledError } from '../errors/index.js';

export interface Clock {
  now(): number;
  /**
   * Resolves after `ms`; rejects with CancelledError if the signal aborts first
   */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export class SystemClock implements Clock {
  now(): number {
    return Date.now();
  }

  sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      return Promise.reject(new CancelledError('backoff'));
    }
    if (ms <= 0) {
      return Promise.resolve();
    }

    return new Promise((resolve, reject) => {
      const timeout = setTimeout(() => {
        cleanup();
        resolve();
      }, ms);

      const onAbort = () => {
        cleanup();
        reject(new CancelledError('backoff'));
      };

      const cleanup = () => {
        clearTimeout(timeout);
        signal?.removeEventListener('abort', onAbort);
      };

      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }
}

export const systemClock: Clock = new SystemClock();
