/**
 * Manual Clock
 *
 * Clock whose time only moves when told to. sleep() advances time by the
 * requested amount and resolves on the next microtask, so backoff and
 * cooldown logic runs instantly and deterministically in tests.
 *
 * @module testing
 */

import type { Clock } from '../automation/Clock.js';
import { CancelledError } from '../errors/index.js';

export class ManualClock implements Clock {
  private current: number;
  /** Every sleep requested, in order */
  readonly sleeps: number[] = [];

  constructor(start = 0) {
    this.current = start;
  }

  now(): number {
    return this.current;
  }

  async sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      throw new CancelledError('backoff');
    }
    this.sleeps.push(ms);
    this.current += ms;
  }

  advance(ms: number): void {
    this.current += ms;
  }

  set(time: number): void {
    this.current = time;
  }
}
