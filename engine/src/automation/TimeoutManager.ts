/**
 * Timeout Manager
 *
 * Runs an operation under a timeout and an optional outer abort signal. The
 * operation receives its own signal, aborted on either, so units can stop
 * child processes or requests they started.
 *
 * @module automation
 */

import { CancelledError, TimeoutError } from '../errors/index.js';

export interface TimeoutConfig {
  timeoutMs: number;

  /** Operation name for error messages */
  operation: string;

  /** Outer cancellation */
  signal?: AbortSignal;
}

export class TimeoutManager {
  /**
   * Execute operation with timeout
   *
   * Rejects with TimeoutError when the timeout elapses and with
   * CancelledError when the outer signal aborts, without waiting for the
   * operation to notice.
   */
  static async execute<T>(
    operation: (signal: AbortSignal) => Promise<T>,
    config: TimeoutConfig
  ): Promise<T> {
    const controller = new AbortController();
    const outer = config.signal;

    if (outer?.aborted) {
      throw new CancelledError(config.operation);
    }

    let timer: ReturnType<typeof setTimeout> | undefined;
    let onAbort: (() => void) | undefined;

    const interrupted = new Promise<never>((_, reject) => {
      // Reject before aborting so the unit's own abort error never wins the race
      timer = setTimeout(() => {
        reject(new TimeoutError(config.timeoutMs, config.operation));
        controller.abort();
      }, config.timeoutMs);
      timer.unref?.();

      onAbort = () => {
        reject(new CancelledError(config.operation));
        controller.abort();
      };
      outer?.addEventListener('abort', onAbort, { once: true });
    });

    try {
      return await Promise.race([operation(controller.signal), interrupted]);
    } finally {
      clearTimeout(timer);
      if (onAbort) {
        outer?.removeEventListener('abort', onAbort);
      }
    }
  }
}
