/**
 * Automation primitives: backoff, retry policy, timeouts, clock and locks
 *
 * @module automation
 */

export * from './BackoffStrategy.js';
export * from './RetryPolicy.js';
export * from './TimeoutManager.js';
export * from './Clock.js';
export * from './KeyedMutex.js';
