/**
 * Circuit Breaker
 *
 * Per-unit failure isolation. Each unit has one circuit:
 *
 * CLOSED ──(failureCount reaches threshold)──▶ OPEN
 * OPEN ──(cooldown elapsed, next admit)──▶ HALF_OPEN (one trial in flight)
 * HALF_OPEN ──(trial success)──▶ CLOSED
 * HALF_OPEN ──(trial failure)──▶ OPEN (cooldown restarts)
 *
 * Only the holder of the trial token moves a circuit out of HALF_OPEN. A call
 * admitted earlier that settles while the circuit is OPEN or HALF_OPEN only
 * adds to the failure count.
 *
 * Every mutation of a unit's circuit, including its persistence, runs under
 * that unit's lock. Different units never wait on each other.
 *
 * @module resilience
 */

import { systemClock, type Clock } from '../automation/Clock.js';
import { KeyedMutex } from '../automation/KeyedMutex.js';
import { toError } from '../errors/index.js';
import { createEvent, EngineEventType, type CircuitChangedPayload } from '../events/EngineEvents.js';
import type { EventBus } from '../events/EventBus.js';
import type { EngineLogger } from '../logging/EngineLogger.js';
import { LoggerManager } from '../logging/LoggerManager.js';
import type { KeyValueStore } from '../stores/KeyValueStore.js';
import { CircuitStatus, type CircuitSnapshot } from '../types/core-types.js';

export interface CircuitBreakerOptions {
  /** Consecutive failed calls that open the circuit (default 5) */
  failureThreshold?: number;
  /** Time an open circuit rejects calls before allowing a trial (default 60s) */
  cooldownMs?: number;
  store?: KeyValueStore<CircuitSnapshot>;
  clock?: Clock;
  logger?: EngineLogger;
  events?: EventBus;
}

export type Admission =
  | { type: 'allowed' }
  /** Caller holds the single HALF_OPEN trial and must record or release it with `token` */
  | { type: 'trial'; token: number }
  | { type: 'rejected'; state: CircuitStatus; retryInMs: number | null };

export class CircuitBreaker {
  readonly failureThreshold: number;
  readonly cooldownMs: number;

  private readonly circuits = new Map<string, CircuitSnapshot>();
  /** Token of the trial in flight, by unit */
  private readonly trialsInFlight = new Map<string, number>();
  private nextToken = 0;
  private readonly locks = new KeyedMutex();
  private readonly store?: KeyValueStore<CircuitSnapshot>;
  private readonly clock: Clock;
  private readonly logger: EngineLogger;
  private readonly events?: EventBus;

  constructor(options: CircuitBreakerOptions = {}) {
    this.failureThreshold = options.failureThreshold ?? 5;
    this.cooldownMs = options.cooldownMs ?? 60_000;
    this.store = options.store;
    this.clock = options.clock ?? systemClock;
    this.logger = (options.logger ?? LoggerManager.getLogger()).child('CircuitBreaker');
    this.events = options.events;

    if (!Number.isInteger(this.failureThreshold) || this.failureThreshold < 1) {
      throw new RangeError(`failureThreshold must be a positive integer, got ${this.failureThreshold}`);
    }
  }

  /**
   * Restore persisted circuits. Trials that were in flight when the process
   * died are forgotten, so a HALF_OPEN circuit admits a new one.
   */
  async load(): Promise<number> {
    if (!this.store) {
      return 0;
    }
    const entries = await this.store.entries();
    for (const [unit, snapshot] of entries) {
      this.circuits.set(unit, { ...snapshot, unit });
    }
    return entries.length;
  }

  /**
   * Decide whether a call to `unit` may proceed
   */
  admit(unit: string): Promise<Admission> {
    return this.locks.runExclusive(unit, async (): Promise<Admission> => {
      const circuit = this.current(unit);

      switch (circuit.state) {
        case CircuitStatus.CLOSED:
          return { type: 'allowed' };

        case CircuitStatus.OPEN: {
          const elapsed = this.clock.now() - (circuit.openedAt ?? 0);
          if (elapsed < this.cooldownMs) {
            return { type: 'rejected', state: circuit.state, retryInMs: this.cooldownMs - elapsed };
          }
          await this.update(unit, { ...circuit, state: CircuitStatus.HALF_OPEN }, 'cooldown elapsed');
          return this.grantTrial(unit);
        }

        case CircuitStatus.HALF_OPEN:
          if (this.trialsInFlight.has(unit)) {
            return { type: 'rejected', state: circuit.state, retryInMs: null };
          }
          return this.grantTrial(unit);
      }
    });
  }

  /**
   * A call succeeded. The trial closes the circuit; a call admitted while
   * closed clears the failure count if the circuit is still closed.
   */
  recordSuccess(unit: string, trialToken?: number): Promise<void> {
    return this.locks.runExclusive(unit, async () => {
      const isTrial = this.takeTrial(unit, trialToken);
      const circuit = this.current(unit);
      if (!isTrial && circuit.state !== CircuitStatus.CLOSED) {
        return;
      }
      if (circuit.state === CircuitStatus.CLOSED && circuit.failureCount === 0) {
        return;
      }
      await this.update(
        unit,
        { unit, state: CircuitStatus.CLOSED, failureCount: 0, openedAt: null },
        'call succeeded'
      );
    });
  }

  /**
   * A call failed after exhausting its attempts (or fatally)
   */
  recordFailure(unit: string, reason?: string, trialToken?: number): Promise<void> {
    return this.locks.runExclusive(unit, async () => {
      const isTrial = this.takeTrial(unit, trialToken);
      const circuit = this.current(unit);
      const failureCount = circuit.failureCount + 1;

      let next: CircuitSnapshot;
      if (isTrial) {
        next = { unit, state: CircuitStatus.OPEN, failureCount, openedAt: this.clock.now() };
      } else if (circuit.state === CircuitStatus.CLOSED && failureCount >= this.failureThreshold) {
        next = { unit, state: CircuitStatus.OPEN, failureCount, openedAt: this.clock.now() };
      } else {
        next = { ...circuit, failureCount };
      }

      await this.update(unit, next, reason ?? 'call failed');
    });
  }

  /**
   * Give back a trial that ended without a verdict (cancelled)
   */
  release(unit: string, trialToken: number): Promise<void> {
    return this.locks.runExclusive(unit, () => {
      this.takeTrial(unit, trialToken);
    });
  }

  /**
   * Force a circuit closed
   */
  reset(unit: string): Promise<void> {
    return this.locks.runExclusive(unit, async () => {
      this.trialsInFlight.delete(unit);
      await this.update(
        unit,
        { unit, state: CircuitStatus.CLOSED, failureCount: 0, openedAt: null },
        'manual reset'
      );
    });
  }

  snapshot(unit: string): CircuitSnapshot {
    return { ...this.current(unit) };
  }

  /**
   * Every circuit that has ever changed, by unit name
   */
  snapshots(): CircuitSnapshot[] {
    return [...this.circuits.values()]
      .map((circuit) => ({ ...circuit }))
      .sort((a, b) => a.unit.localeCompare(b.unit));
  }

  private grantTrial(unit: string): Admission {
    const token = ++this.nextToken;
    this.trialsInFlight.set(unit, token);
    return { type: 'trial', token };
  }

  /**
   * True when `token` is the unit's trial in flight, which it then ends
   */
  private takeTrial(unit: string, token: number | undefined): boolean {
    if (token === undefined || this.trialsInFlight.get(unit) !== token) {
      return false;
    }
    this.trialsInFlight.delete(unit);
    return true;
  }

  private current(unit: string): CircuitSnapshot {
    return this.circuits.get(unit) ?? { unit, state: CircuitStatus.CLOSED, failureCount: 0, openedAt: null };
  }

  private async update(unit: string, next: CircuitSnapshot, reason: string): Promise<void> {
    const previous = this.current(unit);
    this.circuits.set(unit, next);

    if (previous.state !== next.state) {
      this.logger.record({
        unit,
        status: next.state === CircuitStatus.CLOSED ? 'success' : 'warning',
        message: `circuit ${previous.state} → ${next.state}`,
        detail: reason,
        context: { failureCount: next.failureCount },
      });
      this.events?.emitSync(
        createEvent<CircuitChangedPayload>(
          EngineEventType.CIRCUIT_CHANGED,
          { from: previous.state, to: next.state, failureCount: next.failureCount },
          { unit }
        )
      );
    }

    if (!this.store) {
      return;
    }
    try {
      await this.store.put(unit, next);
    } catch (error) {
      this.logger.warn(`Failed to persist circuit state for "${unit}"`, {
        error: toError(error).message,
        state: next.state,
      });
    }
  }
}
