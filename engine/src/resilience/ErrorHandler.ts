/**
 * Error Handler
 *
 * Wraps unit invocations with the circuit breaker, retry/backoff and
 * fallback resolution, and folds every way a call can go wrong into a
 * structured Outcome. Only programming errors (unknown unit) escape as
 * exceptions.
 *
 * @module resilience
 */

import { systemClock, type Clock } from '../automation/Clock.js';
import { formatDelay } from '../automation/BackoffStrategy.js';
import { DEFAULT_RETRY_POLICY, RetryPolicy, type RetryPolicyConfig } from '../automation/RetryPolicy.js';
import { TimeoutManager } from '../automation/TimeoutManager.js';
import { CancelledError, toError, UnitFatalError } from '../errors/index.js';
import { createEvent, EngineEventType, type InvocationRetryingPayload } from '../events/EngineEvents.js';
import type { EventBus } from '../events/EventBus.js';
import type { EngineLogger } from '../logging/EngineLogger.js';
import { LoggerManager } from '../logging/LoggerManager.js';
import type { UnitRegistry } from '../registry/UnitRegistry.js';
import {
  FailureKind,
  type AuxiliaryContext,
  type Invocation,
  type InvocationOutcome,
  type Outcome,
  type RetryPolicyOverrides,
  type UnitArgs,
  type UnitPayload,
} from '../types/core-types.js';
import type { CircuitBreaker } from './CircuitBreaker.js';

export const DEFAULT_ERROR_HISTORY_SIZE = 200;

export interface ErrorHandlerOptions {
  clock?: Clock;
  logger?: EngineLogger;
  events?: EventBus;
  /** Engine-wide policy defaults */
  defaults?: Partial<RetryPolicyConfig>;
  /** Failed attempts kept for recentErrors() */
  errorHistorySize?: number;
}

/**
 * A failed attempt or a circuit rejection
 */
export interface ErrorRecord {
  /** Epoch ms */
  at: number;
  unit: string;
  kind: FailureKind;
  message: string;
}

export interface RecentErrorsQuery {
  /** Only errors from the last `withinMs` */
  withinMs?: number;
  unit?: string;
}

export interface ExecuteOptions {
  policy?: RetryPolicyOverrides;
  signal?: AbortSignal;
  context?: AuxiliaryContext;
  /** Called after every attempt, in order */
  onInvocation?: (invocation: Invocation) => void;
}

/**
 * Result of running one unit with its own retry budget
 */
type UnitRun =
  | { status: 'success'; unit: string; payload: UnitPayload }
  | { status: 'failure'; unit: string; kind: FailureKind; message: string }
  | { status: 'cancelled'; unit: string; message: string };

interface CallState {
  readonly args: UnitArgs;
  readonly options: ExecuteOptions;
  readonly attempts: Invocation[];
  readonly fallbacksTried: string[];
  readonly visited: Set<string>;
}

export class ErrorHandler {
  private readonly clock: Clock;
  private readonly logger: EngineLogger;
  private readonly events?: EventBus;
  private readonly defaults: RetryPolicyConfig;
  private readonly history: ErrorRecord[] = [];
  private readonly historySize: number;

  constructor(
    private readonly registry: UnitRegistry,
    private readonly breaker: CircuitBreaker,
    options: ErrorHandlerOptions = {}
  ) {
    this.clock = options.clock ?? systemClock;
    this.logger = (options.logger ?? LoggerManager.getLogger()).child('ErrorHandler');
    this.events = options.events;
    this.defaults = { ...DEFAULT_RETRY_POLICY, ...options.defaults };
    this.historySize = options.errorHistorySize ?? DEFAULT_ERROR_HISTORY_SIZE;
  }

  /**
   * Invoke a unit under retry, circuit breaker and fallback rules
   *
   * @throws {RegistryError} when the unit is not registered
   */
  async execute(unitName: string, args: UnitArgs = {}, options: ExecuteOptions = {}): Promise<Outcome> {
    // Unknown primary is a caller error, not a unit failure
    this.registry.lookup(unitName);

    const state: CallState = {
      args,
      options,
      attempts: [],
      fallbacksTried: [],
      visited: new Set([unitName]),
    };
    const hops = options.policy?.maxFallbackHops ?? this.defaults.maxFallbackHops;
    const run = await this.resolve(unitName, hops, state);

    const base = {
      unit: unitName,
      attempts: state.attempts,
      fallbacksTried: state.fallbacksTried,
    };

    switch (run.status) {
      case 'success':
        return { status: 'success', ...base, resolvedBy: run.unit, payload: run.payload };
      case 'cancelled':
        return { status: 'cancelled', ...base, message: run.message };
      case 'failure':
        return { status: 'failure', ...base, failure: { kind: run.kind, message: run.message } };
    }
  }

  /**
   * Failed attempts and circuit rejections, newest first. Cancellations
   * are not errors and are never recorded.
   */
  recentErrors(query: RecentErrorsQuery = {}): ErrorRecord[] {
    const since = query.withinMs === undefined ? -Infinity : this.clock.now() - query.withinMs;
    return this.history
      .filter((record) => record.at >= since && (query.unit === undefined || record.unit === query.unit))
      .reverse();
  }

  /**
   * Run `unitName`, then its fallbacks while hops remain
   */
  private async resolve(unitName: string, hopsLeft: number, state: CallState): Promise<UnitRun> {
    const spec = this.registry.lookup(unitName);
    const policy = RetryPolicy.forUnit(spec, state.options.policy, this.defaults);
    const primary = await this.runUnit(unitName, policy, state);

    if (primary.status !== 'failure' || !policy.useFallback || hopsLeft < 1) {
      return primary;
    }

    const fallbackErrors: string[] = [];
    for (const fallback of spec.fallback) {
      if (state.visited.has(fallback)) {
        continue;
      }
      if (state.options.signal?.aborted) {
        return { status: 'cancelled', unit: unitName, message: 'cancelled before fallback' };
      }
      state.visited.add(fallback);
      state.fallbacksTried.push(fallback);

      if (!this.registry.has(fallback)) {
        this.logger.record({
          unit: unitName,
          team: spec.team,
          status: 'warning',
          message: `fallback "${fallback}" is not registered`,
        });
        fallbackErrors.push(`${fallback}: not registered`);
        continue;
      }

      this.logger.record({
        unit: unitName,
        team: spec.team,
        status: 'info',
        message: `trying fallback "${fallback}"`,
        detail: primary.message,
      });

      const result = await this.resolve(fallback, hopsLeft - 1, state);
      if (result.status !== 'failure') {
        return result;
      }
      fallbackErrors.push(`${fallback}: ${result.message}`);
    }

    if (fallbackErrors.length === 0) {
      return primary;
    }
    return {
      ...primary,
      message: `${primary.message} (fallbacks failed: ${fallbackErrors.join('; ')})`,
    };
  }

  /**
   * One unit with its own retry budget
   */
  private async runUnit(unitName: string, policy: RetryPolicy, state: CallState): Promise<UnitRun> {
    const { signal } = state.options;
    const spec = this.registry.lookup(unitName);

    const admission = await this.breaker.admit(unitName);
    if (admission.type === 'rejected') {
      const message = admission.retryInMs === null
        ? `Circuit for "${unitName}" is HALF_OPEN with a trial in flight`
        : `Circuit for "${unitName}" is OPEN (retry in ${formatDelay(admission.retryInMs)})`;
      this.logger.record({
        unit: unitName,
        team: spec.team,
        status: 'warning',
        message,
        context: { kind: FailureKind.CIRCUIT_OPEN },
      });
      this.remember(unitName, FailureKind.CIRCUIT_OPEN, message);
      return { status: 'failure', unit: unitName, kind: FailureKind.CIRCUIT_OPEN, message };
    }

    const trial = admission.type === 'trial' ? admission.token : undefined;
    const effective = trial === undefined ? policy : policy.singleAttempt();
    const maxAttempts = effective.getMaxAttempts();

    for (let attempt = 1; ; attempt++) {
      if (signal?.aborted) {
        return this.cancel(unitName, trial, 'cancelled before attempt');
      }

      const invocation = await this.invokeOnce(unitName, attempt, state);
      state.attempts.push(invocation);
      state.options.onInvocation?.(invocation);
      const outcome = invocation.outcome;

      if (outcome.type === 'success') {
        this.logger.record({
          unit: unitName,
          team: spec.team,
          status: 'success',
          message: `attempt ${attempt}/${maxAttempts} succeeded`,
          context: { durationMs: invocation.endedAt - invocation.startedAt },
        });
        await this.breaker.recordSuccess(unitName, trial);
        return { status: 'success', unit: unitName, payload: outcome.payload };
      }

      if (outcome.kind === FailureKind.CANCELLED) {
        return this.cancel(unitName, trial, outcome.detail);
      }

      this.logger.record({
        unit: unitName,
        team: spec.team,
        status: 'error',
        message: `attempt ${attempt}/${maxAttempts} failed (${outcome.kind})`,
        detail: outcome.detail,
        context: { kind: outcome.kind },
      });
      this.remember(unitName, outcome.kind, outcome.detail);

      if (!effective.shouldRetry(outcome.kind, attempt)) {
        await this.breaker.recordFailure(unitName, outcome.detail, trial);
        return { status: 'failure', unit: unitName, kind: outcome.kind, message: outcome.detail };
      }

      const delayMs = effective.getDelay(attempt);
      this.events?.emitSync(
        createEvent<InvocationRetryingPayload>(
          EngineEventType.INVOCATION_RETRYING,
          { attempt, maxAttempts, delayMs, detail: outcome.detail },
          { unit: unitName }
        )
      );
      try {
        await this.clock.sleep(delayMs, signal);
      } catch (error) {
        if (error instanceof CancelledError) {
          return this.cancel(unitName, trial, 'cancelled during backoff');
        }
        throw error;
      }
    }
  }

  private remember(unit: string, kind: FailureKind, message: string): void {
    this.history.push({ at: this.clock.now(), unit, kind, message });
    if (this.history.length > this.historySize) {
      this.history.splice(0, this.history.length - this.historySize);
    }
  }

  private async cancel(unitName: string, trial: number | undefined, message: string): Promise<UnitRun> {
    if (trial !== undefined) {
      await this.breaker.release(unitName, trial);
    }
    this.logger.record({ unit: unitName, status: 'warning', message: 'invocation cancelled', detail: message });
    return { status: 'cancelled', unit: unitName, message };
  }

  /**
   * A single attempt under the unit's timeout. Never throws.
   */
  private async invokeOnce(unitName: string, attempt: number, state: CallState): Promise<Invocation> {
    const { spec, unit } = this.registry.entry(unitName);
    const startedAt = this.clock.now();
    let outcome: InvocationOutcome;

    try {
      const result = await TimeoutManager.execute(
        (signal) =>
          unit.invoke(state.args, {
            unit: unitName,
            attempt,
            signal,
            auxiliary: state.options.context ?? { priorResults: [] },
          }),
        { timeoutMs: spec.timeoutMs, operation: `${unitName}#${attempt}`, signal: state.options.signal }
      );
      outcome = result.ok
        ? { type: 'success', payload: result.payload }
        : {
            type: 'failure',
            kind: result.failure.kind === 'Fatal' ? FailureKind.FATAL : FailureKind.RETRYABLE,
            detail: result.failure.message,
          };
    } catch (error) {
      outcome = { type: 'failure', kind: classify(error), detail: toError(error).message };
    }

    // Whatever the unit reported after a kill is a cancellation, not a unit failure
    if (outcome.type === 'failure' && outcome.kind !== FailureKind.CANCELLED && state.options.signal?.aborted) {
      outcome = { type: 'failure', kind: FailureKind.CANCELLED, detail: `cancelled: ${outcome.detail}` };
    }

    return {
      unit: unitName,
      args: { ...state.args },
      attempt,
      startedAt,
      endedAt: this.clock.now(),
      outcome,
    };
  }
}

/**
 * Thrown errors and timeouts are retryable unless the unit said otherwise
 */
function classify(error: unknown): FailureKind {
  if (error instanceof CancelledError) {
    return FailureKind.CANCELLED;
  }
  if (error instanceof UnitFatalError) {
    return FailureKind.FATAL;
  }
  return FailureKind.RETRYABLE;
}
