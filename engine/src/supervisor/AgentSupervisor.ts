/**
 * Agent Supervisor
 *
 * Drives one orchestration request through its lifecycle:
 *
 *   PENDING → ROUTING → EXECUTING → AGGREGATING → COMPLETED
 *                 ↘ FAILED     ↘ FAILED
 *
 * The whole Execution is checkpointed after every transition and after every
 * candidate settles, so resume() can reload it and continue from the recorded
 * state without re-running settled candidates.
 *
 * @module supervisor
 */

import { randomUUID } from 'node:crypto';
import { systemClock, type Clock } from '../automation/Clock.js';
import { KeyedMutex } from '../automation/KeyedMutex.js';
import { ConductorError, ConfigError, ExecutionError, toError } from '../errors/index.js';
import {
  createEvent,
  EngineEventType,
  type ExecutionSettledPayload,
  type ExecutionTransitionPayload,
} from '../events/EngineEvents.js';
import type { EventBus } from '../events/EventBus.js';
import type { EngineLogger } from '../logging/EngineLogger.js';
import { LoggerManager } from '../logging/LoggerManager.js';
import type { UnitRegistry } from '../registry/UnitRegistry.js';
import type { ErrorHandler, ExecuteOptions } from '../resilience/ErrorHandler.js';
import type { IntentRouter } from '../routing/IntentRouter.js';
import { createExecutionStateMachine, isExecutionTerminal, type StateMachine } from '../state/StateMachine.js';
import type { KeyValueStore } from '../stores/KeyValueStore.js';
import type { TaskRunner } from '../tasks/TaskRunner.js';
import {
  ExecutionState,
  type AuxiliaryContext,
  type Candidate,
  type Execution,
  type ExecutionRequest,
  type Outcome,
} from '../types/core-types.js';
import { aggregateResults, toPriorResult } from './aggregate.js';

export type ExecutionRequestInput = Omit<ExecutionRequest, 'mode'> & {
  mode?: ExecutionRequest['mode'];
};

export interface SupervisorOptions {
  /** Checkpoint store keyed by execution id */
  store: KeyValueStore<Execution>;
  /** Backgrounded invocations go through this when set */
  taskRunner?: TaskRunner;
  clock?: Clock;
  logger?: EngineLogger;
  events?: EventBus;
  idGenerator?: () => string;
}

export interface RunOptions {
  signal?: AbortSignal;
}

/**
 * Returned by start(): the execution keeps running after the call returns
 */
export interface ExecutionHandle {
  readonly executionId: string;
  /** Resolves with the final snapshot; never rejects */
  readonly done: Promise<Execution>;
  cancel(): void;
}

export class AgentSupervisor {
  private readonly store: KeyValueStore<Execution>;
  private readonly taskRunner?: TaskRunner;
  private readonly clock: Clock;
  private readonly logger: EngineLogger;
  private readonly events?: EventBus;
  private readonly nextId: () => string;
  private readonly checkpointLocks = new KeyedMutex();
  /** Executions currently driven by this process */
  private readonly active = new Map<string, Promise<Execution>>();

  constructor(
    private readonly registry: UnitRegistry,
    private readonly router: IntentRouter,
    private readonly handler: ErrorHandler,
    options: SupervisorOptions
  ) {
    this.store = options.store;
    this.taskRunner = options.taskRunner;
    this.clock = options.clock ?? systemClock;
    this.logger = (options.logger ?? LoggerManager.getLogger()).child('AgentSupervisor');
    this.events = options.events;
    this.nextId = options.idGenerator ?? (() => randomUUID());
  }

  /**
   * Persist a new PENDING execution without running it
   */
  async create(request: ExecutionRequestInput): Promise<Execution> {
    const now = this.clock.now();
    const execution: Execution = {
      id: this.nextId(),
      request: { ...request, mode: request.mode ?? 'parallel' },
      state: ExecutionState.PENDING,
      candidates: [],
      invocations: [],
      checkpoint: {
        state: ExecutionState.PENDING,
        lastCompletedStepIndex: -1,
        partialResults: [],
      },
      transitions: [],
      createdAt: now,
      updatedAt: now,
    };
    await this.persist(execution);
    return execution;
  }

  /**
   * Run a request to a terminal state
   *
   * @throws {NoCandidateError} when routing finds nothing (the execution is FAILED)
   */
  async run(request: ExecutionRequestInput, options: RunOptions = {}): Promise<Execution> {
    const execution = await this.create(request);
    return this.track(execution, options.signal);
  }

  /**
   * Run a request in the background. Invocations go through the task runner
   * when one is configured.
   */
  async start(request: ExecutionRequestInput): Promise<ExecutionHandle> {
    const execution = await this.create({ ...request, background: true });
    const controller = new AbortController();

    const done = this.track(execution, controller.signal).catch((error: unknown) => {
      this.logger.error(`background execution ${execution.id} ended in error`, toError(error));
      return execution;
    });

    return {
      executionId: execution.id,
      done,
      cancel: () => controller.abort(),
    };
  }

  /**
   * Reload a checkpoint and continue from its recorded state. A terminal
   * execution is returned unchanged.
   *
   * @throws {ExecutionError} when no checkpoint exists for the id
   */
  async resume(executionId: string, options: RunOptions = {}): Promise<Execution> {
    const running = this.active.get(executionId);
    if (running) {
      return running;
    }

    const execution = await this.get(executionId);
    if (isExecutionTerminal(execution.state)) {
      return execution;
    }

    const settled = execution.checkpoint.partialResults.length;
    this.logger.info(`resuming execution ${executionId} at ${execution.state}`, { settled });
    this.events?.emitSync(
      createEvent(EngineEventType.EXECUTION_RESUMED, { state: execution.state, settled }, { executionId })
    );
    return this.track(execution, options.signal);
  }

  async get(executionId: string): Promise<Execution> {
    const execution = await this.store.get(executionId);
    if (!execution) {
      throw ExecutionError.notFound(executionId);
    }
    return execution;
  }

  /**
   * All checkpointed executions, oldest first
   */
  async list(): Promise<Execution[]> {
    const entries = await this.store.entries();
    return entries.map(([, execution]) => execution).sort((a, b) => a.createdAt - b.createdAt);
  }

  /**
   * Delete terminal executions last updated more than `olderThanMs` ago.
   * Running and resumable executions are kept whatever their age.
   *
   * @returns ids of the deleted executions, oldest first
   */
  async prune(olderThanMs: number): Promise<string[]> {
    if (!Number.isFinite(olderThanMs) || olderThanMs < 0) {
      throw ConfigError.invalid(
        `Retention must be a non-negative number of milliseconds, got ${olderThanMs}`,
        'olderThanMs'
      );
    }
    const cutoff = this.clock.now() - olderThanMs;
    const expired = (await this.list()).filter(
      (execution) =>
        isExecutionTerminal(execution.state) && execution.updatedAt < cutoff && !this.active.has(execution.id)
    );

    const deleted: string[] = [];
    for (const execution of expired) {
      if (await this.checkpointLocks.runExclusive(execution.id, () => this.store.delete(execution.id))) {
        deleted.push(execution.id);
      }
    }
    if (deleted.length > 0) {
      this.logger.info(`pruned ${deleted.length} execution(s)`, { olderThanMs });
    }
    return deleted;
  }

  private async track(execution: Execution, signal?: AbortSignal): Promise<Execution> {
    const running = this.drive(execution, signal);
    this.active.set(execution.id, running);
    try {
      return await running;
    } finally {
      this.active.delete(execution.id);
    }
  }

  private async drive(execution: Execution, signal?: AbortSignal): Promise<Execution> {
    const machine = createExecutionStateMachine(execution.state, () => this.clock.now());

    try {
      if (machine.getState() === ExecutionState.PENDING) {
        await this.transition(execution, machine, ExecutionState.ROUTING);
      }

      if (machine.getState() === ExecutionState.ROUTING) {
        execution.candidates = await this.selectCandidates(execution.request);
        await this.transition(
          execution,
          machine,
          ExecutionState.EXECUTING,
          `${execution.candidates.length} candidate(s)`
        );
      }

      if (machine.getState() === ExecutionState.EXECUTING) {
        await this.executeCandidates(execution, signal);
        await this.transition(execution, machine, ExecutionState.AGGREGATING);
      }

      if (machine.getState() === ExecutionState.AGGREGATING) {
        execution.aggregate = aggregateResults(execution.checkpoint.partialResults);
        await this.transition(
          execution,
          machine,
          ExecutionState.COMPLETED,
          execution.aggregate.allFailed ? 'all candidates failed' : undefined
        );
      }

      return execution;
    } catch (error) {
      const cause = toError(error);
      // AGGREGATING has no FAILED edge; the execution stays resumable there
      if (machine.canTransition(ExecutionState.FAILED)) {
        execution.error = {
          code: cause instanceof ConductorError ? cause.code : 'UNEXPECTED',
          message: cause.message,
        };
        try {
          await this.transition(execution, machine, ExecutionState.FAILED, cause.message);
        } catch (persistError) {
          this.logger.error(`could not record failure of ${execution.id}`, toError(persistError));
        }
      }
      throw cause instanceof ConductorError ? cause : ExecutionError.aborted(execution.id, cause);
    }
  }

  /**
   * Named units bypass the router and score 1
   */
  private async selectCandidates(request: ExecutionRequest): Promise<Candidate[]> {
    if (request.units && request.units.length > 0) {
      return request.units.map((name) => ({ unitName: this.registry.lookup(name).name, score: 1 }));
    }
    return this.router.route(request.text);
  }

  private async executeCandidates(execution: Execution, signal?: AbortSignal): Promise<void> {
    const settled = new Set(execution.checkpoint.partialResults.map((result) => result.index));
    const pending = execution.candidates
      .map((candidate, index) => ({ unitName: candidate.unitName, index }))
      .filter(({ index }) => !settled.has(index));

    if (execution.request.mode === 'sequential') {
      for (const { unitName, index } of pending) {
        const outcome = await this.invoke(execution, unitName, this.auxiliary(execution, true), signal);
        await this.recordResult(execution, index, unitName, outcome);
      }
      return;
    }

    const context = this.auxiliary(execution, false);
    const results = await Promise.allSettled(
      pending.map(async ({ unitName, index }) => {
        const outcome = await this.invoke(execution, unitName, context, signal);
        await this.recordResult(execution, index, unitName, outcome);
      })
    );
    for (const result of results) {
      if (result.status === 'rejected') {
        throw toError(result.reason);
      }
    }
  }

  /**
   * Sequential candidates also see the results of those before them
   */
  private auxiliary(execution: Execution, includeSettled: boolean): AuxiliaryContext {
    const { request } = execution;
    const priorResults = [...(request.context?.previousResults ?? [])];
    if (includeSettled) {
      priorResults.push(...execution.checkpoint.partialResults.map((result) => toPriorResult(result.outcome)));
    }
    return {
      request: request.text,
      priorResults,
      workflow: request.context?.workflow,
    };
  }

  private invoke(
    execution: Execution,
    unitName: string,
    context: AuxiliaryContext,
    signal?: AbortSignal
  ): Promise<Outcome> {
    const args = execution.request.args ?? {};
    const options: ExecuteOptions = {
      policy: execution.request.policy,
      signal,
      context,
      onInvocation: (invocation) => {
        execution.invocations.push(invocation);
      },
    };

    if (execution.request.background && this.taskRunner) {
      const task = this.taskRunner.launch(unitName, args, { ...options, executionId: execution.id });
      return this.taskRunner.wait(task.id);
    }
    return this.handler.execute(unitName, args, options);
  }

  private async recordResult(execution: Execution, index: number, unitName: string, outcome: Outcome): Promise<void> {
    const { checkpoint } = execution;
    checkpoint.partialResults.push({ index, unitName, outcome, settledAt: this.clock.now() });
    checkpoint.partialResults.sort((a, b) => a.index - b.index);
    checkpoint.lastCompletedStepIndex = contiguousPrefix(checkpoint.partialResults.map((result) => result.index));
    execution.updatedAt = this.clock.now();

    this.logger.record({
      unit: unitName,
      status: outcome.status === 'success' ? 'success' : 'error',
      message: `candidate ${index + 1}/${execution.candidates.length} settled: ${outcome.status}`,
      context: { executionId: execution.id },
    });
    this.events?.emitSync(
      createEvent<ExecutionSettledPayload>(
        EngineEventType.EXECUTION_SETTLED,
        { index, outcome },
        { executionId: execution.id, unit: unitName }
      )
    );
    await this.persist(execution);
  }

  private async transition(
    execution: Execution,
    machine: StateMachine<ExecutionState>,
    to: ExecutionState,
    reason?: string
  ): Promise<void> {
    const record = machine.transition(to, reason);
    execution.state = to;
    execution.checkpoint.state = to;
    execution.transitions.push({ from: record.from, to, timestamp: record.timestamp, reason });
    execution.updatedAt = record.timestamp;

    this.logger.record({
      unit: 'supervisor',
      status: to === ExecutionState.FAILED ? 'error' : to === ExecutionState.COMPLETED ? 'complete' : 'info',
      message: `execution ${execution.id}: ${record.from} → ${to}`,
      detail: reason,
    });
    this.events?.emitSync(
      createEvent<ExecutionTransitionPayload>(
        EngineEventType.EXECUTION_TRANSITION,
        { from: record.from, to, reason },
        { executionId: execution.id }
      )
    );
    await this.persist(execution);
  }

  /**
   * Writes for one execution are serialised; the latest snapshot wins
   */
  private persist(execution: Execution): Promise<void> {
    return this.checkpointLocks.runExclusive(execution.id, () => this.store.put(execution.id, execution));
  }
}

/**
 * Highest index i such that 0..i are all present; -1 when 0 is missing
 */
function contiguousPrefix(indices: readonly number[]): number {
  const present = new Set(indices);
  let last = -1;
  while (present.has(last + 1)) {
    last++;
  }
  return last;
}
