/**
 * Task Runner
 *
 * Detaches unit invocations from the caller. launch() returns a handle
 * immediately; the invocation runs through the error handler in the
 * background and completion is published as `task.completed`.
 *
 * Finished tasks stay queryable until reaped explicitly or until the
 * retention window after completion elapses.
 *
 * @module tasks
 */

import { randomUUID } from 'node:crypto';
import { systemClock, type Clock } from '../automation/Clock.js';
import { ExecutionError, toError } from '../errors/index.js';
import { createEvent, EngineEventType, type TaskCompletedPayload } from '../events/EngineEvents.js';
import type { EventBus } from '../events/EventBus.js';
import type { EngineLogger } from '../logging/EngineLogger.js';
import { LoggerManager } from '../logging/LoggerManager.js';
import type { UnitRegistry } from '../registry/UnitRegistry.js';
import type { ErrorHandler } from '../resilience/ErrorHandler.js';
import {
  FailureKind,
  type AuxiliaryContext,
  type Invocation,
  type Outcome,
  type RetryPolicyOverrides,
  type UnitArgs,
} from '../types/core-types.js';

export const DEFAULT_TASK_RETENTION_MS = 24 * 60 * 60 * 1000;

export const TASK_STATUSES = ['running', 'succeeded', 'failed', 'cancelled'] as const;

export type TaskStatus = (typeof TASK_STATUSES)[number];

/**
 * Snapshot of a task, safe to hand out
 */
export interface TaskHandle {
  readonly id: string;
  readonly unit: string;
  readonly args: UnitArgs;
  readonly status: TaskStatus;
  readonly launchedAt: number;
  readonly completedAt?: number;
  readonly outcome?: Outcome;
  /** Execution the task was launched for, if any */
  readonly executionId?: string;
}

export interface TaskSpec {
  unit: string;
  args?: UnitArgs;
  context?: AuxiliaryContext;
  policy?: RetryPolicyOverrides;
  /** Aborting this kills the task */
  signal?: AbortSignal;
  executionId?: string;
  onInvocation?: (invocation: Invocation) => void;
}

export interface TaskRunnerOptions {
  clock?: Clock;
  logger?: EngineLogger;
  events?: EventBus;
  retentionMs?: number;
  idGenerator?: () => string;
}

interface TrackedTask {
  handle: TaskHandle;
  controller: AbortController;
  done: Promise<Outcome>;
}

export class TaskRunner {
  private readonly tasks = new Map<string, TrackedTask>();
  private readonly clock: Clock;
  private readonly logger: EngineLogger;
  private readonly events?: EventBus;
  private readonly retentionMs: number;
  private readonly nextId: () => string;

  constructor(
    private readonly handler: ErrorHandler,
    private readonly registry: UnitRegistry,
    options: TaskRunnerOptions = {}
  ) {
    this.clock = options.clock ?? systemClock;
    this.logger = (options.logger ?? LoggerManager.getLogger()).child('TaskRunner');
    this.events = options.events;
    this.retentionMs = options.retentionMs ?? DEFAULT_TASK_RETENTION_MS;
    this.nextId = options.idGenerator ?? (() => `task-${randomUUID()}`);
  }

  /**
   * Start a unit invocation in the background
   *
   * @throws {RegistryError} when the unit is not registered
   */
  launch(unit: string, args: UnitArgs = {}, options: Omit<TaskSpec, 'unit' | 'args'> = {}): TaskHandle {
    this.registry.lookup(unit);
    this.reapExpired();

    const id = this.nextId();
    const controller = new AbortController();
    if (options.signal?.aborted) {
      controller.abort();
    } else {
      options.signal?.addEventListener('abort', () => controller.abort(), { once: true });
    }

    const handle: TaskHandle = {
      id,
      unit,
      args: { ...args },
      status: 'running',
      launchedAt: this.clock.now(),
      executionId: options.executionId,
    };

    const done = this.handler
      .execute(unit, args, {
        signal: controller.signal,
        context: options.context,
        policy: options.policy,
        onInvocation: options.onInvocation,
      })
      .catch((error: unknown): Outcome => {
        this.logger.error(`task ${id} crashed`, toError(error), { unit });
        return {
          status: 'failure',
          unit,
          attempts: [],
          fallbacksTried: [],
          failure: { kind: FailureKind.RETRYABLE, message: toError(error).message },
        };
      })
      .then((outcome) => {
        this.settle(id, outcome);
        return outcome;
      });

    this.tasks.set(id, { handle, controller, done });
    this.logger.record({ unit, status: 'start', message: `task ${id} launched` });
    this.events?.emitSync(
      createEvent(EngineEventType.TASK_LAUNCHED, { taskId: id }, { unit, executionId: options.executionId })
    );

    return handle;
  }

  /**
   * Launch several tasks at once, one handle per spec
   */
  parallel(...specs: TaskSpec[]): TaskHandle[] {
    for (const spec of specs) {
      this.registry.lookup(spec.unit);
    }
    return specs.map(({ unit, args, ...options }) => this.launch(unit, args, options));
  }

  status(id: string): TaskHandle {
    return this.get(id).handle;
  }

  /**
   * Tasks in launch order, optionally only those with the given status
   */
  list(status?: TaskStatus): TaskHandle[] {
    const handles = [...this.tasks.values()].map((task) => task.handle);
    return status === undefined ? handles : handles.filter((handle) => handle.status === status);
  }

  /**
   * Abort a running task. Its outcome becomes Cancelled.
   *
   * @returns false when the task had already finished
   */
  kill(id: string): boolean {
    const task = this.get(id);
    if (task.handle.status !== 'running') {
      return false;
    }
    task.controller.abort();
    this.logger.record({ unit: task.handle.unit, status: 'warning', message: `task ${id} killed` });
    return true;
  }

  wait(id: string): Promise<Outcome> {
    return this.get(id).done;
  }

  /**
   * Forget a finished task
   *
   * @returns false when the task is still running
   */
  reap(id: string): boolean {
    const task = this.get(id);
    if (task.handle.status === 'running') {
      return false;
    }
    this.tasks.delete(id);
    return true;
  }

  /**
   * Forget finished tasks whose retention window has elapsed
   *
   * @returns number of tasks removed
   */
  reapExpired(): number {
    const now = this.clock.now();
    let removed = 0;
    for (const [id, task] of this.tasks) {
      const completedAt = task.handle.completedAt;
      if (completedAt !== undefined && now - completedAt >= this.retentionMs) {
        this.tasks.delete(id);
        removed++;
      }
    }
    return removed;
  }

  get runningCount(): number {
    return this.list('running').length;
  }

  /**
   * Kill everything still running and wait for it to settle
   */
  async shutdown(): Promise<void> {
    const running = [...this.tasks.values()].filter((task) => task.handle.status === 'running');
    for (const task of running) {
      task.controller.abort();
    }
    await Promise.all(running.map((task) => task.done));
  }

  private get(id: string): TrackedTask {
    const task = this.tasks.get(id);
    if (!task) {
      throw ExecutionError.taskNotFound(id);
    }
    return task;
  }

  private settle(id: string, outcome: Outcome): void {
    const task = this.tasks.get(id);
    if (!task) {
      return;
    }
    task.handle = {
      ...task.handle,
      status: taskStatus(outcome),
      completedAt: this.clock.now(),
      outcome,
    };

    this.logger.record({
      unit: task.handle.unit,
      status: outcome.status === 'success' ? 'complete' : 'warning',
      message: `task ${id} ${task.handle.status}`,
    });
    this.events?.emitSync(
      createEvent<TaskCompletedPayload>(
        EngineEventType.TASK_COMPLETED,
        { taskId: id, outcome },
        { unit: task.handle.unit, executionId: task.handle.executionId }
      )
    );
  }
}

function taskStatus(outcome: Outcome): TaskStatus {
  switch (outcome.status) {
    case 'success':
      return 'succeeded';
    case 'failure':
      return 'failed';
    case 'cancelled':
      return 'cancelled';
  }
}
