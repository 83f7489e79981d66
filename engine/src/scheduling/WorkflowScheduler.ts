/**
 * Workflow Scheduler
 *
 * Runs workflow templates on cron expressions. Each schedule gets its own
 * node-cron task while the scheduler is started; a tick that fires while the
 * previous run of the same schedule is still going is skipped.
 *
 * @module scheduling
 */

import cron, { type ScheduledTask } from 'node-cron';
import { systemClock, type Clock } from '../automation/Clock.js';
import { ConfigError, TemplateNotFoundError, toError } from '../errors/index.js';
import { createEvent, EngineEventType, type ScheduleTriggeredPayload } from '../events/EngineEvents.js';
import type { EventBus } from '../events/EventBus.js';
import type { EngineLogger } from '../logging/EngineLogger.js';
import { LoggerManager } from '../logging/LoggerManager.js';
import type { WorkflowRun } from '../types/core-types.js';

/**
 * What the scheduler needs from the coordinator and the catalog
 */
export interface ScheduledWorkflowRunner {
  run(templateName: string): Promise<WorkflowRun>;
}

export interface TemplateLookup {
  has(name: string): boolean;
  names(): string[];
}

export interface WorkflowSchedule {
  id: string;
  template: string;
  cron: string;
  timezone?: string;
  createdAt: number;
  runs: number;
  skipped: number;
  lastRunAt?: number;
  lastRunId?: string;
  lastError?: string;
  running: boolean;
}

export interface WorkflowSchedulerOptions {
  clock?: Clock;
  logger?: EngineLogger;
  events?: EventBus;
  /** Timezone for schedules that name none */
  timezone?: string;
  idGenerator?: () => string;
}

export class WorkflowScheduler {
  private readonly schedules = new Map<string, WorkflowSchedule>();
  private readonly tasks = new Map<string, ScheduledTask>();
  private readonly inFlight = new Set<Promise<void>>();
  private readonly clock: Clock;
  private readonly logger: EngineLogger;
  private readonly events?: EventBus;
  private readonly timezone?: string;
  private readonly nextId: () => string;
  private started = false;

  constructor(
    private readonly runner: ScheduledWorkflowRunner,
    private readonly templates: TemplateLookup,
    options: WorkflowSchedulerOptions = {}
  ) {
    this.clock = options.clock ?? systemClock;
    this.logger = (options.logger ?? LoggerManager.getLogger()).child('WorkflowScheduler');
    this.events = options.events;
    this.timezone = options.timezone;
    let counter = 0;
    this.nextId = options.idGenerator ?? (() => `sched_${++counter}`);
  }

  /**
   * @throws {ConfigError} when the cron expression is invalid
   * @throws {TemplateNotFoundError} when the template is not loaded
   */
  schedule(templateName: string, cronExpression: string, timezone?: string): WorkflowSchedule {
    if (!cron.validate(cronExpression)) {
      throw ConfigError.invalid(
        `Invalid cron expression "${cronExpression}" for template "${templateName}"`,
        'cron',
        'Use five fields (minute hour day month weekday) or six with seconds first'
      );
    }
    if (!this.templates.has(templateName)) {
      throw new TemplateNotFoundError(templateName, this.templates.names());
    }

    const schedule: WorkflowSchedule = {
      id: this.nextId(),
      template: templateName,
      cron: cronExpression,
      timezone: timezone ?? this.timezone,
      createdAt: this.clock.now(),
      runs: 0,
      skipped: 0,
      running: false,
    };
    this.schedules.set(schedule.id, schedule);
    if (this.started) {
      this.startTask(schedule);
    }

    this.logger.info(`scheduled "${templateName}"`, { id: schedule.id, cron: cronExpression });
    return schedule;
  }

  unschedule(id: string): boolean {
    this.stopTask(id);
    return this.schedules.delete(id);
  }

  get(id: string): WorkflowSchedule | undefined {
    return this.schedules.get(id);
  }

  list(): WorkflowSchedule[] {
    return [...this.schedules.values()];
  }

  isStarted(): boolean {
    return this.started;
  }

  /**
   * Start a cron task for every schedule
   */
  start(): void {
    if (this.started) {
      return;
    }
    this.started = true;
    for (const schedule of this.schedules.values()) {
      this.startTask(schedule);
    }
  }

  /**
   * Stop every cron task and wait for runs already in progress
   */
  async stop(): Promise<void> {
    this.started = false;
    for (const id of [...this.tasks.keys()]) {
      this.stopTask(id);
    }
    await Promise.all([...this.inFlight]);
  }

  /**
   * Fire a schedule now, as a cron tick would
   *
   * @returns false when the previous run is still going and the tick was skipped
   */
  async trigger(id: string): Promise<boolean> {
    const schedule = this.schedules.get(id);
    if (!schedule) {
      return false;
    }
    if (schedule.running) {
      schedule.skipped++;
      this.logger.warn(`skipping tick of "${schedule.template}": previous run still in progress`, { id });
      return false;
    }

    const run = this.runSchedule(schedule);
    this.inFlight.add(run);
    try {
      await run;
    } finally {
      this.inFlight.delete(run);
    }
    return true;
  }

  private async runSchedule(schedule: WorkflowSchedule): Promise<void> {
    schedule.running = true;
    schedule.runs++;
    schedule.lastRunAt = this.clock.now();
    this.events?.emitSync(
      createEvent<ScheduleTriggeredPayload>(EngineEventType.SCHEDULE_TRIGGERED, {
        scheduleId: schedule.id,
        template: schedule.template,
      })
    );

    try {
      const run = await this.runner.run(schedule.template);
      schedule.lastRunId = run.id;
      schedule.lastError = undefined;
      this.logger.info(`scheduled run of "${schedule.template}" finished: ${run.status}`, {
        id: schedule.id,
        runId: run.id,
      });
    } catch (error) {
      const err = toError(error);
      schedule.lastError = err.message;
      this.logger.error(`scheduled run of "${schedule.template}" failed`, err, { id: schedule.id });
    } finally {
      schedule.running = false;
    }
  }

  private startTask(schedule: WorkflowSchedule): void {
    this.stopTask(schedule.id);
    const task = cron.schedule(
      schedule.cron,
      async () => {
        await this.trigger(schedule.id);
      },
      { name: schedule.id, timezone: schedule.timezone }
    );
    this.tasks.set(schedule.id, task);
  }

  private stopTask(id: string): void {
    const task = this.tasks.get(id);
    if (task) {
      void task.destroy();
      this.tasks.delete(id);
    }
  }
}
