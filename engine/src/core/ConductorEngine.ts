/**
 * Conductor Engine - Main Public API
 *
 * Wires the registry, router, error handler, supervisor, task runner,
 * workflow coordinator and scheduler from one configuration object.
 *
 * @example
 * ```ts
 * const engine = await ConductorEngine.fromConfigFile('./conductor.yaml');
 * const execution = await engine.run({ text: 'check disk usage' });
 * console.log(execution.aggregate?.text);
 * await engine.shutdown();
 * ```
 *
 * @module core
 */

import { mkdirSync } from 'node:fs';
import { join } from 'node:path';
import Database from 'better-sqlite3';
import type { Database as DatabaseInstance } from 'better-sqlite3';
import { systemClock, type Clock } from '../automation/Clock.js';
import { toError } from '../errors/index.js';
import { EventBus } from '../events/EventBus.js';
import type { EngineLogger } from '../logging/EngineLogger.js';
import { LoggerManager } from '../logging/LoggerManager.js';
import { readRecentErrors } from '../logging/LogReader.js';
import { ConsoleSink, FileSink } from '../logging/sinks.js';
import { UnitRegistry } from '../registry/UnitRegistry.js';
import { CircuitBreaker } from '../resilience/CircuitBreaker.js';
import { ErrorHandler, type ErrorRecord, type RecentErrorsQuery } from '../resilience/ErrorHandler.js';
import { HashingEmbedder } from '../routing/EmbeddingProvider.js';
import { IntentRouter, type RoutingExplanation } from '../routing/IntentRouter.js';
import { HybridScorer, type IntentScorer } from '../routing/IntentScorer.js';
import { WorkflowScheduler, type WorkflowSchedule } from '../scheduling/WorkflowScheduler.js';
import { FileStateStore } from '../stores/FileStateStore.js';
import { InMemoryStateStore } from '../stores/InMemoryStateStore.js';
import type { KeyValueStore } from '../stores/KeyValueStore.js';
import { SqliteStateStore } from '../stores/SqliteStateStore.js';
import {
  AgentSupervisor,
  type ExecutionHandle,
  type ExecutionRequestInput,
  type RunOptions,
} from '../supervisor/AgentSupervisor.js';
import { TaskRunner } from '../tasks/TaskRunner.js';
import type {
  CircuitSnapshot,
  Execution,
  Unit,
  UnitSpec,
  UnitSpecInput,
  WorkflowRun,
} from '../types/core-types.js';
import { LogLevel, type LogSink } from '../types/log-types.js';
import { CircuitSnapshotSchema, ExecutionSchema } from '../types/schemas.js';
import { ProcessUnit } from '../units/ProcessUnit.js';
import { FileReportStore, InMemoryReportStore, type ReportStore } from '../workflow/ReportStore.js';
import { TemplateCatalog } from '../workflow/TemplateCatalog.js';
import { TemplateLoader } from '../workflow/TemplateLoader.js';
import { WorkflowCoordinator, type WorkflowRunOptions } from '../workflow/WorkflowCoordinator.js';
import { ConfigLoader } from './ConfigLoader.js';
import {
  applyConfigDefaults,
  type ConductorEngineConfig,
  type LogLevelName,
  type ResolvedEngineConfig,
} from './EngineConfig.js';

const LOG_LEVELS: Record<LogLevelName, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
  silent: LogLevel.SILENT,
};

/**
 * Collaborators that replace the ones built from configuration
 */
export interface ConductorEngineOptions {
  clock?: Clock;
  logger?: EngineLogger;
  /** Extra sinks for the engine logger, when it is built here */
  sinks?: LogSink[];
  scorer?: IntentScorer;
  executionStore?: KeyValueStore<Execution>;
  circuitStore?: KeyValueStore<CircuitSnapshot>;
  reportStore?: ReportStore;
}

export class ConductorEngine {
  readonly config: ResolvedEngineConfig;
  readonly logger: EngineLogger;
  readonly events = new EventBus();
  readonly registry = new UnitRegistry();
  readonly router: IntentRouter;
  readonly breaker: CircuitBreaker;
  readonly handler: ErrorHandler;
  readonly tasks: TaskRunner;
  readonly supervisor: AgentSupervisor;
  readonly catalog: TemplateCatalog;
  readonly coordinator: WorkflowCoordinator;
  readonly scheduler: WorkflowScheduler;
  readonly reports: ReportStore;

  private readonly database?: DatabaseInstance;
  private initialized: Promise<void> | null = null;

  constructor(config: ConductorEngineConfig = {}, options: ConductorEngineOptions = {}) {
    this.config = applyConfigDefaults(config);
    const clock = options.clock ?? systemClock;
    this.logger = options.logger ?? this.createLogger(options.sinks ?? []);

    // Stores: injected ones win over the configured kind
    let executionStore = options.executionStore;
    let circuitStore = options.circuitStore;
    if (!executionStore || !circuitStore) {
      const stores = this.createStores();
      executionStore = executionStore ?? stores.executions;
      circuitStore = circuitStore ?? stores.circuits;
      this.database = stores.database;
    }
    this.reports =
      options.reportStore ??
      (this.config.store === 'memory' ? new InMemoryReportStore() : new FileReportStore(this.config.reportsDir));

    const { keywordWeight, semanticWeight, ...routerOptions } = this.config.router;
    this.router = new IntentRouter(
      this.registry,
      options.scorer ?? new HybridScorer(new HashingEmbedder(), { keywordWeight, semanticWeight }),
      routerOptions,
      this.logger
    );
    this.breaker = new CircuitBreaker({
      ...this.config.circuit,
      store: circuitStore,
      clock,
      logger: this.logger,
      events: this.events,
    });
    this.handler = new ErrorHandler(this.registry, this.breaker, {
      clock,
      logger: this.logger,
      events: this.events,
      defaults: this.config.retry,
    });
    this.tasks = new TaskRunner(this.handler, this.registry, {
      clock,
      logger: this.logger,
      events: this.events,
      retentionMs: this.config.taskRetentionMs,
    });
    this.supervisor = new AgentSupervisor(this.registry, this.router, this.handler, {
      store: executionStore,
      taskRunner: this.tasks,
      clock,
      logger: this.logger,
      events: this.events,
    });
    this.catalog = new TemplateCatalog(this.registry, this.logger);
    this.coordinator = new WorkflowCoordinator(this.catalog, this.supervisor, this.reports, {
      clock,
      logger: this.logger,
      events: this.events,
    });
    this.scheduler = new WorkflowScheduler(this.coordinator, this.catalog, {
      clock,
      logger: this.logger,
      events: this.events,
      timezone: this.config.timezone,
    });

    for (const definition of this.config.units) {
      const { command, args, cwd, env, fatalExitCodes, killGraceMs, ...spec } = definition;
      this.registry.register(spec, new ProcessUnit({ command, args, cwd, env, fatalExitCodes, killGraceMs }));
    }
  }

  /**
   * Engine from a configuration file (or the conductor.yaml found in cwd),
   * initialized and ready to run
   */
  static async fromConfigFile(filePath?: string, options: ConductorEngineOptions = {}): Promise<ConductorEngine> {
    const engine = new ConductorEngine(await ConfigLoader.load(filePath), options);
    await engine.init();
    return engine;
  }

  /**
   * Load persisted circuit states, templates and configured schedules.
   * Runs once; later calls return the first call's promise.
   */
  init(): Promise<void> {
    if (!this.initialized) {
      this.initialized = this.initialize();
    }
    return this.initialized;
  }

  private async initialize(): Promise<void> {
    const circuits = await this.breaker.load();

    const templates: string[] = [];
    if (this.config.includeDefaultTemplates) {
      templates.push(...this.catalog.addAvailable(await TemplateLoader.defaults()));
    }
    if (this.config.templatesFile) {
      for (const input of await TemplateLoader.fromFile(this.config.templatesFile)) {
        templates.push(this.catalog.add(input).name);
      }
    }
    for (const schedule of this.config.schedules) {
      this.scheduler.schedule(schedule.template, schedule.cron, schedule.timezone);
    }

    this.logger.info('engine initialized', {
      units: this.registry.names().length,
      templates,
      circuits,
      schedules: this.config.schedules.length,
    });
  }

  registerUnit(spec: UnitSpecInput, unit: Unit): UnitSpec {
    return this.registry.register(spec, unit);
  }

  explain(text: string): Promise<RoutingExplanation> {
    return this.router.explain(text);
  }

  /**
   * Route and run a request to completion
   */
  async run(request: ExecutionRequestInput, options: RunOptions = {}): Promise<Execution> {
    await this.init();
    return this.supervisor.run(request, options);
  }

  /**
   * Run a request in the background; invocations are listed by the task runner
   */
  async start(request: ExecutionRequestInput): Promise<ExecutionHandle> {
    await this.init();
    return this.supervisor.start(request);
  }

  async resume(executionId: string, options: RunOptions = {}): Promise<Execution> {
    await this.init();
    return this.supervisor.resume(executionId, options);
  }

  /**
   * Delete finished executions not updated for `olderThanMs`
   *
   * @returns ids of the deleted executions
   */
  async prune(olderThanMs: number): Promise<string[]> {
    await this.init();
    return this.supervisor.prune(olderThanMs);
  }

  /**
   * Recent failures, newest first. Read from the log directory when one is
   * configured, so earlier processes count too; otherwise from this
   * process's own history.
   */
  async recentErrors(query: RecentErrorsQuery = {}): Promise<ErrorRecord[]> {
    if (this.config.logDir) {
      await this.logger.flush();
      return readRecentErrors(this.config.logDir, query);
    }
    return this.handler.recentErrors(query);
  }

  async runWorkflow(templateName: string, options: WorkflowRunOptions = {}): Promise<WorkflowRun> {
    await this.init();
    return this.coordinator.run(templateName, options);
  }

  async schedule(templateName: string, cronExpression: string, timezone?: string): Promise<WorkflowSchedule> {
    await this.init();
    return this.scheduler.schedule(templateName, cronExpression, timezone);
  }

  /**
   * Stop schedules, kill running tasks, flush logs and close the database
   */
  async shutdown(): Promise<void> {
    await this.scheduler.stop();
    await this.tasks.shutdown();
    await this.logger.flush();
    try {
      this.database?.close();
    } catch (error) {
      this.logger.error('failed to close state database', toError(error));
    }
  }

  private createLogger(extraSinks: LogSink[]): EngineLogger {
    const sinks: LogSink[] = [new ConsoleSink(this.config.logFormat, process.stderr.isTTY === true), ...extraSinks];
    if (this.config.logDir) {
      sinks.push(new FileSink(this.config.logDir));
    }
    return LoggerManager.initialize({
      level: LOG_LEVELS[this.config.logLevel],
      team: this.config.team,
      sinks,
    });
  }

  private createStores(): {
    executions: KeyValueStore<Execution>;
    circuits: KeyValueStore<CircuitSnapshot>;
    database?: DatabaseInstance;
  } {
    switch (this.config.store) {
      case 'memory':
        return { executions: new InMemoryStateStore(), circuits: new InMemoryStateStore() };
      case 'sqlite': {
        mkdirSync(this.config.stateDir, { recursive: true });
        const database = new Database(join(this.config.stateDir, 'conductor.db'));
        return {
          database,
          executions: new SqliteStateStore({ database, table: 'executions', schema: ExecutionSchema }),
          circuits: new SqliteStateStore({ database, table: 'circuits', schema: CircuitSnapshotSchema }),
        };
      }
      case 'file':
        return {
          executions: new FileStateStore(join(this.config.stateDir, 'executions'), ExecutionSchema),
          circuits: new FileStateStore(join(this.config.stateDir, 'circuits'), CircuitSnapshotSchema),
        };
    }
  }
}
