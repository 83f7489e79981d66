/**
 * Workflow Coordinator
 *
 * Runs a named template step by step over the supervisor. Every step becomes
 * one Execution with the step's unit named explicitly, so routing is skipped
 * and the error handler's retry, circuit and fallback rules still apply.
 *
 * - Consecutive PARALLEL steps run concurrently as one group
 * - A step whose dependsOn names a step that did not succeed is skipped
 * - Reports are written in template order, whatever the completion order
 * - Step failures never abort the run; a synthesis report closes it
 *
 * @module workflow
 */

import { randomUUID } from 'node:crypto';
import { systemClock, type Clock } from '../automation/Clock.js';
import { toError } from '../errors/index.js';
import {
  createEvent,
  EngineEventType,
  type WorkflowCompletedPayload,
  type WorkflowStepCompletedPayload,
} from '../events/EngineEvents.js';
import type { EventBus } from '../events/EventBus.js';
import type { EngineLogger } from '../logging/EngineLogger.js';
import { LoggerManager } from '../logging/LoggerManager.js';
import type { AgentSupervisor } from '../supervisor/AgentSupervisor.js';
import {
  StepStatus,
  type Execution,
  type PriorResult,
  type RunningContext,
  type StepReport,
  type StepSpec,
  type WorkflowRun,
  type WorkflowTemplate,
} from '../types/core-types.js';
import type { ReportStore } from './ReportStore.js';
import { buildSynthesis } from './Synthesis.js';
import { groupSteps, type TemplateCatalog } from './TemplateCatalog.js';

export const SUMMARY_CONTEXT_CHARS = 500;

export interface WorkflowCoordinatorOptions {
  clock?: Clock;
  logger?: EngineLogger;
  events?: EventBus;
  idGenerator?: () => string;
}

export interface WorkflowRunOptions {
  signal?: AbortSignal;
}

const PRIOR_STATUS: Record<StepStatus, PriorResult['status']> = {
  [StepStatus.SUCCESS]: 'success',
  [StepStatus.FAILURE]: 'failure',
  [StepStatus.SKIPPED]: 'skipped',
};

export class WorkflowCoordinator {
  private readonly clock: Clock;
  private readonly logger: EngineLogger;
  private readonly events?: EventBus;
  private readonly nextId: () => string;

  constructor(
    private readonly catalog: TemplateCatalog,
    private readonly supervisor: AgentSupervisor,
    private readonly reports: ReportStore,
    options: WorkflowCoordinatorOptions = {}
  ) {
    this.clock = options.clock ?? systemClock;
    this.logger = (options.logger ?? LoggerManager.getLogger()).child('WorkflowCoordinator');
    this.events = options.events;
    this.nextId = options.idGenerator ?? (() => randomUUID().slice(0, 8));
  }

  /**
   * Run a template to completion
   *
   * @throws {TemplateNotFoundError} when the template is not loaded
   */
  async run(templateName: string, options: WorkflowRunOptions = {}): Promise<WorkflowRun> {
    const template = this.catalog.get(templateName);
    const run = this.createRun(template);

    this.logger.record({
      unit: 'workflow',
      status: 'start',
      message: `workflow "${template.name}" started`,
      context: { runId: run.id, steps: template.steps.length },
    });
    this.events?.emitSync(createEvent(EngineEventType.WORKFLOW_STARTED, { template: template.name }, { runId: run.id }));

    const statusById = new Map<string, StepStatus>();
    const indexById = new Map(template.steps.map((step, index) => [step.id, index + 1]));

    for (const group of groupSteps(template.steps)) {
      // Steps of one group all see the context as it was before the group
      const context = snapshotContext(run.runningContext);
      const reports = await Promise.all(
        group.map((step) => this.runStep(run, step, indexById.get(step.id) ?? 0, context, statusById, options))
      );

      for (const report of reports) {
        await this.reports.writeReport(run, report);
        run.stepReports.push(report);
        statusById.set(report.stepId, report.status);
        run.runningContext.workflow.stepId = report.stepId;
        run.runningContext.workflow.currentStep = report.stepIndex;
        run.runningContext.previousResults.push({
          unit: report.unit,
          status: PRIOR_STATUS[report.status],
          summary: report.summary.slice(0, SUMMARY_CONTEXT_CHARS),
        });

        this.logger.record({
          unit: report.unit,
          status: report.status === StepStatus.SUCCESS ? 'success' : 'warning',
          message: `step ${report.stepIndex}/${template.steps.length} "${report.stepId}": ${report.status}`,
          detail: report.status === StepStatus.SUCCESS ? undefined : report.summary,
          context: { runId: run.id },
        });
        this.events?.emitSync(
          createEvent<WorkflowStepCompletedPayload>(
            EngineEventType.WORKFLOW_STEP_COMPLETED,
            { stepIndex: report.stepIndex, stepId: report.stepId, status: report.status },
            { runId: run.id, unit: report.unit }
          )
        );
      }
    }

    const synthesis = buildSynthesis(run.stepReports, template.steps.length + 1, this.timestamp());
    await this.reports.writeReport(run, synthesis);
    run.finalSynthesis = synthesis;
    run.status = synthesis.completion;
    run.completedAt = this.timestamp();
    await this.reports.writeResults(run);

    this.logger.record({
      unit: 'workflow',
      status: 'complete',
      message: `workflow "${template.name}" finished: ${synthesis.completion}`,
      context: { runId: run.id },
    });
    this.events?.emitSync(
      createEvent<WorkflowCompletedPayload>(
        EngineEventType.WORKFLOW_COMPLETED,
        { template: template.name, completion: synthesis.completion },
        { runId: run.id }
      )
    );
    return run;
  }

  private createRun(template: WorkflowTemplate): WorkflowRun {
    const id = this.nextId();
    const first = template.steps[0];
    return {
      id,
      templateName: template.name,
      title: template.title,
      steps: template.steps,
      stepReports: [],
      runningContext: {
        workflow: {
          runId: id,
          template: template.name,
          stepId: first ? first.id : '',
          currentStep: 1,
          totalSteps: template.steps.length,
        },
        previousResults: [],
      },
      finalSynthesis: null,
      status: 'failed',
      startedAt: this.timestamp(),
    };
  }

  /**
   * Never throws: an execution error becomes a failed step
   */
  private async runStep(
    run: WorkflowRun,
    step: StepSpec,
    stepIndex: number,
    context: RunningContext,
    statusById: ReadonlyMap<string, StepStatus>,
    options: WorkflowRunOptions
  ): Promise<StepReport> {
    const started = this.clock.now();
    const base = {
      kind: 'step' as const,
      stepIndex,
      stepId: step.id,
      unit: step.unit,
      role: step.role,
    };

    const blocking = step.dependsOn.filter((dependency) => statusById.get(dependency) !== StepStatus.SUCCESS);
    if (blocking.length > 0) {
      const summary = `Skipped: dependency ${blocking.map((id) => `"${id}"`).join(', ')} did not succeed`;
      return {
        ...base,
        status: StepStatus.SKIPPED,
        summary,
        rawOutput: summary,
        timestamp: this.timestamp(),
        durationMs: 0,
      };
    }

    let execution: Execution;
    try {
      execution = await this.supervisor.run(
        {
          text: step.role ?? `${run.title}: ${step.id}`,
          mode: 'sequential',
          units: [step.unit],
          args: { ...step.args },
          context: {
            workflow: { ...context.workflow, stepId: step.id, currentStep: stepIndex },
            previousResults: context.previousResults,
          },
        },
        { signal: options.signal }
      );
    } catch (error) {
      const message = toError(error).message;
      return {
        ...base,
        status: StepStatus.FAILURE,
        summary: message,
        rawOutput: message,
        timestamp: this.timestamp(),
        durationMs: this.clock.now() - started,
      };
    }

    const entry = execution.aggregate?.entries[0];
    const succeeded = entry?.status === 'success';
    const summary = succeeded ? entry.summary ?? '' : entry?.note?.message ?? 'no result recorded';
    return {
      ...base,
      status: succeeded ? StepStatus.SUCCESS : StepStatus.FAILURE,
      summary,
      rawOutput: succeeded ? rawOutputOf(entry.data, summary) : execution.aggregate?.text ?? summary,
      timestamp: this.timestamp(),
      executionId: execution.id,
      durationMs: this.clock.now() - started,
    };
  }

  private timestamp(): string {
    return new Date(this.clock.now()).toISOString();
  }
}

function snapshotContext(context: RunningContext): RunningContext {
  return { workflow: { ...context.workflow }, previousResults: [...context.previousResults] };
}

/**
 * Unit stdout when the unit captured one, the payload data otherwise
 */
function rawOutputOf(data: Record<string, unknown> | undefined, summary: string): string {
  if (!data || Object.keys(data).length === 0) {
    return summary;
  }
  if (typeof data.stdout === 'string') {
    return data.stdout;
  }
  return JSON.stringify(data, null, 2);
}
