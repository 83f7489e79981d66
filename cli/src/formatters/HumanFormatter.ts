/**
 * Human-Readable Formatter
 *
 * Uses symbols and colors for scannable output.
 *
 * Symbols:
 * - ▶ Workflow or schedule started
 * - ✔ Success
 * - ✖ Failure
 * - ↻ Retrying
 * - ⊘ Skipped
 * - ◼ Cancelled
 */

import chalk from 'chalk';
import {
  ConductorError,
  ExecutionState,
  StepStatus,
  type AggregateEntry,
  type Execution,
  type RoutingExplanation,
  type StepReport,
  type WorkflowRun,
} from '@conductor/engine';
import type { Formatter, FormatterOptions, TableRows } from './Formatter.js';
import { CliEventType, type CliEvent } from '../types/CliEvent.js';
import { alignColumns, divider, formatDuration, StatusSymbols } from '../utils/format.js';

export class HumanFormatter implements Formatter {
  private readonly options: FormatterOptions;

  constructor(options: FormatterOptions = {}) {
    this.options = options;
    if (options.noColor) {
      chalk.level = 0;
    }
  }

  onEvent(event: CliEvent): void {
    if (this.options.silent) {
      return;
    }

    switch (event.type) {
      case CliEventType.EXECUTION_TRANSITION:
        if (this.options.verbose) {
          const reason = event.reason ? chalk.dim(` (${event.reason})`) : '';
          console.log(chalk.dim(`  ${event.executionId}: ${event.from} → ${event.to}`) + reason);
        }
        break;
      case CliEventType.CANDIDATE_SETTLED:
        console.log(`  ${this.entrySymbol(event.status)} ${chalk.bold(event.unit)} ${chalk.dim(event.detail)}`);
        break;
      case CliEventType.INVOCATION_RETRYING:
        console.log(
          chalk.yellow(`  ${StatusSymbols.retry}`),
          chalk.yellow(
            `${event.unit}: retrying (${event.attempt}/${event.maxAttempts}) after ${formatDuration(event.delayMs)}`
          ),
          chalk.dim(event.detail)
        );
        break;
      case CliEventType.CIRCUIT_CHANGED:
        console.log(
          chalk.magenta(`  ${StatusSymbols.warning}`),
          chalk.magenta(`circuit for ${event.unit}: ${event.from} → ${event.to}`),
          chalk.dim(`(${event.failureCount} failures)`)
        );
        break;
      case CliEventType.WORKFLOW_STARTED:
        console.log();
        console.log(chalk.cyan(divider(60, '━')));
        console.log(chalk.cyan.bold(`${StatusSymbols.started} ${event.template}`), chalk.dim(`run ${event.runId}`));
        console.log(chalk.cyan(divider(60, '━')));
        break;
      case CliEventType.STEP_COMPLETED:
        console.log(
          `  ${this.stepSymbol(event.status)} ${chalk.dim(`${event.stepIndex}.`)} ${chalk.bold(event.stepId)}`,
          chalk.dim(`(${event.unit})`)
        );
        break;
      case CliEventType.TASK_COMPLETED:
        console.log(`  ${this.entrySymbol(event.status)} task ${chalk.bold(event.taskId)}`, chalk.dim(`(${event.unit})`));
        break;
      case CliEventType.SCHEDULE_TRIGGERED:
        console.log(chalk.blue(`${StatusSymbols.started} schedule ${event.scheduleId} triggered "${event.template}"`));
        break;
    }
  }

  showExecution(execution: Execution): void {
    const aggregate = execution.aggregate;

    console.log();
    console.log(chalk.cyan(divider(60, '═')));
    if (execution.state === ExecutionState.FAILED) {
      console.log(chalk.red.bold(`${StatusSymbols.failure} Execution failed`));
    } else if (!aggregate) {
      console.log(chalk.yellow.bold(`${StatusSymbols.warning} Execution is ${execution.state}`));
    } else if (aggregate.allFailed) {
      console.log(chalk.red.bold(`${StatusSymbols.failure} Every candidate failed`));
    } else if (aggregate.failureCount > 0) {
      console.log(chalk.yellow.bold(`${StatusSymbols.warning} Completed with failures`));
    } else {
      console.log(chalk.green.bold(`${StatusSymbols.success} Execution completed`));
    }
    console.log(chalk.cyan(divider(60, '═')));

    if (execution.error) {
      console.log(chalk.red(`  ${execution.error.code}: ${execution.error.message}`));
    }
    for (const entry of aggregate?.entries ?? []) {
      this.printEntry(entry);
    }

    console.log();
    this.printSummary([
      ['Execution', execution.id],
      ['State', execution.state],
      ['Candidates', execution.candidates.map((candidate) => candidate.unitName).join(', ') || '-'],
      ['Invocations', String(execution.invocations.length)],
      ['Duration', formatDuration(execution.updatedAt - execution.createdAt)],
    ]);
  }

  showRouting(explanation: RoutingExplanation): void {
    const chosen = new Set(explanation.candidates.map((candidate) => candidate.unitName));

    console.log();
    console.log(chalk.bold(`Routing "${explanation.request}"`));
    console.log(chalk.dim(`decision: ${explanation.decision}, floor ${explanation.confidenceFloor.toFixed(2)}`));
    console.log(chalk.dim(divider()));

    const rows = alignColumns([
      ['unit', 'keyword', 'semantic', 'combined'],
      ...explanation.scores.map((score) => [
        score.unitName,
        score.keyword.toFixed(3),
        score.semantic.toFixed(3),
        score.combined.toFixed(3),
      ]),
    ]);
    const [header, ...body] = rows;
    console.log(`   ${chalk.bold(header ?? '')}`);
    body.forEach((line, index) => {
      const score = explanation.scores[index];
      if (score && chosen.has(score.unitName)) {
        console.log(`${chalk.green(StatusSymbols.success)}  ${line}`);
      } else {
        console.log(`   ${chalk.dim(line)}`);
      }
    });
  }

  showWorkflowRun(run: WorkflowRun): void {
    console.log();
    console.log(chalk.cyan(divider(60, '═')));
    switch (run.status) {
      case 'complete':
        console.log(chalk.green.bold(`${StatusSymbols.success} ${run.title} completed`));
        break;
      case 'partial':
        console.log(chalk.yellow.bold(`${StatusSymbols.warning} ${run.title} completed with failures`));
        break;
      case 'failed':
        console.log(chalk.red.bold(`${StatusSymbols.failure} ${run.title} failed`));
        break;
    }
    console.log(chalk.cyan(divider(60, '═')));

    for (const report of run.stepReports) {
      this.printStep(report);
    }

    const recommendations = run.finalSynthesis?.recommendations ?? [];
    if (recommendations.length > 0) {
      console.log();
      console.log(chalk.bold('Recommendations:'));
      for (const recommendation of recommendations) {
        console.log(`  • ${recommendation}`);
      }
    }

    console.log();
    const succeeded = run.stepReports.filter((report) => report.status === StepStatus.SUCCESS).length;
    this.printSummary([
      ['Run', run.id],
      ['Template', run.templateName],
      ['Steps', `${succeeded}/${run.steps.length} succeeded`],
    ]);
  }

  showTable(title: string, rows: TableRows): void {
    console.log(chalk.bold(title));
    if (rows.length <= 1) {
      console.log(chalk.dim('  (none)'));
      return;
    }
    const [header, ...body] = alignColumns(rows);
    console.log(`  ${chalk.dim(header ?? '')}`);
    for (const line of body) {
      console.log(`  ${line}`);
    }
  }

  showText(text: string): void {
    console.log(text);
  }

  showError(error: Error): void {
    console.error();
    if (error instanceof ConductorError) {
      console.error(chalk.red.bold(`${StatusSymbols.failure} ${error.name} [${error.code}]:`), error.message);
      if (error.path) {
        console.error(chalk.dim(`  at ${error.path}`));
      }
    } else {
      console.error(chalk.red.bold(`${StatusSymbols.failure} Error:`), error.message);
    }

    if (this.options.verbose && error.stack) {
      console.error();
      console.error(chalk.gray('Stack trace:'));
      console.error(chalk.gray(error.stack));
    }

    if (error instanceof ConductorError && error.hint) {
      console.error();
      console.error(chalk.yellow('💡 Hint:'), error.hint);
    }
  }

  showWarning(message: string): void {
    if (!this.options.silent) {
      console.warn(chalk.yellow(StatusSymbols.warning), message);
    }
  }

  showInfo(message: string): void {
    if (!this.options.silent) {
      console.log(chalk.blue(StatusSymbols.info), message);
    }
  }

  private printEntry(entry: AggregateEntry): void {
    const via = entry.resolvedBy && entry.resolvedBy !== entry.unitName ? chalk.dim(` via ${entry.resolvedBy}`) : '';
    switch (entry.status) {
      case 'success':
        console.log(`  ${this.entrySymbol('success')} ${chalk.bold(entry.unitName)}${via} ${entry.summary ?? ''}`);
        if (this.options.verbose && entry.data && Object.keys(entry.data).length > 0) {
          for (const line of JSON.stringify(entry.data, null, 2).split('\n')) {
            console.log(chalk.dim(`      ${line}`));
          }
        }
        break;
      case 'failure': {
        const note = entry.note;
        console.log(
          `  ${this.entrySymbol('failure')} ${chalk.bold(entry.unitName)}`,
          chalk.red(note ? `${note.kind}: ${note.message}` : 'failed')
        );
        if (note && note.fallbacksTried.length > 0) {
          console.log(chalk.dim(`      fallbacks tried: ${note.fallbacksTried.join(', ')}`));
        }
        break;
      }
      case 'cancelled':
        console.log(`  ${this.entrySymbol('cancelled')} ${chalk.bold(entry.unitName)}`, chalk.gray('cancelled'));
        break;
    }
  }

  private printStep(report: StepReport): void {
    const firstLine = report.summary.split('\n')[0] ?? '';
    console.log(
      `  ${this.stepSymbol(report.status)} ${chalk.dim(`${report.stepIndex}.`)} ${chalk.bold(report.stepId)}`,
      chalk.dim(`(${report.unit}, ${formatDuration(report.durationMs)})`)
    );
    if (firstLine) {
      console.log(`      ${firstLine}`);
    }
  }

  private printSummary(rows: readonly (readonly [string, string])[]): void {
    const width = Math.max(...rows.map(([label]) => label.length));
    for (const [label, value] of rows) {
      console.log(`  ${chalk.dim(`${label}:`.padEnd(width + 1))} ${value}`);
    }
  }

  private entrySymbol(status: AggregateEntry['status']): string {
    switch (status) {
      case 'success':
        return chalk.green(StatusSymbols.success);
      case 'failure':
        return chalk.red(StatusSymbols.failure);
      case 'cancelled':
        return chalk.gray(StatusSymbols.cancelled);
    }
  }

  private stepSymbol(status: string): string {
    switch (status) {
      case StepStatus.SUCCESS:
        return chalk.green(StatusSymbols.success);
      case StepStatus.SKIPPED:
        return chalk.gray(StatusSymbols.skipped);
      default:
        return chalk.red(StatusSymbols.failure);
    }
  }
}
