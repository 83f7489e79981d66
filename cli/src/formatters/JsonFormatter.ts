/**
 * JSON Formatter
 *
 * One JSON object per line (NDJSON) for scripts, CI and log collectors.
 * Results are printed as the engine returns them; errors go to stderr.
 */

import { ConductorError, type Execution, type RoutingExplanation, type WorkflowRun } from '@conductor/engine';
import type { Formatter, FormatterOptions, TableRows } from './Formatter.js';
import type { CliEvent } from '../types/CliEvent.js';

export class JsonFormatter implements Formatter {
  private readonly options: FormatterOptions;

  constructor(options: FormatterOptions = {}) {
    this.options = options;
  }

  onEvent(event: CliEvent): void {
    if (this.options.silent) {
      return;
    }
    const { timestamp, ...rest } = event;
    this.write({ ...rest, timestamp: timestamp.toISOString() });
  }

  showExecution(execution: Execution): void {
    this.write({ type: 'execution.result', execution });
  }

  showRouting(explanation: RoutingExplanation): void {
    this.write({ type: 'routing.result', ...explanation });
  }

  showWorkflowRun(run: WorkflowRun): void {
    this.write({ type: 'workflow.result', run });
  }

  /**
   * Rows become objects keyed by the header row
   */
  showTable(title: string, rows: TableRows): void {
    const [header = [], ...body] = rows;
    const items = body.map((row) => Object.fromEntries(header.map((column, index) => [column, row[index] ?? ''])));
    this.write({ type: 'table', title, rows: items });
  }

  showText(text: string): void {
    this.write({ type: 'text', text });
  }

  showError(error: Error): void {
    const body =
      error instanceof ConductorError
        ? error.toJSON()
        : { name: error.name, message: error.message, stack: this.options.verbose ? error.stack : undefined };
    console.error(JSON.stringify({ type: 'error', timestamp: new Date().toISOString(), error: body }));
  }

  showWarning(message: string): void {
    if (!this.options.silent) {
      this.write({ type: 'warning', timestamp: new Date().toISOString(), message });
    }
  }

  showInfo(message: string): void {
    if (!this.options.silent) {
      this.write({ type: 'info', timestamp: new Date().toISOString(), message });
    }
  }

  private write(value: Record<string, unknown>): void {
    console.log(JSON.stringify(value));
  }
}
