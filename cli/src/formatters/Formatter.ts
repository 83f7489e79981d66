/**
 * Base Formatter Interface
 *
 * Formatters are the only place where the CLI writes to the console.
 * Commands hand them engine results and bridged events; the formatter
 * decides what to print and how.
 */

import type { Execution, RoutingExplanation, WorkflowRun } from '@conductor/engine';
import type { CliEvent } from '../types/CliEvent.js';

export interface FormatterOptions {
  /** Include payload data, stack traces and per-attempt detail */
  verbose?: boolean;

  /** Disable colors (for CI or terminals without color support) */
  noColor?: boolean;

  /** Only errors and final results */
  silent?: boolean;
}

/**
 * Header row first
 */
export type TableRows = readonly (readonly string[])[];

export interface Formatter {
  /**
   * Progress while a command runs
   */
  onEvent(event: CliEvent): void;

  /**
   * Final state of an execution (run, resume, background wait)
   */
  showExecution(execution: Execution): void;

  showRouting(explanation: RoutingExplanation): void;

  showWorkflowRun(run: WorkflowRun): void;

  /**
   * Listing output (units, executions, circuits, tasks, reports)
   */
  showTable(title: string, rows: TableRows): void;

  /**
   * Raw document output, e.g. a stored report
   */
  showText(text: string): void;

  showError(error: Error): void;

  showWarning(message: string): void;

  showInfo(message: string): void;
}
