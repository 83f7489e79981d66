/**
 * Null Formatter
 *
 * Prints nothing. Used when the CLI is driven programmatically and the
 * caller reads results from the engine itself.
 */

import type { Execution, RoutingExplanation, WorkflowRun } from '@conductor/engine';
import type { Formatter, TableRows } from './Formatter.js';
import type { CliEvent } from '../types/CliEvent.js';

export class NullFormatter implements Formatter {
  onEvent(_event: CliEvent): void {}

  showExecution(_execution: Execution): void {}

  showRouting(_explanation: RoutingExplanation): void {}

  showWorkflowRun(_run: WorkflowRun): void {}

  showTable(_title: string, _rows: TableRows): void {}

  showText(_text: string): void {}

  showError(_error: Error): void {}

  showWarning(_message: string): void {}

  showInfo(_message: string): void {}
}
