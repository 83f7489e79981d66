/**
 * Execution errors
 *
 * Thrown by units, the timeout wrapper, the supervisor and the task runner.
 * The error handler folds the first group into structured outcomes instead
 * of letting them escape.
 *
 * @module errors
 */

import { ConductorError, type ConductorErrorDiagnostic } from './ConductorError.js';
import { ConductorErrorCode, ErrorSeverity } from './ErrorCodes.js';

export class ExecutionError extends ConductorError {
  constructor(diagnostic: Omit<ConductorErrorDiagnostic, 'severity'>, severity = ErrorSeverity.ERROR) {
    super({ ...diagnostic, severity });
  }

  static notFound(executionId: string): ExecutionError {
    return new ExecutionError({
      code: ConductorErrorCode.EXECUTION_NOT_FOUND,
      message: `No checkpoint found for execution "${executionId}"`,
      hint: 'List executions with "conductor executions" to find a valid id',
      context: { executionId },
    });
  }

  static invalidTransition(from: string, to: string, allowed: readonly string[]): ExecutionError {
    return new ExecutionError({
      code: ConductorErrorCode.EXECUTION_INVALID_TRANSITION,
      message: `Invalid state transition: ${from} → ${to}`,
      hint: `Allowed from ${from}: ${allowed.join(', ') || 'none (terminal state)'}`,
      context: { from, to },
    }, ErrorSeverity.CRITICAL);
  }

  static aborted(executionId: string, cause: Error): ExecutionError {
    return new ExecutionError({
      code: ConductorErrorCode.EXECUTION_FAILED,
      message: `Execution "${executionId}" failed: ${cause.message}`,
      context: { executionId },
    });
  }

  static taskNotFound(taskId: string): ExecutionError {
    return new ExecutionError({
      code: ConductorErrorCode.EXECUTION_TASK_NOT_FOUND,
      message: `Task "${taskId}" is not tracked (never launched or already reaped)`,
      context: { taskId },
    });
  }
}

/**
 * Thrown by a unit to signal a non-retryable failure
 */
export class UnitFatalError extends ConductorError {
  constructor(message: string, context?: Record<string, unknown>) {
    super({
      code: ConductorErrorCode.EXECUTION_FATAL,
      message,
      severity: ErrorSeverity.ERROR,
      context,
    });
  }
}

/**
 * Invocation exceeded the unit timeout
 */
export class TimeoutError extends ConductorError {
  constructor(
    public readonly timeoutMs: number,
    public readonly operation: string
  ) {
    super({
      code: ConductorErrorCode.EXECUTION_TIMEOUT,
      message: `Operation "${operation}" timed out after ${timeoutMs}ms`,
      hint: 'Increase the unit timeout or investigate why it hangs',
      severity: ErrorSeverity.ERROR,
      context: { timeoutMs, operation },
    });
  }
}

/**
 * Invocation or wait was cancelled through an abort signal
 */
export class CancelledError extends ConductorError {
  constructor(operation: string) {
    super({
      code: ConductorErrorCode.EXECUTION_CANCELLED,
      message: `Operation "${operation}" was cancelled`,
      severity: ErrorSeverity.WARNING,
      context: { operation },
    });
  }
}
