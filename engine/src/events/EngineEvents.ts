/**
 * Event Types and Interfaces
 *
 * The event bus carries execution transitions, candidate settlements, circuit
 * changes, workflow steps and task completion. Consumers: the CLI progress
 * output, background-run subscribers and tests.
 */

import type {
  CircuitStatus,
  ExecutionState,
  Outcome,
  StepStatus,
  SynthesisCompletion,
} from '../types/core-types.js';

/**
 * Core event interface - all events conform to this shape
 */
export interface ConductorEvent<T = unknown> {
  /** Event type identifier */
  type: string;

  /** Unix timestamp in milliseconds */
  timestamp: number;

  /** Execution the event belongs to */
  executionId?: string;

  /** Workflow run the event belongs to */
  runId?: string;

  unit?: string;

  /** Event-specific payload data */
  payload?: T;
}

export enum EngineEventType {
  // Execution
  EXECUTION_TRANSITION = 'execution.transition',
  EXECUTION_SETTLED = 'execution.settled',
  EXECUTION_RESUMED = 'execution.resumed',

  // Error handler
  INVOCATION_RETRYING = 'invocation.retrying',
  CIRCUIT_CHANGED = 'circuit.changed',

  // Workflow
  WORKFLOW_STARTED = 'workflow.started',
  WORKFLOW_STEP_COMPLETED = 'workflow.step.completed',
  WORKFLOW_COMPLETED = 'workflow.completed',

  // Tasks
  TASK_LAUNCHED = 'task.launched',
  TASK_COMPLETED = 'task.completed',

  // Scheduler
  SCHEDULE_TRIGGERED = 'schedule.triggered',
}

export interface ExecutionTransitionPayload {
  from: ExecutionState;
  to: ExecutionState;
  reason?: string;
}

export interface ExecutionSettledPayload {
  index: number;
  outcome: Outcome;
}

export interface InvocationRetryingPayload {
  attempt: number;
  maxAttempts: number;
  delayMs: number;
  detail: string;
}

export interface CircuitChangedPayload {
  from: CircuitStatus;
  to: CircuitStatus;
  failureCount: number;
}

export interface WorkflowStepCompletedPayload {
  stepIndex: number;
  stepId: string;
  status: StepStatus;
}

export interface WorkflowCompletedPayload {
  template: string;
  completion: SynthesisCompletion;
}

export interface TaskCompletedPayload {
  taskId: string;
  outcome: Outcome;
}

export interface ScheduleTriggeredPayload {
  scheduleId: string;
  template: string;
}

/**
 * Helper to create well-formed events
 */
export function createEvent<T = unknown>(
  type: string | EngineEventType,
  payload?: T,
  context?: { executionId?: string; runId?: string; unit?: string }
): ConductorEvent<T> {
  return {
    type,
    timestamp: Date.now(),
    executionId: context?.executionId,
    runId: context?.runId,
    unit: context?.unit,
    payload,
  };
}
