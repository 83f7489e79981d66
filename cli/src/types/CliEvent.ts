/**
 * CLI Event Types
 *
 * Engine events the CLI displays while a command runs. The bridge in
 * utils/events.ts turns bus events into these; formatters only see these.
 */

export enum CliEventType {
  EXECUTION_TRANSITION = 'execution.transition',
  CANDIDATE_SETTLED = 'candidate.settled',
  INVOCATION_RETRYING = 'invocation.retrying',
  CIRCUIT_CHANGED = 'circuit.changed',
  WORKFLOW_STARTED = 'workflow.started',
  STEP_COMPLETED = 'step.completed',
  TASK_COMPLETED = 'task.completed',
  SCHEDULE_TRIGGERED = 'schedule.triggered',
}

export interface BaseCliEvent {
  type: CliEventType;
  timestamp: Date;
}

export interface ExecutionTransitionEvent extends BaseCliEvent {
  type: CliEventType.EXECUTION_TRANSITION;
  executionId: string;
  from: string;
  to: string;
  reason?: string;
}

export interface CandidateSettledEvent extends BaseCliEvent {
  type: CliEventType.CANDIDATE_SETTLED;
  executionId: string;
  unit: string;
  status: 'success' | 'failure' | 'cancelled';
  /** Summary on success, failure message otherwise */
  detail: string;
  resolvedBy?: string;
}

export interface InvocationRetryingEvent extends BaseCliEvent {
  type: CliEventType.INVOCATION_RETRYING;
  unit: string;
  attempt: number;
  maxAttempts: number;
  delayMs: number;
  detail: string;
}

export interface CircuitChangedEvent extends BaseCliEvent {
  type: CliEventType.CIRCUIT_CHANGED;
  unit: string;
  from: string;
  to: string;
  failureCount: number;
}

export interface WorkflowStartedEvent extends BaseCliEvent {
  type: CliEventType.WORKFLOW_STARTED;
  runId: string;
  template: string;
}

export interface StepCompletedEvent extends BaseCliEvent {
  type: CliEventType.STEP_COMPLETED;
  runId: string;
  unit: string;
  stepIndex: number;
  stepId: string;
  status: string;
}

export interface TaskCompletedEvent extends BaseCliEvent {
  type: CliEventType.TASK_COMPLETED;
  taskId: string;
  unit: string;
  status: 'success' | 'failure' | 'cancelled';
}

export interface ScheduleTriggeredEvent extends BaseCliEvent {
  type: CliEventType.SCHEDULE_TRIGGERED;
  scheduleId: string;
  template: string;
}

export type CliEvent =
  | ExecutionTransitionEvent
  | CandidateSettledEvent
  | InvocationRetryingEvent
  | CircuitChangedEvent
  | WorkflowStartedEvent
  | StepCompletedEvent
  | TaskCompletedEvent
  | ScheduleTriggeredEvent;
