/**
 * Engine → CLI event bridge
 *
 * Subscribes to the engine's event bus and hands formatters typed CliEvents.
 * Payloads arrive as unknown on the bus, so each one is checked against a
 * schema; events that do not match are dropped.
 */

import { z } from 'zod';
import { EngineEventType, OutcomeSchema, type ConductorEvent, type EventBus, type Outcome } from '@conductor/engine';
import type { Formatter } from '../formatters/Formatter.js';
import { CliEventType, type CliEvent } from '../types/CliEvent.js';

const TransitionPayload = z.object({ from: z.string(), to: z.string(), reason: z.string().optional() });
const SettledPayload = z.object({ index: z.number(), outcome: OutcomeSchema });
const RetryingPayload = z.object({
  attempt: z.number(),
  maxAttempts: z.number(),
  delayMs: z.number(),
  detail: z.string(),
});
const CircuitPayload = z.object({ from: z.string(), to: z.string(), failureCount: z.number() });
const WorkflowStartedPayload = z.object({ template: z.string() });
const StepPayload = z.object({ stepIndex: z.number(), stepId: z.string(), status: z.string() });
const TaskPayload = z.object({ taskId: z.string(), outcome: OutcomeSchema });
const SchedulePayload = z.object({ scheduleId: z.string(), template: z.string() });

export function describeOutcome(outcome: Outcome): string {
  switch (outcome.status) {
    case 'success':
      return outcome.payload.summary;
    case 'failure':
      return `${outcome.failure.kind}: ${outcome.failure.message}`;
    case 'cancelled':
      return outcome.message;
  }
}

/**
 * Map one bus event; undefined for types the CLI does not show
 */
export function toCliEvent(event: ConductorEvent): CliEvent | undefined {
  const timestamp = new Date(event.timestamp);

  switch (event.type) {
    case EngineEventType.EXECUTION_TRANSITION: {
      const parsed = TransitionPayload.safeParse(event.payload);
      if (!parsed.success || !event.executionId) return undefined;
      return { type: CliEventType.EXECUTION_TRANSITION, timestamp, executionId: event.executionId, ...parsed.data };
    }
    case EngineEventType.EXECUTION_SETTLED: {
      const parsed = SettledPayload.safeParse(event.payload);
      if (!parsed.success || !event.executionId) return undefined;
      const { outcome } = parsed.data;
      return {
        type: CliEventType.CANDIDATE_SETTLED,
        timestamp,
        executionId: event.executionId,
        unit: event.unit ?? outcome.unit,
        status: outcome.status,
        detail: describeOutcome(outcome),
        resolvedBy: outcome.status === 'success' ? outcome.resolvedBy : undefined,
      };
    }
    case EngineEventType.INVOCATION_RETRYING: {
      const parsed = RetryingPayload.safeParse(event.payload);
      if (!parsed.success || !event.unit) return undefined;
      return { type: CliEventType.INVOCATION_RETRYING, timestamp, unit: event.unit, ...parsed.data };
    }
    case EngineEventType.CIRCUIT_CHANGED: {
      const parsed = CircuitPayload.safeParse(event.payload);
      if (!parsed.success || !event.unit) return undefined;
      return { type: CliEventType.CIRCUIT_CHANGED, timestamp, unit: event.unit, ...parsed.data };
    }
    case EngineEventType.WORKFLOW_STARTED: {
      const parsed = WorkflowStartedPayload.safeParse(event.payload);
      if (!parsed.success || !event.runId) return undefined;
      return { type: CliEventType.WORKFLOW_STARTED, timestamp, runId: event.runId, template: parsed.data.template };
    }
    case EngineEventType.WORKFLOW_STEP_COMPLETED: {
      const parsed = StepPayload.safeParse(event.payload);
      if (!parsed.success || !event.runId || !event.unit) return undefined;
      return { type: CliEventType.STEP_COMPLETED, timestamp, runId: event.runId, unit: event.unit, ...parsed.data };
    }
    case EngineEventType.TASK_COMPLETED: {
      const parsed = TaskPayload.safeParse(event.payload);
      if (!parsed.success) return undefined;
      return {
        type: CliEventType.TASK_COMPLETED,
        timestamp,
        taskId: parsed.data.taskId,
        unit: event.unit ?? parsed.data.outcome.unit,
        status: parsed.data.outcome.status,
      };
    }
    case EngineEventType.SCHEDULE_TRIGGERED: {
      const parsed = SchedulePayload.safeParse(event.payload);
      if (!parsed.success) return undefined;
      return { type: CliEventType.SCHEDULE_TRIGGERED, timestamp, ...parsed.data };
    }
    default:
      return undefined;
  }
}

/**
 * Forward every displayable bus event to the formatter
 *
 * @returns unsubscribe function
 */
export function bridgeEvents(bus: EventBus, formatter: Formatter): () => void {
  return bus.on('*', (event) => {
    const cliEvent = toCliEvent(event);
    if (cliEvent) {
      formatter.onEvent(cliEvent);
    }
  });
}
