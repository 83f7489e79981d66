/**
 * Persisted record schemas
 *
 * Executions and circuit snapshots are written to disk (or SQLite) and read
 * back on startup and resume. Reading back goes through these schemas, so a
 * truncated or hand-edited record surfaces as a StoreError instead of a
 * half-typed object.
 *
 * @module types
 */

import { z } from 'zod';

export enum ExecutionState {
  PENDING = 'PENDING',
  ROUTING = 'ROUTING',
  EXECUTING = 'EXECUTING',
  AGGREGATING = 'AGGREGATING',
  COMPLETED = 'COMPLETED',
  FAILED = 'FAILED',
}

export enum CircuitStatus {
  CLOSED = 'CLOSED',
  OPEN = 'OPEN',
  HALF_OPEN = 'HALF_OPEN',
}

export enum FailureKind {
  RETRYABLE = 'Retryable',
  FATAL = 'Fatal',
  CIRCUIT_OPEN = 'CircuitOpen',
  CANCELLED = 'Cancelled',
}

export const UnitPayloadSchema = z.object({
  summary: z.string(),
  data: z.record(z.unknown()),
});
export type UnitPayload = z.infer<typeof UnitPayloadSchema>;

export const InvocationOutcomeSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('success'), payload: UnitPayloadSchema }),
  z.object({ type: z.literal('failure'), kind: z.nativeEnum(FailureKind), detail: z.string() }),
]);
export type InvocationOutcome = z.infer<typeof InvocationOutcomeSchema>;

/**
 * One attempt against one unit
 */
export const InvocationSchema = z.object({
  unit: z.string(),
  args: z.record(z.string()),
  attempt: z.number().int().positive(),
  startedAt: z.number(),
  endedAt: z.number(),
  outcome: InvocationOutcomeSchema,
});
export type Invocation = z.infer<typeof InvocationSchema>;

export const CandidateSchema = z.object({
  unitName: z.string(),
  score: z.number().min(0).max(1),
});
export type Candidate = z.infer<typeof CandidateSchema>;

const outcomeBase = {
  /** Unit the caller asked for */
  unit: z.string(),
  /** Every attempt, primary first, then fallbacks */
  attempts: z.array(InvocationSchema),
  fallbacksTried: z.array(z.string()),
};

export const SuccessOutcomeSchema = z.object({
  status: z.literal('success'),
  ...outcomeBase,
  /** Unit that actually produced the payload (primary or a fallback) */
  resolvedBy: z.string(),
  payload: UnitPayloadSchema,
});
export type SuccessOutcome = z.infer<typeof SuccessOutcomeSchema>;

export const FailureOutcomeSchema = z.object({
  status: z.literal('failure'),
  ...outcomeBase,
  failure: z.object({
    kind: z.nativeEnum(FailureKind),
    message: z.string(),
  }),
});
export type FailureOutcome = z.infer<typeof FailureOutcomeSchema>;

export const CancelledOutcomeSchema = z.object({
  status: z.literal('cancelled'),
  ...outcomeBase,
  message: z.string(),
});
export type CancelledOutcome = z.infer<typeof CancelledOutcomeSchema>;

export const OutcomeSchema = z.discriminatedUnion('status', [
  SuccessOutcomeSchema,
  FailureOutcomeSchema,
  CancelledOutcomeSchema,
]);
export type Outcome = z.infer<typeof OutcomeSchema>;

export const CandidateResultSchema = z.object({
  index: z.number().int().nonnegative(),
  unitName: z.string(),
  outcome: OutcomeSchema,
  settledAt: z.number(),
});
export type CandidateResult = z.infer<typeof CandidateResultSchema>;

export const AggregateEntrySchema = z.object({
  index: z.number().int().nonnegative(),
  unitName: z.string(),
  status: z.enum(['success', 'failure', 'cancelled']),
  resolvedBy: z.string().optional(),
  summary: z.string().optional(),
  data: z.record(z.unknown()).optional(),
  note: z
    .object({
      kind: z.nativeEnum(FailureKind),
      message: z.string(),
      fallbacksTried: z.array(z.string()),
    })
    .optional(),
});
export type AggregateEntry = z.infer<typeof AggregateEntrySchema>;

export const AggregateResultSchema = z.object({
  allFailed: z.boolean(),
  successCount: z.number().int().nonnegative(),
  failureCount: z.number().int().nonnegative(),
  entries: z.array(AggregateEntrySchema),
  text: z.string(),
});
export type AggregateResult = z.infer<typeof AggregateResultSchema>;

export const CheckpointSchema = z.object({
  state: z.nativeEnum(ExecutionState),
  /** Highest index such that every candidate up to it has settled; -1 when none */
  lastCompletedStepIndex: z.number().int().min(-1),
  partialResults: z.array(CandidateResultSchema),
});
export type Checkpoint = z.infer<typeof CheckpointSchema>;

export const PriorResultSchema = z.object({
  unit: z.string(),
  status: z.enum(['success', 'failure', 'cancelled', 'skipped']),
  summary: z.string(),
});
export type PriorResult = z.infer<typeof PriorResultSchema>;

export const WorkflowContextSchema = z.object({
  runId: z.string(),
  template: z.string(),
  stepId: z.string(),
  currentStep: z.number().int().positive(),
  totalSteps: z.number().int().positive(),
});
export type WorkflowContext = z.infer<typeof WorkflowContextSchema>;

export const RetryPolicyOverridesSchema = z.object({
  maxRetries: z.number().int().nonnegative().optional(),
  baseBackoffMs: z.number().nonnegative().optional(),
  backoffMultiplier: z.number().positive().optional(),
  maxBackoffMs: z.number().nonnegative().optional(),
  useFallback: z.boolean().optional(),
  maxFallbackHops: z.number().int().nonnegative().optional(),
});
export type RetryPolicyOverrides = z.infer<typeof RetryPolicyOverridesSchema>;

export const ExecutionRequestSchema = z.object({
  text: z.string(),
  mode: z.enum(['sequential', 'parallel']),
  background: z.boolean().optional(),
  /** Explicit units; routing is skipped when present */
  units: z.array(z.string()).optional(),
  args: z.record(z.string()).optional(),
  context: z
    .object({
      workflow: WorkflowContextSchema,
      previousResults: z.array(PriorResultSchema),
    })
    .optional(),
  policy: RetryPolicyOverridesSchema.optional(),
});
export type ExecutionRequest = z.infer<typeof ExecutionRequestSchema>;

export const ExecutionTransitionSchema = z.object({
  from: z.nativeEnum(ExecutionState),
  to: z.nativeEnum(ExecutionState),
  timestamp: z.number(),
  reason: z.string().optional(),
});
export type ExecutionTransition = z.infer<typeof ExecutionTransitionSchema>;

export const ExecutionSchema = z.object({
  id: z.string(),
  request: ExecutionRequestSchema,
  state: z.nativeEnum(ExecutionState),
  candidates: z.array(CandidateSchema),
  invocations: z.array(InvocationSchema),
  checkpoint: CheckpointSchema,
  aggregate: AggregateResultSchema.optional(),
  error: z.object({ code: z.string(), message: z.string() }).optional(),
  transitions: z.array(ExecutionTransitionSchema),
  createdAt: z.number(),
  updatedAt: z.number(),
});
export type Execution = z.infer<typeof ExecutionSchema>;

export const CircuitSnapshotSchema = z.object({
  unit: z.string(),
  state: z.nativeEnum(CircuitStatus),
  failureCount: z.number().int().nonnegative(),
  openedAt: z.number().nullable(),
});
export type CircuitSnapshot = z.infer<typeof CircuitSnapshotSchema>;
