/**
 * Core Types
 *
 * Shared vocabulary of the engine. Records that are persisted (executions,
 * circuit snapshots) are declared as zod schemas in ./schemas.ts and their
 * types are re-exported from here.
 *
 * @module types
 */

export {
  ExecutionState,
  CircuitStatus,
  FailureKind,
  type UnitPayload,
  type InvocationOutcome,
  type Invocation,
  type Candidate,
  type SuccessOutcome,
  type FailureOutcome,
  type CancelledOutcome,
  type Outcome,
  type CandidateResult,
  type AggregateEntry,
  type AggregateResult,
  type Checkpoint,
  type ExecutionRequest,
  type ExecutionTransition,
  type Execution,
  type CircuitSnapshot,
  type PriorResult,
  type WorkflowContext,
  type RetryPolicyOverrides,
} from './schemas.js';

import type { PriorResult, UnitPayload, WorkflowContext } from './schemas.js';

// ============================================================================
// Units
// ============================================================================

/**
 * String arguments passed to a unit
 */
export type UnitArgs = Readonly<Record<string, string>>;

/**
 * Extra input a unit receives besides its arguments: the original request,
 * results of units that ran before it, and the workflow position if any.
 */
export interface AuxiliaryContext {
  request?: string;
  priorResults: PriorResult[];
  workflow?: WorkflowContext;
}

export interface InvocationContext {
  /** Registered unit name */
  unit: string;
  /** 1-based attempt number */
  attempt: number;
  /** Aborted on timeout or cancellation */
  signal: AbortSignal;
  auxiliary: AuxiliaryContext;
}

/**
 * Failure kinds a unit may report itself
 */
export type ReportedFailureKind = 'Retryable' | 'Fatal';

/**
 * What a unit returns from one invocation
 */
export type UnitResult =
  | { ok: true; payload: UnitPayload }
  | { ok: false; failure: { kind: ReportedFailureKind; message: string } };

/**
 * Uniform invocation contract every unit implements
 */
export interface Unit {
  invoke(args: UnitArgs, context: InvocationContext): Promise<UnitResult>;
}

/**
 * Registered unit description. Frozen once registered.
 */
export interface UnitSpec {
  readonly name: string;
  readonly description: string;
  readonly team?: string;
  /** Lowercased, deduplicated */
  readonly keywords: readonly string[];
  readonly fallback: readonly string[];
  readonly timeoutMs: number;
  readonly maxRetries: number;
}

/**
 * Input accepted by UnitRegistry.register()
 */
export interface UnitSpecInput {
  name: string;
  description?: string;
  team?: string;
  keywords?: Iterable<string>;
  fallback?: readonly string[];
  timeoutMs?: number;
  maxRetries?: number;
}

// ============================================================================
// Workflows
// ============================================================================

export enum StepMode {
  SEQUENTIAL = 'SEQUENTIAL',
  PARALLEL = 'PARALLEL',
}

export enum StepStatus {
  SUCCESS = 'success',
  FAILURE = 'failure',
  SKIPPED = 'SkippedDueToDependencyFailure',
}

export interface StepSpec {
  readonly id: string;
  readonly unit: string;
  readonly args: Readonly<Record<string, string>>;
  readonly mode: StepMode;
  /** What the step is for, shown in reports */
  readonly role?: string;
  /** Ids of earlier steps whose success this step requires */
  readonly dependsOn: readonly string[];
}

export interface WorkflowTemplate {
  readonly name: string;
  readonly title: string;
  readonly description?: string;
  readonly steps: readonly StepSpec[];
}

export interface StepReport {
  readonly kind: 'step';
  readonly stepIndex: number;
  readonly stepId: string;
  readonly unit: string;
  readonly role?: string;
  readonly status: StepStatus;
  readonly summary: string;
  readonly rawOutput: string;
  readonly timestamp: string;
  readonly executionId?: string;
  readonly durationMs: number;
}

export type SynthesisCompletion = 'complete' | 'partial' | 'failed';

export interface SynthesisReport {
  readonly kind: 'synthesis';
  readonly stepIndex: number;
  readonly unit: 'synthesis';
  readonly summary: string;
  readonly rawOutput: string;
  readonly recommendations: readonly string[];
  readonly completion: SynthesisCompletion;
  readonly timestamp: string;
}

export type Report = StepReport | SynthesisReport;

/**
 * Running context threaded between workflow steps
 */
export interface RunningContext {
  workflow: WorkflowContext;
  previousResults: PriorResult[];
}

export interface WorkflowRun {
  id: string;
  templateName: string;
  title: string;
  steps: readonly StepSpec[];
  stepReports: StepReport[];
  runningContext: RunningContext;
  finalSynthesis: SynthesisReport | null;
  status: SynthesisCompletion;
  startedAt: string;
  completedAt?: string;
}

// ============================================================================
// Logging
// ============================================================================

export type LogStatus = 'start' | 'success' | 'error' | 'warning' | 'info' | 'complete';
