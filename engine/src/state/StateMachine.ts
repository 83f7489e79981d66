/**
 * State Machine
 *
 * Enforces valid state transitions for executions.
 *
 * This is about RULES, not execution. It answers:
 * - Can this state transition happen?
 * - What are the valid next states?
 * - Is this state terminal (no further transitions)?
 *
 * @module state
 */

import { ExecutionError } from '../errors/index.js';
import { ExecutionState } from '../types/core-types.js';

/**
 * One transition, as copied into the execution's checkpoint
 */
export interface StateTransition<T> {
  readonly from: T;
  readonly to: T;
  /** ms since epoch */
  readonly timestamp: number;
  readonly reason?: string;
}

export interface StateMachineConfig<T> {
  readonly initialState: T;
  /** Valid transitions map: from → allowed to states */
  readonly transitions: ReadonlyMap<T, readonly T[]>;
  /** Terminal states (no further transitions allowed) */
  readonly terminalStates: ReadonlySet<T>;
  /** Clock for transition timestamps */
  readonly now?: () => number;
}

/**
 * Generic state machine for enforcing valid transitions
 */
export class StateMachine<T> {
  private currentState: T;
  private readonly config: StateMachineConfig<T>;

  constructor(config: StateMachineConfig<T>) {
    this.config = config;
    this.currentState = config.initialState;
  }

  getState(): T {
    return this.currentState;
  }

  canTransition(to: T): boolean {
    if (this.config.terminalStates.has(this.currentState)) {
      return false;
    }

    const allowedTransitions = this.config.transitions.get(this.currentState);
    if (!allowedTransitions) {
      return false;
    }

    return allowedTransitions.includes(to);
  }

  /**
   * Perform state transition
   *
   * @throws ExecutionError if the transition is not allowed
   */
  transition(to: T, reason?: string): StateTransition<T> {
    if (!this.canTransition(to)) {
      throw ExecutionError.invalidTransition(
        String(this.currentState),
        String(to),
        this.getAllowedTransitions().map(String)
      );
    }

    const record: StateTransition<T> = {
      from: this.currentState,
      to,
      timestamp: (this.config.now ?? Date.now)(),
      reason,
    };
    this.currentState = to;
    return record;
  }

  isTerminal(): boolean {
    return this.config.terminalStates.has(this.currentState);
  }

  getAllowedTransitions(): readonly T[] {
    if (this.isTerminal()) {
      return [];
    }
    return this.config.transitions.get(this.currentState) ?? [];
  }
}

/**
 * Execution lifecycle
 *
 * PENDING → ROUTING → EXECUTING → AGGREGATING → COMPLETED
 * ROUTING → FAILED (no candidate)
 * EXECUTING → FAILED (unrecoverable error, e.g. checkpoint store failure)
 */
const EXECUTION_TRANSITIONS = new Map<ExecutionState, readonly ExecutionState[]>([
  [ExecutionState.PENDING, [ExecutionState.ROUTING]],
  [ExecutionState.ROUTING, [ExecutionState.EXECUTING, ExecutionState.FAILED]],
  [ExecutionState.EXECUTING, [ExecutionState.AGGREGATING, ExecutionState.FAILED]],
  [ExecutionState.AGGREGATING, [ExecutionState.COMPLETED]],
  [ExecutionState.COMPLETED, []], // Terminal
  [ExecutionState.FAILED, []], // Terminal
]);

const EXECUTION_TERMINAL_STATES = new Set<ExecutionState>([
  ExecutionState.COMPLETED,
  ExecutionState.FAILED,
]);

/**
 * Create an execution state machine, optionally restored at a checkpointed state
 */
export function createExecutionStateMachine(
  initialState: ExecutionState = ExecutionState.PENDING,
  now?: () => number
): StateMachine<ExecutionState> {
  return new StateMachine<ExecutionState>({
    initialState,
    transitions: EXECUTION_TRANSITIONS,
    terminalStates: EXECUTION_TERMINAL_STATES,
    now,
  });
}

export function isExecutionTerminal(state: ExecutionState): boolean {
  return EXECUTION_TERMINAL_STATES.has(state);
}
