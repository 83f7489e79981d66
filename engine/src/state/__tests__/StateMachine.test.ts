import { describe, expect, it } from 'vitest';
import { ExecutionError } from '../../errors/index.js';
import { ExecutionState } from '../../types/core-types.js';
import { createExecutionStateMachine, isExecutionTerminal } from '../StateMachine.js';

describe('execution state machine', () => {
  it('should walk the happy path and record each transition', () => {
    let now = 100;
    const machine = createExecutionStateMachine(ExecutionState.PENDING, () => now++);

    machine.transition(ExecutionState.ROUTING);
    const record = machine.transition(ExecutionState.EXECUTING, '1 candidate(s)');
    machine.transition(ExecutionState.AGGREGATING);
    machine.transition(ExecutionState.COMPLETED);

    expect(machine.isTerminal()).toBe(true);
    expect(record).toEqual({
      from: ExecutionState.ROUTING,
      to: ExecutionState.EXECUTING,
      timestamp: 101,
      reason: '1 candidate(s)',
    });
  });

  it('should reject a skipped state with the allowed targets in the hint', () => {
    const machine = createExecutionStateMachine();

    try {
      machine.transition(ExecutionState.EXECUTING);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ExecutionError);
      if (error instanceof ExecutionError) {
        expect(error.message).toBe('Invalid state transition: PENDING → EXECUTING');
        expect(error.hint).toBe('Allowed from PENDING: ROUTING');
      }
    }
  });

  it('should not leave a terminal state', () => {
    const machine = createExecutionStateMachine(ExecutionState.FAILED);

    expect(machine.canTransition(ExecutionState.ROUTING)).toBe(false);
    expect(machine.getAllowedTransitions()).toEqual([]);
    try {
      machine.transition(ExecutionState.ROUTING);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ExecutionError);
      if (error instanceof ExecutionError) {
        expect(error.message).toBe('Invalid state transition: FAILED → ROUTING');
        expect(error.hint).toBe('Allowed from FAILED: none (terminal state)');
      }
    }
  });

  it('should only fail out of routing and executing', () => {
    expect(createExecutionStateMachine(ExecutionState.ROUTING).canTransition(ExecutionState.FAILED)).toBe(true);
    expect(createExecutionStateMachine(ExecutionState.EXECUTING).canTransition(ExecutionState.FAILED)).toBe(true);
    expect(createExecutionStateMachine(ExecutionState.AGGREGATING).getAllowedTransitions()).toEqual([
      ExecutionState.COMPLETED,
    ]);
    expect(isExecutionTerminal(ExecutionState.COMPLETED)).toBe(true);
    expect(isExecutionTerminal(ExecutionState.AGGREGATING)).toBe(false);
  });
});
