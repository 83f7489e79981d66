/**
 * State Management
 *
 * StateMachine enforces valid execution transitions and returns a record
 * of each one, which the supervisor copies into the checkpoint.
 */

export * from './StateMachine.js';
