/**
 * Test doubles for deterministic engine tests
 *
 * @module testing
 */

export * from './ManualClock.js';
export * from './ScriptedUnit.js';
export * from './FixedScorer.js';
