/**
 * Conductor Engine - agent orchestration with retries, circuit breakers,
 * checkpointed executions and workflow templates
 *
 * @example
 * ```ts
 * import { ConductorEngine } from '@conductor/engine';
 *
 * const engine = await ConductorEngine.fromConfigFile();
 * const execution = await engine.run({ text: 'check disk usage' });
 * ```
 */

// ============================================================================
// PRIMARY EXPORT - Start here!
// ============================================================================

export * from './core/index.js';

// ============================================================================
// TYPES
// ============================================================================

export * from './types/core-types.js';
export * from './types/log-types.js';
export * from './types/schemas.js';

// ============================================================================
// COMPONENTS
// ============================================================================

export * from './registry/index.js';
export * from './routing/index.js';
export * from './resilience/index.js';
export * from './supervisor/index.js';
export * from './workflow/index.js';
export * from './tasks/index.js';
export * from './scheduling/index.js';
export * from './units/index.js';
export * from './stores/index.js';

// ============================================================================
// INFRASTRUCTURE
// ============================================================================

export * from './errors/index.js';
export * from './events/index.js';
export * from './logging/index.js';
export * from './state/index.js';
export * from './automation/index.js';
export * from './testing/index.js';
