/**
 * Error handling module
 *
 * @module errors
 */

export * from './ErrorCodes.js';
export * from './ConductorError.js';
export * from './RegistryError.js';
export * from './RoutingError.js';
export * from './TemplateError.js';
export * from './ExecutionError.js';
export * from './StoreError.js';
export * from './ConfigError.js';
