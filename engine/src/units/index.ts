export * from './ProcessExecutor.js';
export * from './ProcessUnit.js';
export * from './FunctionUnit.js';
