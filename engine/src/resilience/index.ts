export * from './CircuitBreaker.js';
export * from './ErrorHandler.js';
