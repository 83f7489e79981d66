export * from './EngineLogger.js';
export * from './LoggerManager.js';
export * from './sinks.js';
export * from './LogReader.js';
