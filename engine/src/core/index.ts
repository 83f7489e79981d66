export * from './ConductorEngine.js';
export * from './ConfigLoader.js';
export * from './EngineConfig.js';
