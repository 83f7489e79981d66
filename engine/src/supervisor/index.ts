export * from './AgentSupervisor.js';
export * from './aggregate.js';
