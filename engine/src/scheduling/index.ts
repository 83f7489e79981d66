export * from './WorkflowScheduler.js';
