export * from './TaskRunner.js';
