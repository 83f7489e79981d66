export * from './EmbeddingProvider.js';
export * from './IntentScorer.js';
export * from './IntentRouter.js';
