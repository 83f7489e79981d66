export * from './KeyValueStore.js';
export * from './InMemoryStateStore.js';
export * from './FileStateStore.js';
export * from './SqliteStateStore.js';
