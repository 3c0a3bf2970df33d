export * from './chunking.js';
export * from './retrieval.js';
export * from './store.js';
export * from './ingest.js';
