export * from './client.js';
export * from './conventions.js';
export * from './operations.js';
export * from './resolver.js';
export * from './safe-invoke.js';
export * from './transport.js';
