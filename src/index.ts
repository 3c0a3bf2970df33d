export * from './contracts/index.js';
export * from './runner/index.js';
export * from './config.js';
export * from './kb/index.js';
export * from './augment/index.js';
export * from './gateway/index.js';
export * from './triage/index.js';
export * from './research/index.js';
export * from './draft/index.js';
export * from './escalation/index.js';
export * from './swarm/index.js';
export * from './services.js';
