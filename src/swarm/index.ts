export * from './orchestrator.js';
export * from './stage-context.js';
