export * from './ticket.js';
export * from './triage-result.js';
export * from './research-result.js';
export * from './draft-response.js';
export * from './escalation.js';
export * from './swarm-run.js';
export * from './tool.js';
export * from './kb-source.js';
