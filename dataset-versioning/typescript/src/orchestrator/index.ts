export * from './types.js';
export * from './workspace.js';
export * from './readme.js';
export * from './dataset-orchestrator.js';
