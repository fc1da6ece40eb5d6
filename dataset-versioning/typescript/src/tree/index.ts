export * from './types.js';
export * from './tree-builder.js';
