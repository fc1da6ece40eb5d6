/**
 * Resilience module exports
 */

export * from './types.js';
export * from './policy.js';
export * from './retry.js';
export * from './circuit-breaker.js';
export * from './registry.js';
export * from './pipeline.js';
