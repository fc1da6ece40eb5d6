/**
 * One circuit breaker per class of remote dependency.
 */

import { isTransientKind, classifyError, DatasetVersioningError } from '../errors/index.js';
import { CircuitBreaker } from './circuit-breaker.js';
import type { CircuitBreakerOptions } from './circuit-breaker.js';
import type { CircuitBreakerPolicy, CircuitState } from './types.js';

export const CIRCUITS = {
  hostingApi: 'hosting-api',
  vcsRemote: 'vcs-remote',
  dataRemote: 'data-remote',
  fileSource: 'file-source',
} as const;

export type CircuitName = (typeof CIRCUITS)[keyof typeof CIRCUITS];

/**
 * True for failures that say something about the health of the remote side.
 * Validation, conflicts and 4xx answers do not.
 */
export function isServiceFailure(error: unknown): boolean {
  const kind = classifyError(error);
  if (kind === undefined) return true;
  if (isTransientKind(kind) || kind === 'command' || kind === 'internal') return true;
  if (kind === 'rejected' && error instanceof DatasetVersioningError) {
    return (error.statusCode ?? 0) >= 500;
  }
  return false;
}

export class CircuitBreakerRegistry {
  private readonly breakers = new Map<string, CircuitBreaker>();
  private readonly policy: CircuitBreakerPolicy;
  private readonly options: CircuitBreakerOptions;

  constructor(policy: CircuitBreakerPolicy, options: CircuitBreakerOptions = {}) {
    this.policy = policy;
    this.options = { tripsOn: isServiceFailure, ...options };
  }

  get(name: CircuitName): CircuitBreaker {
    let breaker = this.breakers.get(name);
    if (!breaker) {
      breaker = new CircuitBreaker(name, this.policy, this.options);
      this.breakers.set(name, breaker);
    }
    return breaker;
  }

  states(): Partial<Record<CircuitName, CircuitState>> {
    const result: Partial<Record<CircuitName, CircuitState>> = {};
    for (const name of Object.values(CIRCUITS)) {
      const breaker = this.breakers.get(name);
      if (breaker) result[name] = breaker.getState();
    }
    return result;
  }

  resetAll(): void {
    for (const breaker of this.breakers.values()) {
      breaker.reset();
    }
  }
}
