/**
 * Composes a retry executor with an optional circuit breaker.
 */

import type { CircuitBreaker } from './circuit-breaker.js';
import type { RetryExecutor } from './retry.js';

/**
 * The breaker sits outside the retry loop: an exhausted retry counts as one
 * failure, and an open breaker skips the whole loop.
 */
export class ResiliencePipeline {
  constructor(
    private readonly retry: RetryExecutor,
    private readonly breaker?: CircuitBreaker
  ) {}

  execute<T>(operationName: string, operation: () => Promise<T>): Promise<T> {
    if (!this.breaker) {
      return this.retry.execute(operationName, operation);
    }
    return this.breaker.execute(() => this.retry.execute(operationName, operation));
  }
}
