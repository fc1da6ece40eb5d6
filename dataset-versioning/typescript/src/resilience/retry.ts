/**
 * Retry executor with exponential backoff and jitter
 */

import { RetriesExhaustedError, classifyError, toDatasetError } from '../errors/index.js';
import { emitResilienceEvent } from '../observability/events.js';
import type { ResilienceEvent, ResilienceHook } from '../observability/events.js';
import { backoffDelay } from './policy.js';
import type { RetryPolicy } from './types.js';

export interface RetryExecutorOptions {
  hooks?: ResilienceHook[];
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

const defaultSleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Executes operations with retry logic and exponential backoff.
 *
 * An executor keeps no per-call state, so one instance can serve concurrent
 * calls.
 */
export class RetryExecutor {
  private readonly policy: RetryPolicy;
  private readonly hooks: ResilienceHook[];
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly random: () => number;

  constructor(policy: RetryPolicy, options: RetryExecutorOptions = {}) {
    this.policy = policy;
    this.hooks = [...(options.hooks ?? [])];
    this.sleep = options.sleep ?? defaultSleep;
    this.random = options.random ?? Math.random;
  }

  addHook(hook: ResilienceHook): void {
    this.hooks.push(hook);
  }

  getPolicy(): RetryPolicy {
    return this.policy;
  }

  /**
   * Execute an operation with retry logic
   * @param operationName - Name used in events and in the exhaustion error
   * @param operation - The async operation to execute
   * @throws The original error when it is not retryable
   * @throws RetriesExhaustedError when every attempt failed
   */
  async execute<T>(operationName: string, operation: () => Promise<T>): Promise<T> {
    for (let attempt = 1; ; attempt++) {
      try {
        const result = await operation();
        if (attempt > 1) {
          this.emit({ type: 'retry_succeeded', operation: operationName, attempts: attempt });
        }
        return result;
      } catch (error) {
        const kind = classifyError(error);
        if (kind === undefined || !this.policy.retryableKinds.has(kind)) {
          this.emit({
            type: 'retry_aborted',
            operation: operationName,
            attempt,
            error: toDatasetError(error, operationName),
          });
          throw error;
        }

        const failure = toDatasetError(error, operationName);
        if (attempt >= this.policy.maxAttempts) {
          this.emit({ type: 'retry_exhausted', operation: operationName, attempts: attempt, error: failure });
          throw new RetriesExhaustedError(operationName, attempt, failure);
        }

        const delayMs = backoffDelay(this.policy, attempt + 1, this.random);
        this.emit({
          type: 'retry_scheduled',
          operation: operationName,
          attempt,
          maxAttempts: this.policy.maxAttempts,
          delayMs,
          error: failure,
        });
        await this.sleep(delayMs);
      }
    }
  }

  private emit(event: ResilienceEvent): void {
    emitResilienceEvent(this.hooks, event);
  }
}
