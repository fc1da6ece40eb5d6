/**
 * Resilience events and the hooks that observe them.
 */

import type { DatasetVersioningError } from '../errors/index.js';
import type { CircuitState } from '../resilience/types.js';
import type { Logger } from './logging.js';

export type ResilienceEvent =
  | {
      type: 'retry_scheduled';
      operation: string;
      attempt: number;
      maxAttempts: number;
      delayMs: number;
      error: DatasetVersioningError;
    }
  | { type: 'retry_succeeded'; operation: string; attempts: number }
  | { type: 'retry_aborted'; operation: string; attempt: number; error: DatasetVersioningError }
  | { type: 'retry_exhausted'; operation: string; attempts: number; error: DatasetVersioningError }
  | { type: 'circuit_state_changed'; circuit: string; from: CircuitState; to: CircuitState; failureCount: number }
  | { type: 'circuit_rejected'; circuit: string };

export interface ResilienceHook {
  onEvent(event: ResilienceEvent): void;
}

export function emitResilienceEvent(hooks: readonly ResilienceHook[], event: ResilienceEvent): void {
  for (const hook of hooks) {
    hook.onEvent(event);
  }
}

/**
 * Hook that reports resilience events through a {@link Logger}.
 */
export function createLoggingHook(logger: Logger): ResilienceHook {
  return {
    onEvent(event: ResilienceEvent): void {
      switch (event.type) {
        case 'retry_scheduled':
          logger.warn(`Retrying ${event.operation}`, {
            attempt: event.attempt,
            maxAttempts: event.maxAttempts,
            delayMs: event.delayMs,
            kind: event.error.kind,
            error: event.error.message,
          });
          break;
        case 'retry_succeeded':
          logger.info(`${event.operation} succeeded after retry`, { attempts: event.attempts });
          break;
        case 'retry_aborted':
          logger.debug(`${event.operation} failed with a non-retryable error`, {
            attempt: event.attempt,
            kind: event.error.kind,
          });
          break;
        case 'retry_exhausted':
          logger.error(`${event.operation} failed after ${event.attempts} attempts`, {
            kind: event.error.kind,
            error: event.error.message,
          });
          break;
        case 'circuit_state_changed':
          logger.warn(`Circuit breaker '${event.circuit}' ${event.from} -> ${event.to}`, {
            failureCount: event.failureCount,
          });
          break;
        case 'circuit_rejected':
          logger.debug(`Circuit breaker '${event.circuit}' rejected a call`);
          break;
      }
    },
  };
}
