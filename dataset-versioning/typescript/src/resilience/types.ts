/**
 * Resilience types
 */

import type { FailureKind } from '../errors/index.js';

/**
 * Tunable retry values, as they appear in configuration.
 */
export interface RetrySettings {
  /** Total attempts including the first one */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
  jitter: boolean;
}

/**
 * Immutable retry policy: settings plus the failure kinds worth retrying.
 */
export interface RetryPolicy extends Readonly<RetrySettings> {
  readonly retryableKinds: ReadonlySet<FailureKind>;
}

export interface CircuitBreakerPolicy {
  readonly failureThreshold: number;
  readonly recoveryTimeoutMs: number;
}

export interface CircuitBreakerSettings extends CircuitBreakerPolicy {
  enabled: boolean;
}

export type CircuitState = 'closed' | 'open' | 'half_open';

export interface CircuitSnapshot {
  state: CircuitState;
  failureCount: number;
  lastFailureTime: number | undefined;
}
