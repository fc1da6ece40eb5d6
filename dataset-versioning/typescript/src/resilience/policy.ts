/**
 * Retry and circuit breaker policies
 */

import type { FailureKind } from '../errors/index.js';
import type { CircuitBreakerSettings, RetryPolicy, RetrySettings } from './types.js';

export const HTTP_RETRYABLE_KINDS: readonly FailureKind[] = ['connection', 'timeout', 'io'];

/** Version-control remotes also fail with plain non-zero exits on flaky networks */
export const GIT_RETRYABLE_KINDS: readonly FailureKind[] = ['connection', 'timeout', 'io', 'command'];

export const DEFAULT_HTTP_RETRY: Readonly<RetrySettings> = Object.freeze({
  maxAttempts: 4,
  baseDelayMs: 1000,
  maxDelayMs: 30000,
  backoffMultiplier: 2,
  jitter: true,
});

export const DEFAULT_GIT_RETRY: Readonly<RetrySettings> = Object.freeze({
  maxAttempts: 4,
  baseDelayMs: 2000,
  maxDelayMs: 60000,
  backoffMultiplier: 2,
  jitter: true,
});

export const DEFAULT_CIRCUIT_BREAKER: Readonly<CircuitBreakerSettings> = Object.freeze({
  failureThreshold: 5,
  recoveryTimeoutMs: 60000,
  enabled: true,
});

export function createRetryPolicy(settings: RetrySettings, retryableKinds: Iterable<FailureKind>): RetryPolicy {
  return Object.freeze({
    maxAttempts: settings.maxAttempts,
    baseDelayMs: settings.baseDelayMs,
    maxDelayMs: settings.maxDelayMs,
    backoffMultiplier: settings.backoffMultiplier,
    jitter: settings.jitter,
    retryableKinds: new Set(retryableKinds),
  });
}

export function createHttpRetryPolicy(overrides: Partial<RetrySettings> = {}): RetryPolicy {
  return createRetryPolicy({ ...DEFAULT_HTTP_RETRY, ...overrides }, HTTP_RETRYABLE_KINDS);
}

export function createGitRetryPolicy(overrides: Partial<RetrySettings> = {}): RetryPolicy {
  return createRetryPolicy({ ...DEFAULT_GIT_RETRY, ...overrides }, GIT_RETRYABLE_KINDS);
}

/**
 * Delay to wait before `attempt` (1-indexed). The first attempt never waits.
 *
 * `min(base * multiplier^(attempt-2), max)`, scaled by a factor in [0.5, 1.0]
 * when jitter is on.
 */
export function backoffDelay(policy: RetryPolicy, attempt: number, random: () => number = Math.random): number {
  if (attempt < 2) return 0;
  const exponential = policy.baseDelayMs * Math.pow(policy.backoffMultiplier, attempt - 2);
  const capped = Math.min(exponential, policy.maxDelayMs);
  const factor = policy.jitter ? 0.5 + 0.5 * random() : 1;
  return Math.max(0, Math.floor(capped * factor));
}
