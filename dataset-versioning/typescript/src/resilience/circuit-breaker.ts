/**
 * Circuit breaker implementation following the three-state pattern
 */

import { CircuitOpenError } from '../errors/index.js';
import { emitResilienceEvent } from '../observability/events.js';
import type { ResilienceHook } from '../observability/events.js';
import type { CircuitBreakerPolicy, CircuitSnapshot, CircuitState } from './types.js';

export interface CircuitBreakerOptions {
  hooks?: ResilienceHook[];
  now?: () => number;
  /**
   * Decides whether an error counts against the breaker. Errors that do not
   * count are recorded as a healthy response. Defaults to counting every error.
   */
  tripsOn?: (error: unknown) => boolean;
}

/**
 * Circuit breaker that fails fast once a dependency keeps failing.
 *
 * States:
 * - Closed: normal operation, counts consecutive failures
 * - Open: rejects calls without invoking them until the recovery timeout passes
 * - Half-Open: lets a single trial call through; its outcome closes or reopens
 *
 * State is only read and written between awaits, so transitions never
 * interleave.
 */
export class CircuitBreaker {
  readonly name: string;
  private state: CircuitState = 'closed';
  private failureCount = 0;
  private lastFailureTime: number | undefined = undefined;
  private trialInFlight = false;
  private readonly policy: CircuitBreakerPolicy;
  private readonly hooks: ResilienceHook[];
  private readonly now: () => number;
  private readonly tripsOn: (error: unknown) => boolean;

  constructor(name: string, policy: CircuitBreakerPolicy, options: CircuitBreakerOptions = {}) {
    this.name = name;
    this.policy = policy;
    this.hooks = [...(options.hooks ?? [])];
    this.now = options.now ?? Date.now;
    this.tripsOn = options.tripsOn ?? (() => true);
  }

  addHook(hook: ResilienceHook): void {
    this.hooks.push(hook);
  }

  /**
   * Execute an operation through the circuit breaker
   * @throws CircuitOpenError if the circuit is open or a trial call is already running
   * @throws The original error from the operation
   */
  async execute<T>(operation: () => Promise<T>): Promise<T> {
    const isTrial = this.admit();

    let result: T;
    try {
      result = await operation();
    } catch (error) {
      if (this.tripsOn(error)) {
        this.recordFailure(isTrial);
      } else {
        this.recordSuccess(isTrial);
      }
      throw error;
    }
    this.recordSuccess(isTrial);
    return result;
  }

  getState(): CircuitState {
    return this.state;
  }

  getSnapshot(): CircuitSnapshot {
    return {
      state: this.state,
      failureCount: this.failureCount,
      lastFailureTime: this.lastFailureTime,
    };
  }

  reset(): void {
    this.failureCount = 0;
    this.lastFailureTime = undefined;
    this.trialInFlight = false;
    this.transitionTo('closed');
  }

  /**
   * Returns true when the admitted call is the half-open trial.
   */
  private admit(): boolean {
    if (this.state === 'open') {
      if (this.recoveryTimeoutElapsed()) {
        this.transitionTo('half_open');
      } else {
        this.reject();
      }
    }

    if (this.state === 'half_open') {
      if (this.trialInFlight) {
        this.reject();
      }
      this.trialInFlight = true;
      return true;
    }

    return false;
  }

  private recoveryTimeoutElapsed(): boolean {
    if (this.lastFailureTime === undefined) return true;
    return this.now() - this.lastFailureTime > this.policy.recoveryTimeoutMs;
  }

  private reject(): never {
    emitResilienceEvent(this.hooks, { type: 'circuit_rejected', circuit: this.name });
    throw new CircuitOpenError(this.name);
  }

  private recordSuccess(isTrial: boolean): void {
    if (isTrial) {
      this.trialInFlight = false;
      this.failureCount = 0;
      this.transitionTo('closed');
    } else if (this.state === 'closed') {
      this.failureCount = 0;
    }
    // A call admitted before the breaker opened does not close it.
  }

  private recordFailure(isTrial: boolean): void {
    if (isTrial) {
      this.trialInFlight = false;
      this.failureCount++;
      this.lastFailureTime = this.now();
      this.transitionTo('open');
      return;
    }

    if (this.state !== 'closed') return;

    this.failureCount++;
    this.lastFailureTime = this.now();
    if (this.failureCount >= this.policy.failureThreshold) {
      this.transitionTo('open');
    }
  }

  private transitionTo(newState: CircuitState): void {
    if (this.state === newState) return;
    const from = this.state;
    this.state = newState;
    emitResilienceEvent(this.hooks, {
      type: 'circuit_state_changed',
      circuit: this.name,
      from,
      to: newState,
      failureCount: this.failureCount,
    });
  }
}
