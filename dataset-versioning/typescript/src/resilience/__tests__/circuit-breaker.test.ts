/**
 * Tests for CircuitBreaker
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { CircuitBreaker } from '../circuit-breaker.js';
import type { ResilienceEvent } from '../../observability/events.js';
import { CircuitOpenError, ConflictError, TransientError } from '../../errors/index.js';

describe('CircuitBreaker', () => {
  let clock: number;
  let events: ResilienceEvent[];
  let breaker: CircuitBreaker;

  const failing = () => vi.fn().mockRejectedValue(new TransientError('connection', 'refused'));

  async function trip(times = 3): Promise<void> {
    for (let i = 0; i < times; i++) {
      await expect(breaker.execute(failing())).rejects.toBeInstanceOf(TransientError);
    }
  }

  beforeEach(() => {
    clock = 1_000_000;
    events = [];
    breaker = new CircuitBreaker(
      'hosting-api',
      { failureThreshold: 3, recoveryTimeoutMs: 1000 },
      { now: () => clock, hooks: [{ onEvent: (event) => events.push(event) }] }
    );
  });

  describe('closed state', () => {
    it('should pass results through', async () => {
      await expect(breaker.execute(async () => 42)).resolves.toBe(42);
      expect(breaker.getState()).toBe('closed');
    });

    it('should stay closed below the threshold', async () => {
      await trip(2);

      expect(breaker.getSnapshot()).toEqual({ state: 'closed', failureCount: 2, lastFailureTime: 1_000_000 });
    });

    it('should open at the threshold', async () => {
      await trip(3);

      expect(breaker.getState()).toBe('open');
      expect(events).toEqual([
        { type: 'circuit_state_changed', circuit: 'hosting-api', from: 'closed', to: 'open', failureCount: 3 },
      ]);
    });

    it('should reset the failure count on success', async () => {
      await trip(2);
      await breaker.execute(async () => 'ok');

      expect(breaker.getSnapshot().failureCount).toBe(0);
    });
  });

  describe('open state', () => {
    beforeEach(async () => {
      await trip(3);
    });

    it('should reject calls without invoking them', async () => {
      const operation = vi.fn().mockResolvedValue('ok');

      await expect(breaker.execute(operation)).rejects.toBeInstanceOf(CircuitOpenError);
      expect(operation).not.toHaveBeenCalled();
      expect(events.at(-1)).toEqual({ type: 'circuit_rejected', circuit: 'hosting-api' });
    });

    it('should keep rejecting until the recovery timeout has fully passed', async () => {
      clock += 1000;

      await expect(breaker.execute(async () => 'ok')).rejects.toThrow("Circuit breaker 'hosting-api' is open");
    });
  });

  describe('half-open state', () => {
    beforeEach(async () => {
      await trip(3);
      clock += 1001;
    });

    it('should close after a successful trial', async () => {
      await expect(breaker.execute(async () => 'ok')).resolves.toBe('ok');

      expect(breaker.getState()).toBe('closed');
      expect(events.slice(-2).map((event) => (event.type === 'circuit_state_changed' ? event.to : event.type))).toEqual([
        'half_open',
        'closed',
      ]);
    });

    it('should reopen after a failed trial', async () => {
      await expect(breaker.execute(failing())).rejects.toBeInstanceOf(TransientError);

      expect(breaker.getState()).toBe('open');
      expect(breaker.getSnapshot().lastFailureTime).toBe(1_001_001);
    });

    it('should admit a single trial at a time', async () => {
      let release: (value: string) => void = () => {};
      const trial = breaker.execute(
        () =>
          new Promise<string>((resolve) => {
            release = resolve;
          })
      );
      const second = vi.fn().mockResolvedValue('second');

      await expect(breaker.execute(second)).rejects.toBeInstanceOf(CircuitOpenError);
      expect(second).not.toHaveBeenCalled();
      expect(breaker.getState()).toBe('half_open');

      release('first');
      await expect(trial).resolves.toBe('first');
      expect(breaker.getState()).toBe('closed');
    });
  });

  describe('tripsOn', () => {
    it('should treat ignored errors as healthy responses', async () => {
      const selective = new CircuitBreaker(
        'vcs-remote',
        { failureThreshold: 1, recoveryTimeoutMs: 1000 },
        { tripsOn: (error) => !(error instanceof ConflictError) }
      );

      await expect(selective.execute(() => Promise.reject(new ConflictError('exists')))).rejects.toBeInstanceOf(
        ConflictError
      );

      expect(selective.getState()).toBe('closed');
      expect(selective.getSnapshot().failureCount).toBe(0);
    });
  });

  it('should close and forget failures on reset', async () => {
    await trip(3);

    breaker.reset();

    expect(breaker.getSnapshot()).toEqual({ state: 'closed', failureCount: 0, lastFailureTime: undefined });
    await expect(breaker.execute(async () => 1)).resolves.toBe(1);
  });
});
