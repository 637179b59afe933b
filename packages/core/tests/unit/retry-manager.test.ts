/**
 * Unit tests for retry-manager module.
 *
 * Tests cover:
 * - Fixed, linear and exponential backoff with the delay cap
 * - Jitter bounds
 * - retry_on / stop_on filtering and the attempt limit
 * - Policy resolution from retry_times and retry_policy
 * - Attempt history recording
 */

import { describe, it, expect } from 'vitest';
import { RetryManager, computeBackoffDelay, resolveRetryPolicy, DEFAULT_RETRY_POLICY } from '../../src/retry-manager.js';
import { ValidationError } from '../../src/errors.js';

describe('retry-manager', () => {
  describe('computeBackoffDelay', () => {
    it('should double exponential delays up to the cap', () => {
      const delays = Array.from({ length: 10 }, (_, i) => computeBackoffDelay('exponential', i, 1, 2, 100));
      expect(delays).toEqual([1, 2, 4, 8, 16, 32, 64, 100, 100, 100]);
    });

    it('should grow linear delays by the base', () => {
      const delays = Array.from({ length: 5 }, (_, i) => computeBackoffDelay('linear', i, 0.5, 2, 60));
      expect(delays).toEqual([0.5, 1, 1.5, 2, 2.5]);
    });

    it('should keep fixed delays constant', () => {
      expect(computeBackoffDelay('fixed', 7, 3, 2, 60)).toBe(3);
      expect(computeBackoffDelay('fixed', 0, 90, 2, 60)).toBe(60);
    });
  });

  describe('delay', () => {
    it('should return the raw delay without jitter', () => {
      const manager = new RetryManager({ strategy: 'exponential', baseDelay: 1 });
      expect(manager.delay(0)).toBe(1);
      expect(manager.delay(3)).toBe(8);
    });

    it('should keep jittered delays within ten percent', () => {
      const randoms = [0, 0.25, 0.5, 0.75, 0.999];
      for (const value of randoms) {
        const manager = new RetryManager({ strategy: 'fixed', baseDelay: 10, jitter: true }, () => value);
        const delay = manager.delay(0);
        expect(delay).toBeGreaterThanOrEqual(9);
        expect(delay).toBeLessThanOrEqual(11);
      }
    });

    it('should apply jitter after the cap', () => {
      const manager = new RetryManager(
        { strategy: 'exponential', baseDelay: 1, maxDelay: 5, jitter: true },
        () => 0.75,
      );
      expect(manager.delay(10)).toBeCloseTo(5.25);
    });
  });

  describe('shouldRetry', () => {
    it('should stop once the attempt limit is reached', () => {
      const manager = new RetryManager({ maxAttempts: 3 });
      expect(manager.shouldRetry(new Error('x'), 1)).toBe(true);
      expect(manager.shouldRetry(new Error('x'), 2)).toBe(true);
      expect(manager.shouldRetry(new Error('x'), 3)).toBe(false);
    });

    it('should never retry errors listed in stop_on', () => {
      const manager = new RetryManager({ maxAttempts: 5, stopOn: ['ValidationError'] });
      expect(manager.shouldRetry(new ValidationError('bad'), 1)).toBe(false);
      expect(manager.shouldRetry(new Error('x'), 1)).toBe(true);
    });

    it('should only retry errors listed in retry_on', () => {
      const manager = new RetryManager({ maxAttempts: 5, retryOn: ['LeafError'] });
      expect(manager.shouldRetry(new ValidationError('bad'), 1)).toBe(true);
      expect(manager.shouldRetry(new Error('x'), 1)).toBe(false);
    });
  });

  describe('resolveRetryPolicy', () => {
    it('should map retry_times to an exponential policy', () => {
      expect(resolveRetryPolicy({ retryTimes: 2 })).toEqual({
        ...DEFAULT_RETRY_POLICY,
        maxAttempts: 3,
        strategy: 'exponential',
        baseDelay: 1,
        maxDelay: 10,
      });
    });

    it('should return undefined when the step is not retried', () => {
      expect(resolveRetryPolicy({})).toBeUndefined();
      expect(resolveRetryPolicy({ retryTimes: 0 })).toBeUndefined();
    });

    it('should prefer an explicit retry policy', () => {
      const policy = resolveRetryPolicy({ retryTimes: 9, retryPolicy: { maxAttempts: 2, strategy: 'fixed' } });
      expect(policy?.maxAttempts).toBe(2);
      expect(policy?.strategy).toBe('fixed');
      expect(policy?.baseDelay).toBe(DEFAULT_RETRY_POLICY.baseDelay);
    });
  });

  describe('recordAttempt', () => {
    it('should append frozen attempts in order', () => {
      const manager = new RetryManager();
      manager.recordAttempt({ attemptNumber: 1, success: false, error: new ValidationError('bad'), delayBefore: 0, duration: 5 });
      manager.recordAttempt({ attemptNumber: 2, success: true, delayBefore: 1, duration: 3 });

      const history = manager.history();
      expect(manager.attemptCount).toBe(2);
      expect(history[0]).toMatchObject({ attemptNumber: 1, success: false, errorType: 'ValidationError', errorMessage: 'bad' });
      expect(history[1]).toMatchObject({ attemptNumber: 2, success: true, delayBefore: 1 });
      expect(history[1]?.errorType).toBeUndefined();
      expect(Object.isFrozen(history[0])).toBe(true);
    });
  });
});
