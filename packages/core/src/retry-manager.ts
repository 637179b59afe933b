/**
 * @module retry-manager
 * Retry policy resolution, backoff delay computation and attempt bookkeeping.
 *
 * Delays are in seconds. Attempt indices passed to {@link RetryManager.delay}
 * are 0-based retry indices: `delay(0)` is the wait before the second attempt.
 */

import { errorTypeName, errorTypeNames } from './errors.js';
import type { BackoffStrategy, RetryAttempt, RetryPolicy } from './types.js';

/** Defaults applied to any partially specified policy */
export const DEFAULT_RETRY_POLICY: Readonly<RetryPolicy> = {
  maxAttempts: 3,
  strategy: 'exponential',
  baseDelay: 1,
  maxDelay: 60,
  backoffMultiplier: 2,
  jitter: false,
  retryOn: [],
  stopOn: [],
};

/** Relative jitter bound (±10%) */
export const JITTER_RATIO = 0.1;

/**
 * Compute the un-jittered delay for a retry index.
 *
 * - `fixed`       → base
 * - `linear`      → base × (index + 1)
 * - `exponential` → base × multiplier^index
 *
 * All strategies are capped at `maxDelay`.
 */
export function computeBackoffDelay(
  strategy: BackoffStrategy,
  attemptIndex: number,
  baseDelay: number,
  multiplier: number,
  maxDelay: number,
): number {
  let delay: number;
  switch (strategy) {
    case 'fixed':
      delay = baseDelay;
      break;
    case 'linear':
      delay = baseDelay * (attemptIndex + 1);
      break;
    case 'exponential':
      delay = baseDelay * Math.pow(multiplier, attemptIndex);
      break;
  }
  return Math.min(delay, maxDelay);
}

/**
 * Resolve the effective retry policy of a step.
 *
 * An explicit `retryPolicy` wins. Otherwise `retryTimes > 0` maps to an
 * exponential policy (base 1s, cap 10s) with `retryTimes + 1` attempts.
 *
 * @returns The policy, or undefined when the step is not retried
 */
export function resolveRetryPolicy(step: {
  retryPolicy?: Partial<RetryPolicy>;
  retryTimes?: number;
}): RetryPolicy | undefined {
  if (step.retryPolicy) {
    return { ...DEFAULT_RETRY_POLICY, ...step.retryPolicy };
  }
  if (step.retryTimes !== undefined && step.retryTimes > 0) {
    return {
      ...DEFAULT_RETRY_POLICY,
      maxAttempts: step.retryTimes + 1,
      strategy: 'exponential',
      baseDelay: 1,
      maxDelay: 10,
    };
  }
  return undefined;
}

export interface AttemptRecord {
  attemptNumber: number;
  success: boolean;
  error?: unknown;
  /** Seconds slept before the attempt */
  delayBefore: number;
  /** Milliseconds */
  duration: number;
  timestamp?: number;
}

/**
 * Retry state machine for one step execution.
 */
export class RetryManager {
  readonly policy: RetryPolicy;
  private readonly attempts: RetryAttempt[] = [];
  private readonly random: () => number;

  /**
   * @param policy - Partial policy merged over {@link DEFAULT_RETRY_POLICY}
   * @param random - Source of uniform [0, 1) values for jitter
   */
  constructor(policy: Partial<RetryPolicy> = {}, random: () => number = Math.random) {
    this.policy = { ...DEFAULT_RETRY_POLICY, ...policy };
    this.random = random;
  }

  /**
   * Decide whether another attempt may run.
   *
   * @param error - The error raised by the last attempt
   * @param attemptIndex - Number of attempts made so far
   */
  shouldRetry(error: unknown, attemptIndex: number): boolean {
    if (attemptIndex >= this.policy.maxAttempts) {
      return false;
    }
    const names = errorTypeNames(error);
    if (this.policy.stopOn.some((name) => names.includes(name))) {
      return false;
    }
    if (this.policy.retryOn.length > 0 && !this.policy.retryOn.some((name) => names.includes(name))) {
      return false;
    }
    return true;
  }

  /**
   * Seconds to wait before retry `attemptIndex` (0-based).
   * With jitter the delay moves uniformly within ±10%.
   */
  delay(attemptIndex: number): number {
    const { strategy, baseDelay, backoffMultiplier, maxDelay, jitter } = this.policy;
    const delay = computeBackoffDelay(strategy, attemptIndex, baseDelay, backoffMultiplier, maxDelay);
    if (!jitter) {
      return delay;
    }
    const factor = 1 + (this.random() * 2 - 1) * JITTER_RATIO;
    return Math.max(0, delay * factor);
  }

  /**
   * Append one attempt to the history.
   */
  recordAttempt(record: AttemptRecord): RetryAttempt {
    const attempt: RetryAttempt = {
      attemptNumber: record.attemptNumber,
      timestamp: record.timestamp ?? Date.now(),
      success: record.success,
      delayBefore: record.delayBefore,
      duration: record.duration,
    };
    if (!record.success && record.error !== undefined) {
      attempt.errorType = errorTypeName(record.error);
      attempt.errorMessage = record.error instanceof Error ? record.error.message : String(record.error);
    }
    this.attempts.push(Object.freeze(attempt));
    return attempt;
  }

  /** Ordered attempt history */
  history(): readonly RetryAttempt[] {
    return this.attempts;
  }

  get attemptCount(): number {
    return this.attempts.length;
  }
}
