/**
 * @module executors/poll-executor
 * `poll` steps: repeat one HTTP request until a condition on its response
 * holds, the attempt budget runs out or the time budget runs out.
 *
 * Polling replaces retrying: a failed request counts as an unmet attempt.
 */

import { LeafError, PollTimeoutError } from '../errors.js';
import { jsonPathSource } from '../extractors.js';
import { deepEqual, errorMessage, isRecord, toNumber } from '../helpers.js';
import { getValueByPath } from '../json-path.js';
import { computeBackoffDelay } from '../retry-manager.js';
import { renderRequestFields, StepExecutor } from '../step-executor.js';
import type { PollComparator, PollCondition, PollStep, RequestStep, StepOutcome } from '../types.js';

export const POLL_DEFAULTS = {
  maxAttempts: 30,
  /** Milliseconds */
  interval: 2000,
  /** Milliseconds */
  timeout: 60000,
  /** Milliseconds; cap on any single backoff delay */
  maxDelay: 30000,
  backoffMultiplier: 2,
} as const;

export type PollResponse =
  | { success: true; attempts: number; elapsedSeconds: number; response: unknown }
  | {
      success: false;
      /** Set on every exhaustion, attempts or time */
      timedOut: true;
      /** Set when the attempt budget, not the clock, ran out */
      maxAttemptsReached?: true;
      message: string;
      attempts: number;
      elapsedSeconds: number;
      lastResponse: unknown;
    };

// ===== Condition =====

function compareOrdered(actual: unknown, expected: unknown, fn: (a: number, b: number) => boolean): boolean {
  const a = toNumber(actual);
  const b = toNumber(expected);
  return !Number.isNaN(a) && !Number.isNaN(b) && fn(a, b);
}

function pollEquals(actual: unknown, expected: unknown): boolean {
  if (typeof actual === 'number' || typeof expected === 'number') {
    const a = toNumber(actual);
    const b = toNumber(expected);
    if (!Number.isNaN(a) && !Number.isNaN(b)) return a === b;
  }
  return deepEqual(actual, expected);
}

export function comparePoll(operator: PollComparator, actual: unknown, expected: unknown): boolean {
  switch (operator) {
    case 'eq':
      return pollEquals(actual, expected);
    case 'ne':
      return !pollEquals(actual, expected);
    case 'gt':
      return compareOrdered(actual, expected, (a, b) => a > b);
    case 'lt':
      return compareOrdered(actual, expected, (a, b) => a < b);
    case 'ge':
      return compareOrdered(actual, expected, (a, b) => a >= b);
    case 'le':
      return compareOrdered(actual, expected, (a, b) => a <= b);
    case 'contains':
      if (typeof actual === 'string') return actual.includes(String(expected));
      if (Array.isArray(actual)) return actual.some((item) => pollEquals(item, expected));
      return false;
    case 'exists':
      return actual !== undefined && actual !== null;
  }
}

/** Status code of a response, wherever the leaf put it */
export function statusCodeOf(response: unknown): unknown {
  if (!isRecord(response)) return undefined;
  if (response.statusCode !== undefined) return response.statusCode;
  if (response.status_code !== undefined) return response.status_code;
  return isRecord(response.response) ? response.response.statusCode : undefined;
}

/**
 * Whether a poll condition holds for a response.
 */
export function checkPollCondition(condition: PollCondition, response: unknown): boolean {
  if (condition.type === 'status_code') {
    return comparePoll(condition.operator, statusCodeOf(response), condition.expect);
  }
  const path = condition.path ?? '$';
  const normalized = path.startsWith('$') ? path : `$.${path}`;
  const actual = getValueByPath(jsonPathSource(normalized, response), normalized);
  return comparePoll(condition.operator, actual, condition.expect);
}

// ===== Executor =====

export class PollExecutor extends StepExecutor<PollStep> {
  /** Polling is its own retry loop */
  protected override isRetryable(): boolean {
    return false;
  }

  protected async run(): Promise<StepOutcome> {
    const { pollConfig, onTimeout } = this.step;
    if (!pollConfig?.condition) {
      throw new LeafError(`Poll "${this.step.name}" requires poll_config.condition`);
    }
    const maxAttempts = pollConfig.maxAttempts ?? POLL_DEFAULTS.maxAttempts;
    const interval = pollConfig.interval ?? POLL_DEFAULTS.interval;
    const timeout = pollConfig.timeout ?? POLL_DEFAULTS.timeout;
    const strategy = pollConfig.backoff ?? 'fixed';
    const { logger, sleep, variables } = this.context;
    const condition: PollCondition = {
      ...pollConfig.condition,
      expect: variables.renderStructured(pollConfig.condition.expect),
    };

    const started = Date.now();
    const elapsedSeconds = (): number => (Date.now() - started) / 1000;
    let lastResponse: unknown;
    let attempts = 0;

    while (attempts < maxAttempts && Date.now() - started < timeout) {
      attempts++;
      try {
        lastResponse = await this.request(attempts);
      } catch (err) {
        logger.debug(`Poll "${this.step.name}" attempt ${attempts} failed: ${errorMessage(err)}`);
        lastResponse = { error: errorMessage(err) };
      }

      if (checkPollCondition(condition, lastResponse)) {
        const response: PollResponse = { success: true, attempts, elapsedSeconds: elapsedSeconds(), response: lastResponse };
        return { response, performance: { totalTime: Date.now() - started } };
      }

      if (attempts < maxAttempts) {
        const delay = computeBackoffDelay(strategy, attempts - 1, interval, POLL_DEFAULTS.backoffMultiplier, POLL_DEFAULTS.maxDelay);
        await sleep(Math.max(0, Math.min(delay, timeout - (Date.now() - started))));
      }
    }

    const clockExpired = attempts < maxAttempts;
    const message = onTimeout?.message
      ?? (clockExpired
        ? `Poll "${this.step.name}" timed out after ${timeout}ms (${attempts} attempts)`
        : `Poll "${this.step.name}" condition not met after ${attempts} attempts`);

    if (onTimeout?.behavior === 'continue') {
      logger.warn(message);
      const response: PollResponse = {
        success: false,
        timedOut: true,
        ...(clockExpired ? {} : { maxAttemptsReached: true as const }),
        message,
        attempts,
        elapsedSeconds: elapsedSeconds(),
        lastResponse,
      };
      return { response, performance: { totalTime: Date.now() - started } };
    }

    throw new PollTimeoutError(message, lastResponse);
  }

  private async request(attempt: number): Promise<unknown> {
    const { variables, leaves, logger, verifySsl } = this.context;
    const rendered: RequestStep = {
      type: 'request',
      name: this.step.name,
      ...renderRequestFields(variables, this.step),
    };
    const outcome = await leaves.require('request').execute(rendered, {
      variables: variables.allVariables(),
      timeoutMs: this.timeoutMs(),
      attempt,
      logger,
      verifySsl,
    });
    return outcome.response;
  }
}
