/**
 * @module executors/wait-executor
 * `wait` steps: a fixed pause, or polling a condition until it holds.
 */

import { LeafError } from '../errors.js';
import { toNumber } from '../helpers.js';
import { StepExecutor } from '../step-executor.js';
import type { Condition, StepOutcome, WaitStep } from '../types.js';

export const DEFAULT_WAIT_INTERVAL = 1;
export const DEFAULT_MAX_WAIT = 60;

export interface WaitResponse {
  waitType: 'fixed' | 'conditional';
  waitSeconds: number;
  actualWaitSeconds: number;
  /** Conditional waits only: whether the condition was met in time */
  result?: boolean;
}

export class WaitExecutor extends StepExecutor<WaitStep> {
  /** `condition` is the wait target here, not a gate */
  protected override gateCondition(): Condition {
    return undefined;
  }

  protected async run(): Promise<StepOutcome> {
    const response = this.step.condition !== undefined && this.step.seconds === undefined
      ? await this.waitForCondition(this.step.condition)
      : await this.waitFixed();
    return { response, performance: { totalTime: response.actualWaitSeconds * 1000 } };
  }

  private async waitFixed(): Promise<WaitResponse> {
    const raw = this.step.seconds ?? 0;
    const rendered = typeof raw === 'string' ? this.context.variables.render(raw) : raw;
    const seconds = toNumber(rendered);

    if (Number.isNaN(seconds)) {
      throw new LeafError(`Invalid wait seconds: ${JSON.stringify(rendered)}`, { category: 'parsing' });
    }
    if (seconds < 0) {
      throw new LeafError(`Wait seconds must be non-negative, got ${seconds}`);
    }
    if (this.step.timeout !== undefined && seconds > this.step.timeout) {
      throw new LeafError(`Wait of ${seconds}s exceeds timeout of ${this.step.timeout}s`, { category: 'timeout' });
    }

    const started = Date.now();
    await this.context.sleep(seconds * 1000);
    return { waitType: 'fixed', waitSeconds: seconds, actualWaitSeconds: (Date.now() - started) / 1000 };
  }

  /**
   * Check the condition every `interval` seconds for up to `maxWait`
   * seconds. Expiry is reported in the response, not thrown.
   */
  private async waitForCondition(condition: Condition): Promise<WaitResponse> {
    const interval = this.step.interval ?? DEFAULT_WAIT_INTERVAL;
    const maxWait = this.step.maxWait ?? DEFAULT_MAX_WAIT;
    const started = Date.now();
    let waited = 0;

    for (;;) {
      if (this.context.evaluator.evaluate(condition)) {
        return { waitType: 'conditional', waitSeconds: maxWait, actualWaitSeconds: (Date.now() - started) / 1000, result: true };
      }
      if (waited >= maxWait) {
        this.context.logger.warn(`Wait "${this.step.name}" gave up after ${maxWait}s`);
        return { waitType: 'conditional', waitSeconds: maxWait, actualWaitSeconds: (Date.now() - started) / 1000, result: false };
      }
      const pause = Math.min(interval, maxWait - waited);
      await this.context.sleep(pause * 1000);
      waited += pause;
    }
  }
}
