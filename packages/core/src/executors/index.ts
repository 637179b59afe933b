/**
 * @module executors
 * Step type → executor dispatch.
 */

import { LeafStepExecutor, type StepContext, type StepExecutor } from '../step-executor.js';
import type { StepDefinition } from '../types.js';
import { ConcurrentExecutor } from './concurrent-executor.js';
import { LoopExecutor } from './loop-executor.js';
import { PollExecutor } from './poll-executor.js';
import { WaitExecutor } from './wait-executor.js';

/**
 * Build the executor for a step definition.
 */
export function createStepExecutor(step: StepDefinition, context: StepContext): StepExecutor {
  switch (step.type) {
    case 'request':
    case 'database':
    case 'script':
      return new LeafStepExecutor(step, context);
    case 'wait':
      return new WaitExecutor(step, context);
    case 'loop':
      return new LoopExecutor(step, context);
    case 'concurrent':
      return new ConcurrentExecutor(step, context);
    case 'poll':
      return new PollExecutor(step, context);
  }
}

export { ConcurrentExecutor, DEFAULT_MAX_CONCURRENCY, type ConcurrentResponse } from './concurrent-executor.js';
export { LoopExecutor, MAX_WHILE_ITERATIONS, type LoopResponse } from './loop-executor.js';
export {
  checkPollCondition,
  comparePoll,
  POLL_DEFAULTS,
  PollExecutor,
  statusCodeOf,
  type PollResponse,
} from './poll-executor.js';
export { DEFAULT_MAX_WAIT, DEFAULT_WAIT_INTERVAL, WaitExecutor, type WaitResponse } from './wait-executor.js';
