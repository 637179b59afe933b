/**
 * @module executors/concurrent-executor
 * `concurrent` steps: sub-steps run on the shared worker pool, at most
 * `maxConcurrency` at a time. Every sub-step runs to completion.
 *
 * Sub-steps write extracted variables into the same VariableManager; when
 * two of them extract the same name, the last one to finish wins.
 */

import { BusinessError, buildErrorInfo } from '../errors.js';
import { StepExecutor } from '../step-executor.js';
import type { ConcurrentStep, StepOutcome, StepResult } from '../types.js';

export const DEFAULT_MAX_CONCURRENCY = 5;

export interface ConcurrentResponse {
  maxConcurrency: number;
  totalSteps: number;
  successCount: number;
  failureCount: number;
  /** In declaration order */
  stepResults: StepResult[];
}

export class ConcurrentExecutor extends StepExecutor<ConcurrentStep> {
  protected async run(): Promise<StepOutcome> {
    const steps = this.step.concurrentSteps;
    const maxConcurrency = Math.max(1, this.step.maxConcurrency ?? DEFAULT_MAX_CONCURRENCY);
    const started = Date.now();

    const tasks = steps.map((definition) => () => this.context.createExecutor(definition, this.context).execute());
    const settled = await this.context.pool.get().map(tasks, maxConcurrency);

    const stepResults = settled.map((outcome, i): StepResult => {
      if (outcome.status === 'fulfilled') return outcome.value;
      // execute() reports failures in its result; a rejection means the executor itself broke
      const definition = steps[i];
      const now = Date.now();
      return {
        name: definition?.name ?? `#${i}`,
        type: definition?.type ?? 'request',
        status: 'error',
        startTime: started,
        endTime: now,
        duration: now - started,
        extractedVars: {},
        validationResults: [],
        errorInfo: buildErrorInfo(outcome.reason, { step: definition?.name }),
        retryCount: 0,
        retryHistory: [],
        diagnostics: [],
        variablesSnapshot: {},
        variablesAfter: {},
      };
    });

    const successCount = stepResults.filter((r) => r.status === 'success').length;
    const failureCount = stepResults.filter((r) => r.status === 'failure' || r.status === 'error').length;
    const response: ConcurrentResponse = {
      maxConcurrency,
      totalSteps: steps.length,
      successCount,
      failureCount,
      stepResults,
    };

    if (failureCount > 0) {
      throw new BusinessError(
        `Concurrent group "${this.step.name}": ${failureCount} of ${steps.length} sub-steps failed`,
        response,
      );
    }
    return { response, performance: { totalTime: Date.now() - started } };
  }
}
