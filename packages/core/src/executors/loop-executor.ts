/**
 * @module executors/loop-executor
 * `loop` steps: run a body of sub-steps `loopCount` times (`for`) or while
 * `loopCondition` holds (`while`).
 */

import { BusinessError, LeafError } from '../errors.js';
import { toNumber } from '../helpers.js';
import { StepExecutor } from '../step-executor.js';
import type { LoopStep, StepOutcome, StepResult } from '../types.js';

/** Upper bound on `while` iterations */
export const MAX_WHILE_ITERATIONS = 1000;

export interface LoopResponse {
  loopType: 'for' | 'while';
  loopCount: number | null;
  iterations: number;
  successCount: number;
  failureCount: number;
  stepResults: StepResult[];
}

export class LoopExecutor extends StepExecutor<LoopStep> {
  protected async run(): Promise<StepOutcome> {
    const { loopSteps } = this.step;
    if (!Array.isArray(loopSteps) || loopSteps.length === 0) {
      throw new LeafError(`Loop "${this.step.name}" requires loop_steps`);
    }

    const started = Date.now();
    const response = this.step.loopType === 'for' ? await this.runFor() : await this.runWhile();

    if (response.failureCount > 0) {
      throw new BusinessError(
        `Loop "${this.step.name}": ${response.failureCount} of ${response.stepResults.length} sub-steps failed`,
        response,
      );
    }
    return { response, performance: { totalTime: Date.now() - started } };
  }

  private async runFor(): Promise<LoopResponse> {
    const raw = this.step.loopCount;
    if (raw === undefined) {
      throw new LeafError(`Loop "${this.step.name}" requires loop_count for a for loop`);
    }
    const rendered = typeof raw === 'string' ? this.context.variables.render(raw) : raw;
    const count = toNumber(rendered);
    if (!Number.isInteger(count) || count < 0) {
      throw new LeafError(`Invalid loop_count: ${JSON.stringify(rendered)}`, { category: 'parsing' });
    }

    const response = this.emptyResponse('for', count);
    for (let i = 0; i < count; i++) {
      await this.iteration(i, response);
    }
    return response;
  }

  private async runWhile(): Promise<LoopResponse> {
    const condition = this.step.loopCondition;
    if (condition === undefined) {
      throw new LeafError(`Loop "${this.step.name}" requires loop_condition for a while loop`);
    }

    const response = this.emptyResponse('while', null);
    let i = 0;
    while (this.context.evaluator.evaluate(condition)) {
      if (i >= MAX_WHILE_ITERATIONS) {
        this.context.logger.warn(`Loop "${this.step.name}" stopped at ${MAX_WHILE_ITERATIONS} iterations`);
        break;
      }
      await this.iteration(i, response);
      i++;
    }
    return response;
  }

  private async iteration(index: number, response: LoopResponse): Promise<void> {
    const { variables, createExecutor } = this.context;
    if (this.step.loopVariable) {
      variables.set('extracted', this.step.loopVariable, index);
    }
    for (const definition of this.step.loopSteps) {
      const executor = createExecutor(definition, {
        ...this.context,
        previousResults: [...this.context.previousResults, ...response.stepResults],
      });
      const result = await executor.execute();
      response.stepResults.push(result);
      if (result.status === 'success') response.successCount++;
      else if (result.status !== 'skipped') response.failureCount++;
    }
    response.iterations = index + 1;
  }

  private emptyResponse(loopType: 'for' | 'while', loopCount: number | null): LoopResponse {
    return { loopType, loopCount, iterations: 0, successCount: 0, failureCount: 0, stepResults: [] };
  }
}
