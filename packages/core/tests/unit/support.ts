/**
 * Shared fixtures for executor tests: a scriptable leaf and a step context
 * wired to in-process fakes.
 */

import { vi, type Mock } from 'vitest';
import { ConditionEvaluator } from '../../src/condition-evaluator.js';
import { createStepExecutor } from '../../src/executors/index.js';
import { DefaultHookRunner } from '../../src/hooks.js';
import { LeafRegistry, type LeafContext, type LeafOperation } from '../../src/leaf-registry.js';
import { silentLogger, type Logger } from '../../src/logger.js';
import type { StepContext } from '../../src/step-executor.js';
import type { LeafStep, LeafStepType, StepOutcome, StepResult } from '../../src/types.js';
import { VariableManager } from '../../src/variable-manager.js';
import { WorkerPoolHandle } from '../../src/worker-pool.js';

export type StubHandler = (step: LeafStep, attempt: number) => StepOutcome | Promise<StepOutcome>;

/** Leaf that records every rendered step and answers through a handler */
export class StubLeaf implements LeafOperation {
  readonly calls: LeafStep[] = [];
  readonly contexts: LeafContext[] = [];

  constructor(
    readonly type: LeafStepType,
    private readonly handler: StubHandler = () => ({ response: { statusCode: 200, body: {} } }),
  ) {}

  async execute(step: LeafStep, context: LeafContext): Promise<StepOutcome> {
    this.calls.push(step);
    this.contexts.push(context);
    return this.handler(step, context.attempt);
  }
}

export interface TestContextOptions {
  leaves?: LeafOperation[];
  variables?: VariableManager;
  previousResults?: StepResult[];
  logger?: Logger;
}

export interface TestContext extends StepContext {
  sleep: Mock<[number], Promise<void>>;
}

/**
 * Build a step context with instant sleeps and the given leaves registered.
 */
export function createTestContext(options: TestContextOptions = {}): TestContext {
  const variables = options.variables ?? new VariableManager();
  const leaves = new LeafRegistry();
  for (const leaf of options.leaves ?? []) {
    leaves.register(leaf);
  }
  return {
    variables,
    evaluator: new ConditionEvaluator(variables),
    leaves,
    hooks: new DefaultHookRunner(),
    pool: new WorkerPoolHandle(),
    logger: options.logger ?? silentLogger,
    previousResults: options.previousResults ?? [],
    defaultTimeout: 30,
    sleep: vi.fn<[number], Promise<void>>(async () => {}),
    createExecutor: createStepExecutor,
  };
}

/** Minimal finished step result for depends_on checks */
export function priorResult(name: string, status: StepResult['status']): StepResult {
  return {
    name,
    type: 'request',
    status,
    startTime: 0,
    extractedVars: {},
    validationResults: [],
    retryCount: 0,
    retryHistory: [],
    diagnostics: [],
    variablesSnapshot: {},
    variablesAfter: {},
  };
}
