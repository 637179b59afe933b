/**
 * @module step-executor
 * Per-step lifecycle shared by every step type.
 *
 * pending → gate (skip_if / only_if / condition / depends_on)
 *         → setup hook → attempt loop (render, run, validate, retry)
 *         → extraction → teardown hook → finalize
 *
 * Subclasses only supply {@link StepExecutor.run}: what one attempt does.
 */

import type { ConditionEvaluator } from './condition-evaluator.js';
import {
  buildErrorInfo,
  ConditionError,
  HookError,
  partialResponseOf,
  RenderError,
} from './errors.js';
import { runExtractor } from './extractors.js';
import { errorMessage, isRecord } from './helpers.js';
import type { HookPhase, HookRunner } from './hooks.js';
import type { LeafRegistry } from './leaf-registry.js';
import type { Logger } from './logger.js';
import { resolveRetryPolicy, RetryManager } from './retry-manager.js';
import type {
  Condition,
  LeafStep,
  StepDefinition,
  StepOutcome,
  StepResult,
  ValidationRule,
  Variables,
} from './types.js';
import { assertValidations, validateResponse } from './validation.js';
import { computeDelta, type VariableManager } from './variable-manager.js';
import type { WorkerPoolHandle } from './worker-pool.js';

// =====================================================================
// Context
// =====================================================================

/** Everything a step needs from the run it belongs to */
export interface StepContext {
  variables: VariableManager;
  evaluator: ConditionEvaluator;
  leaves: LeafRegistry;
  hooks: HookRunner;
  pool: WorkerPoolHandle;
  logger: Logger;
  /** Results of steps that ran before this one, in order */
  previousResults: readonly StepResult[];
  /** Seconds, used when a step sets no timeout */
  defaultTimeout: number;
  sleep: (ms: number) => Promise<void>;
  /** Jitter source for retry delays */
  random?: () => number;
  /** Passed on to leaves; `false` skips TLS certificate checks */
  verifySsl?: boolean;
  /** Build the executor for a nested step (loop and concurrent bodies) */
  createExecutor: (step: StepDefinition, context: StepContext) => StepExecutor;
}

// =====================================================================
// Rendering helpers
// =====================================================================

function renderRecord(variables: VariableManager, record: Variables | undefined): Variables | undefined {
  if (!record) return undefined;
  const out: Variables = {};
  for (const [key, value] of Object.entries(record)) {
    out[key] = variables.renderStructured(value);
  }
  return out;
}

function renderHeaders(
  variables: VariableManager,
  headers: Record<string, string> | undefined,
): Record<string, string> | undefined {
  if (!headers) return undefined;
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    out[key] = variables.renderString(value);
  }
  return out;
}

/** Rendered HTTP fields shared by request and poll steps */
export interface RequestFields {
  method?: string;
  url: string;
  params?: Variables;
  headers?: Record<string, string>;
  body?: unknown;
}

export function renderRequestFields(variables: VariableManager, fields: RequestFields): RequestFields {
  return {
    method: fields.method === undefined ? undefined : variables.renderString(fields.method),
    url: variables.renderString(fields.url),
    params: renderRecord(variables, fields.params),
    headers: renderHeaders(variables, fields.headers),
    body: variables.renderStructured(fields.body),
  };
}

/**
 * Render every template field of a leaf step.
 */
export function renderLeafStep(step: LeafStep, variables: VariableManager): LeafStep {
  switch (step.type) {
    case 'request':
      return { ...step, ...renderRequestFields(variables, step) };
    case 'database':
      return {
        ...step,
        sql: variables.renderString(step.sql),
        database: renderRecord(variables, step.database),
        params: Array.isArray(step.params)
          ? step.params.map((p) => variables.renderStructured(p))
          : renderRecord(variables, step.params),
      };
    case 'script':
      return {
        ...step,
        script: step.script === undefined ? undefined : variables.renderString(step.script),
        args: renderRecord(variables, step.args),
      };
  }
}

/**
 * Render the `expect` of a validation rule and of its nested rules.
 */
export function renderValidationRule(rule: ValidationRule, variables: VariableManager): ValidationRule {
  return {
    ...rule,
    expect: variables.renderStructured(rule.expect),
    subValidations: rule.subValidations?.map((sub) => renderValidationRule(sub, variables)),
  };
}

// =====================================================================
// StepExecutor
// =====================================================================

/**
 * Base executor. One instance runs one step once; results are never reused.
 */
export abstract class StepExecutor<S extends StepDefinition = StepDefinition> {
  constructor(
    protected readonly step: S,
    protected readonly context: StepContext,
  ) {}

  get name(): string {
    return this.step.name;
  }

  /**
   * Perform one attempt of the step body.
   *
   * @param attempt - 1-based attempt number
   */
  protected abstract run(attempt: number): Promise<StepOutcome>;

  /**
   * Run the full lifecycle. Step-level failures, malformed conditions
   * included, end up in the returned (frozen) result rather than thrown.
   */
  async execute(): Promise<StepResult> {
    const { variables, logger } = this.context;
    const result: StepResult = {
      name: this.step.name,
      type: this.step.type,
      status: 'pending',
      startTime: Date.now(),
      extractedVars: {},
      validationResults: [],
      retryCount: 0,
      retryHistory: [],
      diagnostics: [],
      variablesSnapshot: { ...variables.allVariables() },
      variablesAfter: {},
    };
    const retry = new RetryManager(resolveRetryPolicy(this.step) ?? { maxAttempts: 1 }, this.context.random);
    let gatePassed = false;

    try {
      const skipReason = this.gate();
      if (skipReason !== undefined) {
        result.status = 'skipped';
        result.skipReason = skipReason;
        logger.info(`Step "${this.step.name}" skipped: ${skipReason}`);
      } else {
        gatePassed = true;
        logger.debug(`Step "${this.step.name}" started`, { type: this.step.type });
        await this.runHook('setup');
        await this.attemptLoop(result, retry);
        this.extract(result);
        result.status = 'success';
      }
    } catch (err) {
      result.status = err instanceof HookError && err.phase === 'setup' ? 'error' : 'failure';
      result.errorInfo = buildErrorInfo(err, {
        step: this.step.name,
        stepType: this.step.type,
        attempts: retry.attemptCount,
      });
      const partial = partialResponseOf(err);
      if (partial !== undefined) {
        result.response = partial;
      }
      logger.error(`Step "${this.step.name}" ${result.status}: ${result.errorInfo.message}`, {
        category: result.errorInfo.category,
      });
    }

    if (gatePassed) {
      try {
        await this.runHook('teardown');
      } catch (err) {
        const message = errorMessage(err);
        logger.warn(message);
        result.diagnostics.push(message);
      }
    }

    result.retryHistory = [...retry.history()];
    result.retryCount = Math.max(0, retry.attemptCount - 1);
    result.endTime = Date.now();
    result.duration = result.endTime - result.startTime;
    result.variablesAfter = { ...variables.allVariables() };
    result.variablesDelta = computeDelta(result.variablesSnapshot, result.variablesAfter);
    return Object.freeze(result);
  }

  // ===== Gate =====

  /** Generic `condition` gate; wait steps use the field for their own purpose */
  protected gateCondition(): Condition {
    return this.step.condition;
  }

  /**
   * @returns A skip reason, or undefined when the step should run
   * @throws {ConditionError} For malformed conditions
   */
  protected gate(): string | undefined {
    const { skipIf, onlyIf, dependsOn } = this.step;
    const { evaluator, logger } = this.context;

    if (skipIf !== undefined) {
      try {
        if (evaluator.evaluate(skipIf)) {
          return 'skip_if condition met';
        }
      } catch (err) {
        if (err instanceof ConditionError) throw err;
        logger.warn(`skip_if of "${this.step.name}" could not be evaluated, running the step: ${errorMessage(err)}`);
      }
    }

    for (const [label, condition] of [['only_if', onlyIf], ['condition', this.gateCondition()]] as const) {
      if (condition === undefined) continue;
      try {
        if (!evaluator.evaluate(condition)) {
          return `${label} condition not met`;
        }
      } catch (err) {
        if (err instanceof ConditionError) throw err;
        logger.warn(`${label} of "${this.step.name}" could not be evaluated, skipping: ${errorMessage(err)}`);
        return `${label} could not be evaluated: ${errorMessage(err)}`;
      }
    }

    for (const dependency of dependsOn ?? []) {
      const prior = this.findPrevious(dependency);
      if (!prior) {
        return `dependency "${dependency}" has not run`;
      }
      if (prior.status !== 'success') {
        return `dependency "${dependency}" did not succeed (${prior.status})`;
      }
    }

    return undefined;
  }

  private findPrevious(name: string): StepResult | undefined {
    const results = this.context.previousResults;
    for (let i = results.length - 1; i >= 0; i--) {
      const candidate = results[i];
      if (candidate?.name === name) return candidate;
    }
    return undefined;
  }

  // ===== Hooks =====

  private async runHook(phase: HookPhase): Promise<void> {
    const hook = phase === 'setup' ? this.step.setup : this.step.teardown;
    if (!hook) return;
    await this.context.hooks.run(phase, hook, {
      owner: this.step.name,
      variables: this.context.variables,
      sleep: this.context.sleep,
    });
  }

  // ===== Attempts =====

  /** Effective timeout in milliseconds */
  protected timeoutMs(): number {
    return (this.step.timeout ?? this.context.defaultTimeout) * 1000;
  }

  /** Errors that are configuration mistakes and never retried */
  protected isRetryable(err: unknown): boolean {
    return !(err instanceof ConditionError || err instanceof RenderError || err instanceof HookError);
  }

  private async attemptLoop(result: StepResult, retry: RetryManager): Promise<void> {
    const { logger } = this.context;
    const started = Date.now();

    for (let attempt = 1; ; attempt++) {
      const delayBefore = attempt > 1 ? retry.delay(attempt - 2) : 0;
      if (delayBefore > 0) {
        await this.context.sleep(delayBefore * 1000);
      }

      const attemptStart = Date.now();
      try {
        const outcome = await this.run(attempt);
        this.applyOutcome(result, outcome);
        if (this.step.validations && this.step.validations.length > 0) {
          const rules = this.step.validations.map((rule) => renderValidationRule(rule, this.context.variables));
          result.validationResults = validateResponse(rules, outcome.response);
          assertValidations(result.validationResults, outcome.response);
        }
        retry.recordAttempt({
          attemptNumber: attempt,
          success: true,
          delayBefore,
          duration: Date.now() - attemptStart,
        });
        return;
      } catch (err) {
        retry.recordAttempt({
          attemptNumber: attempt,
          success: false,
          error: err,
          delayBefore,
          duration: Date.now() - attemptStart,
        });

        if (!this.isRetryable(err) || !retry.shouldRetry(err, attempt)) {
          throw err;
        }
        if (this.step.timeout !== undefined && Date.now() - started >= this.timeoutMs()) {
          logger.warn(`Step "${this.step.name}" exceeded its ${this.step.timeout}s timeout, not retrying`);
          throw err;
        }
        logger.warn(`Step "${this.step.name}" attempt ${attempt} failed, retrying: ${errorMessage(err)}`);
      }
    }
  }

  private applyOutcome(result: StepResult, outcome: StepOutcome): void {
    result.response = outcome.response;
    if (outcome.performance) {
      result.performance = outcome.performance;
    }
    if (outcome.extractedVars) {
      for (const [name, value] of Object.entries(outcome.extractedVars)) {
        this.context.variables.set('extracted', name, value);
        result.extractedVars[name] = value;
      }
    }
  }

  // ===== Extraction =====

  private extract(result: StepResult): void {
    const { variables, evaluator, logger } = this.context;
    for (const extractor of this.step.extractors ?? []) {
      try {
        const outcome = runExtractor(extractor, result.response, evaluator);
        if (outcome.status === 'extracted') {
          variables.set('extracted', extractor.name, outcome.value);
          result.extractedVars[extractor.name] = outcome.value;
        } else {
          result.diagnostics.push(outcome.reason);
        }
      } catch (err) {
        if (err instanceof ConditionError) throw err;
        const message = `Extractor "${extractor.name}" failed: ${errorMessage(err)}`;
        logger.warn(message);
        result.diagnostics.push(message);
      }
    }
  }
}

// =====================================================================
// LeafStepExecutor
// =====================================================================

/**
 * Executor for `request`, `database` and `script` steps: renders the step
 * and hands it to the registered leaf operation.
 */
export class LeafStepExecutor extends StepExecutor<LeafStep> {
  protected async run(attempt: number): Promise<StepOutcome> {
    const { variables, leaves, logger } = this.context;
    const leaf = leaves.require(this.step.type);
    const rendered = renderLeafStep(this.step, variables);
    return leaf.execute(rendered, {
      variables: variables.allVariables(),
      timeoutMs: this.timeoutMs(),
      attempt,
      logger,
      verifySsl: this.context.verifySsl,
    });
  }
}

/** Response payload of a nested group, if it carries sub-step results */
export function subResultsOf(response: unknown): StepResult[] {
  if (!isRecord(response) || !Array.isArray(response.stepResults)) return [];
  return response.stepResults.filter(isStepResult);
}

function isStepResult(value: unknown): value is StepResult {
  return isRecord(value) && typeof value.name === 'string' && typeof value.status === 'string';
}
