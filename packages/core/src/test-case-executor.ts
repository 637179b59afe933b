/**
 * @module test-case-executor
 * Runs one test case: seeds the variable scopes from config, then executes
 * every step in declaration order. A failed step never stops the case.
 *
 * Lifecycle events (`test_start`, `step_start`, `step_complete`,
 * `test_complete`) are published on the EventBus `events` channel.
 */

import { ConditionEvaluator } from './condition-evaluator.js';
import { buildErrorInfo } from './errors.js';
import type { EventBus } from './event-bus.js';
import { createStepExecutor } from './executors/index.js';
import { sleep as defaultSleep, errorMessage, isRecord } from './helpers.js';
import { DefaultHookRunner, type HookRunner } from './hooks.js';
import type { LeafRegistry } from './leaf-registry.js';
import { createBusLogger, silentLogger, type Logger } from './logger.js';
import type { StepContext } from './step-executor.js';
import type { TemplateFunctionRegistry } from './template-functions.js';
import type {
  EngineEvent,
  ErrorInfo,
  ProfileConfig,
  StepResult,
  TestCase,
  TestCaseResult,
  TestCaseStatus,
  Variables,
} from './types.js';
import { VariableManager } from './variable-manager.js';
import { WorkerPoolHandle } from './worker-pool.js';

/** Seconds */
export const DEFAULT_STEP_TIMEOUT = 30;

export interface TestCaseExecutorOptions {
  leaves: LeafRegistry;
  /** Lifecycle events and (unless `logger` is given) log lines go here */
  bus?: EventBus;
  logger?: Logger;
  hooks?: HookRunner;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
  /** Bring your own manager, e.g. to pre-register template functions */
  variables?: VariableManager;
  functions?: TemplateFunctionRegistry;
  /** Profile to activate; falls back to `config.activeProfile` */
  profile?: string;
  /** Highest-priority values, e.g. from `--var` on the command line */
  overrides?: Variables;
  /** Data-driven row, written to the global scope over config and OS values */
  parameters?: Variables;
  /** Environment for `env_vars.load_from_os`; defaults to process.env */
  env?: NodeJS.ProcessEnv;
  /** Pool-wide cap for concurrent groups */
  maxWorkers?: number;
}

/**
 * Profiles as templates see them (`${config.profiles.dev.base_url}`), with
 * versioned names (`v1.dev`) reachable flat and nested.
 */
export function profilesContext(profiles: Record<string, ProfileConfig>): Variables {
  const context: Variables = {};
  for (const [name, profile] of Object.entries(profiles)) {
    const view: Variables = {
      base_url: profile.baseUrl,
      variables: profile.variables ?? {},
      timeout: profile.timeout,
      verify_ssl: profile.verifySsl,
      overrides: profile.overrides ?? {},
      priority: profile.priority,
    };
    context[name] = view;

    const parts = name.split('.');
    if (parts.length < 2) continue;
    let node = context;
    for (const part of parts.slice(0, -1)) {
      const child = node[part];
      if (isRecord(child)) {
        node = child;
      } else {
        const created: Variables = {};
        node[part] = created;
        node = created;
      }
    }
    node[parts[parts.length - 1] ?? name] = view;
  }
  return context;
}

export class TestCaseExecutor {
  private readonly logger: Logger;
  private readonly hooks: HookRunner;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(private readonly options: TestCaseExecutorOptions) {
    this.logger = options.logger ?? (options.bus ? createBusLogger(options.bus, 'executor') : silentLogger);
    this.hooks = options.hooks ?? new DefaultHookRunner();
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * Execute a test case.
   *
   * @returns The aggregate result; never throws for step or hook failures
   */
  async execute(testCase: TestCase): Promise<TestCaseResult> {
    const startTime = Date.now();
    const variables = this.options.variables ?? new VariableManager({
      functions: this.options.functions,
      logger: this.logger,
    });
    const stepResults: StepResult[] = [];
    const totalSteps = testCase.steps.length;

    this.emit({ type: 'test_start', testName: testCase.name, totalSteps, timestamp: startTime });

    if (testCase.enabled === false) {
      this.logger.info(`Test case "${testCase.name}" is disabled`);
      return this.finish(testCase, 'skipped', startTime, stepResults, variables);
    }

    const pool = new WorkerPoolHandle({ maxWorkers: this.options.maxWorkers });
    try {
      this.initializeVariables(testCase, variables);

      if (testCase.setup) {
        try {
          await this.hooks.run('setup', testCase.setup, { owner: testCase.name, variables, sleep: this.sleep });
        } catch (err) {
          this.logger.error(`Setup of "${testCase.name}" failed: ${errorMessage(err)}`);
          return this.finish(testCase, 'error', startTime, stepResults, variables, buildErrorInfo(err, { testCase: testCase.name }));
        }
      }

      const evaluator = new ConditionEvaluator(variables);
      const verifySsl = this.activeProfile(testCase)?.verifySsl !== false;
      for (const [index, step] of testCase.steps.entries()) {
        this.emit({
          type: 'step_start',
          testName: testCase.name,
          stepName: step.name,
          stepType: step.type,
          stepIndex: index,
          totalSteps,
          timestamp: Date.now(),
        });

        const context: StepContext = {
          variables,
          evaluator,
          leaves: this.options.leaves,
          hooks: this.hooks,
          pool,
          logger: this.logger,
          previousResults: [...stepResults],
          defaultTimeout: testCase.config?.timeout ?? DEFAULT_STEP_TIMEOUT,
          sleep: this.sleep,
          random: this.options.random,
          verifySsl,
          createExecutor: createStepExecutor,
        };
        const result = await createStepExecutor(step, context).execute();
        stepResults.push(result);

        this.emit({
          type: 'step_complete',
          testName: testCase.name,
          stepName: step.name,
          stepIndex: index,
          status: result.status,
          result,
          timestamp: Date.now(),
        });
      }

      if (testCase.teardown) {
        try {
          await this.hooks.run('teardown', testCase.teardown, { owner: testCase.name, variables, sleep: this.sleep });
        } catch (err) {
          this.logger.warn(`Teardown of "${testCase.name}" failed: ${errorMessage(err)}`);
        }
      }

      const failed = stepResults.some((r) => r.status === 'failure' || r.status === 'error');
      return this.finish(testCase, failed ? 'failed' : 'passed', startTime, stepResults, variables);
    } finally {
      await pool.shutdown();
    }
  }

  private activeProfile(testCase: TestCase): ProfileConfig | undefined {
    const name = this.options.profile ?? testCase.config?.activeProfile;
    return name === undefined ? undefined : testCase.config?.profiles?.[name];
  }

  /**
   * Seed scopes, lowest priority first:
   * config context → global (config.variables, OS env, data-driven row) →
   * profile → override.
   */
  private initializeVariables(testCase: TestCase, variables: VariableManager): void {
    const config = testCase.config;
    const profileName = this.options.profile ?? config?.activeProfile;
    const profile = this.activeProfile(testCase);

    if (config) {
      variables.setConfigContext({
        name: config.name,
        active_profile: profileName,
        profiles: profilesContext(config.profiles ?? {}),
        variables: config.variables ?? {},
        timeout: config.timeout,
        retry_times: config.retryTimes,
      });
      variables.setMany('global', config.variables ?? {});

      const envVars = config.envVars;
      if (envVars?.loadFromOs) {
        variables.loadEnvironmentVariables(envVars.prefix ?? '', false, this.options.env ?? process.env);
      }
      if (envVars?.overrides) {
        variables.setMany('override', envVars.overrides);
      }
    }

    if (this.options.parameters) {
      variables.setMany('global', this.options.parameters);
    }

    if (profileName !== undefined) {
      if (!profile) {
        this.logger.warn(`Profile "${profileName}" is not defined; continuing without it`);
      } else {
        variables.setMany('profile', profile.variables ?? {});
        if (profile.baseUrl !== undefined) {
          variables.set('profile', 'base_url', profile.baseUrl);
        }
        for (const [name, value] of Object.entries(profile.overrides ?? {})) {
          variables.setProfileOverride(name, value);
        }
      }
    }

    if (this.options.overrides) {
      variables.setMany('override', this.options.overrides);
    }
  }

  private finish(
    testCase: TestCase,
    status: TestCaseStatus,
    startTime: number,
    stepResults: StepResult[],
    variables: VariableManager,
    errorInfo?: ErrorInfo,
  ): TestCaseResult {
    const endTime = Date.now();
    const result: TestCaseResult = {
      name: testCase.name,
      status,
      startTime,
      endTime,
      duration: (endTime - startTime) / 1000,
      totalSteps: testCase.steps.length,
      passedSteps: stepResults.filter((r) => r.status === 'success').length,
      failedSteps: stepResults.filter((r) => r.status === 'failure' || r.status === 'error').length,
      skippedSteps: stepResults.filter((r) => r.status === 'skipped').length,
      stepResults,
      finalVariables: { ...variables.allVariables() },
      ...(errorInfo ? { errorInfo } : {}),
    };
    this.emit({ type: 'test_complete', testName: testCase.name, result, timestamp: endTime });
    this.logger.info(`Test case "${testCase.name}" ${status}`, {
      passed: result.passedSteps,
      failed: result.failedSteps,
      skipped: result.skippedSteps,
    });
    return result;
  }

  private emit(event: EngineEvent): void {
    this.options.bus?.emit('events', event);
  }
}

/**
 * Convenience wrapper around {@link TestCaseExecutor}.
 */
export async function executeTestCase(testCase: TestCase, options: TestCaseExecutorOptions): Promise<TestCaseResult> {
  return new TestCaseExecutor(options).execute(testCase);
}
