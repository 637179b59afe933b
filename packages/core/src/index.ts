// stepflow-core - step execution engine

// Types
export * from './types.js';

// Errors
export {
  StepflowError,
  LeafError,
  ValidationError,
  PollTimeoutError,
  BusinessError,
  RenderError,
  ConditionError,
  ExtractionError,
  HookError,
  CaseLoadError,
  CATEGORY_METADATA,
  categorizeError,
  suggestionFor,
  buildErrorInfo,
  errorTypeName,
  errorTypeNames,
  partialResponseOf,
} from './errors.js';
export type { StepflowErrorCode, LeafErrorOptions } from './errors.js';

// Case Loader
export {
  loadTestCase,
  parseTestCase,
  parseTestCaseYaml,
  flattenProfiles,
  TestCaseSchema,
  GlobalConfigSchema,
  ProfileConfigSchema,
  StepSchema,
  RetryPolicySchema,
  PollConfigSchema,
  ExtractorSchema,
  ValidationRuleSchema,
  ConditionSchema,
  HookSchema,
  DataDrivenSchema,
} from './case-loader.js';

// Variables & Templates
export { VariableManager, computeDelta, DEFAULT_MAX_ITERATIONS } from './variable-manager.js';
export type { VariableManagerOptions } from './variable-manager.js';
export { TemplateFunctionRegistry, BUILTIN_FUNCTIONS, formatDate } from './template-functions.js';
export type { TemplateFunction } from './template-functions.js';
export { evaluateExpression } from './template-expression.js';
export type { ExpressionScope } from './template-expression.js';

// Conditions
export {
  ConditionEvaluator,
  COMPARISON_OPERATORS,
  compareValues,
  isTruthy,
  parseLiteral,
  tokenizeConcise,
} from './condition-evaluator.js';
export type { ComparisonOperator } from './condition-evaluator.js';

// Retry
export {
  RetryManager,
  DEFAULT_RETRY_POLICY,
  JITTER_RATIO,
  computeBackoffDelay,
  resolveRetryPolicy,
} from './retry-manager.js';
export type { AttemptRecord } from './retry-manager.js';

// Extraction & Validation
export { queryJsonPath, extractJsonPath, getValueByPath, parseJsonPath, JsonPathError } from './json-path.js';
export type { ExtractOptions } from './json-path.js';
export { extractValue, runExtractor, jsonPathSource, responseBody } from './extractors.js';
export type { ExtractionOutcome } from './extractors.js';
export { COMPARATORS, evaluateRule, validateResponse, assertValidations, resolveActual } from './validation.js';

// Step Execution
export {
  StepExecutor,
  LeafStepExecutor,
  renderLeafStep,
  renderRequestFields,
  subResultsOf,
} from './step-executor.js';
export type { StepContext, RequestFields } from './step-executor.js';
export * from './executors/index.js';
export { DefaultHookRunner } from './hooks.js';
export type { HookRunner, HookContext, HookPhase } from './hooks.js';
export {
  TestCaseExecutor,
  executeTestCase,
  profilesContext,
  DEFAULT_STEP_TIMEOUT,
} from './test-case-executor.js';
export type { TestCaseExecutorOptions } from './test-case-executor.js';
export {
  DataDrivenExecutor,
  getParameterSets,
  isDataDriven,
  loadCsvDataset,
  parseCsv,
} from './data-driven.js';
export type { DataDrivenExecutorOptions, ParameterSets } from './data-driven.js';

// Worker Pool
export { WorkerPool, WorkerPoolHandle, Semaphore } from './worker-pool.js';
export type { WorkerPoolOptions } from './worker-pool.js';

// Leaves
export { LeafRegistry, createDefaultLeafRegistry } from './leaf-registry.js';
export type { LeafOperation, LeafContext } from './leaf-registry.js';
export { HttpLeaf, buildRequestUrl, parseSetCookies } from './leaves/http-leaf.js';
export type { HttpResponse, HttpLeafOptions } from './leaves/http-leaf.js';
export { SqliteLeaf, isQueryResponse } from './leaves/sqlite-leaf.js';
export type { QueryResponse, ExecResponse } from './leaves/sqlite-leaf.js';

// Events & Logging
export { EventBus, createEventBus } from './event-bus.js';
export type { BusChannels, BusChannel } from './event-bus.js';
export { createBusLogger, silentLogger } from './logger.js';
export type { Logger } from './logger.js';

// Reporter
export { ConsoleReporter, JSONReporter, createReporter, buildReport } from './reporter.js';
export type { Reporter, ConsoleReporterOptions, TestReport, CaseReport, StepReport } from './reporter.js';

// Helpers
export { sleep, deepEqual, isRecord } from './helpers.js';
