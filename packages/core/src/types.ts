/**
 * @module types
 * Shared type definitions for the stepflow engine.
 *
 * Step definitions are a closed union tagged by `type`; every executor and
 * leaf operation dispatches on that tag.
 */

// =====================================================================
// Variables
// =====================================================================

/** Variable layers, lowest priority first */
export type VariableScope = 'global' | 'profile' | 'override' | 'extracted';

/** A flat name → value mapping */
export type Variables = Record<string, unknown>;

/** Where a resolved variable came from */
export type VariableSource = VariableScope | 'config' | 'default';

/** Point-in-time copy of every scope, see VariableManager.snapshot() */
export interface VariableSnapshot {
  global: Variables;
  profile: Variables;
  override: Variables;
  extracted: Variables;
  config: Variables;
  version: number;
}

/** Difference between two merged variable views */
export interface VariableDelta {
  added: Variables;
  modified: Record<string, { before: unknown; after: unknown }>;
  deleted: string[];
}

/** One recorded variable mutation (tracking mode only) */
export interface VariableChange {
  name: string;
  scope: VariableScope;
  oldValue: unknown;
  newValue: unknown;
  timestamp: number;
}

// =====================================================================
// Conditions
// =====================================================================

/**
 * Control expression: a string/boolean expression, a `{and|or|not}` mapping,
 * or a sequence (implicit AND). Mappings are shape-checked at evaluation time.
 */
export type Condition =
  | string
  | boolean
  | number
  | null
  | undefined
  | { [key: string]: unknown }
  | Condition[];

// =====================================================================
// Retry
// =====================================================================

export type BackoffStrategy = 'fixed' | 'linear' | 'exponential';

export interface RetryPolicy {
  /** Total attempts including the first one */
  maxAttempts: number;
  strategy: BackoffStrategy;
  /** Seconds */
  baseDelay: number;
  /** Seconds */
  maxDelay: number;
  backoffMultiplier: number;
  jitter: boolean;
  /** Error type names that may be retried (empty = any) */
  retryOn: string[];
  /** Error type names that are never retried */
  stopOn: string[];
}

/** One recorded attempt; appended in order, never mutated */
export interface RetryAttempt {
  attemptNumber: number;
  timestamp: number;
  success: boolean;
  errorType?: string;
  errorMessage?: string;
  /** Seconds slept before this attempt ran */
  delayBefore: number;
  /** Milliseconds */
  duration: number;
}

// =====================================================================
// Extraction & validation
// =====================================================================

export type ExtractorType = 'jsonpath' | 'regex' | 'header' | 'cookie';

export interface Extractor {
  name: string;
  type: ExtractorType;
  path: string;
  /** Match index; negative counts from the end. For regex, the group number. */
  index?: number;
  extractAll?: boolean;
  default?: unknown;
  /** Only extract when this holds; otherwise fall back to `default` */
  condition?: Condition;
}

export type ValidationType =
  | 'eq' | 'ne' | 'gt' | 'ge' | 'lt' | 'le'
  | 'contains' | 'not_contains' | 'in' | 'not_in'
  | 'regex' | 'type' | 'exists'
  | 'length_eq' | 'length_gt' | 'length_lt'
  | 'starts_with' | 'ends_with' | 'is_empty' | 'is_null';

export interface ValidationRule {
  type: ValidationType;
  path: string;
  expect?: unknown;
  description?: string;
  errorMessage?: string;
  /** Combine `subValidations` instead of checking `path` */
  logicalOperator?: 'and' | 'or' | 'not';
  subValidations?: ValidationRule[];
}

export interface ValidationResult {
  path: string;
  type: string;
  expect: unknown;
  actual: unknown;
  passed: boolean;
  description: string;
  message: string;
}

// =====================================================================
// Step definitions
// =====================================================================

export type StepType = 'request' | 'database' | 'wait' | 'loop' | 'concurrent' | 'script' | 'poll';

/** Step types executed by a registered leaf operation */
export type LeafStepType = 'request' | 'database' | 'script';

/** Pre/post step hook */
export interface HookConfig {
  /** Rendered and written to the extracted scope */
  variables?: Variables;
  /** Milliseconds to pause */
  sleep?: number;
}

interface StepBase {
  name: string;
  skipIf?: Condition;
  onlyIf?: Condition;
  dependsOn?: string[];
  /** Seconds */
  timeout?: number;
  retryTimes?: number;
  retryPolicy?: Partial<RetryPolicy>;
  extractors?: Extractor[];
  validations?: ValidationRule[];
  setup?: HookConfig;
  teardown?: HookConfig;
}

export interface RequestStep extends StepBase {
  type: 'request';
  method?: string;
  url: string;
  params?: Variables;
  headers?: Record<string, string>;
  body?: unknown;
  /** Generic gate, same as `onlyIf` */
  condition?: Condition;
}

export interface DatabaseStep extends StepBase {
  type: 'database';
  database?: Variables;
  operation?: 'query' | 'exec';
  sql: string;
  params?: unknown[] | Variables;
  condition?: Condition;
}

export interface ScriptStep extends StepBase {
  type: 'script';
  script?: string;
  scriptFile?: string;
  scriptType?: string;
  args?: Variables;
  condition?: Condition;
}

export interface WaitStep extends StepBase {
  type: 'wait';
  /** Fixed wait, may be a template */
  seconds?: number | string;
  /** Conditional wait: poll until this holds */
  condition?: Condition;
  /** Seconds between checks, default 1 */
  interval?: number;
  /** Seconds, default 60 */
  maxWait?: number;
}

export interface LoopStep extends StepBase {
  type: 'loop';
  loopType: 'for' | 'while';
  loopCount?: number | string;
  loopCondition?: Condition;
  loopVariable?: string;
  loopSteps: StepDefinition[];
  condition?: Condition;
}

export interface ConcurrentStep extends StepBase {
  type: 'concurrent';
  maxConcurrency?: number;
  concurrentSteps: StepDefinition[];
  condition?: Condition;
}

export type PollComparator = 'eq' | 'ne' | 'gt' | 'lt' | 'ge' | 'le' | 'contains' | 'exists';

export interface PollCondition {
  type: 'jsonpath' | 'status_code';
  path?: string;
  operator: PollComparator;
  expect?: unknown;
}

export interface PollConfig {
  condition: PollCondition;
  maxAttempts?: number;
  /** Milliseconds */
  interval?: number;
  /** Milliseconds */
  timeout?: number;
  backoff?: BackoffStrategy;
}

export interface OnTimeoutConfig {
  behavior: 'fail' | 'continue';
  message?: string;
}

export interface PollStep extends StepBase {
  type: 'poll';
  method?: string;
  url: string;
  params?: Variables;
  headers?: Record<string, string>;
  body?: unknown;
  pollConfig: PollConfig;
  onTimeout?: OnTimeoutConfig;
  condition?: Condition;
}

export type LeafStep = RequestStep | DatabaseStep | ScriptStep;

export type StepDefinition =
  | RequestStep
  | DatabaseStep
  | ScriptStep
  | WaitStep
  | LoopStep
  | ConcurrentStep
  | PollStep;

// =====================================================================
// Leaf operations
// =====================================================================

export interface PerformanceMetrics {
  /** Milliseconds */
  totalTime: number;
  dnsTime?: number;
  tcpTime?: number;
  serverTime?: number;
  /** Bytes */
  size?: number;
}

/** What a leaf operation (or executor body) hands back to the lifecycle */
export interface StepOutcome {
  response: unknown;
  extractedVars?: Variables;
  performance?: PerformanceMetrics;
}

// =====================================================================
// Results
// =====================================================================

export type StepStatus = 'pending' | 'success' | 'failure' | 'skipped' | 'error';

export type ErrorCategory = 'network' | 'timeout' | 'parsing' | 'assertion' | 'business' | 'system';

export type ErrorSeverity = 'critical' | 'high' | 'medium' | 'low';

export interface ErrorInfo {
  type: string;
  category: ErrorCategory;
  message: string;
  suggestion: string;
  code: string;
  severity: ErrorSeverity;
  stack?: string;
  context: Variables;
  timestamp: number;
}

export interface StepResult {
  name: string;
  type: StepType;
  status: StepStatus;
  startTime: number;
  endTime?: number;
  /** Milliseconds */
  duration?: number;
  response?: unknown;
  extractedVars: Variables;
  validationResults: ValidationResult[];
  performance?: PerformanceMetrics;
  errorInfo?: ErrorInfo;
  skipReason?: string;
  retryCount: number;
  retryHistory: RetryAttempt[];
  /** Non-fatal problems, e.g. failed extractors */
  diagnostics: string[];
  variablesSnapshot: Variables;
  variablesAfter: Variables;
  variablesDelta?: VariableDelta;
}

export type TestCaseStatus = 'passed' | 'failed' | 'skipped' | 'error';

export interface TestCaseResult {
  name: string;
  status: TestCaseStatus;
  startTime: number;
  endTime: number;
  /** Seconds */
  duration: number;
  totalSteps: number;
  passedSteps: number;
  failedSteps: number;
  skippedSteps: number;
  stepResults: StepResult[];
  finalVariables: Variables;
  errorInfo?: ErrorInfo;
}

// =====================================================================
// Test case & config
// =====================================================================

export interface ProfileConfig {
  baseUrl?: string;
  variables?: Variables;
  /** Seconds */
  timeout?: number;
  verifySsl?: boolean;
  overrides?: Variables;
  priority?: number;
}

export interface EnvVarsConfig {
  prefix?: string;
  loadFromOs?: boolean;
  overrides?: Variables;
}

export interface GlobalConfig {
  name: string;
  description?: string;
  profiles?: Record<string, ProfileConfig>;
  activeProfile?: string;
  variables?: Variables;
  /** Seconds */
  timeout?: number;
  retryTimes?: number;
  envVars?: EnvVarsConfig;
  debug?: boolean;
  /** CSV file with one parameter set per row; used when `ddts` has none */
  csvDatasource?: string;
}

/** Inline data-driven parameter sets */
export interface DataDrivenConfig {
  name?: string;
  parameters: Variables[];
}

export interface TestCase {
  name: string;
  description?: string;
  config?: GlobalConfig;
  steps: StepDefinition[];
  setup?: HookConfig;
  teardown?: HookConfig;
  tags?: string[];
  enabled?: boolean;
  ddts?: DataDrivenConfig;
}

export type DataDrivenSource = 'yaml_inline' | 'csv_file';

export interface DataDrivenRun {
  /** 0-based */
  runIndex: number;
  parameters: Variables;
  status: TestCaseStatus;
  /** Seconds */
  duration: number;
  result: TestCaseResult;
}

export interface DataDrivenResult {
  enabled: boolean;
  source: DataDrivenSource;
  datasetName: string;
  totalRuns: number;
  passedRuns: number;
  failedRuns: number;
  /** Percentage with one decimal */
  passRate: number;
  runs: DataDrivenRun[];
}

// =====================================================================
// Events
// =====================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEvent {
  type: 'log';
  level: LogLevel;
  source: string;
  message: string;
  data?: Variables;
  timestamp: number;
}

/** Lifecycle events published while a test case runs */
export type EngineEvent =
  | { type: 'test_start'; testName: string; totalSteps: number; timestamp: number }
  | {
      type: 'step_start';
      testName: string;
      stepName: string;
      stepType: StepType;
      stepIndex: number;
      totalSteps: number;
      timestamp: number;
    }
  | {
      type: 'step_complete';
      testName: string;
      stepName: string;
      stepIndex: number;
      status: StepStatus;
      result: StepResult;
      timestamp: number;
    }
  | { type: 'test_complete'; testName: string; result: TestCaseResult; timestamp: number };
