/**
 * @module case-loader
 * Test case loader.
 *
 * Loads YAML test case files, validates them with Zod schemas and maps the
 * snake_case YAML keys onto the camelCase step definitions the engine runs.
 * A `.env` file next to the case file is loaded first.
 */

import { z } from 'zod';
import yaml from 'js-yaml';
import fs from 'node:fs/promises';
import path from 'node:path';
import dotenv from 'dotenv';
import { CaseLoadError } from './errors.js';
import { isRecord } from './helpers.js';
import type {
  Condition,
  Extractor,
  GlobalConfig,
  HookConfig,
  PollConfig,
  ProfileConfig,
  RetryPolicy,
  StepDefinition,
  TestCase,
  ValidationRule,
  ValidationType,
} from './types.js';

// =====================================================================
// Zod Sub-Schemas
// =====================================================================

/** Condition: expression string, boolean, `{and|or|not}` mapping or list */
export const ConditionSchema: z.ZodType<Condition, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.union([
    z.string(),
    z.boolean(),
    z.number(),
    z.null(),
    z.array(ConditionSchema),
    z.record(z.unknown()),
  ]),
).describe('Condition expression, structured condition or list (implicit AND)');

/** Step/case hook schema */
export const HookSchema = z.object({
  variables: z.record(z.unknown()).optional().describe('Values rendered into the extracted scope'),
  sleep: z.number().min(0).optional().describe('Pause in milliseconds'),
}).describe('Setup/teardown hook');

/** Retry policy schema */
export const RetryPolicySchema = z.object({
  max_attempts: z.number().int().min(1).optional().describe('Total attempts including the first one'),
  strategy: z.enum(['fixed', 'linear', 'exponential']).optional().describe('Backoff strategy'),
  base_delay: z.number().min(0).optional().describe('Base delay in seconds'),
  max_delay: z.number().min(0).optional().describe('Cap on any single delay, in seconds'),
  backoff_multiplier: z.number().positive().optional().describe('Multiplier for exponential backoff'),
  jitter: z.boolean().optional().describe('Perturb delays by up to ±10%'),
  retry_on: z.array(z.string()).optional().describe('Error type names that may be retried'),
  stop_on: z.array(z.string()).optional().describe('Error type names that are never retried'),
}).describe('Step retry policy');

/** Extractor schema; regex extractors also accept `pattern` and `group` */
export const ExtractorSchema = z.object({
  name: z.string().min(1).describe('Variable to write'),
  type: z.enum(['jsonpath', 'regex', 'header', 'cookie']).default('jsonpath'),
  path: z.string().optional().describe('JSONPath, regex, header name or cookie name'),
  pattern: z.string().optional().describe('Alias of path for regex extractors'),
  index: z.number().int().optional().describe('Match index, or regex group'),
  group: z.number().int().optional().describe('Alias of index for regex extractors'),
  extract_all: z.boolean().optional().describe('Return every match as a list'),
  default: z.unknown().optional().describe('Value used when nothing is found'),
  condition: ConditionSchema.optional().describe('Only extract when this holds'),
}).refine((e) => e.path !== undefined || e.pattern !== undefined, {
  message: 'path is required',
  path: ['path'],
}).describe('Response variable extractor');

const VALIDATION_TYPES = [
  'eq', 'ne', 'gt', 'ge', 'lt', 'le',
  'contains', 'not_contains', 'in', 'not_in',
  'regex', 'type', 'exists',
  'length_eq', 'length_gt', 'length_lt',
  'starts_with', 'ends_with', 'is_empty', 'is_null',
] as const satisfies readonly ValidationType[];

const VALIDATION_RULE_TYPES = [...VALIDATION_TYPES, 'and', 'or', 'not'] as const;

interface RawValidationRule {
  type: ValidationType | 'and' | 'or' | 'not';
  path: string;
  expect?: unknown;
  description?: string;
  error_message?: string;
  sub_validations?: RawValidationRule[];
}

/** Validation rule schema; `and`/`or`/`not` combine `sub_validations` */
export const ValidationRuleSchema: z.ZodType<RawValidationRule, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.object({
    type: z.enum(VALIDATION_RULE_TYPES).default('eq'),
    path: z.string().default('$'),
    expect: z.unknown().optional(),
    description: z.string().optional(),
    error_message: z.string().optional(),
    sub_validations: z.array(ValidationRuleSchema).optional(),
  }),
).describe('Response validation rule');

/** Poll configuration schema */
export const PollConfigSchema = z.object({
  condition: z.object({
    type: z.enum(['jsonpath', 'status_code']).default('jsonpath'),
    path: z.string().optional(),
    operator: z.enum(['eq', 'ne', 'gt', 'lt', 'ge', 'le', 'contains', 'exists']).default('eq'),
    expect: z.unknown().optional(),
  }).describe('Condition that ends polling'),
  max_attempts: z.number().int().min(1).optional().describe('Default 30'),
  interval: z.number().min(0).optional().describe('Milliseconds between attempts, default 2000'),
  timeout: z.number().min(0).optional().describe('Overall budget in milliseconds, default 60000'),
  backoff: z.enum(['fixed', 'linear', 'exponential']).optional().describe('Delay growth, default fixed'),
}).describe('Polling configuration');

const StepBaseSchema = z.object({
  name: z.string().min(1).describe('Step name, unique within the case'),
  skip_if: ConditionSchema.optional(),
  only_if: ConditionSchema.optional(),
  condition: ConditionSchema.optional(),
  depends_on: z.array(z.string()).optional().describe('Steps that must have succeeded'),
  timeout: z.number().positive().optional().describe('Seconds'),
  retry_times: z.number().int().min(0).optional().describe('Legacy retry count'),
  retry_policy: RetryPolicySchema.optional(),
  extractors: z.array(ExtractorSchema).optional(),
  validations: z.array(ValidationRuleSchema).optional(),
  setup: HookSchema.optional(),
  teardown: HookSchema.optional(),
});

const RequestFieldsSchema = {
  method: z.string().optional().describe('HTTP method, default GET'),
  url: z.string().describe('Absolute URL, or a path joined to base_url'),
  params: z.record(z.unknown()).optional().describe('Query parameters'),
  headers: z.record(z.coerce.string()).optional().describe('Request headers'),
  body: z.unknown().optional().describe('Request body (objects are sent as JSON)'),
};

/** Step schema, discriminated on `type` */
export const StepSchema = z.discriminatedUnion('type', [
  StepBaseSchema.extend({ type: z.literal('request'), ...RequestFieldsSchema }),
  StepBaseSchema.extend({
    type: z.literal('database'),
    database: z.record(z.unknown()).optional().describe('Connection settings, e.g. {type: sqlite, path}'),
    operation: z.enum(['query', 'exec']).optional(),
    sql: z.string(),
    params: z.union([z.array(z.unknown()), z.record(z.unknown())]).optional(),
  }),
  StepBaseSchema.extend({
    type: z.literal('script'),
    script: z.string().optional(),
    script_file: z.string().optional(),
    script_type: z.string().optional(),
    args: z.record(z.unknown()).optional(),
  }),
  StepBaseSchema.extend({
    type: z.literal('wait'),
    seconds: z.union([z.number(), z.string()]).optional().describe('Fixed wait, may be a template'),
    wait_condition: ConditionSchema.optional().describe('Alias of condition'),
    interval: z.number().positive().optional().describe('Seconds between checks'),
    max_wait: z.number().min(0).optional().describe('Seconds'),
  }),
  StepBaseSchema.extend({
    type: z.literal('loop'),
    loop_type: z.enum(['for', 'while']).default('for'),
    loop_count: z.union([z.number().int().min(0), z.string()]).optional(),
    loop_condition: ConditionSchema.optional(),
    loop_variable: z.string().optional(),
    loop_steps: z.array(z.unknown()).min(1),
  }),
  StepBaseSchema.extend({
    type: z.literal('concurrent'),
    max_concurrency: z.number().int().min(1).optional(),
    concurrent_steps: z.array(z.unknown()).min(1),
  }),
  StepBaseSchema.extend({
    type: z.literal('poll'),
    ...RequestFieldsSchema,
    poll_config: PollConfigSchema,
    on_timeout: z.object({
      behavior: z.enum(['fail', 'continue']).default('fail'),
      message: z.string().optional(),
    }).optional(),
  }),
]);

type RawStep = z.infer<typeof StepSchema>;

/** Profile schema */
export const ProfileConfigSchema = z.object({
  base_url: z.string().optional().describe('Base URL for relative request URLs'),
  variables: z.record(z.unknown()).default({}),
  timeout: z.number().positive().optional().describe('Seconds'),
  verify_ssl: z.boolean().default(true),
  overrides: z.record(z.unknown()).default({}).describe('Written to the override scope'),
  priority: z.number().default(0),
}).describe('Named environment profile');

/** Global config schema; `profiles` may nest versions (`v1: {dev: {...}}`) */
export const GlobalConfigSchema = z.object({
  name: z.string().default('Test Suite'),
  description: z.string().optional(),
  profiles: z.record(z.unknown()).default({}),
  active_profile: z.string().optional(),
  variables: z.record(z.unknown()).default({}),
  timeout: z.number().positive().default(30).describe('Default step timeout in seconds'),
  retry_times: z.number().int().min(0).default(0),
  env_vars: z.object({
    prefix: z.string().optional(),
    load_from_os: z.boolean().optional(),
    overrides: z.record(z.unknown()).optional(),
  }).optional(),
  debug: z.boolean().optional(),
  csv_datasource: z.string().optional().describe('CSV file of parameter sets, relative to the case file'),
}).describe('Test case configuration');

/** Inline data-driven parameter sets */
export const DataDrivenSchema = z.object({
  name: z.string().optional().describe('Dataset name shown in results'),
  parameters: z.array(z.record(z.unknown())).default([]).describe('One variable mapping per run'),
}).describe('Data-driven parameters');

/** Complete test case schema */
export const TestCaseSchema = z.object({
  name: z.string().min(1).describe('Test case name'),
  description: z.string().optional(),
  config: GlobalConfigSchema.optional(),
  steps: z.array(z.unknown()).describe('Steps in execution order'),
  setup: HookSchema.optional(),
  teardown: HookSchema.optional(),
  tags: z.array(z.string()).default([]),
  enabled: z.boolean().default(true),
  ddts: DataDrivenSchema.optional(),
}).describe('API test case');

// =====================================================================
// Mapping
// =====================================================================

type IssuePath = Array<string | number>;

interface Issue {
  path: IssuePath;
  message: string;
}

function collectIssues(error: z.ZodError, prefix: IssuePath, issues: Issue[]): void {
  for (const issue of error.issues) {
    issues.push({ path: [...prefix, ...issue.path], message: issue.message });
  }
}

/**
 * Accept the shorthand `- Step name: {type: ..., ...}` form and default the
 * step type to `request`.
 */
function normalizeStepInput(raw: unknown): unknown {
  if (!isRecord(raw)) return raw;
  let details: Record<string, unknown> = raw;
  const keys = Object.keys(raw);
  const onlyKey = keys.length === 1 ? keys[0] : undefined;
  if (onlyKey !== undefined && isRecord(raw[onlyKey]) && onlyKey !== 'name') {
    details = { name: onlyKey, ...raw[onlyKey] };
  }
  return details.type === undefined ? { ...details, type: 'request' } : details;
}

function toRetryPolicy(raw: z.infer<typeof RetryPolicySchema> | undefined): Partial<RetryPolicy> | undefined {
  if (!raw) return undefined;
  const policy: Partial<RetryPolicy> = {};
  if (raw.max_attempts !== undefined) policy.maxAttempts = raw.max_attempts;
  if (raw.strategy !== undefined) policy.strategy = raw.strategy;
  if (raw.base_delay !== undefined) policy.baseDelay = raw.base_delay;
  if (raw.max_delay !== undefined) policy.maxDelay = raw.max_delay;
  if (raw.backoff_multiplier !== undefined) policy.backoffMultiplier = raw.backoff_multiplier;
  if (raw.jitter !== undefined) policy.jitter = raw.jitter;
  if (raw.retry_on !== undefined) policy.retryOn = raw.retry_on;
  if (raw.stop_on !== undefined) policy.stopOn = raw.stop_on;
  return policy;
}

function toExtractor(raw: z.infer<typeof ExtractorSchema>): Extractor {
  const regex = raw.type === 'regex';
  return {
    name: raw.name,
    type: raw.type,
    path: (regex ? raw.pattern ?? raw.path : raw.path ?? raw.pattern) ?? '',
    index: regex ? raw.group ?? raw.index : raw.index,
    extractAll: raw.extract_all,
    default: raw.default,
    condition: raw.condition,
  };
}

function toValidationRule(raw: RawValidationRule): ValidationRule {
  const common = { description: raw.description, errorMessage: raw.error_message };
  if (raw.type === 'and' || raw.type === 'or' || raw.type === 'not') {
    return {
      ...common,
      type: 'eq',
      path: '',
      logicalOperator: raw.type,
      subValidations: (raw.sub_validations ?? []).map(toValidationRule),
    };
  }
  return { ...common, type: raw.type, path: raw.path, expect: raw.expect };
}

function toHook(raw: z.infer<typeof HookSchema> | undefined): HookConfig | undefined {
  return raw ? { variables: raw.variables, sleep: raw.sleep } : undefined;
}

function toPollConfig(raw: z.infer<typeof PollConfigSchema>): PollConfig {
  return {
    condition: raw.condition,
    maxAttempts: raw.max_attempts,
    interval: raw.interval,
    timeout: raw.timeout,
    backoff: raw.backoff,
  };
}

function parseSteps(items: unknown[], prefix: IssuePath, issues: Issue[]): StepDefinition[] {
  const steps: StepDefinition[] = [];
  items.forEach((item, index) => {
    const step = parseStep(item, [...prefix, index], issues);
    if (step) steps.push(step);
  });
  return steps;
}

function parseStep(input: unknown, prefix: IssuePath, issues: Issue[]): StepDefinition | undefined {
  const parsed = StepSchema.safeParse(normalizeStepInput(input));
  if (!parsed.success) {
    collectIssues(parsed.error, prefix, issues);
    return undefined;
  }
  return toStep(parsed.data, prefix, issues);
}

function toStep(raw: RawStep, prefix: IssuePath, issues: Issue[]): StepDefinition {
  const base = {
    name: raw.name,
    skipIf: raw.skip_if,
    onlyIf: raw.only_if,
    condition: raw.condition,
    dependsOn: raw.depends_on,
    timeout: raw.timeout,
    retryTimes: raw.retry_times,
    retryPolicy: toRetryPolicy(raw.retry_policy),
    extractors: raw.extractors?.map(toExtractor),
    validations: raw.validations?.map(toValidationRule),
    setup: toHook(raw.setup),
    teardown: toHook(raw.teardown),
  };

  switch (raw.type) {
    case 'request':
      return { ...base, type: 'request', method: raw.method, url: raw.url, params: raw.params, headers: raw.headers, body: raw.body };
    case 'database':
      return { ...base, type: 'database', database: raw.database, operation: raw.operation, sql: raw.sql, params: raw.params };
    case 'script':
      return { ...base, type: 'script', script: raw.script, scriptFile: raw.script_file, scriptType: raw.script_type, args: raw.args };
    case 'wait':
      return {
        ...base,
        type: 'wait',
        condition: raw.condition ?? raw.wait_condition,
        seconds: raw.seconds,
        interval: raw.interval,
        maxWait: raw.max_wait,
      };
    case 'loop':
      return {
        ...base,
        type: 'loop',
        loopType: raw.loop_type,
        loopCount: raw.loop_count,
        loopCondition: raw.loop_condition,
        loopVariable: raw.loop_variable,
        loopSteps: parseSteps(raw.loop_steps, [...prefix, 'loop_steps'], issues),
      };
    case 'concurrent':
      return {
        ...base,
        type: 'concurrent',
        maxConcurrency: raw.max_concurrency,
        concurrentSteps: parseSteps(raw.concurrent_steps, [...prefix, 'concurrent_steps'], issues),
      };
    case 'poll':
      return {
        ...base,
        type: 'poll',
        method: raw.method,
        url: raw.url,
        params: raw.params,
        headers: raw.headers,
        body: raw.body,
        pollConfig: toPollConfig(raw.poll_config),
        onTimeout: raw.on_timeout,
      };
  }
}

const PROFILE_FIELDS = ['base_url', 'timeout', 'variables'];

/**
 * Flatten versioned profiles: `{v1: {dev: {...}}}` → `{'v1.dev': {...}}`.
 * A mapping holding any of `base_url`, `timeout` or `variables` is a profile.
 */
export function flattenProfiles(profiles: Record<string, unknown>, prefix = ''): Record<string, unknown> {
  const flat: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(profiles)) {
    const fullKey = prefix ? `${prefix}.${key}` : key;
    if (isRecord(value) && !PROFILE_FIELDS.some((field) => field in value)) {
      Object.assign(flat, flattenProfiles(value, fullKey));
    } else {
      flat[fullKey] = value;
    }
  }
  return flat;
}

function toConfig(raw: z.infer<typeof GlobalConfigSchema>, issues: Issue[]): GlobalConfig {
  const profiles: Record<string, ProfileConfig> = {};
  for (const [name, value] of Object.entries(flattenProfiles(raw.profiles))) {
    const parsed = ProfileConfigSchema.safeParse(value);
    if (!parsed.success) {
      collectIssues(parsed.error, ['config', 'profiles', name], issues);
      continue;
    }
    profiles[name] = {
      baseUrl: parsed.data.base_url,
      variables: parsed.data.variables,
      timeout: parsed.data.timeout,
      verifySsl: parsed.data.verify_ssl,
      overrides: parsed.data.overrides,
      priority: parsed.data.priority,
    };
  }

  return {
    name: raw.name,
    description: raw.description,
    profiles,
    activeProfile: raw.active_profile,
    variables: raw.variables,
    timeout: raw.timeout,
    retryTimes: raw.retry_times,
    envVars: raw.env_vars
      ? { prefix: raw.env_vars.prefix, loadFromOs: raw.env_vars.load_from_os, overrides: raw.env_vars.overrides }
      : undefined,
    debug: raw.debug,
    csvDatasource: raw.csv_datasource,
  };
}

// =====================================================================
// Case Loader
// =====================================================================

/**
 * Validate an already-parsed test case object.
 *
 * @throws {CaseLoadError} `YAML_VALIDATION_ERROR` listing every issue
 */
export function parseTestCase(raw: unknown, source = 'test case'): TestCase {
  const parsed = TestCaseSchema.safeParse(raw);
  const issues: Issue[] = [];
  if (!parsed.success) {
    collectIssues(parsed.error, [], issues);
    throw validationError(source, issues);
  }

  const data = parsed.data;
  const config = data.config ? toConfig(data.config, issues) : undefined;
  const steps = parseSteps(data.steps, ['steps'], issues);
  if (issues.length > 0) {
    throw validationError(source, issues);
  }

  return {
    name: data.name,
    description: data.description,
    config,
    steps,
    setup: toHook(data.setup),
    teardown: toHook(data.teardown),
    tags: data.tags,
    enabled: data.enabled,
    ddts: data.ddts,
  };
}

function validationError(source: string, issues: Issue[]): CaseLoadError {
  const lines = issues.map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`).join('\n');
  return new CaseLoadError('YAML_VALIDATION_ERROR', `Validation failed for ${source}:\n${lines}`, lines);
}

/**
 * Parse YAML text into a validated test case.
 *
 * @throws {CaseLoadError} On YAML syntax errors or validation failures
 */
export function parseTestCaseYaml(content: string, source = 'test case'): TestCase {
  let parsed: unknown;
  try {
    parsed = yaml.load(content);
  } catch (err) {
    throw new CaseLoadError(
      'YAML_PARSE_ERROR',
      `YAML syntax error in ${source}: ${err instanceof Error ? err.message : String(err)}`,
    );
  }

  if (parsed === null || parsed === undefined || typeof parsed !== 'object') {
    throw new CaseLoadError('YAML_PARSE_ERROR', `Test case is empty or not a mapping: ${source}`);
  }
  return parseTestCase(parsed, source);
}

/**
 * Load and validate a test case file.
 *
 * Steps:
 * 1. Load `.env` from the file's directory (existing variables win)
 * 2. Read the YAML file
 * 3. Parse YAML content
 * 4. Validate with Zod schemas and map to step definitions
 * 5. Resolve `csv_datasource` against the case file's directory
 *
 * @throws {CaseLoadError} `FILE_NOT_FOUND`, `YAML_PARSE_ERROR` or `YAML_VALIDATION_ERROR`
 */
export async function loadTestCase(filePath: string): Promise<TestCase> {
  const resolvedPath = path.resolve(filePath);
  dotenv.config({ path: path.resolve(path.dirname(resolvedPath), '.env') });

  let content: string;
  try {
    content = await fs.readFile(resolvedPath, 'utf-8');
  } catch (err) {
    if (isRecord(err) && err.code === 'ENOENT') {
      throw new CaseLoadError('FILE_NOT_FOUND', `Test case file not found: ${resolvedPath}`);
    }
    throw err;
  }

  const testCase = parseTestCaseYaml(content, resolvedPath);
  const csv = testCase.config?.csvDatasource;
  if (testCase.config && csv !== undefined && csv.trim() !== '') {
    testCase.config.csvDatasource = path.resolve(path.dirname(resolvedPath), csv);
  }
  return testCase;
}
