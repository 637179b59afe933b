/**
 * @module errors
 * Error classes, category registry and ErrorInfo construction.
 *
 * Every error that ends a step is turned into an {@link ErrorInfo} with a
 * category inferred from its type name and message, plus a fixed suggestion
 * for that category.
 */

import type { ErrorCategory, ErrorInfo, ErrorSeverity, Variables } from './types.js';

// =====================================================================
// Error Codes
// =====================================================================

export type StepflowErrorCode =
  | 'FILE_NOT_FOUND'
  | 'YAML_PARSE_ERROR'
  | 'YAML_VALIDATION_ERROR'
  | 'CSV_FILE_NOT_FOUND'
  | 'CSV_PARSE_ERROR'
  | 'VARIABLE_RENDER_ERROR'
  | 'CONDITION_ERROR'
  | 'INVALID_STEP'
  | 'LEAF_NOT_FOUND'
  | 'LEAF_FAILED'
  | 'HOOK_FAILED'
  | 'ASSERTION_FAILED'
  | 'EXTRACT_FAILED'
  | 'POLL_TIMEOUT'
  | 'SUB_STEPS_FAILED'
  | 'POOL_SHUTDOWN';

// =====================================================================
// Category Metadata Registry
// =====================================================================

interface CategoryMetadataEntry {
  severity: ErrorSeverity;
  suggestion: string;
}

/** Default severity and fix suggestion for every category. */
export const CATEGORY_METADATA: ReadonlyMap<ErrorCategory, CategoryMetadataEntry> = new Map<ErrorCategory, CategoryMetadataEntry>([
  ['network', {
    severity: 'high',
    suggestion: 'Check that the target service is running and reachable, and verify the URL, port and proxy settings.',
  }],
  ['timeout', {
    severity: 'medium',
    suggestion: 'Increase the step timeout or check whether the service is responding slowly.',
  }],
  ['parsing', {
    severity: 'medium',
    suggestion: 'Check the response format and the extractor or template expression syntax.',
  }],
  ['assertion', {
    severity: 'medium',
    suggestion: 'Compare the expected values with the actual response and update the validations if the API changed.',
  }],
  ['business', {
    severity: 'medium',
    suggestion: 'Inspect the sub-step results and the business rules the service applies.',
  }],
  ['system', {
    severity: 'high',
    suggestion: 'Check the step configuration and the engine logs for details.',
  }],
]);

const DNS_SUGGESTION = 'DNS resolution failed: check the host name spelling and the DNS configuration.';
const READ_TIMEOUT_SUGGESTION = 'The server accepted the connection but did not answer in time: increase the timeout or check server load.';
const JSON_SUGGESTION = 'The response is not valid JSON: check the Content-Type and the response body.';

// =====================================================================
// Error Classes
// =====================================================================

/**
 * Base error for everything raised by the engine itself.
 */
export class StepflowError extends Error {
  readonly code: StepflowErrorCode;
  readonly detail?: string;

  constructor(code: StepflowErrorCode, message: string, detail?: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'StepflowError';
    this.code = code;
    this.detail = detail;
  }

  toJSON(): { code: StepflowErrorCode; message: string; detail?: string } {
    return { code: this.code, message: this.message, detail: this.detail };
  }
}

export interface LeafErrorOptions {
  /** Response received before the failure, kept on the step result */
  partialResponse?: unknown;
  /** Explicit category; inferred from type and message otherwise */
  category?: ErrorCategory;
  cause?: unknown;
}

/**
 * Failure raised by a leaf operation or an executor body.
 */
export class LeafError extends StepflowError {
  readonly partialResponse?: unknown;
  readonly category?: ErrorCategory;

  constructor(message: string, options: LeafErrorOptions = {}, code: StepflowErrorCode = 'LEAF_FAILED') {
    super(code, message, undefined, options.cause);
    this.name = 'LeafError';
    this.partialResponse = options.partialResponse;
    this.category = options.category;
  }
}

/** One or more validations did not hold. */
export class ValidationError extends LeafError {
  constructor(message: string, partialResponse?: unknown) {
    super(message, { partialResponse, category: 'assertion' }, 'ASSERTION_FAILED');
    this.name = 'ValidationError';
  }
}

/** Poll exhausted its attempts or time budget with `behavior: fail`. */
export class PollTimeoutError extends LeafError {
  constructor(message: string, partialResponse?: unknown) {
    super(message, { partialResponse, category: 'timeout' }, 'POLL_TIMEOUT');
    this.name = 'PollTimeoutError';
  }
}

/** Sub-steps of a loop or concurrent group failed. */
export class BusinessError extends LeafError {
  constructor(message: string, partialResponse?: unknown) {
    super(message, { partialResponse, category: 'business' }, 'SUB_STEPS_FAILED');
    this.name = 'BusinessError';
  }
}

/** A template referenced an undefined name or used a bad expression. */
export class RenderError extends StepflowError {
  constructor(message: string, detail?: string) {
    super('VARIABLE_RENDER_ERROR', message, detail);
    this.name = 'RenderError';
  }
}

/** A condition had a shape the evaluator does not accept. */
export class ConditionError extends StepflowError {
  constructor(message: string) {
    super('CONDITION_ERROR', message);
    this.name = 'ConditionError';
  }
}

/** An extractor found nothing and had no default. */
export class ExtractionError extends StepflowError {
  constructor(message: string) {
    super('EXTRACT_FAILED', message);
    this.name = 'ExtractionError';
  }
}

/** A setup hook failed; aborts the step with status `error`. */
export class HookError extends StepflowError {
  readonly phase: 'setup' | 'teardown';

  constructor(phase: 'setup' | 'teardown', message: string) {
    super('HOOK_FAILED', message);
    this.name = 'HookError';
    this.phase = phase;
  }
}

/** A test case file or its CSV dataset could not be read, parsed or validated. */
export class CaseLoadError extends StepflowError {
  constructor(
    code: 'FILE_NOT_FOUND' | 'YAML_PARSE_ERROR' | 'YAML_VALIDATION_ERROR' | 'CSV_FILE_NOT_FOUND' | 'CSV_PARSE_ERROR',
    message: string,
    detail?: string,
  ) {
    super(code, message, detail);
    this.name = 'CaseLoadError';
  }
}

// =====================================================================
// Classification
// =====================================================================

/**
 * Type names of an error, most specific first (e.g. `ValidationError`,
 * `LeafError`, `StepflowError`, `Error`).
 */
export function errorTypeNames(err: unknown): string[] {
  if (!(err instanceof Error)) {
    return [typeof err];
  }
  const names = [err.name];
  let proto: unknown = Object.getPrototypeOf(err);
  while (proto !== null && typeof proto === 'object') {
    const ctor: unknown = Object.getOwnPropertyDescriptor(proto, 'constructor')?.value;
    if (typeof ctor === 'function' && ctor.name && !names.includes(ctor.name)) {
      names.push(ctor.name);
    }
    proto = Object.getPrototypeOf(proto);
    if (proto === Object.prototype) break;
  }
  return names;
}

/** Most specific type name of an error */
export function errorTypeName(err: unknown): string {
  return errorTypeNames(err)[0] ?? 'Error';
}

/**
 * Infer the category of an error from its type name and message.
 *
 * Precedence: explicit category → assertion → timeout → network → parsing →
 * business → system.
 */
export function categorizeError(err: unknown): ErrorCategory {
  if (err instanceof LeafError && err.category) {
    return err.category;
  }

  const names = errorTypeNames(err);
  const message = (err instanceof Error ? err.message : String(err)).toLowerCase();

  if (names.some((n) => n.includes('Assertion')) || message.includes('validation')) {
    return 'assertion';
  }
  if (names.some((n) => n.includes('Timeout')) || message.includes('timeout') || message.includes('timed out')) {
    return 'timeout';
  }
  if (
    message.includes('connection') ||
    message.includes('network') ||
    message.includes('econnrefused') ||
    message.includes('econnreset') ||
    message.includes('enotfound') ||
    message.includes('fetch failed')
  ) {
    return 'network';
  }
  if (names.includes('SyntaxError') || message.includes('parse')) {
    return 'parsing';
  }
  if (names.includes('BusinessError')) {
    return 'business';
  }
  return 'system';
}

/** Suggestion text for an error, with a few message-specific refinements. */
export function suggestionFor(category: ErrorCategory, message: string): string {
  const lower = message.toLowerCase();
  if (category === 'network' && (lower.includes('enotfound') || lower.includes('getaddrinfo') || lower.includes('dns'))) {
    return DNS_SUGGESTION;
  }
  if (category === 'timeout' && lower.includes('read')) {
    return READ_TIMEOUT_SUGGESTION;
  }
  if (category === 'parsing' && lower.includes('json')) {
    return JSON_SUGGESTION;
  }
  return CATEGORY_METADATA.get(category)?.suggestion ?? '';
}

/**
 * Build an {@link ErrorInfo} from any thrown value.
 *
 * @param err - The thrown value
 * @param context - Extra data such as step name and attempt number
 */
export function buildErrorInfo(err: unknown, context: Variables = {}): ErrorInfo {
  const category = categorizeError(err);
  const message = err instanceof Error ? err.message : String(err);
  return {
    type: errorTypeName(err),
    category,
    message,
    suggestion: suggestionFor(category, message),
    code: err instanceof StepflowError ? err.code : 'UNHANDLED',
    severity: CATEGORY_METADATA.get(category)?.severity ?? 'medium',
    stack: err instanceof Error ? err.stack : undefined,
    context,
    timestamp: Date.now(),
  };
}

/** Response a failed operation left behind, if any. */
export function partialResponseOf(err: unknown): unknown {
  return err instanceof LeafError ? err.partialResponse : undefined;
}
