/**
 * @module validation
 * Validation rules evaluated against a step response.
 *
 * Each rule reads a value by JSONPath (`$.code`, `$.body.items[0]`,
 * `$.statusCode`) and applies one comparator. Rules with a
 * `logicalOperator` combine their `subValidations` instead.
 */

import { ValidationError } from './errors.js';
import { deepEqual, isRecord } from './helpers.js';
import { jsonPathSource } from './extractors.js';
import { getValueByPath } from './json-path.js';
import type { ValidationResult, ValidationRule, ValidationType } from './types.js';

// =====================================================================
// Comparators
// =====================================================================

type Comparator = (actual: unknown, expected: unknown) => boolean;

function lengthOf(value: unknown): number | undefined {
  if (typeof value === 'string' || Array.isArray(value)) return value.length;
  if (isRecord(value)) return Object.keys(value).length;
  return undefined;
}

function typeOf(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  if (typeof value === 'number') return Number.isInteger(value) ? 'integer' : 'number';
  if (isRecord(value)) return 'object';
  return typeof value;
}

const TYPE_ALIASES: Record<string, string[]> = {
  str: ['string'],
  string: ['string'],
  int: ['integer'],
  integer: ['integer'],
  float: ['number', 'integer'],
  number: ['number', 'integer'],
  bool: ['boolean'],
  boolean: ['boolean'],
  list: ['array'],
  array: ['array'],
  dict: ['object'],
  object: ['object'],
  null: ['null'],
  none: ['null'],
};

function equals(a: unknown, b: unknown): boolean {
  if (typeof a === 'number' && typeof b === 'string' && b.trim() !== '') return a === Number(b);
  if (typeof a === 'string' && typeof b === 'number') return Number(a) === b;
  return deepEqual(a, b);
}

function numeric(fn: (a: number, b: number) => boolean): Comparator {
  return (actual, expected) => {
    const a = typeof actual === 'string' ? Number(actual) : actual;
    const b = typeof expected === 'string' ? Number(expected) : expected;
    return typeof a === 'number' && typeof b === 'number' && !Number.isNaN(a) && !Number.isNaN(b) && fn(a, b);
  };
}

function contains(actual: unknown, expected: unknown): boolean {
  if (typeof actual === 'string') return actual.includes(String(expected));
  if (Array.isArray(actual)) return actual.some((item) => equals(item, expected));
  if (isRecord(actual)) return typeof expected === 'string' && Object.prototype.hasOwnProperty.call(actual, expected);
  return false;
}

function lengthIs(fn: (len: number, n: number) => boolean): Comparator {
  return (actual, expected) => {
    const len = lengthOf(actual);
    return len !== undefined && typeof expected === 'number' && fn(len, expected);
  };
}

export const COMPARATORS: Readonly<Record<ValidationType, Comparator>> = {
  eq: equals,
  ne: (a, e) => !equals(a, e),
  gt: numeric((a, b) => a > b),
  ge: numeric((a, b) => a >= b),
  lt: numeric((a, b) => a < b),
  le: numeric((a, b) => a <= b),
  contains,
  not_contains: (a, e) => !contains(a, e),
  in: (a, e) => Array.isArray(e) ? e.some((item) => equals(a, item)) : typeof e === 'string' && e.includes(String(a)),
  not_in: (a, e) => Array.isArray(e) ? !e.some((item) => equals(a, item)) : typeof e === 'string' && !e.includes(String(a)),
  regex: (a, e) => typeof a === 'string' && typeof e === 'string' && new RegExp(e).test(a),
  type: (a, e) => typeof e === 'string' && (TYPE_ALIASES[e.toLowerCase()] ?? [e.toLowerCase()]).includes(typeOf(a)),
  exists: (a, e) => (a !== undefined && a !== null) === (e === undefined ? true : Boolean(e)),
  length_eq: lengthIs((len, n) => len === n),
  length_gt: lengthIs((len, n) => len > n),
  length_lt: lengthIs((len, n) => len < n),
  starts_with: (a, e) => typeof a === 'string' && typeof e === 'string' && a.startsWith(e),
  ends_with: (a, e) => typeof a === 'string' && typeof e === 'string' && a.endsWith(e),
  is_empty: (a, e) => (a === null || a === undefined || lengthOf(a) === 0) === (e === undefined ? true : Boolean(e)),
  is_null: (a, e) => (a === null || a === undefined) === (e === undefined ? true : Boolean(e)),
};

// =====================================================================
// Public API
// =====================================================================

/**
 * Read the value a rule points at.
 */
export function resolveActual(response: unknown, path: string): unknown {
  const normalized = path.startsWith('$') ? path : `$.${path}`;
  return getValueByPath(jsonPathSource(normalized, response), normalized);
}

/**
 * Evaluate one rule (recursing into sub-validations).
 */
export function evaluateRule(rule: ValidationRule, response: unknown): ValidationResult {
  const description = rule.description ?? `${rule.path} ${rule.type}`;

  if (rule.logicalOperator && rule.subValidations) {
    const subs = rule.subValidations.map((sub) => evaluateRule(sub, response));
    let passed: boolean;
    switch (rule.logicalOperator) {
      case 'and':
        passed = subs.every((s) => s.passed);
        break;
      case 'or':
        passed = subs.some((s) => s.passed);
        break;
      case 'not':
        passed = !subs.every((s) => s.passed);
        break;
    }
    const failed = subs.filter((s) => !s.passed).map((s) => s.message);
    return {
      path: rule.path,
      type: rule.logicalOperator,
      expect: rule.expect,
      actual: subs.map((s) => s.passed),
      passed,
      description,
      message: passed
        ? `${description}: ${rule.logicalOperator} of ${subs.length} validations passed`
        : rule.errorMessage ?? `${description}: ${rule.logicalOperator} of ${subs.length} validations failed${failed.length ? ` (${failed.join('; ')})` : ''}`,
    };
  }

  const actual = resolveActual(response, rule.path);
  const comparator = COMPARATORS[rule.type];
  let passed: boolean;
  try {
    passed = comparator(actual, rule.expect);
  } catch (err) {
    return {
      path: rule.path,
      type: rule.type,
      expect: rule.expect,
      actual,
      passed: false,
      description,
      message: `${description}: comparator error: ${err instanceof Error ? err.message : String(err)}`,
    };
  }

  return {
    path: rule.path,
    type: rule.type,
    expect: rule.expect,
    actual,
    passed,
    description,
    message: passed
      ? `${rule.path} ${rule.type} ${JSON.stringify(rule.expect)}`
      : rule.errorMessage ?? `Expected ${rule.path} ${rule.type} ${JSON.stringify(rule.expect)}, got ${JSON.stringify(actual)}`,
  };
}

/**
 * Evaluate every rule against a response.
 */
export function validateResponse(rules: ValidationRule[], response: unknown): ValidationResult[] {
  return rules.map((rule) => evaluateRule(rule, response));
}

/**
 * Throw a {@link ValidationError} carrying the response when any result failed.
 */
export function assertValidations(results: ValidationResult[], response: unknown): void {
  const failed = results.filter((r) => !r.passed);
  if (failed.length > 0) {
    throw new ValidationError(
      `${failed.length} of ${results.length} validations failed: ${failed.map((r) => r.message).join('; ')}`,
      response,
    );
  }
}
