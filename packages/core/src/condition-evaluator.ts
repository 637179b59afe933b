/**
 * @module condition-evaluator
 * Evaluates `skip_if` / `only_if` / loop / wait conditions to a boolean.
 *
 * Accepted shapes:
 * - `null`, `undefined`, `''`               → true
 * - booleans and numbers                     → truthiness
 * - comparison strings `"${a} >= 3"`         → typed comparison
 * - concise strings `"${a} and not ${b}"`    → NOT, then AND, then OR
 * - `{ and: [...] }`, `{ or: [...] }`, `{ not: c }`
 * - sequences                                → implicit AND
 */

import { ConditionError } from './errors.js';
import { deepEqual, isRecord } from './helpers.js';
import type { VariableManager } from './variable-manager.js';
import type { Condition } from './types.js';

// ===== Operators =====

/** Comparison operators, checked in this order; each must be whitespace-delimited */
export const COMPARISON_OPERATORS = ['==', '!=', '>', '>=', '<', '<=', 'in', 'not_in', 'contains', 'not_contains'] as const;

export type ComparisonOperator = (typeof COMPARISON_OPERATORS)[number];

const LOGICAL_KEYWORD = /\b(and|or|not)\b/i;
const TRUE_WORDS = new Set(['true', '1', 'yes']);
const FALSE_WORDS = new Set(['false', '0', 'no', 'null', 'none']);

type LogicalOperator = 'and' | 'or' | 'not';

function asLogicalOperator(word: string): LogicalOperator | undefined {
  const lower = word.toLowerCase();
  return lower === 'and' || lower === 'or' || lower === 'not' ? lower : undefined;
}

// ===== Value helpers =====

/**
 * Truthiness used everywhere a rendered value becomes a boolean.
 */
export function isTruthy(value: unknown): boolean {
  if (value === null || value === undefined) return false;
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') return value !== 0 && !Number.isNaN(value);
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed !== '' && !FALSE_WORDS.has(trimmed.toLowerCase());
  }
  if (Array.isArray(value)) return value.length > 0;
  if (isRecord(value)) return Object.keys(value).length > 0;
  return true;
}

/**
 * Parse one side of a comparison into a typed value.
 */
export function parseLiteral(text: string): unknown {
  const trimmed = text.trim();
  const lower = trimmed.toLowerCase();
  if (lower === 'null' || lower === 'none') return null;
  if (lower === 'true') return true;
  if (lower === 'false') return false;
  if (/^[+-]?\d+$/.test(trimmed)) return parseInt(trimmed, 10);
  if (/^[+-]?(\d+\.\d*|\.\d+|\d+)([eE][+-]?\d+)?$/.test(trimmed)) return parseFloat(trimmed);
  if (
    trimmed.length >= 2 &&
    ((trimmed.startsWith('"') && trimmed.endsWith('"')) || (trimmed.startsWith("'") && trimmed.endsWith("'")))
  ) {
    return trimmed.slice(1, -1);
  }
  if (trimmed.startsWith('[') && trimmed.endsWith(']')) {
    try {
      const parsed: unknown = JSON.parse(trimmed);
      if (Array.isArray(parsed)) return parsed;
    } catch {
      // not JSON, keep as a bare string
    }
  }
  return trimmed;
}

function membership(container: unknown, item: unknown): boolean | undefined {
  if (Array.isArray(container)) {
    return container.some((entry) => looseEqual(entry, item));
  }
  if (typeof container === 'string') {
    return container.includes(String(item));
  }
  return undefined;
}

function looseEqual(a: unknown, b: unknown): boolean {
  if (typeof a === 'number' && typeof b === 'number') return a === b;
  return deepEqual(a, b);
}

function order(a: unknown, b: unknown): number | undefined {
  if (typeof a === 'number' && typeof b === 'number') return a - b;
  if (typeof a === 'string' && typeof b === 'string') return a < b ? -1 : a > b ? 1 : 0;
  return undefined;
}

/**
 * Apply a comparison operator to two typed values.
 * Ordering between incomparable types yields false.
 */
export function compareValues(left: unknown, operator: ComparisonOperator, right: unknown): boolean {
  switch (operator) {
    case '==':
      return looseEqual(left, right);
    case '!=':
      return !looseEqual(left, right);
    case '>':
    case '>=':
    case '<':
    case '<=': {
      const diff = order(left, right);
      if (diff === undefined) return false;
      if (operator === '>') return diff > 0;
      if (operator === '>=') return diff >= 0;
      if (operator === '<') return diff < 0;
      return diff <= 0;
    }
    case 'in':
      return membership(right, left) ?? false;
    case 'not_in': {
      const found = membership(right, left);
      return found === undefined ? false : !found;
    }
    case 'contains':
      return membership(left, right) ?? false;
    case 'not_contains': {
      const found = membership(left, right);
      return found === undefined ? false : !found;
    }
  }
}

// ===== Evaluator =====

/**
 * Condition evaluator bound to one variable store.
 *
 * Undefined names raise a `RenderError`; malformed shapes raise a
 * {@link ConditionError}. Callers decide how a render error gates a step.
 */
export class ConditionEvaluator {
  constructor(private readonly variables: VariableManager) {}

  /**
   * Evaluate a condition.
   *
   * @throws {ConditionError} For malformed conditions
   */
  evaluate(condition: Condition): boolean {
    if (condition === null || condition === undefined) return true;
    if (typeof condition === 'boolean') return condition;
    if (typeof condition === 'number') return isTruthy(condition);
    if (typeof condition === 'string') return this.evaluateString(condition);
    if (Array.isArray(condition)) {
      return condition.every((item) => this.evaluate(item));
    }
    return this.evaluateStructured(condition);
  }

  private evaluateStructured(condition: Record<string, unknown>): boolean {
    const keys = Object.keys(condition);
    if (keys.length !== 1) {
      throw new ConditionError(
        `Structured condition must have exactly one key (and/or/not), got: ${keys.join(', ') || 'none'}`,
      );
    }
    const key = keys[0] ?? '';
    const operand = condition[key];

    switch (key) {
      case 'and':
      case 'or': {
        if (!Array.isArray(operand)) {
          throw new ConditionError(`"${key}" condition requires a list of sub-conditions`);
        }
        const results = operand.map((item: unknown) => this.evaluate(toCondition(item)));
        return key === 'and' ? results.every(Boolean) : results.some(Boolean);
      }
      case 'not':
        return !this.evaluate(toCondition(operand));
      default:
        throw new ConditionError(`Unknown structured condition key: "${key}"`);
    }
  }

  private evaluateString(expression: string): boolean {
    const trimmed = expression.trim();
    if (trimmed === '') return true;

    if (asLogicalOperator(trimmed) !== undefined) {
      throw new ConditionError(`Condition cannot be a bare logical operator: "${trimmed}"`);
    }

    if (LOGICAL_KEYWORD.test(trimmed)) {
      return this.evaluateConcise(trimmed);
    }

    return this.evaluateSimple(this.variables.render(trimmed));
  }

  /**
   * Concise expression: render, split into operands and keywords, then fold
   * NOT, AND and OR in that order. Each fold replaces its operands with a
   * `"true"`/`"false"` literal.
   */
  private evaluateConcise(expression: string): boolean {
    const rendered = this.variables.renderString(expression);
    let tokens = tokenizeConcise(rendered);

    // NOT: right to left so `not not x` works
    for (let i = tokens.length - 1; i >= 0; i--) {
      if (tokens[i]?.toLowerCase() !== 'not') continue;
      const operand = tokens[i + 1];
      if (operand === undefined || asLogicalOperator(operand) !== undefined) {
        throw new ConditionError(`"not" requires an operand in: ${expression}`);
      }
      tokens.splice(i, 2, String(!this.evaluateSimple(operand)));
    }

    for (const keyword of ['and', 'or'] as const) {
      const folded: string[] = [];
      for (let i = 0; i < tokens.length; i++) {
        const token = tokens[i] ?? '';
        if (token.toLowerCase() !== keyword) {
          folded.push(token);
          continue;
        }
        const left = folded.pop();
        const right = tokens[i + 1];
        if (left === undefined || right === undefined || asLogicalOperator(right) !== undefined) {
          throw new ConditionError(`"${keyword}" requires two operands in: ${expression}`);
        }
        const l = this.evaluateSimple(left);
        const r = this.evaluateSimple(right);
        folded.push(String(keyword === 'and' ? l && r : l || r));
        i++;
      }
      tokens = folded;
    }

    if (tokens.length !== 1 || tokens[0] === undefined) {
      throw new ConditionError(`Malformed logical expression: ${expression}`);
    }
    return this.evaluateSimple(tokens[0]);
  }

  /**
   * Comparison or literal evaluation of an already-rendered value.
   */
  private evaluateSimple(value: unknown): boolean {
    if (typeof value !== 'string') return isTruthy(value);

    const text = value.trim();
    if (text === '') return false;
    const lower = text.toLowerCase();
    if (TRUE_WORDS.has(lower)) return true;
    if (FALSE_WORDS.has(lower)) return false;

    for (const operator of COMPARISON_OPERATORS) {
      const match = new RegExp(`\\s${escapeRegExp(operator)}\\s`).exec(text);
      if (!match) continue;
      const left = text.slice(0, match.index);
      const right = text.slice(match.index + match[0].length);
      return compareValues(parseLiteral(left), operator, parseLiteral(right));
    }

    return isTruthy(text);
  }
}

function toCondition(value: unknown): Condition {
  if (
    value === null ||
    value === undefined ||
    typeof value === 'string' ||
    typeof value === 'boolean' ||
    typeof value === 'number' ||
    isRecord(value)
  ) {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map(toCondition);
  }
  throw new ConditionError(`Unsupported condition value: ${String(value)}`);
}

/**
 * Split a rendered concise expression into operands and logical keywords.
 * Keywords only count as whole words; adjacent non-keyword words form one operand.
 */
export function tokenizeConcise(expression: string): string[] {
  const tokens: string[] = [];
  let operand: string[] = [];
  for (const word of expression.split(/\s+/).filter(Boolean)) {
    if (asLogicalOperator(word) !== undefined) {
      if (operand.length > 0) {
        tokens.push(operand.join(' '));
        operand = [];
      }
      tokens.push(word.toLowerCase());
    } else {
      operand.push(word);
    }
  }
  if (operand.length > 0) tokens.push(operand.join(' '));
  return tokens;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
