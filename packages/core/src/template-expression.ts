/**
 * @module template-expression
 * Evaluator for the expression inside one `${...}` reference.
 *
 * Grammar (no operators, no arbitrary code):
 *
 *   expr    := primary ( '.' name | '[' expr ']' )*
 *   primary := number | string | true | false | null | list | name | name '(' args ')'
 *   list    := '[' ( expr ( ',' expr )* )? ']'
 */

import { RenderError } from './errors.js';
import { isRecord } from './helpers.js';
import type { TemplateFunctionRegistry } from './template-functions.js';

export interface ExpressionScope {
  /** Resolve a root variable name; `found: false` raises a render error */
  lookup(name: string): { found: boolean; value: unknown };
  functions: TemplateFunctionRegistry;
}

type Token =
  | { kind: 'name'; value: string }
  | { kind: 'number'; value: number }
  | { kind: 'string'; value: string }
  | { kind: 'punct'; value: '.' | ',' | '(' | ')' | '[' | ']' };

const PUNCTUATION = new Set(['.', ',', '(', ')', '[', ']']);

function isPunct(ch: string): ch is '.' | ',' | '(' | ')' | '[' | ']' {
  return PUNCTUATION.has(ch);
}

function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  while (i < source.length) {
    const ch = source.charAt(i);

    if (/\s/.test(ch)) {
      i++;
      continue;
    }

    if (ch === '"' || ch === "'") {
      let j = i + 1;
      let text = '';
      while (j < source.length && source.charAt(j) !== ch) {
        if (source.charAt(j) === '\\' && j + 1 < source.length) {
          j++;
        }
        text += source.charAt(j);
        j++;
      }
      if (j >= source.length) {
        throw new RenderError(`Unterminated string in expression: ${source}`);
      }
      tokens.push({ kind: 'string', value: text });
      i = j + 1;
      continue;
    }

    const number = /^-?\d+(?:\.\d+)?(?:[eE][+-]?\d+)?/.exec(source.slice(i));
    if (number && (ch === '-' || /\d/.test(ch))) {
      tokens.push({ kind: 'number', value: Number(number[0]) });
      i += number[0].length;
      continue;
    }

    const name = /^[A-Za-z_][\w-]*/.exec(source.slice(i));
    if (name) {
      tokens.push({ kind: 'name', value: name[0] });
      i += name[0].length;
      continue;
    }

    if (isPunct(ch)) {
      tokens.push({ kind: 'punct', value: ch });
      i++;
      continue;
    }

    throw new RenderError(`Unexpected character "${ch}" in expression: ${source}`);
  }

  return tokens;
}

class Parser {
  private pos = 0;

  constructor(
    private readonly tokens: Token[],
    private readonly source: string,
    private readonly scope: ExpressionScope,
  ) {}

  parse(): unknown {
    if (this.tokens.length === 0) {
      throw new RenderError('Empty expression in template');
    }
    const value = this.expression();
    if (this.pos < this.tokens.length) {
      throw new RenderError(`Unexpected trailing input in expression: ${this.source}`);
    }
    return value;
  }

  private peek(): Token | undefined {
    return this.tokens[this.pos];
  }

  private isPunct(value: string): boolean {
    const token = this.peek();
    return token?.kind === 'punct' && token.value === value;
  }

  private expect(value: string): void {
    if (!this.isPunct(value)) {
      throw new RenderError(`Expected "${value}" in expression: ${this.source}`);
    }
    this.pos++;
  }

  private expression(): unknown {
    const first = this.primary();
    let value = first.value;
    let path = first.label;

    for (;;) {
      if (this.isPunct('.')) {
        this.pos++;
        const token = this.peek();
        if (token?.kind !== 'name' && token?.kind !== 'number') {
          throw new RenderError(`Expected attribute name after "." in expression: ${this.source}`);
        }
        this.pos++;
        path += `.${token.value}`;
        value = this.member(value, token.value, path);
      } else if (this.isPunct('[')) {
        this.pos++;
        const key = this.expression();
        this.expect(']');
        path += `[${JSON.stringify(key)}]`;
        value = this.member(value, key, path);
      } else {
        return value;
      }
    }
  }

  private member(target: unknown, key: unknown, path: string): unknown {
    if (Array.isArray(target)) {
      const index = typeof key === 'number' ? key : Number(key);
      if (Number.isInteger(index)) {
        const resolved = index < 0 ? target.length + index : index;
        if (resolved >= 0 && resolved < target.length) {
          return target[resolved];
        }
      } else if (key === 'length') {
        return target.length;
      }
    } else if (isRecord(target)) {
      const prop = String(key);
      if (Object.prototype.hasOwnProperty.call(target, prop)) {
        return target[prop];
      }
    } else if (typeof target === 'string' && key === 'length') {
      return target.length;
    }
    throw new RenderError(`Undefined variable: ${path}`);
  }

  private primary(): { value: unknown; label: string } {
    const token = this.peek();
    if (!token) {
      throw new RenderError(`Unexpected end of expression: ${this.source}`);
    }
    this.pos++;

    switch (token.kind) {
      case 'number':
        return { value: token.value, label: String(token.value) };
      case 'string':
        return { value: token.value, label: JSON.stringify(token.value) };
      case 'punct':
        if (token.value === '[') {
          return { value: this.list(), label: '[...]' };
        }
        throw new RenderError(`Unexpected "${token.value}" in expression: ${this.source}`);
      case 'name':
        return this.name(token.value);
    }
  }

  private list(): unknown[] {
    const items: unknown[] = [];
    if (this.isPunct(']')) {
      this.pos++;
      return items;
    }
    for (;;) {
      items.push(this.expression());
      if (this.isPunct(',')) {
        this.pos++;
        continue;
      }
      this.expect(']');
      return items;
    }
  }

  private name(name: string): { value: unknown; label: string } {
    if (this.isPunct('(')) {
      this.pos++;
      const args: unknown[] = [];
      if (!this.isPunct(')')) {
        for (;;) {
          args.push(this.expression());
          if (this.isPunct(',')) {
            this.pos++;
            continue;
          }
          break;
        }
      }
      this.expect(')');
      const fn = this.scope.functions.get(name);
      if (!fn) {
        throw new RenderError(`Unknown template function: ${name}()`);
      }
      return { value: fn(...args), label: `${name}()` };
    }

    const lower = name.toLowerCase();
    if (lower === 'true' || lower === 'false') {
      return { value: lower === 'true', label: name };
    }
    if (lower === 'null' || lower === 'none') {
      return { value: null, label: name };
    }

    const resolved = this.scope.lookup(name);
    if (!resolved.found) {
      throw new RenderError(`Undefined variable: ${name}`);
    }
    return { value: resolved.value, label: name };
  }
}

/**
 * Evaluate the body of a `${...}` reference.
 *
 * @param source - Expression text without the `${` and `}` delimiters
 * @throws {RenderError} On undefined names, unknown functions or bad syntax
 */
export function evaluateExpression(source: string, scope: ExpressionScope): unknown {
  return new Parser(tokenize(source), source, scope).parse();
}
