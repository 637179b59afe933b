/**
 * @module json-path
 * JSONPath subset used by extractors, validations and poll conditions.
 *
 * Supported:
 * - `$`, `$.key`, `$['key']`, `$.a.b.c`
 * - `$.items[0]`, `$.items[-1]`, `$.items[1:3]`, `$.items[*]`, `$.*`
 * - `$..key` (recursive descent)
 * - one trailing function: `length() size() count() sum() avg() min() max()
 *   first() last() keys() values()`
 */

import { isRecord } from './helpers.js';

type Segment =
  | { kind: 'child'; key: string }
  | { kind: 'index'; index: number }
  | { kind: 'slice'; start?: number; end?: number }
  | { kind: 'wildcard' }
  | { kind: 'descend'; key: string };

export class JsonPathError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'JsonPathError';
  }
}

const PATH_FUNCTIONS = new Set([
  'length', 'size', 'count', 'sum', 'avg', 'min', 'max', 'first', 'last', 'keys', 'values',
]);

/**
 * Split a path into segments and an optional trailing function name.
 */
export function parseJsonPath(path: string): { segments: Segment[]; fn?: string } {
  let source = path.trim();
  let fn: string | undefined;

  const fnMatch = /\.(\w+)\(\)$/.exec(source);
  if (fnMatch?.[1] !== undefined) {
    if (!PATH_FUNCTIONS.has(fnMatch[1])) {
      throw new JsonPathError(`Unknown JSONPath function "${fnMatch[1]}()" in ${path}`);
    }
    fn = fnMatch[1];
    source = source.slice(0, fnMatch.index);
  }

  if (!source.startsWith('$')) {
    throw new JsonPathError(`JSONPath must start with "$": ${path}`);
  }

  const segments: Segment[] = [];
  let i = 1;
  while (i < source.length) {
    const rest = source.slice(i);

    const descend = /^\.\.([\w-]+)/.exec(rest);
    if (descend?.[1] !== undefined) {
      segments.push({ kind: 'descend', key: descend[1] });
      i += descend[0].length;
      continue;
    }

    if (rest.startsWith('.*') || rest.startsWith('[*]')) {
      segments.push({ kind: 'wildcard' });
      i += rest.startsWith('.*') ? 2 : 3;
      continue;
    }

    const child = /^\.([\w-]+)/.exec(rest);
    if (child?.[1] !== undefined) {
      segments.push({ kind: 'child', key: child[1] });
      i += child[0].length;
      continue;
    }

    const quoted = /^\[(['"])(.*?)\1\]/.exec(rest);
    if (quoted?.[2] !== undefined) {
      segments.push({ kind: 'child', key: quoted[2] });
      i += quoted[0].length;
      continue;
    }

    const slice = /^\[(-?\d*):(-?\d*)\]/.exec(rest);
    if (slice) {
      segments.push({
        kind: 'slice',
        start: slice[1] ? parseInt(slice[1], 10) : undefined,
        end: slice[2] ? parseInt(slice[2], 10) : undefined,
      });
      i += slice[0].length;
      continue;
    }

    const index = /^\[(-?\d+)\]/.exec(rest);
    if (index?.[1] !== undefined) {
      segments.push({ kind: 'index', index: parseInt(index[1], 10) });
      i += index[0].length;
      continue;
    }

    throw new JsonPathError(`Invalid JSONPath syntax at "${rest}" in ${path}`);
  }

  return { segments, fn };
}

function collectDescendants(node: unknown, key: string, out: unknown[]): void {
  if (isRecord(node)) {
    if (Object.prototype.hasOwnProperty.call(node, key)) out.push(node[key]);
    for (const value of Object.values(node)) collectDescendants(value, key, out);
  } else if (Array.isArray(node)) {
    for (const item of node) collectDescendants(item, key, out);
  }
}

function step(nodes: unknown[], segment: Segment): unknown[] {
  const out: unknown[] = [];
  for (const node of nodes) {
    switch (segment.kind) {
      case 'child':
        if (isRecord(node) && Object.prototype.hasOwnProperty.call(node, segment.key)) {
          out.push(node[segment.key]);
        }
        break;
      case 'index':
        if (Array.isArray(node)) {
          const idx = segment.index < 0 ? node.length + segment.index : segment.index;
          if (idx >= 0 && idx < node.length) out.push(node[idx]);
        }
        break;
      case 'slice':
        if (Array.isArray(node)) out.push(...node.slice(segment.start, segment.end));
        break;
      case 'wildcard':
        if (Array.isArray(node)) out.push(...node);
        else if (isRecord(node)) out.push(...Object.values(node));
        break;
      case 'descend':
        collectDescendants(node, segment.key, out);
        break;
    }
  }
  return out;
}

function numbers(values: unknown[], fn: string): number[] {
  return values.map((v) => {
    if (typeof v !== 'number') {
      throw new JsonPathError(`${fn}() requires numeric values, got ${JSON.stringify(v)}`);
    }
    return v;
  });
}

function applyFunction(fn: string, value: unknown): unknown {
  const list = Array.isArray(value) ? value : undefined;
  switch (fn) {
    case 'length':
    case 'size':
    case 'count':
      if (list) return list.length;
      if (typeof value === 'string') return value.length;
      if (isRecord(value)) return Object.keys(value).length;
      throw new JsonPathError(`${fn}() requires an array, string or object`);
    case 'keys':
      if (isRecord(value)) return Object.keys(value);
      throw new JsonPathError('keys() requires an object');
    case 'values':
      if (isRecord(value)) return Object.values(value);
      throw new JsonPathError('values() requires an object');
  }

  if (!list) {
    throw new JsonPathError(`${fn}() requires an array`);
  }
  switch (fn) {
    case 'first':
      return list[0];
    case 'last':
      return list[list.length - 1];
    case 'sum':
      return numbers(list, fn).reduce((a, b) => a + b, 0);
    case 'avg': {
      const nums = numbers(list, fn);
      return nums.length === 0 ? 0 : nums.reduce((a, b) => a + b, 0) / nums.length;
    }
    case 'min':
      return Math.min(...numbers(list, fn));
    case 'max':
      return Math.max(...numbers(list, fn));
    default:
      throw new JsonPathError(`Unknown JSONPath function "${fn}()"`);
  }
}

/**
 * Evaluate a path and return every match.
 *
 * @throws {JsonPathError} On invalid syntax
 */
export function queryJsonPath(data: unknown, path: string): unknown[] {
  const { segments, fn } = parseJsonPath(path);
  let nodes: unknown[] = [data];
  for (const segment of segments) {
    nodes = step(nodes, segment);
  }
  if (fn === undefined) {
    return nodes;
  }
  if (nodes.length === 0) {
    return [];
  }
  const multi = segments.some((s) => s.kind === 'wildcard' || s.kind === 'descend' || s.kind === 'slice');
  return [applyFunction(fn, multi ? nodes : nodes[0])];
}

export interface ExtractOptions {
  /** Match to return; negative counts from the end. Default 0. */
  index?: number;
  /** Return the list of all matches */
  all?: boolean;
}

/**
 * Extract a single value (or all matches) from data.
 *
 * @throws {JsonPathError} When nothing matches or the index is out of range
 */
export function extractJsonPath(data: unknown, path: string, options: ExtractOptions = {}): unknown {
  const matches = queryJsonPath(data, path);
  if (matches.length === 0) {
    throw new JsonPathError(`No value found for JSONPath ${path}`);
  }
  if (options.all) {
    return matches;
  }
  const index = options.index ?? 0;
  const resolved = index < 0 ? matches.length + index : index;
  if (resolved < 0 || resolved >= matches.length) {
    throw new JsonPathError(`Match index ${index} out of range for ${path} (${matches.length} matches)`);
  }
  return matches[resolved];
}

/**
 * Lenient lookup: `undefined` when nothing matches or the path is invalid.
 */
export function getValueByPath(data: unknown, path: string): unknown {
  const normalized = path.startsWith('$') ? path : `$.${path}`;
  try {
    return queryJsonPath(data, normalized)[0];
  } catch (err) {
    if (err instanceof JsonPathError) return undefined;
    throw err;
  }
}
