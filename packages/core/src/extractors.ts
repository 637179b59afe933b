/**
 * @module extractors
 * Variable extraction from step responses.
 *
 * Data source per extractor type:
 * - `jsonpath` — the response body, unless the path is anchored at a
 *   response field (`$.body...`, `$.headers...`, `$.cookies...`, `$.statusCode`)
 * - `regex`    — the response body as text (objects are JSON-serialised)
 * - `header`   — response headers, case-insensitive
 * - `cookie`   — response cookies
 */

import type { ConditionEvaluator } from './condition-evaluator.js';
import { ExtractionError } from './errors.js';
import { isRecord } from './helpers.js';
import { extractJsonPath, JsonPathError } from './json-path.js';
import type { Extractor } from './types.js';

const RESPONSE_ANCHORS = new Set(['body', 'headers', 'cookies', 'statusCode', 'status_code']);

export type ExtractionOutcome =
  | { status: 'extracted'; value: unknown; usedDefault: boolean }
  | { status: 'skipped'; reason: string };

/** Body of a response-shaped value, or the value itself */
export function responseBody(response: unknown): unknown {
  return isRecord(response) && 'body' in response ? response.body : response;
}

/**
 * Data a JSONPath should run against: the whole response when the path is
 * anchored at a response field, otherwise the body.
 */
export function jsonPathSource(path: string, response: unknown): unknown {
  if (!isRecord(response) || !('body' in response)) {
    return response;
  }
  const anchor = /^\$\.(\w+)/.exec(path.trim())?.[1];
  return anchor !== undefined && RESPONSE_ANCHORS.has(anchor) ? response : response.body;
}

function asText(value: unknown): string {
  if (typeof value === 'string') return value;
  if (value === undefined) return '';
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
}

function lookupInsensitive(record: unknown, name: string): unknown {
  if (!isRecord(record)) return undefined;
  const lower = name.toLowerCase();
  for (const [key, value] of Object.entries(record)) {
    if (key.toLowerCase() === lower) return value;
  }
  return undefined;
}

/**
 * Run one extractor against a response, ignoring `default` and `condition`.
 *
 * @throws {ExtractionError} When nothing is found
 */
export function extractValue(extractor: Extractor, response: unknown): unknown {
  switch (extractor.type) {
    case 'jsonpath':
      try {
        return extractJsonPath(jsonPathSource(extractor.path, response), extractor.path, {
          index: extractor.index,
          all: extractor.extractAll,
        });
      } catch (err) {
        if (err instanceof JsonPathError) {
          throw new ExtractionError(`Extractor "${extractor.name}": ${err.message}`);
        }
        throw err;
      }

    case 'regex': {
      let pattern: RegExp;
      try {
        pattern = new RegExp(extractor.path, extractor.extractAll ? 'g' : '');
      } catch (err) {
        throw new ExtractionError(
          `Extractor "${extractor.name}": invalid regular expression ${extractor.path} (${err instanceof Error ? err.message : String(err)})`,
        );
      }
      const text = asText(responseBody(response));
      const group = extractor.index ?? 0;
      if (extractor.extractAll) {
        const all = Array.from(text.matchAll(pattern), (m) => m[group]).filter((v) => v !== undefined);
        if (all.length === 0) {
          throw new ExtractionError(`Extractor "${extractor.name}": pattern ${extractor.path} did not match`);
        }
        return all;
      }
      const match = pattern.exec(text);
      const value = match?.[group];
      if (value === undefined) {
        throw new ExtractionError(`Extractor "${extractor.name}": pattern ${extractor.path} did not match (group ${group})`);
      }
      return value;
    }

    case 'header': {
      const headers = isRecord(response) ? response.headers : undefined;
      const value = lookupInsensitive(headers, extractor.path);
      if (value === undefined) {
        throw new ExtractionError(`Extractor "${extractor.name}": header ${extractor.path} not found`);
      }
      return Array.isArray(value) ? value.map(String).join(', ') : String(value);
    }

    case 'cookie': {
      const cookies = isRecord(response) ? response.cookies : undefined;
      const value = isRecord(cookies) ? cookies[extractor.path] : undefined;
      if (value === undefined) {
        throw new ExtractionError(`Extractor "${extractor.name}": cookie ${extractor.path} not found`);
      }
      return value;
    }
  }
}

/**
 * Run an extractor with its `condition` and `default` applied.
 *
 * @throws {ExtractionError} When nothing is found and there is no default
 */
export function runExtractor(
  extractor: Extractor,
  response: unknown,
  evaluator?: ConditionEvaluator,
): ExtractionOutcome {
  if (extractor.condition !== undefined && evaluator && !evaluator.evaluate(extractor.condition)) {
    if (extractor.default !== undefined) {
      return { status: 'extracted', value: extractor.default, usedDefault: true };
    }
    return { status: 'skipped', reason: `condition not met for extractor "${extractor.name}"` };
  }

  try {
    return { status: 'extracted', value: extractValue(extractor, response), usedDefault: false };
  } catch (err) {
    if (err instanceof ExtractionError && extractor.default !== undefined) {
      return { status: 'extracted', value: extractor.default, usedDefault: true };
    }
    throw err;
  }
}
