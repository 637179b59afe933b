/**
 * Unit tests for extractors module.
 *
 * Tests cover:
 * - JSONPath extraction from the body and from anchored response fields
 * - Regex, header and cookie extraction
 * - Defaults and extractor conditions
 */

import { describe, it, expect } from 'vitest';
import { extractValue, runExtractor, jsonPathSource, responseBody } from '../../src/extractors.js';
import { ConditionEvaluator } from '../../src/condition-evaluator.js';
import { VariableManager } from '../../src/variable-manager.js';
import { ExtractionError } from '../../src/errors.js';

const response = {
  statusCode: 200,
  headers: { 'Content-Type': 'application/json', 'X-Tags': ['a', 'b'] },
  cookies: { sid: 'abc' },
  body: { data: { token: 't-1', ids: [1, 2] } },
};

describe('extractors', () => {
  describe('jsonPathSource', () => {
    it('should use the body unless the path is anchored at a response field', () => {
      expect(jsonPathSource('$.data.token', response)).toBe(response.body);
      expect(jsonPathSource('$.statusCode', response)).toBe(response);
      expect(jsonPathSource('$.headers.X', response)).toBe(response);
    });

    it('should use non-response values as-is', () => {
      const rows = { rows: [1] };
      expect(jsonPathSource('$.rows', rows)).toBe(rows);
      expect(responseBody(rows)).toBe(rows);
    });
  });

  describe('extractValue', () => {
    it('should extract from the body by JSONPath', () => {
      expect(extractValue({ name: 'token', type: 'jsonpath', path: '$.data.token' }, response)).toBe('t-1');
      expect(extractValue({ name: 'ids', type: 'jsonpath', path: '$.data.ids[*]', extractAll: true }, response)).toEqual([1, 2]);
    });

    it('should extract anchored response fields', () => {
      expect(extractValue({ name: 'code', type: 'jsonpath', path: '$.statusCode' }, response)).toBe(200);
      expect(extractValue({ name: 'ct', type: 'jsonpath', path: '$.headers.Content-Type' }, response)).toBe('application/json');
    });

    it('should extract regex groups from the serialized body', () => {
      expect(extractValue({ name: 'token', type: 'regex', path: '"token":"([^"]+)"', index: 1 }, response)).toBe('t-1');
    });

    it('should extract every regex match when asked', () => {
      const text = { body: 'id=1;id=2' };
      expect(extractValue({ name: 'ids', type: 'regex', path: 'id=(\\d)', index: 1, extractAll: true }, text)).toEqual(['1', '2']);
    });

    it('should read headers case-insensitively and join lists', () => {
      expect(extractValue({ name: 'ct', type: 'header', path: 'content-type' }, response)).toBe('application/json');
      expect(extractValue({ name: 'tags', type: 'header', path: 'x-tags' }, response)).toBe('a, b');
    });

    it('should read cookies', () => {
      expect(extractValue({ name: 'sid', type: 'cookie', path: 'sid' }, response)).toBe('abc');
    });

    it('should throw ExtractionError when nothing matches', () => {
      expect(() => extractValue({ name: 'x', type: 'jsonpath', path: '$.nope' }, response)).toThrow(ExtractionError);
      expect(() => extractValue({ name: 'h', type: 'header', path: 'X-Missing' }, response)).toThrow(
        'Extractor "h": header X-Missing not found',
      );
    });

    it('should report an invalid regular expression', () => {
      expect(() => extractValue({ name: 'r', type: 'regex', path: '(' }, response)).toThrow('Extractor "r": invalid regular expression (');
    });
  });

  describe('runExtractor', () => {
    it('should fall back to the default when nothing matches', () => {
      expect(runExtractor({ name: 'x', type: 'jsonpath', path: '$.nope', default: 'none' }, response)).toEqual({
        status: 'extracted',
        value: 'none',
        usedDefault: true,
      });
    });

    it('should rethrow without a default', () => {
      expect(() => runExtractor({ name: 'x', type: 'jsonpath', path: '$.nope' }, response)).toThrow(ExtractionError);
    });

    it('should skip when the condition does not hold', () => {
      const vm = new VariableManager();
      vm.set('global', 'enabled', false);
      const evaluator = new ConditionEvaluator(vm);

      expect(runExtractor({ name: 'token', type: 'jsonpath', path: '$.data.token', condition: '${enabled}' }, response, evaluator)).toEqual({
        status: 'skipped',
        reason: 'condition not met for extractor "token"',
      });
      expect(
        runExtractor({ name: 'token', type: 'jsonpath', path: '$.data.token', condition: '${enabled}', default: 'd' }, response, evaluator),
      ).toEqual({ status: 'extracted', value: 'd', usedDefault: true });
    });

    it('should extract when the condition holds', () => {
      const vm = new VariableManager();
      vm.set('global', 'enabled', true);
      expect(
        runExtractor({ name: 'token', type: 'jsonpath', path: '$.data.token', condition: '${enabled}' }, response, new ConditionEvaluator(vm)),
      ).toEqual({ status: 'extracted', value: 't-1', usedDefault: false });
    });
  });
});
