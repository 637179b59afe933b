/**
 * Unit tests for json-path module.
 *
 * Tests cover:
 * - Child, quoted, index, slice and wildcard segments
 * - Recursive descent
 * - Trailing aggregate functions
 * - Match selection and error reporting
 */

import { describe, it, expect } from 'vitest';
import { queryJsonPath, extractJsonPath, getValueByPath, parseJsonPath, JsonPathError } from '../../src/json-path.js';

const data = {
  store: {
    name: 'shop',
    books: [
      { title: 'A', price: 10 },
      { title: 'B', price: 20 },
      { title: 'C', price: 30 },
    ],
  },
};

describe('json-path', () => {
  describe('queryJsonPath', () => {
    it('should follow child segments', () => {
      expect(queryJsonPath(data, '$.store.name')).toEqual(['shop']);
      expect(queryJsonPath(data, "$['store']['name']")).toEqual(['shop']);
    });

    it('should return the root for $', () => {
      expect(queryJsonPath(data, '$')).toEqual([data]);
    });

    it('should index arrays from either end', () => {
      expect(queryJsonPath(data, '$.store.books[0].title')).toEqual(['A']);
      expect(queryJsonPath(data, '$.store.books[-1].title')).toEqual(['C']);
      expect(queryJsonPath(data, '$.store.books[9]')).toEqual([]);
    });

    it('should slice arrays', () => {
      expect(queryJsonPath(data, '$.store.books[0:2]')).toEqual([data.store.books[0], data.store.books[1]]);
      expect(queryJsonPath(data, '$.store.books[1:]')).toHaveLength(2);
    });

    it('should expand wildcards', () => {
      expect(queryJsonPath(data, '$.store.books[*].price')).toEqual([10, 20, 30]);
      expect(queryJsonPath({ a: 1, b: 2 }, '$.*')).toEqual([1, 2]);
    });

    it('should descend recursively', () => {
      expect(queryJsonPath(data, '$..price')).toEqual([10, 20, 30]);
    });

    it('should apply trailing functions', () => {
      expect(queryJsonPath(data, '$.store.books.length()')).toEqual([3]);
      expect(queryJsonPath(data, '$.store.books[*].price.sum()')).toEqual([60]);
      expect(queryJsonPath(data, '$..price.avg()')).toEqual([20]);
      expect(queryJsonPath(data, '$..price.max()')).toEqual([30]);
      expect(queryJsonPath(data, '$.store.keys()')).toEqual([['name', 'books']]);
    });

    it('should reject numeric functions over non-numbers', () => {
      expect(() => queryJsonPath(data, '$..title.sum()')).toThrow('sum() requires numeric values');
    });
  });

  describe('parseJsonPath', () => {
    it('should require a leading $', () => {
      expect(() => parseJsonPath('store.name')).toThrow('JSONPath must start with "$": store.name');
    });

    it('should reject unknown functions', () => {
      expect(() => parseJsonPath('$.a.foo()')).toThrow('Unknown JSONPath function "foo()" in $.a.foo()');
    });

    it('should reject invalid syntax', () => {
      expect(() => parseJsonPath('$[')).toThrow(JsonPathError);
    });
  });

  describe('extractJsonPath', () => {
    it('should pick a match by index', () => {
      expect(extractJsonPath(data, '$..price')).toBe(10);
      expect(extractJsonPath(data, '$..price', { index: -1 })).toBe(30);
    });

    it('should return all matches when asked', () => {
      expect(extractJsonPath(data, '$..title', { all: true })).toEqual(['A', 'B', 'C']);
    });

    it('should throw when nothing matches', () => {
      expect(() => extractJsonPath(data, '$.store.missing')).toThrow('No value found for JSONPath $.store.missing');
    });

    it('should throw for an out-of-range index', () => {
      expect(() => extractJsonPath(data, '$..price', { index: 5 })).toThrow('Match index 5 out of range for $..price (3 matches)');
    });
  });

  describe('getValueByPath', () => {
    it('should accept paths without the leading $', () => {
      expect(getValueByPath(data, 'store.name')).toBe('shop');
    });

    it('should return undefined for invalid or missing paths', () => {
      expect(getValueByPath(data, '$[')).toBeUndefined();
      expect(getValueByPath(data, '$.nope')).toBeUndefined();
    });
  });
});
