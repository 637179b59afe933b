/**
 * Unit tests for template-functions module.
 *
 * Tests cover:
 * - Built-in random and identifier functions
 * - Date formatting
 * - Registry registration and name checks
 */

import { describe, it, expect } from 'vitest';
import { BUILTIN_FUNCTIONS, TemplateFunctionRegistry, formatDate } from '../../src/template-functions.js';
import { RenderError } from '../../src/errors.js';

function call(name: string, ...args: unknown[]): unknown {
  const fn = BUILTIN_FUNCTIONS[name];
  if (!fn) throw new Error(`missing ${name}`);
  return fn(...args);
}

describe('template-functions', () => {
  it('should generate random integers within inclusive bounds', () => {
    for (let i = 0; i < 20; i++) {
      const n = call('randint', 1, 3);
      expect(n).toBeGreaterThanOrEqual(1);
      expect(n).toBeLessThanOrEqual(3);
    }
  });

  it('should reject a max smaller than min', () => {
    expect(() => call('randint', 5, 1)).toThrow(RenderError);
  });

  it('should build strings from a custom alphabet', () => {
    expect(call('random_str', 6, 'x')).toBe('xxxxxx');
  });

  it('should default random_str to 8 characters', () => {
    expect(String(call('random_str'))).toHaveLength(8);
  });

  it('should generate dashed and undashed UUIDs', () => {
    expect(String(call('uuid4'))).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-/);
    expect(String(call('uuid'))).not.toContain('-');
  });

  it('should pick an item with choice', () => {
    expect(['a', 'b']).toContain(call('choice', ['a', 'b']));
    expect(() => call('choice', [])).toThrow('choice() expects a non-empty list');
  });

  it('should format dates with the strftime subset', () => {
    const date = new Date(2024, 0, 5, 3, 4, 5, 6);
    expect(formatDate(date, '%Y-%m-%d %H:%M:%S.%f')).toBe('2024-01-05 03:04:05.006000');
    expect(formatDate(date, '100%%')).toBe('100%');
  });

  it('should register custom functions', () => {
    const registry = new TemplateFunctionRegistry();
    registry.register('greet', (name) => `hi ${String(name)}`);
    expect(registry.get('greet')?.('bob')).toBe('hi bob');
    expect(registry.has('uuid')).toBe(true);
    expect(registry.list()).toContain('greet');
  });

  it('should reject invalid function names', () => {
    const registry = new TemplateFunctionRegistry();
    expect(() => registry.register('bad-name', () => 1)).toThrow('Invalid template function name');
  });
});
