/**
 * Unit tests for the CLI commands.
 *
 * Tests cover:
 * - run with console and json reporters
 * - --var overrides and exit codes
 * - data-driven runs with a pass-rate summary
 * - load failures and unknown reporters
 * - validate
 * - collectVar parsing
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { collectVar } from '../../src/commands/run.js';
import { createProgram } from '../../src/program.js';

const INVENTORY_CASE = `
name: Inventory
config:
  variables:
    item: widget
steps:
  - name: create table
    type: database
    database:
      type: sqlite
      path: ":memory:"
    sql: CREATE TABLE items (id INTEGER PRIMARY KEY, name TEXT)
  - name: insert
    type: database
    database:
      path: ":memory:"
    sql: INSERT INTO items (name) VALUES (?)
    params: ["\${item}"]
  - name: list
    type: database
    database:
      path: ":memory:"
    sql: SELECT name FROM items
    validations:
      - type: eq
        path: $.rows[0].name
        expect: gadget
`;

const LOOKUP_CASE = `
name: Lookup
ddts:
  name: values
  parameters:
    - value: ok
    - value: ok
    - value: bad
steps:
  - name: select
    type: database
    database:
      type: sqlite
      path: ":memory:"
    sql: SELECT ? AS value
    params: ["\${value}"]
    validations:
      - type: eq
        path: $.rows[0].value
        expect: ok
`;

const ANSI = /\x1b\[\d+m/g;

function spyOnConsole(method: 'log' | 'error') {
  return vi.spyOn(console, method).mockImplementation(() => {});
}

type ConsoleSpy = ReturnType<typeof spyOnConsole>;

function plainLines(spy: ConsoleSpy): string[] {
  return spy.mock.calls.flatMap((call) => String(call[0]).replace(ANSI, '').split('\n'));
}

describe('CLI', () => {
  let dir: string;
  let file: string;
  let logSpy: ConsoleSpy;
  let errorSpy: ConsoleSpy;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'stepflow-cli-'));
    file = path.join(dir, 'inventory.yaml');
    await fs.writeFile(file, INVENTORY_CASE, 'utf-8');
    logSpy = spyOnConsole('log');
    errorSpy = spyOnConsole('error');
    process.exitCode = undefined;
  });

  afterEach(async () => {
    logSpy.mockRestore();
    errorSpy.mockRestore();
    process.exitCode = undefined;
    await fs.rm(dir, { recursive: true, force: true });
  });

  // ===== run =====

  describe('run', () => {
    it('should pass with a --var override and print one line per step', async () => {
      await createProgram().parseAsync(['run', file, '--var', 'item=gadget'], { from: 'user' });

      const lines = plainLines(logSpy);
      expect(process.exitCode).toBeUndefined();
      expect(lines).toContain('Test: Inventory (3 steps)');
      expect(lines.some((line) => /^ {2}✓ insert \(\d+ms\)$/.test(line))).toBe(true);
      expect(lines.some((line) => /^ {2}3 passed \(\d+\.\d{2}s\)$/.test(line))).toBe(true);
    });

    it('should exit with code 1 when a step fails', async () => {
      await createProgram().parseAsync(['run', file], { from: 'user' });

      const lines = plainLines(logSpy);
      expect(process.exitCode).toBe(1);
      expect(lines.some((line) => /^ {2}✗ list \(\d+ms\)$/.test(line))).toBe(true);
    });

    it('should print a JSON report with the json reporter', async () => {
      await createProgram().parseAsync(['run', file, '--reporter', 'json', '--var', 'item=gadget'], { from: 'user' });

      expect(logSpy).toHaveBeenCalledTimes(1);
      const report: unknown = JSON.parse(String(logSpy.mock.calls[0]?.[0]));
      expect(report).toMatchObject({
        totals: { cases: 1, steps: 3, passed: 1, failed: 0, skipped: 0, error: 0 },
        cases: [{ name: 'Inventory', status: 'passed', passedSteps: 3 }],
      });
    });

    it('should run a data-driven case once per parameter set', async () => {
      const lookup = path.join(dir, 'lookup.yaml');
      await fs.writeFile(lookup, LOOKUP_CASE, 'utf-8');

      await createProgram().parseAsync(['run', lookup], { from: 'user' });

      const lines = plainLines(logSpy);
      expect(process.exitCode).toBe(1);
      expect(lines.filter((line) => line === 'Test: Lookup (1 steps)')).toHaveLength(3);
      expect(lines).toContain('Data-driven "values": 2/3 runs passed (66.7%)');
    });

    it('should reject an unknown reporter', async () => {
      await createProgram().parseAsync(['run', file, '--reporter', 'xml'], { from: 'user' });

      expect(process.exitCode).toBe(1);
      expect(errorSpy).toHaveBeenCalledWith('\x1b[31mUnknown reporter "xml" (expected console|json)\x1b[0m');
    });

    it('should report a missing file', async () => {
      const missing = path.join(dir, 'missing.yaml');

      await createProgram().parseAsync(['run', missing], { from: 'user' });

      expect(process.exitCode).toBe(1);
      expect(errorSpy).toHaveBeenCalledWith(`\x1b[31mFailed to load test case: Test case file not found: ${missing}\x1b[0m`);
    });
  });

  // ===== validate =====

  describe('validate', () => {
    it('should print the case name and step count', async () => {
      await createProgram().parseAsync(['validate', file], { from: 'user' });

      expect(process.exitCode).toBeUndefined();
      expect(logSpy).toHaveBeenCalledWith('\x1b[32m✓\x1b[0m Inventory: 3 steps');
    });

    it('should report validation errors', async () => {
      const broken = path.join(dir, 'broken.yaml');
      await fs.writeFile(broken, 'name: Broken\nsteps:\n  - name: no-sql\n    type: database\n', 'utf-8');

      await createProgram().parseAsync(['validate', broken], { from: 'user' });

      expect(process.exitCode).toBe(1);
      expect(errorSpy).toHaveBeenCalledWith(
        `\x1b[31m✗ Validation failed for ${broken}:\n  - steps.0.sql: Required\x1b[0m`,
      );
    });
  });

  // ===== collectVar =====

  describe('collectVar', () => {
    it('should merge key=value pairs', () => {
      expect(collectVar('b=2', { a: '1' })).toEqual({ a: '1', b: '2' });
    });

    it('should keep everything after the first equals sign', () => {
      expect(collectVar('query=a=b', {})).toEqual({ query: 'a=b' });
    });

    it('should reject values without a key', () => {
      expect(() => collectVar('=x', {})).toThrow('expected key=value, got "=x"');
      expect(() => collectVar('plain', {})).toThrow('expected key=value, got "plain"');
    });
  });
});
