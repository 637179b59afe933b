/**
 * Unit tests for step-executor module.
 *
 * Tests cover:
 * - Successful leaf steps with rendering, validation and extraction
 * - Gates: skip_if, only_if, condition, depends_on
 * - Retry on failure, retry exhaustion, non-retryable errors
 * - Setup/teardown hooks and their failure statuses
 * - Non-fatal extractor failures
 * - Result immutability and variable deltas
 */

import { describe, it, expect } from 'vitest';
import { LeafStepExecutor, renderLeafStep, renderValidationRule, subResultsOf } from '../../src/step-executor.js';
import { LeafError } from '../../src/errors.js';
import { VariableManager } from '../../src/variable-manager.js';
import type { RequestStep } from '../../src/types.js';
import { StubLeaf, createTestContext, priorResult } from './support.js';

function request(extra: Partial<RequestStep> = {}): RequestStep {
  return { type: 'request', name: 'call', url: '/users', ...extra };
}

describe('step-executor', () => {
  describe('successful steps', () => {
    it('should validate, extract and record one attempt', async () => {
      const leaf = new StubLeaf('request', () => ({ response: { statusCode: 200, body: { token: 'abc' } } }));
      const ctx = createTestContext({ leaves: [leaf] });

      const result = await new LeafStepExecutor(
        request({
          extractors: [{ name: 'token', type: 'jsonpath', path: '$.token' }],
          validations: [{ type: 'eq', path: '$.statusCode', expect: 200 }],
        }),
        ctx,
      ).execute();

      expect(result.status).toBe('success');
      expect(result.extractedVars).toEqual({ token: 'abc' });
      expect(ctx.variables.get('token')).toBe('abc');
      expect(result.validationResults).toHaveLength(1);
      expect(result.validationResults[0]?.passed).toBe(true);
      expect(result.retryCount).toBe(0);
      expect(result.retryHistory).toHaveLength(1);
      expect(result.variablesDelta?.added).toEqual({ token: 'abc' });
      expect(Object.isFrozen(result)).toBe(true);
    });

    it('should render templates before calling the leaf', async () => {
      const leaf = new StubLeaf('request');
      const variables = new VariableManager();
      variables.setMany('global', { id: 7, auth: 'test-secret' });
      const ctx = createTestContext({ leaves: [leaf], variables });

      await new LeafStepExecutor(request({ url: '/users/${id}', headers: { Authorization: 'Bearer ${auth}' } }), ctx).execute();

      expect(leaf.calls[0]).toMatchObject({ url: '/users/7', headers: { Authorization: 'Bearer test-secret' } });
    });

    it('should render validation expectations before comparing', async () => {
      const leaf = new StubLeaf('request', () => ({ response: { statusCode: 200, body: { id: 7 } } }));
      const variables = new VariableManager();
      variables.set('extracted', 'user_id', 7);
      const ctx = createTestContext({ leaves: [leaf], variables });

      const result = await new LeafStepExecutor(
        request({ validations: [{ type: 'eq', path: '$.id', expect: '${user_id}' }] }),
        ctx,
      ).execute();

      expect(result.status).toBe('success');
      expect(result.validationResults[0]).toMatchObject({ expect: 7, actual: 7, passed: true });
    });

    it('should fail when no leaf is registered for the type', async () => {
      const ctx = createTestContext();
      const result = await new LeafStepExecutor({ type: 'database', name: 'db', sql: 'SELECT 1' }, ctx).execute();
      expect(result.status).toBe('failure');
      expect(result.errorInfo?.code).toBe('LEAF_NOT_FOUND');
    });
  });

  describe('gates', () => {
    it('should skip when a dependency has not run', async () => {
      const leaf = new StubLeaf('request');
      const ctx = createTestContext({ leaves: [leaf] });
      const result = await new LeafStepExecutor(request({ dependsOn: ['login'] }), ctx).execute();

      expect(result.status).toBe('skipped');
      expect(result.skipReason).toBe('dependency "login" has not run');
      expect(leaf.calls).toHaveLength(0);
      expect(result.retryHistory).toEqual([]);
    });

    it('should skip when a dependency did not succeed', async () => {
      const ctx = createTestContext({ leaves: [new StubLeaf('request')], previousResults: [priorResult('login', 'failure')] });
      const result = await new LeafStepExecutor(request({ dependsOn: ['login'] }), ctx).execute();
      expect(result.skipReason).toBe('dependency "login" did not succeed (failure)');
    });

    it('should run when every dependency succeeded', async () => {
      const ctx = createTestContext({ leaves: [new StubLeaf('request')], previousResults: [priorResult('login', 'success')] });
      const result = await new LeafStepExecutor(request({ dependsOn: ['login'] }), ctx).execute();
      expect(result.status).toBe('success');
    });

    it('should skip on skip_if, only_if and condition', async () => {
      const variables = new VariableManager();
      variables.set('global', 'flag', true);
      const ctx = createTestContext({ leaves: [new StubLeaf('request')], variables });

      expect((await new LeafStepExecutor(request({ skipIf: '${flag}' }), ctx).execute()).skipReason).toBe('skip_if condition met');
      expect((await new LeafStepExecutor(request({ onlyIf: { not: '${flag}' } }), ctx).execute()).skipReason).toBe(
        'only_if condition not met',
      );
      expect((await new LeafStepExecutor(request({ condition: false }), ctx).execute()).skipReason).toBe('condition condition not met');
    });

    it('should run the step when skip_if cannot be rendered', async () => {
      const leaf = new StubLeaf('request');
      const ctx = createTestContext({ leaves: [leaf] });
      const result = await new LeafStepExecutor(request({ skipIf: '${missing}' }), ctx).execute();
      expect(result.status).toBe('success');
      expect(leaf.calls).toHaveLength(1);
    });

    it('should skip the step when only_if cannot be rendered', async () => {
      const ctx = createTestContext({ leaves: [new StubLeaf('request')] });
      const result = await new LeafStepExecutor(request({ onlyIf: '${missing}' }), ctx).execute();
      expect(result.status).toBe('skipped');
      expect(result.skipReason).toBe('only_if could not be evaluated: Undefined variable: missing');
    });

    it('should fail on a malformed condition without running teardown', async () => {
      const ctx = createTestContext({ leaves: [new StubLeaf('request')] });
      const result = await new LeafStepExecutor(
        request({ skipIf: { xor: [] }, teardown: { variables: { cleaned: true } } }),
        ctx,
      ).execute();
      expect(result.status).toBe('failure');
      expect(result.errorInfo?.type).toBe('ConditionError');
      expect(ctx.variables.has('cleaned')).toBe(false);
    });
  });

  describe('retries', () => {
    it('should succeed on the second attempt with retry_times 2', async () => {
      const leaf = new StubLeaf('request', (_step, attempt) => {
        if (attempt === 1) throw new LeafError('connection reset', { category: 'network' });
        return { response: { statusCode: 200 } };
      });
      const ctx = createTestContext({ leaves: [leaf] });
      const result = await new LeafStepExecutor(request({ retryTimes: 2 }), ctx).execute();

      expect(result.status).toBe('success');
      expect(result.retryCount).toBe(1);
      expect(result.retryHistory).toHaveLength(2);
      expect(result.retryHistory[0]).toMatchObject({ attemptNumber: 1, success: false, errorType: 'LeafError' });
      expect(result.retryHistory[1]).toMatchObject({ attemptNumber: 2, success: true, delayBefore: 1 });
      expect(ctx.sleep).toHaveBeenCalledWith(1000);
    });

    it('should fail after exhausting the attempts', async () => {
      const leaf = new StubLeaf('request', () => {
        throw new LeafError('still down');
      });
      const ctx = createTestContext({ leaves: [leaf] });
      const result = await new LeafStepExecutor(request({ retryPolicy: { maxAttempts: 3, strategy: 'fixed', baseDelay: 0.5 } }), ctx).execute();

      expect(result.status).toBe('failure');
      expect(result.retryCount).toBe(2);
      expect(leaf.calls).toHaveLength(3);
      expect(result.errorInfo?.message).toBe('still down');
      expect(result.errorInfo?.context).toEqual({ step: 'call', stepType: 'request', attempts: 3 });
      expect(ctx.sleep.mock.calls).toEqual([[500], [500]]);
    });

    it('should not retry render errors', async () => {
      const leaf = new StubLeaf('request');
      const ctx = createTestContext({ leaves: [leaf] });
      const result = await new LeafStepExecutor(request({ url: '/x/${missing}', retryTimes: 3 }), ctx).execute();

      expect(result.status).toBe('failure');
      expect(result.errorInfo?.type).toBe('RenderError');
      expect(result.retryHistory).toHaveLength(1);
      expect(leaf.calls).toHaveLength(0);
    });

    it('should retry failed validations and keep the last response', async () => {
      const leaf = new StubLeaf('request', (_step, attempt) => ({ response: { statusCode: attempt === 1 ? 500 : 503 } }));
      const ctx = createTestContext({ leaves: [leaf] });
      const result = await new LeafStepExecutor(
        request({ retryTimes: 1, validations: [{ type: 'eq', path: '$.statusCode', expect: 200 }] }),
        ctx,
      ).execute();

      expect(result.status).toBe('failure');
      expect(result.errorInfo?.category).toBe('assertion');
      expect(result.response).toEqual({ statusCode: 503 });
      expect(result.validationResults[0]?.passed).toBe(false);
    });
  });

  describe('hooks', () => {
    it('should report a setup failure as error and still run teardown', async () => {
      const leaf = new StubLeaf('request');
      const ctx = createTestContext({ leaves: [leaf] });
      const result = await new LeafStepExecutor(
        request({ setup: { variables: { x: '${missing}' } }, teardown: { variables: { cleaned: true } } }),
        ctx,
      ).execute();

      expect(result.status).toBe('error');
      expect(result.errorInfo?.message).toBe('setup hook of "call" failed: Undefined variable: missing');
      expect(leaf.calls).toHaveLength(0);
      expect(ctx.variables.get('cleaned')).toBe(true);
    });

    it('should keep the status when teardown fails', async () => {
      const ctx = createTestContext({ leaves: [new StubLeaf('request')] });
      const result = await new LeafStepExecutor(request({ teardown: { variables: { x: '${missing}' } } }), ctx).execute();

      expect(result.status).toBe('success');
      expect(result.diagnostics).toEqual(['teardown hook of "call" failed: Undefined variable: missing']);
    });

    it('should expose setup variables to the step', async () => {
      const leaf = new StubLeaf('request');
      const ctx = createTestContext({ leaves: [leaf] });
      await new LeafStepExecutor(request({ setup: { variables: { page: 2 } }, url: '/items?page=${page}' }), ctx).execute();
      expect(leaf.calls[0]).toMatchObject({ url: '/items?page=2' });
    });
  });

  describe('extraction', () => {
    it('should record a failed extractor as a diagnostic', async () => {
      const ctx = createTestContext({ leaves: [new StubLeaf('request')] });
      const result = await new LeafStepExecutor(request({ extractors: [{ name: 'x', type: 'jsonpath', path: '$.nope' }] }), ctx).execute();

      expect(result.status).toBe('success');
      expect(result.diagnostics).toEqual(['Extractor "x" failed: Extractor "x": No value found for JSONPath $.nope']);
    });

    it('should store leaf-provided variables', async () => {
      const leaf = new StubLeaf('request', () => ({ response: {}, extractedVars: { sessionId: 's-1' } }));
      const ctx = createTestContext({ leaves: [leaf] });
      const result = await new LeafStepExecutor(request(), ctx).execute();
      expect(result.extractedVars).toEqual({ sessionId: 's-1' });
      expect(ctx.variables.get('sessionId')).toBe('s-1');
    });
  });

  describe('helpers', () => {
    it('should render database steps', () => {
      const variables = new VariableManager();
      variables.setMany('global', { table: 'users', id: 3 });
      expect(
        renderLeafStep({ type: 'database', name: 'q', sql: 'SELECT * FROM ${table} WHERE id = ?', params: ['${id}'] }, variables),
      ).toMatchObject({ sql: 'SELECT * FROM users WHERE id = ?', params: [3] });
    });

    it('should render expectations of nested validation rules', () => {
      const variables = new VariableManager();
      variables.setMany('global', { low: 1, names: ['a', 'b'] });
      const rule = renderValidationRule(
        {
          type: 'eq',
          path: '',
          logicalOperator: 'and',
          subValidations: [
            { type: 'gt', path: '$.count', expect: '${low}' },
            { type: 'in', path: '$.name', expect: '${names}' },
          ],
        },
        variables,
      );

      expect(rule.subValidations?.map((sub) => sub.expect)).toEqual([1, ['a', 'b']]);
    });

    it('should read nested step results from a group response', () => {
      expect(subResultsOf({ stepResults: [priorResult('a', 'success'), { bogus: true }] }).map((r) => r.name)).toEqual(['a']);
      expect(subResultsOf('nope')).toEqual([]);
    });
  });
});
