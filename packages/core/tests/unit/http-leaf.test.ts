/**
 * Unit tests for leaves/http-leaf module.
 *
 * Tests cover:
 * - URL building from base_url and query parameters
 * - Request encoding (method, JSON body, headers)
 * - JSON response parsing
 * - Network, timeout and parse failures with categories
 * - Set-Cookie parsing
 * - Unverified TLS agent for profiles with verify_ssl off
 */

import { describe, it, expect, vi } from 'vitest';
import { Agent } from 'undici';
import { HttpLeaf, buildRequestUrl, parseSetCookies } from '../../src/leaves/http-leaf.js';
import { LeafError } from '../../src/errors.js';
import { silentLogger } from '../../src/logger.js';
import type { LeafContext } from '../../src/leaf-registry.js';
import type { RequestStep } from '../../src/types.js';

function context(timeoutMs = 1000): LeafContext {
  return { variables: { base_url: 'http://api.test' }, timeoutMs, attempt: 1, logger: silentLogger };
}

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } });
}

async function failure(promise: Promise<unknown>): Promise<LeafError> {
  const err = await promise.then(
    () => undefined,
    (e: unknown) => e,
  );
  if (!(err instanceof LeafError)) {
    throw new Error(`expected a LeafError, got ${String(err)}`);
  }
  return err;
}

describe('http-leaf', () => {
  describe('buildRequestUrl', () => {
    it('should join relative URLs with the base', () => {
      expect(buildRequestUrl('/users', undefined, 'http://api.test/')).toBe('http://api.test/users');
    });

    it('should keep absolute URLs', () => {
      expect(buildRequestUrl('https://other.test/x', undefined, 'http://api.test')).toBe('https://other.test/x');
    });

    it('should append query parameters, repeating list values', () => {
      expect(buildRequestUrl('http://x.test/a', { ids: [1, 2], q: 'a b', skip: null }, undefined)).toBe(
        'http://x.test/a?ids=1&ids=2&q=a+b',
      );
    });

    it('should require a base for relative URLs', () => {
      expect(() => buildRequestUrl('/users', undefined, undefined)).toThrow(
        'Relative URL "/users" needs a base_url variable or profile setting',
      );
    });
  });

  describe('parseSetCookies', () => {
    it('should keep name/value pairs and drop attributes', () => {
      expect(parseSetCookies(['sid=abc; Path=/', 'bad', 'theme=dark'])).toEqual({ sid: 'abc', theme: 'dark' });
    });
  });

  describe('execute', () => {
    it('should send a JSON body and parse the JSON response', async () => {
      const fakeFetch = vi.fn<Parameters<typeof fetch>, Promise<Response>>(async () => jsonResponse({ id: 1 }, 201));
      const leaf = new HttpLeaf({ fetch: fakeFetch });
      const step: RequestStep = { type: 'request', name: 'create', method: 'post', url: '/users', params: { page: 2 }, body: { a: 1 } };

      const outcome = await leaf.execute(step, context());

      const [url, init] = fakeFetch.mock.calls[0] ?? [];
      expect(url).toBe('http://api.test/users?page=2');
      expect(init?.method).toBe('POST');
      expect(init?.headers).toEqual({ 'Content-Type': 'application/json' });
      expect(init?.body).toBe('{"a":1}');
      expect(outcome.response).toMatchObject({
        url: 'http://api.test/users?page=2',
        method: 'POST',
        statusCode: 201,
        body: { id: 1 },
        cookies: {},
      });
      expect(outcome.performance?.size).toBe(8);
    });

    it('should send through an unverified agent only when verifySsl is false', async () => {
      const fakeFetch = vi.fn<Parameters<typeof fetch>, Promise<Response>>(async () => new Response('ok'));
      const leaf = new HttpLeaf({ fetch: fakeFetch });
      const step: RequestStep = { type: 'request', name: 'get', url: '/ping' };

      await leaf.execute(step, context());
      await leaf.execute(step, { ...context(), verifySsl: false });
      await leaf.execute(step, { ...context(), verifySsl: false });

      const dispatchers = fakeFetch.mock.calls.map((call) => call[1]?.dispatcher);
      expect(dispatchers[0]).toBeUndefined();
      expect(dispatchers[1]).toBeInstanceOf(Agent);
      expect(dispatchers[2]).toBe(dispatchers[1]);
      await leaf.close();
    });

    it('should not send a body with GET', async () => {
      const fakeFetch = vi.fn<Parameters<typeof fetch>, Promise<Response>>(async () => new Response('ok'));
      const leaf = new HttpLeaf({ fetch: fakeFetch });
      const outcome = await leaf.execute({ type: 'request', name: 'get', url: '/ping', body: { a: 1 } }, context());
      expect(fakeFetch.mock.calls[0]?.[1]?.body).toBeUndefined();
      expect(outcome.response).toMatchObject({ statusCode: 200, body: 'ok' });
    });

    it('should report network failures', async () => {
      const fakeFetch = vi.fn<Parameters<typeof fetch>, Promise<Response>>(async () => {
        throw new TypeError('fetch failed');
      });
      const err = await failure(new HttpLeaf({ fetch: fakeFetch }).execute({ type: 'request', name: 'x', url: '/x' }, context()));
      expect(err.category).toBe('network');
      expect(err.message).toBe('Request GET http://api.test/x failed: network error fetch failed');
    });

    it('should abort and report a timeout', async () => {
      const fakeFetch = vi.fn<Parameters<typeof fetch>, Promise<Response>>(
        (_input, init) =>
          new Promise<Response>((_resolve, reject) => {
            init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
          }),
      );
      const err = await failure(new HttpLeaf({ fetch: fakeFetch }).execute({ type: 'request', name: 'slow', url: '/slow' }, context(10)));
      expect(err.category).toBe('timeout');
      expect(err.message).toBe('Request GET http://api.test/slow timed out after 10ms');
    });

    it('should keep the raw response when JSON parsing fails', async () => {
      const fakeFetch = vi.fn<Parameters<typeof fetch>, Promise<Response>>(
        async () => new Response('{oops', { status: 200, headers: { 'content-type': 'application/json' } }),
      );
      const err = await failure(new HttpLeaf({ fetch: fakeFetch }).execute({ type: 'request', name: 'x', url: '/x' }, context()));
      expect(err.category).toBe('parsing');
      expect(err.partialResponse).toMatchObject({ statusCode: 200, body: '{oops' });
    });

    it('should refuse other step types', async () => {
      const err = await failure(
        new HttpLeaf().execute({ type: 'database', name: 'db', sql: 'SELECT 1' }, context()),
      );
      expect(err.message).toBe('HTTP leaf cannot run "database" steps');
    });
  });
});
