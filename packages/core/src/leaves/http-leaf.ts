/**
 * @module leaves/http-leaf
 * HTTP leaf operation for `request` steps, built on the global `fetch`.
 *
 * Profiles with `verify_ssl: false` send their requests through an undici
 * agent that accepts any server certificate.
 */

import { Agent } from 'undici';
import { LeafError } from '../errors.js';
import type { LeafContext, LeafOperation } from '../leaf-registry.js';
import type { LeafStep, StepOutcome, Variables } from '../types.js';

/** Response shape produced by {@link HttpLeaf} */
export interface HttpResponse {
  url: string;
  method: string;
  statusCode: number;
  headers: Record<string, string>;
  cookies: Record<string, string>;
  body: unknown;
  elapsedMs: number;
}

export interface HttpLeafOptions {
  /** Replacement fetch, e.g. for tests */
  fetch?: typeof fetch;
}

/**
 * Join a step URL with `base_url` and append query parameters.
 *
 * @throws {LeafError} When the URL is relative and no base is available
 */
export function buildRequestUrl(url: string, params: Variables | undefined, baseUrl: unknown): string {
  let full = url;
  if (!/^https?:\/\//i.test(url)) {
    if (typeof baseUrl !== 'string' || baseUrl === '') {
      throw new LeafError(`Relative URL "${url}" needs a base_url variable or profile setting`);
    }
    full = `${baseUrl.replace(/\/+$/, '')}/${url.replace(/^\/+/, '')}`;
  }
  if (!params || Object.keys(params).length === 0) {
    return full;
  }
  const parsed = new URL(full);
  for (const [key, value] of Object.entries(params)) {
    if (value === undefined || value === null) continue;
    if (Array.isArray(value)) {
      for (const item of value) parsed.searchParams.append(key, String(item));
    } else {
      parsed.searchParams.append(key, typeof value === 'object' ? JSON.stringify(value) : String(value));
    }
  }
  return parsed.toString();
}

/** Parse `Set-Cookie` header values into a name → value map. */
export function parseSetCookies(values: string[]): Record<string, string> {
  const cookies: Record<string, string> = {};
  for (const header of values) {
    const pair = header.split(';', 1)[0] ?? '';
    const eq = pair.indexOf('=');
    if (eq <= 0) continue;
    cookies[pair.slice(0, eq).trim()] = pair.slice(eq + 1).trim();
  }
  return cookies;
}

function failureCause(err: unknown): string {
  if (!(err instanceof Error)) return String(err);
  const cause: unknown = err.cause;
  if (cause instanceof Error) return `${err.message} (${cause.message})`;
  return err.message;
}

/**
 * Leaf that sends one HTTP request per invocation.
 */
export class HttpLeaf implements LeafOperation {
  readonly type = 'request';
  private readonly fetchImpl: typeof fetch;
  private insecureAgent?: Agent;

  constructor(options: HttpLeafOptions = {}) {
    this.fetchImpl = options.fetch ?? fetch;
  }

  /** Close the agent used for unverified TLS, if one was created. */
  async close(): Promise<void> {
    const agent = this.insecureAgent;
    this.insecureAgent = undefined;
    await agent?.close();
  }

  private unverifiedAgent(): Agent {
    if (!this.insecureAgent) {
      this.insecureAgent = new Agent({ connect: { rejectUnauthorized: false } });
    }
    return this.insecureAgent;
  }

  async execute(step: LeafStep, context: LeafContext): Promise<StepOutcome> {
    if (step.type !== 'request') {
      throw new LeafError(`HTTP leaf cannot run "${step.type}" steps`);
    }

    const method = (step.method ?? 'GET').toUpperCase();
    const url = buildRequestUrl(step.url, step.params, context.variables.base_url);
    const headers: Record<string, string> = { ...(step.headers ?? {}) };

    const init: RequestInit = { method, headers };
    if (context.verifySsl === false) {
      init.dispatcher = this.unverifiedAgent();
    }
    if (step.body !== undefined && step.body !== null && method !== 'GET' && method !== 'HEAD') {
      if (typeof step.body === 'string') {
        init.body = step.body;
      } else {
        if (!headers['Content-Type'] && !headers['content-type']) {
          headers['Content-Type'] = 'application/json';
        }
        init.body = JSON.stringify(step.body);
      }
    }

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), context.timeoutMs);
    init.signal = controller.signal;
    const started = Date.now();

    try {
      let response: Response;
      try {
        response = await this.fetchImpl(url, init);
      } catch (err) {
        if (controller.signal.aborted) {
          throw new LeafError(`Request ${method} ${url} timed out after ${context.timeoutMs}ms`, {
            category: 'timeout',
            cause: err,
          });
        }
        throw new LeafError(`Request ${method} ${url} failed: network error ${failureCause(err)}`, {
          category: 'network',
          cause: err,
        });
      }

      const text = await response.text();
      const responseHeaders: Record<string, string> = {};
      response.headers.forEach((value, key) => {
        responseHeaders[key] = value;
      });

      const result: HttpResponse = {
        url,
        method,
        statusCode: response.status,
        headers: responseHeaders,
        cookies: parseSetCookies(response.headers.getSetCookie()),
        body: text,
        elapsedMs: Date.now() - started,
      };

      const contentType = response.headers.get('content-type') ?? '';
      if (contentType.includes('json') && text.trim() !== '') {
        try {
          result.body = JSON.parse(text);
        } catch (err) {
          throw new LeafError(
            `Failed to parse JSON response from ${url}: ${err instanceof Error ? err.message : String(err)}`,
            { category: 'parsing', partialResponse: result, cause: err },
          );
        }
      }

      context.logger.debug(`${method} ${url} -> ${response.status}`, { elapsedMs: result.elapsedMs });

      return {
        response: result,
        performance: { totalTime: result.elapsedMs, size: Buffer.byteLength(text) },
      };
    } finally {
      clearTimeout(timer);
    }
  }
}
