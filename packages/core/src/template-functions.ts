/**
 * @module template-functions
 * Built-in functions callable from `${...}` templates, e.g.
 * `${random_str(12)}` or `${date("%Y%m%d")}`.
 */

import { randomInt, randomUUID } from 'node:crypto';
import { RenderError } from './errors.js';

export type TemplateFunction = (...args: unknown[]) => unknown;

const ALPHANUMERIC = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789';

function intArg(fn: string, value: unknown, fallback?: number): number {
  if (value === undefined && fallback !== undefined) return fallback;
  const n = typeof value === 'string' ? Number(value) : value;
  if (typeof n !== 'number' || !Number.isInteger(n)) {
    throw new RenderError(`${fn}() expects an integer argument, got ${JSON.stringify(value)}`);
  }
  return n;
}

function randomBetween(fn: string, minArg: unknown, maxArg: unknown, defaults: [number, number] | []): number {
  const min = intArg(fn, minArg, defaults[0]);
  const max = intArg(fn, maxArg, defaults[1]);
  if (max < min) {
    throw new RenderError(`${fn}() max (${max}) is smaller than min (${min})`);
  }
  return randomInt(min, max + 1);
}

function pad(n: number, width = 2): string {
  return String(n).padStart(width, '0');
}

/**
 * Format a date with the strftime subset `%Y %m %d %H %M %S %f %%`.
 */
export function formatDate(date: Date, format: string): string {
  return format.replace(/%([YmdHMSf%])/g, (_, code: string) => {
    switch (code) {
      case 'Y': return String(date.getFullYear());
      case 'm': return pad(date.getMonth() + 1);
      case 'd': return pad(date.getDate());
      case 'H': return pad(date.getHours());
      case 'M': return pad(date.getMinutes());
      case 'S': return pad(date.getSeconds());
      case 'f': return pad(date.getMilliseconds() * 1000, 6);
      default: return '%';
    }
  });
}

/** Functions available unqualified in every template. */
export const BUILTIN_FUNCTIONS: Readonly<Record<string, TemplateFunction>> = {
  random: (min?: unknown, max?: unknown) => randomBetween('random', min, max, [0, 1_000_000]),
  randint: (min?: unknown, max?: unknown) => randomBetween('randint', min, max, []),
  random_str: (length?: unknown, chars?: unknown) => {
    const size = intArg('random_str', length, 8);
    const alphabet = typeof chars === 'string' && chars.length > 0 ? chars : ALPHANUMERIC;
    let out = '';
    for (let i = 0; i < size; i++) {
      out += alphabet.charAt(randomInt(alphabet.length));
    }
    return out;
  },
  uuid: () => randomUUID().replace(/-/g, ''),
  uuid4: () => randomUUID(),
  timestamp: () => Math.floor(Date.now() / 1000),
  timestamp_ms: () => Date.now(),
  date: (format?: unknown) =>
    formatDate(new Date(), typeof format === 'string' ? format : '%Y-%m-%d %H:%M:%S'),
  now: () => new Date().toISOString(),
  choice: (items?: unknown) => {
    if (!Array.isArray(items) || items.length === 0) {
      throw new RenderError('choice() expects a non-empty list');
    }
    return items[randomInt(items.length)];
  },
};

/**
 * Registry of template functions, seeded with the built-ins.
 */
export class TemplateFunctionRegistry {
  private readonly functions = new Map<string, TemplateFunction>(Object.entries(BUILTIN_FUNCTIONS));

  /**
   * Register (or replace) a function.
   */
  register(name: string, fn: TemplateFunction): void {
    if (!/^[A-Za-z_]\w*$/.test(name)) {
      throw new Error(`Invalid template function name: "${name}"`);
    }
    this.functions.set(name, fn);
  }

  get(name: string): TemplateFunction | undefined {
    return this.functions.get(name);
  }

  has(name: string): boolean {
    return this.functions.has(name);
  }

  list(): string[] {
    return Array.from(this.functions.keys());
  }
}
