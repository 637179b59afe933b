/**
 * @module variable-manager
 * Layered variable store with a cached merged view and `${...}` rendering.
 *
 * Lookup priority, highest first: extracted → override → profile → global,
 * then the read-only `config` context, then the caller's default.
 *
 * Templates:
 * - `${name}`, `${user.id}`, `${items[0]}` → variable lookups
 * - `${uuid()}`, `${random_str(12)}`      → template functions
 * - A template that is exactly one reference keeps the value's type;
 *   anything else renders to a string.
 */

import { RenderError } from './errors.js';
import { isRecord, stringifyValue } from './helpers.js';
import { silentLogger, type Logger } from './logger.js';
import { evaluateExpression } from './template-expression.js';
import { TemplateFunctionRegistry } from './template-functions.js';
import type {
  VariableChange,
  VariableDelta,
  VariableScope,
  VariableSnapshot,
  VariableSource,
  Variables,
} from './types.js';

/** Default cap on re-render passes for variables that reference variables */
export const DEFAULT_MAX_ITERATIONS = 10;

const REFERENCE = /\$\{([^{}]+)\}/g;
const WHOLE_REFERENCE = /^\$\{([^{}]+)\}$/;
const HAS_REFERENCE = /\$\{[^{}]+\}/;

/** Scopes in lookup order, highest priority first */
const LOOKUP_ORDER: readonly VariableScope[] = ['extracted', 'override', 'profile', 'global'];

export interface VariableManagerOptions {
  functions?: TemplateFunctionRegistry;
  logger?: Logger;
  maxIterations?: number;
}

/**
 * Compare two merged variable views.
 */
export function computeDelta(before: Variables, after: Variables): VariableDelta {
  const delta: VariableDelta = { added: {}, modified: {}, deleted: [] };
  for (const [name, value] of Object.entries(after)) {
    if (!Object.prototype.hasOwnProperty.call(before, name)) {
      delta.added[name] = value;
    } else if (!Object.is(before[name], value)) {
      delta.modified[name] = { before: before[name], after: value };
    }
  }
  for (const name of Object.keys(before)) {
    if (!Object.prototype.hasOwnProperty.call(after, name)) {
      delta.deleted.push(name);
    }
  }
  return delta;
}

/**
 * Variable store shared by every step of a test case.
 *
 * All mutation goes through {@link VariableManager.set} (or the helpers built
 * on it), which bumps a monotonic version counter; the merged view is
 * rebuilt lazily on the first read after a bump.
 */
export class VariableManager {
  private scopes: Record<VariableScope, Variables> = {
    global: {},
    profile: {},
    override: {},
    extracted: {},
  };
  private configContext: Variables = {};
  private versionCounter = 0;
  private cache: { version: number; view: Variables } | null = null;
  private tracking = false;
  private changes: VariableChange[] = [];

  readonly functions: TemplateFunctionRegistry;
  readonly maxIterations: number;
  private readonly logger: Logger;

  constructor(options: VariableManagerOptions = {}) {
    this.functions = options.functions ?? new TemplateFunctionRegistry();
    this.logger = options.logger ?? silentLogger;
    this.maxIterations = options.maxIterations ?? DEFAULT_MAX_ITERATIONS;
  }

  /** Monotonic counter, bumped by every mutation */
  get version(): number {
    return this.versionCounter;
  }

  // ===== Mutation =====

  /**
   * Set a variable in one scope.
   */
  set(scope: VariableScope, name: string, value: unknown): void {
    const target = this.scopes[scope];
    if (this.tracking) {
      this.changes.push({ name, scope, oldValue: target[name], newValue: value, timestamp: Date.now() });
    }
    target[name] = value;
    this.versionCounter++;
  }

  /**
   * Set several variables in one scope.
   */
  setMany(scope: VariableScope, variables: Variables): void {
    for (const [name, value] of Object.entries(variables)) {
      this.set(scope, name, value);
    }
  }

  /** Runtime override for a single name (override scope). */
  setProfileOverride(name: string, value: unknown): void {
    this.set('override', name, value);
  }

  /**
   * Replace the read-only `config` context, reachable as `${config.xxx}`.
   */
  setConfigContext(context: Variables): void {
    this.configContext = { ...context };
    this.versionCounter++;
  }

  /** Remove every extracted variable. */
  clearExtracted(): void {
    this.clearScope('extracted');
  }

  clearScope(scope: VariableScope): void {
    this.scopes[scope] = {};
    this.versionCounter++;
  }

  /**
   * Copy environment variables into the global scope.
   *
   * @param prefix - Only names starting with this prefix; the prefix is stripped
   * @param override - Replace names that already exist in the global scope
   * @param env - Source environment (defaults to `process.env`)
   * @returns The variables that were loaded
   */
  loadEnvironmentVariables(prefix = '', override = false, env: NodeJS.ProcessEnv = process.env): Variables {
    const loaded: Variables = {};
    for (const [key, value] of Object.entries(env)) {
      if (value === undefined || !key.startsWith(prefix)) continue;
      const name = key.slice(prefix.length);
      if (!name) continue;
      if (!override && Object.prototype.hasOwnProperty.call(this.scopes.global, name)) continue;
      this.set('global', name, value);
      loaded[name] = value;
    }
    return loaded;
  }

  // ===== Lookup =====

  /**
   * Resolve a name by scope priority.
   */
  get(name: string, defaultValue?: unknown): unknown {
    const view = this.allVariables();
    return Object.prototype.hasOwnProperty.call(view, name) ? view[name] : defaultValue;
  }

  has(name: string): boolean {
    return Object.prototype.hasOwnProperty.call(this.allVariables(), name);
  }

  /**
   * Resolve a name and report which layer supplied it.
   */
  getWithSource(name: string, defaultValue?: unknown): { value: unknown; source: VariableSource } {
    for (const scope of LOOKUP_ORDER) {
      const vars = this.scopes[scope];
      if (Object.prototype.hasOwnProperty.call(vars, name)) {
        return { value: vars[name], source: scope };
      }
    }
    if (name === 'config' && Object.keys(this.configContext).length > 0) {
      return { value: this.configContext, source: 'config' };
    }
    return { value: defaultValue, source: 'default' };
  }

  /**
   * Merged view of all scopes. Cached until the next mutation.
   */
  allVariables(): Readonly<Variables> {
    if (this.cache && this.cache.version === this.versionCounter) {
      return this.cache.view;
    }
    const view: Variables = {};
    if (Object.keys(this.configContext).length > 0) {
      view.config = this.configContext;
    }
    Object.assign(view, this.scopes.global, this.scopes.profile, this.scopes.override, this.scopes.extracted);
    this.cache = { version: this.versionCounter, view };
    return view;
  }

  /** Copy of a single scope */
  scope(scope: VariableScope): Variables {
    return { ...this.scopes[scope] };
  }

  // ===== Rendering =====

  /**
   * Render `${...}` references in a template.
   *
   * Passes repeat until nothing changes or no reference is left, at most
   * `maxIterations` times. Reaching the cap returns the last value and logs a
   * warning; a cycle between variables is a configuration error.
   *
   * @param template - Template; non-strings are returned unchanged
   * @param maxIterations - Render pass cap
   * @throws {RenderError} When a reference names an undefined variable
   */
  render(template: unknown, maxIterations = this.maxIterations): unknown {
    let current: unknown = template;
    for (let pass = 0; pass < maxIterations; pass++) {
      if (typeof current !== 'string' || !HAS_REFERENCE.test(current)) {
        return current;
      }
      const next = this.renderOnce(current);
      if (next === current) {
        return current;
      }
      current = next;
    }
    if (typeof current === 'string' && HAS_REFERENCE.test(current)) {
      this.logger.warn(`Template still has references after ${maxIterations} render passes`, {
        template: stringifyValue(template),
        result: current,
      });
    }
    return current;
  }

  /**
   * Render to a string regardless of the referenced value's type.
   */
  renderString(template: string): string {
    return stringifyValue(this.render(template));
  }

  /**
   * Apply {@link render} to every string leaf of a nested structure.
   * Keys are not rendered; non-string leaves are returned as-is.
   */
  renderStructured(value: unknown): unknown {
    if (typeof value === 'string') {
      return this.render(value);
    }
    if (Array.isArray(value)) {
      return value.map((item) => this.renderStructured(item));
    }
    if (isRecord(value)) {
      const out: Variables = {};
      for (const [key, item] of Object.entries(value)) {
        out[key] = this.renderStructured(item);
      }
      return out;
    }
    return value;
  }

  private renderOnce(template: string): unknown {
    const whole = WHOLE_REFERENCE.exec(template.trim());
    if (whole?.[1] !== undefined) {
      return this.evaluate(whole[1]);
    }
    return template.replace(REFERENCE, (_match, expr: string) => stringifyValue(this.evaluate(expr)));
  }

  private evaluate(expr: string): unknown {
    const view = this.allVariables();
    try {
      return evaluateExpression(expr.trim(), {
        lookup: (name) => ({
          found: Object.prototype.hasOwnProperty.call(view, name),
          value: view[name],
        }),
        functions: this.functions,
      });
    } catch (err) {
      if (err instanceof RenderError) throw err;
      throw new RenderError(`Failed to render \${${expr}}: ${err instanceof Error ? err.message : String(err)}`);
    }
  }

  // ===== Snapshots =====

  /**
   * Capture every scope for later {@link restore}.
   */
  snapshot(): VariableSnapshot {
    return {
      global: { ...this.scopes.global },
      profile: { ...this.scopes.profile },
      override: { ...this.scopes.override },
      extracted: { ...this.scopes.extracted },
      config: { ...this.configContext },
      version: this.versionCounter,
    };
  }

  /**
   * Repoint every scope at a snapshot's contents. The version counter keeps
   * increasing so cached views are never reused across a restore.
   */
  restore(snapshot: VariableSnapshot): void {
    this.scopes = {
      global: { ...snapshot.global },
      profile: { ...snapshot.profile },
      override: { ...snapshot.override },
      extracted: { ...snapshot.extracted },
    };
    this.configContext = { ...snapshot.config };
    this.versionCounter++;
  }

  /**
   * Run `fn` with temporary extracted variables; every scope is restored once
   * `fn` settles, discarding what it wrote.
   */
  async withScope<T>(variables: Variables, fn: () => Promise<T>): Promise<T> {
    const saved = this.snapshot();
    this.setMany('extracted', variables);
    try {
      return await fn();
    } finally {
      this.restore(saved);
    }
  }

  computeDelta(before: Variables, after: Variables = { ...this.allVariables() }): VariableDelta {
    return computeDelta(before, after);
  }

  // ===== Change tracking =====

  enableTracking(enabled = true): void {
    this.tracking = enabled;
  }

  changeHistory(): readonly VariableChange[] {
    return this.changes;
  }

  clearHistory(): void {
    this.changes = [];
  }

  // ===== Helpers =====

  /**
   * Run a regular expression over text and return one capture group.
   *
   * @returns The group text, or `undefined` when there is no match
   */
  extractFromString(text: string, pattern: string, group = 1): string | undefined {
    const match = new RegExp(pattern).exec(text);
    return match?.[group];
  }
}
