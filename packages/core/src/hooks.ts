/**
 * @module hooks
 * Setup/teardown hooks around a step or a whole test case.
 *
 * The default runner understands two keys:
 * - `variables` — rendered and written to the extracted scope
 * - `sleep`     — pause in milliseconds
 */

import { HookError } from './errors.js';
import type { HookConfig } from './types.js';
import type { VariableManager } from './variable-manager.js';

export type HookPhase = 'setup' | 'teardown';

export interface HookContext {
  /** Step or test case name, for messages */
  owner: string;
  variables: VariableManager;
  sleep: (ms: number) => Promise<void>;
}

export interface HookRunner {
  run(phase: HookPhase, hook: HookConfig, context: HookContext): Promise<void>;
}

/**
 * Built-in hook runner. Failures surface as {@link HookError}.
 */
export class DefaultHookRunner implements HookRunner {
  async run(phase: HookPhase, hook: HookConfig, context: HookContext): Promise<void> {
    try {
      if (hook.variables) {
        for (const [name, value] of Object.entries(hook.variables)) {
          context.variables.set('extracted', name, context.variables.renderStructured(value));
        }
      }
      if (hook.sleep !== undefined) {
        if (!Number.isFinite(hook.sleep) || hook.sleep < 0) {
          throw new Error(`sleep must be a non-negative number of milliseconds, got ${hook.sleep}`);
        }
        await context.sleep(hook.sleep);
      }
    } catch (err) {
      if (err instanceof HookError) throw err;
      throw new HookError(phase, `${phase} hook of "${context.owner}" failed: ${err instanceof Error ? err.message : String(err)}`);
    }
  }
}
