/**
 * @module leaf-registry
 * Registry of leaf operations: the side-effecting actions behind
 * `request`, `database` and `script` steps.
 *
 * The engine never looks inside a leaf's response; it only threads it to
 * extraction, validation and the step result.
 */

import { StepflowError } from './errors.js';
import { HttpLeaf } from './leaves/http-leaf.js';
import { SqliteLeaf } from './leaves/sqlite-leaf.js';
import type { Logger } from './logger.js';
import type { LeafStep, LeafStepType, StepOutcome, Variables } from './types.js';

// =====================================================================
// Leaf contract
// =====================================================================

/** Context handed to a leaf with each invocation */
export interface LeafContext {
  /** Merged variable view at invocation time */
  variables: Readonly<Variables>;
  /** Effective step timeout in milliseconds */
  timeoutMs: number;
  /** 1-based attempt number */
  attempt: number;
  logger: Logger;
  /** `false` when the active profile turns TLS certificate checks off */
  verifySsl?: boolean;
}

/**
 * A leaf operation. Receives the step with its template fields already
 * rendered; throws (ideally a `LeafError`) on failure.
 */
export interface LeafOperation {
  readonly type: LeafStepType;
  execute(step: LeafStep, context: LeafContext): Promise<StepOutcome>;
}

// =====================================================================
// Leaf Registry
// =====================================================================

/**
 * Registry that maps a leaf step type to its {@link LeafOperation}.
 */
export class LeafRegistry {
  private leaves = new Map<LeafStepType, LeafOperation>();

  /**
   * Register a leaf operation.
   *
   * @param leaf - Leaf instance (its `type` must not be registered yet)
   * @throws {Error} If a leaf for the same type is already registered
   */
  register(leaf: LeafOperation): this {
    if (this.leaves.has(leaf.type)) {
      throw new Error(`Leaf operation for "${leaf.type}" is already registered`);
    }
    this.leaves.set(leaf.type, leaf);
    return this;
  }

  /** Register, replacing any existing leaf of the same type. */
  replace(leaf: LeafOperation): this {
    this.leaves.set(leaf.type, leaf);
    return this;
  }

  /**
   * Get a leaf by step type.
   *
   * @returns The leaf, or `undefined` if none is registered
   */
  get(type: LeafStepType): LeafOperation | undefined {
    return this.leaves.get(type);
  }

  /**
   * Get a leaf by step type or fail.
   *
   * @throws {StepflowError} With code `LEAF_NOT_FOUND`
   */
  require(type: LeafStepType): LeafOperation {
    const leaf = this.leaves.get(type);
    if (!leaf) {
      throw new StepflowError(
        'LEAF_NOT_FOUND',
        `No leaf operation registered for "${type}" steps`,
        `Registered: ${this.list().join(', ') || 'none'}`,
      );
    }
    return leaf;
  }

  /**
   * List all registered step types.
   */
  list(): LeafStepType[] {
    return Array.from(this.leaves.keys());
  }
}

// =====================================================================
// Default Registry Factory
// =====================================================================

/**
 * Create a {@link LeafRegistry} with the bundled leaves:
 * - `request`  — HTTP via global fetch
 * - `database` — SQLite via better-sqlite3
 *
 * Script leaves are supplied by the embedder.
 */
export function createDefaultLeafRegistry(): LeafRegistry {
  return new LeafRegistry().register(new HttpLeaf()).register(new SqliteLeaf());
}
