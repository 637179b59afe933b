/**
 * @module leaves/sqlite-leaf
 * SQLite leaf operation for `database` steps, built on better-sqlite3.
 *
 * Step fields:
 * - `database.path` — database file (`:memory:` allowed)
 * - `operation`     — `query` (rows) or `exec` (changes)
 * - `sql`, `params` — statement and positional/named parameters
 */

import Database from 'better-sqlite3';
import { LeafError } from '../errors.js';
import { isRecord } from '../helpers.js';
import type { LeafContext, LeafOperation } from '../leaf-registry.js';
import type { LeafStep, StepOutcome } from '../types.js';

export interface QueryResponse {
  operation: 'query';
  rows: unknown[];
  rowCount: number;
}

export interface ExecResponse {
  operation: 'exec';
  changes: number;
  lastInsertRowid: number | bigint;
}

/**
 * Leaf that runs one SQL statement per invocation.
 *
 * Connections are opened per database path and kept until {@link SqliteLeaf.close}.
 */
export class SqliteLeaf implements LeafOperation {
  readonly type = 'database';
  private readonly connections = new Map<string, Database.Database>();

  async execute(step: LeafStep, context: LeafContext): Promise<StepOutcome> {
    if (step.type !== 'database') {
      throw new LeafError(`SQLite leaf cannot run "${step.type}" steps`);
    }

    const dbPath = step.database?.path;
    if (typeof dbPath !== 'string' || dbPath === '') {
      throw new LeafError(`Database step "${step.name}" needs database.path`);
    }
    const dbType = step.database?.type;
    if (dbType !== undefined && dbType !== 'sqlite') {
      throw new LeafError(`Unsupported database type "${String(dbType)}" (only sqlite is bundled)`);
    }

    const db = this.connection(dbPath);
    const params = step.params === undefined ? [] : Array.isArray(step.params) ? step.params : [step.params];
    const started = Date.now();

    try {
      const statement = db.prepare(step.sql);
      const operation = step.operation ?? (statement.reader ? 'query' : 'exec');

      let response: QueryResponse | ExecResponse;
      if (operation === 'query') {
        const rows = statement.all(...params);
        response = { operation, rows, rowCount: rows.length };
      } else {
        const info = statement.run(...params);
        response = { operation, changes: info.changes, lastInsertRowid: info.lastInsertRowid };
      }

      context.logger.debug(`sqlite ${operation} on ${dbPath}`, { sql: step.sql });
      return { response, performance: { totalTime: Date.now() - started } };
    } catch (err) {
      if (err instanceof LeafError) throw err;
      throw new LeafError(`SQL failed on ${dbPath}: ${err instanceof Error ? err.message : String(err)}`, { cause: err });
    }
  }

  /** Close every open connection. */
  close(): void {
    for (const db of this.connections.values()) {
      db.close();
    }
    this.connections.clear();
  }

  private connection(dbPath: string): Database.Database {
    let db = this.connections.get(dbPath);
    if (!db) {
      db = new Database(dbPath);
      if (dbPath !== ':memory:') {
        db.pragma('journal_mode = WAL');
        db.pragma('busy_timeout = 5000');
      }
      this.connections.set(dbPath, db);
    }
    return db;
  }
}

/** True when a response came from a `query` operation. */
export function isQueryResponse(value: unknown): value is QueryResponse {
  return isRecord(value) && value.operation === 'query' && Array.isArray(value.rows);
}
