/**
 * FlatDoc SQLite Adapter — better-sqlite3
 *
 * better-sqlite3 is synchronous; the adapter keeps the async SqlExecutor
 * shape so the engine is written once for both dialects. One connection per
 * session, so a transaction is simply BEGIN … COMMIT on that connection.
 */

import Database from 'better-sqlite3';
import type { DatabaseAdapter } from './adapter.js';
import { redactUri } from './adapter.js';
import type { AdapterStatus, FlatDocConfig, QueryResult, SqlExecutor, SqlRow } from '../types.js';
import { FlatDocError, mapSqlError } from '../errors.js';
import type { FlatDocEventEmitter } from '../events.js';

export const MEMORY_PATH = ':memory:';

/**
 * `sqlite::memory:` → `:memory:`, `sqlite:data/app.db` → `data/app.db`,
 * `file:///tmp/app.db` → `/tmp/app.db`.
 */
export function sqlitePathFromUri(uri: string): string {
  const rest = uri.startsWith('sqlite:') ? uri.slice('sqlite:'.length) : uri.slice('file:'.length);
  if (rest === MEMORY_PATH || rest === '') return MEMORY_PATH;
  return rest.startsWith('//') ? rest.slice(2) : rest;
}

export class SqliteAdapter implements DatabaseAdapter {
  readonly dialect = 'sqlite' as const;
  readonly driver = 'better-sqlite3' as const;

  private config: FlatDocConfig;
  private emitter: FlatDocEventEmitter;
  private db: Database.Database | null = null;
  private connectedAt: Date | null = null;

  constructor(config: FlatDocConfig, emitter: FlatDocEventEmitter) {
    this.config = config;
    this.emitter = emitter;
  }

  async connect(): Promise<void> {
    const path = sqlitePathFromUri(this.config.uri);
    try {
      const db = new Database(path);
      if (path !== MEMORY_PATH) db.pragma('journal_mode = WAL');
      this.db = db;
      this.connectedAt = new Date();
      this.emitter.emit('connected', { dialect: this.dialect, label: this.config.label ?? 'SQLite' });
    } catch (err) {
      throw mapSqlError(err);
    }
  }

  async close(): Promise<void> {
    if (!this.db) return;
    this.db.close();
    this.db = null;
    this.connectedAt = null;
    this.emitter.emit('disconnected', { dialect: this.dialect, reason: 'closed', timestamp: new Date() });
  }

  status(): AdapterStatus {
    return {
      state: this.connectedAt ? 'connected' : 'disconnected',
      dialect: this.dialect,
      driver: this.driver,
      uri: redactUri(this.config.uri),
      uptimeMs: this.connectedAt ? Date.now() - this.connectedAt.getTime() : 0,
    };
  }

  async query<R extends SqlRow = SqlRow>(sql: string, params: unknown[] = []): Promise<QueryResult<R>> {
    const stmt = this.handle().prepare<unknown[], R>(sql);
    if (stmt.reader) {
      const rows = stmt.all(...params);
      return { rows, rowCount: rows.length };
    }
    const info = stmt.run(...params);
    return { rows: [], rowCount: info.changes };
  }

  async withTransaction<T>(fn: (tx: SqlExecutor) => Promise<T>): Promise<T> {
    const db = this.handle();
    db.exec('BEGIN IMMEDIATE');
    try {
      const result = await fn(this);
      db.exec('COMMIT');
      return result;
    } catch (err) {
      if (db.inTransaction) db.exec('ROLLBACK');
      throw err;
    }
  }

  private handle(): Database.Database {
    if (!this.db) {
      throw new FlatDocError({
        code: 'CONNECTION_FAILED',
        message: 'SQLite database is not open.',
        fix: 'Create the session with FlatDoc.create() and do not use it after close().',
      });
    }
    return this.db;
  }
}
