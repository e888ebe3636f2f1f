/**
 * FlatDoc PostgreSQL Adapter — pg Pool
 *
 * Reads go straight to the pool. A transaction checks out one client, runs
 * BEGIN … COMMIT on it and releases it afterwards.
 */

import pg from 'pg';
import type { DatabaseAdapter } from './adapter.js';
import { redactUri } from './adapter.js';
import type { AdapterStatus, FlatDocConfig, PoolPreset, QueryResult, SqlExecutor, SqlRow } from '../types.js';
import { FlatDocError, mapSqlError } from '../errors.js';
import type { FlatDocEventEmitter } from '../events.js';

export const POOL_SIZES: Record<PoolPreset, number> = {
  high: 20,
  standard: 10,
  low: 3,
};

/** Executor bound to one checked-out client. */
class PgClientExecutor implements SqlExecutor {
  constructor(private readonly client: pg.PoolClient) {}

  async query<R extends SqlRow = SqlRow>(sql: string, params: unknown[] = []): Promise<QueryResult<R>> {
    const result = await this.client.query<R>(sql, params);
    return { rows: result.rows, rowCount: result.rowCount ?? 0 };
  }
}

export class PgAdapter implements DatabaseAdapter {
  readonly dialect = 'pg' as const;
  readonly driver = 'pg' as const;

  private config: FlatDocConfig;
  private emitter: FlatDocEventEmitter;
  private pool: pg.Pool | null = null;
  private connectedAt: Date | null = null;

  constructor(config: FlatDocConfig, emitter: FlatDocEventEmitter) {
    this.config = config;
    this.emitter = emitter;
  }

  async connect(): Promise<void> {
    const pool = new pg.Pool({
      connectionString: this.config.uri,
      max: POOL_SIZES[this.config.pool ?? 'standard'],
    });
    // An idle client dropped by the server surfaces here instead of crashing the process
    pool.on('error', err => {
      this.emitter.emit('disconnected', { dialect: this.dialect, reason: err.message, timestamp: new Date() });
    });

    try {
      await pool.query('SELECT 1');
    } catch (err) {
      await pool.end();
      throw mapSqlError(err);
    }

    this.pool = pool;
    this.connectedAt = new Date();
    this.emitter.emit('connected', { dialect: this.dialect, label: this.config.label ?? 'PostgreSQL' });
  }

  async close(): Promise<void> {
    if (!this.pool) return;
    const pool = this.pool;
    this.pool = null;
    this.connectedAt = null;
    await pool.end();
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
    const result = await this.handle().query<R>(sql, params);
    return { rows: result.rows, rowCount: result.rowCount ?? 0 };
  }

  async withTransaction<T>(fn: (tx: SqlExecutor) => Promise<T>): Promise<T> {
    const client = await this.handle().connect();
    try {
      await client.query('BEGIN');
      const result = await fn(new PgClientExecutor(client));
      await client.query('COMMIT');
      return result;
    } catch (err) {
      await client.query('ROLLBACK');
      throw err;
    } finally {
      client.release();
    }
  }

  private handle(): pg.Pool {
    if (!this.pool) {
      throw new FlatDocError({
        code: 'CONNECTION_FAILED',
        message: 'PostgreSQL pool is not open.',
        fix: 'Create the session with FlatDoc.create() and do not use it after close().',
      });
    }
    return this.pool;
  }
}
