/**
 * Schema Tests — DDL generation and lazy schema evolution
 */

import { createHash } from 'node:crypto';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  SchemaManager,
  generateAddColumnSQL,
  generateCatalogSQL,
  generateColumnsQuery,
  generateCreateIndexSQL,
  generateCreateTableSQL,
  indexName,
} from '../src/schema.js';
import { SqliteAdapter } from '../src/adapters/sqlite-adapter.js';
import { FlatDocEventEmitter } from '../src/events.js';
import { FlatDocError } from '../src/errors.js';

const tableDigest = (table: string) => createHash('sha256').update(table).digest('hex').slice(0, 8);

// ─── DDL Generation ──────────────────────────────────────────────────────────

describe('generateCatalogSQL', () => {
  it('creates the collection registry', () => {
    expect(generateCatalogSQL()).toBe(
      'CREATE TABLE IF NOT EXISTS "flatdoc_collections" (' +
        '"table_name" TEXT PRIMARY KEY, "collection_path" TEXT NOT NULL UNIQUE, "primary_key" TEXT NOT NULL)',
    );
  });
});

describe('generateCreateTableSQL', () => {
  it('keys on _id without a declared primary key', () => {
    expect(generateCreateTableSQL('users', ['col_a', 'col_b'], [])).toBe(
      'CREATE TABLE IF NOT EXISTS "users" (\n' +
        '  "_id" TEXT PRIMARY KEY,\n' +
        '  "col_a" TEXT,\n' +
        '  "col_b" TEXT,\n' +
        '  "_created_at" TEXT NOT NULL,\n' +
        '  "_updated_at" TEXT NOT NULL\n' +
        ')',
    );
  });

  it('declares a composite primary key and keeps _id unique', () => {
    expect(generateCreateTableSQL('orders', ['col_a', 'col_b', 'col_c'], ['col_a', 'col_b'])).toBe(
      'CREATE TABLE IF NOT EXISTS "orders" (\n' +
        '  "_id" TEXT NOT NULL UNIQUE,\n' +
        '  "col_a" TEXT NOT NULL,\n' +
        '  "col_b" TEXT NOT NULL,\n' +
        '  "col_c" TEXT,\n' +
        '  "_created_at" TEXT NOT NULL,\n' +
        '  "_updated_at" TEXT NOT NULL,\n' +
        '  PRIMARY KEY ("col_a", "col_b")\n' +
        ')',
    );
  });
});

describe('generateAddColumnSQL', () => {
  it('guards with IF NOT EXISTS on PostgreSQL only', () => {
    expect(generateAddColumnSQL('t', 'col_a', 'pg')).toBe('ALTER TABLE "t" ADD COLUMN IF NOT EXISTS "col_a" TEXT');
    expect(generateAddColumnSQL('t', 'col_a', 'sqlite')).toBe('ALTER TABLE "t" ADD COLUMN "col_a" TEXT');
  });
});

describe('indexName', () => {
  it('combines the column digest and a table digest', () => {
    expect(indexName('users', 'col_0123456789abcdef01234567')).toBe(`ix_0123456789abcdef01234567_${tableDigest('users')}`);
  });

  it('differs per table', () => {
    expect(indexName('a', 'col_x')).not.toBe(indexName('b', 'col_x'));
  });

  it('builds the CREATE INDEX statement', () => {
    expect(generateCreateIndexSQL('users', 'col_x')).toBe(
      `CREATE INDEX IF NOT EXISTS "ix_x_${tableDigest('users')}" ON "users" ("col_x")`,
    );
  });
});

describe('generateColumnsQuery', () => {
  it('uses pragma_table_info on SQLite', () => {
    expect(generateColumnsQuery('users', 'sqlite')).toEqual({
      sql: 'SELECT name FROM pragma_table_info(?)',
      values: ['users'],
    });
  });

  it('uses information_schema on PostgreSQL', () => {
    const query = generateColumnsQuery('users', 'pg');
    expect(query.sql).toBe(
      'SELECT column_name AS name FROM information_schema.columns WHERE table_schema = current_schema() AND table_name = $1',
    );
    expect(query.values).toEqual(['users']);
  });
});

// ─── Schema Manager ──────────────────────────────────────────────────────────

describe('SchemaManager', () => {
  let adapter: SqliteAdapter;

  beforeEach(async () => {
    adapter = new SqliteAdapter({ uri: 'sqlite::memory:' }, new FlatDocEventEmitter());
    await adapter.connect();
    await new SchemaManager('sqlite').ensureCatalog(adapter);
  });

  afterEach(async () => {
    await adapter.close();
  });

  it('registers a collection only when asked to', async () => {
    const schema = new SchemaManager('sqlite');
    expect(await schema.resolveCollection(adapter, 'users')).toBeUndefined();

    const info = await schema.resolveCollection(adapter, 'users', { primaryKey: ['col_k'] });
    expect(info).toEqual({ path: 'users', table: 'users', primaryKey: ['col_k'] });

    expect(await new SchemaManager('sqlite').resolveCollection(adapter, 'users')).toEqual(info);
  });

  it('keeps the first primary key', async () => {
    await new SchemaManager('sqlite').resolveCollection(adapter, 'users', { primaryKey: ['col_k'] });
    const again = await new SchemaManager('sqlite').resolveCollection(adapter, 'users', { primaryKey: [] });
    expect(again?.primaryKey).toEqual(['col_k']);
  });

  it('rejects a second path for the same table', async () => {
    await new SchemaManager('sqlite').resolveCollection(adapter, 'a/b', { primaryKey: [] });

    let caught: unknown;
    try {
      await new SchemaManager('sqlite').resolveCollection(adapter, 'a_b', { primaryKey: [] });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(FlatDocError);
    expect(caught instanceof FlatDocError && caught.code).toBe('INVALID_ARGUMENT');
  });

  it('rejects a path that differs only in case', async () => {
    const first = await new SchemaManager('sqlite').resolveCollection(adapter, 'Users', { primaryKey: [] });
    expect(first?.table).toBe('users');

    let caught: unknown;
    try {
      await new SchemaManager('sqlite').resolveCollection(adapter, 'users', { primaryKey: [] });
    } catch (err) {
      caught = err;
    }
    expect(caught instanceof FlatDocError && caught.message).toContain(
      'Collection path "users" maps to table "users", which already belongs to "Users".',
    );
  });

  it('creates the table, then adds only missing columns', async () => {
    const schema = new SchemaManager('sqlite');
    const info = { path: 'users', table: 'users', primaryKey: ['col_k'] };

    expect(await schema.ensureTable(adapter, info, ['col_k', 'col_v'], ['col_v'])).toEqual({
      created: true,
      addedColumns: ['col_k', 'col_v'],
      createdIndexes: [indexName('users', 'col_v')],
    });

    expect(await schema.ensureTable(adapter, info, ['col_k', 'col_v', 'col_w'], [])).toEqual({
      created: false,
      addedColumns: ['col_w'],
      createdIndexes: [],
    });

    const introspected = await new SchemaManager('sqlite').columns(adapter, 'users');
    expect([...introspected].sort()).toEqual(['_created_at', '_id', '_updated_at', 'col_k', 'col_v', 'col_w']);
  });

  it('skips columns another manager added after caching the table', async () => {
    const first = new SchemaManager('sqlite');
    const second = new SchemaManager('sqlite');
    const info = { path: 'users', table: 'users', primaryKey: [] };

    await first.ensureTable(adapter, info, ['col_a'], []);
    await second.ensureTable(adapter, info, ['col_a', 'col_b'], []);

    expect(await first.ensureTable(adapter, info, ['col_a', 'col_b'], [])).toEqual({
      created: false,
      addedColumns: [],
      createdIndexes: [],
    });
    expect(await first.hasColumns(adapter, 'users', ['col_b'])).toBe(true);
  });

  it('never indexes a primary key column', async () => {
    const schema = new SchemaManager('sqlite');
    const info = { path: 'users', table: 'users', primaryKey: ['col_k'] };
    const result = await schema.ensureTable(adapter, info, ['col_k'], ['col_k']);
    expect(result.createdIndexes).toEqual([]);
  });

  it('creates the index in the database', async () => {
    const schema = new SchemaManager('sqlite');
    await schema.ensureTable(adapter, { path: 'users', table: 'users', primaryKey: [] }, ['col_v'], ['col_v']);

    const indexes = await adapter.query<{ name: string }>(
      `SELECT name FROM sqlite_master WHERE type = 'index' AND tbl_name = ?`,
      ['users'],
    );
    expect(indexes.rows.map(r => r.name).filter(n => n.startsWith('ix_'))).toEqual([indexName('users', 'col_v')]);
  });

  it('re-reads the table when a column is not cached', async () => {
    const schema = new SchemaManager('sqlite');
    await schema.ensureTable(adapter, { path: 'users', table: 'users', primaryKey: [] }, ['col_a'], []);
    await adapter.query('ALTER TABLE "users" ADD COLUMN "col_b" TEXT');

    expect(await schema.hasColumns(adapter, 'users', ['col_a', 'col_b'])).toBe(true);
    expect(await schema.hasColumns(adapter, 'users', ['col_zz'])).toBe(false);
  });

  it('reports no columns for a missing table', async () => {
    expect((await new SchemaManager('sqlite').columns(adapter, 'ghost')).size).toBe(0);
  });
});
