/**
 * FlatDoc Schema Manager — lazy, additive schema evolution
 *
 * - Collection registry (flatdoc_collections): path ⇄ table, fixed primary key
 * - CREATE TABLE on first write, ADD COLUMN for every unseen Column Identifier
 * - One secondary index per `_ind` column, created when the column appears
 * - Column introspection, cached per session
 *
 * Columns are never altered or dropped. Primary-key membership is decided
 * once, when the table is created.
 */

import { createHash } from 'node:crypto';
import { z } from 'zod';
import type { CollectionDescription, CollectionInfo, EnsureTableResult, SqlDialect, SqlExecutor } from './types.js';
import { FlatDocError, invalidArgumentError } from './errors.js';
import { placeholder, quoteIdentifier, buildCountSQL } from './filter-translator.js';
import { collectionToTableName } from './sanitize.js';
import { COLUMN_PREFIX } from './name-codec.js';
import type { NameCodec } from './name-codec.js';
import { isIndexFlatKey } from './flatten.js';
import { CREATED_AT_COLUMN, ID_COLUMN, SYSTEM_COLUMNS, UPDATED_AT_COLUMN, isSystemColumn } from './timestamps.js';

export const COLLECTION_TABLE = 'flatdoc_collections';

const primaryKeySchema = z.array(z.string());

// ─── DDL Generation ──────────────────────────────────────────────────────────

export function generateCatalogSQL(): string {
  return (
    `CREATE TABLE IF NOT EXISTS ${quoteIdentifier(COLLECTION_TABLE)} (` +
    `"table_name" TEXT PRIMARY KEY, ` +
    `"collection_path" TEXT NOT NULL UNIQUE, ` +
    `"primary_key" TEXT NOT NULL)`
  );
}

/**
 * Data columns are TEXT. Without a declared primary key `_id` is the key;
 * with one, `_id` stays unique so getById still addresses a single row.
 */
export function generateCreateTableSQL(table: string, columnIds: string[], primaryKey: string[]): string {
  const columns = columnIds.map(id => {
    const notNull = primaryKey.includes(id) ? ' NOT NULL' : '';
    return `  ${quoteIdentifier(id)} TEXT${notNull}`;
  });

  const idColumn = primaryKey.length === 0
    ? `  ${quoteIdentifier(ID_COLUMN)} TEXT PRIMARY KEY`
    : `  ${quoteIdentifier(ID_COLUMN)} TEXT NOT NULL UNIQUE`;

  const lines = [
    idColumn,
    ...columns,
    `  ${quoteIdentifier(CREATED_AT_COLUMN)} TEXT NOT NULL`,
    `  ${quoteIdentifier(UPDATED_AT_COLUMN)} TEXT NOT NULL`,
  ];
  if (primaryKey.length > 0) {
    lines.push(`  PRIMARY KEY (${primaryKey.map(c => quoteIdentifier(c)).join(', ')})`);
  }

  return `CREATE TABLE IF NOT EXISTS ${quoteIdentifier(table)} (\n${lines.join(',\n')}\n)`;
}

export function generateAddColumnSQL(table: string, columnId: string, dialect: SqlDialect): string {
  // SQLite has no ADD COLUMN IF NOT EXISTS; the introspected column set guards it
  const ifNotExists = dialect === 'pg' ? 'IF NOT EXISTS ' : '';
  return `ALTER TABLE ${quoteIdentifier(table)} ADD COLUMN ${ifNotExists}${quoteIdentifier(columnId)} TEXT`;
}

/**
 * `ix_<column digest>_<table digest>` stays well under PostgreSQL's 63-byte
 * identifier limit for any table name.
 */
export function indexName(table: string, columnId: string): string {
  const columnDigest = columnId.startsWith(COLUMN_PREFIX) ? columnId.slice(COLUMN_PREFIX.length) : columnId;
  const tableDigest = createHash('sha256').update(table, 'utf8').digest('hex').slice(0, 8);
  return `ix_${columnDigest}_${tableDigest}`;
}

export function generateCreateIndexSQL(table: string, columnId: string): string {
  return `CREATE INDEX IF NOT EXISTS ${quoteIdentifier(indexName(table, columnId))} ON ${quoteIdentifier(table)} (${quoteIdentifier(columnId)})`;
}

export function generateColumnsQuery(table: string, dialect: SqlDialect): { sql: string; values: unknown[] } {
  if (dialect === 'pg') {
    return {
      sql:
        `SELECT column_name AS name FROM information_schema.columns ` +
        `WHERE table_schema = current_schema() AND table_name = ${placeholder(dialect, 1)}`,
      values: [table],
    };
  }
  return { sql: `SELECT name FROM pragma_table_info(${placeholder(dialect, 1)})`, values: [table] };
}

// ─── Schema Manager ──────────────────────────────────────────────────────────

export class SchemaManager {
  private readonly dialect: SqlDialect;
  private readonly columnCache = new Map<string, Set<string>>();
  private readonly collectionCache = new Map<string, CollectionInfo>();

  constructor(dialect: SqlDialect) {
    this.dialect = dialect;
  }

  async ensureCatalog(exec: SqlExecutor): Promise<void> {
    await exec.query(generateCatalogSQL());
  }

  /**
   * Look up (and with `create`, register) the collection behind `path`.
   * Returns undefined for a collection that was never written.
   */
  async resolveCollection(
    exec: SqlExecutor,
    path: string,
    create?: { primaryKey: string[] },
  ): Promise<CollectionInfo | undefined> {
    const table = collectionToTableName(path);
    const cached = this.collectionCache.get(table);
    if (cached) return this.assertOwner(cached, path);

    let info = await this.readCatalogEntry(exec, table);
    if (!info && create) {
      await exec.query(
        `INSERT INTO ${quoteIdentifier(COLLECTION_TABLE)} ("table_name", "collection_path", "primary_key") ` +
          `VALUES (${placeholder(this.dialect, 1)}, ${placeholder(this.dialect, 2)}, ${placeholder(this.dialect, 3)}) ` +
          `ON CONFLICT DO NOTHING`,
        [table, path, JSON.stringify(create.primaryKey)],
      );
      info = await this.readCatalogEntry(exec, table);
    }
    if (!info) return undefined;

    this.collectionCache.set(table, info);
    return this.assertOwner(info, path);
  }

  /**
   * Create the table or add the columns it lacks. `primaryKey` only matters
   * when the table is created.
   */
  async ensureTable(
    exec: SqlExecutor,
    collection: CollectionInfo,
    columnIds: string[],
    indexColumns: string[],
  ): Promise<EnsureTableResult> {
    const { table, primaryKey } = collection;
    const result: EnsureTableResult = { created: false, addedColumns: [], createdIndexes: [] };
    const wanted = [...new Set([...primaryKey, ...columnIds])];
    let existing = await this.columns(exec, table);
    if (existing.size > 0 && wanted.some(id => !existing.has(id))) {
      // another session may have altered the table since it was cached
      this.columnCache.delete(table);
      existing = await this.columns(exec, table);
    }

    if (existing.size === 0) {
      await exec.query(generateCreateTableSQL(table, wanted, primaryKey));
      result.created = true;
      result.addedColumns.push(...wanted);
    } else {
      for (const id of wanted) {
        if (existing.has(id)) continue;
        await exec.query(generateAddColumnSQL(table, id, this.dialect));
        result.addedColumns.push(id);
      }
    }

    for (const id of result.addedColumns) {
      if (!indexColumns.includes(id) || primaryKey.includes(id)) continue;
      await exec.query(generateCreateIndexSQL(table, id));
      result.createdIndexes.push(indexName(table, id));
    }

    if (result.created || result.addedColumns.length > 0) {
      const known = new Set(existing);
      if (result.created) SYSTEM_COLUMNS.forEach(c => known.add(c));
      result.addedColumns.forEach(c => known.add(c));
      this.columnCache.set(table, known);
    }

    return result;
  }

  /** Introspected column names; empty when the table does not exist. */
  async columns(exec: SqlExecutor, table: string): Promise<Set<string>> {
    const cached = this.columnCache.get(table);
    if (cached) return cached;

    const query = generateColumnsQuery(table, this.dialect);
    const result = await exec.query<{ name: string }>(query.sql, query.values);
    const names = new Set(result.rows.map(r => r.name));
    if (names.size > 0) this.columnCache.set(table, names);
    return names;
  }

  /**
   * True when every id is a column of `table`. A miss re-reads the table
   * once, since another session may have added the column.
   */
  async hasColumns(exec: SqlExecutor, table: string, columnIds: string[]): Promise<boolean> {
    let known = await this.columns(exec, table);
    if (columnIds.every(id => known.has(id))) return true;
    this.columnCache.delete(table);
    known = await this.columns(exec, table);
    return columnIds.every(id => known.has(id));
  }

  /** Drop cached state for a table, after a rolled-back write. */
  invalidate(table: string): void {
    this.columnCache.delete(table);
    this.collectionCache.delete(table);
  }

  async describe(exec: SqlExecutor, path: string, codec: NameCodec): Promise<CollectionDescription> {
    const table = collectionToTableName(path);
    const info = await this.resolveCollection(exec, path);
    if (!info) return { collection: path, table, fields: [], documentCount: 0 };

    const columns = await this.columns(exec, table);
    const fields = [...columns]
      .filter(column => !isSystemColumn(column))
      .map(column => {
        const key = codec.has(column) ? codec.decode(column) : column;
        const primaryKey = info.primaryKey.includes(column);
        return { key, column, primaryKey, indexed: !primaryKey && isIndexFlatKey(key) };
      })
      .sort((a, b) => a.key.localeCompare(b.key));

    const count = buildCountSQL(table, {}, this.dialect);
    const counted = await exec.query<{ count: number | string }>(count.sql, count.values);

    return { collection: path, table, fields, documentCount: Number(counted.rows[0]?.count ?? 0) };
  }

  // ─── Internals ─────────────────────────────────────────────────────────────

  private async readCatalogEntry(exec: SqlExecutor, table: string): Promise<CollectionInfo | undefined> {
    const result = await exec.query<{ collection_path: string; primary_key: string }>(
      `SELECT "collection_path", "primary_key" FROM ${quoteIdentifier(COLLECTION_TABLE)} ` +
        `WHERE "table_name" = ${placeholder(this.dialect, 1)}`,
      [table],
    );
    const row = result.rows[0];
    if (!row) return undefined;

    const parsed = primaryKeySchema.safeParse(safeJsonParse(row.primary_key));
    if (!parsed.success) {
      throw new FlatDocError({
        code: 'STORAGE_FAILURE',
        message: `Catalog entry for table "${table}" has an unreadable primary key.`,
        fix: `Repair the "primary_key" column of ${COLLECTION_TABLE}; it must be a JSON array of column identifiers.`,
        collection: row.collection_path,
      });
    }
    return { path: row.collection_path, table, primaryKey: parsed.data };
  }

  private assertOwner(info: CollectionInfo, path: string): CollectionInfo {
    if (info.path !== path) {
      throw invalidArgumentError(
        `Collection path "${path}" maps to table "${info.table}", which already belongs to "${info.path}".`,
        `Use "${info.path}" or pick a path that does not collide once "/" becomes "_".`,
        path,
      );
    }
    return info;
  }
}

function safeJsonParse(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}
