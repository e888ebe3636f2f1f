/**
 * FlatDoc Document Store — collection operations over flattened rows
 *
 * Writes take the transaction executor and a WriteContext the session uses
 * to undo in-memory state (codec pairs, schema cache) on rollback and to log
 * what happened after commit. Reads take any executor.
 *
 *   document → validate → flatten → mappings → collection → ensureTable → row SQL
 *   rows → strip system columns and NULLs → unflatten → StoredDocument
 */

import { randomUUID } from 'node:crypto';
import type {
  ColumnValues,
  Document,
  EnsureTableResult,
  InsertResult,
  OperationReceipt,
  PageRequest,
  SortDirection,
  SqlDialect,
  SqlExecutor,
  SqlRow,
  SqlSortTerm,
  StoredDocument,
  CollectionInfo,
} from './types.js';
import { FlatDocError, invalidArgumentError, notFoundError } from './errors.js';
import type { NameCodec } from './name-codec.js';
import type { NameMappingStore } from './name-mapping-store.js';
import type { SchemaManager } from './schema.js';
import { flatten, isIndexFlatKey, isPrimaryKeyFlatKey, PATH_SEPARATOR, stripNulls, unflatten } from './flatten.js';
import {
  buildCountSQL,
  buildDeleteSQL,
  buildInsertSQL,
  buildPurgeSQL,
  buildSelectSQL,
  buildUpdateSQL,
  parseCondition,
} from './filter-translator.js';
import { createReceipt } from './receipts.js';
import {
  CREATED_AT_COLUMN,
  ID_COLUMN,
  UPDATED_AT_COLUMN,
  isSystemColumn,
  stampInsert,
  stampUpdate,
  toTimestamp,
} from './timestamps.js';

/** Missing sort values compare as this text. */
export const SORT_NULL_DEFAULT = '0';

const CREATION_ORDER: SqlSortTerm[] = [
  { column: CREATED_AT_COLUMN, direction: 'asc' },
  { column: ID_COLUMN, direction: 'asc' },
];

export interface WriteContext {
  startTime: number;
  /** Codec pairs recorded by this write; forgotten on rollback. */
  introduced: Array<[columnId: string, flatKey: string]>;
  /** Table touched by this write; its schema cache is dropped on rollback. */
  table?: string;
  schemaChanges?: EnsureTableResult;
  sql: string[];
}

export function createWriteContext(): WriteContext {
  return { startTime: Date.now(), introduced: [], sql: [] };
}

export interface DocumentStoreDeps {
  dialect: SqlDialect;
  codec: NameCodec;
  mappings: NameMappingStore;
  schema: SchemaManager;
}

// ─── Page Request Validation ─────────────────────────────────────────────────

export function normalizePageRequest(
  orderBy: string,
  direction: string,
  page: number,
  pageSize: number,
  collection?: string,
): PageRequest {
  const dir = direction.toLowerCase();
  if (dir !== 'asc' && dir !== 'desc') {
    throw invalidArgumentError(
      `Invalid sort direction "${direction}".`,
      `Use "asc" or "desc".`,
      collection,
      'queryPaginated',
    );
  }
  if (!Number.isSafeInteger(page) || page < 1) {
    throw invalidArgumentError(
      `Invalid page ${page}.`,
      `Pages are numbered from 1; pass a whole number >= 1.`,
      collection,
      'queryPaginated',
    );
  }
  if (!Number.isSafeInteger(pageSize) || pageSize < 1) {
    throw invalidArgumentError(
      `Invalid pageSize ${pageSize}.`,
      `Pass a whole number >= 1.`,
      collection,
      'queryPaginated',
    );
  }
  if (!Number.isSafeInteger((page - 1) * pageSize)) {
    throw invalidArgumentError(
      `Page ${page} with pageSize ${pageSize} is out of range.`,
      `The row offset (page - 1) * pageSize must not exceed ${Number.MAX_SAFE_INTEGER}.`,
      collection,
      'queryPaginated',
    );
  }
  if (orderBy.length === 0) {
    throw invalidArgumentError(
      `orderBy is empty.`,
      `Pass the original key to sort by, e.g. "details/age_ind".`,
      collection,
      'queryPaginated',
    );
  }
  const sortDirection: SortDirection = dir;
  return { orderBy, direction: sortDirection, page, pageSize };
}

// ─── Document Store ──────────────────────────────────────────────────────────

export class DocumentStore {
  private readonly dialect: SqlDialect;
  private readonly codec: NameCodec;
  private readonly mappings: NameMappingStore;
  private readonly schema: SchemaManager;

  constructor(deps: DocumentStoreDeps) {
    this.dialect = deps.dialect;
    this.codec = deps.codec;
    this.mappings = deps.mappings;
    this.schema = deps.schema;
  }

  // ─── Writes ────────────────────────────────────────────────────────────────

  /**
   * Insert a document, or replace the row with the same primary key.
   * Replacing rewrites every data column: keys absent from `document` become
   * NULL. `_id` and `_created_at` survive a replace.
   */
  async insertOrReplace(
    tx: SqlExecutor,
    ctx: WriteContext,
    collection: string,
    document: Document,
  ): Promise<InsertResult> {
    const flat = await this.flattenAndRecord(tx, ctx, document);
    const entries = Object.entries(flat.keys).sort(([, a], [, b]) => a.localeCompare(b));
    const primaryKey = entries.filter(([, key]) => isPrimaryKeyFlatKey(key)).map(([id]) => id);
    const indexed = entries.filter(([, key]) => isIndexFlatKey(key)).map(([id]) => id);

    const info = await this.requireCollection(tx, collection, primaryKey);
    ctx.table = info.table;
    ctx.schemaChanges = await this.schema.ensureTable(tx, info, Object.keys(flat.values), indexed);

    if (info.primaryKey.length > 0) {
      const pkFilter = this.primaryKeyFilter(info, flat.values, collection);
      const columns = await this.schema.columns(tx, info.table);
      const set: ColumnValues = {};
      for (const column of columns) {
        if (isSystemColumn(column) || info.primaryKey.includes(column)) continue;
        set[column] = flat.values[column] ?? null;
      }

      const update = buildUpdateSQL(info.table, stampUpdate(set), pkFilter, this.dialect, [ID_COLUMN]);
      ctx.sql.push(update.sql);
      const updated = await tx.query(update.sql, update.values);
      const replacedId = updated.rows[0]?.[ID_COLUMN];
      if (typeof replacedId === 'string') {
        return {
          receipt: this.receipt(ctx, 'insertOrReplace', collection, { matchedCount: 1, modifiedCount: 1 }),
          id: replacedId,
          replaced: true,
        };
      }
    }

    const id = randomUUID();
    const insert = buildInsertSQL(info.table, stampInsert(flat.values, id), this.dialect);
    ctx.sql.push(insert.sql);
    await tx.query(insert.sql, insert.values);

    return {
      receipt: this.receipt(ctx, 'insertOrReplace', collection, { insertedCount: 1 }),
      id,
      replaced: false,
    };
  }

  /**
   * Set the keys of `partial` on every row matching `condition`. A null leaf
   * clears its column. Stored keys that would clash with a newly set path
   * ("a" vs "a/b") are cleared in the same statement.
   */
  async update(
    tx: SqlExecutor,
    ctx: WriteContext,
    collection: string,
    partial: Document,
    condition: string,
  ): Promise<OperationReceipt> {
    const parsed = parseCondition(condition);
    const info = await this.schema.resolveCollection(tx, collection);
    if (!info) return this.receipt(ctx, 'update', collection, {});
    ctx.table = info.table;

    const where = await this.encodeCondition(tx, info.table, parsed);
    if (!where) return this.receipt(ctx, 'update', collection, {});

    const flat = await this.flattenAndRecord(tx, ctx, partial);
    const indexed = Object.entries(flat.keys).filter(([, key]) => isIndexFlatKey(key)).map(([id]) => id);
    const existing = new Set(await this.schema.columns(tx, info.table));
    ctx.schemaChanges = await this.schema.ensureTable(tx, info, Object.keys(flat.values), indexed);

    const set: ColumnValues = { ...flat.values };
    const assigned = Object.entries(flat.keys)
      .filter(([id]) => flat.values[id] !== null)
      .map(([, key]) => key);
    for (const column of existing) {
      if (isSystemColumn(column) || column in set || !this.codec.has(column)) continue;
      const storedKey = this.codec.decode(column);
      if (assigned.some(key => pathsOverlap(key, storedKey))) set[column] = null;
    }

    const query = buildUpdateSQL(info.table, stampUpdate(set), where, this.dialect);
    ctx.sql.push(query.sql);
    const result = await tx.query(query.sql, query.values);

    return this.receipt(ctx, 'update', collection, {
      matchedCount: result.rowCount,
      modifiedCount: result.rowCount,
    });
  }

  async delete(tx: SqlExecutor, ctx: WriteContext, collection: string, condition: string): Promise<OperationReceipt> {
    const parsed = parseCondition(condition);
    const info = await this.schema.resolveCollection(tx, collection);
    if (!info) return this.receipt(ctx, 'delete', collection, {});
    ctx.table = info.table;

    const where = await this.encodeCondition(tx, info.table, parsed);
    if (!where) return this.receipt(ctx, 'delete', collection, {});

    const query = buildDeleteSQL(info.table, where, this.dialect);
    ctx.sql.push(query.sql);
    const result = await tx.query(query.sql, query.values);

    return this.receipt(ctx, 'delete', collection, {
      matchedCount: result.rowCount,
      deletedCount: result.rowCount,
    });
  }

  /** Delete rows last written before `cutoff`. */
  async purgeOlderThan(tx: SqlExecutor, ctx: WriteContext, collection: string, cutoff: Date): Promise<OperationReceipt> {
    const info = await this.schema.resolveCollection(tx, collection);
    if (!info) return this.receipt(ctx, 'purge', collection, {});
    ctx.table = info.table;

    const query = buildPurgeSQL(info.table, UPDATED_AT_COLUMN, toTimestamp(cutoff), this.dialect);
    ctx.sql.push(query.sql);
    const result = await tx.query(query.sql, query.values);

    return this.receipt(ctx, 'purge', collection, {
      matchedCount: result.rowCount,
      deletedCount: result.rowCount,
    });
  }

  // ─── Reads ─────────────────────────────────────────────────────────────────

  async getById(exec: SqlExecutor, collection: string, id: string): Promise<StoredDocument> {
    const info = await this.schema.resolveCollection(exec, collection);
    if (!info) throw notFoundError(collection, id);

    const query = buildSelectSQL(info.table, { [ID_COLUMN]: id }, { limit: 1, dialect: this.dialect });
    const result = await exec.query(query.sql, query.values);
    const [doc] = await this.toDocuments(exec, result.rows);
    if (!doc) throw notFoundError(collection, id);
    return doc;
  }

  /** Every document, oldest first. */
  async listAll(exec: SqlExecutor, collection: string): Promise<StoredDocument[]> {
    const info = await this.schema.resolveCollection(exec, collection);
    if (!info) return [];

    const query = buildSelectSQL(info.table, {}, { sort: CREATION_ORDER, dialect: this.dialect });
    const result = await exec.query(query.sql, query.values);
    return this.toDocuments(exec, result.rows);
  }

  async find(exec: SqlExecutor, collection: string, condition: string): Promise<StoredDocument[]> {
    const parsed = parseCondition(condition);
    const info = await this.schema.resolveCollection(exec, collection);
    if (!info) return [];

    const where = await this.encodeCondition(exec, info.table, parsed);
    if (!where) return [];

    const query = buildSelectSQL(info.table, where, { sort: CREATION_ORDER, dialect: this.dialect });
    const result = await exec.query(query.sql, query.values);
    return this.toDocuments(exec, result.rows);
  }

  async count(exec: SqlExecutor, collection: string, condition?: string): Promise<number> {
    const parsed = condition === undefined ? {} : parseCondition(condition);
    const info = await this.schema.resolveCollection(exec, collection);
    if (!info) return 0;

    const where = await this.encodeCondition(exec, info.table, parsed);
    if (!where) return 0;

    const query = buildCountSQL(info.table, where, this.dialect);
    const result = await exec.query<{ count: number | string }>(query.sql, query.values);
    return Number(result.rows[0]?.count ?? 0);
  }

  /**
   * One page ordered by `orderBy`, ties and missing values broken by `_id`.
   * Rows without the key sort as SORT_NULL_DEFAULT. Comparison is textual.
   */
  async queryPaginated(exec: SqlExecutor, collection: string, request: PageRequest): Promise<StoredDocument[]> {
    const info = await this.schema.resolveCollection(exec, collection);
    if (!info) return [];

    const column = this.codec.encode(request.orderBy);
    const sort: SqlSortTerm[] = [];
    if (await this.schema.hasColumns(exec, info.table, [column])) {
      sort.push({ column, direction: request.direction, nullDefault: SORT_NULL_DEFAULT });
    }
    sort.push({ column: ID_COLUMN, direction: 'asc' });

    const query = buildSelectSQL(info.table, {}, {
      sort,
      limit: request.pageSize,
      offset: (request.page - 1) * request.pageSize,
      dialect: this.dialect,
    });
    const result = await exec.query(query.sql, query.values);
    return this.toDocuments(exec, result.rows);
  }

  // ─── Internals ─────────────────────────────────────────────────────────────

  private async flattenAndRecord(tx: SqlExecutor, ctx: WriteContext, document: Document) {
    const flat = flatten(document, this.codec);
    ctx.introduced.push(...flat.introduced);
    for (const [columnId, flatKey] of flat.introduced) {
      await this.mappings.insertIfAbsent(tx, columnId, flatKey);
    }
    return flat;
  }

  private async requireCollection(tx: SqlExecutor, collection: string, primaryKey: string[]): Promise<CollectionInfo> {
    const info = await this.schema.resolveCollection(tx, collection, { primaryKey });
    if (!info) {
      throw new FlatDocError({
        code: 'STORAGE_FAILURE',
        message: `Collection "${collection}" could not be registered.`,
        fix: `Check that the catalog table is writable.`,
        collection,
      });
    }
    return info;
  }

  private primaryKeyFilter(info: CollectionInfo, values: ColumnValues, collection: string): Record<string, string> {
    const filter: Record<string, string> = {};
    const missing: string[] = [];
    for (const column of info.primaryKey) {
      const value = values[column];
      if (value === undefined || value === null) {
        missing.push(this.codec.has(column) ? this.codec.decode(column) : column);
      } else {
        filter[column] = value;
      }
    }
    if (missing.length > 0) {
      throw invalidArgumentError(
        `Document is missing primary key ${missing.map(k => `"${k}"`).join(', ')}.`,
        `Every document in "${collection}" must carry a non-null value for each primary key field.`,
        collection,
        'insertOrReplace',
      );
    }
    return filter;
  }

  /**
   * Flat Key condition → Column Identifier filter. Undefined when a key has
   * no column in the table, since no row can match it.
   */
  private async encodeCondition(
    exec: SqlExecutor,
    table: string,
    condition: Record<string, string>,
  ): Promise<Record<string, string> | undefined> {
    const filter: Record<string, string> = {};
    for (const [flatKey, value] of Object.entries(condition)) {
      filter[this.codec.encode(flatKey)] = value;
    }
    const ids = Object.keys(filter);
    if (ids.length === 0) return filter;
    return (await this.schema.hasColumns(exec, table, ids)) ? filter : undefined;
  }

  private async toDocuments(exec: SqlExecutor, rows: SqlRow[]): Promise<StoredDocument[]> {
    const split = rows.map(splitRow);
    const unknown = split.some(({ data }) => Object.keys(data).some(column => !this.codec.has(column)));
    if (unknown) {
      // another session may have introduced keys since we loaded
      this.codec.load(await this.mappings.load(exec));
    }

    const documents = unflatten(split.map(s => s.data), this.codec);
    return split.map((s, i) => ({
      id: s.id,
      document: documents[i] ?? {},
      createdAt: s.createdAt,
      updatedAt: s.updatedAt,
    }));
  }

  private receipt(
    ctx: WriteContext,
    operation: OperationReceipt['operation'],
    collection: string,
    counts: { matchedCount?: number; modifiedCount?: number; insertedCount?: number; deletedCount?: number },
  ): OperationReceipt {
    return createReceipt({ operation, collection, dialect: this.dialect, startTime: ctx.startTime, ...counts });
  }
}

// ─── Row Helpers ─────────────────────────────────────────────────────────────

function splitRow(row: SqlRow): { id: string; createdAt: string; updatedAt: string; data: Record<string, string> } {
  const data: SqlRow = {};
  for (const [column, value] of Object.entries(row)) {
    if (!isSystemColumn(column)) data[column] = value;
  }
  return {
    id: textField(row, ID_COLUMN),
    createdAt: textField(row, CREATED_AT_COLUMN),
    updatedAt: textField(row, UPDATED_AT_COLUMN),
    data: stripNulls(data),
  };
}

function textField(row: SqlRow, column: string): string {
  const value = row[column];
  return typeof value === 'string' ? value : String(value ?? '');
}

/** True when one path is a strict ancestor of the other ("a" and "a/b"). */
function pathsOverlap(a: string, b: string): boolean {
  if (a === b) return false;
  return a.startsWith(b + PATH_SEPARATOR) || b.startsWith(a + PATH_SEPARATOR);
}
