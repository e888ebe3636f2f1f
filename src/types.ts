/**
 * FlatDoc — All shared types and interfaces
 *
 * This is the ONLY file every other file imports types from.
 * No circular dependencies. No file imports from an adapter.
 */

// ─── Dialect & Driver ────────────────────────────────────────────────────────

export type SqlDialect = 'sqlite' | 'pg';
export type Driver = 'better-sqlite3' | 'pg';

// ─── Documents ───────────────────────────────────────────────────────────────

export type Scalar = string | number | boolean;

export type DocumentValue = Scalar | null | Document;

export interface Document {
  [key: string]: DocumentValue;
}

/** One stored row as it comes back from the engine, NULLs already dropped. */
export type FlatRow = Record<string, string>;

/** Column Identifier → text value (null clears / leaves the column empty). */
export type ColumnValues = Record<string, string | null>;

export interface StoredDocument {
  id: string;
  document: Document;
  createdAt: string;
  updatedAt: string;
}

// ─── Flattening ──────────────────────────────────────────────────────────────

export interface FlattenResult {
  values: ColumnValues;
  /** Column Identifier → Flat Key for every column in `values`. */
  keys: Record<string, string>;
  /** Pairs the codec had not seen before this flatten. */
  introduced: Array<[columnId: string, flatKey: string]>;
}

// ─── Conditions & Ordering ───────────────────────────────────────────────────

/** Parsed equality conjunction: Flat Key → expected text value. */
export type EqualityCondition = Record<string, string>;

export type SortDirection = 'asc' | 'desc';

export interface PageRequest {
  orderBy: string;
  direction: SortDirection;
  page: number;
  pageSize: number;
}

// ─── Schema ──────────────────────────────────────────────────────────────────

export interface CollectionInfo {
  path: string;
  table: string;
  primaryKey: string[];
}

export interface EnsureTableResult {
  created: boolean;
  addedColumns: string[];
  createdIndexes: string[];
}

export interface CollectionDescription {
  collection: string;
  table: string;
  fields: Array<{
    key: string;
    column: string;
    primaryKey: boolean;
    indexed: boolean;
  }>;
  documentCount: number;
}

// ─── Operation Receipt ───────────────────────────────────────────────────────

export type WriteOperation = 'insertOrReplace' | 'update' | 'delete' | 'purge';

export interface OperationReceipt {
  operation: WriteOperation;
  collection: string;
  success: boolean;
  matchedCount: number;
  modifiedCount: number;
  insertedCount: number;
  deletedCount: number;
  duration: number;
  dialect: SqlDialect;
}

export interface InsertResult {
  receipt: OperationReceipt;
  id: string;
  replaced: boolean;
}

// ─── Connection Config ───────────────────────────────────────────────────────

export type PoolPreset = 'high' | 'standard' | 'low';

export interface FlatDocConfig {
  uri: string;
  label?: string;
  pool?: PoolPreset;
  logging?: boolean | 'verbose';
  slowQueryMs?: number;
}

// ─── Error Codes ─────────────────────────────────────────────────────────────

export type FlatDocErrorCode =
  | 'SCHEMA_CONFLICT'
  | 'NOT_FOUND'
  | 'INVALID_CONDITION'
  | 'INVALID_ARGUMENT'
  | 'UNKNOWN_COLUMN'
  | 'STORAGE_FAILURE'
  | 'DUPLICATE_KEY'
  | 'CONNECTION_FAILED'
  | 'AUTHENTICATION_FAILED'
  | 'TIMEOUT';

// ─── Event Types ─────────────────────────────────────────────────────────────

export type SchemaChangeAction = 'create-table' | 'add-column' | 'create-index';

export interface FlatDocEvents {
  connected: { dialect: SqlDialect; label: string };
  disconnected: { dialect: SqlDialect; reason: string; timestamp: Date };
  operation: { collection: string; operation: string; durationMs: number; receipt: OperationReceipt; sql?: string };
  'slow-query': { collection: string; operation: string; durationMs: number; threshold: number };
  'schema-change': { collection: string; table: string; action: SchemaChangeAction; column?: string };
  'mapping-recorded': { columnId: string; flatKey: string };
  error: { code: FlatDocErrorCode; message: string; fix: string; collection?: string; operation?: string };
}

// ─── Connection Status ───────────────────────────────────────────────────────

export interface AdapterStatus {
  state: 'connected' | 'disconnected';
  dialect: SqlDialect;
  driver: Driver;
  uri: string;
  uptimeMs: number;
}

export interface ConnectionStatus extends AdapterStatus {
  label: string;
  mappedKeys: number;
  pendingWrites: number;
}

// ─── SQL ─────────────────────────────────────────────────────────────────────

export interface SqlQuery {
  sql: string;
  values: unknown[];
}

export interface SqlTranslation {
  clause: string;
  values: unknown[];
}

/** One ORDER BY term; `nullDefault` wraps the column in COALESCE. */
export interface SqlSortTerm {
  column: string;
  direction: SortDirection;
  nullDefault?: string;
}

export type SqlRow = Record<string, unknown>;

export interface QueryResult<R extends SqlRow = SqlRow> {
  rows: R[];
  rowCount: number;
}

/** Anything that can run one parameterized statement: a connection or a transaction. */
export interface SqlExecutor {
  query<R extends SqlRow = SqlRow>(sql: string, params?: unknown[]): Promise<QueryResult<R>>;
}
