/**
 * FlatDoc — Schema-on-write document storage over SQLite and PostgreSQL
 *
 * Auto-detects the dialect from the URI. Every call flows through:
 *
 *   caller → FlatDoc (session)
 *     → validate (zod document / arguments)
 *     → write lane (writes only, one at a time)
 *     → transaction (mappings, schema evolution, row SQL)
 *     → receipts (wrap result)
 *     → logger (emit events)
 *     → return to caller
 */

import type {
  CollectionDescription,
  ConnectionStatus,
  Document,
  FlatDocConfig,
  FlatDocEvents,
  InsertResult,
  OperationReceipt,
  SqlDialect,
  SqlExecutor,
  StoredDocument,
  WriteOperation,
} from './types.js';
import { FlatDocError, invalidArgumentError, mapSqlError } from './errors.js';
import { FlatDocEventEmitter } from './events.js';
import { FlatDocLogger } from './logger.js';
import { DEFAULT_SLOW_QUERY_MS, parseConfig } from './config.js';
import { validateDocument } from './validate.js';
import { NameCodec } from './name-codec.js';
import { NameMappingStore } from './name-mapping-store.js';
import { SchemaManager } from './schema.js';
import { WriteLane } from './write-lane.js';
import { DocumentStore, createWriteContext, normalizePageRequest } from './document-store.js';
import type { WriteContext } from './document-store.js';
import type { DatabaseAdapter } from './adapters/adapter.js';
import { detectDialect } from './adapters/adapter.js';
import { SqliteAdapter } from './adapters/sqlite-adapter.js';
import { PgAdapter } from './adapters/pg-adapter.js';

export class FlatDoc {
  readonly dialect: SqlDialect;

  private adapter: DatabaseAdapter;
  private emitter: FlatDocEventEmitter;
  private logger: FlatDocLogger;
  private config: FlatDocConfig;
  private codec = new NameCodec();
  private mappings: NameMappingStore;
  private schema: SchemaManager;
  private store: DocumentStore;
  private lane = new WriteLane();

  private constructor(
    config: FlatDocConfig,
    adapter: DatabaseAdapter,
    emitter: FlatDocEventEmitter,
    logger: FlatDocLogger,
  ) {
    this.config = config;
    this.adapter = adapter;
    this.emitter = emitter;
    this.logger = logger;
    this.dialect = adapter.dialect;
    this.mappings = new NameMappingStore(this.dialect);
    this.schema = new SchemaManager(this.dialect);
    this.store = new DocumentStore({
      dialect: this.dialect,
      codec: this.codec,
      mappings: this.mappings,
      schema: this.schema,
    });
  }

  /**
   * Connect, create the reserved tables and load the name mapping.
   */
  static async create(config: FlatDocConfig): Promise<FlatDoc> {
    const parsed = parseConfig(config);
    const dialect = detectDialect(parsed.uri);
    const emitter = new FlatDocEventEmitter();
    const logger = new FlatDocLogger(
      {
        enabled: parsed.logging !== false,
        verbose: parsed.logging === 'verbose',
        slowQueryMs: parsed.slowQueryMs ?? DEFAULT_SLOW_QUERY_MS,
      },
      emitter,
    );

    let adapter: DatabaseAdapter;
    switch (dialect) {
      case 'sqlite':
        adapter = new SqliteAdapter(parsed, emitter);
        break;
      case 'pg':
        adapter = new PgAdapter(parsed, emitter);
        break;
    }

    await adapter.connect();

    const db = new FlatDoc(parsed, adapter, emitter, logger);
    try {
      await db.initialize();
    } catch (err) {
      await adapter.close();
      throw mapSqlError(err);
    }
    return db;
  }

  private async initialize(): Promise<void> {
    await this.adapter.withTransaction(async tx => {
      await this.mappings.ensure(tx);
      await this.schema.ensureCatalog(tx);
    });
    this.codec.load(await this.mappings.load(this.adapter));
  }

  // ─── Write Operations ──────────────────────────────────────────────────────

  /**
   * Store `document`. When the collection has `_pri` keys, a document with
   * the same key values replaces the stored one.
   */
  async insertOrReplace(collection: string, document: Document): Promise<InsertResult> {
    const doc = this.guard(collection, 'insertOrReplace', () => validateDocument(document, collection, 'insertOrReplace'));
    return this.write(
      collection,
      'insertOrReplace',
      (tx, ctx) => this.store.insertOrReplace(tx, ctx, collection, doc),
      result => result.receipt,
    );
  }

  async update(collection: string, partialDocument: Document, whereCondition: string): Promise<OperationReceipt> {
    const partial = this.guard(collection, 'update', () => validateDocument(partialDocument, collection, 'update'));
    return this.write(
      collection,
      'update',
      (tx, ctx) => this.store.update(tx, ctx, collection, partial, whereCondition),
      receipt => receipt,
    );
  }

  async delete(collection: string, whereCondition: string): Promise<OperationReceipt> {
    return this.write(
      collection,
      'delete',
      (tx, ctx) => this.store.delete(tx, ctx, collection, whereCondition),
      receipt => receipt,
    );
  }

  /** Delete documents whose last write happened before `cutoff`. */
  async purgeOlderThan(collection: string, cutoff: Date): Promise<OperationReceipt> {
    this.guard(collection, 'purge', () => {
      if (Number.isNaN(cutoff.getTime())) {
        throw invalidArgumentError('Invalid cutoff date.', 'Pass a valid Date.', collection, 'purge');
      }
    });
    return this.write(
      collection,
      'purge',
      (tx, ctx) => this.store.purgeOlderThan(tx, ctx, collection, cutoff),
      receipt => receipt,
    );
  }

  // ─── Read Operations ───────────────────────────────────────────────────────

  async getById(collection: string, id: string): Promise<StoredDocument> {
    return this.read(collection, 'getById', () => this.store.getById(this.adapter, collection, id));
  }

  async listAll(collection: string): Promise<StoredDocument[]> {
    return this.read(collection, 'listAll', () => this.store.listAll(this.adapter, collection));
  }

  /** Documents matching `key = value [AND key = value ...]`. */
  async find(collection: string, whereCondition: string): Promise<StoredDocument[]> {
    return this.read(collection, 'find', () => this.store.find(this.adapter, collection, whereCondition));
  }

  async count(collection: string, whereCondition?: string): Promise<number> {
    return this.read(collection, 'count', () => this.store.count(this.adapter, collection, whereCondition));
  }

  async queryPaginated(
    collection: string,
    orderByOriginalKey: string,
    direction: string,
    page: number,
    pageSize: number,
  ): Promise<StoredDocument[]> {
    return this.read(collection, 'queryPaginated', () => {
      const request = normalizePageRequest(orderByOriginalKey, direction, page, pageSize, collection);
      return this.store.queryPaginated(this.adapter, collection, request);
    });
  }

  // ─── Discovery ─────────────────────────────────────────────────────────────

  async describe(collection: string): Promise<CollectionDescription> {
    return this.read(collection, 'describe', () => this.schema.describe(this.adapter, collection, this.codec));
  }

  // ─── Status & Health ───────────────────────────────────────────────────────

  status(): ConnectionStatus {
    return {
      ...this.adapter.status(),
      label: this.config.label ?? this.dialect,
      mappedKeys: this.codec.size,
      pendingWrites: this.lane.depth,
    };
  }

  // ─── Events ────────────────────────────────────────────────────────────────

  on<E extends keyof FlatDocEvents>(event: E, listener: (payload: FlatDocEvents[E]) => void): this {
    this.emitter.on(event, listener);
    return this;
  }

  once<E extends keyof FlatDocEvents>(event: E, listener: (payload: FlatDocEvents[E]) => void): this {
    this.emitter.once(event, listener);
    return this;
  }

  off<E extends keyof FlatDocEvents>(event: E, listener: (payload: FlatDocEvents[E]) => void): this {
    this.emitter.off(event, listener);
    return this;
  }

  // ─── Lifecycle ─────────────────────────────────────────────────────────────

  /** Waits for queued writes, then closes the connection. */
  async close(): Promise<void> {
    await this.lane.idle();
    await this.adapter.close();
  }

  // ─── Pipeline ──────────────────────────────────────────────────────────────

  private write<T>(
    collection: string,
    operation: WriteOperation,
    fn: (tx: SqlExecutor, ctx: WriteContext) => Promise<T>,
    receiptOf: (result: T) => OperationReceipt,
  ): Promise<T> {
    return this.lane.run(async () => {
      const ctx = createWriteContext();
      let result: T;
      try {
        result = await this.adapter.withTransaction(tx => fn(tx, ctx));
      } catch (err) {
        this.codec.forget(ctx.introduced);
        if (ctx.table) this.schema.invalidate(ctx.table);
        throw this.fail(err, collection, operation);
      }

      for (const [columnId, flatKey] of ctx.introduced) {
        this.logger.logMapping(columnId, flatKey);
      }
      if (ctx.table && ctx.schemaChanges) {
        this.logger.logSchemaChange(collection, ctx.table, ctx.schemaChanges);
      }
      this.logger.logOperation(receiptOf(result), ctx.sql.join(';\n'));
      return result;
    });
  }

  private async read<T>(collection: string, operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      throw this.fail(err, collection, operation);
    }
  }

  /** Run a synchronous check, logging and normalizing what it throws. */
  private guard<T>(collection: string, operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      throw this.fail(err, collection, operation);
    }
  }

  private fail(err: unknown, collection: string, operation: string): FlatDocError {
    const error = mapSqlError(err, collection, operation);
    this.logger.logError(error);
    return error;
  }
}
