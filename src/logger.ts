/**
 * FlatDoc Logger — Structured operation logging
 *
 * Emits operation, schema and error events with timing, receipt, and
 * optionally the SQL that ran.
 */

import type { EnsureTableResult, OperationReceipt } from './types.js';
import type { FlatDocEventEmitter } from './events.js';
import type { FlatDocError } from './errors.js';

export interface LoggerConfig {
  enabled: boolean;
  verbose: boolean;
  slowQueryMs: number;
}

export class FlatDocLogger {
  private config: LoggerConfig;
  private emitter: FlatDocEventEmitter;

  constructor(config: LoggerConfig, emitter: FlatDocEventEmitter) {
    this.config = config;
    this.emitter = emitter;
  }

  /**
   * Log a completed operation.
   */
  logOperation(receipt: OperationReceipt, sql?: string): void {
    if (!this.config.enabled) return;

    this.emitter.emit('operation', {
      collection: receipt.collection,
      operation: receipt.operation,
      durationMs: receipt.duration,
      receipt,
      sql: this.config.verbose ? sql : undefined,
    });

    if (receipt.duration >= this.config.slowQueryMs) {
      this.emitter.emit('slow-query', {
        collection: receipt.collection,
        operation: receipt.operation,
        durationMs: receipt.duration,
        threshold: this.config.slowQueryMs,
      });
    }
  }

  logSchemaChange(collection: string, table: string, result: EnsureTableResult): void {
    if (!this.config.enabled) return;

    if (result.created) {
      this.emitter.emit('schema-change', { collection, table, action: 'create-table' });
    }
    for (const column of result.addedColumns) {
      this.emitter.emit('schema-change', { collection, table, action: 'add-column', column });
    }
    for (const column of result.createdIndexes) {
      this.emitter.emit('schema-change', { collection, table, action: 'create-index', column });
    }
  }

  logMapping(columnId: string, flatKey: string): void {
    if (!this.config.enabled) return;
    this.emitter.emit('mapping-recorded', { columnId, flatKey });
  }

  /** Errors are emitted even with logging disabled. */
  logError(err: FlatDocError): void {
    // EventEmitter throws on an 'error' event nobody listens to
    if (this.emitter.listenerCount('error') === 0) return;

    this.emitter.emit('error', {
      code: err.code,
      message: err.message,
      fix: err.fix,
      collection: err.collection,
      operation: err.operation,
    });
  }
}
