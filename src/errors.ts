/**
 * FlatDoc Error System — Normalized errors with self-correcting fix instructions
 *
 * Every failure leaving a public operation is a FlatDocError. Native driver
 * errors are normalized here so callers never see better-sqlite3 or pg types.
 */

import type { FlatDocErrorCode } from './types.js';

// ─── FlatDocError ────────────────────────────────────────────────────────────

export class FlatDocError extends Error {
  readonly code: FlatDocErrorCode;
  readonly originalError: unknown;
  readonly collection?: string;
  readonly operation?: string;
  readonly retryable: boolean;
  readonly timestamp: Date;
  readonly fix: string;
  /** The message without the appended fix. */
  readonly detail: string;

  constructor(opts: {
    code: FlatDocErrorCode;
    message: string;
    fix: string;
    originalError?: unknown;
    collection?: string;
    operation?: string;
    retryable?: boolean;
  }) {
    super(`${opts.message} Fix: ${opts.fix}`);
    this.name = 'FlatDocError';
    this.code = opts.code;
    this.originalError = opts.originalError;
    this.collection = opts.collection;
    this.operation = opts.operation;
    this.retryable = opts.retryable ?? ERROR_RETRYABLE[opts.code];
    this.timestamp = new Date();
    this.fix = opts.fix;
    this.detail = opts.message;
  }

  /** Copy with `collection` and `operation` filled in where this error has none. */
  withContext(collection?: string, operation?: string): FlatDocError {
    if ((this.collection ?? collection) === this.collection && (this.operation ?? operation) === this.operation) {
      return this;
    }
    return new FlatDocError({
      code: this.code,
      message: this.detail,
      fix: this.fix,
      originalError: this.originalError,
      collection: this.collection ?? collection,
      operation: this.operation ?? operation,
      retryable: this.retryable,
    });
  }
}

// ─── Error Code Metadata ─────────────────────────────────────────────────────

export const ERROR_RETRYABLE: Record<FlatDocErrorCode, boolean> = {
  SCHEMA_CONFLICT: false,
  NOT_FOUND: false,
  INVALID_CONDITION: false,
  INVALID_ARGUMENT: false,
  UNKNOWN_COLUMN: false,
  STORAGE_FAILURE: false,
  DUPLICATE_KEY: false,
  CONNECTION_FAILED: true,
  AUTHENTICATION_FAILED: false,
  TIMEOUT: true,
};

// ─── SQL Error Mapping ───────────────────────────────────────────────────────

/**
 * Normalize a better-sqlite3 or pg error. SQLite reports string codes such as
 * SQLITE_CONSTRAINT_UNIQUE, PostgreSQL reports SQLSTATE codes such as 23505.
 */
export function mapSqlError(err: unknown, collection?: string, operation?: string): FlatDocError {
  if (err instanceof FlatDocError) return err.withContext(collection, operation);

  const code = errorField(err, 'code') ?? '';
  const message = errorField(err, 'message') ?? String(err);
  const where = collection ? ` in "${collection}"` : '';

  if (
    code === '23505' ||
    code === 'SQLITE_CONSTRAINT_PRIMARYKEY' ||
    code === 'SQLITE_CONSTRAINT_UNIQUE'
  ) {
    return new FlatDocError({
      code: 'DUPLICATE_KEY',
      message: `Duplicate key violation${where}.`,
      fix: `A row with this primary key already exists. Use insertOrReplace() to overwrite it, or update() to change fields.`,
      originalError: err,
      collection,
      operation,
    });
  }

  if (code === 'ECONNREFUSED' || message.includes('ECONNREFUSED') || message.includes('connect ENOTFOUND')) {
    return new FlatDocError({
      code: 'CONNECTION_FAILED',
      message: `Cannot connect to the database.`,
      fix: `Verify FLATDOC_URI is correct and the database server is running.`,
      originalError: err,
      collection,
      operation,
    });
  }

  if (code === 'SQLITE_CANTOPEN') {
    return new FlatDocError({
      code: 'CONNECTION_FAILED',
      message: `Cannot open the SQLite database file.`,
      fix: `Check that the directory in the sqlite: URI exists and is writable.`,
      originalError: err,
      collection,
      operation,
    });
  }

  if (code === '57014' || code === 'SQLITE_BUSY' || message.includes('canceling statement due to statement timeout')) {
    return new FlatDocError({
      code: 'TIMEOUT',
      message: `Database statement timed out${where}.`,
      fix: `Retry the operation. If it keeps happening, another writer is holding a lock for too long.`,
      originalError: err,
      collection,
      operation,
    });
  }

  if (code === '28P01' || code === '28000' || message.includes('password authentication failed')) {
    return new FlatDocError({
      code: 'AUTHENTICATION_FAILED',
      message: `Database authentication failed.`,
      fix: `Check the username and password in the connection URI.`,
      originalError: err,
      collection,
      operation,
    });
  }

  return new FlatDocError({
    code: 'STORAGE_FAILURE',
    message: `Storage error${where}: ${message}`,
    fix: `Check the original error for details. The write was rolled back.`,
    originalError: err,
    collection,
    operation,
  });
}

// ─── Self-Correcting Error Helpers ───────────────────────────────────────────

export function schemaConflictError(message: string, fix: string, collection?: string): FlatDocError {
  return new FlatDocError({ code: 'SCHEMA_CONFLICT', message, fix, collection });
}

export function invalidArgumentError(message: string, fix: string, collection?: string, operation?: string): FlatDocError {
  return new FlatDocError({ code: 'INVALID_ARGUMENT', message, fix, collection, operation });
}

export function invalidConditionError(condition: string, reason: string): FlatDocError {
  return new FlatDocError({
    code: 'INVALID_CONDITION',
    message: `Cannot parse condition "${condition}": ${reason}.`,
    fix: `Write conditions as key = value [AND key = value ...], e.g. user_pri = 'U1' AND details/age_ind = 25.`,
  });
}

export function notFoundError(collection: string, id: string): FlatDocError {
  return new FlatDocError({
    code: 'NOT_FOUND',
    message: `No document with id "${id}" in "${collection}".`,
    fix: `Use listAll() or find() to look up existing ids.`,
    collection,
    operation: 'getById',
  });
}

// ─── Helpers ─────────────────────────────────────────────────────────────────

function errorField(err: unknown, key: string): string | undefined {
  if (typeof err !== 'object' || err === null) return undefined;
  const value: unknown = Reflect.get(err, key);
  return typeof value === 'string' ? value : undefined;
}
