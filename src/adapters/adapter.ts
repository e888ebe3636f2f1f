/**
 * FlatDoc Abstract Adapter Interface
 *
 * Every storage driver implements this interface. The session runs all of
 * its SQL through `query` or through the executor handed to
 * `withTransaction`; nothing else in the engine touches a driver.
 */

import type { AdapterStatus, Driver, SqlDialect, SqlExecutor } from '../types.js';
import { invalidArgumentError } from '../errors.js';

export interface DatabaseAdapter extends SqlExecutor {
  readonly dialect: SqlDialect;
  readonly driver: Driver;

  // ─── Lifecycle ────────────────────────────────────────────────────
  connect(): Promise<void>;
  close(): Promise<void>;
  status(): AdapterStatus;

  // ─── Transactions ────────────────────────────────────────────────
  /** Run `fn` on one connection inside BEGIN … COMMIT; ROLLBACK when it throws. */
  withTransaction<T>(fn: (tx: SqlExecutor) => Promise<T>): Promise<T>;
}

// ─── URI Helpers ─────────────────────────────────────────────────────────────

export function detectDialect(uri: string): SqlDialect {
  if (uri.startsWith('postgresql://') || uri.startsWith('postgres://')) return 'pg';
  if (uri.startsWith('file:') || uri.startsWith('sqlite:')) return 'sqlite';

  throw invalidArgumentError(
    `Unsupported URI scheme in "${uri.substring(0, 20)}..."`,
    'Use postgresql://, postgres://, sqlite:<path>, sqlite::memory: or file:<path>.',
  );
}

export function redactUri(uri: string): string {
  try {
    const url = new URL(uri);
    if (url.password) url.password = '***';
    return url.toString();
  } catch {
    return uri.replace(/\/\/[^:]+:[^@]+@/, '//***:***@');
  }
}
