/**
 * FlatDoc Name Codec — Flat Key ⇄ Column Identifier
 *
 * Column Identifiers are `col_` plus a truncated SHA-256 of the Flat Key, so
 * they fit every engine's identifier limits and never need quoting rules
 * beyond the usual double quotes. The forward direction is a pure function;
 * the reverse direction needs the recorded mapping.
 */

import { createHash } from 'node:crypto';
import { FlatDocError, schemaConflictError } from './errors.js';

export const COLUMN_PREFIX = 'col_';
export const DIGEST_LENGTH = 24;

const COLUMN_ID_PATTERN = new RegExp(`^${COLUMN_PREFIX}[0-9a-f]{${DIGEST_LENGTH}}$`);

export function isColumnId(name: string): boolean {
  return COLUMN_ID_PATTERN.test(name);
}

export class NameCodec {
  private readonly byColumn = new Map<string, string>();

  get size(): number {
    return this.byColumn.size;
  }

  encode(flatKey: string): string {
    const digest = createHash('sha256').update(flatKey, 'utf8').digest('hex');
    return `${COLUMN_PREFIX}${digest.slice(0, DIGEST_LENGTH)}`;
  }

  /**
   * Record columnId → flatKey. Returns true when the pair is new.
   * First write wins: a different Flat Key under the same id is a collision.
   */
  recordMapping(columnId: string, flatKey: string): boolean {
    const existing = this.byColumn.get(columnId);
    if (existing === undefined) {
      this.byColumn.set(columnId, flatKey);
      return true;
    }
    if (existing !== flatKey) {
      throw schemaConflictError(
        `Column identifier "${columnId}" is already mapped to "${existing}" and cannot also map "${flatKey}".`,
        `Rename one of the two keys; their digests collide.`,
      );
    }
    return false;
  }

  decode(columnId: string): string {
    const flatKey = this.byColumn.get(columnId);
    if (flatKey === undefined) {
      throw new FlatDocError({
        code: 'UNKNOWN_COLUMN',
        message: `Column identifier "${columnId}" has no recorded Flat Key.`,
        fix: `Reload the name mapping; the column may have been introduced by another process.`,
      });
    }
    return flatKey;
  }

  has(columnId: string): boolean {
    return this.byColumn.has(columnId);
  }

  /** Seed from persisted pairs. Conflicting pairs still raise. */
  load(pairs: Iterable<[columnId: string, flatKey: string]>): void {
    for (const [columnId, flatKey] of pairs) {
      this.recordMapping(columnId, flatKey);
    }
  }

  /** Drop pairs recorded by a write that rolled back. */
  forget(pairs: Iterable<[columnId: string, flatKey: string]>): void {
    for (const [columnId, flatKey] of pairs) {
      if (this.byColumn.get(columnId) === flatKey) {
        this.byColumn.delete(columnId);
      }
    }
  }
}
