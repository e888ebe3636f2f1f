/**
 * FlatDoc Flattener — nested documents ⇄ flat column maps
 *
 *   { details: { address: { city: 'Oslo' } } }
 *     → Flat Key "details/address/city"
 *     → Column Identifier "col_…" (NameCodec)
 *
 * Reconstruction walks the Flat Key segments back into nested objects and
 * refuses to let a scalar and a sub-document share a path.
 */

import type { ColumnValues, Document, DocumentValue, FlatRow, FlattenResult, Scalar } from './types.js';
import { invalidArgumentError, schemaConflictError } from './errors.js';
import type { NameCodec } from './name-codec.js';

export const PATH_SEPARATOR = '/';
export const PRIMARY_KEY_SUFFIX = '_pri';
export const INDEX_SUFFIX = '_ind';
export const RESERVED_SEGMENT = '__proto__';

export function isPrimaryKeyFlatKey(flatKey: string): boolean {
  return flatKey.endsWith(PRIMARY_KEY_SUFFIX);
}

export function isIndexFlatKey(flatKey: string): boolean {
  return flatKey.endsWith(INDEX_SUFFIX);
}

export function isDocument(value: DocumentValue | undefined): value is Document {
  return typeof value === 'object' && value !== null;
}

/** Stored text form of a scalar. Types are not preserved. */
export function toColumnValue(value: Scalar | null): string | null {
  if (value === null) return null;
  if (typeof value === 'string') return value;
  return String(value);
}

// ─── Flatten ─────────────────────────────────────────────────────────────────

export function flatten(document: Document, codec: NameCodec): FlattenResult {
  const leaves = new Map<string, Scalar | null>();
  collectLeaves(document, [], leaves);
  assertPrefixFree(leaves.keys());

  const values: ColumnValues = {};
  const keys: Record<string, string> = {};
  const introduced: Array<[string, string]> = [];

  try {
    for (const [flatKey, value] of leaves) {
      const columnId = codec.encode(flatKey);
      if (codec.recordMapping(columnId, flatKey)) {
        introduced.push([columnId, flatKey]);
      }
      values[columnId] = toColumnValue(value);
      keys[columnId] = flatKey;
    }
  } catch (err) {
    codec.forget(introduced);
    throw err;
  }

  return { values, keys, introduced };
}

function collectLeaves(node: Document, path: string[], leaves: Map<string, Scalar | null>): void {
  for (const [key, value] of Object.entries(node)) {
    const next = [...path, ...splitKey(key)];
    if (isDocument(value)) {
      collectLeaves(value, next, leaves);
    } else {
      // duplicates: last one wins
      leaves.set(next.join(PATH_SEPARATOR), value);
    }
  }
}

/**
 * A key may itself carry separators ("details/age_ind"); it is read as a
 * path. Empty segments have no nested form and are rejected, and so is
 * "__proto__", which cannot be an own key of a rebuilt document.
 */
export function splitKey(key: string): string[] {
  const segments = key.split(PATH_SEPARATOR);
  if (segments.some(s => s.length === 0)) {
    throw invalidArgumentError(
      `Invalid document key "${key}".`,
      `Keys must be non-empty and must not start or end with "${PATH_SEPARATOR}" or contain "${PATH_SEPARATOR}${PATH_SEPARATOR}".`,
    );
  }
  if (segments.includes(RESERVED_SEGMENT)) {
    throw invalidArgumentError(
      `Invalid document key "${key}".`,
      `"${RESERVED_SEGMENT}" cannot be used as a key or path segment.`,
    );
  }
  return segments;
}

/** "a" and "a/b" cannot both hold scalars in one document. */
export function assertPrefixFree(flatKeys: Iterable<string>): void {
  const all = new Set(flatKeys);
  for (const flatKey of all) {
    const segments = flatKey.split(PATH_SEPARATOR);
    for (let depth = 1; depth < segments.length; depth++) {
      const prefix = segments.slice(0, depth).join(PATH_SEPARATOR);
      if (all.has(prefix)) {
        throw schemaConflictError(
          `"${prefix}" holds a value and is also the parent of "${flatKey}".`,
          `A key cannot be both a scalar and an object. Rename one of them.`,
        );
      }
    }
  }
}

// ─── Unflatten ───────────────────────────────────────────────────────────────

/**
 * Rebuild documents from rows whose NULL columns are already dropped.
 * Identifiers without a recorded Flat Key become opaque top-level keys.
 */
export function unflatten(rows: FlatRow[], codec: NameCodec): Document[] {
  return rows.map(row => unflattenRow(row, codec));
}

function unflattenRow(row: FlatRow, codec: NameCodec): Document {
  const doc: Document = {};

  for (const [columnId, value] of Object.entries(row)) {
    const flatKey = codec.has(columnId) ? codec.decode(columnId) : columnId;
    const segments = flatKey.split(PATH_SEPARATOR);
    const leaf = segments.pop() ?? flatKey;

    let node = doc;
    for (const segment of segments) {
      const child = Object.hasOwn(node, segment) ? node[segment] : undefined;
      if (child === undefined) {
        const created: Document = {};
        node[segment] = created;
        node = created;
      } else if (isDocument(child)) {
        node = child;
      } else {
        throw structuralConflict(flatKey, segment);
      }
    }

    if (Object.hasOwn(node, leaf)) {
      throw structuralConflict(flatKey, leaf);
    }
    node[leaf] = value;
  }

  return doc;
}

/** Drop NULL-valued columns from a raw row. */
export function stripNulls(row: Record<string, unknown>): FlatRow {
  const out: FlatRow = {};
  for (const [column, value] of Object.entries(row)) {
    if (value === null || value === undefined) continue;
    out[column] = typeof value === 'string' ? value : String(value);
  }
  return out;
}

function structuralConflict(flatKey: string, segment: string) {
  return schemaConflictError(
    `Stored key "${flatKey}" clashes at "${segment}": a value and a nested object share the same path.`,
    `Clear one of the conflicting fields with update(..., { "${flatKey}": null }, condition).`,
  );
}
