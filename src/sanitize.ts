/**
 * FlatDoc Input Sanitization — collection paths and identifiers
 *
 * Only two kinds of identifiers ever reach SQL text: table names derived
 * from collection paths (validated here) and `col_…` / system column names
 * produced by the engine itself. Every value is a bound parameter.
 */

import { invalidArgumentError } from './errors.js';

export const PATH_DELIMITER = '/';
export const TABLE_DELIMITER = '_';
export const RESERVED_TABLE_PREFIX = 'flatdoc_';
export const MAX_TABLE_NAME_LENGTH = 63;

const SEGMENT_PATTERN = /^[A-Za-z0-9_]+$/;

/**
 * Derive the backing table name from a collection path: "A/b" → "a_b".
 *
 * Table names are lower-cased since SQLite compares them case-insensitively.
 * The mapping is deterministic but not injective on its own ("a/b", "a_b" and
 * "A_B" share a table); the schema manager's collection registry rejects the
 * second path that claims an already-owned table.
 */
export function collectionToTableName(path: string): string {
  if (path.length === 0) {
    throw invalidArgumentError(
      'Collection path is empty.',
      'Pass a collection path such as "users" or "tenants/orders".',
    );
  }

  const segments = path.split(PATH_DELIMITER);
  for (const segment of segments) {
    if (!SEGMENT_PATTERN.test(segment)) {
      throw invalidArgumentError(
        `Invalid collection path "${path}".`,
        `Each "/"-separated segment must be non-empty and use only letters, digits and "_".`,
        path,
      );
    }
  }

  const table = segments.join(TABLE_DELIMITER).toLowerCase();

  if (table.length > MAX_TABLE_NAME_LENGTH) {
    throw invalidArgumentError(
      `Collection path "${path}" is too long (${table.length} chars, max ${MAX_TABLE_NAME_LENGTH}).`,
      `Shorten the collection path.`,
      path,
    );
  }

  if (table.startsWith(RESERVED_TABLE_PREFIX)) {
    throw invalidArgumentError(
      `Collection path "${path}" uses the reserved prefix "${RESERVED_TABLE_PREFIX}".`,
      `Choose a collection path that does not start with "${RESERVED_TABLE_PREFIX}".`,
      path,
    );
  }

  return table;
}
