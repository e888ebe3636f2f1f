/**
 * FlatDoc — System Column Stamping
 *
 * Every collection table carries `_id`, `_created_at` and `_updated_at`.
 * Data columns are always `col_…`, so the names cannot collide.
 * Immutable — always returns new objects, never mutates input.
 */

import type { ColumnValues } from './types.js';

export const ID_COLUMN = '_id';
export const CREATED_AT_COLUMN = '_created_at';
export const UPDATED_AT_COLUMN = '_updated_at';

export const SYSTEM_COLUMNS: readonly string[] = [ID_COLUMN, CREATED_AT_COLUMN, UPDATED_AT_COLUMN];

export function isSystemColumn(name: string): boolean {
  return SYSTEM_COLUMNS.includes(name);
}

/** ISO-8601 UTC text, which sorts chronologically as a string. */
export function toTimestamp(date: Date): string {
  return date.toISOString();
}

/**
 * Add the row id and both timestamps to a new row.
 */
export function stampInsert(values: ColumnValues, id: string, now?: Date): ColumnValues {
  const timestamp = toTimestamp(now ?? new Date());
  return {
    ...values,
    [ID_COLUMN]: id,
    [CREATED_AT_COLUMN]: timestamp,
    [UPDATED_AT_COLUMN]: timestamp,
  };
}

/**
 * Add `_updated_at` to a SET map. `_id` and `_created_at` are never touched
 * by an update.
 */
export function stampUpdate(values: ColumnValues, now?: Date): ColumnValues {
  return {
    ...values,
    [UPDATED_AT_COLUMN]: toTimestamp(now ?? new Date()),
  };
}
