/**
 * FlatDoc Name Mapping Store — persisted Column Identifier → Flat Key pairs
 *
 * One reserved table, read whole at startup and written through on every
 * new pair. Entries are never updated or deleted.
 */

import type { SqlDialect, SqlExecutor } from './types.js';
import { schemaConflictError } from './errors.js';
import { placeholder, quoteIdentifier } from './filter-translator.js';

export const NAME_TABLE = 'flatdoc_names';

export class NameMappingStore {
  private readonly dialect: SqlDialect;

  constructor(dialect: SqlDialect) {
    this.dialect = dialect;
  }

  async ensure(exec: SqlExecutor): Promise<void> {
    await exec.query(
      `CREATE TABLE IF NOT EXISTS ${quoteIdentifier(NAME_TABLE)} (` +
        `"hashed_name" TEXT PRIMARY KEY, ` +
        `"original_name" TEXT NOT NULL UNIQUE)`,
    );
  }

  async load(exec: SqlExecutor): Promise<Array<[string, string]>> {
    const result = await exec.query<{ hashed_name: string; original_name: string }>(
      `SELECT "hashed_name", "original_name" FROM ${quoteIdentifier(NAME_TABLE)}`,
    );
    return result.rows.map(r => [r.hashed_name, r.original_name]);
  }

  /**
   * Insert the pair unless the hashed name is already taken, then return
   * what is stored. Safe against concurrent writers: the insert is a single
   * ON CONFLICT DO NOTHING statement and the read-back decides.
   */
  async insertIfAbsent(exec: SqlExecutor, hashed: string, original: string): Promise<string> {
    await exec.query(
      `INSERT INTO ${quoteIdentifier(NAME_TABLE)} ("hashed_name", "original_name") ` +
        `VALUES (${placeholder(this.dialect, 1)}, ${placeholder(this.dialect, 2)}) ON CONFLICT DO NOTHING`,
      [hashed, original],
    );

    const stored = await exec.query<{ original_name: string }>(
      `SELECT "original_name" FROM ${quoteIdentifier(NAME_TABLE)} WHERE "hashed_name" = ${placeholder(this.dialect, 1)}`,
      [hashed],
    );
    const storedName = stored.rows[0]?.original_name;

    if (storedName !== original) {
      throw schemaConflictError(
        storedName === undefined
          ? `Flat Key "${original}" is already recorded under a different column identifier.`
          : `Column identifier "${hashed}" is recorded for "${storedName}" and cannot also map "${original}".`,
        `The name mapping table disagrees with the current codec. Rename the key or inspect ${NAME_TABLE}.`,
      );
    }
    return storedName;
  }
}
