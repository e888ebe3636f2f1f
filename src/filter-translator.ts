/**
 * FlatDoc Filter Translator — equality conditions → parameterized SQL
 *
 * Two stages:
 * - parseCondition("user_pri = 'U1' AND details/age_ind = 25") → { flatKey: value }
 * - translateToSQL({ columnId: value }, dialect) → { clause, values }
 *
 * Builders return { sql, values } with dialect placeholders. Identifiers are
 * always quoted; values never appear in SQL text.
 */

import type { ColumnValues, EqualityCondition, SqlDialect, SqlQuery, SqlSortTerm, SqlTranslation } from './types.js';
import { invalidConditionError } from './errors.js';
import { RESERVED_SEGMENT } from './flatten.js';

// ─── Condition Parsing ───────────────────────────────────────────────────────

const KEY_PATTERN = /^[^\s='"]+$/;

/**
 * Parse `key = value [AND key = value ...]`. Keys are Flat Keys; values are
 * 'single-quoted' ('' escapes a quote), "double-quoted" ("" escapes), or a
 * bare token. AND is case-insensitive.
 */
export function parseCondition(condition: string): EqualityCondition {
  const parser = new ConditionParser(condition);
  return parser.parse();
}

class ConditionParser {
  private pos = 0;

  constructor(private readonly input: string) {}

  parse(): EqualityCondition {
    const result: EqualityCondition = {};
    this.skipWhitespace();
    if (this.atEnd()) throw this.fail('condition is empty');

    for (;;) {
      const key = this.readKey();
      this.skipWhitespace();
      if (this.peek() !== '=') throw this.fail(`expected "=" after "${key}"`);
      this.pos++;
      this.skipWhitespace();
      const value = this.readValue();

      const previous = Object.hasOwn(result, key) ? result[key] : undefined;
      if (previous !== undefined && previous !== value) {
        throw this.fail(`"${key}" is compared with two different values`);
      }
      result[key] = value;

      const sawSpace = this.skipWhitespace();
      if (this.atEnd()) return result;
      if (!sawSpace || !this.readKeyword('AND')) {
        throw this.fail(`expected AND at position ${this.pos + 1}`);
      }
      if (this.skipWhitespace() === false || this.atEnd()) {
        throw this.fail('expected another comparison after AND');
      }
    }
  }

  private readKey(): string {
    const start = this.pos;
    while (!this.atEnd() && !/[\s=]/.test(this.input.charAt(this.pos))) this.pos++;
    const key = this.input.slice(start, this.pos);
    if (key.length === 0) throw this.fail(`expected a key at position ${start + 1}`);
    if (!KEY_PATTERN.test(key)) throw this.fail(`"${key}" is not a valid key`);
    if (key.split('/').some(s => s.length === 0)) {
      throw this.fail(`"${key}" has an empty path segment`);
    }
    if (key.split('/').includes(RESERVED_SEGMENT)) {
      throw this.fail(`"${RESERVED_SEGMENT}" cannot be used as a key`);
    }
    return key;
  }

  private readValue(): string {
    const quote = this.peek();
    if (quote === "'" || quote === '"') return this.readQuoted(quote);

    const start = this.pos;
    while (!this.atEnd() && !/\s/.test(this.input.charAt(this.pos))) this.pos++;
    const token = this.input.slice(start, this.pos);
    if (token.length === 0) throw this.fail('missing value after "="');
    if (/['"=]/.test(token)) throw this.fail(`unexpected character in value "${token}"`);
    return token;
  }

  private readQuoted(quote: string): string {
    this.pos++;
    let value = '';
    for (;;) {
      if (this.atEnd()) throw this.fail('unterminated quoted value');
      const ch = this.input.charAt(this.pos);
      if (ch === quote) {
        if (this.input.charAt(this.pos + 1) === quote) {
          value += quote;
          this.pos += 2;
          continue;
        }
        this.pos++;
        return value;
      }
      value += ch;
      this.pos++;
    }
  }

  private readKeyword(word: string): boolean {
    const candidate = this.input.slice(this.pos, this.pos + word.length);
    if (candidate.toUpperCase() !== word) return false;
    this.pos += word.length;
    return true;
  }

  /** Returns true when at least one whitespace character was consumed. */
  private skipWhitespace(): boolean {
    const start = this.pos;
    while (!this.atEnd() && /\s/.test(this.input.charAt(this.pos))) this.pos++;
    return this.pos > start;
  }

  private peek(): string {
    return this.input.charAt(this.pos);
  }

  private atEnd(): boolean {
    return this.pos >= this.input.length;
  }

  private fail(reason: string) {
    return invalidConditionError(this.input, reason);
  }
}

// ─── SQL Filter Translation ──────────────────────────────────────────────────

/**
 * Translate an equality filter keyed by column name to a WHERE clause.
 * Placeholders start at `startIdx` so the clause can follow SET values.
 */
export function translateToSQL(
  filter: Record<string, string>,
  dialect: SqlDialect,
  startIdx = 1,
): SqlTranslation {
  const entries = Object.entries(filter);
  if (entries.length === 0) {
    return { clause: '1=1', values: [] };
  }

  const parts: string[] = [];
  const values: unknown[] = [];
  let paramIdx = startIdx;

  for (const [column, value] of entries) {
    parts.push(`${quoteIdentifier(column)} = ${placeholder(dialect, paramIdx)}`);
    values.push(value);
    paramIdx++;
  }

  return { clause: parts.join(' AND '), values };
}

// ─── SQL Sort Translation ────────────────────────────────────────────────────

export function translateSortToSQL(sort: SqlSortTerm[]): string {
  return sort
    .map(term => {
      const column = quoteIdentifier(term.column);
      const expr = term.nullDefault === undefined
        ? column
        : `COALESCE(${column}, ${quoteLiteral(term.nullDefault)})`;
      return `${expr} ${term.direction === 'desc' ? 'DESC' : 'ASC'}`;
    })
    .join(', ');
}

// ─── SQL Helper Functions ────────────────────────────────────────────────────

export function quoteIdentifier(name: string): string {
  const sanitized = name.replace(/"/g, '""');
  return `"${sanitized}"`;
}

/** Only for engine-chosen constants such as the COALESCE default. */
function quoteLiteral(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

export function placeholder(dialect: SqlDialect, idx: number): string {
  switch (dialect) {
    case 'pg':
      return `$${idx}`;
    case 'sqlite':
      return '?';
  }
}

// ─── Build Full SQL Query ────────────────────────────────────────────────────

export function buildSelectSQL(
  table: string,
  filter: Record<string, string>,
  options: {
    sort?: SqlSortTerm[];
    limit?: number;
    offset?: number;
    dialect: SqlDialect;
  },
): SqlQuery {
  const where = translateToSQL(filter, options.dialect);
  let sql = `SELECT * FROM ${quoteIdentifier(table)}`;

  if (where.clause !== '1=1') {
    sql += ` WHERE ${where.clause}`;
  }

  if (options.sort && options.sort.length > 0) {
    sql += ` ORDER BY ${translateSortToSQL(options.sort)}`;
  }

  if (options.limit !== undefined) {
    sql += ` LIMIT ${Number(options.limit)}`;
  }

  if (options.offset !== undefined) {
    sql += ` OFFSET ${Number(options.offset)}`;
  }

  return { sql, values: where.values };
}

export function buildInsertSQL(
  table: string,
  row: ColumnValues,
  dialect: SqlDialect,
): SqlQuery {
  const keys = Object.keys(row);
  const columns = keys.map(k => quoteIdentifier(k)).join(', ');
  const placeholders = keys.map((_, i) => placeholder(dialect, i + 1)).join(', ');

  return {
    sql: `INSERT INTO ${quoteIdentifier(table)} (${columns}) VALUES (${placeholders})`,
    values: Object.values(row),
  };
}

/**
 * UPDATE ... SET ... WHERE .... `returning` names columns to hand back from
 * the matched rows (both engines support RETURNING).
 */
export function buildUpdateSQL(
  table: string,
  set: ColumnValues,
  filter: Record<string, string>,
  dialect: SqlDialect,
  returning: string[] = [],
): SqlQuery {
  const setEntries = Object.entries(set);
  const setClauses = setEntries
    .map(([column], i) => `${quoteIdentifier(column)} = ${placeholder(dialect, i + 1)}`)
    .join(', ');
  const where = translateToSQL(filter, dialect, setEntries.length + 1);

  let sql = `UPDATE ${quoteIdentifier(table)} SET ${setClauses}`;
  if (where.clause !== '1=1') {
    sql += ` WHERE ${where.clause}`;
  }
  if (returning.length > 0) {
    sql += ` RETURNING ${returning.map(c => quoteIdentifier(c)).join(', ')}`;
  }

  return { sql, values: [...setEntries.map(([, v]) => v), ...where.values] };
}

export function buildDeleteSQL(
  table: string,
  filter: Record<string, string>,
  dialect: SqlDialect,
): SqlQuery {
  const where = translateToSQL(filter, dialect);

  let sql = `DELETE FROM ${quoteIdentifier(table)}`;
  if (where.clause !== '1=1') {
    sql += ` WHERE ${where.clause}`;
  }

  return { sql, values: where.values };
}

export function buildCountSQL(
  table: string,
  filter: Record<string, string>,
  dialect: SqlDialect,
): SqlQuery {
  const where = translateToSQL(filter, dialect);
  let sql = `SELECT COUNT(*) AS count FROM ${quoteIdentifier(table)}`;
  if (where.clause !== '1=1') {
    sql += ` WHERE ${where.clause}`;
  }
  return { sql, values: where.values };
}

/** Delete rows whose `column` (ISO-8601 text) sorts before `cutoff`. */
export function buildPurgeSQL(
  table: string,
  column: string,
  cutoff: string,
  dialect: SqlDialect,
): SqlQuery {
  return {
    sql: `DELETE FROM ${quoteIdentifier(table)} WHERE ${quoteIdentifier(column)} < ${placeholder(dialect, 1)}`,
    values: [cutoff],
  };
}
