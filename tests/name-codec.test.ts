/**
 * Name Codec Tests — Flat Key ⇄ Column Identifier
 */

import { createHash } from 'node:crypto';
import { describe, it, expect } from 'vitest';
import { NameCodec, isColumnId, COLUMN_PREFIX, DIGEST_LENGTH } from '../src/name-codec.js';
import { FlatDocError } from '../src/errors.js';

describe('NameCodec.encode', () => {
  it('is col_ plus the truncated sha256 of the key', () => {
    const codec = new NameCodec();
    const digest = createHash('sha256').update('details/age_ind').digest('hex');
    expect(codec.encode('details/age_ind')).toBe(`col_${digest.slice(0, 24)}`);
  });

  it('is deterministic across instances', () => {
    expect(new NameCodec().encode('user_pri')).toBe(new NameCodec().encode('user_pri'));
  });

  it('separates distinct keys', () => {
    const codec = new NameCodec();
    expect(codec.encode('details/age_ind')).not.toBe(codec.encode('details/age2_ind'));
  });

  it('produces a safe identifier', () => {
    const id = new NameCodec().encode('weird "key"; DROP TABLE x');
    expect(isColumnId(id)).toBe(true);
    expect(id).toHaveLength(COLUMN_PREFIX.length + DIGEST_LENGTH);
  });
});

describe('NameCodec mapping', () => {
  it('records a pair once', () => {
    const codec = new NameCodec();
    const id = codec.encode('a/b');
    expect(codec.recordMapping(id, 'a/b')).toBe(true);
    expect(codec.recordMapping(id, 'a/b')).toBe(false);
    expect(codec.size).toBe(1);
    expect(codec.decode(id)).toBe('a/b');
  });

  it('refuses a second key under the same identifier', () => {
    const codec = new NameCodec();
    codec.recordMapping('col_x', 'a');
    try {
      codec.recordMapping('col_x', 'b');
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(FlatDocError);
      expect(err instanceof FlatDocError && err.code).toBe('SCHEMA_CONFLICT');
    }
  });

  it('raises UNKNOWN_COLUMN for an unrecorded identifier', () => {
    const codec = new NameCodec();
    expect(codec.has('col_missing')).toBe(false);
    expect(() => codec.decode('col_missing')).toThrowError(/has no recorded Flat Key/);
  });

  it('loads persisted pairs', () => {
    const codec = new NameCodec();
    codec.load([['col_1', 'a'], ['col_2', 'b/c']]);
    expect(codec.decode('col_2')).toBe('b/c');
    expect(codec.size).toBe(2);
  });

  it('forgets only pairs that still match', () => {
    const codec = new NameCodec();
    codec.load([['col_1', 'a'], ['col_2', 'b']]);
    codec.forget([['col_1', 'a'], ['col_2', 'other']]);
    expect(codec.has('col_1')).toBe(false);
    expect(codec.has('col_2')).toBe(true);
  });
});
