/**
 * Name Mapping Store Tests — persisted pairs and disagreement detection
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { NameMappingStore, NAME_TABLE } from '../src/name-mapping-store.js';
import { SqliteAdapter } from '../src/adapters/sqlite-adapter.js';
import { FlatDocEventEmitter } from '../src/events.js';
import { FlatDocError } from '../src/errors.js';

async function rejection(promise: Promise<unknown>): Promise<FlatDocError> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof FlatDocError) return err;
    throw err;
  }
  throw new Error('expected a FlatDocError');
}

describe('NameMappingStore', () => {
  let adapter: SqliteAdapter;
  let store: NameMappingStore;

  beforeEach(async () => {
    adapter = new SqliteAdapter({ uri: 'sqlite::memory:' }, new FlatDocEventEmitter());
    await adapter.connect();
    store = new NameMappingStore('sqlite');
    await store.ensure(adapter);
    await adapter.query(`INSERT INTO "${NAME_TABLE}" ("hashed_name", "original_name") VALUES (?, ?)`, [
      'col_a',
      'nickname',
    ]);
  });

  afterEach(async () => {
    await adapter.close();
  });

  it('returns the stored key for a matching pair', async () => {
    expect(await store.insertIfAbsent(adapter, 'col_a', 'nickname')).toBe('nickname');
    expect(await store.load(adapter)).toEqual([['col_a', 'nickname']]);
  });

  it('records a new pair', async () => {
    expect(await store.insertIfAbsent(adapter, 'col_b', 'email')).toBe('email');
    expect((await store.load(adapter)).length).toBe(2);
  });

  it('refuses a second key under a stored identifier', async () => {
    const err = await rejection(store.insertIfAbsent(adapter, 'col_a', 'alias'));
    expect(err.code).toBe('SCHEMA_CONFLICT');
    expect(err.message).toContain('Column identifier "col_a" is recorded for "nickname" and cannot also map "alias".');
    expect(await store.load(adapter)).toEqual([['col_a', 'nickname']]);
  });

  it('refuses a stored key under a second identifier', async () => {
    const err = await rejection(store.insertIfAbsent(adapter, 'col_z', 'nickname'));
    expect(err.code).toBe('SCHEMA_CONFLICT');
    expect(err.message).toContain('Flat Key "nickname" is already recorded under a different column identifier.');
    expect(await store.load(adapter)).toEqual([['col_a', 'nickname']]);
  });
});
