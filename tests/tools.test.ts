/**
 * MCP Tool Tests — schemas and dispatch against an in-memory session
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createToolHandler, isToolName, toolDefinitions } from '../mcp/tools.js';
import { FlatDoc } from '../src/flatdoc.js';
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

describe('toolDefinitions', () => {
  it('exposes one tool per operation', () => {
    expect(Object.keys(toolDefinitions)).toEqual([
      'flatdoc_insert',
      'flatdoc_get',
      'flatdoc_list',
      'flatdoc_find',
      'flatdoc_update',
      'flatdoc_delete',
      'flatdoc_query_page',
      'flatdoc_describe',
      'flatdoc_status',
    ]);
  });

  it('describes every tool', () => {
    for (const tool of Object.values(toolDefinitions)) {
      expect(tool.description.length).toBeGreaterThan(0);
    }
  });

  it('defaults paging arguments', () => {
    const parsed = toolDefinitions.flatdoc_query_page.inputSchema.parse({ collection: 'users', orderBy: 'a', pageSize: 5 });
    expect(parsed).toEqual({ collection: 'users', orderBy: 'a', direction: 'asc', page: 1, pageSize: 5 });
  });
});

describe('isToolName', () => {
  it('accepts only known tools', () => {
    expect(isToolName('flatdoc_find')).toBe(true);
    expect(isToolName('flatdoc_drop')).toBe(false);
  });
});

describe('createToolHandler', () => {
  let db: FlatDoc;
  let handle: ReturnType<typeof createToolHandler>;

  beforeEach(async () => {
    db = await FlatDoc.create({ uri: 'sqlite::memory:', label: 'tools' });
    handle = createToolHandler(db);
    await handle('flatdoc_insert', { collection: 'users', document: { user_pri: 'U1', profile: { age_ind: 30 } } });
    await handle('flatdoc_insert', { collection: 'users', document: { user_pri: 'U2', profile: { age_ind: 41 } } });
  });

  afterEach(async () => {
    await db.close();
  });

  it('inserts and reads back by id', async () => {
    const [first] = await db.find('users', 'user_pri = U1');
    expect(first).toBeDefined();
    const id = first?.id ?? '';

    expect(await handle('flatdoc_get', { collection: 'users', id })).toMatchObject({
      id,
      document: { user_pri: 'U1', profile: { age_ind: '30' } },
    });
  });

  it('finds, updates and deletes by condition', async () => {
    expect(await handle('flatdoc_update', { collection: 'users', document: { 'profile/age_ind': 31 }, where: "user_pri = 'U1'" }))
      .toMatchObject({ operation: 'update', matchedCount: 1 });

    expect(await handle('flatdoc_find', { collection: 'users', where: 'profile/age_ind = 31' })).toMatchObject([
      { document: { user_pri: 'U1', profile: { age_ind: '31' } } },
    ]);

    expect(await handle('flatdoc_delete', { collection: 'users', where: 'user_pri = U2' })).toMatchObject({
      operation: 'delete',
      deletedCount: 1,
    });
    expect(await db.count('users')).toBe(1);
  });

  it('pages with default direction and page', async () => {
    expect(await handle('flatdoc_query_page', { collection: 'users', orderBy: 'profile/age_ind', pageSize: 1 })).toMatchObject([
      { document: { user_pri: 'U1' } },
    ]);
  });

  it('describes a collection', async () => {
    expect(await handle('flatdoc_describe', { collection: 'users' })).toMatchObject({
      collection: 'users',
      documentCount: 2,
    });
  });

  it('reports status without arguments', async () => {
    expect(await handle('flatdoc_status', undefined)).toMatchObject({ state: 'connected', label: 'tools' });
  });

  it('rejects an unknown tool', async () => {
    const err = await rejection(handle('flatdoc_drop', {}));
    expect(err.code).toBe('INVALID_ARGUMENT');
    expect(err.message).toContain('Unknown tool: flatdoc_drop');
  });

  it('rejects missing arguments', async () => {
    const err = await rejection(handle('flatdoc_find', { collection: 'users' }));
    expect(err.code).toBe('INVALID_ARGUMENT');
    expect(err.operation).toBe('flatdoc_find');
    expect(err.message).toContain('Invalid arguments for flatdoc_find: where: Required.');
  });

  it('rejects arrays in documents', async () => {
    const err = await rejection(handle('flatdoc_insert', { collection: 'users', document: { user_pri: 'U3', tags: ['a'] } }));
    expect(err.code).toBe('INVALID_ARGUMENT');
    expect(err.message).toContain('Invalid arguments for flatdoc_insert: document/tags:');
  });
});
