/**
 * Receipt Tests — Structured operation receipts
 */

import { describe, it, expect } from 'vitest';
import { createReceipt } from '../src/receipts.js';

describe('createReceipt', () => {
  it('creates an insert receipt', () => {
    const receipt = createReceipt({
      operation: 'insertOrReplace',
      collection: 'users',
      dialect: 'sqlite',
      startTime: Date.now() - 12,
      insertedCount: 1,
    });

    expect(receipt.operation).toBe('insertOrReplace');
    expect(receipt.collection).toBe('users');
    expect(receipt.success).toBe(true);
    expect(receipt.insertedCount).toBe(1);
    expect(receipt.matchedCount).toBe(0);
    expect(receipt.modifiedCount).toBe(0);
    expect(receipt.deletedCount).toBe(0);
    expect(receipt.dialect).toBe('sqlite');
    expect(receipt.duration).toBeGreaterThanOrEqual(12);
  });

  it('creates an update receipt', () => {
    const receipt = createReceipt({
      operation: 'update',
      collection: 'users',
      dialect: 'pg',
      startTime: Date.now(),
      matchedCount: 3,
      modifiedCount: 3,
    });

    expect(receipt.matchedCount).toBe(3);
    expect(receipt.modifiedCount).toBe(3);
    expect(receipt.dialect).toBe('pg');
  });

  it('creates a delete receipt', () => {
    const receipt = createReceipt({
      operation: 'delete',
      collection: 'users',
      dialect: 'sqlite',
      startTime: Date.now(),
      matchedCount: 2,
      deletedCount: 2,
    });

    expect(receipt.deletedCount).toBe(2);
  });

  it('honours an explicit failure', () => {
    const receipt = createReceipt({
      operation: 'purge',
      collection: 'logs',
      dialect: 'sqlite',
      startTime: Date.now(),
      success: false,
    });

    expect(receipt.success).toBe(false);
  });
});
