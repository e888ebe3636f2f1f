/**
 * FlatDoc Document Validation — Zod schema for accepted documents
 *
 * Documents are nested records of strings, finite numbers, booleans and
 * nulls. Arrays are rejected: a Flat Key addresses exactly one scalar.
 */

import { z } from 'zod';
import type { Document } from './types.js';
import { invalidArgumentError } from './errors.js';
import type { FlatDocError } from './errors.js';
import { RESERVED_SEGMENT } from './flatten.js';

export const scalarSchema = z.union([z.string(), z.number().finite(), z.boolean()]);

const recordSchema: z.ZodType<Document> = z.lazy(() =>
  z.record(z.union([scalarSchema, z.null(), recordSchema])),
);

// z.record skips "__proto__" entries, so they are reported before parsing.
export const documentSchema = z.preprocess((value, ctx) => {
  reportReservedKeys(value, [], ctx);
  return value;
}, recordSchema);

function reportReservedKeys(value: unknown, path: string[], ctx: z.RefinementCtx): void {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return;
  for (const key of Object.keys(value)) {
    if (key === RESERVED_SEGMENT) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `"${RESERVED_SEGMENT}" is a reserved key`,
        path: [...path, key],
      });
      continue;
    }
    reportReservedKeys(Reflect.get(value, key), [...path, key], ctx);
  }
}

export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map(i => `${i.path.length > 0 ? i.path.join('/') : '(root)'}: ${i.message}`)
    .join(', ');
}

/**
 * Parse an unknown value as a Document or fail with INVALID_ARGUMENT.
 */
export function validateDocument(value: unknown, collection?: string, operation?: string): Document {
  const result = documentSchema.safeParse(value);
  if (result.success) return result.data;
  throw documentError(result.error, collection, operation);
}

function documentError(error: z.ZodError, collection?: string, operation?: string): FlatDocError {
  return invalidArgumentError(
    `Invalid document: ${describeIssues(error)}.`,
    `Values must be strings, finite numbers, booleans, null or nested objects. Arrays are not stored; encode them as a nested object keyed by position or as a string.`,
    collection,
    operation,
  );
}
