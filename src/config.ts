/**
 * FlatDoc Configuration — Zod-validated session config
 */

import { z } from 'zod';
import type { FlatDocConfig } from './types.js';
import { invalidArgumentError } from './errors.js';
import { describeIssues } from './validate.js';

export const DEFAULT_SLOW_QUERY_MS = 1000;

export const configSchema = z.object({
  uri: z.string().min(1).describe('postgresql://…, postgres://…, sqlite:<path>, sqlite::memory: or file:<path>'),
  label: z.string().optional(),
  pool: z.enum(['high', 'standard', 'low']).optional(),
  logging: z.union([z.boolean(), z.literal('verbose')]).optional(),
  slowQueryMs: z.number().int().nonnegative().optional(),
});

export function parseConfig(value: unknown): FlatDocConfig {
  const result = configSchema.safeParse(value);
  if (result.success) return result.data;
  throw invalidArgumentError(
    `Invalid FlatDoc config: ${describeIssues(result.error)}.`,
    `Pass { uri } plus optional label, pool ('high' | 'standard' | 'low'), logging (true | false | 'verbose') and slowQueryMs.`,
  );
}

// ─── Environment ─────────────────────────────────────────────────────────────

const envSchema = z.object({
  FLATDOC_URI: z.string().min(1, 'FLATDOC_URI environment variable is required'),
  FLATDOC_LABEL: z.string().optional(),
  FLATDOC_POOL: z.enum(['high', 'standard', 'low']).optional(),
  FLATDOC_LOGGING: z.enum(['true', 'false', 'verbose']).optional(),
  FLATDOC_SLOW_QUERY_MS: z.string().regex(/^\d+$/, 'must be a whole number of milliseconds').optional(),
});

/**
 * Build a config from FLATDOC_* variables.
 */
export function configFromEnv(env: Record<string, string | undefined>): FlatDocConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    throw invalidArgumentError(
      `Invalid environment: ${describeIssues(result.error)}.`,
      `Set FLATDOC_URI, and optionally FLATDOC_LABEL, FLATDOC_POOL, FLATDOC_LOGGING and FLATDOC_SLOW_QUERY_MS.`,
    );
  }

  const vars = result.data;
  const config: FlatDocConfig = { uri: vars.FLATDOC_URI };
  if (vars.FLATDOC_LABEL !== undefined) config.label = vars.FLATDOC_LABEL;
  if (vars.FLATDOC_POOL !== undefined) config.pool = vars.FLATDOC_POOL;
  if (vars.FLATDOC_LOGGING !== undefined) {
    config.logging = vars.FLATDOC_LOGGING === 'verbose' ? 'verbose' : vars.FLATDOC_LOGGING === 'true';
  }
  if (vars.FLATDOC_SLOW_QUERY_MS !== undefined) config.slowQueryMs = Number(vars.FLATDOC_SLOW_QUERY_MS);
  return config;
}
