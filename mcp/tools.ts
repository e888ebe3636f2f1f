/**
 * FlatDoc MCP Tool Definitions
 *
 * Every tool includes Zod input schemas with descriptions, so a client
 * connecting to the tool server gets self-documenting tools. The handler
 * parses arguments with the same schemas before dispatching.
 */

import { z } from 'zod';
import type { FlatDoc } from '../src/flatdoc.js';
import { invalidArgumentError } from '../src/errors.js';
import { documentSchema, describeIssues } from '../src/validate.js';

const collectionSchema = z.string().min(1).describe('Collection path, e.g. "users" or "tenants/orders"');
const whereSchema = z.string().min(1).describe(`Equality condition: key = value [AND key = value ...]. Example: user_pri = 'U1' AND details/age_ind = 25`);
const documentArg = documentSchema.describe('Nested document of strings, numbers, booleans, nulls and objects');

export const toolDefinitions = {
  flatdoc_insert: {
    description: 'Insert a document, or replace the stored one with the same primary key (keys ending in _pri). Returns the row id and a receipt.',
    inputSchema: z.object({
      collection: collectionSchema,
      document: documentArg,
    }),
  },
  flatdoc_get: {
    description: 'Fetch one document by its row id.',
    inputSchema: z.object({
      collection: collectionSchema,
      id: z.string().min(1).describe('Row id returned by flatdoc_insert'),
    }),
  },
  flatdoc_list: {
    description: 'List every document in a collection, oldest first.',
    inputSchema: z.object({
      collection: collectionSchema,
    }),
  },
  flatdoc_find: {
    description: 'Find documents matching an equality condition.',
    inputSchema: z.object({
      collection: collectionSchema,
      where: whereSchema,
    }),
  },
  flatdoc_update: {
    description: 'Set fields on every document matching the condition. Use "a/b" keys for nested fields; null clears a field.',
    inputSchema: z.object({
      collection: collectionSchema,
      document: documentArg,
      where: whereSchema,
    }),
  },
  flatdoc_delete: {
    description: 'Delete every document matching the condition.',
    inputSchema: z.object({
      collection: collectionSchema,
      where: whereSchema,
    }),
  },
  flatdoc_query_page: {
    description: 'One page of documents sorted by a key. Documents without the key sort as "0".',
    inputSchema: z.object({
      collection: collectionSchema,
      orderBy: z.string().min(1).describe('Original key to sort by, e.g. "details/age_ind"'),
      direction: z.string().default('asc').describe('"asc" or "desc"'),
      page: z.number().int().positive().default(1).describe('Page number, starting at 1'),
      pageSize: z.number().int().positive().describe('Documents per page'),
    }),
  },
  flatdoc_describe: {
    description: 'Discover the keys, primary key and indexes of a collection. Call this BEFORE writing a condition.',
    inputSchema: z.object({
      collection: collectionSchema,
    }),
  },
  flatdoc_status: {
    description: 'Check database connection health.',
    inputSchema: z.object({}),
  },
} as const;

export type ToolName = keyof typeof toolDefinitions;

export function isToolName(name: string): name is ToolName {
  return name in toolDefinitions;
}

/** The session operations the tools call. */
export type ToolTarget = Pick<
  FlatDoc,
  'insertOrReplace' | 'getById' | 'listAll' | 'find' | 'update' | 'delete' | 'queryPaginated' | 'describe' | 'status'
>;

function parseArgs<S extends z.ZodTypeAny>(schema: S, toolName: ToolName, args: unknown): z.infer<S> {
  const result = schema.safeParse(args ?? {});
  if (result.success) return result.data;
  throw invalidArgumentError(
    `Invalid arguments for ${toolName}: ${describeIssues(result.error)}.`,
    `Check the tool's input schema.`,
    undefined,
    toolName,
  );
}

/**
 * Build the dispatcher for MCP tool calls. Returns JSON-serializable results.
 */
export function createToolHandler(db: ToolTarget) {
  return async function handleToolCall(toolName: string, args: unknown): Promise<unknown> {
    if (!isToolName(toolName)) {
      throw invalidArgumentError(
        `Unknown tool: ${toolName}`,
        `Available tools: ${Object.keys(toolDefinitions).join(', ')}.`,
      );
    }

    switch (toolName) {
      case 'flatdoc_insert': {
        const a = parseArgs(toolDefinitions.flatdoc_insert.inputSchema, toolName, args);
        return db.insertOrReplace(a.collection, a.document);
      }

      case 'flatdoc_get': {
        const a = parseArgs(toolDefinitions.flatdoc_get.inputSchema, toolName, args);
        return db.getById(a.collection, a.id);
      }

      case 'flatdoc_list': {
        const a = parseArgs(toolDefinitions.flatdoc_list.inputSchema, toolName, args);
        return db.listAll(a.collection);
      }

      case 'flatdoc_find': {
        const a = parseArgs(toolDefinitions.flatdoc_find.inputSchema, toolName, args);
        return db.find(a.collection, a.where);
      }

      case 'flatdoc_update': {
        const a = parseArgs(toolDefinitions.flatdoc_update.inputSchema, toolName, args);
        return db.update(a.collection, a.document, a.where);
      }

      case 'flatdoc_delete': {
        const a = parseArgs(toolDefinitions.flatdoc_delete.inputSchema, toolName, args);
        return db.delete(a.collection, a.where);
      }

      case 'flatdoc_query_page': {
        const a = parseArgs(toolDefinitions.flatdoc_query_page.inputSchema, toolName, args);
        return db.queryPaginated(a.collection, a.orderBy, a.direction, a.page, a.pageSize);
      }

      case 'flatdoc_describe': {
        const a = parseArgs(toolDefinitions.flatdoc_describe.inputSchema, toolName, args);
        return db.describe(a.collection);
      }

      case 'flatdoc_status':
        parseArgs(toolDefinitions.flatdoc_status.inputSchema, toolName, args);
        return db.status();
    }
  };
}
