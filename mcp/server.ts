#!/usr/bin/env node
/**
 * FlatDoc MCP Server
 *
 * The interface for agents: they call tools, FlatDoc holds the connection.
 * Configured from FLATDOC_* environment variables on the first call.
 */

import { FlatDoc } from '../src/flatdoc.js';
import { configFromEnv } from '../src/config.js';
import { createToolHandler } from './tools.js';

let db: FlatDoc | null = null;
let handler: ReturnType<typeof createToolHandler> | null = null;

async function getHandler(): Promise<ReturnType<typeof createToolHandler>> {
  if (handler) return handler;

  const config = configFromEnv(process.env);
  db = await FlatDoc.create({ label: 'MCP', logging: true, ...config });
  handler = createToolHandler(db);
  return handler;
}

/**
 * Handle an MCP tool call. Returns the result as a JSON-serializable object.
 */
export async function handleToolCall(toolName: string, args: unknown): Promise<unknown> {
  const handle = await getHandler();
  return handle(toolName, args);
}

// Graceful shutdown
function shutdown(signal: string): void {
  if (!db) return;
  db.close().then(
    () => process.exit(0),
    (err: unknown) => {
      console.error(`[flatdoc] close failed on ${signal}:`, err);
      process.exit(1);
    },
  );
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
