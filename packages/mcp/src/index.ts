/**
 * @module mcp
 * MCP (Model Context Protocol) server for the replay editor.
 *
 * Speaks the protocol over stdio and serves every tool call from an
 * in-process {@link EditService}. stdout carries protocol frames only, so all
 * logging is routed to stderr.
 *
 * Architecture:
 *   MCP client ──stdio──> This server (Node.js)
 *                               │
 *                               ↓
 *                   EditService → ResolutionEngine → ReplayCache → backend
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import { Logger, stderrSink } from '@replay-editor/core';
import { loadConfig } from './config.js';
import { createContext } from './context.js';
import { TOOLS, handleToolCall } from './tools.js';

/** How often idle sessions are swept, at most. */
const MAX_SWEEP_INTERVAL_MS = 60_000;

Logger.setSink(stderrSink);
const config = loadConfig();
Logger.setLevel(config.logLevel);
const log = new Logger('MCP');

const ctx = createContext(config);

const server = new Server(
  { name: 'replay-editor', version: '0.1.0' },
  { capabilities: { tools: {} } },
);

server.setRequestHandler(ListToolsRequestSchema, async () => ({
  tools: TOOLS,
}));

server.setRequestHandler(CallToolRequestSchema, async (request) => {
  const { name, arguments: args } = request.params;
  return handleToolCall(ctx, name, args ?? {});
});

if (config.sessionTtlMs > 0) {
  const sweep = setInterval(() => {
    ctx.service.sweepExpired();
  }, Math.min(config.sessionTtlMs, MAX_SWEEP_INTERVAL_MS));
  sweep.unref();
}

const transport = new StdioServerTransport();
await server.connect(transport);
log.info('Replay editor MCP server ready on stdio');
