/**
 * @module tools
 * MCP tool definitions and handlers for the replay editor.
 *
 * Each tool has a JSON Schema input definition and a handler that validates
 * the arguments, calls the {@link EditService}, and formats the response.
 * Resolved images come back as base64 PNG image content so the model can
 * look at them.
 */

import { readFile } from 'node:fs/promises';
import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { ResolveResult } from '@replay-editor/types';
import {
  ENHANCEMENT_NAMES,
  FILTER_NAMES,
  MAX_ENHANCEMENT_FACTOR,
  MIN_ENHANCEMENT_FACTOR,
  Logger,
  ReplayError,
  ValidationError,
  encodePng,
  errorMessage,
} from '@replay-editor/core';
import type { ToolContext } from './context.js';

const log = new Logger('MCP');

const SESSION_ID = { type: 'string', description: 'Session id returned by reset_session' } as const;

const SELECTION_SCHEMA = {
  description:
    'Region to edit, in display coordinates (y grows upwards). ' +
    'Rectangle: {"type":"rect","x":[x0,x1],"y":[y0,y1]}. ' +
    'Lasso: {"type":"lasso","points":[{"x":..,"y":..},...]}. Omit or null for the whole canvas.',
} as const;

const ACTION_SCHEMA = {
  type: 'object',
  description:
    'Filter: {"kind":"filter","operation":"blur"}. ' +
    'Enhancement: {"kind":"enhance","operation":{"name":"brightness","factor":1.5}}. ' +
    'Both take an optional "selection".',
  properties: {
    kind: { type: 'string', enum: ['filter', 'enhance'] },
    operation: {},
    selection: SELECTION_SCHEMA,
  },
  required: ['kind', 'operation'],
} as const;

/** All MCP tool definitions for ListTools. */
export const TOOLS: Tool[] = [
  // ── Sessions ───────────────────────────────────────────────────
  {
    name: 'reset_session',
    description:
      'Start an editing session on a PNG image. Provide either image_base64 or path. ' +
      'Passing previous_session_id drops that session and its history.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        image_base64: { type: 'string', description: 'PNG bytes, base64 encoded' },
        path: { type: 'string', description: 'Path of a PNG file readable by the server' },
        previous_session_id: { type: 'string', description: 'Session to replace' },
      },
    },
  },
  {
    name: 'get_session',
    description: 'Get session metadata: image signature, size, stack length, version and the serialized stack.',
    inputSchema: {
      type: 'object' as const,
      properties: { session_id: SESSION_ID },
      required: ['session_id'],
    },
  },

  // ── Stack editing ──────────────────────────────────────────────
  {
    name: 'append_action',
    description: 'Validate one action and push it onto the session stack. Returns the new stack version.',
    inputSchema: {
      type: 'object' as const,
      properties: { session_id: SESSION_ID, action: ACTION_SCHEMA },
      required: ['session_id', 'action'],
    },
  },
  {
    name: 'truncate',
    description: 'Keep only the first n actions (undo). Returns the new stack version.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        session_id: SESSION_ID,
        n: { type: 'integer', minimum: 0, description: 'Number of actions to keep' },
      },
      required: ['session_id', 'n'],
    },
  },
  {
    name: 'submit_edit',
    description:
      'Send a client-held stack plus optional new actions. The image signature must match the session. ' +
      'Stores the new stack, resolves it and returns the image with the serialized stack.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        session_id: SESSION_ID,
        image_signature: { type: 'string', description: 'Signature reported by get_session' },
        stack: { type: 'string', description: 'Serialized stack held by the client' },
        append: { type: 'array', items: ACTION_SCHEMA, description: 'Actions to append, in order' },
      },
      required: ['session_id', 'image_signature', 'stack'],
    },
  },

  // ── Rendering ──────────────────────────────────────────────────
  {
    name: 'resolve',
    description:
      'Render the session image with every action on its stack applied. ' +
      'Returns a PNG image plus timing and cache statistics.',
    inputSchema: {
      type: 'object' as const,
      properties: { session_id: SESSION_ID },
      required: ['session_id'],
    },
  },

  // ── Inspection ─────────────────────────────────────────────────
  {
    name: 'list_operations',
    description: 'List the available filters and enhancements and the accepted enhancement factor range.',
    inputSchema: { type: 'object' as const, properties: {} },
  },
  {
    name: 'cache_stats',
    description: 'Report replay cache counters: hits, misses, joined computations, errors and in-flight keys.',
    inputSchema: { type: 'object' as const, properties: {} },
  },
];

// ── Response formatters ────────────────────────────────────────

type ContentItem =
  | { type: 'text'; text: string }
  | { type: 'image'; data: string; mimeType: string };
export type ToolResult = { content: ContentItem[]; isError?: boolean };

function textResult(data: unknown): ToolResult {
  return { content: [{ type: 'text', text: JSON.stringify(data, null, 2) }] };
}

function imageResult(result: ResolveResult, extra: Record<string, unknown> = {}): ToolResult {
  const png = encodePng(result.buffer);
  return {
    content: [
      { type: 'image', data: Buffer.from(png).toString('base64'), mimeType: 'image/png' },
      {
        type: 'text',
        text: JSON.stringify(
          {
            ...extra,
            width: result.buffer.width,
            height: result.buffer.height,
            stack_length: result.stackLength,
            resolve_time_ms: Math.round(result.resolveTimeMs * 100) / 100,
            hits: result.hits,
            computed: result.computed,
            joined: result.joined,
            warnings: result.warnings,
          },
          null,
          2,
        ),
      },
    ],
  };
}

/** `code: message`, with the action index when the failure belongs to one action. */
export function formatError(err: unknown): string {
  if (err instanceof ReplayError) {
    const where = err.actionIndex === null ? '' : ` (action ${err.actionIndex})`;
    return `${err.code}: ${err.message}${where}`;
  }
  return `INTERNAL: ${errorMessage(err)}`;
}

function errorResult(message: string): ToolResult {
  return { content: [{ type: 'text', text: message }], isError: true };
}

// ── Argument readers ───────────────────────────────────────────

function optionalString(args: Record<string, unknown>, key: string): string | undefined {
  const value = args[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') throw new ValidationError(`'${key}' must be a string`);
  return value;
}

function requireString(args: Record<string, unknown>, key: string): string {
  const value = optionalString(args, key);
  if (value === undefined || value === '') throw new ValidationError(`'${key}' is required`);
  return value;
}

function requireCount(args: Record<string, unknown>, key: string): number {
  const value = args[key];
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw new ValidationError(`'${key}' must be an integer`);
  }
  return value;
}

function optionalArray(args: Record<string, unknown>, key: string): unknown[] | undefined {
  const value = args[key];
  if (value === undefined || value === null) return undefined;
  if (!Array.isArray(value)) throw new ValidationError(`'${key}' must be an array`);
  return value;
}

async function readImage(args: Record<string, unknown>): Promise<Uint8Array> {
  const base64 = optionalString(args, 'image_base64');
  const file = optionalString(args, 'path');
  if (base64 !== undefined && file === undefined) {
    return new Uint8Array(Buffer.from(base64, 'base64'));
  }
  if (file === undefined || base64 !== undefined) {
    throw new ValidationError("Provide exactly one of 'image_base64' or 'path'");
  }
  try {
    return new Uint8Array(await readFile(file));
  } catch (e) {
    throw new ValidationError(`Cannot read '${file}': ${errorMessage(e)}`);
  }
}

// ── Dispatch ───────────────────────────────────────────────────

/**
 * Handle a tool call against the edit service.
 * Failures become `isError` results; nothing thrown escapes.
 */
export async function handleToolCall(
  ctx: ToolContext,
  toolName: string,
  args: Record<string, unknown>,
): Promise<ToolResult> {
  const { service, cache } = ctx;
  try {
    switch (toolName) {
      case 'reset_session': {
        const bytes = await readImage(args);
        const sessionId = service.resetSession(bytes, optionalString(args, 'previous_session_id'));
        const summary = service.getSession(sessionId);
        return textResult({
          session_id: sessionId,
          image_signature: summary.signature,
          width: summary.width,
          height: summary.height,
        });
      }

      case 'get_session': {
        const summary = service.getSession(requireString(args, 'session_id'));
        return textResult({
          session_id: summary.id,
          image_signature: summary.signature,
          width: summary.width,
          height: summary.height,
          stack_length: summary.stackLength,
          stack_version: summary.stackVersion,
          stack: summary.stack,
        });
      }

      case 'append_action': {
        if (args.action === undefined) throw new ValidationError("'action' is required");
        const version = service.appendAction(requireString(args, 'session_id'), args.action);
        return textResult({ stack_version: version });
      }

      case 'truncate': {
        const version = service.truncate(requireString(args, 'session_id'), requireCount(args, 'n'));
        return textResult({ stack_version: version });
      }

      case 'resolve': {
        const result = await service.resolve(requireString(args, 'session_id'));
        return imageResult(result);
      }

      case 'submit_edit': {
        const result = await service.submit({
          sessionId: requireString(args, 'session_id'),
          imageSignature: requireString(args, 'image_signature'),
          stack: requireString(args, 'stack'),
          append: optionalArray(args, 'append'),
        });
        return imageResult(result, { stack: result.stack, stack_version: result.stackVersion });
      }

      case 'list_operations':
        return textResult({
          filters: FILTER_NAMES,
          enhancements: ENHANCEMENT_NAMES,
          factor_range: [MIN_ENHANCEMENT_FACTOR, MAX_ENHANCEMENT_FACTOR],
        });

      case 'cache_stats':
        return textResult(cache.stats());

      default:
        return errorResult(`Unknown tool: ${toolName}`);
    }
  } catch (e) {
    const message = formatError(e);
    if (e instanceof ReplayError) {
      log.debug(`${toolName} failed: ${message}`);
    } else {
      log.error(`${toolName} failed`, e);
    }
    return errorResult(message);
  }
}
