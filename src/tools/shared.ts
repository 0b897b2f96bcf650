/**
 * Shared Tool Utilities
 *
 * Common types, formatters, and error handlers used across all tool modules.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module tools/shared
 */

import type { z } from 'zod';

import { MCPError, formatErrorResponse } from '../server/errors.js';

// ═══════════════════════════════════════════════════════════════════════════════
// TYPE DEFINITIONS
// ═══════════════════════════════════════════════════════════════════════════════

/** MCP tool response format */
export type ToolResponse = { content: Array<{ type: 'text'; text: string }>; isError?: boolean };

type ToolHandler = (params: Record<string, unknown>) => Promise<ToolResponse>;

export interface ToolDefinition {
  description: string;
  inputSchema: z.ZodRawShape;
  handler: ToolHandler;
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELPER FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

/** Responses above this have their long arrays capped */
const MAX_RESPONSE_BYTES = 700 * 1024;

/**
 * Format tool result as MCP content response. Oversized results keep their
 * summary fields; long arrays are capped and flagged with `_response_truncated`.
 */
export function formatResponse(result: unknown): ToolResponse {
  const json = JSON.stringify(result, null, 2);
  if (json.length <= MAX_RESPONSE_BYTES) {
    return { content: [{ type: 'text', text: json }] };
  }
  return { content: [{ type: 'text', text: JSON.stringify(truncateArrays(result), null, 2) }] };
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Caps every array longer than 50 items, at any depth, recording original sizes */
function capArrays(value: Record<string, unknown>, path: string[], truncated: string[]): Record<string, unknown> {
  const copy: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (Array.isArray(entry) && entry.length > 50) {
      copy[key] = entry.slice(0, 50);
      copy[`_${key}_total`] = entry.length;
      truncated.push(`${[...path, key].join('.')} (${entry.length} → 50)`);
    } else if (isPlainObject(entry)) {
      copy[key] = capArrays(entry, [...path, key], truncated);
    } else {
      copy[key] = entry;
    }
  }
  return copy;
}

function truncateArrays(result: unknown): Record<string, unknown> {
  const reason = `Response exceeded ${Math.round(MAX_RESPONSE_BYTES / 1024)}KB limit`;
  if (!isPlainObject(result)) {
    return { _response_truncated: { reason } };
  }
  const truncatedFields: string[] = [];
  const copy = capArrays(result, [], truncatedFields);
  copy._response_truncated = {
    reason,
    truncated_fields: truncatedFields,
    suggestion: 'Use a smaller limit or a narrower filter',
  };
  return copy;
}

/**
 * Handle errors uniformly
 */
export function handleError(error: unknown): ToolResponse {
  const mcpError = MCPError.fromUnknown(error);
  console.error(`[ERROR] ${mcpError.category}: ${mcpError.message}`);
  return {
    content: [{ type: 'text', text: JSON.stringify(formatErrorResponse(mcpError), null, 2) }],
    isError: true,
  };
}
