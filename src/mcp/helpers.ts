/**
 * MCP response helpers.
 */

import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { ScriptRepositoryError } from '../types/errors.js';

/**
 * Create a text content result.
 */
export function textResult(text: string): CallToolResult {
  return { content: [{ type: 'text', text }] };
}

/**
 * Create a JSON content result.
 */
export function jsonResult(data: unknown): CallToolResult {
  return { content: [{ type: 'text', text: JSON.stringify(data, null, 2) }] };
}

/**
 * Create an error result.
 */
export function errorResult(message: string): CallToolResult {
  return { content: [{ type: 'text', text: message }], isError: true };
}

/**
 * Turn a thrown error into a tool error. Repository errors carry their code.
 */
export function toolErrorResult(err: unknown): CallToolResult {
  if (err instanceof ScriptRepositoryError) {
    return errorResult(`${err.code}: ${err.message}`);
  }
  return errorResult(`Tool error: ${err instanceof Error ? err.message : String(err)}`);
}
