/**
 * MCP response helpers.
 */

import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { describeFailure } from '../scan/ScanFileService.js';

export function textResult(text: string): CallToolResult {
  return { content: [{ type: 'text', text }] };
}

/**
 * Pretty-printed JSON as text content.
 */
export function jsonResult(data: unknown): CallToolResult {
  return { content: [{ type: 'text', text: JSON.stringify(data, null, 2) }] };
}

export function errorResult(message: string): CallToolResult {
  return { content: [{ type: 'text', text: message }], isError: true };
}

/**
 * Error result for a failed scan file, e.g. `TRUNCATED_BLOCK: block starting at line 4 ends before its X row`.
 */
export function scanFailureResult(err: unknown): CallToolResult {
  const failure = describeFailure(err);
  return errorResult(`${failure.code}: ${failure.message}`);
}
