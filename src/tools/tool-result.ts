// src/tools/tool-result.ts
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';

/**
 * Successful tool result: a one-line summary followed by the JSON payload.
 */
export function toolSuccess(summary: string, payload: unknown): CallToolResult {
  return {
    content: [
      { type: 'text', text: summary },
      { type: 'text', text: JSON.stringify(payload, null, 2) }
    ],
    isError: false
  };
}
