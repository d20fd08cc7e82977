import { errorMessage } from '../errors.js';
import type { ToolResult } from '../types/index.js';

export function textResult(text: string): ToolResult {
  return { content: [{ type: 'text', text }] };
}

/**
 * Tool failure reported to the caller as text starting with "Error ..."
 */
export function errorResult(action: string, error: unknown): ToolResult {
  return {
    content: [{ type: 'text', text: `Error ${action}: ${errorMessage(error)}` }],
    isError: true,
  };
}
