import type { ToolResponse } from '../../domain/types';

/**
 * Text content response. JSON text is pretty-printed, anything else is passed
 * through as-is.
 */
export function formatTextResponse(text: unknown): ToolResponse {
  if (typeof text === 'string') {
    try {
      const parsed: unknown = JSON.parse(text);
      return { content: [{ type: 'text', text: JSON.stringify(parsed, null, 2) }] };
    } catch {
      return { content: [{ type: 'text', text }] };
    }
  }
  return { content: [{ type: 'text', text: String(text) }] };
}

export function formatErrorResponse(error: string): ToolResponse {
  return { content: [{ type: 'text', text: `Error: ${error}` }], isError: true };
}

/**
 * Concatenated text of a response, for surfaces that return plain bodies
 */
export function responseText(response: ToolResponse): string {
  return response.content.map((part) => part.text).join('\n');
}
