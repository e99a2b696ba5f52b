/**
 * Wire shape of a tool call result. Declared as type aliases so the values
 * stay assignable to the SDK's CallToolResult.
 */

export type TextContent = { type: 'text'; text: string };

export type ToolResponse = {
  content: TextContent[];
  isError?: boolean;
};
