/**
 * @module tools
 * Mapping between the tool catalog / result envelopes and MCP wire shapes.
 *
 * A tool call always answers with exactly one text content item holding the
 * JSON-encoded envelope; `isError` mirrors `success: false` so MCP clients
 * that only look at the flag still see the failure.
 */

import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { ToolDescriptor, ToolResult } from '@draftcast/types';

type ContentItem = { type: 'text'; text: string };
export type McpToolResult = { content: ContentItem[]; isError: boolean };

/** Catalog descriptors as MCP `Tool` definitions for ListTools. */
export function toMcpTools(descriptors: readonly ToolDescriptor[]): Tool[] {
  return descriptors.map((descriptor) => ({
    name: descriptor.name,
    description: descriptor.description,
    inputSchema: {
      type: 'object' as const,
      properties: { ...descriptor.inputSchema.properties },
      ...(descriptor.inputSchema.required ? { required: [...descriptor.inputSchema.required] } : {}),
    },
  }));
}

/** Wrap an envelope as a CallTool result. */
export function formatToolResult(result: ToolResult): McpToolResult {
  return {
    content: [{ type: 'text', text: JSON.stringify(result, null, 2) }],
    isError: !result.success,
  };
}
