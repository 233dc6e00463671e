/**
 * @module server
 * Builds one MCP `Server` bound to a {@link ToolDispatcher}.
 *
 * An SDK server attaches to a single transport, so the stdio entry creates
 * one and the SSE entry creates one per connection. All of them share the
 * same dispatcher and therefore the same draft registry.
 *
 * Calls on one server run strictly one at a time in arrival order; calls on
 * different servers interleave freely.
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import { Mutex, createLogger } from '@draftcast/core';
import type { CallChannel, Logger, ToolDispatcher } from '@draftcast/types';
import { formatToolResult, toMcpTools } from './tools.js';

export const SERVER_NAME = 'draftcast';
export const SERVER_VERSION = '0.1.0';

export interface McpServerOptions {
  channel: CallChannel;
  /** Overrides the dispatcher's per-channel traceback default. */
  includeTraceback?: boolean;
  logger?: Logger;
}

export function createMcpServer(dispatcher: ToolDispatcher, options: McpServerOptions): Server {
  const logger = options.logger ?? createLogger(`mcp:${options.channel}`);
  const lane = new Mutex();

  const server = new Server(
    { name: SERVER_NAME, version: SERVER_VERSION },
    { capabilities: { tools: {} } },
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: toMcpTools(dispatcher.listTools()),
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    logger.debug(`call ${name}`);
    const result = await lane.runExclusive(() =>
      dispatcher.invoke(
        { name, arguments: args ?? {} },
        { channel: options.channel, includeTraceback: options.includeTraceback },
      ),
    );
    return formatToolResult(result);
  });

  return server;
}
