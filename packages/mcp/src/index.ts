/**
 * @module mcp
 * MCP server for draft composition over stdio.
 *
 * Architecture:
 *   MCP client ──stdio──> This MCP Server (Node.js)
 *                               │ DispatchCore (shared draft registry)
 *                               ↓
 *                        Composition backend (HTTP)
 *
 * stdout carries only protocol frames; diagnostics go to stderr.
 *
 * @see ./sse.ts for the network entry point
 */

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { createLogger, errorMessage } from '@draftcast/core';
import { bootOrExit } from './runtime.js';
import { createMcpServer } from './server.js';

const logger = createLogger('stdio');
const runtime = await bootOrExit('stdio');

const server = createMcpServer(runtime.dispatcher, { channel: 'local' });
server.onclose = () => {
  logger.info('stdio transport closed');
};

const shutdown = (reason: string): void => {
  logger.info(`shutting down (${reason})`);
  server.close().then(
    () => process.exit(0),
    (e: unknown) => {
      logger.error(`Shutdown failed: ${errorMessage(e)}`);
      process.exit(1);
    },
  );
};
process.once('SIGINT', () => shutdown('SIGINT'));
process.once('SIGTERM', () => shutdown('SIGTERM'));
process.stdin.once('end', () => shutdown('stdin closed'));

const transport = new StdioServerTransport();
await server.connect(transport);
logger.info(`serving ${runtime.dispatcher.listTools().length} tools on stdio`);
