/**
 * @module sse
 * MCP server for draft composition over HTTP + SSE.
 *
 * Any number of clients may connect; all of them share one draft registry,
 * so a draft created on one connection can be edited from another.
 */

import type { Server as HttpServer } from 'node:http';
import { createLogger, errorMessage } from '@draftcast/core';
import { bootOrExit } from './runtime.js';
import { createSseApp, listen } from './sse-app.js';

const logger = createLogger('sse');
const runtime = await bootOrExit('sse');
const { host, port, includeTraceback } = runtime.config.sse;

const { app, connections } = createSseApp({ dispatcher: runtime.dispatcher, includeTraceback });

let httpServer: HttpServer;
try {
  httpServer = await listen(app, port, host);
  logger.info(`listening on http://${host}:${port}`);
} catch (e) {
  logger.error(`Startup failed: ${errorMessage(e)}`);
  process.exit(1);
}

const shutdown = (signal: NodeJS.Signals): void => {
  logger.info(`received ${signal}, closing ${connections.size} stream(s)`);
  httpServer.closeAllConnections();
  httpServer.close(() => process.exit(0));
};
process.once('SIGINT', shutdown);
process.once('SIGTERM', shutdown);
