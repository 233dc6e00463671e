/**
 * @module sse-app
 * Express app serving MCP over HTTP + Server-Sent Events.
 *
 * Routes:
 *   GET  /sse                    open a stream; the first event names the
 *                                message endpoint for this connection
 *   POST /messages?sessionId=…   deliver one JSON-RPC message to a connection
 *
 * Each stream gets its own MCP server over the shared dispatcher.
 */

import type { Server as HttpServer } from 'node:http';
import express, { type NextFunction, type Request, type Response } from 'express';
import { SSEServerTransport } from '@modelcontextprotocol/sdk/server/sse.js';
import { createLogger, errorMessage } from '@draftcast/core';
import type { Logger, ToolDispatcher } from '@draftcast/types';
import { createMcpServer } from './server.js';

export const SSE_PATH = '/sse';
export const MESSAGES_PATH = '/messages';

export interface SseAppOptions {
  dispatcher: ToolDispatcher;
  /** Attach tracebacks to failures; defaults to the dispatcher's network setting. */
  includeTraceback?: boolean;
  logger?: Logger;
}

export interface SseApp {
  app: express.Express;
  /** Open streams by session id. */
  connections: Map<string, SSEServerTransport>;
}

function statusOf(err: unknown): number {
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
    return err.status;
  }
  return 500;
}

export function createSseApp(options: SseAppOptions): SseApp {
  const logger = options.logger ?? createLogger('sse');
  const connections = new Map<string, SSEServerTransport>();
  const app = express();

  app.get(SSE_PATH, async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const transport = new SSEServerTransport(MESSAGES_PATH, res);
      const sessionId = transport.sessionId;
      connections.set(sessionId, transport);
      transport.onclose = () => {
        connections.delete(sessionId);
        logger.info('SSE stream closed', { sessionId, open: connections.size });
      };

      const server = createMcpServer(options.dispatcher, {
        channel: 'network',
        includeTraceback: options.includeTraceback,
      });
      await server.connect(transport);
      logger.info('SSE stream opened', { sessionId, open: connections.size });
    } catch (e) {
      next(e);
    }
  });

  app.post(MESSAGES_PATH, express.json({ limit: '4mb' }), async (req: Request, res: Response, next: NextFunction) => {
    const sessionId = req.query.sessionId;
    if (typeof sessionId !== 'string' || sessionId === '') {
      res.status(400).json({ error: 'Missing sessionId' });
      return;
    }
    const transport = connections.get(sessionId);
    if (!transport) {
      res.status(404).json({ error: 'Session not found' });
      return;
    }

    try {
      await transport.handlePostMessage(req, res, req.body);
    } catch (e) {
      next(e);
    }
  });

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: 'Not found' });
  });

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status = statusOf(err);
    if (status >= 500) {
      logger.error(`Request failed: ${errorMessage(err)}`);
    }
    if (res.headersSent) {
      res.end();
      return;
    }
    res.status(status).json({ error: status >= 500 ? 'Internal server error' : errorMessage(err) });
  });

  return { app, connections };
}

/** Start listening; resolves once the socket is bound. */
export function listen(app: express.Express, port: number, host: string): Promise<HttpServer> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, host);
    server.once('listening', () => resolve(server));
    server.once('error', reject);
  });
}
