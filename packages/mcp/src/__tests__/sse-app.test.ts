/**
 * @module sse-app.test
 * Tests for the HTTP + SSE transport against a loopback listener.
 */

import type { Server as HttpServer } from 'node:http';
import type { AddressInfo } from 'node:net';
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { SSEClientTransport } from '@modelcontextprotocol/sdk/client/sse.js';
import type { SSEServerTransport } from '@modelcontextprotocol/sdk/server/sse.js';
import { DispatchCore, DraftRegistryImpl } from '@draftcast/core';
import type { Composer } from '@draftcast/types';
import { createSseApp, listen } from '../sse-app.js';
import { createStubComposer, envelopeOf, silentLogger } from './helpers.js';

describe('createSseApp', () => {
  let composer: Composer;
  let registry: DraftRegistryImpl;
  let connections: Map<string, SSEServerTransport>;
  let httpServer: HttpServer;
  let baseUrl: string;
  let clients: Client[];

  async function openClient(): Promise<Client> {
    const client = new Client({ name: 'test-client', version: '0.0.0' });
    await client.connect(new SSEClientTransport(new URL(`${baseUrl}/sse`)));
    clients.push(client);
    return client;
  }

  beforeEach(async () => {
    composer = createStubComposer();
    registry = new DraftRegistryImpl(composer);
    const dispatcher = new DispatchCore({ composer, registry, logger: silentLogger() });
    const sse = createSseApp({ dispatcher, logger: silentLogger() });
    connections = sse.connections;
    clients = [];

    httpServer = await listen(sse.app, 0, '127.0.0.1');
    const address: AddressInfo | string | null = httpServer.address();
    if (address === null || typeof address === 'string') throw new Error('Expected a TCP address');
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    await Promise.all(clients.map((client) => client.close()));
    httpServer.closeAllConnections();
    await new Promise<void>((resolve) => httpServer.close(() => resolve()));
  });

  describe('POST /messages', () => {
    it('answers 400 without a sessionId', async () => {
      const res = await fetch(`${baseUrl}/messages`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: '{}',
      });
      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: 'Missing sessionId' });
    });

    it('answers 404 for an unknown sessionId', async () => {
      const res = await fetch(`${baseUrl}/messages?sessionId=no-such-session`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: '{}',
      });
      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({ error: 'Session not found' });
    });
  });

  it('answers 404 for other routes', async () => {
    const res = await fetch(`${baseUrl}/tools`);
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: 'Not found' });
  });

  it('serves the catalog over a stream', async () => {
    const client = await openClient();
    const { tools } = await client.listTools();
    expect(tools).toHaveLength(9);
    expect(connections.size).toBe(1);
  });

  it('shares drafts between connections', async () => {
    const first = await openClient();
    const second = await openClient();
    expect(connections.size).toBe(2);

    const draft = envelopeOf(await first.callTool({ name: 'create_draft', arguments: {} }));
    const added = envelopeOf(
      await second.callTool({
        name: 'add_text',
        arguments: { draft_id: draft.draft_id, text: 'Shared', start: 1, end: 4 },
      }),
    );

    expect(added).toMatchObject({ success: true, draft_id: draft.draft_id, state: 'COMPOSING' });
    expect(composer.addText).toHaveBeenCalledWith(
      `/drafts/${String(draft.draft_id)}`,
      expect.objectContaining({ text: 'Shared', start: 1, duration: 3 }),
    );
  });

  it('keeps drafts and other streams alive when one stream closes', async () => {
    const first = await openClient();
    const second = await openClient();
    const draft = envelopeOf(await first.callTool({ name: 'create_draft', arguments: {} }));

    await first.close();
    await vi.waitFor(() => expect(connections.size).toBe(1));

    const saved = envelopeOf(await second.callTool({ name: 'save_draft', arguments: { draft_id: draft.draft_id } }));
    expect(saved).toMatchObject({ success: true, state: 'SAVED' });
    expect(registry.size).toBe(1);
  });

  it('omits tracebacks from backend failures by default', async () => {
    vi.mocked(composer.addSticker).mockRejectedValueOnce(new Error('sticker not found'));
    const client = await openClient();
    const draft = envelopeOf(await client.callTool({ name: 'create_draft', arguments: {} }));

    const result = await client.callTool({
      name: 'add_sticker',
      arguments: { draft_id: draft.draft_id, sticker_url: 'sticker-1' },
    });

    expect(result.isError).toBe(true);
    expect(envelopeOf(result)).toEqual({
      success: false,
      error: 'sticker not found',
      kind: 'CompositionBackendError',
    });
  });
});
