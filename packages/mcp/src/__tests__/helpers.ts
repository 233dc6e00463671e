/**
 * @module helpers
 * Shared test doubles for the transport tests.
 */

import { vi } from 'vitest';
import { isRecord } from '@draftcast/core';
import type { Composer, Logger } from '@draftcast/types';

/** Composer stub: folders are `/drafts/<id>`, every add answers `{ ok: true }`. */
export function createStubComposer(): Composer {
  return {
    createDraft: vi.fn(async (draftId: string) => `/drafts/${draftId}`),
    addVideo: vi.fn(async () => ({ ok: true })),
    addAudio: vi.fn(async () => ({ ok: true })),
    addImage: vi.fn(async () => ({ ok: true })),
    addText: vi.fn(async () => ({ ok: true })),
    addSubtitle: vi.fn(async () => ({ ok: true })),
    addEffect: vi.fn(async () => ({ ok: true })),
    addSticker: vi.fn(async () => ({ ok: true })),
    saveDraft: vi.fn(async () => ({ ok: true })),
    healthCheck: vi.fn(async () => true),
  };
}

export function silentLogger(): Logger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

/** Decode the JSON envelope carried by a CallTool result. */
export function envelopeOf(result: unknown): Record<string, unknown> {
  if (!isRecord(result) || !Array.isArray(result.content)) {
    throw new Error('Not a CallTool result');
  }
  const content: unknown[] = result.content;
  const first = content[0];
  if (content.length !== 1 || !isRecord(first) || first.type !== 'text' || typeof first.text !== 'string') {
    throw new Error('Expected exactly one text content item');
  }
  const envelope: unknown = JSON.parse(first.text);
  if (!isRecord(envelope)) {
    throw new Error('Envelope is not an object');
  }
  return envelope;
}
