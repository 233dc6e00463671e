/**
 * @module concurrency.test
 * Dispatch under concurrent callers: id uniqueness, per-draft serialisation
 * of Composer calls, and independence of different drafts.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { Logger, ToolArguments, ToolResult } from '@draftcast/types';
import { DispatchCore } from '../dispatch.js';
import { DraftRegistryImpl } from '../draft-registry.js';
import { createFakeComposer, overlaps, type FakeComposer } from './fake-composer.js';

const logger: Logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };

describe('concurrent dispatch', () => {
  let composer: FakeComposer;
  let registry: DraftRegistryImpl;
  let core: DispatchCore;

  const call = (name: string, args: ToolArguments = {}): Promise<ToolResult> =>
    core.invoke({ name, arguments: args }, { channel: 'network' });

  const newDraft = async (): Promise<string> => {
    const result = await call('create_draft');
    if (!result.success) throw new Error(result.error);
    return result.draft_id;
  };

  /** A client that issues its calls one after another. */
  const client = async (requests: Array<[string, ToolArguments]>): Promise<ToolResult[]> => {
    const results: ToolResult[] = [];
    for (const [name, args] of requests) {
      results.push(await call(name, args));
    }
    return results;
  };

  beforeEach(() => {
    composer = createFakeComposer({ delayMs: 5 });
    registry = new DraftRegistryImpl(composer);
    core = new DispatchCore({ composer, registry, logger });
  });

  it('returns pairwise distinct ids for concurrent create_draft calls', async () => {
    const results = await Promise.all(Array.from({ length: 40 }, () => call('create_draft')));
    const ids = results.map((r) => (r.success ? r.draft_id : r.error));

    expect(results.every((r) => r.success)).toBe(true);
    expect(new Set(ids).size).toBe(40);
    expect(registry.size).toBe(40);
  });

  it('never overlaps composer calls on the same draft from two clients', async () => {
    const id = await newDraft();
    const folder = registry.get(id)?.folder ?? '';

    const [a, b] = await Promise.all([
      client([
        ['add_video', { draft_id: id, video_url: 'a.mp4' }],
        ['add_image', { draft_id: id, image_url: 'a.png' }],
        ['add_text', { draft_id: id, text: 'a', start: 0, end: 1 }],
      ]),
      client([
        ['add_audio', { draft_id: id, audio_url: 'b.mp3' }],
        ['add_effect', { draft_id: id, effect_type: 'blur' }],
        ['add_sticker', { draft_id: id, sticker_url: 'b' }],
      ]),
    ]);

    expect([...a, ...b].every((r) => r.success)).toBe(true);
    expect(composer.spans).toHaveLength(6);
    for (const first of composer.spans) {
      for (const second of composer.spans) {
        if (first !== second) expect(overlaps(first, second)).toBe(false);
      }
    }
    expect(composer.maxActiveByFolder.get(folder)).toBe(1);
  });

  it('runs calls on different drafts concurrently', async () => {
    const [d1, d2] = await Promise.all([newDraft(), newDraft()]);

    await Promise.all([
      call('add_video', { draft_id: d1, video_url: 'a.mp4' }),
      call('add_video', { draft_id: d2, video_url: 'b.mp4' }),
    ]);

    expect(composer.maxActive()).toBe(2);
  });

  it('applies same-draft calls in arrival order, so a save closes the draft', async () => {
    const id = await newDraft();

    const results = await Promise.all([
      call('add_video', { draft_id: id, video_url: 'a.mp4' }),
      call('save_draft', { draft_id: id }),
      call('add_image', { draft_id: id, image_url: 'late.png' }),
    ]);

    expect(results[0]).toMatchObject({ success: true, state: 'COMPOSING' });
    expect(results[1]).toMatchObject({ success: true, state: 'SAVED' });
    expect(results[2]).toEqual({
      success: false,
      error: `Draft ${id} has already been saved`,
      kind: 'DraftSaved',
    });
    expect(composer.spans.map((s) => s.op)).toEqual(['addVideo', 'saveDraft']);
  });

  it('keeps serving other drafts while one draft is failing', async () => {
    const [bad, good] = await Promise.all([newDraft(), newDraft()]);
    vi.mocked(composer.addVideo).mockRejectedValueOnce(new Error('download failed'));

    const [failed, ok] = await Promise.all([
      call('add_video', { draft_id: bad, video_url: 'broken.mp4' }),
      call('add_image', { draft_id: good, image_url: 'fine.png' }),
    ]);

    expect(failed).toEqual({ success: false, error: 'download failed', kind: 'CompositionBackendError' });
    expect(ok).toMatchObject({ success: true, draft_id: good });
  });
});
