/**
 * @module bridge
 * HTTP client for the composition backend, implementing {@link Composer}.
 *
 * Every operation is `POST <baseUrl>/<operation>` with a JSON body holding the
 * draft folder and the operation's parameters. The backend answers
 * `{ success, output?, error? }`; a `success: false` reply, a non-2xx status
 * or a malformed body rejects with an `Error` the dispatcher reports as a
 * backend failure.
 */

import { z } from 'zod';
import { createLogger, errorMessage } from '@draftcast/core';
import type {
  AudioParams,
  Composer,
  EffectParams,
  ImageParams,
  StickerParams,
  SubtitleParams,
  TextParams,
  VideoParams,
} from '@draftcast/types';

const logger = createLogger('bridge');

const replySchema = z.object({
  success: z.boolean(),
  output: z.unknown().optional(),
  error: z.string().optional(),
});

const folderReplySchema = z.union([
  z.string().min(1),
  z.object({ draft_folder: z.string().min(1) }).transform((output) => output.draft_folder),
]);

export interface HttpComposerOptions {
  /** Backend base URL, e.g. `http://127.0.0.1:9001`. */
  baseUrl: string;
  /** Abort a request after this many milliseconds; 0 disables it. */
  timeoutMs?: number;
}

export class HttpComposer implements Composer {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(options: HttpComposerOptions) {
    this.baseUrl = options.baseUrl.endsWith('/') ? options.baseUrl : `${options.baseUrl}/`;
    this.timeoutMs = options.timeoutMs ?? 0;
  }

  async createDraft(draftId: string, width: number, height: number): Promise<string> {
    const output = await this.post('create_draft', { draft_id: draftId, width, height });
    const folder = folderReplySchema.safeParse(output);
    if (!folder.success) {
      throw new Error('Composer create_draft reply has no draft folder');
    }
    return folder.data;
  }

  addVideo(folder: string, params: VideoParams): Promise<unknown> {
    return this.post('add_video', { draft_folder: folder, ...params });
  }

  addAudio(folder: string, params: AudioParams): Promise<unknown> {
    return this.post('add_audio', { draft_folder: folder, ...params });
  }

  addImage(folder: string, params: ImageParams): Promise<unknown> {
    return this.post('add_image', { draft_folder: folder, ...params });
  }

  addText(folder: string, params: TextParams): Promise<unknown> {
    return this.post('add_text', { draft_folder: folder, ...params });
  }

  addSubtitle(folder: string, params: SubtitleParams): Promise<unknown> {
    return this.post('add_subtitle', { draft_folder: folder, ...params });
  }

  addEffect(folder: string, params: EffectParams): Promise<unknown> {
    return this.post('add_effect', { draft_folder: folder, ...params });
  }

  addSticker(folder: string, params: StickerParams): Promise<unknown> {
    return this.post('add_sticker', { draft_folder: folder, ...params });
  }

  saveDraft(folder: string, draftId: string): Promise<unknown> {
    return this.post('save_draft', { draft_folder: folder, draft_id: draftId });
  }

  /** Check if the backend answers `GET /health`. */
  async healthCheck(): Promise<boolean> {
    try {
      const res = await fetch(this.url('health'), { signal: this.signal() });
      return res.ok;
    } catch (e) {
      logger.debug('Health check failed', { reason: errorMessage(e) });
      return false;
    }
  }

  private async post(operation: string, body: Record<string, unknown>): Promise<unknown> {
    const res = await fetch(this.url(operation), {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
      signal: this.signal(),
    });
    if (!res.ok) {
      const text = await res.text();
      throw new Error(`Composer returned HTTP ${res.status}: ${text}`);
    }

    const reply = replySchema.safeParse(await res.json());
    if (!reply.success) {
      throw new Error(`Composer ${operation} returned a malformed reply`);
    }
    if (!reply.data.success) {
      throw new Error(reply.data.error || `Composer ${operation} failed`);
    }
    return reply.data.output;
  }

  private url(path: string): URL {
    return new URL(path, this.baseUrl);
  }

  private signal(): AbortSignal | undefined {
    return this.timeoutMs > 0 ? AbortSignal.timeout(this.timeoutMs) : undefined;
  }
}
