/**
 * @module draft-registry
 * In-memory registry of draft sessions, owned by whoever constructs it and
 * shared by reference with every transport.
 *
 * @see {@link @draftcast/types#DraftRegistry} for the interface contract
 */

import { randomUUID } from 'node:crypto';
import type {
  Composer,
  DraftCreateOptions,
  DraftRegistry,
  DraftSession,
  DraftState,
} from '@draftcast/types';
import { CompositionBackendError, DraftStateError, errorMessage } from './errors.js';
import { withTimeout } from './timeout.js';

/** Allowed forward moves. Re-applying the current state is a separate no-op. */
const TRANSITIONS: Record<DraftState, readonly DraftState[]> = {
  NEW: ['COMPOSING', 'SAVED'],
  COMPOSING: ['SAVED'],
  SAVED: [],
};

export interface DraftRegistryOptions {
  /** Id generator; UUID v4 by default. Must never repeat. */
  generateId?: () => string;
  /** Clock used for session timestamps. */
  now?: () => Date;
}

/**
 * Concrete implementation of {@link DraftRegistry}.
 *
 * Sessions are stored as frozen records and replaced wholesale on each
 * transition, so a snapshot returned by {@link get} never changes under the
 * caller. Each operation mutates the map in one synchronous step; `create`
 * reserves its id before awaiting the Composer so concurrent creates cannot
 * collide, and inserts only once the Composer has answered within the
 * deadline.
 */
export class DraftRegistryImpl implements DraftRegistry {
  private sessions = new Map<string, DraftSession>();
  /** Every id ever handed out, including failed creates. */
  private issued = new Set<string>();
  private readonly composer: Composer;
  private readonly generateId: () => string;
  private readonly now: () => Date;

  constructor(composer: Composer, options: DraftRegistryOptions = {}) {
    this.composer = composer;
    this.generateId = options.generateId ?? randomUUID;
    this.now = options.now ?? (() => new Date());
  }

  /** @inheritdoc */
  get size(): number {
    return this.sessions.size;
  }

  /** @inheritdoc */
  async create(width: number, height: number, options: DraftCreateOptions = {}): Promise<DraftSession> {
    const id = this.reserveId();

    let folder: string;
    try {
      folder = await withTimeout(
        this.composer.createDraft(id, width, height),
        options.timeoutMs ?? 0,
        'create_draft',
      );
    } catch (e) {
      throw new CompositionBackendError(errorMessage(e), { cause: e });
    }

    const timestamp = this.now().toISOString();
    const session: DraftSession = {
      id,
      folder,
      width,
      height,
      state: 'NEW',
      createdAt: timestamp,
      updatedAt: timestamp,
    };
    this.sessions.set(id, Object.freeze(session));
    return session;
  }

  /** @inheritdoc */
  get(id: string): DraftSession | undefined {
    return this.sessions.get(id);
  }

  /** @inheritdoc */
  advanceState(id: string, next: DraftState): DraftSession {
    const session = this.sessions.get(id);
    if (!session) {
      throw new Error(`Draft not found: ${id}`);
    }
    if (session.state === next) {
      return session;
    }
    if (!TRANSITIONS[session.state].includes(next)) {
      throw new DraftStateError(id, session.state, next);
    }

    const updated: DraftSession = {
      ...session,
      state: next,
      updatedAt: this.now().toISOString(),
    };
    this.sessions.set(id, Object.freeze(updated));
    return updated;
  }

  /** Draw a fresh id, refusing any value the generator has produced before. */
  private reserveId(): string {
    const id = this.generateId();
    if (this.issued.has(id)) {
      throw new Error(`Draft id generator repeated an id: ${id}`);
    }
    this.issued.add(id);
    return id;
  }
}
