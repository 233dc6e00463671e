/**
 * @module draft
 * Draft session types. A draft is an in-progress composition project whose
 * media lives in a backing folder owned by the Composer.
 */

/**
 * Lifecycle of a draft: `NEW` until the first successful asset call,
 * `COMPOSING` afterwards, `SAVED` once saved. `SAVED` is terminal.
 */
export type DraftState = 'NEW' | 'COMPOSING' | 'SAVED';

/** In-memory record of a draft's identity, dimensions and state. */
export interface DraftSession {
  readonly id: string;
  /** Opaque handle returned by the Composer on creation. */
  readonly folder: string;
  readonly width: number;
  readonly height: number;
  readonly state: DraftState;
  /** ISO 8601 creation timestamp. */
  readonly createdAt: string;
  /** ISO 8601 timestamp of the last state change. */
  readonly updatedAt: string;
}

export interface DraftCreateOptions {
  /**
   * Abandon the create if the Composer has not answered within this many
   * milliseconds. A late answer is discarded. 0 or absent waits indefinitely.
   */
  timeoutMs?: number;
}

/** Registry of live draft sessions for the lifetime of the process. */
export interface DraftRegistry {
  /** Number of sessions held. */
  readonly size: number;
  /**
   * Create a draft and its backing folder. Nothing is stored if the Composer
   * fails or the create is abandoned at its deadline.
   */
  create(width: number, height: number, options?: DraftCreateOptions): Promise<DraftSession>;
  /** Look up a session by id. */
  get(id: string): DraftSession | undefined;
  /** Move a session forward through NEW → COMPOSING → SAVED. */
  advanceState(id: string, next: DraftState): DraftSession;
}
