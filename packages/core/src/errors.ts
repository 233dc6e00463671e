/**
 * @module errors
 * Typed faults raised inside the core. They never cross the dispatch
 * boundary: {@link toToolFailure} turns each into a failure envelope.
 */

import type { DraftState, ToolErrorKind, ToolFailure } from '@draftcast/types';

/** A fault that already knows which failure category it belongs to. */
export class ToolCallError extends Error {
  readonly kind: ToolErrorKind;

  constructor(kind: ToolErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ToolCallError';
    this.kind = kind;
  }
}

/** The Composer failed while serving a call. */
export class CompositionBackendError extends ToolCallError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CompositionBackendError', message, options);
    this.name = 'CompositionBackendError';
  }
}

/** A registry transition outside NEW → COMPOSING → SAVED. */
export class DraftStateError extends Error {
  readonly draftId: string;
  readonly from: DraftState;
  readonly to: DraftState;

  constructor(draftId: string, from: DraftState, to: DraftState) {
    super(`Draft ${draftId} cannot move from ${from} to ${to}`);
    this.name = 'DraftStateError';
    this.draftId = draftId;
    this.from = from;
    this.to = to;
  }
}

/** Human-readable message of any thrown value. */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/** Stack of the innermost cause that has one, falling back to the error itself. */
function tracebackOf(error: unknown): string | undefined {
  if (!(error instanceof Error)) return undefined;
  const inner = tracebackOf(error.cause);
  return inner ?? error.stack;
}

/**
 * Convert any thrown value to a failure envelope. Untyped faults become
 * `InternalError`. Typed validation failures never carry a traceback.
 */
export function toToolFailure(error: unknown, includeTraceback: boolean): ToolFailure {
  const kind: ToolErrorKind = error instanceof ToolCallError ? error.kind : 'InternalError';
  const failure: ToolFailure = { success: false, error: errorMessage(error), kind };

  if (includeTraceback && (kind === 'InternalError' || kind === 'CompositionBackendError')) {
    const traceback = tracebackOf(error);
    if (traceback) failure.traceback = traceback;
  }
  return failure;
}
