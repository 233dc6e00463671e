/**
 * @module dispatch
 * The Dispatch Core: the one place tool calls are validated, routed to the
 * Composer and wrapped in a result envelope. Both transports are thin
 * adapters over {@link DispatchCore.listTools} and {@link DispatchCore.invoke}.
 *
 * Architecture:
 *   ToolRequest → catalog lookup → required fields → draft lookup → types
 *     → defaults + derived fields → [per-draft lock] Composer → ToolResult
 */

import type {
  CallChannel,
  Composer,
  DraftRegistry,
  InvokeContext,
  Logger,
  ToolArguments,
  ToolDescriptor,
  ToolDispatcher,
  ToolErrorKind,
  ToolRequest,
  ToolResult,
} from '@draftcast/types';
import { checkRequired, checkTypes, mergeArguments, readNumber } from './arguments.js';
import { TOOL_BINDINGS, isMutatingTool, type ComposerCall, type ToolBinding } from './bindings.js';
import { findTool, listTools } from './catalog.js';
import { CompositionBackendError, ToolCallError, errorMessage, toToolFailure } from './errors.js';
import { createLogger } from './logger.js';
import { KeyedMutex } from './mutex.js';
import { TimeoutError, withTimeout } from './timeout.js';

/** Default bound on a single Composer call. */
export const DEFAULT_COMPOSER_TIMEOUT_MS = 120_000;

const DEFAULT_CONTEXT: InvokeContext = { channel: 'local' };

export interface DispatchCoreOptions {
  composer: Composer;
  registry: DraftRegistry;
  /** Bound on each Composer call; 0 disables it. */
  composerTimeoutMs?: number;
  /** Whether failures carry a traceback, per channel. */
  tracebacks?: Partial<Record<CallChannel, boolean>>;
  logger?: Logger;
}

export class DispatchCore implements ToolDispatcher {
  private readonly composer: Composer;
  private readonly registry: DraftRegistry;
  private readonly composerTimeoutMs: number;
  private readonly tracebacks: Record<CallChannel, boolean>;
  private readonly logger: Logger;
  /** Serialises Composer calls that target the same draft. */
  private readonly draftLocks = new KeyedMutex();

  constructor(options: DispatchCoreOptions) {
    this.composer = options.composer;
    this.registry = options.registry;
    this.composerTimeoutMs = options.composerTimeoutMs ?? DEFAULT_COMPOSER_TIMEOUT_MS;
    this.tracebacks = { local: true, network: false, ...options.tracebacks };
    this.logger = options.logger ?? createLogger('dispatch');
  }

  /** @inheritdoc */
  listTools(): readonly ToolDescriptor[] {
    return listTools();
  }

  /**
   * Run one tool call. Never rejects: every failure, including faults the
   * core did not anticipate, comes back as a `success: false` envelope.
   */
  async invoke(request: ToolRequest, context: InvokeContext = DEFAULT_CONTEXT): Promise<ToolResult> {
    const includeTraceback = context.includeTraceback ?? this.tracebacks[context.channel];
    const startedAt = Date.now();

    let result: ToolResult;
    try {
      result = await this.dispatch(request, includeTraceback);
    } catch (e) {
      result = toToolFailure(e, includeTraceback);
    }

    const elapsedMs = Date.now() - startedAt;
    if (result.success) {
      this.logger.debug(`${request.name} succeeded`, { draftId: result.draft_id, elapsedMs });
    } else if (result.kind === 'InternalError' || result.kind === 'CompositionBackendError') {
      this.logger.error(`${request.name} failed: ${result.error}`, { kind: result.kind, elapsedMs });
    } else {
      this.logger.warn(`${request.name} rejected: ${result.error}`, { kind: result.kind });
    }
    return result;
  }

  private async dispatch(request: ToolRequest, includeTraceback: boolean): Promise<ToolResult> {
    const tool = findTool(request.name);
    if (!tool) {
      return this.fail('UnknownTool', `Unknown tool: ${request.name}`, includeTraceback);
    }

    const present = checkRequired(tool, request.arguments);
    if (!present.valid) {
      return this.fail(present.kind, present.error, includeTraceback);
    }

    if (tool.name === 'create_draft') {
      const typed = checkTypes(tool, present.args);
      if (!typed.valid) {
        return this.fail(typed.kind, typed.error, includeTraceback);
      }
      return this.createDraft(mergeArguments(tool, typed.args), includeTraceback);
    }
    if (!isMutatingTool(tool.name)) {
      throw new Error(`No composer binding for tool: ${tool.name}`);
    }

    // Any draft_id that does not name a live draft, whatever its type, is InvalidDraftId.
    const draftId = present.args.draft_id;
    const session = typeof draftId === 'string' ? this.registry.get(draftId) : undefined;
    if (!session) {
      return this.fail('InvalidDraftId', 'Invalid draft_id', includeTraceback);
    }

    const typed = checkTypes(tool, present.args);
    if (!typed.valid) {
      return this.fail(typed.kind, typed.error, includeTraceback);
    }

    const binding = TOOL_BINDINGS[tool.name];
    const call = binding.prepare(mergeArguments(tool, typed.args, session));
    return this.mutateDraft(tool.name, session.id, binding, call, includeTraceback);
  }

  private async createDraft(args: ToolArguments, includeTraceback: boolean): Promise<ToolResult> {
    const width = readNumber(args, 'width');
    const height = readNumber(args, 'height');
    try {
      const session = await this.registry.create(width, height, { timeoutMs: this.composerTimeoutMs });
      return {
        success: true,
        draft_id: session.id,
        draft_folder: session.folder,
        width: session.width,
        height: session.height,
      };
    } catch (e) {
      return toToolFailure(e, includeTraceback);
    }
  }

  /**
   * Run `call` while holding the draft's lock. The lock is released when the
   * Composer settles, not when the caller stops waiting: a timed-out call
   * still owns the folder until it finishes.
   */
  private async mutateDraft(
    toolName: string,
    draftId: string,
    binding: ToolBinding,
    call: ComposerCall,
    includeTraceback: boolean,
  ): Promise<ToolResult> {
    if (this.draftLocks.isLocked(draftId)) {
      this.logger.debug(`${toolName} waiting for draft ${draftId}`, { busyDrafts: this.draftLocks.size });
    }
    const release = await this.draftLocks.acquire(draftId);
    const work = this.runLocked(draftId, binding, call, includeTraceback);
    void work.then(release, release);

    try {
      return await withTimeout(work, this.composerTimeoutMs, toolName);
    } catch (e) {
      return toToolFailure(deadlineAsBackendError(e), includeTraceback);
    }
  }

  private async runLocked(
    draftId: string,
    binding: ToolBinding,
    call: ComposerCall,
    includeTraceback: boolean,
  ): Promise<ToolResult> {
    // Re-read under the lock: a save may have landed while this call waited.
    const session = this.registry.get(draftId);
    if (!session) {
      return this.fail('InvalidDraftId', 'Invalid draft_id', includeTraceback);
    }
    if (session.state === 'SAVED') {
      return this.fail('DraftSaved', `Draft ${draftId} has already been saved`, includeTraceback);
    }

    let result: unknown;
    try {
      result = await call(this.composer, session.folder);
    } catch (e) {
      throw new CompositionBackendError(errorMessage(e), { cause: e });
    }
    const updated = this.registry.advanceState(draftId, binding.nextState);
    return { success: true, draft_id: draftId, result, state: updated.state };
  }

  private fail(kind: ToolErrorKind, message: string, includeTraceback: boolean): ToolResult {
    return toToolFailure(new ToolCallError(kind, message), includeTraceback);
  }
}

/** A Composer deadline is reported as a backend failure. */
function deadlineAsBackendError(error: unknown): unknown {
  return error instanceof TimeoutError ? new CompositionBackendError(error.message) : error;
}
