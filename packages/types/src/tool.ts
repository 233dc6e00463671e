/**
 * @module tool
 * Tool catalog and call envelope types.
 *
 * A tool is a named, schema-described operation exposed to remote callers.
 * Every invocation produces exactly one {@link ToolResult}, success or failure.
 */

import type { DraftState } from './draft.js';

/** JSON types a tool parameter may declare. */
export type ToolParameterType = 'string' | 'number' | 'integer' | 'boolean' | 'array' | 'object';

/** Schema for a single tool parameter. */
export interface ToolParameterSchema {
  type: ToolParameterType;
  description: string;
  /** Value substituted when the caller omits the parameter. */
  default?: string | number | boolean;
  /** Element schema for `array` parameters. */
  items?: { type: ToolParameterType };
}

/** JSON Schema object describing a tool's arguments. */
export interface ToolInputSchema {
  type: 'object';
  properties: Record<string, ToolParameterSchema>;
  required?: string[];
}

/** A catalog entry. Names are unique across the catalog. */
export interface ToolDescriptor {
  name: string;
  description: string;
  inputSchema: ToolInputSchema;
}

/** Names of every tool in the catalog. */
export type ToolName =
  | 'create_draft'
  | 'add_video'
  | 'add_audio'
  | 'add_image'
  | 'add_text'
  | 'add_subtitle'
  | 'add_effect'
  | 'add_sticker'
  | 'save_draft';

/** Argument bag as received from a transport. */
export type ToolArguments = Record<string, unknown>;

/** A single decoded call, built per request by a transport. */
export interface ToolRequest {
  name: string;
  arguments: ToolArguments;
}

/**
 * Machine-readable failure category.
 *
 * - `UnknownTool`: the name is not in the catalog.
 * - `MissingRequiredArgument`: a field marked required was not supplied.
 * - `InvalidArgument`: a supplied value contradicts the declared type.
 * - `InvalidDraftId`: `draft_id` absent or not in the registry.
 * - `DraftSaved`: the draft was already saved and accepts no further changes.
 * - `CompositionBackendError`: the Composer failed or timed out.
 * - `InternalError`: anything else.
 */
export type ToolErrorKind =
  | 'UnknownTool'
  | 'MissingRequiredArgument'
  | 'InvalidArgument'
  | 'InvalidDraftId'
  | 'DraftSaved'
  | 'CompositionBackendError'
  | 'InternalError';

/** Successful call envelope. */
export interface ToolSuccess {
  success: true;
  draft_id: string;
  /** Backing folder handle (create_draft only). */
  draft_folder?: string;
  width?: number;
  height?: number;
  /** Composer return value (asset tools and save_draft). */
  result?: unknown;
  /** Session state after the call (asset tools and save_draft). */
  state?: DraftState;
}

/** Failed call envelope. */
export interface ToolFailure {
  success: false;
  error: string;
  kind: ToolErrorKind;
  /** Stack trace of the underlying fault, for local channels. */
  traceback?: string;
}

/** The single return contract of every dispatch path. */
export type ToolResult = ToolSuccess | ToolFailure;

/**
 * The channel a call arrived on. `local` callers (stdio) receive tracebacks;
 * `network` callers only when the operator enables them.
 */
export type CallChannel = 'local' | 'network';

/** Per-call context supplied by the transport. */
export interface InvokeContext {
  channel: CallChannel;
  /** Overrides the channel's traceback default. */
  includeTraceback?: boolean;
}

/** The interface both transports are written against. */
export interface ToolDispatcher {
  listTools(): readonly ToolDescriptor[];
  invoke(request: ToolRequest, context?: InvokeContext): Promise<ToolResult>;
}
