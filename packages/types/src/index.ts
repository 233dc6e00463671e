/**
 * @draftcast/types
 *
 * Shared type definitions for draftcast.
 * This package contains zero runtime code: only TypeScript interfaces and
 * types that serve as the contract between the core and the transports.
 *
 * @packageDocumentation
 */

// Tool catalog and call envelopes
export type {
  CallChannel,
  InvokeContext,
  ToolArguments,
  ToolDescriptor,
  ToolDispatcher,
  ToolErrorKind,
  ToolFailure,
  ToolInputSchema,
  ToolName,
  ToolParameterSchema,
  ToolParameterType,
  ToolRequest,
  ToolResult,
  ToolSuccess,
} from './tool.js';

// Draft sessions
export type { DraftCreateOptions, DraftRegistry, DraftSession, DraftState } from './draft.js';

// Composer contract
export type {
  AudioParams,
  Composer,
  EffectParams,
  ImageParams,
  StickerParams,
  SubtitleParams,
  TextParams,
  TextStyleRange,
  VideoParams,
} from './composer.js';

// Logging
export type { LogContext, LogLevel, Logger } from './logger.js';
