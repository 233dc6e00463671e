/**
 * @draftcast/core
 *
 * Session state and dispatch: the tool catalog, the draft registry, the
 * per-draft lock and the Dispatch Core shared by every transport.
 *
 * @packageDocumentation
 */

// Tool catalog
export { TOOL_CATALOG, findTool, listTools } from './catalog.js';

// Draft registry
export { DraftRegistryImpl } from './draft-registry.js';
export type { DraftRegistryOptions } from './draft-registry.js';

// Dispatch
export { DEFAULT_COMPOSER_TIMEOUT_MS, DispatchCore } from './dispatch.js';
export type { DispatchCoreOptions } from './dispatch.js';
export { TEXT_TRACK_NAME, TOOL_BINDINGS, durationOf, isMutatingTool } from './bindings.js';
export type { ComposerCall, MutatingToolName, ToolBinding } from './bindings.js';
export { checkRequired, checkTypes, isRecord, matchesType, mergeArguments } from './arguments.js';
export type { ArgumentValidation } from './arguments.js';

// Errors
export {
  CompositionBackendError,
  DraftStateError,
  ToolCallError,
  errorMessage,
  toToolFailure,
} from './errors.js';

// Concurrency utilities
export { KeyedMutex, Mutex } from './mutex.js';
export type { Release } from './mutex.js';
export { TimeoutError, withTimeout } from './timeout.js';

// Logging
export { createLogger, getLogLevel, setLogLevel } from './logger.js';
