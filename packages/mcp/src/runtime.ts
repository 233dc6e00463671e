/**
 * @module runtime
 * Wiring shared by both entry points: configuration, Composer, registry and
 * dispatcher, plus the fail-fast startup checks.
 */

import { DispatchCore, DraftRegistryImpl, createLogger, errorMessage, setLogLevel } from '@draftcast/core';
import type { Composer, DraftRegistry } from '@draftcast/types';
import { HttpComposer } from './bridge.js';
import { loadConfig, type Config } from './config.js';

export interface Runtime {
  config: Config;
  composer: Composer;
  registry: DraftRegistry;
  dispatcher: DispatchCore;
}

/** Raised when the process cannot start serving. */
export class StartupError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StartupError';
  }
}

/** Build the object graph. The Composer defaults to {@link HttpComposer}. */
export function createRuntime(config: Config, composer?: Composer): Runtime {
  const backend = composer ?? new HttpComposer({
    baseUrl: config.composer.url,
    timeoutMs: config.composer.timeoutMs,
  });
  const registry = new DraftRegistryImpl(backend);
  const dispatcher = new DispatchCore({
    composer: backend,
    registry,
    composerTimeoutMs: config.composer.timeoutMs,
    tracebacks: { network: config.sse.includeTraceback },
  });
  return { config, composer: backend, registry, dispatcher };
}

/**
 * Load configuration, build the runtime and confirm the backend answers.
 * Rejects with {@link StartupError} if any step fails.
 */
export async function startRuntime(
  env: Record<string, string | undefined>,
  composer?: Composer,
): Promise<Runtime> {
  let config: Config;
  try {
    config = loadConfig(env);
  } catch (e) {
    throw new StartupError(errorMessage(e), { cause: e });
  }
  setLogLevel(config.logLevel);

  const runtime = createRuntime(config, composer);
  if (!(await runtime.composer.healthCheck())) {
    throw new StartupError(`Composition backend is not reachable at ${config.composer.url}`);
  }
  return runtime;
}

/** {@link startRuntime}, or log one diagnostic line and exit with status 1. */
export async function bootOrExit(entry: string): Promise<Runtime> {
  const logger = createLogger(entry);
  try {
    return await startRuntime(process.env);
  } catch (e) {
    logger.error(`Startup failed: ${errorMessage(e)}`);
    process.exit(1);
  }
}
