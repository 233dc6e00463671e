/**
 * @module config
 * Environment configuration for both entry points, parsed once at startup.
 */

import { z } from 'zod';
import type { LogLevel } from '@draftcast/types';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const envSchema = z.object({
  DRAFTCAST_COMPOSER_URL: z.string().url().default('http://127.0.0.1:9001'),
  DRAFTCAST_COMPOSER_TIMEOUT_MS: z.coerce.number().int().nonnegative().default(120_000),
  DRAFTCAST_SSE_HOST: z.string().min(1).default('0.0.0.0'),
  DRAFTCAST_SSE_PORT: z.coerce.number().int().min(0).max(65_535).default(5001),
  DRAFTCAST_SSE_TRACEBACK: booleanFlag.default('false'),
  DRAFTCAST_LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export interface Config {
  composer: {
    /** Base URL of the composition backend. */
    url: string;
    /** Bound on each Composer call in milliseconds; 0 disables it. */
    timeoutMs: number;
  };
  sse: {
    host: string;
    port: number;
    /** Attach tracebacks to failures sent over the network channel. */
    includeTraceback: boolean;
  };
  logLevel: LogLevel;
}

/** Raised when the environment does not describe a valid configuration. */
export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/** Parse `env` into a {@link Config}, throwing {@link ConfigError} on bad values. */
export function loadConfig(env: Record<string, string | undefined> = process.env): Config {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
  }

  const values = parsed.data;
  return {
    composer: {
      url: values.DRAFTCAST_COMPOSER_URL,
      timeoutMs: values.DRAFTCAST_COMPOSER_TIMEOUT_MS,
    },
    sse: {
      host: values.DRAFTCAST_SSE_HOST,
      port: values.DRAFTCAST_SSE_PORT,
      includeTraceback: values.DRAFTCAST_SSE_TRACEBACK,
    },
    logLevel: values.DRAFTCAST_LOG_LEVEL,
  };
}
