import { z } from 'zod';
import { HttpCallEngine } from './HttpCallEngine';
import { createConsoleLogger, LOG_LEVELS } from './logger';
import type { HttpCallEngineConfig } from './types';

const logLevelSchema = z.enum(LOG_LEVELS);

const engineEnvSchema = z.object({
  HTTP_CALL_LOG_LEVEL: logLevelSchema.default('warn'),
  HTTP_CALL_COMPRESSION_THRESHOLD_BYTES: z.coerce.number().int().nonnegative().optional(),
  HTTP_CALL_MAX_RETRY_AFTER_MS: z.coerce.number().int().nonnegative().optional(),
});

export type HttpCallEngineEnv = z.infer<typeof engineEnvSchema>;

/**
 * Parses engine settings from environment variables. Throws a descriptive error on invalid values.
 */
export function loadHttpCallEngineEnv(env: NodeJS.ProcessEnv = process.env): HttpCallEngineEnv {
  const parsed = engineEnvSchema.safeParse({
    HTTP_CALL_LOG_LEVEL: env.HTTP_CALL_LOG_LEVEL || undefined,
    HTTP_CALL_COMPRESSION_THRESHOLD_BYTES: env.HTTP_CALL_COMPRESSION_THRESHOLD_BYTES || undefined,
    HTTP_CALL_MAX_RETRY_AFTER_MS: env.HTTP_CALL_MAX_RETRY_AFTER_MS || undefined,
  });
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new Error(`Invalid HTTP call engine configuration: ${issues}`);
  }
  return parsed.data;
}

/**
 * Creates an HttpCallEngine from environment variables, with explicit overrides taking precedence.
 *
 * Environment variables (all optional):
 * - `HTTP_CALL_LOG_LEVEL` - debug | info | warn | error | silent (default: warn)
 * - `HTTP_CALL_COMPRESSION_THRESHOLD_BYTES` - compress bodies larger than this (default: 1400)
 * - `HTTP_CALL_MAX_RETRY_AFTER_MS` - cap for server-suggested retry delays (default: 60000)
 *
 * @example
 * ```typescript
 * const engine = createHttpCallEngine({ transport: createAxiosTransport(axios.create()) });
 * ```
 */
export function createHttpCallEngine(
  overrides: Partial<HttpCallEngineConfig> = {},
  env: NodeJS.ProcessEnv = process.env,
): HttpCallEngine {
  const settings = loadHttpCallEngineEnv(env);

  return new HttpCallEngine({
    logger: createConsoleLogger({ level: settings.HTTP_CALL_LOG_LEVEL }),
    compressionThresholdBytes: settings.HTTP_CALL_COMPRESSION_THRESHOLD_BYTES,
    maxRetryAfterMs: settings.HTTP_CALL_MAX_RETRY_AFTER_MS,
    ...overrides,
  });
}
