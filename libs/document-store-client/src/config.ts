import { z } from 'zod';
import { DocumentStoreClient } from './documentStoreClient';
import type { DocumentStoreClientConfig } from './types';

const retryIntervalsSchema = z
  .string()
  .transform((value) => value.split(',').map((part) => part.trim()).filter((part) => part.length > 0))
  .pipe(z.array(z.coerce.number().int().nonnegative()));

const booleanFlagSchema = z.enum(['true', 'false', '1', '0']).transform((value) => value === 'true' || value === '1');

const documentStoreEnvSchema = z.object({
  DOCUMENT_STORE_RETRY_INTERVALS_MS: retryIntervalsSchema.optional(),
  DOCUMENT_STORE_ENDPOINT_SUFFIX: z.string().min(1).optional(),
  DOCUMENT_STORE_API_VERSION: z.string().min(1).optional(),
  DOCUMENT_STORE_COMPRESSION_ENABLED: booleanFlagSchema.optional(),
});

export type DocumentStoreEnv = z.infer<typeof documentStoreEnvSchema>;

/**
 * Parses document store settings from environment variables. Throws on invalid values.
 */
export function loadDocumentStoreEnv(env: NodeJS.ProcessEnv = process.env): DocumentStoreEnv {
  const parsed = documentStoreEnvSchema.safeParse({
    DOCUMENT_STORE_RETRY_INTERVALS_MS: env.DOCUMENT_STORE_RETRY_INTERVALS_MS || undefined,
    DOCUMENT_STORE_ENDPOINT_SUFFIX: env.DOCUMENT_STORE_ENDPOINT_SUFFIX || undefined,
    DOCUMENT_STORE_API_VERSION: env.DOCUMENT_STORE_API_VERSION || undefined,
    DOCUMENT_STORE_COMPRESSION_ENABLED: env.DOCUMENT_STORE_COMPRESSION_ENABLED || undefined,
  });
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new Error(`Invalid document store configuration: ${issues}`);
  }
  return parsed.data;
}

/**
 * Create a DocumentStoreClient from environment variables.
 *
 * Optional:
 * - `DOCUMENT_STORE_RETRY_INTERVALS_MS` - comma-separated retry delays (default: 1000,2000,4000)
 * - `DOCUMENT_STORE_ENDPOINT_SUFFIX` - host suffix after the account name (default: documents.azure.com)
 * - `DOCUMENT_STORE_API_VERSION` - x-ms-version header value (default: 2018-06-18)
 * - `DOCUMENT_STORE_COMPRESSION_ENABLED` - gzip large request bodies (default: false)
 */
export function createDocumentStoreClient(
  config: Partial<DocumentStoreClientConfig> & Pick<DocumentStoreClientConfig, 'httpClient'>,
  env: NodeJS.ProcessEnv = process.env,
): DocumentStoreClient {
  const settings = loadDocumentStoreEnv(env);

  return new DocumentStoreClient({
    retryIntervalsMs: settings.DOCUMENT_STORE_RETRY_INTERVALS_MS,
    endpointSuffix: settings.DOCUMENT_STORE_ENDPOINT_SUFFIX,
    apiVersion: settings.DOCUMENT_STORE_API_VERSION,
    compressionEnabled: settings.DOCUMENT_STORE_COMPRESSION_ENABLED,
    ...config,
  });
}
