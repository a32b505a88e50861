/**
 * @docsync/document-store-client
 *
 * CRUD access to a partitioned, token-authenticated document backend, executed through
 * the retrying HTTP call engine.
 *
 * ## Architecture
 *
 * - **DocumentStoreClient**: request builder and response mapper (`performOperation`)
 * - **DocumentStore**: promise-based typed CRUD with zod-validated documents
 * - **Errors**: AuthenticationError, DocumentNotFoundError, ConflictError, SerializationError
 *
 * ## Usage
 *
 * ```typescript
 * import { createHttpCallEngine } from '@docsync/http-call-engine';
 * import { createDocumentStoreClient, DocumentStore } from '@docsync/document-store-client';
 *
 * const engine = createHttpCallEngine();
 * const client = createDocumentStoreClient({ httpClient: engine });
 * const store = new DocumentStore({ client, tokenProvider });
 *
 * await store.createDocument('user-partition', 'note-1', { title: 'Hello' }, noteSchema);
 *
 * // Disabling the engine cancels every outstanding operation with CancelledError.
 * engine.setEnabled(false);
 * ```
 */

// ============================================================================
// Primary API - Clients and Factory
// ============================================================================

export {
  DocumentStoreClient,
  DEFAULT_API_VERSION,
  DEFAULT_ENDPOINT_SUFFIX,
  PARTITION_KEY_HEADER,
  API_VERSION_HEADER,
  DATE_HEADER,
  UPSERT_HEADER,
  CONTINUATION_HEADER,
  MAX_ITEM_COUNT_HEADER,
} from './documentStoreClient';
export { DocumentStore } from './documentStore';
export type { DocumentSchema, DocumentStoreConfig } from './documentStore';
export { createDocumentStoreClient, loadDocumentStoreEnv } from './config';
export type { DocumentStoreEnv } from './config';
export { isSerializableDocument, serializeDocument } from './serialization';

// ============================================================================
// Type Exports
// ============================================================================

export { tokenResultSchema, DB_ACCOUNT_PATTERN } from './types';
export type {
  TokenResult,
  TokenProvider,
  SerializableDocument,
  DocumentOperation,
  DocumentOperationSuccess,
  DocumentOperationFailure,
  DocumentOperationResult,
  DocumentOperationCompletionHandler,
  DocumentStoreClientConfig,
  DocumentWrapper,
  DocumentPage,
  ListDocumentsOptions,
} from './types';

// ============================================================================
// Error Exports
// ============================================================================

export {
  DocumentStoreError,
  AuthenticationError,
  DocumentNotFoundError,
  ConflictError,
  SerializationError,
  DocumentStoreHttpError,
} from './errors';
export type { DocumentOperationError } from './errors';
