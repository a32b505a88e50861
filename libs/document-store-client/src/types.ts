import { z } from 'zod';
import type { HttpCallClient, HttpHeaders, HttpMethod, Logger } from '@docsync/http-call-engine';
import type { DocumentOperationError } from './errors';

/**
 * Document Store Client Types
 *
 * Token, operation and result shapes for the partitioned document backend.
 */

// ============================================================================
// Tokens
// ============================================================================

/** One DNS label: the account becomes the first label of the backend host. */
export const DB_ACCOUNT_PATTERN = /^[a-z0-9](?:[a-z0-9-]*[a-z0-9])?$/i;

export const tokenResultSchema = z.object({
  partition: z.string().min(1),
  dbAccount: z.string().regex(DB_ACCOUNT_PATTERN, 'must be a single hostname label'),
  dbName: z.string().min(1),
  dbCollectionName: z.string().min(1),
  token: z.string().min(1),
  status: z.string().optional(),
  expiresOn: z.string().optional(),
  accountId: z.string().optional(),
});

/**
 * Short-lived credentials scoped to one partition. Treated as immutable.
 */
export type TokenResult = Readonly<z.infer<typeof tokenResultSchema>>;

/**
 * Supplies tokens for a partition. Implemented outside this package; callers refresh and
 * resubmit after an AuthenticationError.
 */
export interface TokenProvider {
  getToken(partition: string): Promise<TokenResult>;
}

// ============================================================================
// Documents
// ============================================================================

/**
 * A document that controls its own wire representation.
 */
export interface SerializableDocument {
  serializeToDictionary(): Record<string, unknown>;
}

export interface DocumentOperation {
  tokenResult: TokenResult;
  /** Empty or omitted for collection-level operations (create, list). */
  documentId?: string;
  httpMethod: HttpMethod;
  /** Serialized to the JSON body. Omit for read, delete and list. */
  document?: SerializableDocument | unknown;
  /** Merged under the reserved headers; cannot replace them. */
  additionalHeaders?: HttpHeaders;
  /** Appended after the document segment. */
  additionalUrlPath?: string;
}

export interface DocumentOperationSuccess {
  ok: true;
  status: number;
  headers: HttpHeaders;
  /** Parsed JSON body, undefined when the response had none. */
  body: unknown;
}

export interface DocumentOperationFailure {
  ok: false;
  error: DocumentOperationError;
}

export type DocumentOperationResult = DocumentOperationSuccess | DocumentOperationFailure;

export type DocumentOperationCompletionHandler = (result: DocumentOperationResult) => void;

// ============================================================================
// Client configuration
// ============================================================================

export interface DocumentStoreClientConfig {
  httpClient: HttpCallClient;
  /** Delays between retries of transient failures. Default: DEFAULT_RETRY_INTERVALS_MS. */
  retryIntervalsMs?: readonly number[];
  compressionEnabled?: boolean;
  /** Host suffix after the account name. Default: documents.azure.com */
  endpointSuffix?: string;
  /** Value of the x-ms-version header. Default: 2018-06-18 */
  apiVersion?: string;
  /** Builds the Authorization header value. Default: (token) => `Bearer ${token}` */
  formatAuthorization?: (token: string) => string;
  logger?: Logger;
  /** Clock for the x-ms-date header. */
  now?: () => Date;
}

// ============================================================================
// Typed CRUD facade
// ============================================================================

export interface DocumentWrapper<T> {
  id: string;
  partition: string;
  deserializedValue: T;
  eTag?: string;
  lastUpdatedDate?: Date;
}

export interface ListDocumentsOptions {
  continuationToken?: string;
  pageSize?: number;
}

export interface DocumentPage<T> {
  items: DocumentWrapper<T>[];
  /** Present when more pages are available. */
  continuationToken?: string;
}
