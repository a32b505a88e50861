import {
  DEFAULT_RETRY_INTERVALS_MS,
  HttpStatusError,
  mergeHeaders,
  noopLogger,
} from '@docsync/http-call-engine';
import type {
  HttpCallClient,
  HttpCallError,
  HttpCallHandle,
  HttpCallResult,
  HttpHeaders,
  Logger,
} from '@docsync/http-call-engine';
import {
  AuthenticationError,
  ConflictError,
  DocumentNotFoundError,
  DocumentStoreHttpError,
  SerializationError,
} from './errors';
import type { DocumentOperationError } from './errors';
import { DB_ACCOUNT_PATTERN } from './types';
import { decodeText, deserializeBody, serializeDocument } from './serialization';
import type {
  DocumentOperation,
  DocumentOperationCompletionHandler,
  DocumentOperationResult,
  DocumentStoreClientConfig,
  TokenResult,
} from './types';

export const DEFAULT_ENDPOINT_SUFFIX = 'documents.azure.com';
export const DEFAULT_API_VERSION = '2018-06-18';

export const PARTITION_KEY_HEADER = 'x-ms-documentdb-partitionkey';
export const API_VERSION_HEADER = 'x-ms-version';
export const DATE_HEADER = 'x-ms-date';
export const UPSERT_HEADER = 'x-ms-documentdb-is-upsert';
export const CONTINUATION_HEADER = 'x-ms-continuation';
export const MAX_ITEM_COUNT_HEADER = 'x-ms-max-item-count';

/**
 * Document Store Client
 *
 * Turns a logical CRUD operation plus a partition token into a backend request, submits it
 * through an HttpCallClient with the backend retry intervals, and maps the outcome:
 *
 * - 2xx: parsed JSON body (undefined when empty)
 * - 401/403: AuthenticationError; refresh the token and resubmit
 * - 404: DocumentNotFoundError
 * - 409: ConflictError
 * - 408/429/5xx: retried by the engine; DocumentStoreHttpError once intervals run out
 *
 * The client holds no per-operation state.
 */
export class DocumentStoreClient {
  private readonly httpClient: HttpCallClient;
  private readonly retryIntervalsMs: readonly number[];
  private readonly compressionEnabled: boolean;
  private readonly endpointSuffix: string;
  private readonly apiVersion: string;
  private readonly formatAuthorization: (token: string) => string;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(config: DocumentStoreClientConfig) {
    this.httpClient = config.httpClient;
    this.retryIntervalsMs = config.retryIntervalsMs ?? DEFAULT_RETRY_INTERVALS_MS;
    this.compressionEnabled = config.compressionEnabled ?? false;
    this.endpointSuffix = config.endpointSuffix ?? DEFAULT_ENDPOINT_SUFFIX;
    this.apiVersion = config.apiVersion ?? DEFAULT_API_VERSION;
    this.formatAuthorization = config.formatAuthorization ?? ((token: string) => `Bearer ${token}`);
    this.logger = config.logger ?? noopLogger;
    this.now = config.now ?? (() => new Date());
  }

  /**
   * Submits one operation. The completion handler fires exactly once.
   *
   * Returns the engine handle, or undefined when nothing was sent: an account that is not a
   * hostname label yields AuthenticationError; an unusable URL or document yields
   * SerializationError.
   */
  performOperation(
    operation: DocumentOperation,
    completionHandler: DocumentOperationCompletionHandler,
  ): HttpCallHandle | undefined {
    const { tokenResult, httpMethod } = operation;

    if (!DB_ACCOUNT_PATTERN.test(tokenResult.dbAccount)) {
      this.logger.warn('document_store.token.invalid', { method: httpMethod, partition: tokenResult.partition });
      completionHandler({
        ok: false,
        error: new AuthenticationError('Token account is not a valid hostname label'),
      });
      return undefined;
    }

    const url = this.buildDocumentUrl(tokenResult, operation.documentId, operation.additionalUrlPath);
    if (!URL.canParse(url)) {
      this.logger.warn('document_store.url.invalid', { method: httpMethod, partition: tokenResult.partition });
      completionHandler({
        ok: false,
        error: new SerializationError(`Operation does not form a valid document URL: "${url}"`),
      });
      return undefined;
    }

    let body: Uint8Array | undefined;
    if (operation.document !== undefined && operation.document !== null) {
      try {
        body = serializeDocument(operation.document);
      } catch (error) {
        const serializationError =
          error instanceof SerializationError
            ? error
            : new SerializationError('Failed to serialize document', { cause: error });
        this.logger.warn('document_store.serialization.failed', {
          method: httpMethod,
          url,
          error: serializationError.message,
        });
        completionHandler({ ok: false, error: serializationError });
        return undefined;
      }
    }

    this.logger.debug('document_store.operation', {
      method: httpMethod,
      url,
      partition: tokenResult.partition,
      documentId: operation.documentId,
    });

    return this.httpClient.sendAsync(
      {
        url,
        method: httpMethod,
        headers: this.buildHeaders(tokenResult, operation.additionalHeaders),
        body,
        retryIntervalsMs: this.retryIntervalsMs,
        compressionEnabled: this.compressionEnabled,
      },
      (result) => {
        const mapped = this.mapResult(result);
        if (!mapped.ok) {
          this.logger.warn('document_store.operation.failed', {
            method: httpMethod,
            url,
            partition: tokenResult.partition,
            error: mapped.error.message,
            errorName: mapped.error.name,
          });
        }
        completionHandler(mapped);
      },
    );
  }

  /**
   * `https://{account}.{suffix}/dbs/{db}/colls/{collection}/docs[/{documentId}][/{additionalUrlPath}]`
   */
  buildDocumentUrl(tokenResult: TokenResult, documentId?: string, additionalUrlPath?: string): string {
    const segments = [
      `https://${tokenResult.dbAccount}.${this.endpointSuffix}`,
      'dbs',
      encodeURIComponent(tokenResult.dbName),
      'colls',
      encodeURIComponent(tokenResult.dbCollectionName),
      'docs',
    ];
    if (documentId) {
      segments.push(encodeURIComponent(documentId));
    }
    const extraPath = additionalUrlPath?.replace(/^\/+/, '');
    if (extraPath) {
      segments.push(extraPath);
    }
    return segments.join('/');
  }

  /**
   * Caller headers sit between the protocol defaults and the reserved headers, so they can
   * add or adjust metadata but never replace authorization, partition key or content type.
   */
  buildHeaders(tokenResult: TokenResult, additionalHeaders?: HttpHeaders): HttpHeaders {
    return mergeHeaders(
      {
        [API_VERSION_HEADER]: this.apiVersion,
        [DATE_HEADER]: this.now().toUTCString(),
      },
      additionalHeaders,
      {
        'Content-Type': 'application/json',
        [PARTITION_KEY_HEADER]: JSON.stringify([tokenResult.partition]),
        Authorization: this.formatAuthorization(tokenResult.token),
      },
    );
  }

  private mapResult(result: HttpCallResult): DocumentOperationResult {
    if (!result.ok) {
      return { ok: false, error: this.mapError(result.error) };
    }
    let body: unknown;
    try {
      body = deserializeBody(result.body);
    } catch (error) {
      return {
        ok: false,
        error:
          error instanceof SerializationError
            ? error
            : new SerializationError('Failed to deserialize response body', { cause: error }),
      };
    }
    return { ok: true, status: result.status, headers: result.headers, body };
  }

  private mapError(error: HttpCallError): DocumentOperationError {
    if (!(error instanceof HttpStatusError)) {
      return error;
    }
    const { status } = error;
    if (status === 401 || status === 403) {
      return new AuthenticationError(`Document store rejected the token with status ${status}`, status);
    }
    if (status === 404) {
      return new DocumentNotFoundError('Document not found');
    }
    if (status === 409) {
      return new ConflictError('Document conflicts with the stored state');
    }
    return new DocumentStoreHttpError(
      `Document store request failed with status ${status}`,
      status,
      decodeText(error.body) || undefined,
    );
  }
}
