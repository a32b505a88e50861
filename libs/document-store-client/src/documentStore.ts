import { z } from 'zod';
import { getHeader, noopLogger } from '@docsync/http-call-engine';
import type { HttpHeaders, HttpMethod, Logger } from '@docsync/http-call-engine';
import { CONTINUATION_HEADER, MAX_ITEM_COUNT_HEADER, UPSERT_HEADER } from './documentStoreClient';
import type { DocumentStoreClient } from './documentStoreClient';
import { AuthenticationError, SerializationError } from './errors';
import { toDocumentValue } from './serialization';
import { tokenResultSchema } from './types';
import type {
  DocumentOperationSuccess,
  DocumentPage,
  DocumentWrapper,
  ListDocumentsOptions,
  SerializableDocument,
  TokenProvider,
  TokenResult,
} from './types';

/** Schema for a stored document's value. Input is unconstrained so transforms are allowed. */
export type DocumentSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

const documentEnvelopeSchema = z
  .object({
    id: z.string(),
    PartitionKey: z.string().optional(),
    document: z.unknown(),
    _etag: z.string().optional(),
    _ts: z.number().optional(),
  })
  .passthrough();

const documentListSchema = z
  .object({
    Documents: z.array(z.unknown()),
    _count: z.number().optional(),
  })
  .passthrough();

export interface DocumentStoreConfig {
  client: DocumentStoreClient;
  tokenProvider: TokenProvider;
  logger?: Logger;
}

interface ExecuteParams {
  partition: string;
  httpMethod: HttpMethod;
  documentId?: string;
  document?: SerializableDocument;
  additionalHeaders?: HttpHeaders;
}

/**
 * Promise-based CRUD over DocumentStoreClient.
 *
 * Fetches a token per operation, wraps writes as `{ document, PartitionKey, id }` and
 * validates every returned document against the caller's zod schema. Operations reject with
 * the mapped DocumentOperationError; an AuthenticationError is surfaced as is, never retried
 * here.
 *
 * @example
 * ```typescript
 * const store = new DocumentStore({ client, tokenProvider });
 * const note = await store.readDocument('user-partition', 'note-1', noteSchema);
 * console.log(note.deserializedValue.title, note.eTag);
 * ```
 */
export class DocumentStore {
  private readonly client: DocumentStoreClient;
  private readonly tokenProvider: TokenProvider;
  private readonly logger: Logger;

  constructor(config: DocumentStoreConfig) {
    this.client = config.client;
    this.tokenProvider = config.tokenProvider;
    this.logger = config.logger ?? noopLogger;
  }

  async createDocument<T>(
    partition: string,
    documentId: string,
    document: T | SerializableDocument,
    schema: DocumentSchema<T>,
  ): Promise<DocumentWrapper<T>> {
    const result = await this.execute({
      partition,
      httpMethod: 'POST',
      document: this.envelope(partition, documentId, document),
    });
    return this.toWrapper(result.body, schema, partition);
  }

  /**
   * Creates or replaces the document with the given id.
   */
  async replaceDocument<T>(
    partition: string,
    documentId: string,
    document: T | SerializableDocument,
    schema: DocumentSchema<T>,
  ): Promise<DocumentWrapper<T>> {
    const result = await this.execute({
      partition,
      httpMethod: 'POST',
      document: this.envelope(partition, documentId, document),
      additionalHeaders: { [UPSERT_HEADER]: 'true' },
    });
    return this.toWrapper(result.body, schema, partition);
  }

  async readDocument<T>(partition: string, documentId: string, schema: DocumentSchema<T>): Promise<DocumentWrapper<T>> {
    const result = await this.execute({ partition, httpMethod: 'GET', documentId });
    return this.toWrapper(result.body, schema, partition);
  }

  async deleteDocument(partition: string, documentId: string): Promise<void> {
    await this.execute({ partition, httpMethod: 'DELETE', documentId });
  }

  /**
   * Fetches one page. Pass the returned continuation token to get the next one.
   */
  async listDocuments<T>(
    partition: string,
    schema: DocumentSchema<T>,
    options: ListDocumentsOptions = {},
  ): Promise<DocumentPage<T>> {
    const additionalHeaders: HttpHeaders = {};
    if (options.pageSize !== undefined) {
      additionalHeaders[MAX_ITEM_COUNT_HEADER] = String(options.pageSize);
    }
    if (options.continuationToken) {
      additionalHeaders[CONTINUATION_HEADER] = options.continuationToken;
    }

    const result = await this.execute({ partition, httpMethod: 'GET', additionalHeaders });
    const list = documentListSchema.safeParse(result.body);
    if (!list.success) {
      throw new SerializationError('Response is not a document list', { cause: list.error });
    }

    return {
      items: list.data.Documents.map((item) => this.toWrapper(item, schema, partition)),
      continuationToken: getHeader(result.headers, CONTINUATION_HEADER) || undefined,
    };
  }

  /**
   * Yields every document in the partition, following continuation tokens until exhausted.
   * Stops early if the backend hands back the token it was just given.
   */
  async *iterateDocuments<T>(
    partition: string,
    schema: DocumentSchema<T>,
    options: { pageSize?: number; maxPages?: number } = {},
  ): AsyncGenerator<DocumentWrapper<T>, void, undefined> {
    let continuationToken: string | undefined;
    let pages = 0;
    for (;;) {
      const page = await this.listDocuments(partition, schema, { pageSize: options.pageSize, continuationToken });
      pages += 1;
      yield* page.items;

      const next = page.continuationToken;
      if (!next || (options.maxPages !== undefined && pages >= options.maxPages)) {
        return;
      }
      if (next === continuationToken) {
        this.logger.warn('document_store.list.stalled', { partition, pages, continuationToken: next });
        return;
      }
      continuationToken = next;
    }
  }

  private async execute(params: ExecuteParams): Promise<DocumentOperationSuccess> {
    const tokenResult = await this.getToken(params.partition);
    return new Promise<DocumentOperationSuccess>((resolve, reject) => {
      this.client.performOperation(
        {
          tokenResult,
          httpMethod: params.httpMethod,
          documentId: params.documentId,
          document: params.document,
          additionalHeaders: params.additionalHeaders,
        },
        (result) => {
          if (result.ok) {
            resolve(result);
          } else {
            reject(result.error);
          }
        },
      );
    });
  }

  private async getToken(partition: string): Promise<TokenResult> {
    const token = await this.tokenProvider.getToken(partition);
    const parsed = tokenResultSchema.safeParse(token);
    if (!parsed.success) {
      this.logger.warn('document_store.token.invalid', { partition });
      throw new AuthenticationError(`Token result for partition "${partition}" is malformed`, undefined, {
        cause: parsed.error,
      });
    }
    return parsed.data;
  }

  private envelope(partition: string, documentId: string, document: unknown): SerializableDocument {
    return {
      serializeToDictionary: () => ({
        document: toDocumentValue(document),
        PartitionKey: partition,
        id: documentId,
      }),
    };
  }

  private toWrapper<T>(body: unknown, schema: DocumentSchema<T>, partition: string): DocumentWrapper<T> {
    const envelope = documentEnvelopeSchema.safeParse(body);
    if (!envelope.success) {
      throw new SerializationError('Response is not a stored document', { cause: envelope.error });
    }
    const { id, PartitionKey, document, _etag, _ts } = envelope.data;
    const value = schema.safeParse(document);
    if (!value.success) {
      throw new SerializationError(`Document "${id}" does not match the expected shape`, { cause: value.error });
    }
    return {
      id,
      partition: PartitionKey ?? partition,
      deserializedValue: value.data,
      eTag: _etag,
      lastUpdatedDate: _ts !== undefined ? new Date(_ts * 1000) : undefined,
    };
  }
}
