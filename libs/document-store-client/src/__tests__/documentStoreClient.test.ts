import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ClientDisabledError, HttpCallEngine, TransportError } from '@docsync/http-call-engine';
import type { Logger } from '@docsync/http-call-engine';
import { DocumentStoreClient } from '../documentStoreClient';
import {
  AuthenticationError,
  ConflictError,
  DocumentNotFoundError,
  DocumentStoreHttpError,
  SerializationError,
} from '../errors';
import { tokenResultSchema } from '../types';
import type { DocumentOperation, DocumentOperationResult, DocumentStoreClientConfig } from '../types';
import { FIXED_NOW, TEST_TOKEN, createTestLogger, rawResponse, requestJson, scriptedTransport } from './fixtures';

const DOCS_URL = 'https://acct.documents.azure.com/dbs/appdb/colls/notes/docs';

const perform = (client: DocumentStoreClient, operation: DocumentOperation) =>
  new Promise<DocumentOperationResult>((resolve) => {
    client.performOperation(operation, resolve);
  });

describe('DocumentStoreClient', () => {
  let logger: Logger;

  beforeEach(() => {
    logger = createTestLogger();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  const setup = (
    transport: ReturnType<typeof scriptedTransport>,
    config: Partial<Omit<DocumentStoreClientConfig, 'httpClient'>> = {},
  ) => {
    const engine = new HttpCallEngine({ transport });
    const client = new DocumentStoreClient({
      httpClient: engine,
      retryIntervalsMs: [],
      logger,
      now: () => FIXED_NOW,
      ...config,
    });
    return { engine, client };
  };

  describe('request building', () => {
    it('targets the document URL with the partition and token headers', async () => {
      const transport = scriptedTransport(rawResponse(200, { id: 'doc1' }));
      const { client } = setup(transport);

      const result = await perform(client, { tokenResult: TEST_TOKEN, documentId: 'doc1', httpMethod: 'GET' });

      expect(result).toEqual({
        ok: true,
        status: 200,
        headers: {},
        body: { id: 'doc1' },
      });
      const [request] = transport.mock.calls[0];
      expect(request.method).toBe('GET');
      expect(request.url).toBe(`${DOCS_URL}/doc1`);
      expect(request.body).toBeUndefined();
      expect(request.headers).toEqual({
        'x-ms-version': '2018-06-18',
        'x-ms-date': 'Fri, 01 Mar 2024 12:00:00 GMT',
        'Content-Type': 'application/json',
        'x-ms-documentdb-partitionkey': '["user-p1"]',
        Authorization: 'Bearer test-token',
      });
    });

    it('omits the document segment for collection operations and appends extra paths', () => {
      const { client } = setup(scriptedTransport(rawResponse(200)));

      expect(client.buildDocumentUrl(TEST_TOKEN)).toBe(DOCS_URL);
      expect(client.buildDocumentUrl(TEST_TOKEN, '')).toBe(DOCS_URL);
      expect(client.buildDocumentUrl(TEST_TOKEN, 'doc1', '/attachments')).toBe(`${DOCS_URL}/doc1/attachments`);
    });

    it('escapes ids that are not URL-safe', () => {
      const { client } = setup(scriptedTransport(rawResponse(200)));

      expect(client.buildDocumentUrl(TEST_TOKEN, 'a/b c')).toBe(`${DOCS_URL}/a%2Fb%20c`);
    });

    it('uses the configured endpoint suffix, API version and authorization format', () => {
      const { client } = setup(scriptedTransport(rawResponse(200)), {
        endpointSuffix: 'documents.example.test',
        apiVersion: '2020-07-15',
        formatAuthorization: (token) => `type=resource&sig=${token}`,
      });

      expect(client.buildDocumentUrl(TEST_TOKEN, 'doc1')).toBe(
        'https://acct.documents.example.test/dbs/appdb/colls/notes/docs/doc1',
      );
      expect(client.buildHeaders(TEST_TOKEN)).toMatchObject({
        'x-ms-version': '2020-07-15',
        Authorization: 'type=resource&sig=test-token',
      });
    });

    it('merges caller headers without letting them replace reserved ones', () => {
      const { client } = setup(scriptedTransport(rawResponse(200)));

      const headers = client.buildHeaders(TEST_TOKEN, {
        authorization: 'Bearer someone-else',
        'x-ms-documentdb-partitionkey': '["other"]',
        'X-MS-VERSION': '2020-07-15',
        'x-ms-documentdb-is-upsert': 'true',
      });

      expect(headers).toEqual({
        'X-MS-VERSION': '2020-07-15',
        'x-ms-date': 'Fri, 01 Mar 2024 12:00:00 GMT',
        'x-ms-documentdb-is-upsert': 'true',
        'Content-Type': 'application/json',
        'x-ms-documentdb-partitionkey': '["user-p1"]',
        Authorization: 'Bearer test-token',
      });
    });

    it('serializes plain documents and documents with their own dictionary', async () => {
      const transport = scriptedTransport(rawResponse(201, { id: 'doc1' }));
      const { client } = setup(transport);

      await perform(client, { tokenResult: TEST_TOKEN, httpMethod: 'POST', document: { title: 'Hello', tags: ['a'] } });
      await perform(client, {
        tokenResult: TEST_TOKEN,
        httpMethod: 'POST',
        document: { serializeToDictionary: () => ({ title: 'From dictionary' }) },
      });

      expect(requestJson(transport.mock.calls[0][0])).toEqual({ title: 'Hello', tags: ['a'] });
      expect(requestJson(transport.mock.calls[1][0])).toEqual({ title: 'From dictionary' });
    });

    it('compresses large bodies when enabled', async () => {
      const transport = scriptedTransport(rawResponse(201));
      const { client } = setup(transport, { compressionEnabled: true });

      await perform(client, {
        tokenResult: TEST_TOKEN,
        httpMethod: 'POST',
        document: { text: 'lorem ipsum '.repeat(200) },
      });

      expect(transport.mock.calls[0][0].headers['Content-Encoding']).toBe('gzip');
    });
  });

  describe('token and URL validation', () => {
    it.each(['attacker.example/x?', 'my acct', 'acct.other', '-acct'])(
      'completes with AuthenticationError for account %j without sending',
      (dbAccount) => {
        const transport = scriptedTransport(rawResponse(200));
        const { client } = setup(transport);
        const completion = vi.fn();

        const handle = client.performOperation(
          { tokenResult: { ...TEST_TOKEN, dbAccount }, documentId: 'doc1', httpMethod: 'GET' },
          completion,
        );

        expect(handle).toBeUndefined();
        expect(transport).not.toHaveBeenCalled();
        expect(completion).toHaveBeenCalledTimes(1);
        const [result] = completion.mock.calls[0];
        expect(result.ok).toBe(false);
        expect(result.error).toBeInstanceOf(AuthenticationError);
        expect(result.error.message).toBe('Token account is not a valid hostname label');
      },
    );

    it('rejects such accounts in the token schema', () => {
      expect(tokenResultSchema.safeParse({ ...TEST_TOKEN, dbAccount: 'attacker.example/x?' }).success).toBe(false);
      expect(tokenResultSchema.safeParse({ ...TEST_TOKEN, dbAccount: 'my-acct-01' }).success).toBe(true);
    });

    it('completes with SerializationError when the operation forms no valid URL', () => {
      const transport = scriptedTransport(rawResponse(200));
      const { client } = setup(transport, { endpointSuffix: 'documents example.test' });
      const completion = vi.fn();

      const handle = client.performOperation(
        { tokenResult: TEST_TOKEN, documentId: 'doc1', httpMethod: 'GET' },
        completion,
      );

      expect(handle).toBeUndefined();
      expect(transport).not.toHaveBeenCalled();
      expect(completion).toHaveBeenCalledTimes(1);
      expect(completion.mock.calls[0][0].error).toBeInstanceOf(SerializationError);
      expect(logger.warn).toHaveBeenCalledWith('document_store.url.invalid', {
        method: 'GET',
        partition: 'user-p1',
      });
    });
  });

  describe('serialization failures', () => {
    it('reports a 2xx body that is not valid UTF-8', async () => {
      const encoder = new TextEncoder();
      const body = Uint8Array.of(...encoder.encode('{"id":"'), 0xff, 0xfe, ...encoder.encode('"}'));
      const { client } = setup(scriptedTransport({ status: 200, headers: {}, body }));

      const result = await perform(client, { tokenResult: TEST_TOKEN, documentId: 'doc1', httpMethod: 'GET' });

      if (result.ok) throw new Error('expected failure');
      expect(result.error).toBeInstanceOf(SerializationError);
      expect(result.error.message).toBe('Response body is not valid UTF-8');
    });

    it('completes synchronously without any network call', () => {
      const transport = scriptedTransport(rawResponse(200));
      const { client } = setup(transport);
      const completion = vi.fn();

      const handle = client.performOperation(
        { tokenResult: TEST_TOKEN, httpMethod: 'POST', document: { count: 1n } },
        completion,
      );

      expect(handle).toBeUndefined();
      expect(transport).not.toHaveBeenCalled();
      expect(completion).toHaveBeenCalledTimes(1);
      const [result] = completion.mock.calls[0];
      expect(result.ok).toBe(false);
      expect(result.error).toBeInstanceOf(SerializationError);
      expect(logger.warn).toHaveBeenCalledWith(
        'document_store.serialization.failed',
        expect.objectContaining({ method: 'POST', url: DOCS_URL }),
      );
    });

    it('reports a 2xx body that is not JSON', async () => {
      const { client } = setup(scriptedTransport(rawResponse(200, '<html>')));

      const result = await perform(client, { tokenResult: TEST_TOKEN, documentId: 'doc1', httpMethod: 'GET' });

      expect(result.ok).toBe(false);
      expect(!result.ok && result.error).toBeInstanceOf(SerializationError);
    });

    it('returns an undefined body for empty responses', async () => {
      const { client } = setup(scriptedTransport(rawResponse(204)));

      const result = await perform(client, { tokenResult: TEST_TOKEN, documentId: 'doc1', httpMethod: 'DELETE' });

      expect(result).toEqual({ ok: true, status: 204, headers: {}, body: undefined });
    });
  });

  describe('error mapping', () => {
    it.each([
      [401, AuthenticationError],
      [403, AuthenticationError],
      [404, DocumentNotFoundError],
      [409, ConflictError],
    ])('maps %i to a terminal error after one attempt', async (status, ErrorType) => {
      const transport = scriptedTransport(rawResponse(status));
      const { client } = setup(transport, { retryIntervalsMs: [10, 20] });

      const result = await perform(client, { tokenResult: TEST_TOKEN, documentId: 'doc1', httpMethod: 'GET' });

      expect(transport).toHaveBeenCalledTimes(1);
      if (result.ok) throw new Error('expected failure');
      expect(result.error).toBeInstanceOf(ErrorType);
      expect(result.error).toMatchObject({ status });
    });

    it('retries transient statuses and then reports DocumentStoreHttpError', async () => {
      vi.useFakeTimers();
      const transport = scriptedTransport(rawResponse(503, 'busy'));
      const { client } = setup(transport, { retryIntervalsMs: [10, 20] });

      const pending = perform(client, { tokenResult: TEST_TOKEN, documentId: 'doc1', httpMethod: 'GET' });
      await vi.runAllTimersAsync();
      const result = await pending;

      expect(transport).toHaveBeenCalledTimes(3);
      if (result.ok) throw new Error('expected failure');
      expect(result.error).toBeInstanceOf(DocumentStoreHttpError);
      expect(result.error).toMatchObject({
        status: 503,
        responseBody: 'busy',
        message: 'Document store request failed with status 503',
      });
      expect(logger.warn).toHaveBeenCalledWith(
        'document_store.operation.failed',
        expect.objectContaining({ errorName: 'DocumentStoreHttpError', partition: 'user-p1' }),
      );
    });

    it('passes engine errors through unchanged', async () => {
      const { client, engine } = setup(scriptedTransport(new Error('ECONNREFUSED')));

      const offline = await perform(client, { tokenResult: TEST_TOKEN, documentId: 'doc1', httpMethod: 'GET' });
      engine.setEnabled(false);
      const disabled = await perform(client, { tokenResult: TEST_TOKEN, documentId: 'doc1', httpMethod: 'GET' });

      expect(!offline.ok && offline.error).toBeInstanceOf(TransportError);
      expect(!disabled.ok && disabled.error).toBeInstanceOf(ClientDisabledError);
    });
  });
});
