import { vi } from 'vitest';
import type { HttpHeaders, Logger, RawHttpResponse, TransportRequest } from '@docsync/http-call-engine';
import type { TokenResult } from '../types';

export const TEST_TOKEN: TokenResult = {
  partition: 'user-p1',
  dbAccount: 'acct',
  dbName: 'appdb',
  dbCollectionName: 'notes',
  token: 'test-token',
};

export const FIXED_NOW = new Date('2024-03-01T12:00:00Z');

const encoder = new TextEncoder();
const decoder = new TextDecoder();

export const rawResponse = (status: number, body: unknown = '', headers: HttpHeaders = {}): RawHttpResponse => ({
  status,
  headers,
  body: encoder.encode(typeof body === 'string' ? body : JSON.stringify(body)),
});

/** In-process transport that replays the given responses in order, repeating the last one. */
export const scriptedTransport = (...responses: Array<RawHttpResponse | Error>) => {
  let index = 0;
  return vi.fn(async (_req: TransportRequest, _signal: AbortSignal): Promise<RawHttpResponse> => {
    const next = responses[Math.min(index, responses.length - 1)];
    index += 1;
    if (next instanceof Error) throw next;
    return next;
  });
};

export const requestJson = (request: TransportRequest): unknown => JSON.parse(decoder.decode(request.body));

export const createTestLogger = (): Logger => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
});
