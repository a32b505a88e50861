import type { HttpHeaders, HttpTransport, RawHttpResponse, TransportRequest } from '../types';

const toArrayBuffer = (bytes: Uint8Array): ArrayBuffer => {
  const copy = new ArrayBuffer(bytes.byteLength);
  new Uint8Array(copy).set(bytes);
  return copy;
};

/**
 * Fetch-based HTTP transport.
 * Uses global fetch API and converts Response to RawHttpResponse. Non-2xx statuses resolve.
 */
export const fetchTransport: HttpTransport = async (req: TransportRequest, signal: AbortSignal): Promise<RawHttpResponse> => {
  const response = await fetch(req.url, {
    method: req.method,
    headers: req.headers,
    body: req.body ? toArrayBuffer(req.body) : undefined,
    signal,
  });
  const body = new Uint8Array(await response.arrayBuffer());

  // Convert Headers object to plain object
  const headers: HttpHeaders = {};
  response.headers.forEach((value, key) => {
    headers[key] = value;
  });

  return {
    status: response.status,
    headers,
    body,
  };
};
