import type { ErrorCategory, HttpHeaders } from './types';

/**
 * Base class for every error a call can complete with.
 */
export class HttpCallError extends Error {
  readonly category: ErrorCategory;

  constructor(message: string, category: ErrorCategory, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'HttpCallError';
    this.category = category;
  }
}

/**
 * Connectivity failure: the transport rejected without producing a response.
 */
export class TransportError extends HttpCallError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'network', options);
    this.name = 'TransportError';
  }
}

/**
 * The engine was disabled when the call was submitted. No network activity took place.
 */
export class ClientDisabledError extends HttpCallError {
  constructor(message = 'HTTP client is disabled') {
    super(message, 'disabled');
    this.name = 'ClientDisabledError';
  }
}

/**
 * The call was cancelled while pending or in flight.
 */
export class CancelledError extends HttpCallError {
  constructor(message = 'HTTP call was cancelled') {
    super(message, 'canceled');
    this.name = 'CancelledError';
  }
}

export class HttpStatusError extends HttpCallError {
  readonly status: number;
  readonly headers: HttpHeaders;
  readonly body: Uint8Array;

  constructor(
    message: string,
    options: {
      status: number;
      headers: HttpHeaders;
      body: Uint8Array;
      category: ErrorCategory;
    },
  ) {
    super(message, options.category);
    this.name = 'HttpStatusError';
    this.status = options.status;
    this.headers = options.headers;
    this.body = options.body;
  }
}

/**
 * Raised by a compressor. The engine logs it and sends the uncompressed body instead.
 */
export class CompressionError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CompressionError';
  }
}
