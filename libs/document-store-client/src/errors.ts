import type { HttpCallError } from '@docsync/http-call-engine';

export class DocumentStoreError extends Error {
  constructor(
    message: string,
    public readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'DocumentStoreError';
  }
}

/**
 * The token was rejected (401/403) or is malformed. Refresh it and resubmit the operation.
 */
export class AuthenticationError extends DocumentStoreError {
  constructor(message: string, status?: number, options?: { cause?: unknown }) {
    super(message, status, options);
    this.name = 'AuthenticationError';
  }
}

export class DocumentNotFoundError extends DocumentStoreError {
  constructor(message: string, status = 404) {
    super(message, status);
    this.name = 'DocumentNotFoundError';
  }
}

/**
 * The write collides with the current state, e.g. a duplicate id on create.
 */
export class ConflictError extends DocumentStoreError {
  constructor(message: string, status = 409) {
    super(message, status);
    this.name = 'ConflictError';
  }
}

export class SerializationError extends DocumentStoreError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, undefined, options);
    this.name = 'SerializationError';
  }
}

/**
 * Any other non-2xx status that reached the caller, including transient statuses after
 * retries ran out.
 */
export class DocumentStoreHttpError extends DocumentStoreError {
  constructor(
    message: string,
    status: number,
    public readonly responseBody?: string,
  ) {
    super(message, status);
    this.name = 'DocumentStoreHttpError';
  }
}

/**
 * Everything a document operation can fail with: store errors, or engine errors
 * (TransportError, CancelledError, ClientDisabledError) passed through unchanged.
 */
export type DocumentOperationError = DocumentStoreError | HttpCallError;
