import { HttpStatusError, TransportError } from './errors';
import { getHeader } from './headers';
import type { ClassifiedError, ErrorCategory, ErrorClassifier, ErrorClassifierContext, HttpHeaders } from './types';

const RETRYABLE_ERROR_CATEGORIES = new Set<ErrorCategory>(['rate_limit', 'network', 'timeout', 'transient']);

export const RETRY_AFTER_MS_HEADER = 'x-ms-retry-after-ms';

export const statusToCategory = (status: number): ErrorCategory => {
  if (status >= 200 && status < 300) return 'none';
  if (status === 401 || status === 403) return 'auth';
  if (status === 404) return 'not_found';
  if (status === 409) return 'conflict';
  if (status === 400 || status === 422) return 'validation';
  if (status === 429) return 'rate_limit';
  if (status === 408) return 'timeout';
  if (status >= 500) return 'transient';
  if (status === 0) return 'network';
  return 'unknown';
};

export const isSuccessStatus = (status: number): boolean => status >= 200 && status < 300;

/**
 * Status codes worth another attempt: no status at all, 408, 429 and every 5xx.
 */
export const isRecoverableStatus = (status: number): boolean =>
  RETRYABLE_ERROR_CATEGORIES.has(statusToCategory(status));

/**
 * Reads a server-suggested retry delay.
 * `x-ms-retry-after-ms` is milliseconds; `Retry-After` is seconds or an HTTP date.
 */
export const parseRetryAfter = (headers: HttpHeaders, now: number = Date.now()): number | undefined => {
  const millis = getHeader(headers, RETRY_AFTER_MS_HEADER);
  if (millis !== undefined) {
    const value = Number(millis);
    if (Number.isFinite(value) && value >= 0) {
      return value;
    }
  }

  const retryAfter = getHeader(headers, 'retry-after');
  if (!retryAfter) return undefined;
  const seconds = Number(retryAfter);
  if (!Number.isNaN(seconds)) {
    return seconds >= 0 ? seconds * 1000 : undefined;
  }
  const date = Date.parse(retryAfter);
  if (!Number.isNaN(date)) {
    const diff = date - now;
    return diff > 0 ? diff : undefined;
  }
  return undefined;
};

export class DefaultErrorClassifier implements ErrorClassifier {
  classify(ctx: ErrorClassifierContext): ClassifiedError {
    const { error } = ctx;

    if (error instanceof HttpStatusError) {
      const category = statusToCategory(error.status);
      const retryable = RETRYABLE_ERROR_CATEGORIES.has(category);
      return {
        category,
        retryable,
        statusCode: error.status,
        retryAfterMs: retryable ? parseRetryAfter(error.headers) : undefined,
      };
    }

    if (error instanceof TransportError) {
      return { category: 'network', retryable: true };
    }

    return { category: error.category, retryable: false };
  }
}

export const defaultErrorClassifier: ErrorClassifier = new DefaultErrorClassifier();
