import type { HttpHeaders } from './types';

const SENSITIVE_HEADERS = new Set(['authorization', 'proxy-authorization', 'app-secret', 'x-api-key', 'cookie']);

const findHeaderKey = (headers: HttpHeaders, name: string): string | undefined => {
  const lower = name.toLowerCase();
  return Object.keys(headers).find((key) => key.toLowerCase() === lower);
};

export const getHeader = (headers: HttpHeaders, name: string): string | undefined => {
  const key = findHeaderKey(headers, name);
  return key === undefined ? undefined : headers[key];
};

export const hasHeader = (headers: HttpHeaders, name: string): boolean => findHeaderKey(headers, name) !== undefined;

/**
 * Sets a header in place, replacing any existing key that differs only by case.
 */
export const setHeader = (headers: HttpHeaders, name: string, value: string): void => {
  const existing = findHeaderKey(headers, name);
  if (existing !== undefined && existing !== name) {
    delete headers[existing];
  }
  headers[name] = value;
};

/**
 * Merges header maps left to right. Later maps win regardless of key casing.
 */
export const mergeHeaders = (...sources: Array<HttpHeaders | undefined>): HttpHeaders => {
  const merged: HttpHeaders = {};
  for (const source of sources) {
    if (!source) continue;
    for (const [key, value] of Object.entries(source)) {
      setHeader(merged, key, value);
    }
  }
  return merged;
};

/**
 * Copy of `headers` safe for log output. Credential values keep only their scheme.
 */
export const redactHeaders = (headers: HttpHeaders): HttpHeaders => {
  const redacted: HttpHeaders = {};
  for (const [key, value] of Object.entries(headers)) {
    if (!SENSITIVE_HEADERS.has(key.toLowerCase())) {
      redacted[key] = value;
      continue;
    }
    const separator = value.indexOf(' ');
    redacted[key] = separator > 0 ? `${value.slice(0, separator)} ***` : '***';
  }
  return redacted;
};
