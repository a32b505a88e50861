export * from './types';
export { HttpCallEngine } from './HttpCallEngine';
export type { HttpCall } from './HttpCall';
export {
  HttpCallError,
  TransportError,
  ClientDisabledError,
  CancelledError,
  HttpStatusError,
  CompressionError,
} from './errors';
export { RetryPolicy, DEFAULT_RETRY_INTERVALS_MS } from './retryPolicy';
export {
  DefaultErrorClassifier,
  defaultErrorClassifier,
  isRecoverableStatus,
  isSuccessStatus,
  parseRetryAfter,
  statusToCategory,
  RETRY_AFTER_MS_HEADER,
} from './classification';
export { DEFAULT_COMPRESSION_THRESHOLD_BYTES, CONTENT_ENCODING_GZIP, gzipCompressor } from './compression';
export { getHeader, hasHeader, setHeader, mergeHeaders, redactHeaders } from './headers';
export { createConsoleLogger, noopLogger, errorMessage, LOG_LEVELS } from './logger';
export type { LogLevel } from './logger';
export { createHttpCallEngine, loadHttpCallEngineEnv } from './factories';
export type { HttpCallEngineEnv } from './factories';
export * from './transport/fetchTransport';
export * from './transport/axiosTransport';
