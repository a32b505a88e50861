import type { HttpCallError } from './errors';

export type HttpMethod = 'GET' | 'HEAD' | 'OPTIONS' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export type HttpHeaders = Record<string, string>;

export type LoggerMeta = Record<string, unknown>;

export interface Logger {
  debug(message: string, meta?: LoggerMeta): void;
  info(message: string, meta?: LoggerMeta): void;
  warn(message: string, meta?: LoggerMeta): void;
  error(message: string, meta?: LoggerMeta): void;
}

/**
 * Error category classification for failed attempts.
 *
 * - 'auth': Authentication/authorization failure (401, 403)
 * - 'validation': Client input validation error (400, 422)
 * - 'not_found': Resource does not exist (404)
 * - 'conflict': Resource state conflict (409)
 * - 'rate_limit': Rate limit exceeded (429)
 * - 'timeout': Request timeout (408)
 * - 'transient': Temporary server error, retryable (5xx)
 * - 'network': Transport-level error (connection failed, DNS, no status)
 * - 'canceled': Call was cancelled while pending or in flight
 * - 'disabled': Call was rejected because the engine is disabled
 * - 'unknown': Unclassified error
 */
export type ErrorCategory =
  | 'none'
  | 'auth'
  | 'validation'
  | 'not_found'
  | 'conflict'
  | 'rate_limit'
  | 'timeout'
  | 'transient'
  | 'network'
  | 'canceled'
  | 'disabled'
  | 'unknown';

export interface ClassifiedError {
  category: ErrorCategory;
  retryable: boolean;
  statusCode?: number;
  /** Server-suggested delay before the next attempt, when the response carried one. */
  retryAfterMs?: number;
}

export interface ErrorClassifierContext {
  method: HttpMethod;
  url: string;
  attempt: number;
  error: HttpCallError;
  response?: RawHttpResponse;
}

export interface ErrorClassifier {
  classify(ctx: ErrorClassifierContext): ClassifiedError;
}

/**
 * Transport layer request. Bodies are already compressed when compression applied.
 */
export interface TransportRequest {
  method: HttpMethod;
  url: string;
  headers: HttpHeaders;
  body?: Uint8Array;
}

export interface RawHttpResponse {
  status: number;
  headers: HttpHeaders;
  body: Uint8Array;
}

/**
 * HTTP transport abstraction.
 * Takes a transport request and abort signal, returns a raw HTTP response for any status.
 * Rejects only on transport-level failures.
 */
export interface HttpTransport {
  (req: TransportRequest, signal: AbortSignal): Promise<RawHttpResponse>;
}

/**
 * A logical request submitted to the engine.
 */
export interface HttpCallRequest {
  url: string;
  method: HttpMethod;
  headers?: HttpHeaders;
  body?: Uint8Array;
  /** Delay before each retry. Empty or omitted means the call is attempted once. */
  retryIntervalsMs?: readonly number[];
  /** Gzip the body when it exceeds the engine's compression threshold. */
  compressionEnabled?: boolean;
}

export interface HttpCallSuccess {
  ok: true;
  status: number;
  headers: HttpHeaders;
  body: Uint8Array;
  attempts: number;
}

export interface HttpCallFailure {
  ok: false;
  error: HttpCallError;
  attempts: number;
}

export type HttpCallResult = HttpCallSuccess | HttpCallFailure;

export type HttpCallCompletionHandler = (result: HttpCallResult) => void;

/**
 * Read-only view of a submitted call.
 * `result` resolves exactly once with the value handed to the completion handler; it never rejects.
 */
export interface HttpCallHandle {
  readonly id: string;
  readonly url: string;
  readonly method: HttpMethod;
  readonly retryCount: number;
  readonly attempts: number;
  readonly isCancelled: boolean;
  readonly isCompleted: boolean;
  readonly result: Promise<HttpCallResult>;
}

/**
 * Capability set shared by the engine and its test doubles.
 */
export interface HttpCallClient {
  readonly isEnabled: boolean;
  sendAsync(request: HttpCallRequest, completionHandler?: HttpCallCompletionHandler): HttpCallHandle;
  /** Disabling cancels and discards every pending call. */
  setEnabled(isEnabled: boolean): void;
}

export interface BeforeSendContext {
  call: HttpCallHandle;
  request: TransportRequest;
  attempt: number;
}

export interface AfterResponseContext {
  call: HttpCallHandle;
  request: TransportRequest;
  attempt: number;
  response: RawHttpResponse;
}

export interface OnErrorContext {
  call: HttpCallHandle;
  request: TransportRequest;
  attempt: number;
  error: HttpCallError;
  willRetry: boolean;
}

/**
 * Per-attempt hooks.
 *
 * `beforeSend` runs in registration order and may mutate `request.headers`.
 * `afterResponse` and `onError` run in reverse registration order and only observe.
 * A hook that throws is logged and skipped; it never fails the call.
 * Interceptors must not implement their own retry loops.
 */
export interface HttpCallInterceptor {
  beforeSend?(ctx: BeforeSendContext): Promise<void> | void;
  afterResponse?(ctx: AfterResponseContext): Promise<void> | void;
  onError?(ctx: OnErrorContext): Promise<void> | void;
}

export interface HttpCallEngineConfig {
  transport?: HttpTransport;
  logger?: Logger;
  interceptors?: HttpCallInterceptor[];
  errorClassifier?: ErrorClassifier;
  /** Bodies strictly larger than this are compressed when the call enables it. Default: 1400. */
  compressionThresholdBytes?: number;
  /** Defaults to gzip. */
  compressor?: (data: Uint8Array) => Uint8Array;
  /** Upper bound for server-suggested retry delays. Default: 60_000. */
  maxRetryAfterMs?: number;
  /** Initial enabled state. Default: true. */
  enabled?: boolean;
}
