import { defaultErrorClassifier, isSuccessStatus, statusToCategory } from './classification';
import { CONTENT_ENCODING_GZIP, DEFAULT_COMPRESSION_THRESHOLD_BYTES, gzipCompressor } from './compression';
import { CancelledError, ClientDisabledError, HttpStatusError, TransportError } from './errors';
import type { HttpCallError } from './errors';
import { HttpCall } from './HttpCall';
import { hasHeader, mergeHeaders, redactHeaders, setHeader } from './headers';
import { errorMessage, noopLogger } from './logger';
import { RetryPolicy } from './retryPolicy';
import { fetchTransport } from './transport/fetchTransport';
import type {
  ClassifiedError,
  ErrorClassifier,
  ErrorClassifierContext,
  HttpCallClient,
  HttpCallCompletionHandler,
  HttpCallEngineConfig,
  HttpCallHandle,
  HttpCallInterceptor,
  HttpCallRequest,
  HttpCallResult,
  HttpTransport,
  Logger,
  RawHttpResponse,
  TransportRequest,
} from './types';

const DEFAULT_MAX_RETRY_AFTER_MS = 60_000;

/**
 * Executes HTTP calls with per-call retry intervals, optional gzip compression and a global
 * enabled switch.
 *
 * Every call's completion handler fires exactly once: with a 2xx response, with the last
 * error once retries are exhausted or the failure is terminal, or with `CancelledError`
 * when the engine is disabled (or the call cancelled) first. Results that arrive after
 * cancellation are discarded.
 *
 * @example
 * ```typescript
 * const engine = new HttpCallEngine({ logger: createConsoleLogger({ level: 'info' }) });
 *
 * engine.sendAsync(
 *   {
 *     url: 'https://ingest.example.com/logs',
 *     method: 'POST',
 *     headers: { 'Content-Type': 'application/json' },
 *     body: new TextEncoder().encode(payload),
 *     retryIntervalsMs: [10_000, 300_000],
 *     compressionEnabled: true,
 *   },
 *   (result) => {
 *     if (!result.ok) console.error(result.error);
 *   },
 * );
 * ```
 */
export class HttpCallEngine implements HttpCallClient {
  private readonly transport: HttpTransport;
  private readonly logger: Logger;
  private readonly interceptors: HttpCallInterceptor[];
  private readonly errorClassifier: ErrorClassifier;
  private readonly compressionThresholdBytes: number;
  private readonly compressor: (data: Uint8Array) => Uint8Array;
  private readonly maxRetryAfterMs: number;
  private readonly calls = new Map<string, HttpCall>();
  private enabled: boolean;

  constructor(config: HttpCallEngineConfig = {}) {
    this.transport = config.transport ?? fetchTransport;
    this.logger = config.logger ?? noopLogger;
    this.interceptors = [...(config.interceptors ?? [])];
    this.errorClassifier = config.errorClassifier ?? defaultErrorClassifier;
    this.compressionThresholdBytes = config.compressionThresholdBytes ?? DEFAULT_COMPRESSION_THRESHOLD_BYTES;
    this.compressor = config.compressor ?? gzipCompressor;
    this.maxRetryAfterMs = config.maxRetryAfterMs ?? DEFAULT_MAX_RETRY_AFTER_MS;
    this.enabled = config.enabled ?? true;
  }

  get isEnabled(): boolean {
    return this.enabled;
  }

  /** Number of calls submitted and not yet completed. */
  get pendingCallCount(): number {
    return this.calls.size;
  }

  sendAsync(request: HttpCallRequest, completionHandler?: HttpCallCompletionHandler): HttpCallHandle {
    this.assertValidUrl(request.url);
    const retryPolicy = RetryPolicy.from(request.retryIntervalsMs);
    const headers = mergeHeaders(request.headers);

    if (!this.enabled) {
      const rejected = new HttpCall(request.url, request.method, headers, request.body, retryPolicy, completionHandler);
      this.logger.warn('http.call.rejected', { ...this.logMeta(rejected), reason: 'disabled' });
      this.finalize(rejected, { ok: false, error: new ClientDisabledError(), attempts: 0 });
      return rejected;
    }

    const body = this.prepareBody(request, headers);
    const call = new HttpCall(request.url, request.method, headers, body, retryPolicy, completionHandler);
    this.calls.set(call.id, call);
    this.dispatch(call);
    return call;
  }

  setEnabled(isEnabled: boolean): void {
    if (this.enabled === isEnabled) {
      return;
    }
    this.enabled = isEnabled;

    if (isEnabled) {
      this.logger.info('http.engine.enabled');
      return;
    }

    const pending = [...this.calls.values()];
    this.logger.info('http.engine.disabled', { cancelledCalls: pending.length });
    for (const call of pending) {
      this.cancelCall(call);
    }
  }

  /**
   * Cancels a single live call. Returns false when the call is unknown or already completed.
   */
  cancel(handle: HttpCallHandle): boolean {
    const call = this.calls.get(handle.id);
    if (!call) {
      return false;
    }
    this.cancelCall(call);
    return true;
  }

  private dispatch(call: HttpCall): void {
    this.runAttempt(call).catch((error: unknown) => {
      this.logger.error('http.call.unexpected_error', { ...this.logMeta(call), error: errorMessage(error) });
      this.finalize(call, {
        ok: false,
        error: new TransportError(`Unexpected failure while sending call: ${errorMessage(error)}`, { cause: error }),
        attempts: call.attempts,
      });
    });
  }

  private async runAttempt(call: HttpCall): Promise<void> {
    if (call.isCancelled || call.isCompleted) {
      return;
    }

    const attempt = call.attempts + 1;
    const request: TransportRequest = {
      method: call.method,
      url: call.url,
      headers: { ...call.headers },
      body: call.body,
    };
    await this.applyBeforeSendInterceptors(call, request, attempt);
    if (call.isCancelled) {
      return;
    }

    const controller = new AbortController();
    call.abortController = controller;
    call.attempts = attempt;
    this.logger.debug('http.call.attempt', {
      ...this.logMeta(call),
      attempt,
      maxAttempts: call.retryPolicy.maxRetries + 1,
      headers: redactHeaders(request.headers),
    });

    let response: RawHttpResponse;
    try {
      response = await this.transport(request, controller.signal);
    } catch (error) {
      if (this.discardIfCancelled(call, attempt)) {
        return;
      }
      const transportError = new TransportError(`Transport failed: ${errorMessage(error)}`, { cause: error });
      await this.handleFailure(call, request, attempt, transportError);
      return;
    } finally {
      if (call.abortController === controller) {
        call.abortController = undefined;
      }
    }

    if (this.discardIfCancelled(call, attempt)) {
      return;
    }
    await this.applyAfterResponseInterceptors(call, request, attempt, response);
    if (call.isCancelled) {
      return;
    }

    if (isSuccessStatus(response.status)) {
      this.logger.info('http.call.succeeded', { ...this.logMeta(call), attempt, status: response.status });
      this.finalize(call, {
        ok: true,
        status: response.status,
        headers: response.headers,
        body: response.body,
        attempts: call.attempts,
      });
      return;
    }

    const statusError = new HttpStatusError(`HTTP ${response.status}`, {
      status: response.status,
      headers: response.headers,
      body: response.body,
      category: statusToCategory(response.status),
    });
    await this.handleFailure(call, request, attempt, statusError, response);
  }

  private async handleFailure(
    call: HttpCall,
    request: TransportRequest,
    attempt: number,
    error: HttpCallError,
    response?: RawHttpResponse,
  ): Promise<void> {
    const classified = this.classify(call, attempt, error, response);
    const delay = classified.retryable ? this.getRetryDelay(call, classified) : undefined;
    await this.runErrorInterceptors(call, request, attempt, error, delay !== undefined);
    if (call.isCancelled) {
      return;
    }

    const failureMeta = {
      ...this.logMeta(call),
      attempt,
      status: classified.statusCode,
      errorCategory: classified.category,
      error: error.message,
    };

    if (delay === undefined) {
      this.logger.error('http.call.failed', failureMeta);
      this.finalize(call, { ok: false, error, attempts: call.attempts });
      return;
    }

    call.retryCount += 1;
    this.logger.warn('http.call.retry', { ...failureMeta, retryCount: call.retryCount, delayMs: delay });
    call.retryTimer = setTimeout(() => {
      call.retryTimer = undefined;
      this.dispatch(call);
    }, delay);
  }

  private getRetryDelay(call: HttpCall, classified: ClassifiedError): number | undefined {
    const delay = call.retryPolicy.nextDelay(call.retryCount);
    if (delay === undefined) {
      return undefined;
    }
    if (classified.retryAfterMs !== undefined) {
      return Math.min(classified.retryAfterMs, this.maxRetryAfterMs);
    }
    return delay;
  }

  private classify(
    call: HttpCall,
    attempt: number,
    error: HttpCallError,
    response?: RawHttpResponse,
  ): ClassifiedError {
    const ctx: ErrorClassifierContext = { method: call.method, url: call.url, attempt, error, response };
    try {
      return this.errorClassifier.classify(ctx);
    } catch (classifierError) {
      this.logger.warn('http.classifier.error', { ...this.logMeta(call), error: errorMessage(classifierError) });
      return defaultErrorClassifier.classify(ctx);
    }
  }

  private cancelCall(call: HttpCall): void {
    call.cancel();
    this.logger.info('http.call.cancelled', { ...this.logMeta(call), attempts: call.attempts });
    this.finalize(call, { ok: false, error: new CancelledError(), attempts: call.attempts });
  }

  private discardIfCancelled(call: HttpCall, attempt: number): boolean {
    if (!call.isCancelled) {
      return false;
    }
    this.logger.debug('http.call.discarded', { ...this.logMeta(call), attempt });
    return true;
  }

  private finalize(call: HttpCall, result: HttpCallResult): void {
    this.calls.delete(call.id);
    if (!call.settle(result) || !call.completionHandler) {
      return;
    }
    try {
      call.completionHandler(result);
    } catch (error) {
      this.logger.error('http.call.completion_handler.failed', { ...this.logMeta(call), error: errorMessage(error) });
    }
  }

  private prepareBody(request: HttpCallRequest, headers: Record<string, string>): Uint8Array | undefined {
    const { body } = request;
    if (!body || !request.compressionEnabled || body.byteLength <= this.compressionThresholdBytes) {
      return body;
    }
    // Caller already encoded the body.
    if (hasHeader(headers, 'Content-Encoding')) {
      return body;
    }
    try {
      const compressed = this.compressor(body);
      setHeader(headers, 'Content-Encoding', CONTENT_ENCODING_GZIP);
      return compressed;
    } catch (error) {
      this.logger.warn('http.call.compression.failed', {
        method: request.method,
        url: request.url,
        bytes: body.byteLength,
        error: errorMessage(error),
      });
      return body;
    }
  }

  private async applyBeforeSendInterceptors(
    call: HttpCall,
    request: TransportRequest,
    attempt: number,
  ): Promise<void> {
    for (const interceptor of this.interceptors) {
      if (!interceptor.beforeSend) continue;
      try {
        await interceptor.beforeSend({ call, request, attempt });
      } catch (error) {
        this.logger.warn('http.interceptor.beforeSend.failed', { ...this.logMeta(call), error: errorMessage(error) });
      }
    }
  }

  private async applyAfterResponseInterceptors(
    call: HttpCall,
    request: TransportRequest,
    attempt: number,
    response: RawHttpResponse,
  ): Promise<void> {
    for (const interceptor of [...this.interceptors].reverse()) {
      if (!interceptor.afterResponse) continue;
      try {
        await interceptor.afterResponse({ call, request, attempt, response });
      } catch (error) {
        this.logger.warn('http.interceptor.afterResponse.failed', {
          ...this.logMeta(call),
          error: errorMessage(error),
        });
      }
    }
  }

  private async runErrorInterceptors(
    call: HttpCall,
    request: TransportRequest,
    attempt: number,
    error: HttpCallError,
    willRetry: boolean,
  ): Promise<void> {
    for (const interceptor of [...this.interceptors].reverse()) {
      if (!interceptor.onError) continue;
      try {
        await interceptor.onError({ call, request, attempt, error, willRetry });
      } catch (hookError) {
        this.logger.warn('http.interceptor.onError.failed', { ...this.logMeta(call), error: errorMessage(hookError) });
      }
    }
  }

  private assertValidUrl(url: string): void {
    let parsed: URL;
    try {
      parsed = new URL(url);
    } catch {
      throw new TypeError(`Invalid call URL: "${url}"`);
    }
    if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
      throw new TypeError(`Unsupported call URL protocol: ${parsed.protocol}`);
    }
  }

  private logMeta(call: HttpCall) {
    return {
      callId: call.id,
      method: call.method,
      url: call.url,
    };
  }
}
