import { randomUUID } from 'node:crypto';
import { RetryPolicy } from './retryPolicy';
import type {
  HttpCallCompletionHandler,
  HttpCallHandle,
  HttpCallResult,
  HttpHeaders,
  HttpMethod,
} from './types';

/**
 * State of one logical call: what to send, how many times it has been tried, and whether
 * it may still complete. Owned and mutated by HttpCallEngine only.
 */
export class HttpCall implements HttpCallHandle {
  readonly id: string = randomUUID();
  readonly result: Promise<HttpCallResult>;

  retryCount = 0;
  attempts = 0;
  isCancelled = false;

  retryTimer?: ReturnType<typeof setTimeout>;
  abortController?: AbortController;

  private completed = false;
  private readonly resolveResult: (result: HttpCallResult) => void;

  constructor(
    readonly url: string,
    readonly method: HttpMethod,
    readonly headers: HttpHeaders,
    readonly body: Uint8Array | undefined,
    readonly retryPolicy: RetryPolicy,
    readonly completionHandler?: HttpCallCompletionHandler,
  ) {
    let resolveResult: (result: HttpCallResult) => void = () => undefined;
    this.result = new Promise<HttpCallResult>((resolve) => {
      resolveResult = resolve;
    });
    this.resolveResult = resolveResult;
  }

  get isCompleted(): boolean {
    return this.completed;
  }

  /**
   * Flags the call as cancelled, drops a pending retry timer and aborts the in-flight attempt.
   */
  cancel(): void {
    this.isCancelled = true;
    this.clearRetryTimer();
    this.abortController?.abort();
    this.abortController = undefined;
  }

  /**
   * Settles `result`. Returns false if the call had already completed; the caller must then
   * not invoke the completion handler.
   */
  settle(result: HttpCallResult): boolean {
    if (this.completed) {
      return false;
    }
    this.completed = true;
    this.clearRetryTimer();
    this.resolveResult(result);
    return true;
  }

  private clearRetryTimer(): void {
    if (this.retryTimer !== undefined) {
      clearTimeout(this.retryTimer);
      this.retryTimer = undefined;
    }
  }
}
