/** Default delays for backend calls: three retries, doubling from one second. */
export const DEFAULT_RETRY_INTERVALS_MS: readonly number[] = Object.freeze([1_000, 2_000, 4_000]);

/**
 * Ordered retry delays. Retry `i` (0-indexed) waits `intervalsMs[i]`; once the list is
 * exhausted no further attempt is made.
 */
export class RetryPolicy {
  static readonly none = new RetryPolicy([]);

  readonly intervalsMs: readonly number[];

  constructor(intervalsMs: readonly number[]) {
    for (const interval of intervalsMs) {
      if (!Number.isFinite(interval) || interval < 0) {
        throw new RangeError(`Retry interval must be a finite, non-negative number of milliseconds, got ${interval}`);
      }
    }
    this.intervalsMs = Object.freeze([...intervalsMs]);
  }

  static from(intervalsMs?: readonly number[]): RetryPolicy {
    return intervalsMs && intervalsMs.length > 0 ? new RetryPolicy(intervalsMs) : RetryPolicy.none;
  }

  get maxRetries(): number {
    return this.intervalsMs.length;
  }

  canRetry(retryCount: number): boolean {
    return retryCount < this.intervalsMs.length;
  }

  /**
   * Delay before retry number `retryCount`, or undefined when no retry remains.
   */
  nextDelay(retryCount: number): number | undefined {
    return this.canRetry(retryCount) ? this.intervalsMs[retryCount] : undefined;
  }
}
