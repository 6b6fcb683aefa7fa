/**
 * Exponential backoff with an elapsed-time ceiling.
 *
 * One instance tracks one retry sequence. The sequence starts when the
 * policy is created and restarts on `reset()`; the stream listener resets
 * it every time a connection is established, so a stream that ran for an
 * hour and then dropped starts again from the base delay.
 *
 * Once `maxElapsedMs` has passed since the sequence started the policy
 * gives up (`nextDelay()` returns null). The last wait is truncated so
 * the sequence never sleeps past the ceiling.
 */

export interface BackoffOptions {
  baseDelayMs: number;
  maxDelayMs: number;
  maxElapsedMs: number;
  /** Full jitter: each wait is uniformly drawn from [0, delay). */
  jitter: boolean;
}

export const DEFAULT_BACKOFF: BackoffOptions = {
  baseDelayMs: 1_000,
  maxDelayMs: 60_000,
  maxElapsedMs: 300_000,
  jitter: true,
};

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface BackoffDeps {
  now?: () => number;
  random?: () => number;
}

/**
 * Resolves after `ms`, or early when `signal` aborts.
 * Aborting resolves rather than rejects; callers check `signal.aborted`.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export class BackoffPolicy {
  private readonly options: BackoffOptions;
  private readonly now: () => number;
  private readonly random: () => number;

  private attempt = 0;
  private startedAt: number;

  constructor(options: Partial<BackoffOptions> = {}, deps: BackoffDeps = {}) {
    this.options = { ...DEFAULT_BACKOFF, ...options };
    this.now = deps.now ?? Date.now;
    this.random = deps.random ?? Math.random;
    this.startedAt = this.now();
  }

  /** Number of waits taken since the sequence (re)started. */
  get attempts(): number {
    return this.attempt;
  }

  /** Milliseconds since the sequence (re)started. */
  elapsed(): number {
    return this.now() - this.startedAt;
  }

  reset(): void {
    this.attempt = 0;
    this.startedAt = this.now();
  }

  /** Next wait in ms, or null when the elapsed-time budget is spent. */
  nextDelay(): number | null {
    const elapsed = this.elapsed();
    if (elapsed >= this.options.maxElapsedMs) {
      return null;
    }

    const exponential = this.options.baseDelayMs * 2 ** this.attempt;
    let delay = Math.min(this.options.maxDelayMs, exponential);
    if (this.options.jitter) {
      delay = Math.floor(delay * this.random());
    }
    this.attempt++;

    return Math.min(delay, this.options.maxElapsedMs - elapsed);
  }
}
