/**
 * Reconnect Backoff Utilities
 *
 * Exponential reconnect delays and an abortable sleep.
 */

export interface BackoffOptions {
  initialMs: number;
  maxMs: number;
  factor?: number;
}

/**
 * Exponential delay sequence: initial, initial × factor, ... capped at maxMs
 */
export class ExponentialBackoff {
  private attempts = 0;
  private readonly factor: number;

  constructor(private readonly options: BackoffOptions) {
    this.factor = options.factor ?? 2;
  }

  /**
   * Number of delays handed out since the last reset
   */
  get attempt(): number {
    return this.attempts;
  }

  /**
   * Delay before the next reconnect attempt
   */
  next(): number {
    this.attempts++;
    const delay = this.options.initialMs * Math.pow(this.factor, this.attempts - 1);
    return Math.min(delay, this.options.maxMs);
  }

  reset(): void {
    this.attempts = 0;
  }
}

/**
 * Sleep function signature; resolves early when the signal aborts
 */
export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

/**
 * Wait for `ms`, or until `signal` aborts, whichever comes first.
 * Never rejects: callers check `signal.aborted` afterwards.
 */
export const sleep: Sleep = (ms, signal) =>
  new Promise<void>((resolve) => {
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
