/**
 * Cancellable timers for bounding browser operations
 *
 * Built on the global setTimeout/Date so tests can drive them with fake timers.
 */

/**
 * A wall-clock budget that starts on construction.
 *
 * Once expired, every pending and future `race()` rejects with the error
 * produced by `onExpire`, and `signal` is aborted.
 */
export class Deadline {
  readonly expiresAt: number;
  private readonly controller = new AbortController();
  private readonly timer: ReturnType<typeof setTimeout>;
  private reason: Error | null = null;

  constructor(
    readonly timeoutMs: number,
    private readonly onExpire: () => Error
  ) {
    this.expiresAt = Date.now() + timeoutMs;
    this.timer = setTimeout(() => this.expire(), timeoutMs);
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get expired(): boolean {
    return this.reason !== null;
  }

  remainingMs(): number {
    return Math.max(0, this.expiresAt - Date.now());
  }

  /**
   * Settle with `operation`, or reject as soon as the deadline expires.
   * A late rejection of `operation` is absorbed here.
   */
  race<T>(operation: Promise<T>): Promise<T> {
    const signal = this.controller.signal;

    return new Promise<T>((resolve, reject) => {
      const onAbort = () => reject(this.reason ?? this.onExpire());

      if (this.reason) {
        onAbort();
      } else {
        signal.addEventListener('abort', onAbort, { once: true });
      }

      operation.then(
        (value) => {
          signal.removeEventListener('abort', onAbort);
          resolve(value);
        },
        (error: unknown) => {
          signal.removeEventListener('abort', onAbort);
          reject(error);
        }
      );
    });
  }

  /**
   * Stop the timer without expiring
   */
  dispose(): void {
    clearTimeout(this.timer);
  }

  private expire(): void {
    this.reason = this.onExpire();
    this.controller.abort(this.reason);
  }
}

/**
 * Wait `ms` milliseconds; resolves early (and clears its timer) when `signal` aborts
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }

    const onAbort = () => {
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
