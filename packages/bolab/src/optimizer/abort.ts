/**
 * Settle with `promise`, or reject with `onAbort()` as soon as `signal` fires,
 * whichever comes first. The losing promise is still observed so a late
 * rejection is not reported as unhandled.
 */
export function raceAbort<T>(promise: Promise<T>, signal: AbortSignal, onAbort: () => Error): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const abort = () => reject(onAbort());
    if (signal.aborted) {
      abort();
    } else {
      signal.addEventListener('abort', abort, { once: true });
    }
    void promise.then(
      value => {
        signal.removeEventListener('abort', abort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener('abort', abort);
        reject(err);
      },
    );
  });
}

export type AbortCause = 'timeout' | 'cancelled';

/**
 * An abort signal that fires on a timer or when the parent signal fires.
 * `cause` tells the two apart afterwards.
 */
export class Deadline {
  private readonly controller = new AbortController();
  private readonly timer: NodeJS.Timeout;
  private readonly onParentAbort = () => this.abort('cancelled');
  private _cause: AbortCause | null = null;

  constructor(timeoutMs: number, private readonly parent?: AbortSignal) {
    this.timer = setTimeout(() => this.abort('timeout'), timeoutMs);
    if (parent?.aborted) {
      this.abort('cancelled');
    } else {
      parent?.addEventListener('abort', this.onParentAbort, { once: true });
    }
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get cause(): AbortCause | null {
    return this._cause;
  }

  private abort(cause: AbortCause): void {
    if (this._cause) return;
    this._cause = cause;
    clearTimeout(this.timer);
    this.controller.abort(cause);
  }

  dispose(): void {
    clearTimeout(this.timer);
    this.parent?.removeEventListener('abort', this.onParentAbort);
  }
}
