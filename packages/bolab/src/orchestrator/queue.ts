class AsyncLock {
  private queue: Array<() => void> = [];
  private locked = false;

  async acquire(): Promise<() => void> {
    return new Promise((resolve) => {
      const attempt = () => {
        if (!this.locked) {
          this.locked = true;
          resolve(() => this.release());
        } else {
          this.queue.push(attempt);
        }
      };
      attempt();
    });
  }

  get waiting(): number {
    return this.queue.length;
  }

  get busy(): boolean {
    return this.locked;
  }

  private release(): void {
    this.locked = false;
    const next = this.queue.shift();
    if (next) {
      next();
    }
  }
}

/**
 * Runs jobs one at a time in submission order. A failing job does not
 * stop the ones queued behind it.
 */
export class SerialQueue {
  private readonly lock = new AsyncLock();

  async run<T>(job: () => Promise<T> | T): Promise<T> {
    const release = await this.lock.acquire();
    try {
      return await job();
    } finally {
      release();
    }
  }

  /** Jobs running or waiting. */
  get size(): number {
    return this.lock.waiting + (this.lock.busy ? 1 : 0);
  }
}
