/**
 * Async mutex for a critical section inside one process.
 * Waiters are served in arrival order.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();
  private held = false;

  /**
   * Wait for the lock.
   * @returns release function; calling it more than once is a no-op
   */
  async acquire(): Promise<() => void> {
    let releaseLock: () => void = () => undefined;
    const next = new Promise<void>((resolve) => {
      releaseLock = resolve;
    });
    const previous = this.tail;
    this.tail = previous.then(() => next);

    await previous;
    this.held = true;

    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.held = false;
      releaseLock();
    };
  }

  /** Run `fn` while holding the lock; released on every exit path. */
  async withLock<T>(fn: () => Promise<T> | T): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  isLocked(): boolean {
    return this.held;
  }
}
