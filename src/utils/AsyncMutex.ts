/**
 * FIFO async mutex. Callers run one at a time in the order they asked.
 */
export class AsyncMutex {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  async runExclusive<T>(task: () => Promise<T>): Promise<T> {
    let release: () => void = () => undefined;
    const next = new Promise<void>((resolve) => {
      release = resolve;
    });
    const previous = this.tail;
    this.tail = next;
    this.pending++;

    await previous;
    try {
      return await task();
    } finally {
      this.pending--;
      release();
    }
  }

  /** Number of holders plus waiters */
  get size(): number {
    return this.pending;
  }

  isLocked(): boolean {
    return this.pending > 0;
  }
}
