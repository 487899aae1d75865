/**
 * FIFO mutual exclusion for async critical sections
 */
export class ExclusiveLock {
  private tail: Promise<void> = Promise.resolve();
  private holders = 0;

  get isLocked(): boolean {
    return this.holders > 0;
  }

  /**
   * Run fn once every earlier caller has finished. The lock is released
   * whether fn resolves or rejects.
   */
  async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    let release: () => void = () => {};
    const done = new Promise<void>((resolve) => {
      release = resolve;
    });
    const previous = this.tail;
    this.tail = previous.then(() => done);

    await previous;
    this.holders++;
    try {
      return await fn();
    } finally {
      this.holders--;
      release();
    }
  }
}
