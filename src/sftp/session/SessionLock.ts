/**
 * Exclusive lock serializing session state transitions of one client.
 *
 * Promise-chain mutex: callers queue behind the current holder in FIFO order.
 */
export class SessionLock {
  private tail: Promise<void> = Promise.resolve();

  /**
   * Run `task` once every earlier task has settled. The lock is released
   * whether `task` resolves or rejects.
   */
  async runExclusive<T>(task: () => Promise<T>): Promise<T> {
    const previous = this.tail;
    let release = (): void => {};
    this.tail = new Promise<void>((resolve) => {
      release = resolve;
    });
    try {
      await previous;
      return await task();
    } finally {
      release();
    }
  }
}
