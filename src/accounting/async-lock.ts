// =============================================================================
// AsyncLock — Promise-chained mutual exclusion
// =============================================================================

/**
 * Serializes async critical sections. Each caller waits for the previous
 * holder's promise before running; a failing section still releases the lock.
 */
export class AsyncLock {
  private tail: Promise<void> = Promise.resolve();

  async runExclusive<T>(section: () => Promise<T> | T): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => {};
    this.tail = new Promise<void>((resolve) => {
      release = resolve;
    });
    await previous;

    try {
      return await section();
    } finally {
      release();
    }
  }
}
