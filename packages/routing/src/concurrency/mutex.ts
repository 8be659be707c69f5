/**
 * Promise-chain mutex.
 *
 * Callers queue in FIFO order; each critical section starts only after the
 * previous one has settled, whether it resolved or threw.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();

  async runExclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    let release: () => void = () => {};
    const done = new Promise<void>((resolve) => {
      release = resolve;
    });
    const previous = this.tail;
    this.tail = previous.then(() => done);

    await previous;
    try {
      return await fn();
    } finally {
      release();
    }
  }
}
