/**
 * Promise-chain mutex. Callers queue in FIFO order; each critical section
 * starts only after the previous one has settled.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();
  private waiting = 0;

  async runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.tail = previous.then(() => current);
    this.waiting++;

    await previous;
    try {
      return await fn();
    } finally {
      this.waiting--;
      release();
    }
  }

  get isLocked(): boolean {
    return this.waiting > 0;
  }
}
