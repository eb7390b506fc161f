/**
 * Promise-chain lock. Callers of `runExclusive` take turns in FIFO order;
 * a rejected task releases the lock like a resolved one.
 */
export class Mutex {
  private pending: Promise<void> = Promise.resolve();
  private waiting = 0;

  get isLocked(): boolean {
    return this.waiting > 0;
  }

  async runExclusive<T>(task: () => Promise<T>): Promise<T> {
    // Chain onto the pending promise so callers are serialized
    const previous = this.pending;
    let release: () => void = () => undefined;
    this.pending = new Promise<void>((r) => {
      release = r;
    });
    this.waiting += 1;

    try {
      await previous;
      return await task();
    } finally {
      this.waiting -= 1;
      release();
    }
  }
}
