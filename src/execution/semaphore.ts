/** Counting semaphore with FIFO hand-off. */
export class Semaphore {
  private available: number;
  private readonly waiters: Array<() => void> = [];
  private activeCount = 0;
  private peak = 0;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`Semaphore capacity must be a positive integer, got ${capacity}.`);
    }
    this.available = capacity;
  }

  get active(): number {
    return this.activeCount;
  }

  /** Highest number of simultaneous holders observed. */
  get peakActive(): number {
    return this.peak;
  }

  async acquire(): Promise<void> {
    if (this.available > 0) {
      this.available -= 1;
      this.markActive();
      return;
    }

    await new Promise<void>((resolve) => {
      this.waiters.push(resolve);
    });
    this.markActive();
  }

  release(): void {
    this.activeCount -= 1;
    const next = this.waiters.shift();
    if (next) {
      // The permit passes straight to the next waiter.
      next();
      return;
    }
    this.available += 1;
  }

  async use<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }

  private markActive(): void {
    this.activeCount += 1;
    this.peak = Math.max(this.peak, this.activeCount);
  }
}
