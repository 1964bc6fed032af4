/**
 * Promise-based counting semaphore. Waiters are woken in FIFO order and a
 * released permit is handed directly to the next waiter, so a late arrival
 * can never jump the queue.
 */
export class Semaphore {
  private available: number;
  private active = 0;
  private readonly waiters: Array<() => void> = [];

  constructor(readonly permits: number) {
    if (!Number.isInteger(permits) || permits < 1) {
      throw new RangeError(`Semaphore permits must be a positive integer, got ${permits}`);
    }
    this.available = permits;
  }

  get inFlight(): number {
    return this.active;
  }

  get waiting(): number {
    return this.waiters.length;
  }

  async acquire(): Promise<void> {
    if (this.available > 0) {
      this.available--;
      this.active++;
      return;
    }
    // release() hands its permit over without touching `active`
    await new Promise<void>((resolve) => {
      this.waiters.push(resolve);
    });
  }

  release(): void {
    if (this.active === 0) {
      throw new Error("Semaphore released more times than acquired");
    }
    const next = this.waiters.shift();
    if (next) {
      next();
      return;
    }
    this.active--;
    this.available++;
  }

  async run<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }
}

/**
 * Simple async lock for serializing read-modify-write sections.
 */
export class AsyncLock {
  private readonly semaphore = new Semaphore(1);

  get locked(): boolean {
    return this.semaphore.inFlight > 0;
  }

  runExclusive<T>(task: () => T | Promise<T>): Promise<T> {
    return this.semaphore.run(async () => task());
  }
}
