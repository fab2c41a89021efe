/**
 * FIFO with "unfinished" accounting: every `enqueue` must be matched by one
 * `ack`, and `join()` resolves once all of them have been.
 */
export class WorkQueue<T> {
  private items: T[] = [];
  private pending = 0;
  private waiters: Array<() => void> = [];

  enqueue(item: T): void {
    this.items.push(item);
    this.pending++;
  }

  dequeue(): T | undefined {
    return this.items.shift();
  }

  ack(): void {
    if (this.pending <= 0) {
      throw new Error("ack() called more times than items were enqueued");
    }
    this.pending--;
    if (this.pending === 0) {
      const waiters = this.waiters;
      this.waiters = [];
      for (const w of waiters) w();
    }
  }

  join(): Promise<void> {
    if (this.pending === 0) return Promise.resolve();
    return new Promise((resolve) => this.waiters.push(resolve));
  }

  /** Items waiting to be dequeued. */
  get size() {
    return this.items.length;
  }

  /** Items enqueued but not yet acknowledged. */
  get unfinished() {
    return this.pending;
  }
}

/** Start `size` workers and resolve once every one of them has returned. */
export async function runPool(size: number, worker: (workerId: number) => Promise<void>): Promise<void> {
  const n = Math.max(1, Math.floor(size));
  await Promise.all(Array.from({ length: n }, (_, i) => worker(i)));
}
