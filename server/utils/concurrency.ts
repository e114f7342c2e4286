/**
 * Counting semaphore. Waiters are served FIFO; `run` releases the permit
 * whether the task resolves or throws.
 */
export class Semaphore {
  private readonly waiters: Array<() => void> = [];
  private available: number;

  constructor(capacity: number) {
    this.available = Math.max(1, Math.floor(capacity));
  }

  get pending(): number {
    return this.waiters.length;
  }

  async acquire(): Promise<() => void> {
    if (this.available > 0) {
      this.available -= 1;
      return this.releaser();
    }

    return await new Promise<() => void>((resolve) => {
      this.waiters.push(() => {
        this.available -= 1;
        resolve(this.releaser());
      });
    });
  }

  async run<T>(task: () => Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await task();
    } finally {
      release();
    }
  }

  private releaser(): () => void {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.release();
    };
  }

  private release() {
    this.available += 1;
    const next = this.waiters.shift();
    if (next) {
      next();
    }
  }
}

/**
 * Runs `worker` over every item with at most `limit` in flight and keeps
 * only the non-null results, in completion order.
 */
export const mapBounded = async <T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R | null>,
): Promise<R[]> => {
  const semaphore = new Semaphore(limit);
  const results: R[] = [];
  await Promise.all(
    items.map((item, index) =>
      semaphore.run(async () => {
        const value = await worker(item, index);
        if (value !== null) {
          results.push(value);
        }
      }),
    ),
  );
  return results;
};
