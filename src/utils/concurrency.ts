export class Semaphore {
  private readonly waiters: Array<() => void> = [];
  private available: number;

  constructor(capacity: number) {
    this.available = Math.max(1, Math.floor(capacity));
  }

  async acquire(): Promise<() => void> {
    if (this.available > 0) {
      this.available -= 1;
      return () => this.release();
    }

    return await new Promise<() => void>((resolve) => {
      this.waiters.push(() => {
        this.available -= 1;
        resolve(() => this.release());
      });
    });
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
 * Maps `items` with at most `limit` calls in flight. Results keep the input order
 * whatever order the calls complete in.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const semaphore = new Semaphore(limit);
  const results = new Array<R>(items.length);

  await Promise.all(
    items.map(async (item, index) => {
      const release = await semaphore.acquire();
      try {
        results[index] = await fn(item, index);
      } finally {
        release();
      }
    }),
  );

  return results;
}
