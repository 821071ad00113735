import { sleep } from './timing';

/** Marks the end of the request a slot was taken for. */
export type ReleaseSlot = () => void;

export interface RateLimiter {
  acquire(): Promise<ReleaseSlot>;
}

/**
 * Keeps at least `intervalMs` between requests. Slots are reserved before
 * waiting, so concurrent callers queue up instead of racing, and releasing a
 * slot pushes the next one to `intervalMs` after the request finished.
 */
export class FixedIntervalRateLimiter implements RateLimiter {
  private readonly intervalMs: number;
  private nextSlotAt: number | undefined;

  constructor(intervalMs: number) {
    this.intervalMs = Math.max(0, intervalMs);
  }

  async acquire(): Promise<ReleaseSlot> {
    const now = Date.now();
    const slot = this.nextSlotAt === undefined ? now : Math.max(now, this.nextSlotAt);
    this.nextSlotAt = slot + this.intervalMs;

    const waitMs = slot - now;
    if (waitMs > 0) {
      await sleep(waitMs);
    }

    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.nextSlotAt = Math.max(this.nextSlotAt ?? 0, Date.now() + this.intervalMs);
    };
  }
}

const releaseNothing: ReleaseSlot = () => undefined;

export const noopRateLimiter: RateLimiter = {
  acquire: async () => releaseNothing,
};

export function createRateLimiter(intervalMs: number): RateLimiter {
  return intervalMs > 0 ? new FixedIntervalRateLimiter(intervalMs) : noopRateLimiter;
}

/** Runs `task` inside one slot of `limiter`, releasing it whether `task` succeeds or not. */
export async function withSlot<T>(limiter: RateLimiter, task: () => Promise<T>): Promise<T> {
  const release = await limiter.acquire();
  try {
    return await task();
  } finally {
    release();
  }
}
