import { describeError } from './retry';

export type CheckpointOptions<T> = {
  /** Save after every `every` finished items; 0 turns checkpoints off. */
  every: number;
  /** Persists the items finished so far and returns where they went. */
  save: (items: readonly T[], checkpointNumber: number) => Promise<string>;
};

/**
 * Periodic snapshots of a running batch, so a run cut short by the job timeout
 * still leaves its finished items behind. A failed save is logged and the
 * batch carries on.
 */
export class CheckpointWriter<T> {
  private readonly every: number;
  private readonly save: CheckpointOptions<T>['save'];

  constructor(options: CheckpointOptions<T>) {
    this.every = Math.max(0, Math.floor(options.every));
    this.save = options.save;
  }

  async record(finished: readonly T[]): Promise<void> {
    if (this.every === 0 || finished.length === 0 || finished.length % this.every !== 0) {
      return;
    }

    const checkpointNumber = finished.length / this.every;
    try {
      const location = await this.save(finished, checkpointNumber);
      console.log('[checkpoint] Saved', { checkpointNumber, items: finished.length, location });
    } catch (err) {
      console.warn('[checkpoint] Save failed; continuing batch', {
        checkpointNumber,
        items: finished.length,
        error: describeError(err),
      });
    }
  }
}
