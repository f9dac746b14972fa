import type { Clock } from '@/core/clock.js';
import { systemClock } from '@/core/clock.js';

/** Measures how long a piece of work took, in whole milliseconds. */
export interface TaskTimer {
  /** Zero until `time()` settles. */
  readonly executionTimeMs: number;
  /**
   * Await `fn` and record its duration whether it resolves or rejects.
   * Returns `fn`'s value or rethrows its error unchanged.
   */
  time<T>(fn: () => Promise<T>): Promise<T>;
}

export function createTaskTimer(clock: Clock = systemClock): TaskTimer {
  let executionTimeMs = 0;

  return {
    get executionTimeMs(): number {
      return executionTimeMs;
    },

    async time<T>(fn: () => Promise<T>): Promise<T> {
      const startedAt = clock.now();
      try {
        return await fn();
      } finally {
        executionTimeMs = Math.max(0, Math.round(clock.now() - startedAt));
      }
    },
  };
}
