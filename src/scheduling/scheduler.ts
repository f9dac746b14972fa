/**
 * Scheduler — single in-process loop over the task registry.
 *
 * Every tick walks the tasks in registration order and attempts each one.
 * An attempt records `lastRunAt` whenever it gets past the due check, whether
 * the condition said no, the condition threw, the work failed, or the work
 * succeeded. A task therefore never starts again before its interval has
 * elapsed, and a failing task is retried no sooner than its next interval.
 *
 * Attempts are awaited one after another, so a slow task delays the rest of
 * its tick. Nothing here enforces a per-task timeout.
 */
import type { Clock } from '@/core/clock.js';
import { systemClock } from '@/core/clock.js';
import { settle } from '@/core/result.js';
import type { Logger } from '@/observability/logger.js';
import type { TaskRegistry } from './task-registry.js';
import type { ScheduledTaskState, TaskAttemptOutcome } from './types.js';

// ─── Types ──────────────────────────────────────────────────────

export interface SchedulerOptions {
  registry: TaskRegistry;
  logger: Logger;
  clock?: Clock;
  /** Pause between ticks in milliseconds. Defaults to 10_000. */
  tickIntervalMs?: number;
}

export interface Scheduler {
  /**
   * Seal the registry and start the tick loop. Resolves once the loop is running;
   * called while a stop is pending, it waits for that stop first.
   */
  start(): Promise<void>;
  /** Let the in-flight tick finish, then exit the loop. Never cancels a running task. */
  stop(): Promise<void>;
  isRunning(): boolean;
  /** Attempt every registered task once, in order. */
  tick(): Promise<TaskAttemptOutcome[]>;
  /** Walk one task through due check, condition and run. Never throws. */
  attempt(task: ScheduledTaskState): Promise<TaskAttemptOutcome>;
}

// ─── Factory ────────────────────────────────────────────────────

/** Create the unified scheduler. */
export function createScheduler(options: SchedulerOptions): Scheduler {
  const {
    registry,
    logger,
    clock = systemClock,
    tickIntervalMs = 10_000,
  } = options;

  let running = false;
  let loop: Promise<void> | null = null;
  let stopping: Promise<void> | null = null;
  let pending: { timer: ReturnType<typeof setTimeout>; wake: () => void } | null = null;

  /** Sleep between ticks; `stop()` wakes it early. */
  function pause(ms: number): Promise<void> {
    return new Promise((resolve) => {
      const wake = (): void => {
        pending = null;
        resolve();
      };
      pending = { timer: setTimeout(wake, ms), wake };
    });
  }

  function isDue(task: ScheduledTaskState, now: number): boolean {
    if (task.lastRunAt === undefined) return true;
    return now - task.lastRunAt >= task.definition.intervalSeconds * 1000;
  }

  async function attempt(task: ScheduledTaskState): Promise<TaskAttemptOutcome> {
    const { name, condition, run, owner } = task.definition;
    const now = clock.now();

    if (!task.enabled) {
      return { status: 'skipped', task: name, reason: 'disabled' };
    }
    if (!isDue(task, now)) {
      return { status: 'skipped', task: name, reason: 'not_due' };
    }

    if (condition) {
      const checked = await settle(condition);
      if (!checked.ok) {
        task.lastRunAt = now;
        logger.error('Scheduled task condition check failed', {
          component: 'scheduler',
          task: name,
          owner,
          error: checked.error.message,
        });
        return { status: 'skipped', task: name, reason: 'condition_error', error: checked.error };
      }
      if (!checked.value) {
        task.lastRunAt = now;
        return { status: 'skipped', task: name, reason: 'condition_false' };
      }
    }

    const startedAt = clock.now();
    const result = await settle(run);
    const durationMs = clock.now() - startedAt;
    task.lastRunAt = now;

    if (!result.ok) {
      logger.error('Scheduled task failed', {
        component: 'scheduler',
        task: name,
        owner,
        durationMs,
        error: result.error.message,
      });
      return { status: 'failed', task: name, error: result.error, durationMs };
    }

    logger.debug('Scheduled task completed', {
      component: 'scheduler',
      task: name,
      owner,
      durationMs,
    });
    return { status: 'completed', task: name, durationMs };
  }

  async function tick(): Promise<TaskAttemptOutcome[]> {
    const outcomes: TaskAttemptOutcome[] = [];
    for (const task of registry.list()) {
      outcomes.push(await attempt(task));
    }
    return outcomes;
  }

  async function runLoop(): Promise<void> {
    while (running) {
      await tick();
      if (!running) break;
      await pause(tickIntervalMs);
    }
  }

  return {
    async start(): Promise<void> {
      // A restart during shutdown waits for the old loop to exit first.
      if (stopping) await stopping;
      if (running) return;

      registry.seal();
      running = true;
      loop = runLoop().catch((error: unknown) => {
        running = false;
        logger.fatal('Scheduler loop crashed', {
          component: 'scheduler',
          error: error instanceof Error ? error.message : String(error),
        });
      });

      logger.info('Scheduler started', {
        component: 'scheduler',
        tasks: registry.list().length,
        tickIntervalMs,
      });
    },

    stop(): Promise<void> {
      if (stopping) return stopping;
      const current = loop;
      if (!current) return Promise.resolve();

      running = false;
      if (pending) {
        clearTimeout(pending.timer);
        pending.wake();
      }
      stopping = current.then(() => {
        if (loop === current) loop = null;
        stopping = null;
        logger.info('Scheduler stopped', { component: 'scheduler' });
      });
      return stopping;
    },

    isRunning(): boolean {
      return running;
    },

    tick,
    attempt,
  };
}
