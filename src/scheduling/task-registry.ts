/**
 * TaskRegistry — append-only list of scheduled tasks, in registration order.
 *
 * The scheduler seals the registry when it starts; from then on the task set
 * is fixed and only the `enabled` flag may change.
 */
import { SchedulerStateError, ValidationError } from '@/core/errors.js';
import type {
  ScheduledTaskDefinition,
  ScheduledTaskSnapshot,
  ScheduledTaskState,
} from './types.js';

// ─── Types ──────────────────────────────────────────────────────

export interface TaskRegistry {
  /** Append a task. Throws on a duplicate name, a bad interval, or after sealing. */
  register(definition: ScheduledTaskDefinition): void;
  /** Tasks in registration order. */
  list(): readonly ScheduledTaskState[];
  get(name: string): ScheduledTaskState | undefined;
  /** Pause or resume a task; returns false for an unknown name. */
  setEnabled(name: string, enabled: boolean): boolean;
  seal(): void;
  isSealed(): boolean;
  snapshot(): ScheduledTaskSnapshot[];
}

// ─── Factory ────────────────────────────────────────────────────

/** Create an empty, unsealed task registry. */
export function createTaskRegistry(): TaskRegistry {
  const tasks: ScheduledTaskState[] = [];
  const byName = new Map<string, ScheduledTaskState>();
  let sealed = false;

  return {
    register(definition: ScheduledTaskDefinition): void {
      if (sealed) {
        throw new SchedulerStateError(
          `Cannot register task "${definition.name}" after the scheduler has started`,
          { task: definition.name, owner: definition.owner },
        );
      }
      if (definition.name.trim() === '') {
        throw new ValidationError('Scheduled task name cannot be empty', {
          owner: definition.owner,
        });
      }
      if (byName.has(definition.name)) {
        throw new ValidationError(`Scheduled task "${definition.name}" is already registered`, {
          task: definition.name,
          owner: definition.owner,
        });
      }
      if (!Number.isFinite(definition.intervalSeconds) || definition.intervalSeconds <= 0) {
        throw new ValidationError(`Scheduled task "${definition.name}" needs a positive interval`, {
          task: definition.name,
          intervalSeconds: definition.intervalSeconds,
        });
      }

      const state: ScheduledTaskState = { definition, enabled: true };
      tasks.push(state);
      byName.set(definition.name, state);
    },

    list(): readonly ScheduledTaskState[] {
      return tasks;
    },

    get(name: string): ScheduledTaskState | undefined {
      return byName.get(name);
    },

    setEnabled(name: string, enabled: boolean): boolean {
      const state = byName.get(name);
      if (!state) return false;
      state.enabled = enabled;
      return true;
    },

    seal(): void {
      sealed = true;
    },

    isSealed(): boolean {
      return sealed;
    },

    snapshot(): ScheduledTaskSnapshot[] {
      return tasks.map(({ definition, enabled, lastRunAt }) => ({
        name: definition.name,
        owner: definition.owner,
        intervalSeconds: definition.intervalSeconds,
        hasCondition: definition.condition !== undefined,
        enabled,
        ...(lastRunAt !== undefined && { lastRunAt: new Date(lastRunAt).toISOString() }),
      }));
    },
  };
}
