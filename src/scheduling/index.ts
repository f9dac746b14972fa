// Scheduling module — task registry and the unified scheduler loop
export type {
  TaskWork,
  TaskCondition,
  ScheduledTaskDefinition,
  ScheduledTaskState,
  ScheduledTaskSnapshot,
  TaskSkipReason,
  TaskAttemptOutcome,
} from './types.js';

export { createTaskRegistry } from './task-registry.js';
export type { TaskRegistry } from './task-registry.js';

export { createScheduler } from './scheduler.js';
export type { Scheduler, SchedulerOptions } from './scheduler.js';
