/**
 * Scheduled tasks — in-process background jobs run by the unified scheduler.
 *
 * Tasks are declared once at startup from app manifests and are never
 * removed. Each carries its own interval; the scheduler tick only decides
 * how often due-ness is checked.
 */

// ─── Declarations ───────────────────────────────────────────────

/** Work performed when a task runs. */
export type TaskWork = () => Promise<void>;

/** Cheap pre-check; `false` skips the run and still consumes the interval. */
export type TaskCondition = () => Promise<boolean>;

export interface ScheduledTaskDefinition {
  /** Unique across the registry, e.g. `wa:report-agent:reports`. */
  name: string;
  run: TaskWork;
  intervalSeconds: number;
  condition?: TaskCondition;
  /** Declaring module, `appId/agentId`, for diagnostics. */
  owner: string;
}

// ─── Runtime State ──────────────────────────────────────────────

export interface ScheduledTaskState {
  readonly definition: ScheduledTaskDefinition;
  /** Epoch ms of the last attempt that got past the due check. */
  lastRunAt?: number;
  enabled: boolean;
}

/** Read-only view for diagnostics endpoints and logs. */
export interface ScheduledTaskSnapshot {
  name: string;
  owner: string;
  intervalSeconds: number;
  hasCondition: boolean;
  enabled: boolean;
  lastRunAt?: string;
}

// ─── Attempt Outcomes ───────────────────────────────────────────

export type TaskSkipReason = 'disabled' | 'not_due' | 'condition_false' | 'condition_error';

export type TaskAttemptOutcome =
  | { readonly status: 'completed'; readonly task: string; readonly durationMs: number }
  | {
      readonly status: 'skipped';
      readonly task: string;
      readonly reason: TaskSkipReason;
      readonly error?: Error;
    }
  | {
      readonly status: 'failed';
      readonly task: string;
      readonly error: Error;
      readonly durationMs: number;
    };
