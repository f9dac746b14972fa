import type { AgentId, AppId, OrgId, TaskLogId, UserId } from '@/core/types.js';

// ─── Task Log Entries ───────────────────────────────────────────

/** One unit of work an agent completed, as handed to the logger. */
export interface TaskLogInput {
  orgId: OrgId;
  agentId: AgentId;
  /** Free-form category, e.g. `insights_generated`. */
  taskType: string;
  detail?: Record<string, unknown>;
  appId?: AppId;
  /** The user who asked for the work; absent for autonomous runs. */
  triggeredBy?: UserId;
  executionTimeMs?: number;
  tokensUsed?: number;
}

/** A stored row. `createdAt` is assigned by the database. */
export interface TaskLogEntry {
  id: TaskLogId;
  orgId: OrgId;
  agentId: AgentId;
  appId?: AppId;
  taskType: string;
  detail: Record<string, unknown>;
  triggeredBy?: UserId;
  executionTimeMs?: number;
  tokensUsed?: number;
  createdAt: Date;
}

// ─── Repository ─────────────────────────────────────────────────

export interface TaskLogRepository {
  /** Insert one row and return its id. */
  insert(input: TaskLogInput): Promise<TaskLogId>;
  /** Entries for one agent in an org, created within `[from, to]`, oldest first. */
  listForAgent(orgId: OrgId, agentId: AgentId, from: Date, to: Date): Promise<TaskLogEntry[]>;
}
