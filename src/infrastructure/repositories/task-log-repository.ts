/**
 * TaskLog repository — append and range reads over `bot_task_log`.
 */
import { z } from 'zod';
import { agentId, appId, orgId, taskLogId, userId } from '@/core/types.js';
import type { AgentId, OrgId, TaskLogId } from '@/core/types.js';
import type { TaskLogEntry, TaskLogInput, TaskLogRepository } from '@/task-logging/types.js';
import type { Queryable } from '../database.js';

// ─── Rows ───────────────────────────────────────────────────────

type TaskLogRow = {
  id: string;
  org_id: string;
  bot_id: string;
  app_id: string | null;
  task_type: string;
  task_detail: unknown;
  triggered_by: string | null;
  execution_time_ms: number | null;
  tokens_used: number | null;
  created_at: Date;
};

const detailSchema = z.record(z.unknown()).catch({});

function toAppModel(row: TaskLogRow): TaskLogEntry {
  return {
    id: taskLogId(row.id),
    orgId: orgId(row.org_id),
    agentId: agentId(row.bot_id),
    appId: row.app_id === null ? undefined : appId(row.app_id),
    taskType: row.task_type,
    detail: detailSchema.parse(row.task_detail),
    triggeredBy: row.triggered_by === null ? undefined : userId(row.triggered_by),
    executionTimeMs: row.execution_time_ms ?? undefined,
    tokensUsed: row.tokens_used ?? undefined,
    createdAt: row.created_at,
  };
}

// ─── Factory ────────────────────────────────────────────────────

/** Create a TaskLogRepository backed by PostgreSQL. */
export function createTaskLogRepository(db: Queryable): TaskLogRepository {
  return {
    async insert(input: TaskLogInput): Promise<TaskLogId> {
      const rows = await db.query<{ id: string }>(
        `INSERT INTO bot_task_log
           (org_id, bot_id, app_id, task_type, task_detail, triggered_by, execution_time_ms, tokens_used)
         VALUES ($1, $2, $3, $4, $5::jsonb, $6, $7, $8)
         RETURNING id`,
        [
          input.orgId,
          input.agentId,
          input.appId ?? null,
          input.taskType,
          JSON.stringify(input.detail ?? {}),
          input.triggeredBy ?? null,
          input.executionTimeMs ?? null,
          input.tokensUsed ?? null,
        ],
      );
      const row = rows[0];
      if (!row) {
        throw new Error('bot_task_log insert returned no id');
      }
      return taskLogId(row.id);
    },

    async listForAgent(org: OrgId, agent: AgentId, from: Date, to: Date): Promise<TaskLogEntry[]> {
      const rows = await db.query<TaskLogRow>(
        `SELECT id, org_id, bot_id, app_id, task_type, task_detail, triggered_by,
                execution_time_ms, tokens_used, created_at
           FROM bot_task_log
          WHERE org_id = $1 AND bot_id = $2 AND created_at >= $3 AND created_at <= $4
          ORDER BY created_at ASC`,
        [org, agent, from, to],
      );
      return rows.map(toAppModel);
    },
  };
}
