/**
 * Task logger — records completed agent work in `bot_task_log`.
 *
 * Each call writes exactly one row; there is no batching or deduplication.
 * Activity reports are aggregated from these rows, so a failed write is
 * surfaced to the caller as a `TaskLogWriteError`.
 */
import { TaskLogWriteError, toError } from '@/core/errors.js';
import type { AgentId, OrgId, TaskLogId } from '@/core/types.js';
import type { Logger } from '@/observability/logger.js';
import type { TaskLogEntry, TaskLogInput, TaskLogRepository } from './types.js';

export interface TaskLogger {
  /** Write one entry and return its id. Throws `TaskLogWriteError` on failure. */
  log(input: TaskLogInput): Promise<TaskLogId>;
  /** Read an agent's entries back for aggregation. */
  listForAgent(orgId: OrgId, agentId: AgentId, from: Date, to: Date): Promise<TaskLogEntry[]>;
}

export interface TaskLoggerOptions {
  repository: TaskLogRepository;
  logger: Logger;
}

/** Create a task logger over the given repository. */
export function createTaskLogger(options: TaskLoggerOptions): TaskLogger {
  const { repository, logger } = options;

  return {
    async log(input: TaskLogInput): Promise<TaskLogId> {
      try {
        const id = await repository.insert(input);
        logger.debug('Task logged', {
          component: 'task-logger',
          orgId: input.orgId,
          agentId: input.agentId,
          taskType: input.taskType,
          taskLogId: id,
        });
        return id;
      } catch (error) {
        const cause = toError(error);
        logger.error('Task log write failed', {
          component: 'task-logger',
          orgId: input.orgId,
          agentId: input.agentId,
          taskType: input.taskType,
          error: cause.message,
        });
        throw new TaskLogWriteError(input.agentId, input.taskType, cause);
      }
    },

    listForAgent(orgId, agentId, from, to): Promise<TaskLogEntry[]> {
      return repository.listForAgent(orgId, agentId, from, to);
    },
  };
}
