// Task logging — agent work records and timing
export type { TaskLogEntry, TaskLogInput, TaskLogRepository } from './types.js';
export type { TaskLogger, TaskLoggerOptions } from './task-logger.js';
export { createTaskLogger } from './task-logger.js';
export type { TaskTimer } from './task-timer.js';
export { createTaskTimer } from './task-timer.js';
export {
  LEAD_AGENT_ID,
  LEAD_AGENT_TASK_TYPES,
  WORKFORCE_APP_ID,
  logCallScriptCreated,
  logInsightsGenerated,
  logProspectScraped,
} from './lead-agent-log.js';
