// Database client singleton
export { createDatabase } from './database.js';
export type { Database, DatabaseOptions, Queryable } from './database.js';

// Repositories
export {
  createTaskLogRepository,
  createNotificationRepository,
  createReportRepository,
} from './repositories/index.js';
