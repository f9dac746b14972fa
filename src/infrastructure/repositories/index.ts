export { createTaskLogRepository } from './task-log-repository.js';
export { createNotificationRepository } from './notification-repository.js';
export { createReportRepository } from './report-repository.js';
