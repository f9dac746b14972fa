// Core module — shared types, errors, result helpers, time source
export type {
  AgentId,
  AppId,
  NotificationId,
  OrgId,
  PeriodType,
  ProspectId,
  ReportId,
  ReportPeriod,
  ReportType,
  TaskLogId,
  UserId,
} from './types.js';
export {
  agentId,
  appId,
  notificationId,
  orgId,
  prospectId,
  reportId,
  taskLogId,
  userId,
} from './types.js';

export type { Result } from './result.js';
export { ok, err, settle } from './result.js';

export {
  PlatformError,
  ValidationError,
  TaskLogWriteError,
  SchedulerStateError,
  ProviderError,
  toError,
} from './errors.js';

export type { Clock, ManualClock } from './clock.js';
export { systemClock, createManualClock } from './clock.js';
