/**
 * Workforce Accelerator — lead discovery and activity reporting for sales teams.
 */
import { agentId } from '@/core/types.js';
import type { CacheService } from '@/cache/cache-service.js';
import type { Clock } from '@/core/clock.js';
import type { Logger } from '@/observability/logger.js';
import type { TaskLogger } from '@/task-logging/task-logger.js';
import { LEAD_AGENT_ID, WORKFORCE_APP_ID } from '@/task-logging/lead-agent-log.js';
import type { AgentManifest, AppManifest } from '../types.js';
import { createNotificationDelivery, LEAD_AGENT_POOL } from './lead-agent/notification-tasks.js';
import { leadAgentRoutes } from './lead-agent/routes.js';
import type { NotificationRepository, ReminderSender } from './lead-agent/types.js';
import { createReportGeneration } from './report-agent/report-tasks.js';
import type { ReportRepository, ReportWriter } from './report-agent/types.js';

export const REPORT_AGENT_ID = agentId('report-agent');

export const NOTIFICATION_TASK_NAME = 'wa:lead-agent:notifications';
export const REPORT_TASK_NAME = 'wa:report-agent:reports';

export interface WorkforceAcceleratorDependencies {
  notifications: NotificationRepository;
  reports: ReportRepository;
  sender: ReminderSender;
  /** Without a writer the report agent declares no background task. */
  reportWriter?: ReportWriter;
  taskLogger: TaskLogger;
  cache: CacheService;
  logger: Logger;
  clock?: Clock;
}

export function createWorkforceAcceleratorManifest(deps: WorkforceAcceleratorDependencies): AppManifest {
  const logger = deps.logger.child({ app: WORKFORCE_APP_ID });

  const delivery = createNotificationDelivery({
    notifications: deps.notifications,
    sender: deps.sender,
    cache: deps.cache,
    logger,
    clock: deps.clock,
  });

  const leadAgent: AgentManifest = {
    agentId: LEAD_AGENT_ID,
    name: 'Lead Agent',
    description: 'Finds prospects, researches them and reminds reps to follow up.',
    scheduledTasks: [
      {
        name: NOTIFICATION_TASK_NAME,
        intervalSeconds: 60,
        condition: delivery.hasDueNotifications,
        run: async () => {
          await delivery.deliverDueNotifications();
        },
      },
    ],
    routes: leadAgentRoutes({ notifications: deps.notifications, cache: deps.cache }),
  };

  const reportAgent: AgentManifest = {
    agentId: REPORT_AGENT_ID,
    name: 'Report Agent',
    description: 'Writes daily, weekly and monthly activity reports.',
    scheduledTasks: [],
  };

  if (deps.reportWriter) {
    const generation = createReportGeneration({
      reports: deps.reports,
      taskLogger: deps.taskLogger,
      writer: deps.reportWriter,
      cache: deps.cache,
      logger,
      clock: deps.clock,
    });
    reportAgent.scheduledTasks.push({
      name: REPORT_TASK_NAME,
      intervalSeconds: 3600,
      run: async () => {
        await generation.generateDueReports();
      },
    });
  } else {
    logger.warn('No report writer configured, report generation disabled', {
      component: 'apps',
    });
  }

  return {
    appId: WORKFORCE_APP_ID,
    name: 'Workforce Accelerator',
    description: 'AI agents that help sales teams find, research and follow up with leads.',
    icon: 'rocket',
    cachePools: [{ name: LEAD_AGENT_POOL, maxSize: 256, ttlSeconds: 60 }],
    agents: [leadAgent, reportAgent],
  };
}
