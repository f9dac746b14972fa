/**
 * Lead agent task types. Every entry is logged under agent `lead-agent`
 * in the `workforce-accelerator` app.
 */
import { agentId, appId } from '@/core/types.js';
import type { OrgId, ProspectId, TaskLogId, UserId } from '@/core/types.js';
import type { TaskLogger } from './task-logger.js';

export const LEAD_AGENT_ID = agentId('lead-agent');
export const WORKFORCE_APP_ID = appId('workforce-accelerator');

export const LEAD_AGENT_TASK_TYPES = {
  prospectScraped: 'prospect_scraped',
  insightsGenerated: 'insights_generated',
  callScriptCreated: 'call_script_created',
} as const;

/** A user imported a prospect from a URL. */
export function logProspectScraped(
  taskLogger: TaskLogger,
  params: {
    orgId: OrgId;
    userId: UserId;
    businessName: string;
    source: string;
    executionTimeMs: number;
  },
): Promise<TaskLogId> {
  return taskLogger.log({
    orgId: params.orgId,
    agentId: LEAD_AGENT_ID,
    appId: WORKFORCE_APP_ID,
    taskType: LEAD_AGENT_TASK_TYPES.prospectScraped,
    detail: { business_name: params.businessName, source: params.source },
    triggeredBy: params.userId,
    executionTimeMs: params.executionTimeMs,
  });
}

/** Background insight generation for a prospect. */
export function logInsightsGenerated(
  taskLogger: TaskLogger,
  params: {
    orgId: OrgId;
    prospectId: ProspectId;
    businessName: string;
    painPointsCount: number;
    tokensUsed: number;
    executionTimeMs: number;
  },
): Promise<TaskLogId> {
  return taskLogger.log({
    orgId: params.orgId,
    agentId: LEAD_AGENT_ID,
    appId: WORKFORCE_APP_ID,
    taskType: LEAD_AGENT_TASK_TYPES.insightsGenerated,
    detail: {
      prospect_id: params.prospectId,
      business_name: params.businessName,
      pain_points_count: params.painPointsCount,
    },
    executionTimeMs: params.executionTimeMs,
    tokensUsed: params.tokensUsed,
  });
}

/** A call script was written for a prospect, on request or in the background. */
export function logCallScriptCreated(
  taskLogger: TaskLogger,
  params: {
    orgId: OrgId;
    prospectId: ProspectId;
    businessName: string;
    userId?: UserId;
    tokensUsed: number;
    executionTimeMs: number;
  },
): Promise<TaskLogId> {
  return taskLogger.log({
    orgId: params.orgId,
    agentId: LEAD_AGENT_ID,
    appId: WORKFORCE_APP_ID,
    taskType: LEAD_AGENT_TASK_TYPES.callScriptCreated,
    detail: { prospect_id: params.prospectId, business_name: params.businessName },
    triggeredBy: params.userId,
    executionTimeMs: params.executionTimeMs,
    tokensUsed: params.tokensUsed,
  });
}
