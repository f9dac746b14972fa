/**
 * Metric aggregation for team and agent reports. Pure functions over the
 * rows the report repository and task log return.
 */
import type { ReportPeriod } from '@/core/types.js';
import type { TaskLogEntry } from '@/task-logging/types.js';
import type {
  ActiveAgent,
  AgentHighlight,
  AgentReportMetrics,
  MemberActivity,
  OrgMember,
  TeamReportMetrics,
  TopPerformer,
} from './types.js';

export const TOP_PERFORMER_LIMIT = 5;
export const AGENT_HIGHLIGHT_LIMIT = 10;

function increment(counts: Record<string, number>, key: string, by = 1): void {
  counts[key] = (counts[key] ?? 0) + by;
}

export function buildTeamMetrics(
  reportPeriod: ReportPeriod,
  members: readonly OrgMember[],
  activities: readonly MemberActivity[],
): TeamReportMetrics {
  const activitiesByType: Record<string, number> = {};
  const countByUser = new Map<string, number>();
  const agentsByUser = new Map<string, Set<string>>();

  for (const activity of activities) {
    increment(activitiesByType, activity.actionType);
    countByUser.set(activity.userId, (countByUser.get(activity.userId) ?? 0) + 1);

    if (activity.agentId !== undefined) {
      const used = agentsByUser.get(activity.userId) ?? new Set<string>();
      used.add(activity.agentId);
      agentsByUser.set(activity.userId, used);
    }
  }

  const names = new Map<string, string>();
  for (const member of members) {
    if (member.fullName !== undefined) names.set(member.userId, member.fullName);
  }

  const topPerformers: TopPerformer[] = [...countByUser]
    .map(([user, activityCount]) => ({
      name: names.get(user) ?? 'Unknown',
      activityCount,
      agentsUsed: [...(agentsByUser.get(user) ?? [])],
    }))
    .sort((a, b) => b.activityCount - a.activityCount)
    .slice(0, TOP_PERFORMER_LIMIT);

  const agentsAccessed: Record<string, number> = {};
  for (const used of agentsByUser.values()) {
    for (const agent of used) increment(agentsAccessed, agent);
  }

  return {
    ...reportPeriod,
    totalMembers: members.length,
    activeMembers: countByUser.size,
    totalActivities: activities.length,
    activitiesByType,
    topPerformers,
    agentsAccessed,
  };
}

export function buildAgentMetrics(
  reportPeriod: ReportPeriod,
  agent: ActiveAgent,
  entries: readonly TaskLogEntry[],
): AgentReportMetrics {
  const tasksByType: Record<string, number> = {};
  const users = new Set<string>();
  const highlights: AgentHighlight[] = [];
  let totalExecutionTimeMs = 0;
  let totalTokensUsed = 0;

  for (const entry of entries) {
    increment(tasksByType, entry.taskType);
    if (entry.triggeredBy !== undefined) users.add(entry.triggeredBy);
    totalExecutionTimeMs += entry.executionTimeMs ?? 0;
    totalTokensUsed += entry.tokensUsed ?? 0;

    const businessName = entry.detail['business_name'];
    if (entry.taskType === 'insights_generated' && typeof businessName === 'string' && businessName) {
      highlights.push({
        type: 'insight',
        description: `Generated AI insights for ${businessName}`,
      });
    }
  }

  return {
    ...reportPeriod,
    agentId: agent.id,
    agentName: agent.name,
    totalTasks: entries.length,
    tasksByType,
    uniqueUsers: users.size,
    totalExecutionTimeMs,
    totalTokensUsed,
    highlights: highlights.slice(0, AGENT_HIGHLIGHT_LIMIT),
  };
}

// ─── Stored Snapshots ───────────────────────────────────────────

/** The metric snapshot stored alongside a team report. */
export function teamRawMetrics(metrics: TeamReportMetrics): Record<string, unknown> {
  return {
    total_members: metrics.totalMembers,
    active_members: metrics.activeMembers,
    total_activities: metrics.totalActivities,
    activities_by_type: metrics.activitiesByType,
    top_performers: metrics.topPerformers.map((p) => ({
      name: p.name,
      activity_count: p.activityCount,
      agents_used: p.agentsUsed,
    })),
    agents_accessed: metrics.agentsAccessed,
  };
}

/** The metric snapshot stored alongside an agent report. */
export function agentRawMetrics(metrics: AgentReportMetrics): Record<string, unknown> {
  return {
    agent_name: metrics.agentName,
    total_tasks: metrics.totalTasks,
    tasks_by_type: metrics.tasksByType,
    unique_users: metrics.uniqueUsers,
    total_execution_time_ms: metrics.totalExecutionTimeMs,
    total_tokens_used: metrics.totalTokensUsed,
  };
}
