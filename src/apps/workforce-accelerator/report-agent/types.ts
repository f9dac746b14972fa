import { z } from 'zod';
import type {
  AgentId,
  OrgId,
  PeriodType,
  ReportId,
  ReportPeriod,
  ReportType,
  UserId,
} from '@/core/types.js';

// ─── Source Rows ────────────────────────────────────────────────

export interface OrganizationSummary {
  id: OrgId;
  name: string;
}

export interface ActiveAgent {
  id: AgentId;
  name: string;
}

export interface OrgMember {
  userId: UserId;
  fullName?: string;
}

/** One row of `member_activity_log`. */
export interface MemberActivity {
  userId: UserId;
  actionType: string;
  agentId?: AgentId;
}

// ─── Metrics ────────────────────────────────────────────────────

export interface TopPerformer {
  name: string;
  activityCount: number;
  agentsUsed: string[];
}

export interface TeamReportMetrics extends ReportPeriod {
  totalMembers: number;
  activeMembers: number;
  totalActivities: number;
  activitiesByType: Record<string, number>;
  topPerformers: TopPerformer[];
  /** Agent id → number of distinct members who used it. */
  agentsAccessed: Record<string, number>;
}

export interface AgentHighlight {
  type: 'insight';
  description: string;
}

export interface AgentReportMetrics extends ReportPeriod {
  agentId: AgentId;
  agentName: string;
  totalTasks: number;
  tasksByType: Record<string, number>;
  uniqueUsers: number;
  totalExecutionTimeMs: number;
  totalTokensUsed: number;
  highlights: AgentHighlight[];
}

// ─── Generated Text ─────────────────────────────────────────────

export const reportTextSchema = z.object({
  summary_text: z.string().min(1),
  highlights: z.array(z.string()).default([]),
  recommendations: z.array(z.string()).default([]),
});

export interface ReportText {
  summaryText: string;
  highlights: string[];
  recommendations: string[];
  tokensUsed?: number;
}

/** Turns metrics into prose. */
export interface ReportWriter {
  readonly model: string;
  writeTeamReport(metrics: TeamReportMetrics, orgName: string): Promise<ReportText>;
  writeAgentReport(metrics: AgentReportMetrics, orgName: string): Promise<ReportText>;
}

// ─── Stored Reports ─────────────────────────────────────────────

export interface ReportLookup {
  orgId: OrgId;
  reportType: ReportType;
  periodType: PeriodType;
  periodStart: string;
  /** Agent reports only; team reports match rows without a user. */
  agentId?: AgentId;
}

export interface ActivityReportInput extends ReportPeriod {
  orgId: OrgId;
  reportType: ReportType;
  agentId?: AgentId;
  rawMetrics: Record<string, unknown>;
  summaryText: string;
  highlights: string[];
  recommendations: string[];
  generatedBy: string;
  tokensUsed?: number;
  generationTimeMs: number;
}

export interface ActivityReport extends ReportPeriod {
  id: ReportId;
  orgId: OrgId;
  reportType: ReportType;
  agentId?: AgentId;
  summaryText: string;
  highlights: string[];
  recommendations: string[];
  createdAt: string;
}

export interface ReportRepository {
  listOrganizations(): Promise<OrganizationSummary[]>;
  listActiveAgents(): Promise<ActiveAgent[]>;
  reportExists(lookup: ReportLookup): Promise<boolean>;
  listMembers(orgId: OrgId): Promise<OrgMember[]>;
  /** Activity rows created within `[from, to]`. */
  listMemberActivity(orgId: OrgId, from: Date, to: Date): Promise<MemberActivity[]>;
  insertReport(report: ActivityReportInput): Promise<ReportId>;
  /** Most recent reports for an org, newest first. */
  listReports(orgId: OrgId, periodType: PeriodType | undefined, limit: number): Promise<ActivityReport[]>;
}
