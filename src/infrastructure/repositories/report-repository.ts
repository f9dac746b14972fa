/**
 * Report repository — source rows for activity reports and the stored
 * `activity_reports` themselves.
 */
import { z } from 'zod';
import { agentId, orgId, reportId, userId } from '@/core/types.js';
import type { OrgId, PeriodType, ReportId } from '@/core/types.js';
import type {
  ActiveAgent,
  ActivityReport,
  ActivityReportInput,
  MemberActivity,
  OrganizationSummary,
  OrgMember,
  ReportLookup,
  ReportRepository,
} from '@/apps/workforce-accelerator/report-agent/types.js';
import type { Queryable } from '../database.js';

// ─── Rows ───────────────────────────────────────────────────────

type NamedRow = { id: string; name: string };

type MemberRow = { user_id: string; full_name: string | null };

type ActivityRow = { user_id: string; action_type: string; bot_id: string | null };

const stringListSchema = z.array(z.string()).catch([]);

const reportRowSchema = z.object({
  id: z.string(),
  org_id: z.string(),
  report_type: z.enum(['team', 'agent']),
  period_type: z.enum(['daily', 'weekly', 'monthly']),
  period_start: z.string(),
  period_end: z.string(),
  bot_id: z.string().nullable(),
  summary_text: z.string(),
  highlights: z.unknown(),
  recommendations: z.unknown(),
  created_at: z.date(),
});

function toReport(raw: unknown): ActivityReport {
  const row = reportRowSchema.parse(raw);
  return {
    id: reportId(row.id),
    orgId: orgId(row.org_id),
    reportType: row.report_type,
    periodType: row.period_type,
    periodStart: row.period_start,
    periodEnd: row.period_end,
    agentId: row.bot_id === null ? undefined : agentId(row.bot_id),
    summaryText: row.summary_text,
    highlights: stringListSchema.parse(row.highlights),
    recommendations: stringListSchema.parse(row.recommendations),
    createdAt: row.created_at.toISOString(),
  };
}

// ─── Factory ────────────────────────────────────────────────────

/** Create a ReportRepository backed by PostgreSQL. */
export function createReportRepository(db: Queryable): ReportRepository {
  return {
    async listOrganizations(): Promise<OrganizationSummary[]> {
      const rows = await db.query<NamedRow>('SELECT id, name FROM organizations ORDER BY name');
      return rows.map((row) => ({ id: orgId(row.id), name: row.name }));
    },

    async listActiveAgents(): Promise<ActiveAgent[]> {
      const rows = await db.query<NamedRow>(
        'SELECT id, name FROM bot_registry WHERE is_active = true ORDER BY id',
      );
      return rows.map((row) => ({ id: agentId(row.id), name: row.name }));
    },

    async reportExists(lookup: ReportLookup): Promise<boolean> {
      const params: unknown[] = [
        lookup.orgId,
        lookup.reportType,
        lookup.periodType,
        lookup.periodStart,
      ];
      let scope = 'AND user_id IS NULL';
      if (lookup.agentId !== undefined) {
        params.push(lookup.agentId);
        scope = 'AND bot_id = $5';
      }
      const rows = await db.query(
        `SELECT 1 FROM activity_reports
          WHERE org_id = $1 AND report_type = $2 AND period_type = $3 AND period_start = $4
            ${scope}
          LIMIT 1`,
        params,
      );
      return rows.length > 0;
    },

    async listMembers(org: OrgId): Promise<OrgMember[]> {
      const rows = await db.query<MemberRow>(
        `SELECT m.user_id, u.full_name
           FROM memberships m
           LEFT JOIN users u ON u.id = m.user_id
          WHERE m.org_id = $1`,
        [org],
      );
      return rows.map((row) => ({
        userId: userId(row.user_id),
        fullName: row.full_name ?? undefined,
      }));
    },

    async listMemberActivity(org: OrgId, from: Date, to: Date): Promise<MemberActivity[]> {
      const rows = await db.query<ActivityRow>(
        `SELECT user_id, action_type, bot_id
           FROM member_activity_log
          WHERE org_id = $1 AND created_at >= $2 AND created_at <= $3`,
        [org, from, to],
      );
      return rows.map((row) => ({
        userId: userId(row.user_id),
        actionType: row.action_type,
        agentId: row.bot_id === null ? undefined : agentId(row.bot_id),
      }));
    },

    async insertReport(report: ActivityReportInput): Promise<ReportId> {
      const rows = await db.query<{ id: string }>(
        `INSERT INTO activity_reports
           (org_id, report_type, period_type, period_start, period_end, bot_id, raw_metrics,
            summary_text, highlights, recommendations, generated_by, tokens_used, generation_time_ms)
         VALUES ($1, $2, $3, $4, $5, $6, $7::jsonb, $8, $9::jsonb, $10::jsonb, $11, $12, $13)
         RETURNING id`,
        [
          report.orgId,
          report.reportType,
          report.periodType,
          report.periodStart,
          report.periodEnd,
          report.agentId ?? null,
          JSON.stringify(report.rawMetrics),
          report.summaryText,
          JSON.stringify(report.highlights),
          JSON.stringify(report.recommendations),
          report.generatedBy,
          report.tokensUsed ?? null,
          report.generationTimeMs,
        ],
      );
      const row = rows[0];
      if (!row) {
        throw new Error('activity_reports insert returned no id');
      }
      return reportId(row.id);
    },

    async listReports(
      org: OrgId,
      periodType: PeriodType | undefined,
      limit: number,
    ): Promise<ActivityReport[]> {
      const rows = await db.query(
        `SELECT id, org_id, report_type, period_type,
                to_char(period_start, 'YYYY-MM-DD') AS period_start,
                to_char(period_end, 'YYYY-MM-DD') AS period_end,
                bot_id, summary_text, highlights, recommendations, created_at
           FROM activity_reports
          WHERE org_id = $1 AND report_type IN ('team', 'agent')
            AND ($2::text IS NULL OR period_type = $2)
          ORDER BY period_start DESC, created_at DESC
          LIMIT $3`,
        [org, periodType ?? null, limit],
      );
      return rows.map(toReport);
    },
  };
}
