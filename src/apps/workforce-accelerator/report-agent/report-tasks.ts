/**
 * Periodic report generation. Every run works out which periods are due,
 * then fills in whichever team and agent reports are still missing for
 * each organization. Existing reports are never regenerated.
 */
import type { CacheService } from '@/cache/cache-service.js';
import { cacheKey } from '@/cache/cache-keys.js';
import type { Clock } from '@/core/clock.js';
import { systemClock } from '@/core/clock.js';
import { toError } from '@/core/errors.js';
import type { OrgId, PeriodType, ReportPeriod } from '@/core/types.js';
import type { Logger } from '@/observability/logger.js';
import type { TaskLogger } from '@/task-logging/task-logger.js';
import { createTaskTimer } from '@/task-logging/task-timer.js';
import {
  agentRawMetrics,
  buildAgentMetrics,
  buildTeamMetrics,
  teamRawMetrics,
} from './metrics.js';
import { dueReportPeriods, periodBounds } from './periods.js';
import type {
  ActiveAgent,
  OrganizationSummary,
  ReportRepository,
  ReportWriter,
} from './types.js';

export const REPORTS_POOL = 'reports';

/** Cache key for an org's report list, optionally narrowed to one period type. */
export function reportListKey(org: OrgId, periodType?: PeriodType): string {
  return cacheKey('reports', org, periodType ?? 'all');
}

export interface ReportGenerationOptions {
  reports: ReportRepository;
  taskLogger: TaskLogger;
  writer: ReportWriter;
  cache: CacheService;
  logger: Logger;
  clock?: Clock;
}

export interface ReportRunSummary {
  generated: number;
  /** Already stored for the period. */
  existing: number;
  /** No activity to report on. */
  empty: number;
  failed: number;
}

type ReportOutcome = keyof ReportRunSummary;

export interface ReportGeneration {
  generateDueReports(): Promise<ReportRunSummary>;
}

export function createReportGeneration(options: ReportGenerationOptions): ReportGeneration {
  const { reports, taskLogger, writer, cache, logger, clock = systemClock } = options;

  async function teamReport(org: OrganizationSummary, period: ReportPeriod): Promise<ReportOutcome> {
    const exists = await reports.reportExists({
      orgId: org.id,
      reportType: 'team',
      periodType: period.periodType,
      periodStart: period.periodStart,
    });
    if (exists) return 'existing';

    const { from, to } = periodBounds(period);
    const [members, activities] = await Promise.all([
      reports.listMembers(org.id),
      reports.listMemberActivity(org.id, from, to),
    ]);
    const metrics = buildTeamMetrics(period, members, activities);
    if (metrics.totalActivities === 0) return 'empty';

    const timer = createTaskTimer(clock);
    const text = await timer.time(() => writer.writeTeamReport(metrics, org.name));

    await reports.insertReport({
      ...period,
      orgId: org.id,
      reportType: 'team',
      rawMetrics: teamRawMetrics(metrics),
      ...text,
      generatedBy: writer.model,
      generationTimeMs: timer.executionTimeMs,
    });
    return 'generated';
  }

  async function agentReport(
    org: OrganizationSummary,
    agent: ActiveAgent,
    period: ReportPeriod,
  ): Promise<ReportOutcome> {
    const exists = await reports.reportExists({
      orgId: org.id,
      reportType: 'agent',
      periodType: period.periodType,
      periodStart: period.periodStart,
      agentId: agent.id,
    });
    if (exists) return 'existing';

    const { from, to } = periodBounds(period);
    const entries = await taskLogger.listForAgent(org.id, agent.id, from, to);
    if (entries.length === 0) return 'empty';

    const metrics = buildAgentMetrics(period, agent, entries);
    const timer = createTaskTimer(clock);
    const text = await timer.time(() => writer.writeAgentReport(metrics, org.name));

    await reports.insertReport({
      ...period,
      orgId: org.id,
      reportType: 'agent',
      agentId: agent.id,
      rawMetrics: agentRawMetrics(metrics),
      ...text,
      generatedBy: writer.model,
      generationTimeMs: timer.executionTimeMs,
    });
    return 'generated';
  }

  /** Run one report; failures are logged and counted, never thrown. */
  async function attempt(
    label: Record<string, unknown>,
    generate: () => Promise<ReportOutcome>,
  ): Promise<ReportOutcome> {
    try {
      return await generate();
    } catch (error) {
      logger.error('Report generation failed', {
        component: 'report-agent',
        ...label,
        error: toError(error).message,
      });
      return 'failed';
    }
  }

  return {
    async generateDueReports(): Promise<ReportRunSummary> {
      const summary: ReportRunSummary = { generated: 0, existing: 0, empty: 0, failed: 0 };
      const periods = dueReportPeriods(new Date(clock.now()));
      if (periods.length === 0) return summary;

      const [organizations, agents] = await Promise.all([
        reports.listOrganizations(),
        reports.listActiveAgents(),
      ]);

      for (const org of organizations) {
        let generatedForOrg = 0;

        for (const period of periods) {
          const base = { orgId: org.id, periodType: period.periodType, periodStart: period.periodStart };

          const team = await attempt({ ...base, reportType: 'team' }, () => teamReport(org, period));
          summary[team]++;
          if (team === 'generated') generatedForOrg++;

          for (const agent of agents) {
            const outcome = await attempt({ ...base, reportType: 'agent', agentId: agent.id }, () =>
              agentReport(org, agent, period),
            );
            summary[outcome]++;
            if (outcome === 'generated') generatedForOrg++;
          }
        }

        if (generatedForOrg > 0) {
          cache.invalidateEntity(REPORTS_POOL, 'reports', org.id);
        }
      }

      logger.info('Report run finished', { component: 'report-agent', ...summary });
      return summary;
    },
  };
}
