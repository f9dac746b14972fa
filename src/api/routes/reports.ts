/**
 * Hub report routes: an organization's generated activity reports.
 */
import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { z } from 'zod';
import { agentId, orgId, reportId } from '@/core/types.js';
import { REPORTS_POOL, reportListKey } from '@/apps/workforce-accelerator/report-agent/report-tasks.js';
import type { RouteDependencies } from '../types.js';
import { sendSuccess } from '../error-handler.js';

export const REPORT_LIST_LIMIT = 30;

// ─── Schemas ────────────────────────────────────────────────────

const periodTypeSchema = z.enum(['daily', 'weekly', 'monthly']);

const paramsSchema = z.object({
  orgId: z.string().uuid().transform(orgId),
});

const querySchema = z.object({
  periodType: periodTypeSchema.optional(),
});

const reportListSchema = z.array(
  z.object({
    id: z.string().transform(reportId),
    orgId: z.string().transform(orgId),
    reportType: z.enum(['team', 'agent']),
    periodType: periodTypeSchema,
    periodStart: z.string(),
    periodEnd: z.string(),
    agentId: z.string().transform(agentId).optional(),
    summaryText: z.string(),
    highlights: z.array(z.string()),
    recommendations: z.array(z.string()),
    createdAt: z.string(),
  }),
);

// ─── Routes ─────────────────────────────────────────────────────

/** Register report routes on a Fastify instance. */
export function reportRoutes(fastify: FastifyInstance, opts: RouteDependencies): void {
  const { reports, cache } = opts;

  // GET /api/hub/orgs/:orgId/reports?periodType=
  fastify.get(
    '/api/hub/orgs/:orgId/reports',
    async (request: FastifyRequest<{ Params: { orgId: string } }>, reply: FastifyReply) => {
      const { orgId: org } = paramsSchema.parse(request.params);
      const { periodType } = querySchema.parse(request.query);

      const list = await cache.getOrLoad(
        REPORTS_POOL,
        reportListKey(org, periodType),
        reportListSchema,
        () => reports.listReports(org, periodType, REPORT_LIST_LIMIT),
      );
      await sendSuccess(reply, list);
    },
  );
}
