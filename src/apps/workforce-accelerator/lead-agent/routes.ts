/**
 * Lead agent routes, mounted under `/api/apps/workforce-accelerator/lead-agent`.
 */
import type { FastifyReply, FastifyRequest } from 'fastify';
import { z } from 'zod';
import { sendSuccess } from '@/api/error-handler.js';
import type { CacheService } from '@/cache/cache-service.js';
import { notificationId, prospectId, userId } from '@/core/types.js';
import type { ManifestRoutes } from '@/apps/types.js';
import { LEAD_AGENT_POOL, pendingNotificationsKey } from './notification-tasks.js';
import type { NotificationRepository } from './types.js';

// ─── Schemas ────────────────────────────────────────────────────

const paramsSchema = z.object({
  userId: z.string().uuid().transform(userId),
});

const pendingListSchema = z.array(
  z.object({
    id: z.string().transform(notificationId),
    prospectId: z.string().transform(prospectId),
    businessName: z.string().optional(),
    message: z.string(),
    scheduledFor: z.string(),
  }),
);

// ─── Routes ─────────────────────────────────────────────────────

export interface LeadAgentRouteDependencies {
  notifications: NotificationRepository;
  cache: CacheService;
}

export function leadAgentRoutes(deps: LeadAgentRouteDependencies): ManifestRoutes {
  const { notifications, cache } = deps;

  return (fastify) => {
    // GET /notifications/:userId
    fastify.get(
      '/notifications/:userId',
      async (request: FastifyRequest<{ Params: { userId: string } }>, reply: FastifyReply) => {
        const params = paramsSchema.parse(request.params);
        const pending = await cache.getOrLoad(
          LEAD_AGENT_POOL,
          pendingNotificationsKey(params.userId),
          pendingListSchema,
          () => notifications.listPendingForUser(params.userId),
        );
        await sendSuccess(reply, pending);
      },
    );
  };
}
