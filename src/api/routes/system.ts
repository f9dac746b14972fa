/**
 * System routes: liveness plus read-only views of the scheduler and cache pools.
 */
import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import type { RouteDependencies } from '../types.js';
import { sendSuccess } from '../error-handler.js';

/** Register system routes on a Fastify instance. */
export function systemRoutes(fastify: FastifyInstance, opts: RouteDependencies): void {
  const { scheduler, taskRegistry, cacheRegistry } = opts;

  // GET /health
  fastify.get('/health', async (_request: FastifyRequest, reply: FastifyReply) => {
    await sendSuccess(reply, { status: 'ok', schedulerRunning: scheduler.isRunning() });
  });

  // GET /api/system/scheduler
  fastify.get('/api/system/scheduler', async (_request: FastifyRequest, reply: FastifyReply) => {
    await sendSuccess(reply, {
      running: scheduler.isRunning(),
      tasks: taskRegistry.snapshot(),
    });
  });

  // GET /api/system/cache
  fastify.get('/api/system/cache', async (_request: FastifyRequest, reply: FastifyReply) => {
    await sendSuccess(reply, { pools: cacheRegistry.stats() });
  });
}
