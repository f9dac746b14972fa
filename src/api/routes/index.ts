/**
 * Route registration — platform routes first, then whatever each app manifest mounts.
 */
import type { FastifyInstance } from 'fastify';
import type { AppManifest, ManifestRoutes } from '@/apps/types.js';
import type { RouteDependencies } from '../types.js';
import { reportRoutes } from './reports.js';
import { systemRoutes } from './system.js';

async function mount(fastify: FastifyInstance, routes: ManifestRoutes, prefix: string): Promise<void> {
  await fastify.register(
    async (instance) => {
      routes(instance);
    },
    { prefix },
  );
}

/** Register all API routes on the Fastify instance. */
export async function registerRoutes(
  fastify: FastifyInstance,
  deps: RouteDependencies,
  manifests: readonly AppManifest[] = [],
): Promise<void> {
  await fastify.register(async (instance) => {
    systemRoutes(instance, deps);
    reportRoutes(instance, deps);
  });

  for (const manifest of manifests) {
    const appPrefix = `/api/apps/${manifest.appId}`;
    if (manifest.routes) {
      await mount(fastify, manifest.routes, appPrefix);
    }
    for (const agent of manifest.agents) {
      if (agent.routes) {
        await mount(fastify, agent.routes, `${appPrefix}/${agent.agentId}`);
      }
    }
  }
}
