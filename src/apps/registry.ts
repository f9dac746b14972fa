/**
 * Manifest installation. Runs once at startup, before the scheduler starts:
 * every declared pool first, then every agent's tasks.
 */
import type { CacheRegistry } from '@/cache/cache-registry.js';
import type { Logger } from '@/observability/logger.js';
import type { TaskRegistry } from '@/scheduling/task-registry.js';
import type { AppManifest } from './types.js';

export interface InstallTargets {
  cacheRegistry: CacheRegistry;
  taskRegistry: TaskRegistry;
  logger: Logger;
}

export interface InstallSummary {
  apps: number;
  /** Pools newly created; a pool another app already declared is not counted. */
  poolsCreated: number;
  tasksRegistered: number;
}

/**
 * Register the pools and scheduled tasks every manifest declares.
 * Task registration errors (duplicate name, sealed registry) propagate.
 */
export function installManifests(
  manifests: readonly AppManifest[],
  targets: InstallTargets,
): InstallSummary {
  const { cacheRegistry, taskRegistry, logger } = targets;
  let poolsCreated = 0;
  let tasksRegistered = 0;

  for (const manifest of manifests) {
    for (const { name, maxSize, ttlSeconds } of manifest.cachePools) {
      if (cacheRegistry.registerPool(name, { maxSize, ttlSeconds })) {
        poolsCreated++;
      }
    }
  }

  for (const manifest of manifests) {
    for (const agent of manifest.agents) {
      for (const task of agent.scheduledTasks) {
        taskRegistry.register({
          ...task,
          owner: `${manifest.appId}/${agent.agentId}`,
        });
        tasksRegistered++;
      }
    }
  }

  const summary: InstallSummary = { apps: manifests.length, poolsCreated, tasksRegistered };
  logger.info('App manifests installed', { component: 'apps', ...summary });
  return summary;
}
