/**
 * App manifests — how an installable app declares its cache pools,
 * agents, background tasks and HTTP routes to the platform.
 */
import type { FastifyInstance } from 'fastify';
import type { AgentId, AppId } from '@/core/types.js';
import type { CachePoolDeclaration } from '@/cache/types.js';
import type { TaskCondition, TaskWork } from '@/scheduling/types.js';

export type { CachePoolDeclaration } from '@/cache/types.js';

/** Registers routes on an instance already scoped to the app or agent prefix. */
export type ManifestRoutes = (fastify: FastifyInstance) => void;

export interface ScheduledTaskDeclaration {
  /** Unique across all apps, conventionally `{app}:{agent}:{job}`. */
  name: string;
  intervalSeconds: number;
  run: TaskWork;
  condition?: TaskCondition;
}

export interface AgentManifest {
  agentId: AgentId;
  name: string;
  description: string;
  scheduledTasks: ScheduledTaskDeclaration[];
  /** Mounted under `/api/apps/{appId}/{agentId}`. */
  routes?: ManifestRoutes;
}

export interface AppManifest {
  appId: AppId;
  name: string;
  description: string;
  icon: string;
  cachePools: CachePoolDeclaration[];
  agents: AgentManifest[];
  /** Mounted under `/api/apps/{appId}`. */
  routes?: ManifestRoutes;
}
