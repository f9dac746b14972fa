/**
 * Route dependencies for API tests: real cache and scheduler objects over
 * a mocked report repository.
 */
import type { RouteDependencies } from '@/api/types.js';
import { createCacheRegistry } from '@/cache/cache-registry.js';
import { createCacheService } from '@/cache/cache-service.js';
import { registerCorePools } from '@/cache/core-pools.js';
import { createManualClock, type ManualClock } from '@/core/clock.js';
import { createScheduler } from '@/scheduling/scheduler.js';
import { createTaskRegistry } from '@/scheduling/task-registry.js';
import { createMockLogger, type MockLogger } from './logger.js';
import { createMockReportRepository } from './repositories.js';

export type TestRouteDependencies = RouteDependencies & {
  reports: ReturnType<typeof createMockReportRepository>;
  logger: MockLogger;
  clock: ManualClock;
};

export function createMockDeps(): TestRouteDependencies {
  const logger = createMockLogger();
  const clock = createManualClock(Date.parse('2025-03-01T12:00:00Z'));
  const cacheRegistry = createCacheRegistry({ logger, clock });
  registerCorePools(cacheRegistry);
  const taskRegistry = createTaskRegistry();

  return {
    cacheRegistry,
    cache: createCacheService({ registry: cacheRegistry, logger }),
    taskRegistry,
    scheduler: createScheduler({ registry: taskRegistry, logger, clock }),
    reports: createMockReportRepository(),
    logger,
    clock,
  };
}
