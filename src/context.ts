/**
 * Platform context — every long-lived object the host and the background
 * tasks share, built once at startup and passed explicitly.
 */
import type { AppManifest } from '@/apps/types.js';
import { installManifests, type InstallSummary } from '@/apps/registry.js';
import { createWorkforceAcceleratorManifest } from '@/apps/workforce-accelerator/manifest.js';
import type { NotificationRepository } from '@/apps/workforce-accelerator/lead-agent/types.js';
import { createOpenAIReportWriter } from '@/apps/workforce-accelerator/report-agent/report-writer.js';
import type { ReportRepository, ReportWriter } from '@/apps/workforce-accelerator/report-agent/types.js';
import type { CacheRegistry } from '@/cache/cache-registry.js';
import { createCacheRegistry } from '@/cache/cache-registry.js';
import type { CacheService } from '@/cache/cache-service.js';
import { createCacheService } from '@/cache/cache-service.js';
import { registerCorePools } from '@/cache/core-pools.js';
import { createTelegramNotifier, type TelegramNotifier } from '@/channels/telegram.js';
import type { PlatformConfig } from '@/config/loader.js';
import type { Clock } from '@/core/clock.js';
import { systemClock } from '@/core/clock.js';
import type { Queryable } from '@/infrastructure/database.js';
import { createNotificationRepository } from '@/infrastructure/repositories/notification-repository.js';
import { createReportRepository } from '@/infrastructure/repositories/report-repository.js';
import { createTaskLogRepository } from '@/infrastructure/repositories/task-log-repository.js';
import type { Logger } from '@/observability/logger.js';
import type { Scheduler } from '@/scheduling/scheduler.js';
import { createScheduler } from '@/scheduling/scheduler.js';
import type { TaskRegistry } from '@/scheduling/task-registry.js';
import { createTaskRegistry } from '@/scheduling/task-registry.js';
import type { TaskLogger } from '@/task-logging/task-logger.js';
import { createTaskLogger } from '@/task-logging/task-logger.js';

// ─── Types ──────────────────────────────────────────────────────

export interface PlatformContextOptions {
  config: PlatformConfig;
  database: Queryable;
  logger: Logger;
  clock?: Clock;
  fetch?: typeof fetch;
  /** Replaces the OpenAI-backed writer; tests pass a stub. */
  reportWriter?: ReportWriter;
}

export interface PlatformContext {
  cacheRegistry: CacheRegistry;
  cache: CacheService;
  taskRegistry: TaskRegistry;
  scheduler: Scheduler;
  taskLogger: TaskLogger;
  notifications: NotificationRepository;
  reports: ReportRepository;
  notifier: TelegramNotifier;
  manifests: AppManifest[];
  installed: InstallSummary;
  logger: Logger;
}

// ─── Factory ────────────────────────────────────────────────────

/**
 * Build the context and install every app manifest. The scheduler is
 * returned stopped; the caller starts it once the HTTP host is ready.
 */
export function createPlatformContext(options: PlatformContextOptions): PlatformContext {
  const { config, database, logger, clock = systemClock } = options;

  const cacheRegistry = createCacheRegistry({ logger, clock });
  registerCorePools(cacheRegistry);
  const cache = createCacheService({ registry: cacheRegistry, logger });

  const taskRegistry = createTaskRegistry();
  const scheduler = createScheduler({
    registry: taskRegistry,
    logger,
    clock,
    tickIntervalMs: config.scheduler.tickIntervalMs,
  });

  const taskLogger = createTaskLogger({
    repository: createTaskLogRepository(database),
    logger,
  });
  const notifications = createNotificationRepository(database);
  const reports = createReportRepository(database);

  const notifier = createTelegramNotifier({
    botToken: config.telegram.botToken,
    logger,
    fetchFn: options.fetch,
  });

  const openaiApiKey = config.reports.openaiApiKey;
  const reportWriter = options.reportWriter ?? (openaiApiKey
    ? createOpenAIReportWriter({ apiKey: openaiApiKey, model: config.reports.model, logger })
    : undefined);

  const manifests = [
    createWorkforceAcceleratorManifest({
      notifications,
      reports,
      sender: notifier,
      reportWriter,
      taskLogger,
      cache,
      logger,
      clock,
    }),
  ];

  const installed = installManifests(manifests, { cacheRegistry, taskRegistry, logger });
  logger.info('Platform context ready', {
    component: 'context',
    pools: cacheRegistry.poolNames(),
    tasks: installed.tasksRegistered,
  });

  return {
    cacheRegistry,
    cache,
    taskRegistry,
    scheduler,
    taskLogger,
    notifications,
    reports,
    notifier,
    manifests,
    installed,
    logger,
  };
}
