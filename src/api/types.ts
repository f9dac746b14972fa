import type { CacheRegistry } from '@/cache/cache-registry.js';
import type { CacheService } from '@/cache/cache-service.js';
import type { ReportRepository } from '@/apps/workforce-accelerator/report-agent/types.js';
import type { Scheduler } from '@/scheduling/scheduler.js';
import type { TaskRegistry } from '@/scheduling/task-registry.js';

// ─── API Response Envelope ───────────────────────────────────────

export interface ApiResponse<T> {
  success: boolean;
  data?: T;
  error?: ApiError;
}

export interface ApiError {
  code: string;
  message: string;
  details?: Record<string, unknown>;
}

// ─── Route Dependencies (DI) ───────────────────────────────────

/** Everything the platform-level routes read from. */
export interface RouteDependencies {
  cacheRegistry: CacheRegistry;
  cache: CacheService;
  taskRegistry: TaskRegistry;
  scheduler: Scheduler;
  reports: ReportRepository;
}
