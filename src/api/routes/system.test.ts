import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import { registerErrorHandler } from '../error-handler.js';
import { createMockDeps, type TestRouteDependencies } from '@/testing/fixtures/routes.js';
import { systemRoutes } from './system.js';

// ─── Setup ──────────────────────────────────────────────────────

let app: FastifyInstance;
let deps: TestRouteDependencies;

beforeEach(async () => {
  deps = createMockDeps();
  app = Fastify();
  registerErrorHandler(app, deps.logger);
  systemRoutes(app, deps);
  await app.ready();
});

afterEach(async () => {
  await app.close();
});

// ─── Tests ──────────────────────────────────────────────────────

describe('GET /health', () => {
  it('reports ok and whether the scheduler runs', async () => {
    const response = await app.inject({ method: 'GET', url: '/health' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({
      success: true,
      data: { status: 'ok', schedulerRunning: false },
    });
  });
});

describe('GET /api/system/scheduler', () => {
  it('lists registered tasks with their last run', async () => {
    deps.taskRegistry.register({
      name: 'wa:lead-agent:notifications',
      owner: 'workforce-accelerator/lead-agent',
      intervalSeconds: 60,
      run: () => Promise.resolve(),
    });
    const task = deps.taskRegistry.get('wa:lead-agent:notifications');
    if (task) task.lastRunAt = Date.parse('2025-03-01T11:59:00Z');

    const response = await app.inject({ method: 'GET', url: '/api/system/scheduler' });

    expect(response.json()).toEqual({
      success: true,
      data: {
        running: false,
        tasks: [
          {
            name: 'wa:lead-agent:notifications',
            owner: 'workforce-accelerator/lead-agent',
            intervalSeconds: 60,
            hasCondition: false,
            enabled: true,
            lastRunAt: '2025-03-01T11:59:00.000Z',
          },
        ],
      },
    });
  });
});

describe('GET /api/system/cache', () => {
  it('returns every pool with its size', async () => {
    deps.cache.set('org', 'org:1', { name: 'Acme' });

    const response = await app.inject({ method: 'GET', url: '/api/system/cache' });
    const body = response.json<{ data: { pools: { name: string; size: number }[] } }>();

    expect(body.data.pools.map((p) => p.name)).toEqual([
      'auth',
      'org',
      'catalog',
      'plans',
      'analytics',
      'reports',
    ]);
    expect(body.data.pools.find((p) => p.name === 'org')?.size).toBe(1);
  });
});
