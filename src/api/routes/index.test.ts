import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import { agentId, appId } from '@/core/types.js';
import type { AppManifest } from '@/apps/types.js';
import { createMockDeps } from '@/testing/fixtures/routes.js';
import { registerErrorHandler, sendSuccess } from '../error-handler.js';
import { registerRoutes } from './index.js';

const manifest: AppManifest = {
  appId: appId('field-ops'),
  name: 'Field Ops',
  description: 'Dispatch for field technicians',
  icon: 'wrench',
  cachePools: [],
  routes: (fastify) => {
    fastify.get('/info', async (_request, reply) => sendSuccess(reply, { app: 'field-ops' }));
  },
  agents: [
    {
      agentId: agentId('dispatcher'),
      name: 'Dispatcher',
      description: 'Assigns jobs',
      scheduledTasks: [],
      routes: (fastify) => {
        fastify.get('/queue', async (_request, reply) => sendSuccess(reply, []));
      },
    },
  ],
};

let app: FastifyInstance;

beforeEach(async () => {
  const deps = createMockDeps();
  app = Fastify();
  registerErrorHandler(app, deps.logger);
  await registerRoutes(app, deps, [manifest]);
  await app.ready();
});

afterEach(async () => {
  await app.close();
});

describe('registerRoutes', () => {
  it('mounts platform routes', async () => {
    const response = await app.inject({ method: 'GET', url: '/health' });

    expect(response.statusCode).toBe(200);
  });

  it('mounts app routes under /api/apps/{appId}', async () => {
    const response = await app.inject({ method: 'GET', url: '/api/apps/field-ops/info' });

    expect(response.json()).toEqual({ success: true, data: { app: 'field-ops' } });
  });

  it('mounts agent routes under /api/apps/{appId}/{agentId}', async () => {
    const response = await app.inject({
      method: 'GET',
      url: '/api/apps/field-ops/dispatcher/queue',
    });

    expect(response.json()).toEqual({ success: true, data: [] });
  });
});
