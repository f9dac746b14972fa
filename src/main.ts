import 'dotenv/config';
import Fastify from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import rateLimit from '@fastify/rate-limit';
import { registerErrorHandler } from '@/api/error-handler.js';
import { registerRoutes } from '@/api/routes/index.js';
import { loadPlatformConfig } from '@/config/loader.js';
import { createPlatformContext } from '@/context.js';
import { createDatabase } from '@/infrastructure/database.js';
import { createLogger } from '@/observability/logger.js';

async function start(): Promise<void> {
  const loaded = loadPlatformConfig();
  if (!loaded.ok) {
    const bootLogger = createLogger();
    bootLogger.fatal(loaded.error.message, {
      component: 'main',
      ...loaded.error.context,
    });
    process.exit(1);
  }
  const config = loaded.value;
  const logger = createLogger({ level: config.logLevel });

  const server = Fastify({ logger: false });

  try {
    const db = createDatabase({
      url: config.database.url,
      logQueries: config.logLevel === 'debug',
    });
    await db.connect();

    const context = createPlatformContext({ config, database: db, logger });

    // The Mini-App is the only browser client
    await server.register(cors, { origin: config.appUrl });
    await server.register(helmet);
    await server.register(rateLimit, { max: 100, timeWindow: '1 minute' });

    registerErrorHandler(server, logger);
    await registerRoutes(
      server,
      {
        cacheRegistry: context.cacheRegistry,
        cache: context.cache,
        taskRegistry: context.taskRegistry,
        scheduler: context.scheduler,
        reports: context.reports,
      },
      context.manifests,
    );

    // Graceful shutdown
    const shutdown = async (): Promise<void> => {
      logger.info('Shutting down...', { component: 'main' });
      await context.scheduler.stop();
      await server.close();
      await db.disconnect();
    };

    process.on('SIGTERM', () => void shutdown());
    process.on('SIGINT', () => void shutdown());

    await context.scheduler.start();
    const { host, port } = config.server;
    await server.listen({ port, host });
    logger.info(`Server listening on ${host}:${port}`, { component: 'main' });
  } catch (err: unknown) {
    logger.fatal('Failed to start server', {
      component: 'main',
      error: err instanceof Error ? err.message : String(err),
    });
    process.exit(1);
  }
}

void start();
