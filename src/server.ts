import express, { type Express, type Request, type Response } from 'express';
import type { Server } from 'http';
import * as path from 'path';
import { config as defaultConfig } from './config/config';
import { type AppContext, createAppContext } from './service/container';
import { createBatchRoutes } from './routes/batchRoutes';
import { cleanupOrphanedTempFiles } from './storage/jsonStore';
import { logger } from './utils/logger';
import { describeError } from './utils/errorHandler';

export function createApp(context: AppContext): Express {
  const app = express();

  app.use(express.json({ limit: '100kb' }));

  app.use(context.config.server.artifactRoute, express.static(context.artifactDir, {
    immutable: true,
    maxAge: '7d',
  }));

  app.use('/api', createBatchRoutes(context.service));

  app.get('/health', async (_req: Request, res: Response) => {
    const cache = await context.service.cacheStatus();
    let faceModel: 'ready' | 'unavailable' = 'ready';
    try {
      await context.faceModel.ensureReady();
    } catch (error) {
      logger.warn(`Health check: face model unavailable (${describeError(error)})`);
      faceModel = 'unavailable';
    }
    res.json({
      status: faceModel === 'ready' ? 'ok' : 'degraded',
      timestamp: new Date().toISOString(),
      faceModel,
      cache: { present: cache.present, valid: cache.valid, ageMs: cache.ageMs, regenerating: cache.regenerating },
    });
  });

  return app;
}

/**
 * Starts the HTTP server and the cache warmer, with shutdown on SIGINT/SIGTERM.
 */
export async function startServer(context: AppContext = createAppContext(defaultConfig)): Promise<Server> {
  const cacheDir = path.dirname(path.resolve(context.config.cache.filePath));
  await cleanupOrphanedTempFiles(cacheDir);

  const app = createApp(context);
  const port = context.config.server.port;

  const server = app.listen(port, '0.0.0.0', () => {
    logger.info(`Server started on port ${port}`);
    logger.info(`Batch endpoint: http://localhost:${port}/api/batch`);
    logger.info(`Health check: http://localhost:${port}/health`);
    context.warmer.start();
  });

  let isShuttingDown = false;
  const gracefulShutdown = (signal: string) => {
    if (isShuttingDown) {
      logger.debug(`Shutdown already in progress, ignoring ${signal}`);
      return;
    }
    isShuttingDown = true;
    logger.info(`${signal} received, shutting down gracefully...`);

    context.warmer.stop();
    context.batchCache.abortRegeneration();
    server.close(() => {
      logger.info('HTTP server closed');
      process.exit(0);
    });
  };

  process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
  process.on('SIGINT', () => gracefulShutdown('SIGINT'));
  process.on('unhandledRejection', (reason: unknown) => {
    // Logged only: per-request failures are already mapped to responses
    logger.error(`Unhandled rejection: ${describeError(reason)}`);
  });

  return server;
}

if (require.main === module) {
  startServer().catch((error: unknown) => {
    logger.error(`Failed to start server: ${describeError(error)}`);
    process.exit(1);
  });
}
