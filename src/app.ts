// src/app.ts
import express from 'express';
import helmet from 'helmet';
import type { Server } from 'http';
import { loadConfig } from './config/envConfig';
import type { LoadConfigOptions } from './config/envConfig';
import { initServiceContainer } from './services/serviceContainer';
import type { ServiceContainer } from './services/serviceContainer';
import { createLetterRoutes, LETTERS_BASE_PATH } from './services/letters/routes';
import { traceId } from './middlewares/traceId';
import { requestLogger } from './middlewares/requestLogger';
import { createRateLimiter } from './middlewares/rateLimiter';
import { allowGetPostOnly } from './middlewares/allowGetPostOnly';
import { validateDownloadPath } from './middlewares/validateDownloadPath';
import { errorHandler, notFoundHandler } from './middlewares/errorHandler';
import logger, { formatUptime } from './utils/logging';

export const JSON_BODY_LIMIT = '1mb';

/**
 * Express application wired to the given container. Does not listen.
 */
export function createApp(container: ServiceContainer) {
  const { config } = container;
  const startedAt = Date.now();

  const app = express();
  app.disable('x-powered-by');
  app.use(helmet());
  app.use(traceId);
  app.use(requestLogger);
  app.use(express.json({ limit: JSON_BODY_LIMIT }));

  app.get('/', (_req, res) => {
    res.json({ message: 'Letter Services API' });
  });

  app.get('/health', (_req, res) => {
    res.status(200).json({
      status: 'healthy',
      version: config.version,
      uptime_seconds: Math.floor((Date.now() - startedAt) / 1000),
    });
  });

  app.use(
    LETTERS_BASE_PATH,
    createRateLimiter({ windowMs: config.rateLimit.windowMs, max: config.rateLimit.max }),
    allowGetPostOnly,
    validateDownloadPath,
    createLetterRoutes(container)
  );

  app.use(notFoundHandler);
  app.use(errorHandler);

  logger.system('Express server configuration completed', {
    routes: ['/', '/health', `${LETTERS_BASE_PATH}/*`],
    middleware: ['helmet', 'traceId', 'requestLogger', 'express.json', 'rateLimiter'],
    json_body_limit: JSON_BODY_LIMIT,
  });

  return app;
}

export interface RunningApp {
  server: Server;
  container: ServiceContainer;
  shutdown: (signal: string) => Promise<void>;
}

/**
 * Load config, build the container, start the sweeper and listen.
 */
export async function startApp(options: LoadConfigOptions = {}): Promise<RunningApp> {
  logger.system('Starting Letter Services application', {
    node_version: process.version,
    platform: process.platform,
    environment: process.env.NODE_ENV || 'development',
  });

  const config = loadConfig(options);
  const container = initServiceContainer(config);

  if (config.cleanup.enabled) {
    container.cleanupService.start(config.cleanup.intervalSeconds);
  } else {
    logger.system('PDF cleanup disabled', { reason: 'cleanup.enabled is false' });
  }

  const app = createApp(container);

  const server = await new Promise<Server>((resolve, reject) => {
    const listening = app.listen(config.server.port, config.server.host, () => resolve(listening));
    listening.once('error', reject);
  });

  logger.system('Letter Services API started successfully', {
    host: config.server.host,
    port: config.server.port,
    listen_address: `${config.server.host}:${config.server.port}`,
    api_endpoints: {
      health: '/health',
      templates: `${LETTERS_BASE_PATH}/templates`,
      surat_tugas: `${LETTERS_BASE_PATH}/surat-tugas`,
      lembar_persetujuan: `${LETTERS_BASE_PATH}/lembar-persetujuan`,
      generate: `${LETTERS_BASE_PATH}/generate`,
      render: `${LETTERS_BASE_PATH}/render`,
    },
    ready: true,
  });

  const shutdown = async (signal: string): Promise<void> => {
    logger.system('Shutting down', { signal });
    await container.cleanupService.stop(config.cleanup.stopGraceMs);
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
    logger.system('Shutdown complete', { signal, uptime: formatUptime(process.uptime()) });
  };

  return { server, container, shutdown };
}
