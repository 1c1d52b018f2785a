import express from 'express';
import { loadConfig } from './config/config.js';
import { createSessionRouter } from './http/routes.js';
import { logger } from './observability/logger.js';
import { getSessionRedis, isRedisHealthy, shutdownRedis } from './persistence/redis-client.js';
import { createSessionManager } from './runtime.js';

const config = loadConfig({ loadDotenv: true });
logger.setLevel(config.logLevel);

export function storageMode(): 'file' | 'redis' | 'degraded' {
  if (!config.redisUrl) return 'file';
  return isRedisHealthy() ? 'redis' : 'degraded';
}

const manager = createSessionManager(config, { repoRoot: process.cwd() });

const app = express();

app.get('/health', (_req, res) => {
  res.status(200).json({ status: 'ok', storage: storageMode() });
});

app.use('/sessions', createSessionRouter(manager, config));

const server = app.listen(config.port, () => {
  logger.info('server_started', 'linequeue server listening', {
    port: config.port,
    storage: storageMode(),
  });

  // a long-running server dials Redis up front so /health reflects it
  getSessionRedis()?.connected().catch(error => {
    logger.warn('redis_initialization', 'Redis not reachable at startup', {
      error: error instanceof Error ? error.message : 'Unknown error',
    });
  });
});

function shutdown(signal: string): void {
  logger.info('shutdown', `${signal} received, graceful shutdown`);
  server.close(() => {
    shutdownRedis()
      .catch(error => {
        logger.error('shutdown', 'Redis shutdown failed', {
          error: error instanceof Error ? error.message : 'Unknown error',
        });
      })
      .finally(() => process.exit(0));
  });
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
