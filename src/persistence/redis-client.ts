import { Redis } from 'ioredis';
import { logger } from '../observability/logger.js';

/** Namespace for every key linequeue writes to a shared Redis. */
export const SESSION_NAMESPACE = 'linequeue:';

const CONNECT_TIMEOUT_MS = 5000;
const COMMAND_TIMEOUT_MS = 2000;
const MAX_CONNECT_RETRIES = 3;

/** Delay before reconnect attempt `times`, or null to give up. */
export function reconnectDelay(times: number): number | null {
  if (times > MAX_CONNECT_RETRIES) return null;
  return Math.min(times * 200, 2000);
}

/**
 * Connection behind the Redis session store. It opens on the first command,
 * so CLI runs that never touch a session never dial Redis. There is no
 * offline queue: a command issued while Redis is unreachable rejects, the
 * write-ahead persist fails and the mutation is rolled back.
 */
export class SessionRedis {
  readonly client: Redis;
  private ready = false;
  private connecting: Promise<void> | null = null;

  constructor(url: string) {
    this.client = new Redis(url, {
      keyPrefix: SESSION_NAMESPACE,
      connectTimeout: CONNECT_TIMEOUT_MS,
      commandTimeout: COMMAND_TIMEOUT_MS,
      retryStrategy: (times: number) => {
        const delay = reconnectDelay(times);
        if (delay === null) {
          logger.error('redis_connection', 'Max retries exceeded, giving up', { times });
        } else {
          logger.warn('redis_connection', 'Retrying connection', { times, delay });
        }
        return delay;
      },
      maxRetriesPerRequest: 1,
      enableOfflineQueue: false,
      lazyConnect: true,
    });

    this.client.on('ready', () => {
      logger.info('redis_lifecycle', 'Redis ready');
      this.ready = true;
    });
    this.client.on('error', (error: Error) => {
      logger.error('redis_lifecycle', 'Redis error', { error: error.message });
      this.ready = false;
    });
    this.client.on('end', () => {
      logger.warn('redis_lifecycle', 'Redis connection ended');
      this.ready = false;
    });
  }

  isHealthy(): boolean {
    return this.ready;
  }

  /** The client, once connected. Concurrent callers share one connect attempt. */
  async connected(): Promise<Redis> {
    const status = this.client.status;
    if (!this.connecting && (status === 'wait' || status === 'end')) {
      this.connecting = this.client.connect().finally(() => {
        this.connecting = null;
      });
    }
    if (this.connecting) {
      await this.connecting;
    }
    return this.client;
  }

  async close(): Promise<void> {
    if (this.client.status === 'wait' || this.client.status === 'end') {
      this.client.disconnect();
      return;
    }
    await this.client.quit();
  }
}

let shared: SessionRedis | null = null;

/** The shared connection, or null when no URL is configured or creation failed. */
export function initializeRedis(url?: string): SessionRedis | null {
  if (!url) {
    logger.info('redis_initialization', 'REDIS_URL not provided, sessions stay on local disk');
    return null;
  }
  if (shared) {
    return shared;
  }

  try {
    shared = new SessionRedis(url);
    logger.info('redis_initialization', 'Redis session connection configured', { namespace: SESSION_NAMESPACE });
  } catch (error) {
    logger.error('redis_initialization', 'Failed to initialize Redis', {
      error: error instanceof Error ? error.message : 'Unknown error',
    });
    shared = null;
  }
  return shared;
}

export function getSessionRedis(): SessionRedis | null {
  return shared;
}

export function isRedisHealthy(): boolean {
  return shared !== null && shared.isHealthy();
}

export async function shutdownRedis(): Promise<void> {
  if (shared) {
    logger.info('redis_shutdown', 'Shutting down Redis connection');
    const closing = shared;
    shared = null;
    await closing.close();
  }
}
