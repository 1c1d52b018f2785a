import { mkdir, readFile, readdir, rename, rm, unlink, writeFile } from 'fs/promises';
import path from 'path';
import type { SessionStore, StoreKind } from '../persistence/types.js';
import { SESSION_NAMESPACE, getSessionRedis, initializeRedis } from '../persistence/redis-client.js';
import { logger } from '../observability/logger.js';

const REDIS_KEY_PREFIX = 'session:';
const FILE_SUFFIX = '.json';

export class InMemorySessionStore implements SessionStore {
  readonly kind: StoreKind = 'memory';
  private readonly records = new Map<string, string>();

  async read(changeId: string): Promise<string | null> {
    return this.records.get(changeId) ?? null;
  }

  async write(changeId: string, serialized: string): Promise<void> {
    this.records.set(changeId, serialized);
  }

  async delete(changeId: string): Promise<boolean> {
    return this.records.delete(changeId);
  }

  async list(): Promise<string[]> {
    return Array.from(this.records.keys()).sort();
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * One JSON file per change, `<dir>/<changeId>.json`. Writes go to a temp file
 * in the same directory and are renamed into place, so a reader sees either
 * the old record or the new one.
 */
export class FileSessionStore implements SessionStore {
  readonly kind: StoreKind = 'file';

  constructor(private readonly directory: string) {}

  pathFor(changeId: string): string {
    return path.join(this.directory, `${encodeURIComponent(changeId)}${FILE_SUFFIX}`);
  }

  async read(changeId: string): Promise<string | null> {
    try {
      return await readFile(this.pathFor(changeId), 'utf8');
    } catch (error) {
      if (isNotFound(error)) return null;
      throw error;
    }
  }

  async write(changeId: string, serialized: string): Promise<void> {
    const target = this.pathFor(changeId);
    const temp = `${target}.${process.pid}.${Date.now()}.tmp`;

    await mkdir(this.directory, { recursive: true });
    try {
      await writeFile(temp, serialized, 'utf8');
      await rename(temp, target);
    } catch (error) {
      await rm(temp, { force: true });
      logger.error('session_store_write_failed', 'Failed to write session file', {
        file: target,
        error: error instanceof Error ? error.message : 'Unknown error',
      });
      throw error;
    }
  }

  async delete(changeId: string): Promise<boolean> {
    try {
      await unlink(this.pathFor(changeId));
      return true;
    } catch (error) {
      if (isNotFound(error)) return false;
      throw error;
    }
  }

  async list(): Promise<string[]> {
    try {
      const entries = await readdir(this.directory);
      return entries
        .filter(entry => entry.endsWith(FILE_SUFFIX))
        .map(entry => decodeURIComponent(entry.slice(0, -FILE_SUFFIX.length)))
        .sort();
    } catch (error) {
      if (isNotFound(error)) return [];
      throw error;
    }
  }
}

/**
 * Records under `session:<changeId>` inside the linequeue namespace. A
 * command that cannot reach Redis rejects, so the caller can roll back.
 */
export class RedisSessionStore implements SessionStore {
  readonly kind: StoreKind = 'redis';

  private async client() {
    const connection = getSessionRedis();
    if (!connection) {
      throw new Error('Redis session store used without a Redis connection');
    }
    return connection.connected();
  }

  async read(changeId: string): Promise<string | null> {
    return (await this.client()).get(`${REDIS_KEY_PREFIX}${changeId}`);
  }

  async write(changeId: string, serialized: string): Promise<void> {
    await (await this.client()).set(`${REDIS_KEY_PREFIX}${changeId}`, serialized);
  }

  async delete(changeId: string): Promise<boolean> {
    const removed = await (await this.client()).del(`${REDIS_KEY_PREFIX}${changeId}`);
    return removed > 0;
  }

  // KEYS patterns and replies carry the namespace; other commands add it
  async list(): Promise<string[]> {
    const namespaced = `${SESSION_NAMESPACE}${REDIS_KEY_PREFIX}`;
    const keys = await (await this.client()).keys(`${namespaced}*`);
    return keys.map(key => key.slice(namespaced.length)).sort();
  }
}

export interface StoreOptions {
  redisUrl?: string;
  stateDir?: string;
  repoRoot: string;
}

export function defaultStateDir(repoRoot: string): string {
  return path.join(repoRoot, '.git', 'linequeue');
}

export function createSessionStore(options: StoreOptions): SessionStore {
  if (options.redisUrl && initializeRedis(options.redisUrl)) {
    return new RedisSessionStore();
  }
  return new FileSessionStore(options.stateDir ?? defaultStateDir(options.repoRoot));
}
