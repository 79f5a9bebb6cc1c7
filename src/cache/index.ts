/**
 * Cache Stores
 *
 * String key/value cache with per-entry TTL. Redis (via ioredis) when REDIS_URL is
 * reachable, an in-process Map otherwise and in tests. Callers serialize values.
 */

import { Redis } from 'ioredis';

import { errorMessage, systemClock, type Clock } from '../ai/content/types';
import { createPrefixedLogger, type Logger } from '../utils/logger';

export interface CacheStore {
  get(key: string): Promise<string | null>;
  /** A TTL of 0 or less stores nothing */
  set(key: string, value: string, ttlSeconds: number): Promise<void>;
  close(): Promise<void>;
}

// ============================================================================
// Redis
// ============================================================================

/**
 * The subset of the ioredis client used here.
 */
export interface RedisLikeClient {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, mode: 'EX', seconds: number): Promise<unknown>;
  quit(): Promise<unknown>;
}

export function parseRedisUrl(redisUrl: string): {
  host: string;
  port: number;
  password?: string;
  db?: number;
} {
  const u = new URL(redisUrl);
  const host = u.hostname;
  const port = u.port ? Number(u.port) : 6379;
  const password = u.password ? decodeURIComponent(u.password) : undefined;
  const dbPath = u.pathname.replace(/^\//, '');
  const db = dbPath ? Number(dbPath) : undefined;
  return { host, port, password, db: Number.isInteger(db) ? db : undefined };
}

/**
 * Redis-backed cache. Connection and command errors are logged and read as a miss.
 */
export class RedisCacheStore implements CacheStore {
  private readonly log: Logger;

  constructor(
    private readonly client: RedisLikeClient,
    logger?: Logger
  ) {
    this.log = logger ?? createPrefixedLogger('[Cache]');
  }

  static fromUrl(redisUrl: string, logger?: Logger): RedisCacheStore {
    const log = logger ?? createPrefixedLogger('[Cache]');
    const client = new Redis({
      ...parseRedisUrl(redisUrl),
      lazyConnect: true,
      maxRetriesPerRequest: 1,
      enableOfflineQueue: true,
    });
    client.on('error', (error: Error) => {
      log.warn(`Redis error: ${error.message}`);
    });
    return new RedisCacheStore(client, log);
  }

  async get(key: string): Promise<string | null> {
    try {
      return await this.client.get(key);
    } catch (error) {
      this.log.warn(`Cache read failed for "${key}": ${errorMessage(error)}`);
      return null;
    }
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    if (ttlSeconds <= 0) return;
    try {
      await this.client.set(key, value, 'EX', Math.floor(ttlSeconds));
    } catch (error) {
      this.log.warn(`Cache write failed for "${key}": ${errorMessage(error)}`);
    }
  }

  async close(): Promise<void> {
    try {
      await this.client.quit();
    } catch (error) {
      this.log.warn(`Redis quit failed: ${errorMessage(error)}`);
    }
  }
}

// ============================================================================
// In-memory
// ============================================================================

interface MemoryEntry {
  readonly value: string;
  readonly expiresAt: number;
}

export class MemoryCacheStore implements CacheStore {
  private readonly entries = new Map<string, MemoryEntry>();

  constructor(private readonly clock: Clock = systemClock) {}

  async get(key: string): Promise<string | null> {
    const entry = this.entries.get(key);
    if (!entry) return null;
    if (this.clock.now() >= entry.expiresAt) {
      this.entries.delete(key);
      return null;
    }
    return entry.value;
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    if (ttlSeconds <= 0) return;
    this.entries.set(key, { value, expiresAt: this.clock.now() + ttlSeconds * 1000 });
  }

  async close(): Promise<void> {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}
