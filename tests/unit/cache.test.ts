/**
 * Cache Store Tests
 */

import { describe, it, expect, vi } from 'vitest';

import type { Clock } from '../../src/ai/content/types';
import { MemoryCacheStore, parseRedisUrl, RedisCacheStore, type RedisLikeClient } from '../../src/cache';
import { createSilentLogger } from '../helpers/agent-deps';

function createFakeRedis(): RedisLikeClient & { data: Map<string, string> } {
  const data = new Map<string, string>();
  return {
    data,
    get: vi.fn(async (key: string) => data.get(key) ?? null),
    set: vi.fn(async (key: string, value: string) => {
      data.set(key, value);
      return 'OK';
    }),
    quit: vi.fn(async () => 'OK'),
  };
}

describe('parseRedisUrl', () => {
  it('reads host, port, password and db', () => {
    expect(parseRedisUrl('redis://:test-password@cache.local:6380/2')).toEqual({
      host: 'cache.local',
      port: 6380,
      password: 'test-password',
      db: 2,
    });
  });

  it('defaults the port and leaves the db unset', () => {
    expect(parseRedisUrl('redis://localhost')).toEqual({
      host: 'localhost',
      port: 6379,
      password: undefined,
      db: undefined,
    });
  });
});

describe('MemoryCacheStore', () => {
  it('expires entries after their TTL', async () => {
    let now = 0;
    const clock: Clock = { now: () => now };
    const cache = new MemoryCacheStore(clock);

    await cache.set('research:bees', 'value', 10);
    now = 9_999;
    expect(await cache.get('research:bees')).toBe('value');

    now = 10_000;
    expect(await cache.get('research:bees')).toBeNull();
    expect(cache.size).toBe(0);
  });

  it('stores nothing for a TTL of zero', async () => {
    const cache = new MemoryCacheStore();

    await cache.set('research:bees', 'value', 0);

    expect(cache.size).toBe(0);
  });
});

describe('RedisCacheStore', () => {
  it('writes with an expiry in whole seconds', async () => {
    const client = createFakeRedis();
    const cache = new RedisCacheStore(client, createSilentLogger());

    await cache.set('research:bees', 'value', 90.7);

    expect(client.set).toHaveBeenCalledWith('research:bees', 'value', 'EX', 90);
    expect(await cache.get('research:bees')).toBe('value');
  });

  it('skips writes for a TTL of zero', async () => {
    const client = createFakeRedis();

    await new RedisCacheStore(client, createSilentLogger()).set('research:bees', 'value', 0);

    expect(client.set).not.toHaveBeenCalled();
  });

  it('reads a failed lookup as a miss', async () => {
    const client = createFakeRedis();
    vi.mocked(client.get).mockRejectedValueOnce(new Error('ECONNREFUSED'));
    const logger = createSilentLogger();
    const cache = new RedisCacheStore(client, logger);

    expect(await cache.get('research:bees')).toBeNull();
    expect(logger.warn).toHaveBeenCalledWith('Cache read failed for "research:bees": ECONNREFUSED');
  });

  it('logs failed writes instead of throwing', async () => {
    const client = createFakeRedis();
    vi.mocked(client.set).mockRejectedValueOnce(new Error('READONLY'));
    const logger = createSilentLogger();

    await new RedisCacheStore(client, logger).set('research:bees', 'value', 60);

    expect(logger.warn).toHaveBeenCalledWith('Cache write failed for "research:bees": READONLY');
  });

  it('quits the client on close', async () => {
    const client = createFakeRedis();

    await new RedisCacheStore(client, createSilentLogger()).close();

    expect(client.quit).toHaveBeenCalledTimes(1);
  });
});
