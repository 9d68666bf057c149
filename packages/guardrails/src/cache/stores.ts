/**
 * FILE PURPOSE: Cache store backends for the decision cache
 *
 * HOW: RedisCacheStore uses ioredis (SET ... EX ttl). MemoryCacheStore is the
 *      in-process fallback when REDIS_URL is not set, and the test stand-in.
 */

import { Redis } from 'ioredis';
import type { CacheStore } from '../types.js';

export class RedisCacheStore implements CacheStore {
  private readonly redis: Redis;

  constructor(redisOrUrl: Redis | string) {
    if (typeof redisOrUrl === 'string') {
      this.redis = new Redis(redisOrUrl, {
        maxRetriesPerRequest: 1,
        retryStrategy(times: number) {
          if (times > 3) return null;
          return Math.min(times * 200, 1000);
        },
        lazyConnect: true,
      });
      this.redis.on('error', (err: Error) => {
        process.stderr.write(`WARN: Decision cache Redis error: ${err.message}\n`);
      });
    } else {
      this.redis = redisOrUrl;
    }
  }

  async get(key: string): Promise<string | null> {
    return this.redis.get(key);
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    await this.redis.set(key, value, 'EX', ttlSeconds);
  }

  async close(): Promise<void> {
    try {
      await this.redis.quit();
    } catch {
      process.stderr.write('WARN: Error closing decision cache Redis connection\n');
    }
  }
}

interface MemoryEntry {
  value: string;
  expiresAt: number;
}

export class MemoryCacheStore implements CacheStore {
  private readonly entries = new Map<string, MemoryEntry>();

  constructor(private readonly now: () => number = Date.now) {}

  async get(key: string): Promise<string | null> {
    const entry = this.entries.get(key);
    if (!entry) return null;
    if (entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return null;
    }
    return entry.value;
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    this.entries.set(key, { value, expiresAt: this.now() + ttlSeconds * 1000 });
  }

  get size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
  }
}

/** Redis when a URL is available, otherwise process memory. */
export function createCacheStore(redisUrl: string | undefined = process.env.REDIS_URL): CacheStore {
  if (redisUrl) return new RedisCacheStore(redisUrl);
  process.stderr.write('WARN: REDIS_URL not set; decision cache is in-process only\n');
  return new MemoryCacheStore();
}
