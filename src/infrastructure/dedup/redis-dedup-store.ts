import type { Redis } from 'ioredis';
import type { AppLogger } from '../logging/index.js';
import type { DedupStore } from '../../domain/index.js';

/** Dedup store on a Redis database, shared by every worker pointing at it. */
export class RedisDedupStore implements DedupStore {
  constructor(
    private readonly redis: Redis,
    private readonly log: AppLogger,
    readonly description: string,
  ) {}

  async has(key: string): Promise<boolean> {
    return (await this.redis.exists(key)) > 0;
  }

  async get(key: string): Promise<string | undefined> {
    return (await this.redis.get(key)) ?? undefined;
  }

  async put(key: string, value: string, ttlSeconds?: number): Promise<void> {
    this.log.info({ key }, 'Save ID in cache');
    if (ttlSeconds !== undefined) {
      await this.redis.set(key, value, 'EX', ttlSeconds);
    } else {
      await this.redis.set(key, value);
    }
  }

  async delete(key: string): Promise<boolean> {
    return (await this.redis.del(key)) > 0;
  }

  async close(): Promise<void> {
    await this.redis.quit();
  }
}
