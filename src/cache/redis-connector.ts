import type { KeyValueConnector } from './connector.ts';

// The slice of the ioredis client this connector uses. `Redis` from ioredis
// satisfies it structurally; tests pass a FakeRedis.
export interface RedisLike {
  getBuffer(key: string): Promise<Buffer | null>;
  set(key: string, value: Buffer): Promise<unknown>;
  set(key: string, value: Buffer, mode: 'PX', ttlMs: number): Promise<unknown>;
}

export class RedisConnector implements KeyValueConnector {
  constructor(private redis: RedisLike) {}

  async get(key: string): Promise<Buffer | null> {
    return this.redis.getBuffer(key);
  }

  async set(key: string, value: Buffer, ttlMs?: number): Promise<void> {
    if (ttlMs !== undefined && ttlMs > 0) {
      // SET <key> <value> PX <ms>
      await this.redis.set(key, value, 'PX', Math.ceil(ttlMs));
      return;
    }
    await this.redis.set(key, value);
  }
}
