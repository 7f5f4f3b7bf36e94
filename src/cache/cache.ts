// Namespaced, TTL-aware cache over a byte connector

import { z } from 'zod';
import { log as rootLog, type Logger } from '../utils/logger.ts';
import type { KeyValueConnector } from './connector.ts';

export interface Cache {
  get(key: string): Promise<Buffer | null>;
  /** Zero-length values are reserved as the deletion marker and rejected. */
  set(key: string, value: Buffer, ttlMs?: number): Promise<void>;
  getJSON<T>(key: string, schema: z.ZodType<T>): Promise<T | null>;
  setJSON(key: string, value: unknown, ttlMs?: number): Promise<void>;
  has(key: string): Promise<boolean>;
  delete(key: string): Promise<void>;
}

export const DELETE_TTL_MS = 1;

export interface SimpleCacheOptions {
  prefix: string;
  /** applied when a write passes no TTL; 0 stores without expiry */
  defaultTtlMs?: number;
  log?: Logger;
}

export class SimpleCache implements Cache {
  private readonly prefix: string;
  private readonly defaultTtlMs: number;
  private readonly log: Logger;

  constructor(
    private connector: KeyValueConnector,
    opts: SimpleCacheOptions,
  ) {
    this.prefix = opts.prefix;
    this.defaultTtlMs = opts.defaultTtlMs ?? 0;
    this.log = opts.log ?? rootLog.child('cache');
  }

  private key(key: string) {
    return this.prefix ? `${this.prefix}:${key}` : key;
  }

  // A zero-length payload is the deletion marker and reads as absent.
  async get(key: string): Promise<Buffer | null> {
    const value = await this.connector.get(this.key(key));
    if (value === null || value.length === 0) return null;
    return value;
  }

  async set(key: string, value: Buffer, ttlMs?: number): Promise<void> {
    if (value.length === 0) {
      throw new Error(`cannot cache an empty value under ${key}; use delete() instead`);
    }
    await this.connector.set(this.key(key), value, this.effectiveTtl(ttlMs));
  }

  /** Decoded and validated value, or null when absent or no longer matching `schema`. */
  async getJSON<T>(key: string, schema: z.ZodType<T>): Promise<T | null> {
    const raw = await this.get(key);
    if (raw === null) return null;

    let decoded: unknown;
    try {
      decoded = JSON.parse(raw.toString('utf8'));
    } catch (error) {
      this.log.warn(`discarding undecodable cache entry ${key}:`, error);
      return null;
    }

    const parsed = schema.safeParse(decoded);
    if (!parsed.success) {
      this.log.warn(`discarding cache entry ${key}: ${z.prettifyError(parsed.error)}`);
      return null;
    }
    return parsed.data;
  }

  async setJSON(key: string, value: unknown, ttlMs?: number): Promise<void> {
    await this.set(key, Buffer.from(JSON.stringify(value), 'utf8'), ttlMs);
  }

  async has(key: string): Promise<boolean> {
    return (await this.get(key)) !== null;
  }

  async delete(key: string): Promise<void> {
    await this.connector.set(this.key(key), Buffer.alloc(0), DELETE_TTL_MS);
  }

  private effectiveTtl(ttlMs?: number): number | undefined {
    const ttl = ttlMs ?? this.defaultTtlMs;
    if (ttl <= 0) return undefined;
    return Math.max(1, Math.ceil(ttl));
  }
}
