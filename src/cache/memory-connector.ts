import type { KeyValueConnector } from './connector.ts';

type Slot = { value: Buffer; expiresAtMs: number | null };

/** In-process connector. Expired entries are dropped on the next read. */
export class MemoryConnector implements KeyValueConnector {
  private store = new Map<string, Slot>();

  constructor(private readonly now: () => number = Date.now) {}

  async get(key: string): Promise<Buffer | null> {
    const slot = this.store.get(key);
    if (!slot) return null;
    if (slot.expiresAtMs !== null && slot.expiresAtMs <= this.now()) {
      this.store.delete(key);
      return null;
    }
    return slot.value;
  }

  async set(key: string, value: Buffer, ttlMs?: number): Promise<void> {
    const expiresAtMs = ttlMs !== undefined && ttlMs > 0 ? this.now() + Math.ceil(ttlMs) : null;
    this.store.set(key, { value: Buffer.from(value), expiresAtMs });
  }

  get size(): number {
    return this.store.size;
  }

  clear(): void {
    this.store.clear();
  }
}
