// Byte-level key/value store the cache sits on

export interface KeyValueConnector {
  /** null when the key was never set or has expired */
  get(key: string): Promise<Buffer | null>;
  /** ttlMs <= 0 or undefined stores without expiry */
  set(key: string, value: Buffer, ttlMs?: number): Promise<void>;
}
