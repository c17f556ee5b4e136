export interface KvPutOptions {
  /** Seconds until the store may drop the value. */
  expirationTtl?: number;
}

/**
 * The key-value collaborator. Reads may be stale and writes are
 * last-write-wins; the limiter assumes nothing stronger.
 */
export interface KvStore {
  get(key: string): Promise<string | null>;
  put(key: string, value: string, options?: KvPutOptions): Promise<void>;
}
