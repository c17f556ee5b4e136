import type { KvPutOptions, KvStore } from "./store.js";

interface StoredValue {
  value: string;
  expiresAtMs?: number;
}

export interface MemoryKvStoreOptions {
  now?: () => number;
}

/** Process-local store for tests and single-instance development. */
export class MemoryKvStore implements KvStore {
  private readonly values = new Map<string, StoredValue>();
  private readonly now: () => number;

  constructor(options: MemoryKvStoreOptions = {}) {
    this.now = options.now ?? Date.now;
  }

  async get(key: string): Promise<string | null> {
    const stored = this.values.get(key);
    if (!stored) {
      return null;
    }
    if (stored.expiresAtMs !== undefined && stored.expiresAtMs <= this.now()) {
      this.values.delete(key);
      return null;
    }
    return stored.value;
  }

  async put(key: string, value: string, options: KvPutOptions = {}): Promise<void> {
    const expiresAtMs = options.expirationTtl === undefined
      ? undefined
      : this.now() + (options.expirationTtl * 1000);
    this.values.set(key, { value, expiresAtMs });
  }

  async delete(key: string): Promise<void> {
    this.values.delete(key);
  }

  get size(): number {
    return this.values.size;
  }
}
