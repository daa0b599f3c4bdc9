import type { KVBase } from '@codescout/httpkit';

type CacheEntry = {
  value: string;
  /** Epoch millis; 0 never expires. */
  expiresAt: number;
};

const isCacheEntry = (value: unknown): value is CacheEntry => {
  return !!value
    && typeof value === 'object'
    && 'value' in value
    && typeof value.value === 'string'
    && 'expiresAt' in value
    && typeof value.expiresAt === 'number';
};

/** TTL cache for fetched file contents, stored in the shared KV under a key prefix. */
export class ContentCache {
  constructor(
    private readonly kv: KVBase,
    private readonly ttlSeconds: number,
    private readonly prefix = 'content-cache:',
    private readonly now: () => number = Date.now,
  ) {}

  async get(key: string): Promise<string | undefined> {
    const stored = await this.kv.get<unknown>(this.prefix + key);

    if (!isCacheEntry(stored)) {
      return undefined;
    }

    if (stored.expiresAt !== 0 && stored.expiresAt <= this.now()) {
      await this.kv.del(this.prefix + key);
      return undefined;
    }

    return stored.value;
  }

  async set(key: string, value: string, ttlSeconds = this.ttlSeconds): Promise<void> {
    const entry: CacheEntry = {
      value,
      expiresAt: ttlSeconds <= 0 ? 0 : this.now() + ttlSeconds * 1000,
    };
    await this.kv.set(this.prefix + key, entry);
  }

  async delete(key: string): Promise<void> {
    await this.kv.del(this.prefix + key);
  }
}
