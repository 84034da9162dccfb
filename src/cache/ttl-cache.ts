export type TtlCacheOptions = {
  ttlMs: number;
  maxSize: number;
  now?: () => number;
};

type Entry<V> = {
  value: V;
  expiresAt: number;
};

/**
 * Bounded in-memory map whose entries expire after a fixed TTL.
 *
 * Expiry is lazy: an expired entry is dropped when it is next read.
 * Uses insertion order eviction when maxSize is exceeded.
 */
export class TtlCache<K, V> {
  private readonly ttlMs: number;
  private readonly maxSize: number;
  private readonly now: () => number;
  private readonly map = new Map<K, Entry<V>>();

  constructor(opts: TtlCacheOptions) {
    if (opts.ttlMs <= 0) throw new Error('ttlMs must be > 0');
    if (opts.maxSize <= 0) throw new Error('maxSize must be > 0');
    this.ttlMs = opts.ttlMs;
    this.maxSize = opts.maxSize;
    this.now = opts.now ?? Date.now;
  }

  size(): number {
    return this.map.size;
  }

  has(key: K): boolean {
    return this.read(key) !== undefined;
  }

  get(key: K): V | undefined {
    return this.read(key)?.value;
  }

  set(key: K, value: V): void {
    // re-inserting moves the key to the back of the eviction order
    this.map.delete(key);
    this.map.set(key, { value, expiresAt: this.now() + this.ttlMs });
    this.evictToMaxSize();
  }

  delete(key: K): boolean {
    return this.map.delete(key);
  }

  clear(): void {
    this.map.clear();
  }

  private read(key: K): Entry<V> | undefined {
    const entry = this.map.get(key);
    if (!entry) return undefined;
    if (entry.expiresAt <= this.now()) {
      this.map.delete(key);
      return undefined;
    }
    return entry;
  }

  private evictToMaxSize(): void {
    while (this.map.size > this.maxSize) {
      const first = this.map.keys().next();
      if (first.done) break;
      this.map.delete(first.value);
    }
  }
}

export type Loader<K, V> = (key: K) => Promise<V>;

/**
 * A TtlCache that fills itself from `loader` on a miss.
 *
 * Failed loads are not stored. Concurrent misses on the same key each call the loader.
 */
export class ReadThroughCache<K, V> {
  private readonly cache: TtlCache<K, V>;
  private readonly loader: Loader<K, V>;

  constructor(loader: Loader<K, V>, opts: TtlCacheOptions) {
    this.loader = loader;
    this.cache = new TtlCache<K, V>(opts);
  }

  async lookup(key: K): Promise<V> {
    const cached = this.cache.get(key);
    if (cached !== undefined) return cached;

    const value = await this.loader(key);
    this.cache.set(key, value);
    return value;
  }

  /**
   * Drops one key, or every key when called without one
   */
  invalidate(key?: K): void {
    if (key === undefined) {
      this.cache.clear();
    } else {
      this.cache.delete(key);
    }
  }

  size(): number {
    return this.cache.size();
  }
}
