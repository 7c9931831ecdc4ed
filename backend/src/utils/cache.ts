export type Clock = () => number;

export const systemClock: Clock = () => Date.now();

export interface TtlCache<T> {
  get(key: string): T | null;
  set(key: string, value: T): void;
  delete(key: string): boolean;
  clear(): void;
  readonly size: number;
}

export type CacheEntry<T> = {
  value: T;
  storedAt: number;
};

type InMemoryTtlCacheOptions = {
  ttlSeconds: number;
  clock?: Clock;
};

export class InMemoryTtlCache<T> implements TtlCache<T> {
  private readonly store = new Map<string, CacheEntry<T>>();
  private readonly ttlMs: number;
  private readonly clock: Clock;

  constructor(options: InMemoryTtlCacheOptions) {
    this.ttlMs = options.ttlSeconds * 1000;
    this.clock = options.clock ?? systemClock;
  }

  get(key: string): T | null {
    const entry = this.store.get(key);
    if (!entry) {
      return null;
    }

    if (this.clock() - entry.storedAt >= this.ttlMs) {
      this.store.delete(key);
      return null;
    }

    return entry.value;
  }

  set(key: string, value: T): void {
    this.store.set(key, { value, storedAt: this.clock() });
  }

  delete(key: string): boolean {
    return this.store.delete(key);
  }

  clear(): void {
    this.store.clear();
  }

  get size(): number {
    return this.store.size;
  }
}

export const createTtlCache = <T>(options: InMemoryTtlCacheOptions): TtlCache<T> =>
  new InMemoryTtlCache<T>(options);
