/**
 * Bounded map with least-recently-used eviction. Reads refresh recency; writes past
 * capacity drop the oldest entry.
 */
export class LruCache<T> {
  private readonly entries = new Map<string, T>();
  private hitCount = 0;
  private missCount = 0;

  constructor(private readonly maxEntries: number) {
    if (!Number.isInteger(maxEntries) || maxEntries <= 0) {
      throw new Error("LRU cache size must be a positive integer");
    }
  }

  get(key: string): T | undefined {
    if (!this.entries.has(key)) {
      this.missCount += 1;
      return undefined;
    }
    const value = this.entries.get(key);
    this.entries.delete(key);
    if (value !== undefined) {
      this.entries.set(key, value);
    }
    this.hitCount += 1;
    return value;
  }

  set(key: string, value: T): void {
    if (this.entries.has(key)) {
      this.entries.delete(key);
    }
    this.entries.set(key, value);

    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) {
        break;
      }
      this.entries.delete(oldest.value);
    }
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  clear(): void {
    this.entries.clear();
    this.hitCount = 0;
    this.missCount = 0;
  }

  size(): number {
    return this.entries.size;
  }

  capacity(): number {
    return this.maxEntries;
  }

  stats(): { hits: number; misses: number } {
    return { hits: this.hitCount, misses: this.missCount };
  }
}
