import type { VolatileCache } from "./types.js";

// ── In-process TTL Cache ─────────────────────────────────

interface Entry<V> {
  value: V;
  expiresAt: number; // Unix ms
}

/** Map-backed VolatileCache. Expired entries are dropped on read. */
export class TtlCache<V> implements VolatileCache<V> {
  private readonly entries = new Map<string, Entry<V>>();

  constructor(
    private readonly maxEntries = 10_000,
    private readonly now: () => number = Date.now,
  ) {}

  async get(key: string): Promise<V | undefined> {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return undefined;
    }
    return entry.value;
  }

  async set(key: string, value: V, ttlSeconds: number): Promise<void> {
    // Re-insert so Map iteration order tracks recency
    this.entries.delete(key);
    this.entries.set(key, { value, expiresAt: this.now() + ttlSeconds * 1000 });

    if (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (!oldest.done) this.entries.delete(oldest.value);
    }
  }

  async delete(key: string): Promise<void> {
    this.entries.delete(key);
  }

  get size(): number {
    return this.entries.size;
  }
}
