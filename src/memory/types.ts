// ── Memory Module: Ports ────────────────────────────────

/** Volatile key/value cache with per-entry expiry (Redis-shaped). */
export interface VolatileCache<V> {
  get(key: string): Promise<V | undefined>;
  set(key: string, value: V, ttlSeconds: number): Promise<void>;
  delete(key: string): Promise<void>;
}

/** Releases a held lock. Safe to call more than once. */
export type ReleaseLock = () => Promise<void>;

/** Mutual exclusion keyed by conversation, shared by every worker. */
export interface ConversationLock {
  /**
   * Wait up to `waitMs` for the lock on `key`; once held it expires after
   * `holdMs` even if never released. Throws LockTimeoutError on timeout.
   */
  acquire(key: string, holdMs: number, waitMs: number): Promise<ReleaseLock>;
}
