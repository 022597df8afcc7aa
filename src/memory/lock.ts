import { randomUUID } from "node:crypto";
import { LockTimeoutError, StorageUnavailableError } from "../errors.js";
import type { SupportDB } from "../store/db.js";
import type { ConversationLock, ReleaseLock } from "./types.js";

// ── SQLite Lease Lock ────────────────────────────────────
// Every process sharing the database file sees the same lease table, so a
// conversation is held by at most one run at a time. A lease that outlives
// its hold time can be taken over by the next waiter.

export interface SqliteLockOptions {
  /** Delay between acquisition attempts (default: 25ms) */
  pollMs?: number;
  now?: () => number;
}

export class SqliteConversationLock implements ConversationLock {
  private readonly db;
  private readonly pollMs: number;
  private readonly now: () => number;

  constructor(supportDb: SupportDB, opts: SqliteLockOptions = {}) {
    this.db = supportDb.raw();
    this.pollMs = opts.pollMs ?? 25;
    this.now = opts.now ?? Date.now;
  }

  async acquire(
    key: string,
    holdMs: number,
    waitMs: number,
  ): Promise<ReleaseLock> {
    const owner = randomUUID();
    const deadline = this.now() + waitMs;

    while (!this.tryAcquire(key, owner, holdMs)) {
      if (this.now() >= deadline) {
        throw new LockTimeoutError(key, waitMs);
      }
      await new Promise((resolve) => setTimeout(resolve, this.pollMs));
    }

    let released = false;
    return async () => {
      if (released) return;
      released = true;
      this.release(key, owner);
    };
  }

  private tryAcquire(key: string, owner: string, holdMs: number): boolean {
    const now = this.now();
    try {
      const result = this.db
        .prepare(
          `INSERT INTO conversation_locks (lock_key, owner, expires_at) VALUES (?, ?, ?)
           ON CONFLICT(lock_key) DO UPDATE SET owner = excluded.owner, expires_at = excluded.expires_at
           WHERE conversation_locks.expires_at <= ?`,
        )
        .run(key, owner, now + holdMs, now);
      return result.changes === 1;
    } catch (err) {
      throw new StorageUnavailableError("lock acquire", err);
    }
  }

  private release(key: string, owner: string): void {
    try {
      this.db
        .prepare("DELETE FROM conversation_locks WHERE lock_key = ? AND owner = ?")
        .run(key, owner);
    } catch (err) {
      throw new StorageUnavailableError("lock release", err);
    }
  }
}
