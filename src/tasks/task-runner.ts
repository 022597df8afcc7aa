import { randomUUID } from "node:crypto";
import { describeError, SupportError } from "../errors.js";
import type { Logger } from "../logger.js";

// ── In-process Task Runner ───────────────────────────────
// Submitted work starts immediately and runs to completion whether or not
// anyone polls for it. Finished records are dropped after `retentionMs`.

export type TaskStatus<T> =
  | { state: "pending" }
  | { state: "success"; result: T }
  | { state: "failure"; reason: string; code?: string };

export interface TaskHandle {
  taskId: string;
}

interface TaskRecord<T> {
  status: TaskStatus<T>;
  finishedAt?: number;
}

/** Default retention for finished task records (1 hour) */
const DEFAULT_RETENTION_MS = 60 * 60 * 1000;

export interface TaskRunnerOptions {
  logger: Logger;
  retentionMs?: number;
  now?: () => number;
}

export class TaskRunner<T> {
  private readonly tasks = new Map<string, TaskRecord<T>>();
  private readonly inFlight = new Set<Promise<void>>();
  private readonly logger: Logger;
  private readonly retentionMs: number;
  private readonly now: () => number;

  constructor(opts: TaskRunnerOptions) {
    this.logger = opts.logger;
    this.retentionMs = opts.retentionMs ?? DEFAULT_RETENTION_MS;
    this.now = opts.now ?? Date.now;
  }

  submit(work: () => Promise<T>, taskId: string = randomUUID()): TaskHandle {
    this.prune();
    const record: TaskRecord<T> = { status: { state: "pending" } };
    this.tasks.set(taskId, record);

    const run = Promise.resolve()
      .then(work)
      .then((result) => {
        record.status = { state: "success", result };
      })
      .catch((err: unknown) => {
        const reason = describeError(err);
        record.status = {
          state: "failure",
          reason,
          code: err instanceof SupportError ? err.code : undefined,
        };
        this.logger.warn({ taskId, reason }, "⚠️ Task failed");
      })
      .finally(() => {
        record.finishedAt = this.now();
        this.inFlight.delete(run);
      });
    this.inFlight.add(run);

    return { taskId };
  }

  /** Unknown and expired task ids both read as undefined. */
  status(taskId: string): TaskStatus<T> | undefined {
    this.prune();
    return this.tasks.get(taskId)?.status;
  }

  get pendingCount(): number {
    return this.inFlight.size;
  }

  /** Resolves once every task submitted so far has settled. */
  async drain(): Promise<void> {
    await Promise.all([...this.inFlight]);
  }

  private prune(): void {
    const cutoff = this.now() - this.retentionMs;
    for (const [id, record] of this.tasks) {
      if (record.finishedAt !== undefined && record.finishedAt <= cutoff) {
        this.tasks.delete(id);
      }
    }
  }
}
