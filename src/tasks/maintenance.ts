import cron, { type ScheduledTask } from "node-cron";
import type { Logger } from "../logger.js";
import type { SupportStore } from "../store/types.js";
import type { UsageTracker } from "../usage/tracker.js";

// ── Maintenance Job ──────────────────────────────────────

const DAY_MS = 24 * 60 * 60 * 1000;

export interface MaintenanceOptions {
  cronExpression: string;
  staleDays: number;
  logger: Logger;
  /** Logged after every pass when given. */
  usage?: UsageTracker;
}

/** Close active conversations idle for more than `staleDays`. Returns the count. */
export async function closeStaleConversations(
  store: SupportStore,
  staleDays: number,
  logger: Logger,
  now: number = Date.now(),
): Promise<number> {
  const closed = await store.closeStaleConversations(now - staleDays * DAY_MS);
  logger.info({ closed, staleDays }, "🧹 Stale conversations closed");
  return closed;
}

/** Link conversations opened with an unknown email to the customer it now matches. */
export async function linkOrphanConversations(
  store: SupportStore,
  logger: Logger,
): Promise<number> {
  const linked = await store.linkOrphanConversations();
  logger.info({ linked }, "🔗 Orphaned conversations linked");
  return linked;
}

/** One maintenance pass. */
export async function runMaintenance(
  store: SupportStore,
  opts: Omit<MaintenanceOptions, "cronExpression">,
  now: number = Date.now(),
): Promise<{ closed: number; linked: number }> {
  const { staleDays, logger, usage } = opts;
  const closed = await closeStaleConversations(store, staleDays, logger, now);
  const linked = await linkOrphanConversations(store, logger);
  if (usage) {
    logger.info({ usage: usage.getSummary() }, "📊 LLM usage");
  }
  return { closed, linked };
}

/** Schedule the maintenance pass. Stop the returned task on shutdown. */
export function startMaintenance(
  store: SupportStore,
  opts: MaintenanceOptions,
): ScheduledTask {
  const { cronExpression, staleDays, logger } = opts;

  const task = cron.schedule(cronExpression, async () => {
    try {
      await runMaintenance(store, opts);
    } catch (err) {
      logger.error(err, "❌ Maintenance pass failed");
    }
  });

  task.start();
  logger.info({ cron: cronExpression, staleDays }, "⏰ Maintenance job scheduled");
  return task;
}
