import { describe, it, expect, vi, afterEach } from "vitest";
import {
  closeStaleConversations,
  runMaintenance,
  startMaintenance,
} from "../src/tasks/maintenance.js";
import { UsageTracker } from "../src/usage/tracker.js";
import type { SupportDB } from "../src/store/db.js";
import { addCustomer, memoryStore, silentLogger } from "./helpers.js";

const DAY = 24 * 60 * 60 * 1000;

describe("maintenance", () => {
  let db: SupportDB;

  afterEach(() => {
    db.close();
  });

  it("closes conversations idle longer than the stale window", async () => {
    let clock = 0;
    const setup = memoryStore(() => clock);
    db = setup.db;
    const { store } = setup;

    await store.ensureConversation("idle");
    clock = 20 * DAY;
    await store.ensureConversation("recent");

    const closed = await closeStaleConversations(store, 7, silentLogger, 20 * DAY);

    expect(closed).toBe(1);
    expect((await store.getConversation("idle"))?.status).toBe("closed");
    expect((await store.getConversation("recent"))?.status).toBe("active");
  });

  it("links orphans and reports usage on each pass", async () => {
    const setup = memoryStore(() => 0);
    db = setup.db;
    const { store } = setup;
    await store.ensureConversation("c1", null, "ada.park@example.com");
    const customer = await addCustomer(store, "ada.park@example.com");

    const usage = new UsageTracker(() => new Date(0));
    usage.record("gpt-4o-mini", "router", 100, 10, 200);
    const info = vi.spyOn(silentLogger, "info");

    expect(await runMaintenance(store, { staleDays: 30, logger: silentLogger, usage }, 0)).toEqual({
      closed: 0,
      linked: 1,
    });
    expect((await store.getConversation("c1"))?.customerId).toBe(customer.id);
    expect(info).toHaveBeenCalledWith(
      {
        usage: [
          "Uptime: 0s",
          "Total calls: 1 (router=1)",
          "Input tokens: 100",
          "Output tokens: 10",
          "Avg latency: 200ms",
        ].join("\n"),
      },
      "📊 LLM usage",
    );
    info.mockRestore();
  });

  it("schedules and stops the sweep", () => {
    const setup = memoryStore();
    db = setup.db;
    const task = startMaintenance(setup.store, {
      cronExpression: "0 3 * * *",
      staleDays: 30,
      logger: silentLogger,
    });
    task.stop();
  });
});
