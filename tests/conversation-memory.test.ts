import { describe, it, expect, vi, afterEach } from "vitest";
import { StorageUnavailableError } from "../src/errors.js";
import { TtlCache } from "../src/memory/cache.js";
import {
  ConversationMemory,
  historyCacheKey,
  type CachedHistory,
} from "../src/memory/conversation-memory.js";
import type { VolatileCache } from "../src/memory/types.js";
import type { SupportDB } from "../src/store/db.js";
import type { SqliteSupportStore } from "../src/store/support-store.js";
import { memoryStore, silentLogger } from "./helpers.js";

describe("ConversationMemory", () => {
  let db: SupportDB;
  let store: SqliteSupportStore;

  function setup(
    windowSize = 5,
    cache: VolatileCache<CachedHistory> = new TtlCache<CachedHistory>(),
  ): ConversationMemory {
    // Constant clock: every message shares a timestamp, order comes from sequence
    ({ db, store } = memoryStore(() => 1_000));
    return new ConversationMemory({
      store,
      cache,
      windowSize,
      cacheTtlSeconds: 60,
      logger: silentLogger,
    });
  }

  async function fill(memory: ConversationMemory, count: number): Promise<void> {
    for (let i = 1; i <= count; i++) {
      await memory.append("c1", i % 2 === 1 ? "user" : "assistant", `msg ${i}`);
    }
  }

  afterEach(() => {
    db.close();
  });

  // ── Window ─────────────────────────────────────────────

  it("returns at most the window size, oldest first", async () => {
    const memory = setup(5);
    await fill(memory, 12);

    const context = await memory.getContext("c1");
    expect(context.map((m) => m.content)).toEqual([
      "msg 8",
      "msg 9",
      "msg 10",
      "msg 11",
      "msg 12",
    ]);
  });

  it("caps a larger limit at the window size", async () => {
    const memory = setup(3);
    await fill(memory, 6);
    expect(await memory.getContext("c1", 50)).toHaveLength(3);
  });

  it("honours a smaller limit", async () => {
    const memory = setup(5);
    await fill(memory, 6);
    const context = await memory.getContext("c1", 2);
    expect(context.map((m) => m.content)).toEqual(["msg 5", "msg 6"]);
  });

  it("orders messages with equal timestamps by insertion sequence", async () => {
    const memory = setup(10);
    await fill(memory, 4);
    const sequences = (await memory.getContext("c1")).map((m) => m.sequence);
    expect(sequences).toEqual([...sequences].sort((a, b) => a - b));
    expect(new Set(sequences).size).toBe(4);
  });

  it("changes the returned count without touching history", async () => {
    const memory = setup(5);
    await fill(memory, 8);
    memory.setWindowSize(2);
    expect(memory.configuredWindowSize).toBe(2);
    expect(await memory.getContext("c1")).toHaveLength(2);
    expect(await store.countMessages("c1")).toBe(8);
  });

  it("returns nothing for an unknown conversation", async () => {
    const memory = setup();
    expect(await memory.getContext("nobody")).toEqual([]);
  });

  // ── Cache ──────────────────────────────────────────────

  it("serves repeat reads from the cache", async () => {
    const memory = setup(5);
    await fill(memory, 3);
    const load = vi.spyOn(store, "loadRecentMessages");

    await memory.getContext("c1");
    await memory.getContext("c1");
    await memory.getContext("c1", 2);

    expect(load).toHaveBeenCalledTimes(1);
  });

  it("invalidates the cache entry on append", async () => {
    const cache = new TtlCache<CachedHistory>();
    const memory = setup(5, cache);
    await fill(memory, 2);
    await memory.getContext("c1");
    expect(await cache.get(historyCacheKey("c1"))).toBeDefined();

    const del = vi.spyOn(cache, "delete");
    await memory.append("c1", "user", "new question");

    expect(del).toHaveBeenCalledWith("conversation:c1:history");
    expect(await cache.get(historyCacheKey("c1"))).toBeUndefined();
    const context = await memory.getContext("c1");
    expect(context.at(-1)?.content).toBe("new question");
  });

  it("sees writes made through another instance with its own cache", async () => {
    const first = setup(5);
    const second = new ConversationMemory({
      store,
      cache: new TtlCache<CachedHistory>(),
      windowSize: 5,
      cacheTtlSeconds: 60,
      logger: silentLogger,
    });

    await first.append("c1", "user", "first");
    expect((await first.getContext("c1")).map((m) => m.content)).toEqual(["first"]);

    await second.append("c1", "assistant", "second");
    expect((await first.getContext("c1")).map((m) => m.content)).toEqual([
      "first",
      "second",
    ]);
  });

  it("reads through to the store when the cache fails", async () => {
    const broken: VolatileCache<CachedHistory> = {
      get: async () => {
        throw new Error("cache down");
      },
      set: async () => {
        throw new Error("cache down");
      },
      delete: async () => {
        throw new Error("cache down");
      },
    };
    const memory = setup(5, broken);
    await fill(memory, 2);
    expect((await memory.getContext("c1")).map((m) => m.content)).toEqual([
      "msg 1",
      "msg 2",
    ]);
  });

  // ── Failures ───────────────────────────────────────────

  it("surfaces a failed durable write as StorageUnavailableError", async () => {
    const memory = setup();
    db.close();
    await expect(memory.append("c1", "user", "hello")).rejects.toBeInstanceOf(
      StorageUnavailableError,
    );
  });

  // ── Lifecycle ──────────────────────────────────────────

  it("summarizes and closes a conversation", async () => {
    const memory = setup();
    await memory.open("c1", null);
    await fill(memory, 3);

    expect(await memory.getSummary("c1")).toMatchObject({
      conversationId: "c1",
      status: "active",
      customerId: null,
      messageCount: 3,
      createdAt: "1970-01-01T00:00:01.000Z",
    });

    await memory.close("c1");
    expect((await memory.getSummary("c1"))?.status).toBe("closed");
    expect(await memory.getSummary("missing")).toBeUndefined();
  });
});
