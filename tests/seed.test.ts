import { describe, it, expect, afterEach } from "vitest";
import { KnowledgeBase } from "../src/knowledge/knowledge-base.js";
import { readSeedFile, seedAccounts } from "../src/seed.js";
import type { SupportDB } from "../src/store/db.js";
import { FakeKnowledgeIndex, FakeLanguageModel, memoryStore, silentLogger } from "./helpers.js";

describe("seeding", () => {
  let db: SupportDB;

  afterEach(() => {
    db.close();
  });

  it("loads accounts once", async () => {
    const seed = readSeedFile();
    const setup = memoryStore();
    db = setup.db;

    expect(await seedAccounts(setup.store, seed.customers)).toBe(seed.customers.length);
    expect(await seedAccounts(setup.store, seed.customers)).toBe(0);

    const customer = await setup.store.findCustomer("chen.wei@example.com");
    expect(customer?.companyName).toBe("Harbor Logistics");
    const invoices = await setup.store.findInvoices(customer?.id ?? "", 5);
    expect(invoices.map((i) => i.invoiceNumber).sort()).toEqual(["TL-2025-0910", "TL-2026-0911"]);
  });

  it("embeds title and content for every knowledge document", async () => {
    const setup = memoryStore();
    db = setup.db;
    const llm = new FakeLanguageModel();
    const index = new FakeKnowledgeIndex();
    const kb = new KnowledgeBase({ store: setup.store, llm, index, logger: silentLogger });
    const docs = [
      { id: "kb-1", title: "Plans", content: "Four plans.", category: "faq" as const, active: true },
      { id: "kb-2", title: "Old", content: "Retired.", category: "policy" as const, active: false },
    ];

    expect(await kb.addDocuments(docs)).toBe(2);
    expect(llm.embedded).toEqual(["Plans\n\nFour plans.", "Old\n\nRetired."]);
    expect(index.upserted.map((c) => [c.id, c.active, c.embedding])).toEqual([
      ["kb-1", true, [18, 1, 0]],
      ["kb-2", false, [13, 1, 0]],
    ]);
    expect(await kb.stats()).toMatchObject({ totalDocuments: 1 });
  });

  it("indexes the bundled knowledge base with its retired entry inactive", async () => {
    const seed = readSeedFile();
    const setup = memoryStore();
    db = setup.db;
    const kb = new KnowledgeBase({
      store: setup.store,
      llm: new FakeLanguageModel(),
      index: new FakeKnowledgeIndex(),
      logger: silentLogger,
    });

    await kb.addDocuments(seed.knowledge);

    expect((await kb.stats()).totalDocuments).toBe(seed.knowledge.length - 1);
    expect(await kb.getDocument("kb-legacy-pricing")).toBeUndefined();
  });
});
