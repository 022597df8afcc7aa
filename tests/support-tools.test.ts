import { describe, it, expect, beforeEach, afterEach } from "vitest";
import type { SupportDB } from "../src/store/db.js";
import type { SqliteSupportStore } from "../src/store/support-store.js";
import {
  determinePriority,
  normalizeCategory,
  RESPONSE_TIMES,
} from "../src/tools/create-ticket.js";
import { createSupportTools } from "../src/tools/index.js";
import { NO_KNOWLEDGE_MATCH } from "../src/tools/knowledge-search.js";
import type { ToolRegistry } from "../src/tools/registry.js";
import { money, titleCase } from "../src/tools/account-lookup.js";
import {
  addCustomer,
  FakeKnowledgeIndex,
  FakeLanguageModel,
  memoryStore,
  silentLogger,
} from "./helpers.js";

const JAN_15_2026 = Date.UTC(2026, 0, 15);

describe("support tools", () => {
  let db: SupportDB;
  let store: SqliteSupportStore;
  let knowledge: FakeKnowledgeIndex;
  let tools: ToolRegistry;

  function build(index = new FakeKnowledgeIndex()): void {
    knowledge = index;
    tools = createSupportTools({
      store,
      llm: new FakeLanguageModel(),
      knowledge,
      knowledgeTopK: 3,
      timeoutMs: 1_000,
      logger: silentLogger,
    });
  }

  beforeEach(() => {
    ({ db, store } = memoryStore(() => JAN_15_2026));
    build();
  });

  afterEach(() => {
    db.close();
  });

  // ── Account lookups ────────────────────────────────────

  describe("account lookups", () => {
    it("formats the customer profile", async () => {
      await addCustomer(store);
      const result = await tools.invoke("get_customer_info", {
        customerEmail: "ADA.PARK@example.com",
      });
      expect(result.success).toBe(true);
      expect(result.result).toBe(
        [
          "**Customer Information**",
          "- Name: Ada Park",
          "- Email: ada.park@example.com",
          "- Company: Northwind Labs",
          "- Phone: N/A",
          "- Account Status: Active",
          "- Member Since: 2026-01-15",
        ].join("\n"),
      );
    });

    it("reports an unknown customer as not found", async () => {
      const result = await tools.invoke("get_invoices", { customerEmail: "ghost@example.com" });
      expect(result.notFound).toBe(true);
      expect(result.result).toBe("No customer found with email: ghost@example.com");
    });

    it("says so when a customer has no subscriptions", async () => {
      await addCustomer(store);
      const result = await tools.invoke("get_subscription_details", {
        customerEmail: "ada.park@example.com",
      });
      expect(result.success).toBe(true);
      expect(result.result).toBe("No subscriptions found for ada.park@example.com");
    });

    it("formats subscriptions with plan and billing", async () => {
      const customer = await addCustomer(store);
      await store.insertSubscription({
        customerId: customer.id,
        plan: "professional",
        status: "past_due",
        billingCycle: "monthly",
        price: 49,
        seats: 10,
        startDate: "2026-01-15",
        endDate: null,
        trialEndDate: null,
        features: ["API access"],
      });

      const result = await tools.invoke("get_subscription_details", {
        customerEmail: "ada.park@example.com",
      });
      expect(result.result).toBe(
        [
          "**Subscriptions for Ada Park**",
          "",
          "**Professional Plan**",
          "- Status: Past Due",
          "- Billing: Monthly at $49.00",
          "- Seats: 10",
          "- Start Date: 2026-01-15",
          "- End Date: N/A",
          "- Trial Ends: N/A",
          "- Features: API access",
        ].join("\n"),
      );
    });

    it("totals paid and outstanding invoices", async () => {
      const customer = await addCustomer(store);
      const base = {
        customerId: customer.id,
        amount: 49,
        tax: 4.9,
        total: 53.9,
        currency: "USD",
        dueDate: "2026-09-15",
        description: "",
      };
      await store.insertInvoice({ ...base, invoiceNumber: "TL-1", status: "paid", paidDate: "2026-09-14" });
      await store.insertInvoice({ ...base, invoiceNumber: "TL-2", status: "overdue", paidDate: null });
      await store.insertInvoice({ ...base, invoiceNumber: "TL-3", status: "pending", paidDate: null });

      const result = await tools.invoke("get_invoices", {
        customerEmail: "ada.park@example.com",
        limit: 2,
      });
      const lines = result.result.split("\n");
      expect(lines.slice(0, 3)).toEqual([
        "**Invoice History for Ada Park**",
        "Total Paid: $0.00",
        "Outstanding: $107.80",
      ]);
      expect(lines).toContain("**Invoice #TL-3** ⏳");
      expect(lines).not.toContain("**Invoice #TL-1** ✓");
    });
  });

  // ── Tickets ────────────────────────────────────────────

  describe("create_support_ticket", () => {
    it("creates a ticket linked to a known customer", async () => {
      const customer = await addCustomer(store);
      const result = await tools.invoke("create_support_ticket", {
        customerEmail: "ada.park@example.com",
        subject: "Cannot access billing page",
        description: "I cannot access the billing page since Monday.",
        category: "Billing",
        conversationId: "c1",
      });

      expect(result.success).toBe(true);
      const lines = result.result.split("\n");
      expect(lines[0]).toBe("**Support Ticket Created**");
      expect(lines).toContain("- Category: Billing");
      expect(lines).toContain("- Priority: High");
      expect(lines).toContain("- Expected Response: Within 4 hours");
      expect(lines.at(-1)).toBe(
        "A support specialist will review the case and reach out at ada.park@example.com.",
      );

      const [ticket] = await store.listTickets(customer.id);
      expect(ticket).toMatchObject({
        conversationId: "c1",
        category: "billing",
        priority: "high",
        metadata: { createdBy: "ai_agent", customerEmail: "ada.park@example.com" },
      });
    });

    it("still creates a ticket for an unknown email, unlinked", async () => {
      const result = await tools.invoke("create_support_ticket", {
        customerEmail: "ghost@example.com",
        subject: "Help",
        description: "Please call me back",
      });
      expect(result.success).toBe(true);

      const rows = db
        .raw()
        .prepare<[], { customer_id: string | null; category: string; metadata: string }>(
          "SELECT customer_id, category, metadata FROM support_tickets",
        )
        .all();
      expect(rows).toHaveLength(1);
      expect(rows[0]?.customer_id).toBeNull();
      expect(rows[0]?.category).toBe("other");
      expect(JSON.parse(rows[0]?.metadata ?? "{}")).toEqual({
        createdBy: "ai_agent",
        customerEmail: "ghost@example.com",
        emailUnverified: "true",
      });
    });
  });

  // ── Knowledge search ───────────────────────────────────

  describe("search_knowledge_base", () => {
    it("numbers passages with their relevance", async () => {
      build(
        new FakeKnowledgeIndex([
          { id: "kb-1", title: "Plans", content: "Four plans.", category: "faq", score: 0.876 },
          { id: "kb-2", title: "Refunds", content: "14 days.", category: "policy", score: 0.5 },
        ]),
      );

      const result = await tools.invoke("search_knowledge_base", { query: "what plans exist" });

      expect(result.result).toBe(
        "**Result 1** (Relevance: 88%)\nTitle: Plans\nCategory: faq\nContent: Four plans." +
          "\n---\n" +
          "**Result 2** (Relevance: 50%)\nTitle: Refunds\nCategory: policy\nContent: 14 days.",
      );
      expect(knowledge.searches).toEqual([{ topK: 3, filter: { active: true } }]);
    });

    it("reports no match on an empty index", async () => {
      const result = await tools.invoke("search_knowledge_base", { query: "anything" });
      expect(result.success).toBe(false);
      expect(result.notFound).toBe(true);
      expect(result.result).toBe(NO_KNOWLEDGE_MATCH);
    });
  });
});

describe("ticket priority", () => {
  it.each([
    ["The whole site is down", "technical", "urgent"],
    ["This is not working at all", "other", "urgent"],
    ["I cannot access my dashboard", "account", "high"],
    ["Possible security issue", "other", "high"],
    ["Question about my invoice", "billing", "high"],
    ["Export crashes", "bug_report", "high"],
    ["Dark mode please", "feature_request", "medium"],
  ] as const)("%s (%s) → %s", (text, category, expected) => {
    expect(determinePriority(text, category)).toBe(expected);
  });

  it("states a response time for every priority", () => {
    expect(RESPONSE_TIMES).toEqual({
      urgent: "1 hour",
      high: "4 hours",
      medium: "24 hours",
      low: "48 hours",
    });
  });

  it("normalizes free-form categories", () => {
    expect(normalizeCategory("Feature Request")).toBe("feature_request");
    expect(normalizeCategory("bug-report")).toBe("bug_report");
    expect(normalizeCategory("sales")).toBe("other");
    expect(normalizeCategory(undefined)).toBe("other");
  });
});

describe("formatting helpers", () => {
  it("formats money and snake_case labels", () => {
    expect(money(5)).toBe("$5.00");
    expect(titleCase("past_due")).toBe("Past Due");
  });
});
