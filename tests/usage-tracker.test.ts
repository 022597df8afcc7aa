import { describe, it, expect } from "vitest";
import { UsageTracker } from "../src/usage/tracker.js";

describe("UsageTracker", () => {
  it("has a placeholder summary before any call", () => {
    expect(new UsageTracker().getSummary()).toBe("No usage data yet.");
  });

  it("summarizes calls by purpose", () => {
    let now = new Date(0);
    const tracker = new UsageTracker(() => now);
    tracker.record("gpt-4o-mini", "router", 100, 10, 200);
    tracker.record("gpt-4o-mini", "faq", 300, 90, 400);
    tracker.record("gpt-4o-mini", "router", 100, 10, 300);
    now = new Date(125_000);

    expect(tracker.getCallCount()).toBe(3);
    expect(tracker.getCallsByPurpose()).toEqual({ router: 2, faq: 1 });
    expect(tracker.getSummary()).toBe(
      [
        "Uptime: 2m 5s",
        "Total calls: 3 (router=2, faq=1)",
        "Input tokens: 500",
        "Output tokens: 110",
        "Avg latency: 300ms",
      ].join("\n"),
    );
  });
});
