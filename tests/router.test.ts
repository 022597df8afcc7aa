import { describe, it, expect } from "vitest";
import {
  buildClassificationInput,
  FALLBACK_CONFIDENCE,
  keywordFallback,
  parseRoutingResponse,
  RouterAgent,
} from "../src/agent/router.js";
import { MalformedModelOutputError, ModelUnavailableError } from "../src/errors.js";
import type { Message } from "../src/store/types.js";
import { FakeLanguageModel, silentLogger } from "./helpers.js";

function message(role: Message["role"], content: string, sequence: number): Message {
  return {
    id: `m${sequence}`,
    conversationId: "c1",
    role,
    content,
    createdAt: 1_000 + sequence,
    sequence,
    metadata: {},
  };
}

function router(reply: () => string | Promise<string>, threshold = 0.5): {
  agent: RouterAgent;
  llm: FakeLanguageModel;
} {
  const llm = new FakeLanguageModel(reply);
  const agent = new RouterAgent({
    llm,
    systemPrompt: "route",
    confidenceThreshold: threshold,
    contextMessages: 2,
    logger: silentLogger,
  });
  return { agent, llm };
}

describe("keywordFallback", () => {
  it("routes billing terms to the order agent", () => {
    expect(keywordFallback("Why was my card charged twice?")).toEqual({
      target: "order",
      confidence: FALLBACK_CONFIDENCE,
      reasoning: 'Keyword fallback: matched order keyword "charge"',
      source: "fallback",
    });
  });

  it("prefers escalation when escalation and billing terms both match", () => {
    const decision = keywordFallback("Let me talk to a human about my billing");
    expect(decision.target).toBe("escalation");
    expect(decision.reasoning).toBe('Keyword fallback: matched escalation keyword "human"');
  });

  it("defaults to faq when nothing matches", () => {
    expect(keywordFallback("How do I export a board?")).toEqual({
      target: "faq",
      confidence: FALLBACK_CONFIDENCE,
      reasoning: "Keyword fallback: no domain keywords matched, defaulting to FAQ",
      source: "fallback",
    });
  });

  it("matches keywords at word starts only", () => {
    expect(keywordFallback("The explanation in the docs is unclear").target).toBe("faq");
    expect(keywordFallback("Billing question").target).toBe("order");
  });

  it("is case-insensitive", () => {
    expect(keywordFallback("URGENT: nothing loads").target).toBe("escalation");
  });
});

describe("parseRoutingResponse", () => {
  it("extracts the JSON object from surrounding text", () => {
    expect(
      parseRoutingResponse('Sure! {"route": "Order", "confidence": 0.9} Hope that helps.'),
    ).toEqual({ route: "order", confidence: 0.9, reasoning: "" });
  });

  it("keeps the reasoning when present", () => {
    expect(
      parseRoutingResponse('{"route":"faq","confidence":0.7,"reasoning":"how-to question"}'),
    ).toEqual({ route: "faq", confidence: 0.7, reasoning: "how-to question" });
  });

  it.each([
    ["no JSON", "Invalid response without JSON"],
    ["broken JSON", '{"route": "faq", '],
    ["unknown route", '{"route":"sales","confidence":0.9}'],
    ["confidence out of range", '{"route":"faq","confidence":1.5}'],
    ["missing confidence", '{"route":"faq"}'],
  ])("rejects %s", (_label, raw) => {
    expect(() => parseRoutingResponse(raw)).toThrow(MalformedModelOutputError);
  });
});

describe("RouterAgent", () => {
  it("returns the model's decision when it is confident", async () => {
    const { agent } = router(
      () => '{"route":"escalation","confidence":0.82,"reasoning":"customer is angry"}',
    );
    expect(await agent.route("This is the third time I'm asking", [])).toEqual({
      target: "escalation",
      confidence: 0.82,
      reasoning: "customer is angry",
      source: "llm",
    });
  });

  it("falls back to keywords on output without JSON", async () => {
    const { agent } = router(() => "Invalid response without JSON");
    const decision = await agent.route("I have a question about billing", []);
    expect(decision.target).toBe("order");
    expect(decision.source).toBe("fallback");
    expect(decision.confidence).toBe(FALLBACK_CONFIDENCE);
  });

  it("falls back when confidence is below the threshold", async () => {
    const { agent } = router(() => '{"route":"faq","confidence":0.3}');
    const decision = await agent.route("I want a refund", []);
    expect(decision).toMatchObject({ target: "order", source: "fallback" });
  });

  it("propagates a model outage instead of guessing a route", async () => {
    const { agent } = router(() => {
      throw new ModelUnavailableError("router", new Error("503"), 503);
    });
    await expect(agent.route("Please escalate this", [])).rejects.toBeInstanceOf(
      ModelUnavailableError,
    );
  });

  it("classifies with temperature 0 and the recent context", async () => {
    const { agent, llm } = router(() => '{"route":"faq","confidence":0.9}');
    const context = [
      message("user", "first", 1),
      message("assistant", "second", 2),
      message("user", "third", 3),
    ];
    await agent.route("latest", context);

    expect(llm.calls).toHaveLength(1);
    const call = llm.calls[0];
    expect(call?.temperature).toBe(0);
    expect(call?.purpose).toBe("router");
    expect(call?.messages[0]?.content).toBe(
      "Recent conversation:\nASSISTANT: second\nUSER: third\n\nLatest customer message:\nlatest",
    );
  });
});

describe("buildClassificationInput", () => {
  it("marks an empty history", () => {
    expect(buildClassificationInput("hello", [], 4)).toBe(
      "Recent conversation:\n(none)\n\nLatest customer message:\nhello",
    );
  });
});
