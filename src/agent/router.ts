import { z } from "zod";
import { describeError, MalformedModelOutputError } from "../errors.js";
import type { LanguageModel } from "../llm/types.js";
import type { Logger } from "../logger.js";
import { formatTranscript } from "../memory/context-builder.js";
import type { Message } from "../store/types.js";
import { isAgentType, type AgentType, type RoutingDecision } from "./types.js";

// ── Keyword Fallback ─────────────────────────────────────

/** Confidence reported for every keyword-based decision. */
export const FALLBACK_CONFIDENCE = 0.6;

/** Checked in order: the first set with a hit wins. */
const KEYWORD_RULES: ReadonlyArray<{ target: AgentType; keywords: string[] }> = [
  {
    target: "escalation",
    keywords: [
      "escalat",
      "human",
      "real person",
      "ticket",
      "complain",
      "frustrated",
      "angry",
      "furious",
      "urgent",
      "emergency",
      "manager",
      "supervisor",
      "unacceptable",
    ],
  },
  {
    target: "order",
    keywords: [
      "subscription",
      "subscribe",
      "billing",
      "bill",
      "invoice",
      "payment",
      "charge",
      "plan",
      "upgrade",
      "downgrade",
      "cancel",
      "refund",
      "account",
      "price",
      "pricing",
      "cost",
      "fee",
      "renew",
      "receipt",
    ],
  },
];

const KEYWORD_PATTERNS = KEYWORD_RULES.map((rule) => ({
  target: rule.target,
  keywords: rule.keywords.map((kw) => ({
    kw,
    // Word-start match so "billing" hits "bill" but "explanation" misses "plan"
    re: new RegExp(`\\b${kw.replace(/[.*+?^${}()|[\]\\]/g, "\\$&")}`, "i"),
  })),
}));

/**
 * Deterministic routing by keyword. Total: always returns a decision.
 * Precedence is escalation > order > faq.
 */
export function keywordFallback(message: string): RoutingDecision {
  for (const rule of KEYWORD_PATTERNS) {
    const hit = rule.keywords.find(({ re }) => re.test(message));
    if (hit) {
      return {
        target: rule.target,
        confidence: FALLBACK_CONFIDENCE,
        reasoning: `Keyword fallback: matched ${rule.target} keyword "${hit.kw}"`,
        source: "fallback",
      };
    }
  }
  return {
    target: "faq",
    confidence: FALLBACK_CONFIDENCE,
    reasoning: "Keyword fallback: no domain keywords matched, defaulting to FAQ",
    source: "fallback",
  };
}

// ── Model Output Parsing ─────────────────────────────────

const routingSchema = z.object({
  route: z.string(),
  confidence: z.number().min(0).max(1),
  reasoning: z.string().optional(),
});

export interface ParsedRoute {
  route: AgentType;
  confidence: number;
  reasoning: string;
}

/**
 * Pull the first `{...}` object out of the model output and validate it.
 * Throws MalformedModelOutputError on anything unexpected.
 */
export function parseRoutingResponse(raw: string): ParsedRoute {
  const start = raw.indexOf("{");
  const end = raw.lastIndexOf("}");
  if (start < 0 || end <= start) {
    throw new MalformedModelOutputError("no JSON object found", raw);
  }

  let json: unknown;
  try {
    json = JSON.parse(raw.slice(start, end + 1));
  } catch (err) {
    throw new MalformedModelOutputError(`invalid JSON: ${describeError(err)}`, raw);
  }

  const parsed = routingSchema.safeParse(json);
  if (!parsed.success) {
    throw new MalformedModelOutputError(
      `unexpected shape: ${parsed.error.issues.map((i) => i.message).join("; ")}`,
      raw,
    );
  }

  const route = parsed.data.route.trim().toLowerCase();
  if (!isAgentType(route)) {
    throw new MalformedModelOutputError(`unknown route "${parsed.data.route}"`, raw);
  }

  return {
    route,
    confidence: parsed.data.confidence,
    reasoning: parsed.data.reasoning ?? "",
  };
}

// ── Router Agent ─────────────────────────────────────────

export interface RouterOptions {
  llm: LanguageModel;
  systemPrompt: string;
  /** Model decisions below this confidence are replaced by the fallback. */
  confidenceThreshold: number;
  /** How many context messages go into the classification prompt. */
  contextMessages: number;
  logger: Logger;
}

export class RouterAgent {
  constructor(private readonly opts: RouterOptions) {}

  /**
   * Classify `message` into a specialist. Malformed or low-confidence output
   * falls back to keywords. A failed model call (ModelUnavailableError, an
   * abort) propagates and fails the turn.
   */
  async route(
    message: string,
    context: Message[],
    signal?: AbortSignal,
  ): Promise<RoutingDecision> {
    const { llm, systemPrompt, confidenceThreshold, contextMessages, logger } =
      this.opts;

    const raw = await llm.complete({
      system: systemPrompt,
      messages: [
        { role: "user", content: buildClassificationInput(message, context, contextMessages) },
      ],
      temperature: 0,
      maxTokens: 200,
      purpose: "router",
      signal,
    });

    let parsed: ParsedRoute;
    try {
      parsed = parseRoutingResponse(raw);
    } catch (err) {
      logger.warn(
        { err: describeError(err), raw: raw.slice(0, 200) },
        "⚠️ Router output malformed; using keyword fallback",
      );
      return keywordFallback(message);
    }

    if (parsed.confidence < confidenceThreshold) {
      logger.info(
        { route: parsed.route, confidence: parsed.confidence, threshold: confidenceThreshold },
        "Router confidence below threshold; using keyword fallback",
      );
      return keywordFallback(message);
    }

    return {
      target: parsed.route,
      confidence: parsed.confidence,
      reasoning: parsed.reasoning,
      source: "llm",
    };
  }
}

export function buildClassificationInput(
  message: string,
  context: Message[],
  contextMessages: number,
): string {
  const transcript = formatTranscript(context, contextMessages);
  return [
    "Recent conversation:",
    transcript || "(none)",
    "",
    "Latest customer message:",
    message,
  ].join("\n");
}
