import type { Message } from "../store/types.js";
import type { ToolRegistry } from "../tools/registry.js";
import type { ToolResult } from "../tools/types.js";

// ── Agent Types ──────────────────────────────────────────

export const AGENT_TYPES = ["faq", "order", "escalation"] as const;

export type AgentType = (typeof AGENT_TYPES)[number];

export function isAgentType(value: unknown): value is AgentType {
  return AGENT_TYPES.some((t) => t === value);
}

/** Produced once per inbound message; never persisted. */
export interface RoutingDecision {
  target: AgentType;
  /** 0..1 */
  confidence: number;
  reasoning: string;
  source: "llm" | "fallback";
}

export interface AgentRequest {
  message: string;
  /** Recent history, oldest first, excluding `message`. */
  context: Message[];
  conversationId: string;
  correlationId: string;
  customerEmail?: string;
  routing: RoutingDecision;
  signal?: AbortSignal;
}

export interface AgentReply {
  content: string;
  agentType: AgentType;
  /** Every tool invocation made, in call order. */
  tools: ToolResult[];
}

export interface SpecialistAgent<T extends AgentType = AgentType> {
  readonly type: T;
  /**
   * Tool failures are folded into the reply. Only an unrecoverable model
   * failure (ModelUnavailableError) escapes.
   */
  handle(request: AgentRequest, tools: ToolRegistry): Promise<AgentReply>;
}

/** Closed mapping from agent type to its specialist. */
export type SpecialistTable = {
  readonly [T in AgentType]: SpecialistAgent<T>;
};
