import type { z } from "zod";
import type { ToolArgs, ToolInput, ToolName } from "./schemas.js";

// ── Tool Definition ──────────────────────────────────────

/** What a tool hands back when it ran to completion. */
export interface ToolOutcome {
  status: "ok" | "not_found";
  text: string;
}

export interface ToolContext {
  conversationId?: string;
  correlationId?: string;
  signal?: AbortSignal;
}

export interface ToolDefinition<N extends ToolName> {
  name: N;
  description: string;
  schema: z.ZodType<ToolArgs<N>, z.ZodTypeDef, ToolInput<N>>;
  /** May throw; the registry converts any failure into a ToolResult. */
  execute: (args: ToolArgs<N>, ctx: ToolContext) => Promise<ToolOutcome>;
}

/** Uniform result of one tool invocation. Never thrown. */
export interface ToolResult {
  name: ToolName;
  args: Record<string, unknown>;
  success: boolean;
  /** The record the tool looked for does not exist. Implies !success. */
  notFound: boolean;
  /** Human-readable payload, also set on failure. */
  result: string;
  error?: string;
  durationMs: number;
}
