import { z } from "zod";
import type { LanguageModel } from "../llm/types.js";
import { toChatTurns } from "../memory/context-builder.js";
import type { ToolResult } from "../tools/types.js";
import type { AgentRequest } from "./types.js";

/**
 * One completion over the conversation window plus the customer's message,
 * with tool material appended below a separator.
 */
export function composeReply(
  llm: LanguageModel,
  systemPrompt: string,
  request: AgentRequest,
  material: string,
  purpose: string,
): Promise<string> {
  return llm.complete({
    system: systemPrompt,
    messages: [
      ...toChatTurns(request.context),
      { role: "user", content: `${request.message}\n\n---\n${material}` },
    ],
    purpose,
    signal: request.signal,
  });
}

/** Render one tool result for a prompt, marking failures as missing data. */
export function renderToolResult(result: ToolResult): string {
  if (result.success) {
    return `### ${result.name}\n${result.result}`;
  }
  if (result.notFound) {
    return `### ${result.name} (no record)\n${result.result}`;
  }
  return `### ${result.name} (UNAVAILABLE: treat this information as missing)\n${result.result}`;
}

const EMAIL_RE = /[a-z0-9._%+-]+@[a-z0-9.-]+\.[a-z]{2,}/i;
const emailSchema = z.string().email();

/** First valid email address in `text`, lower-cased. */
export function extractEmail(text: string): string | undefined {
  const candidate = text.match(EMAIL_RE)?.[0]?.toLowerCase();
  return candidate && emailSchema.safeParse(candidate).success
    ? candidate
    : undefined;
}
