import type { ChatTurn } from "../llm/types.js";
import type { Message } from "../store/types.js";

// ── Context Builder: turn stored history into prompt material ─

/** Stored messages as chat turns, oldest first. */
export function toChatTurns(messages: Message[]): ChatTurn[] {
  return messages.map((m) => ({ role: m.role, content: m.content }));
}

/**
 * Compact transcript of the last `count` messages for classification
 * prompts. Each line is capped at `maxChars` characters.
 */
export function formatTranscript(
  messages: Message[],
  count: number,
  maxChars = 300,
): string {
  if (count <= 0) return "";
  return messages
    .slice(-count)
    .map((m) => {
      const text =
        m.content.length > maxChars
          ? `${m.content.slice(0, maxChars)}…`
          : m.content;
      return `${m.role.toUpperCase()}: ${text}`;
    })
    .join("\n");
}

/** Format a Unix ms timestamp as a human-readable "X ago" string. */
export function formatAgo(ts: number, now: number = Date.now()): string {
  const diffSec = Math.floor((now - ts) / 1000);
  if (diffSec < 60) return "just now";
  const diffMin = Math.floor(diffSec / 60);
  if (diffMin < 60) return `${diffMin}m ago`;
  const diffHr = Math.floor(diffMin / 60);
  if (diffHr < 24) return `${diffHr}h ago`;
  const diffDay = Math.floor(diffHr / 24);
  if (diffDay < 30) return `${diffDay}d ago`;
  const diffMo = Math.floor(diffDay / 30);
  return `${diffMo}mo ago`;
}
