// ── Language Model Port ──────────────────────────────────

export type ChatRole = "user" | "assistant" | "system";

export interface ChatTurn {
  role: ChatRole;
  content: string;
}

export interface CompletionRequest {
  /** System prompt, sent first. */
  system: string;
  /** Conversation turns after the system prompt, oldest first. */
  messages: ChatTurn[];
  temperature?: number;
  maxTokens?: number;
  /** Usage label, e.g. "router" or "faq". */
  purpose: string;
  signal?: AbortSignal;
}

export interface LanguageModel {
  /**
   * Run one chat completion and return its text.
   * Throws ModelUnavailableError once the retry budget is spent.
   */
  complete(request: CompletionRequest): Promise<string>;
  /** Embed text for similarity search. */
  embed(text: string, signal?: AbortSignal): Promise<number[]>;
}
