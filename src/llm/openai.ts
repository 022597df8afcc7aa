import OpenAI from "openai";
import type { ChatCompletionMessageParam } from "openai/resources/chat/completions.js";
import { ModelUnavailableError } from "../errors.js";
import { log } from "../logger.js";
import type { UsageTracker } from "../usage/tracker.js";
import { getStatusCode, withRetry } from "./retry.js";
import type { CompletionRequest, LanguageModel } from "./types.js";

// ── OpenAI-compatible Language Model ─────────────────────

export interface OpenAiModelOptions {
  apiKey: string;
  /** Any OpenAI-compatible endpoint (OpenRouter, Azure proxy, local server). */
  baseURL?: string;
  model: string;
  embeddingModel: string;
  temperature: number;
  timeoutMs: number;
  maxRetries: number;
  usage?: UsageTracker;
  /** Supply a preconfigured client (tests). */
  client?: OpenAI;
}

/** Embedding inputs are trimmed to this many characters. */
const MAX_EMBED_CHARS = 8_000;

export class OpenAiLanguageModel implements LanguageModel {
  private readonly client: OpenAI;

  constructor(private readonly opts: OpenAiModelOptions) {
    this.client =
      opts.client ??
      new OpenAI({
        apiKey: opts.apiKey,
        baseURL: opts.baseURL,
        timeout: opts.timeoutMs,
        // Retries are handled by withRetry so the backoff policy is ours
        maxRetries: 0,
      });
  }

  async complete(request: CompletionRequest): Promise<string> {
    const messages: ChatCompletionMessageParam[] = [
      { role: "system", content: request.system },
      ...request.messages.map(
        (m): ChatCompletionMessageParam =>
          m.role === "assistant"
            ? { role: "assistant", content: m.content }
            : m.role === "system"
              ? { role: "system", content: m.content }
              : { role: "user", content: m.content },
      ),
    ];

    const label = `LLM ${request.purpose} (${this.opts.model})`;
    const startTime = Date.now();

    try {
      const response = await withRetry(
        () =>
          this.client.chat.completions.create(
            {
              model: this.opts.model,
              temperature: request.temperature ?? this.opts.temperature,
              max_tokens: request.maxTokens ?? 1024,
              messages,
            },
            { signal: request.signal, timeout: this.opts.timeoutMs },
          ),
        {
          label,
          maxRetries: this.opts.maxRetries,
          signal: request.signal,
        },
      );

      this.opts.usage?.record(
        this.opts.model,
        request.purpose,
        response.usage?.prompt_tokens ?? 0,
        response.usage?.completion_tokens ?? 0,
        Date.now() - startTime,
      );

      return response.choices[0]?.message?.content?.trim() ?? "";
    } catch (error: unknown) {
      log.error(
        { label, status: getStatusCode(error), err: error },
        "❌ LLM call failed",
      );
      throw new ModelUnavailableError(label, error, getStatusCode(error));
    }
  }

  async embed(text: string, signal?: AbortSignal): Promise<number[]> {
    const label = `Embedding (${this.opts.embeddingModel})`;
    try {
      const response = await withRetry(
        () =>
          this.client.embeddings.create(
            {
              model: this.opts.embeddingModel,
              input: text.slice(0, MAX_EMBED_CHARS),
            },
            { signal, timeout: this.opts.timeoutMs },
          ),
        { label, maxRetries: this.opts.maxRetries, signal },
      );

      const embedding = response.data[0]?.embedding;
      if (!embedding) {
        throw new Error("Embedding endpoint returned no vector");
      }
      return embedding;
    } catch (error: unknown) {
      throw new ModelUnavailableError(label, error, getStatusCode(error));
    }
  }
}
