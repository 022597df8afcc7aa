import type { LanguageModel } from "../llm/types.js";
import type { ToolRegistry } from "../tools/registry.js";
import type { ToolResult } from "../tools/types.js";
import { composeReply, renderToolResult } from "./compose.js";
import type { AgentReply, AgentRequest, SpecialistAgent } from "./types.js";

export const FAQ_NO_MATCH_REPLY =
  "I couldn't find any documentation that answers this question. " +
  "Could you share a bit more detail, or would you like me to connect you with a member of our support team?";

export const FAQ_SEARCH_UNAVAILABLE_NOTE =
  "The documentation search is unavailable right now. " +
  "Do not answer from memory; tell the customer the information could not be retrieved.";

function groundingHeader(search: ToolResult): string {
  if (search.success) return "Retrieved documentation:";
  if (search.notFound) return "No matching documentation was found for this question.";
  return FAQ_SEARCH_UNAVAILABLE_NOTE;
}

/** Retrieval-augmented answers from the knowledge base. */
export class FaqAgent implements SpecialistAgent<"faq"> {
  readonly type = "faq";

  constructor(
    private readonly llm: LanguageModel,
    private readonly systemPrompt: string,
  ) {}

  async handle(request: AgentRequest, tools: ToolRegistry): Promise<AgentReply> {
    const search = await tools.invoke(
      "search_knowledge_base",
      { query: request.message },
      {
        conversationId: request.conversationId,
        correlationId: request.correlationId,
        signal: request.signal,
      },
    );

    const grounding = `${groundingHeader(search)}\n${renderToolResult(search)}`;

    const content = await composeReply(
      this.llm,
      this.systemPrompt,
      request,
      grounding,
      this.type,
    );

    return {
      content: content || FAQ_NO_MATCH_REPLY,
      agentType: this.type,
      tools: [search],
    };
  }
}
