import type { KnowledgeIndex } from "../knowledge/types.js";
import type { LanguageModel } from "../llm/types.js";
import { searchKnowledgeBaseArgs } from "./schemas.js";
import type { ToolDefinition } from "./types.js";

export interface KnowledgeSearchDeps {
  llm: LanguageModel;
  index: KnowledgeIndex;
  defaultTopK: number;
}

export const NO_KNOWLEDGE_MATCH = "No relevant information found in the knowledge base.";

export function createKnowledgeSearchTool(
  deps: KnowledgeSearchDeps,
): ToolDefinition<"search_knowledge_base"> {
  return {
    name: "search_knowledge_base",
    description:
      "Search the product knowledge base (FAQs, documentation, policies, troubleshooting) for passages relevant to a question.",
    schema: searchKnowledgeBaseArgs,

    execute: async ({ query, topK, category }, ctx) => {
      const vector = await deps.llm.embed(query, ctx.signal);
      const matches = await deps.index.search(vector, topK ?? deps.defaultTopK, {
        active: true,
        category,
      });

      if (matches.length === 0) {
        return { status: "not_found", text: NO_KNOWLEDGE_MATCH };
      }

      const text = matches
        .map(
          (m, i) =>
            `**Result ${i + 1}** (Relevance: ${Math.round(m.score * 100)}%)\n` +
            `Title: ${m.title}\n` +
            `Category: ${m.category}\n` +
            `Content: ${m.content}`,
        )
        .join("\n---\n");
      return { status: "ok", text };
    },
  };
}
