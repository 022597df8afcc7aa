import type { KnowledgeIndex } from "../knowledge/types.js";
import type { LanguageModel } from "../llm/types.js";
import type { Logger } from "../logger.js";
import type { SupportStore } from "../store/types.js";
import { createAccountLookupTools } from "./account-lookup.js";
import { createTicketTool } from "./create-ticket.js";
import { createKnowledgeSearchTool } from "./knowledge-search.js";
import { ToolRegistry } from "./registry.js";

export interface ToolDeps {
  store: SupportStore;
  llm: LanguageModel;
  knowledge: KnowledgeIndex;
  knowledgeTopK: number;
  timeoutMs: number;
  logger: Logger;
}

/** Registry with every support tool registered. */
export function createSupportTools(deps: ToolDeps): ToolRegistry {
  const lookups = createAccountLookupTools(deps.store);
  return new ToolRegistry(deps.logger, deps.timeoutMs)
    .register(
      createKnowledgeSearchTool({
        llm: deps.llm,
        index: deps.knowledge,
        defaultTopK: deps.knowledgeTopK,
      }),
    )
    .register(lookups.customerInfo)
    .register(lookups.subscriptionDetails)
    .register(lookups.invoices)
    .register(createTicketTool(deps.store));
}
