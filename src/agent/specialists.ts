import type { AgentPrompts } from "../llm/prompts.js";
import type { LanguageModel } from "../llm/types.js";
import type { Logger } from "../logger.js";
import { EscalationAgent } from "./escalation.js";
import { FaqAgent } from "./faq.js";
import { OrderAgent } from "./order.js";
import type { SpecialistTable } from "./types.js";

export function createSpecialists(
  llm: LanguageModel,
  prompts: AgentPrompts,
  logger: Logger,
): SpecialistTable {
  return {
    faq: new FaqAgent(llm, prompts.faq),
    order: new OrderAgent(llm, prompts.order),
    escalation: new EscalationAgent(llm, prompts.escalation, logger),
  };
}
