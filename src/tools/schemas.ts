import { z } from "zod";
import { KNOWLEDGE_CATEGORIES } from "../knowledge/types.js";

// ── Tool Argument Schemas ────────────────────────────────
// One schema per tool; static argument types are inferred from these.

const email = z.string().trim().toLowerCase().email();

export const searchKnowledgeBaseArgs = z.object({
  query: z.string().trim().min(1).max(2_000),
  topK: z.number().int().min(1).max(20).optional(),
  category: z.enum(KNOWLEDGE_CATEGORIES).optional(),
});

export const customerLookupArgs = z.object({
  customerEmail: email,
});

export const invoiceLookupArgs = customerLookupArgs.extend({
  limit: z.number().int().min(1).max(50).default(5),
});

export const createTicketArgs = z.object({
  customerEmail: email.optional(),
  subject: z.string().trim().min(1).max(255),
  description: z.string().trim().min(1),
  /** Unknown categories are normalized to "other" by the tool. */
  category: z.string().trim().optional(),
  conversationId: z.string().optional(),
});

export interface ToolSchemas {
  search_knowledge_base: typeof searchKnowledgeBaseArgs;
  get_customer_info: typeof customerLookupArgs;
  get_subscription_details: typeof customerLookupArgs;
  get_invoices: typeof invoiceLookupArgs;
  create_support_ticket: typeof createTicketArgs;
}

export type ToolName = keyof ToolSchemas;

export const TOOL_NAMES = [
  "search_knowledge_base",
  "get_customer_info",
  "get_subscription_details",
  "get_invoices",
  "create_support_ticket",
] as const satisfies readonly ToolName[];

/** What a caller passes. */
export type ToolInput<N extends ToolName> = z.input<ToolSchemas[N]>;

/** What the tool receives after validation. */
export type ToolArgs<N extends ToolName> = z.output<ToolSchemas[N]>;
