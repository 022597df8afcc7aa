import {
  TICKET_CATEGORIES,
  type SupportStore,
  type TicketCategory,
  type TicketPriority,
} from "../store/types.js";
import { titleCase } from "./account-lookup.js";
import { createTicketArgs } from "./schemas.js";
import type { ToolDefinition } from "./types.js";

// ── Ticket Creation ──────────────────────────────────────

const URGENT_PATTERNS = [
  /\burgent\b/,
  /\bcritical\b/,
  /\bemergency\b/,
  /\bdown\b/,
  /\boutage\b/,
  /not working at all/,
];

const HIGH_PATTERNS = [
  /cannot access/,
  /\bblocked\b/,
  /\bimportant\b/,
  /\bdeadline\b/,
  /losing data/,
  /\bsecurity\b/,
];

export const RESPONSE_TIMES: Record<TicketPriority, string> = {
  urgent: "1 hour",
  high: "4 hours",
  medium: "24 hours",
  low: "48 hours",
};

export function normalizeCategory(category: string | undefined): TicketCategory {
  const value = category?.trim().toLowerCase().replace(/[\s-]+/g, "_");
  return TICKET_CATEGORIES.find((c) => c === value) ?? "other";
}

/** Keyword-driven priority; falls back to the category. */
export function determinePriority(
  text: string,
  category: TicketCategory,
): TicketPriority {
  const lower = text.toLowerCase();
  if (URGENT_PATTERNS.some((p) => p.test(lower))) return "urgent";
  if (HIGH_PATTERNS.some((p) => p.test(lower))) return "high";
  if (category === "bug_report" || category === "billing") return "high";
  return "medium";
}

export function createTicketTool(
  store: SupportStore,
): ToolDefinition<"create_support_ticket"> {
  return {
    name: "create_support_ticket",
    description:
      "Create a support ticket so a human specialist follows up on the customer's issue.",
    schema: createTicketArgs,

    execute: async (args, ctx) => {
      const category = normalizeCategory(args.category);
      const priority = determinePriority(
        `${args.subject}\n${args.description}`,
        category,
      );

      // Unknown or missing emails still get a ticket; it is left unlinked
      const customer = args.customerEmail
        ? await store.findCustomer(args.customerEmail)
        : undefined;

      const ticketId = await store.createTicket({
        customerId: customer?.id ?? null,
        conversationId: args.conversationId ?? ctx.conversationId ?? null,
        subject: args.subject,
        description: args.description,
        category,
        priority,
        metadata: {
          createdBy: "ai_agent",
          ...(args.customerEmail ? { customerEmail: args.customerEmail } : {}),
          ...(args.customerEmail && !customer ? { emailUnverified: "true" } : {}),
        },
      });

      const followUp = args.customerEmail
        ? `A support specialist will review the case and reach out at ${args.customerEmail}.`
        : "A support specialist will review the case and follow up in this conversation.";

      return {
        status: "ok",
        text: [
          "**Support Ticket Created**",
          "",
          `- Ticket ID: \`${ticketId}\``,
          `- Subject: ${args.subject}`,
          `- Category: ${titleCase(category)}`,
          `- Priority: ${titleCase(priority)}`,
          `- Expected Response: Within ${RESPONSE_TIMES[priority]}`,
          "",
          followUp,
        ].join("\n"),
      };
    },
  };
}
