import type { LanguageModel } from "../llm/types.js";
import type { Logger } from "../logger.js";
import { formatAgo } from "../memory/context-builder.js";
import type { ToolRegistry } from "../tools/registry.js";
import { composeReply, extractEmail, renderToolResult } from "./compose.js";
import type { AgentReply, AgentRequest, SpecialistAgent } from "./types.js";

export const TICKET_FAILURE_REPLY =
  "I'm sorry, I wasn't able to create a support ticket for you just now. " +
  "The problem has been logged for our team. If this is urgent, please contact support directly and mention this conversation.";

/** Context lines copied into the ticket body. */
const TICKET_CONTEXT_MESSAGES = 6;

const CATEGORY_HINTS: ReadonlyArray<{ category: string; re: RegExp }> = [
  { category: "billing", re: /\b(bill|invoice|charge|refund|payment|subscription)/i },
  { category: "bug_report", re: /\b(bug|error|crash|broken)/i },
  { category: "account", re: /\b(login|log in|password|account|access)/i },
  { category: "feature_request", re: /\b(feature|would be nice|please add)/i },
  { category: "technical", re: /\b(down|outage|slow|sync|integration|api)/i },
];

export function inferTicketCategory(message: string): string {
  return CATEGORY_HINTS.find((h) => h.re.test(message))?.category ?? "other";
}

export function ticketSubject(message: string): string {
  const firstLine = message.trim().split("\n")[0] ?? "";
  const short = firstLine.length > 80 ? `${firstLine.slice(0, 77)}...` : firstLine;
  return `Escalation: ${short || "customer request"}`;
}

/** Files a ticket for every turn it handles, then confirms to the customer. */
export class EscalationAgent implements SpecialistAgent<"escalation"> {
  readonly type = "escalation";

  constructor(
    private readonly llm: LanguageModel,
    private readonly systemPrompt: string,
    private readonly logger: Logger,
  ) {}

  async handle(request: AgentRequest, tools: ToolRegistry): Promise<AgentReply> {
    const email =
      extractEmail(request.customerEmail ?? "") ?? extractEmail(request.message);

    const ticket = await tools.invoke(
      "create_support_ticket",
      {
        customerEmail: email,
        subject: ticketSubject(request.message),
        description: this.ticketBody(request),
        category: inferTicketCategory(request.message),
        conversationId: request.conversationId,
      },
      {
        conversationId: request.conversationId,
        correlationId: request.correlationId,
        signal: request.signal,
      },
    );

    if (!ticket.success) {
      this.logger.error(
        {
          conversationId: request.conversationId,
          correlationId: request.correlationId,
          error: ticket.error,
        },
        "❌ Escalation ticket could not be created",
      );
      return { content: TICKET_FAILURE_REPLY, agentType: this.type, tools: [ticket] };
    }

    const content = await composeReply(
      this.llm,
      this.systemPrompt,
      request,
      `Ticket outcome:\n${renderToolResult(ticket)}`,
      this.type,
    );

    return { content: content || ticket.result, agentType: this.type, tools: [ticket] };
  }

  private ticketBody(request: AgentRequest): string {
    const { routing } = request;
    const now = Date.now();
    const recent = request.context
      .slice(-TICKET_CONTEXT_MESSAGES)
      .map((m) => `[${formatAgo(m.createdAt, now)}] ${m.role.toUpperCase()}: ${m.content}`);

    return [
      "Customer message:",
      request.message,
      "",
      `Routing (${routing.source}, confidence ${routing.confidence.toFixed(2)}): ${
        routing.reasoning || "no reasoning given"
      }`,
      "",
      "Recent conversation:",
      recent.length > 0 ? recent.join("\n") : "(none)",
    ].join("\n");
  }
}
