import type { LanguageModel } from "../llm/types.js";
import type { ToolRegistry } from "../tools/registry.js";
import type { ToolContext, ToolResult } from "../tools/types.js";
import { composeReply, extractEmail, renderToolResult } from "./compose.js";
import type { AgentReply, AgentRequest, SpecialistAgent } from "./types.js";

export function noCustomerReply(email: string): string {
  return (
    `No customer found with email ${email}. ` +
    "Please double-check the address, or share the email you used to sign up, and I'll look again."
  );
}

export const ORDER_NO_EMAIL_NOTE =
  "No customer email is known for this conversation, so no account lookups were run. " +
  "Ask the customer for the email address on their account.";

/** Account, subscription and billing questions. */
export class OrderAgent implements SpecialistAgent<"order"> {
  readonly type = "order";

  constructor(
    private readonly llm: LanguageModel,
    private readonly systemPrompt: string,
  ) {}

  async handle(request: AgentRequest, tools: ToolRegistry): Promise<AgentReply> {
    const email =
      extractEmail(request.customerEmail ?? "") ?? extractEmail(request.message);

    if (!email) {
      const content = await composeReply(
        this.llm,
        this.systemPrompt,
        request,
        ORDER_NO_EMAIL_NOTE,
        this.type,
      );
      return {
        content: content || "Could you share the email address on your account so I can look it up?",
        agentType: this.type,
        tools: [],
      };
    }

    const ctx: ToolContext = {
      conversationId: request.conversationId,
      correlationId: request.correlationId,
      signal: request.signal,
    };
    const results: ToolResult[] = [];

    // Profile, then subscriptions, then invoices. An unknown customer ends the turn.
    const profile = await tools.invoke("get_customer_info", { customerEmail: email }, ctx);
    results.push(profile);
    if (profile.notFound) {
      return { content: noCustomerReply(email), agentType: this.type, tools: results };
    }

    results.push(
      await tools.invoke("get_subscription_details", { customerEmail: email }, ctx),
    );
    results.push(await tools.invoke("get_invoices", { customerEmail: email }, ctx));

    const material = [
      `Account lookups for ${email}:`,
      ...results.map(renderToolResult),
    ].join("\n\n");

    const content = await composeReply(
      this.llm,
      this.systemPrompt,
      request,
      material,
      this.type,
    );

    return {
      content: content || results.filter((r) => r.success).map((r) => r.result).join("\n\n"),
      agentType: this.type,
      tools: results,
    };
  }
}
