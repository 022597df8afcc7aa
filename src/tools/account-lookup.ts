import type {
  Customer,
  Invoice,
  InvoiceStatus,
  Subscription,
  SupportStore,
} from "../store/types.js";
import { customerLookupArgs, invoiceLookupArgs } from "./schemas.js";
import type { ToolDefinition, ToolOutcome } from "./types.js";

// ── Account Lookup Tools ─────────────────────────────────
// Emails arrive trimmed and lower-cased by the argument schema.

/** Subscriptions shown per lookup, newest first. */
const MAX_SUBSCRIPTIONS = 3;
/** Features listed per subscription. */
const MAX_FEATURES = 5;

const INVOICE_MARKERS: Partial<Record<InvoiceStatus, string>> = {
  paid: "✓",
  pending: "⏳",
  overdue: "⚠️",
  refunded: "↩️",
  cancelled: "✗",
};

export function customerNotFound(email: string): ToolOutcome {
  return { status: "not_found", text: `No customer found with email: ${email}` };
}

export function createAccountLookupTools(store: SupportStore): {
  customerInfo: ToolDefinition<"get_customer_info">;
  subscriptionDetails: ToolDefinition<"get_subscription_details">;
  invoices: ToolDefinition<"get_invoices">;
} {
  return {
    customerInfo: {
      name: "get_customer_info",
      description:
        "Look up a customer's profile (name, company, account status) by email address.",
      schema: customerLookupArgs,
      execute: async ({ customerEmail }) => {
        const customer = await store.findCustomer(customerEmail);
        if (!customer) return customerNotFound(customerEmail);
        return { status: "ok", text: formatCustomer(customer) };
      },
    },

    subscriptionDetails: {
      name: "get_subscription_details",
      description:
        "Get a customer's most recent subscriptions: plan, status, billing cycle, seats and dates.",
      schema: customerLookupArgs,
      execute: async ({ customerEmail }) => {
        const customer = await store.findCustomer(customerEmail);
        if (!customer) return customerNotFound(customerEmail);

        const subscriptions = await store.findSubscriptions(
          customer.id,
          MAX_SUBSCRIPTIONS,
        );
        if (subscriptions.length === 0) {
          return { status: "ok", text: `No subscriptions found for ${customerEmail}` };
        }
        return {
          status: "ok",
          text: formatSubscriptions(fullName(customer), subscriptions),
        };
      },
    },

    invoices: {
      name: "get_invoices",
      description:
        "Get a customer's recent invoices with payment status, plus paid and outstanding totals.",
      schema: invoiceLookupArgs,
      execute: async ({ customerEmail, limit }) => {
        const customer = await store.findCustomer(customerEmail);
        if (!customer) return customerNotFound(customerEmail);

        const invoices = await store.findInvoices(customer.id, limit);
        if (invoices.length === 0) {
          return { status: "ok", text: `No invoices found for ${customerEmail}` };
        }
        return { status: "ok", text: formatInvoices(fullName(customer), invoices) };
      },
    },
  };
}

// ── Formatting ───────────────────────────────────────────

export function formatCustomer(c: Customer): string {
  return [
    "**Customer Information**",
    `- Name: ${fullName(c)}`,
    `- Email: ${c.email}`,
    `- Company: ${c.companyName || "N/A"}`,
    `- Phone: ${c.phone || "N/A"}`,
    `- Account Status: ${c.isActive ? "Active" : "Inactive"}`,
    `- Member Since: ${isoDate(c.createdAt)}`,
  ].join("\n");
}

export function formatSubscriptions(
  name: string,
  subscriptions: Subscription[],
): string {
  const lines = [`**Subscriptions for ${name}**`];
  for (const s of subscriptions) {
    lines.push(
      "",
      `**${titleCase(s.plan)} Plan**`,
      `- Status: ${titleCase(s.status)}`,
      `- Billing: ${titleCase(s.billingCycle)} at ${money(s.price)}`,
      `- Seats: ${s.seats}`,
      `- Start Date: ${s.startDate}`,
      `- End Date: ${s.endDate ?? "N/A"}`,
      `- Trial Ends: ${s.trialEndDate ?? "N/A"}`,
    );
    if (s.features.length > 0) {
      lines.push(`- Features: ${s.features.slice(0, MAX_FEATURES).join(", ")}`);
    }
  }
  return lines.join("\n");
}

export function formatInvoices(name: string, invoices: Invoice[]): string {
  const totalPaid = sum(invoices.filter((i) => i.status === "paid"));
  const outstanding = sum(
    invoices.filter((i) => i.status === "pending" || i.status === "overdue"),
  );

  const lines = [
    `**Invoice History for ${name}**`,
    `Total Paid: ${money(totalPaid)}`,
    `Outstanding: ${money(outstanding)}`,
  ];
  for (const inv of invoices) {
    const marker = INVOICE_MARKERS[inv.status];
    lines.push(
      "",
      `**Invoice #${inv.invoiceNumber}**${marker ? ` ${marker}` : ""}`,
      `- Status: ${titleCase(inv.status)}`,
      `- Total: ${money(inv.total)} ${inv.currency}`,
      `- Due Date: ${inv.dueDate}`,
      `- Paid Date: ${inv.paidDate ?? "N/A"}`,
    );
  }
  return lines.join("\n");
}

// ── Helpers ──────────────────────────────────────────────

function fullName(c: Customer): string {
  return `${c.firstName} ${c.lastName}`;
}

function sum(invoices: Invoice[]): number {
  return invoices.reduce((s, i) => s + i.total, 0);
}

export function money(amount: number): string {
  return `$${amount.toFixed(2)}`;
}

/** "past_due" → "Past Due" */
export function titleCase(value: string): string {
  return value
    .split("_")
    .map((w) => w.charAt(0).toUpperCase() + w.slice(1))
    .join(" ");
}

function isoDate(ms: number): string {
  return new Date(ms).toISOString().slice(0, 10);
}
