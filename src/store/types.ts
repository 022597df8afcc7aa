import type { KnowledgeCategory, KnowledgeDocument } from "../knowledge/types.js";

// ── Support Domain: Shared Types ────────────────────────

export type ConversationStatus = "active" | "closed" | "escalated";

export interface Conversation {
  id: string;
  status: ConversationStatus;
  customerId: string | null;
  /** Email the conversation was opened with; links it once the customer exists. */
  customerEmail: string | null;
  createdAt: number; // Unix ms
  updatedAt: number; // Unix ms
}

export type MessageRole = "user" | "assistant" | "system";

/** What a specialist did with one tool during a turn. */
export interface ToolInvocationSummary {
  name: string;
  success: boolean;
  notFound: boolean;
  durationMs: number;
}

export interface MessageMetadata {
  agentType?: string;
  toolsUsed?: ToolInvocationSummary[];
  correlationId?: string;
  routing?: { confidence: number; source: string };
}

export interface Message {
  id: string;
  conversationId: string;
  role: MessageRole;
  content: string;
  createdAt: number; // Unix ms
  /** Insertion order; breaks createdAt ties. */
  sequence: number;
  metadata: MessageMetadata;
}

export interface NewMessage {
  conversationId: string;
  role: MessageRole;
  content: string;
  metadata?: MessageMetadata;
}

export interface Customer {
  id: string;
  email: string;
  firstName: string;
  lastName: string;
  companyName: string;
  phone: string;
  isActive: boolean;
  createdAt: number;
}

export type SubscriptionPlan = "free" | "starter" | "professional" | "enterprise";
export type SubscriptionStatus =
  | "active"
  | "trial"
  | "past_due"
  | "cancelled"
  | "paused";

export interface Subscription {
  id: string;
  customerId: string;
  plan: SubscriptionPlan;
  status: SubscriptionStatus;
  billingCycle: "monthly" | "yearly";
  price: number;
  seats: number;
  startDate: string; // YYYY-MM-DD
  endDate: string | null;
  trialEndDate: string | null;
  features: string[];
  createdAt: number;
}

export type InvoiceStatus =
  | "draft"
  | "pending"
  | "paid"
  | "overdue"
  | "cancelled"
  | "refunded";

export interface Invoice {
  id: string;
  customerId: string;
  invoiceNumber: string;
  status: InvoiceStatus;
  amount: number;
  tax: number;
  total: number;
  currency: string;
  dueDate: string; // YYYY-MM-DD
  paidDate: string | null;
  description: string;
  createdAt: number;
}

export const TICKET_CATEGORIES = [
  "billing",
  "technical",
  "account",
  "feature_request",
  "bug_report",
  "other",
] as const;

export type TicketCategory = (typeof TICKET_CATEGORIES)[number];
export type TicketPriority = "low" | "medium" | "high" | "urgent";

export interface NewTicket {
  customerId: string | null;
  conversationId: string | null;
  subject: string;
  description: string;
  category: TicketCategory;
  priority: TicketPriority;
  metadata?: Record<string, string>;
}

export interface SupportTicket extends Required<NewTicket> {
  id: string;
  status: "open" | "in_progress" | "waiting_customer" | "resolved" | "closed";
  createdAt: number;
}

// ── Durable Store Port ───────────────────────────────────

export interface SupportStore {
  // Conversations & messages
  ensureConversation(
    id: string,
    customerId?: string | null,
    customerEmail?: string | null,
  ): Promise<Conversation>;
  getConversation(id: string): Promise<Conversation | undefined>;
  setConversationStatus(id: string, status: ConversationStatus): Promise<void>;
  /** Most recent `limit` messages, oldest first. */
  loadRecentMessages(conversationId: string, limit: number): Promise<Message[]>;
  insertMessage(message: NewMessage): Promise<Message>;
  /** Highest message sequence in the conversation, 0 when it has none. */
  latestMessageSequence(conversationId: string): Promise<number>;
  countMessages(conversationId: string): Promise<number>;
  /** Close active conversations not updated since `olderThan` (Unix ms). */
  closeStaleConversations(olderThan: number): Promise<number>;
  /** Link unlinked conversations whose email now matches a customer. */
  linkOrphanConversations(): Promise<number>;

  // Accounts & billing
  findCustomer(email: string): Promise<Customer | undefined>;
  /** Newest first. */
  findSubscriptions(customerId: string, limit?: number): Promise<Subscription[]>;
  /** Newest first. */
  findInvoices(customerId: string, limit: number): Promise<Invoice[]>;
  insertCustomer(customer: Omit<Customer, "id" | "createdAt">): Promise<Customer>;
  insertSubscription(
    subscription: Omit<Subscription, "id" | "createdAt">,
  ): Promise<Subscription>;
  insertInvoice(invoice: Omit<Invoice, "id" | "createdAt">): Promise<Invoice>;

  // Tickets
  createTicket(ticket: NewTicket): Promise<string>;
  listTickets(customerId: string): Promise<SupportTicket[]>;

  // Knowledge documents (source of truth for the vector index)
  saveKnowledgeDocument(doc: KnowledgeDocument): Promise<void>;
  getKnowledgeDocument(id: string): Promise<KnowledgeDocument | undefined>;
  /** Active documents per category; categories without any are absent. */
  countActiveKnowledgeDocuments(): Promise<Partial<Record<KnowledgeCategory, number>>>;
}
