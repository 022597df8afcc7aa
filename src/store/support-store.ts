import { randomUUID } from "node:crypto";
import { z } from "zod";
import { StorageUnavailableError } from "../errors.js";
import type { KnowledgeCategory, KnowledgeDocument } from "../knowledge/types.js";
import type { SupportDB } from "./db.js";
import type {
  Conversation,
  ConversationStatus,
  Customer,
  Invoice,
  InvoiceStatus,
  Message,
  MessageMetadata,
  MessageRole,
  NewMessage,
  NewTicket,
  Subscription,
  SubscriptionPlan,
  SubscriptionStatus,
  SupportStore,
  SupportTicket,
  TicketCategory,
  TicketPriority,
} from "./types.js";

// ── Row shapes ───────────────────────────────────────────

interface ConversationRow {
  id: string;
  status: ConversationStatus;
  customer_id: string | null;
  customer_email: string | null;
  created_at: number;
  updated_at: number;
}

interface MessageRow {
  seq: number;
  id: string;
  conversation_id: string;
  role: MessageRole;
  content: string;
  metadata: string;
  created_at: number;
}

interface CustomerRow {
  id: string;
  email: string;
  first_name: string;
  last_name: string;
  company_name: string;
  phone: string;
  is_active: number;
  created_at: number;
}

interface SubscriptionRow {
  id: string;
  customer_id: string;
  plan: SubscriptionPlan;
  status: SubscriptionStatus;
  billing_cycle: "monthly" | "yearly";
  price: number;
  seats: number;
  start_date: string;
  end_date: string | null;
  trial_end_date: string | null;
  features: string;
  created_at: number;
}

interface InvoiceRow {
  id: string;
  customer_id: string;
  invoice_number: string;
  status: InvoiceStatus;
  amount: number;
  tax: number;
  total: number;
  currency: string;
  due_date: string;
  paid_date: string | null;
  description: string;
  created_at: number;
}

interface TicketRow {
  id: string;
  customer_id: string | null;
  conversation_id: string | null;
  subject: string;
  description: string;
  category: TicketCategory;
  priority: TicketPriority;
  status: SupportTicket["status"];
  metadata: string;
  created_at: number;
}

interface KnowledgeDocumentRow {
  id: string;
  title: string;
  content: string;
  category: KnowledgeCategory;
  active: number;
}

// JSON columns are validated on the way out
const metadataSchema = z
  .object({
    agentType: z.string().optional(),
    toolsUsed: z
      .array(
        z.object({
          name: z.string(),
          success: z.boolean(),
          notFound: z.boolean(),
          durationMs: z.number(),
        }),
      )
      .optional(),
    correlationId: z.string().optional(),
    routing: z.object({ confidence: z.number(), source: z.string() }).optional(),
  });

const stringArraySchema = z.array(z.string());
const stringRecordSchema = z.record(z.string());

function parseJson<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  text: string,
  fallback: T,
): T {
  try {
    const parsed = schema.safeParse(JSON.parse(text));
    return parsed.success ? parsed.data : fallback;
  } catch {
    return fallback;
  }
}

// ── SQLite Support Store ─────────────────────────────────

/**
 * better-sqlite3 implementation of the durable store. Every driver failure
 * surfaces as StorageUnavailableError.
 */
export class SqliteSupportStore implements SupportStore {
  private readonly db;

  constructor(
    supportDb: SupportDB,
    private readonly now: () => number = Date.now,
  ) {
    this.db = supportDb.raw();
  }

  // ── Conversations ──

  async ensureConversation(
    id: string,
    customerId: string | null = null,
    customerEmail: string | null = null,
  ): Promise<Conversation> {
    return this.guard("ensureConversation", () => {
      const now = this.now();
      this.db
        .prepare(
          `INSERT INTO conversations (id, status, customer_id, customer_email, created_at, updated_at)
           VALUES (?, 'active', ?, ?, ?, ?)
           ON CONFLICT(id) DO UPDATE SET
             customer_id = COALESCE(excluded.customer_id, customer_id),
             customer_email = COALESCE(excluded.customer_email, customer_email)`,
        )
        .run(id, customerId, customerEmail, now, now);
      const row = this.db
        .prepare<[string], ConversationRow>("SELECT * FROM conversations WHERE id = ?")
        .get(id);
      if (!row) throw new Error(`conversation ${id} vanished after insert`);
      return toConversation(row);
    });
  }

  async getConversation(id: string): Promise<Conversation | undefined> {
    return this.guard("getConversation", () => {
      const row = this.db
        .prepare<[string], ConversationRow>("SELECT * FROM conversations WHERE id = ?")
        .get(id);
      return row ? toConversation(row) : undefined;
    });
  }

  async setConversationStatus(
    id: string,
    status: ConversationStatus,
  ): Promise<void> {
    return this.guard("setConversationStatus", () => {
      this.db
        .prepare("UPDATE conversations SET status = ?, updated_at = ? WHERE id = ?")
        .run(status, this.now(), id);
    });
  }

  async loadRecentMessages(
    conversationId: string,
    limit: number,
  ): Promise<Message[]> {
    return this.guard("loadRecentMessages", () => {
      const rows = this.db
        .prepare<[string, number], MessageRow>(
          `SELECT * FROM messages WHERE conversation_id = ?
           ORDER BY created_at DESC, seq DESC LIMIT ?`,
        )
        .all(conversationId, limit);
      // Reverse to get chronological order
      return rows.reverse().map(toMessage);
    });
  }

  async insertMessage(message: NewMessage): Promise<Message> {
    return this.guard("insertMessage", () => {
      const id = randomUUID();
      const now = this.now();
      const insert = this.db.transaction(() => {
        this.db
          .prepare(
            `INSERT INTO conversations (id, status, created_at, updated_at)
             VALUES (?, 'active', ?, ?)
             ON CONFLICT(id) DO UPDATE SET updated_at = excluded.updated_at`,
          )
          .run(message.conversationId, now, now);
        return this.db
          .prepare(
            `INSERT INTO messages (id, conversation_id, role, content, metadata, created_at)
             VALUES (?, ?, ?, ?, ?, ?)`,
          )
          .run(
            id,
            message.conversationId,
            message.role,
            message.content,
            JSON.stringify(message.metadata ?? {}),
            now,
          );
      });
      const result = insert();
      return {
        id,
        conversationId: message.conversationId,
        role: message.role,
        content: message.content,
        createdAt: now,
        sequence: Number(result.lastInsertRowid),
        metadata: message.metadata ?? {},
      };
    });
  }

  async latestMessageSequence(conversationId: string): Promise<number> {
    return this.guard("latestMessageSequence", () => {
      const row = this.db
        .prepare<[string], { seq: number | null }>(
          "SELECT MAX(seq) AS seq FROM messages WHERE conversation_id = ?",
        )
        .get(conversationId);
      return row?.seq ?? 0;
    });
  }

  async countMessages(conversationId: string): Promise<number> {
    return this.guard("countMessages", () => {
      const row = this.db
        .prepare<[string], { n: number }>(
          "SELECT COUNT(*) AS n FROM messages WHERE conversation_id = ?",
        )
        .get(conversationId);
      return row?.n ?? 0;
    });
  }

  async closeStaleConversations(olderThan: number): Promise<number> {
    return this.guard("closeStaleConversations", () => {
      const result = this.db
        .prepare(
          `UPDATE conversations SET status = 'closed', updated_at = ?
           WHERE status = 'active' AND updated_at < ?`,
        )
        .run(this.now(), olderThan);
      return result.changes;
    });
  }

  async linkOrphanConversations(): Promise<number> {
    return this.guard("linkOrphanConversations", () => {
      const result = this.db
        .prepare(
          `UPDATE conversations
           SET customer_id = (SELECT c.id FROM customers c WHERE c.email = conversations.customer_email)
           WHERE customer_id IS NULL
             AND customer_email IS NOT NULL
             AND EXISTS (SELECT 1 FROM customers c WHERE c.email = conversations.customer_email)`,
        )
        .run();
      return result.changes;
    });
  }

  // ── Accounts & billing ──

  async findCustomer(email: string): Promise<Customer | undefined> {
    return this.guard("findCustomer", () => {
      const row = this.db
        .prepare<[string], CustomerRow>("SELECT * FROM customers WHERE email = ?")
        .get(email);
      return row ? toCustomer(row) : undefined;
    });
  }

  async findSubscriptions(
    customerId: string,
    limit = 10,
  ): Promise<Subscription[]> {
    return this.guard("findSubscriptions", () =>
      this.db
        .prepare<[string, number], SubscriptionRow>(
          `SELECT * FROM subscriptions WHERE customer_id = ?
           ORDER BY created_at DESC, seq DESC LIMIT ?`,
        )
        .all(customerId, limit)
        .map(toSubscription),
    );
  }

  async findInvoices(customerId: string, limit: number): Promise<Invoice[]> {
    return this.guard("findInvoices", () =>
      this.db
        .prepare<[string, number], InvoiceRow>(
          `SELECT * FROM invoices WHERE customer_id = ?
           ORDER BY created_at DESC, seq DESC LIMIT ?`,
        )
        .all(customerId, limit)
        .map(toInvoice),
    );
  }

  async insertCustomer(
    customer: Omit<Customer, "id" | "createdAt">,
  ): Promise<Customer> {
    return this.guard("insertCustomer", () => {
      const created: Customer = {
        ...customer,
        email: customer.email.trim().toLowerCase(),
        id: randomUUID(),
        createdAt: this.now(),
      };
      this.db
        .prepare(
          `INSERT INTO customers (id, email, first_name, last_name, company_name, phone, is_active, created_at)
           VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
        )
        .run(
          created.id,
          created.email,
          created.firstName,
          created.lastName,
          created.companyName,
          created.phone,
          created.isActive ? 1 : 0,
          created.createdAt,
        );
      return created;
    });
  }

  async insertSubscription(
    subscription: Omit<Subscription, "id" | "createdAt">,
  ): Promise<Subscription> {
    return this.guard("insertSubscription", () => {
      const created: Subscription = {
        ...subscription,
        id: randomUUID(),
        createdAt: this.now(),
      };
      this.db
        .prepare(
          `INSERT INTO subscriptions (id, customer_id, plan, status, billing_cycle, price, seats, start_date, end_date, trial_end_date, features, created_at)
           VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
        )
        .run(
          created.id,
          created.customerId,
          created.plan,
          created.status,
          created.billingCycle,
          created.price,
          created.seats,
          created.startDate,
          created.endDate,
          created.trialEndDate,
          JSON.stringify(created.features),
          created.createdAt,
        );
      return created;
    });
  }

  async insertInvoice(invoice: Omit<Invoice, "id" | "createdAt">): Promise<Invoice> {
    return this.guard("insertInvoice", () => {
      const created: Invoice = {
        ...invoice,
        id: randomUUID(),
        createdAt: this.now(),
      };
      this.db
        .prepare(
          `INSERT INTO invoices (id, customer_id, invoice_number, status, amount, tax, total, currency, due_date, paid_date, description, created_at)
           VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
        )
        .run(
          created.id,
          created.customerId,
          created.invoiceNumber,
          created.status,
          created.amount,
          created.tax,
          created.total,
          created.currency,
          created.dueDate,
          created.paidDate,
          created.description,
          created.createdAt,
        );
      return created;
    });
  }

  // ── Tickets ──

  async createTicket(ticket: NewTicket): Promise<string> {
    return this.guard("createTicket", () => {
      const id = randomUUID();
      this.db
        .prepare(
          `INSERT INTO support_tickets (id, customer_id, conversation_id, subject, description, category, priority, status, metadata, created_at)
           VALUES (?, ?, ?, ?, ?, ?, ?, 'open', ?, ?)`,
        )
        .run(
          id,
          ticket.customerId,
          ticket.conversationId,
          ticket.subject,
          ticket.description,
          ticket.category,
          ticket.priority,
          JSON.stringify(ticket.metadata ?? {}),
          this.now(),
        );
      return id;
    });
  }

  async listTickets(customerId: string): Promise<SupportTicket[]> {
    return this.guard("listTickets", () =>
      this.db
        .prepare<[string], TicketRow>(
          "SELECT * FROM support_tickets WHERE customer_id = ? ORDER BY created_at DESC, seq DESC",
        )
        .all(customerId)
        .map(toTicket),
    );
  }

  // ── Knowledge documents ──

  async saveKnowledgeDocument(doc: KnowledgeDocument): Promise<void> {
    return this.guard("saveKnowledgeDocument", () => {
      const now = this.now();
      this.db
        .prepare(
          `INSERT INTO knowledge_documents (id, title, content, category, active, created_at, updated_at)
           VALUES (?, ?, ?, ?, ?, ?, ?)
           ON CONFLICT(id) DO UPDATE SET
             title = excluded.title,
             content = excluded.content,
             category = excluded.category,
             active = excluded.active,
             updated_at = excluded.updated_at`,
        )
        .run(doc.id, doc.title, doc.content, doc.category, doc.active ? 1 : 0, now, now);
    });
  }

  async getKnowledgeDocument(id: string): Promise<KnowledgeDocument | undefined> {
    return this.guard("getKnowledgeDocument", () => {
      const row = this.db
        .prepare<[string], KnowledgeDocumentRow>(
          "SELECT id, title, content, category, active FROM knowledge_documents WHERE id = ?",
        )
        .get(id);
      return row
        ? {
            id: row.id,
            title: row.title,
            content: row.content,
            category: row.category,
            active: row.active === 1,
          }
        : undefined;
    });
  }

  async countActiveKnowledgeDocuments(): Promise<
    Partial<Record<KnowledgeCategory, number>>
  > {
    return this.guard("countActiveKnowledgeDocuments", () => {
      const rows = this.db
        .prepare<[], { category: KnowledgeCategory; n: number }>(
          `SELECT category, COUNT(*) AS n FROM knowledge_documents
           WHERE active = 1 GROUP BY category`,
        )
        .all();
      const counts: Partial<Record<KnowledgeCategory, number>> = {};
      for (const row of rows) counts[row.category] = row.n;
      return counts;
    });
  }

  // ── Helpers ──

  private async guard<T>(operation: string, fn: () => T): Promise<T> {
    try {
      return fn();
    } catch (err) {
      throw new StorageUnavailableError(operation, err);
    }
  }
}

// ── Row mappers ──────────────────────────────────────────

function toConversation(row: ConversationRow): Conversation {
  return {
    id: row.id,
    status: row.status,
    customerId: row.customer_id,
    customerEmail: row.customer_email,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function toMessage(row: MessageRow): Message {
  const metadata: MessageMetadata = parseJson(metadataSchema, row.metadata, {});
  return {
    id: row.id,
    conversationId: row.conversation_id,
    role: row.role,
    content: row.content,
    createdAt: row.created_at,
    sequence: row.seq,
    metadata,
  };
}

function toCustomer(row: CustomerRow): Customer {
  return {
    id: row.id,
    email: row.email,
    firstName: row.first_name,
    lastName: row.last_name,
    companyName: row.company_name,
    phone: row.phone,
    isActive: row.is_active === 1,
    createdAt: row.created_at,
  };
}

function toSubscription(row: SubscriptionRow): Subscription {
  return {
    id: row.id,
    customerId: row.customer_id,
    plan: row.plan,
    status: row.status,
    billingCycle: row.billing_cycle,
    price: row.price,
    seats: row.seats,
    startDate: row.start_date,
    endDate: row.end_date,
    trialEndDate: row.trial_end_date,
    features: parseJson(stringArraySchema, row.features, []),
    createdAt: row.created_at,
  };
}

function toInvoice(row: InvoiceRow): Invoice {
  return {
    id: row.id,
    customerId: row.customer_id,
    invoiceNumber: row.invoice_number,
    status: row.status,
    amount: row.amount,
    tax: row.tax,
    total: row.total,
    currency: row.currency,
    dueDate: row.due_date,
    paidDate: row.paid_date,
    description: row.description,
    createdAt: row.created_at,
  };
}

function toTicket(row: TicketRow): SupportTicket {
  return {
    id: row.id,
    customerId: row.customer_id,
    conversationId: row.conversation_id,
    subject: row.subject,
    description: row.description,
    category: row.category,
    priority: row.priority,
    status: row.status,
    metadata: parseJson(stringRecordSchema, row.metadata, {}),
    createdAt: row.created_at,
  };
}
