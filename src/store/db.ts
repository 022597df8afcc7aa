import Database from "better-sqlite3";
import { mkdirSync } from "node:fs";
import { dirname } from "node:path";

const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS conversations (
  id          TEXT PRIMARY KEY,
  status      TEXT NOT NULL DEFAULT 'active' CHECK(status IN ('active','closed','escalated')),
  customer_id TEXT,
  customer_email TEXT,
  created_at  INTEGER NOT NULL,
  updated_at  INTEGER NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_conversations_updated
  ON conversations(status, updated_at);

CREATE TABLE IF NOT EXISTS messages (
  seq             INTEGER PRIMARY KEY AUTOINCREMENT,
  id              TEXT NOT NULL UNIQUE,
  conversation_id TEXT NOT NULL REFERENCES conversations(id) ON DELETE CASCADE,
  role            TEXT NOT NULL CHECK(role IN ('user','assistant','system')),
  content         TEXT NOT NULL,
  metadata        TEXT NOT NULL DEFAULT '{}',
  created_at      INTEGER NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_messages_conversation
  ON messages(conversation_id, created_at, seq);

CREATE TABLE IF NOT EXISTS customers (
  id           TEXT PRIMARY KEY,
  email        TEXT NOT NULL UNIQUE,
  first_name   TEXT NOT NULL,
  last_name    TEXT NOT NULL,
  company_name TEXT NOT NULL DEFAULT '',
  phone        TEXT NOT NULL DEFAULT '',
  is_active    INTEGER NOT NULL DEFAULT 1,
  created_at   INTEGER NOT NULL
);

CREATE TABLE IF NOT EXISTS subscriptions (
  seq            INTEGER PRIMARY KEY AUTOINCREMENT,
  id             TEXT NOT NULL UNIQUE,
  customer_id    TEXT NOT NULL REFERENCES customers(id) ON DELETE CASCADE,
  plan           TEXT NOT NULL CHECK(plan IN ('free','starter','professional','enterprise')),
  status         TEXT NOT NULL CHECK(status IN ('active','trial','past_due','cancelled','paused')),
  billing_cycle  TEXT NOT NULL CHECK(billing_cycle IN ('monthly','yearly')),
  price          REAL NOT NULL DEFAULT 0,
  seats          INTEGER NOT NULL DEFAULT 1,
  start_date     TEXT NOT NULL,
  end_date       TEXT,
  trial_end_date TEXT,
  features       TEXT NOT NULL DEFAULT '[]',
  created_at     INTEGER NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_subscriptions_customer ON subscriptions(customer_id);

CREATE TABLE IF NOT EXISTS invoices (
  seq            INTEGER PRIMARY KEY AUTOINCREMENT,
  id             TEXT NOT NULL UNIQUE,
  customer_id    TEXT NOT NULL REFERENCES customers(id) ON DELETE CASCADE,
  invoice_number TEXT NOT NULL UNIQUE,
  status         TEXT NOT NULL CHECK(status IN ('draft','pending','paid','overdue','cancelled','refunded')),
  amount         REAL NOT NULL,
  tax            REAL NOT NULL DEFAULT 0,
  total          REAL NOT NULL,
  currency       TEXT NOT NULL DEFAULT 'USD',
  due_date       TEXT NOT NULL,
  paid_date      TEXT,
  description    TEXT NOT NULL DEFAULT '',
  created_at     INTEGER NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_invoices_customer ON invoices(customer_id);

CREATE TABLE IF NOT EXISTS support_tickets (
  seq             INTEGER PRIMARY KEY AUTOINCREMENT,
  id              TEXT NOT NULL UNIQUE,
  customer_id     TEXT REFERENCES customers(id) ON DELETE SET NULL,
  conversation_id TEXT,
  subject         TEXT NOT NULL,
  description     TEXT NOT NULL,
  category        TEXT NOT NULL CHECK(category IN ('billing','technical','account','feature_request','bug_report','other')),
  priority        TEXT NOT NULL CHECK(priority IN ('low','medium','high','urgent')),
  status          TEXT NOT NULL DEFAULT 'open',
  metadata        TEXT NOT NULL DEFAULT '{}',
  created_at      INTEGER NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_tickets_customer ON support_tickets(customer_id);

CREATE TABLE IF NOT EXISTS knowledge_documents (
  id         TEXT PRIMARY KEY,
  title      TEXT NOT NULL,
  content    TEXT NOT NULL,
  category   TEXT NOT NULL CHECK(category IN ('faq','documentation','policy','troubleshooting')),
  active     INTEGER NOT NULL DEFAULT 1,
  created_at INTEGER NOT NULL,
  updated_at INTEGER NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_knowledge_active ON knowledge_documents(active, category);

CREATE TABLE IF NOT EXISTS conversation_locks (
  lock_key   TEXT PRIMARY KEY,
  owner      TEXT NOT NULL,
  expires_at INTEGER NOT NULL
);
`;

/** Owns the SQLite connection and schema. Pass ":memory:" for tests. */
export class SupportDB {
  private db: Database.Database;

  constructor(path: string) {
    if (path !== ":memory:") {
      mkdirSync(dirname(path), { recursive: true });
    }
    this.db = new Database(path);
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("foreign_keys = ON");
    this.db.pragma("busy_timeout = 5000");
    this.db.exec(SCHEMA_SQL);
    this.migrate();
  }

  /** Forward-only, idempotent migrations for databases created by older releases. */
  private migrate(): void {
    const columns = this.db
      .prepare<[], { name: string }>("PRAGMA table_info(conversations)")
      .all();
    if (!columns.some((c) => c.name === "customer_email")) {
      this.db.exec("ALTER TABLE conversations ADD COLUMN customer_email TEXT");
    }
    this.db.exec(
      `CREATE INDEX IF NOT EXISTS idx_conversations_orphaned
         ON conversations(customer_email) WHERE customer_id IS NULL`,
    );
  }

  raw(): Database.Database {
    return this.db;
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }
}
