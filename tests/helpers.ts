import pino from "pino";
import type {
  KnowledgeChunk,
  KnowledgeDocument,
  KnowledgeFilter,
  KnowledgeIndex,
  KnowledgeMatch,
} from "../src/knowledge/types.js";
import type { CompletionRequest, LanguageModel } from "../src/llm/types.js";
import { SupportDB } from "../src/store/db.js";
import { SqliteSupportStore } from "../src/store/support-store.js";
import type { Customer } from "../src/store/types.js";

// ── Shared test stand-ins ────────────────────────────────

export const silentLogger = pino({ level: "silent" });

export type Responder = (request: CompletionRequest) => string | Promise<string>;

/** Scripted model. Replies by purpose; embeddings are a fixed-size vector. */
export class FakeLanguageModel implements LanguageModel {
  readonly calls: CompletionRequest[] = [];
  readonly embedded: string[] = [];

  constructor(private readonly respond: Responder = () => "OK") {}

  async complete(request: CompletionRequest): Promise<string> {
    this.calls.push(request);
    return this.respond(request);
  }

  async embed(text: string): Promise<number[]> {
    this.embedded.push(text);
    return [text.length, 1, 0];
  }

  callsFor(purpose: string): CompletionRequest[] {
    return this.calls.filter((c) => c.purpose === purpose);
  }
}

export class FakeKnowledgeIndex implements KnowledgeIndex {
  readonly upserted: KnowledgeChunk[] = [];
  readonly metadataUpdates: KnowledgeDocument[] = [];
  readonly searches: Array<{ topK: number; filter: KnowledgeFilter }> = [];

  constructor(private readonly matches: KnowledgeMatch[] = []) {}

  async search(_vector: number[], topK: number, filter: KnowledgeFilter): Promise<KnowledgeMatch[]> {
    this.searches.push({ topK, filter });
    return this.matches.slice(0, topK);
  }

  async upsert(chunks: KnowledgeChunk[]): Promise<void> {
    this.upserted.push(...chunks);
  }

  async updateMetadata(doc: KnowledgeDocument): Promise<void> {
    this.metadataUpdates.push(doc);
  }
}

export function memoryStore(now?: () => number): { db: SupportDB; store: SqliteSupportStore } {
  const db = new SupportDB(":memory:");
  return { db, store: new SqliteSupportStore(db, now) };
}

export async function addCustomer(
  store: SqliteSupportStore,
  email = "ada.park@example.com",
): Promise<Customer> {
  return store.insertCustomer({
    email,
    firstName: "Ada",
    lastName: "Park",
    companyName: "Northwind Labs",
    phone: "",
    isActive: true,
  });
}
