import { Pinecone } from "@pinecone-database/pinecone";
import { log } from "../logger.js";
import type {
  KnowledgeChunk,
  KnowledgeDocument,
  KnowledgeFilter,
  KnowledgeIndex,
  KnowledgeMatch,
} from "./types.js";

// ── Pinecone Knowledge Index ─────────────────────────────

type KnowledgeMetadata = {
  title: string;
  content: string;
  category: string;
  active: boolean;
};

/** Pinecone metadata is capped at 40KB per record. */
const MAX_CONTENT_CHARS = 8_000;

/** Upsert batch size. */
const UPSERT_BATCH = 100;

export class PineconeKnowledgeIndex implements KnowledgeIndex {
  private readonly index;

  constructor(apiKey: string, indexName: string, client?: Pinecone) {
    const pc = client ?? new Pinecone({ apiKey });
    this.index = pc.index<KnowledgeMetadata>(indexName);
  }

  async search(
    vector: number[],
    topK: number,
    filter: KnowledgeFilter,
  ): Promise<KnowledgeMatch[]> {
    const result = await this.index.query({
      vector,
      topK,
      filter: {
        active: { $eq: true },
        ...(filter.category ? { category: { $eq: filter.category } } : {}),
      },
      includeMetadata: true,
    });

    return (result.matches ?? [])
      .flatMap((m) =>
        m.metadata
          ? [
              {
                id: m.id,
                title: m.metadata.title,
                content: m.metadata.content,
                category: m.metadata.category,
                score: m.score ?? 0,
              },
            ]
          : [],
      )
      .sort((a, b) => b.score - a.score);
  }

  async upsert(chunks: KnowledgeChunk[]): Promise<void> {
    for (let i = 0; i < chunks.length; i += UPSERT_BATCH) {
      const batch = chunks.slice(i, i + UPSERT_BATCH);
      await this.index.upsert(
        batch.map((c) => ({
          id: c.id,
          values: c.embedding,
          metadata: {
            title: c.title,
            content: c.content.slice(0, MAX_CONTENT_CHARS),
            category: c.category,
            active: c.active,
          },
        })),
      );
    }
    log.info({ count: chunks.length }, "📚 Knowledge chunks upserted");
  }

  async updateMetadata(doc: KnowledgeDocument): Promise<void> {
    await this.index.update({
      id: doc.id,
      metadata: {
        title: doc.title,
        content: doc.content.slice(0, MAX_CONTENT_CHARS),
        category: doc.category,
        active: doc.active,
      },
    });
  }
}

/** Stand-in when no Pinecone index is configured: every search is empty. */
export class DisabledKnowledgeIndex implements KnowledgeIndex {
  async search(): Promise<KnowledgeMatch[]> {
    return [];
  }

  async upsert(chunks: KnowledgeChunk[]): Promise<void> {
    log.warn(
      { count: chunks.length },
      "⚠️ Knowledge index not configured; chunks not stored",
    );
  }

  async updateMetadata(doc: KnowledgeDocument): Promise<void> {
    log.warn({ id: doc.id }, "⚠️ Knowledge index not configured; metadata not stored");
  }
}
