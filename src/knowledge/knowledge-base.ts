import type { LanguageModel } from "../llm/types.js";
import type { Logger } from "../logger.js";
import type { SupportStore } from "../store/types.js";
import type {
  KnowledgeCategory,
  KnowledgeChunk,
  KnowledgeDocument,
  KnowledgeDocumentPatch,
  KnowledgeIndex,
  KnowledgeStats,
} from "./types.js";

// ── Knowledge Base: documents in the store, vectors in the index ─

export interface KnowledgeBaseOptions {
  store: SupportStore;
  llm: LanguageModel;
  index: KnowledgeIndex;
  logger: Logger;
}

export function embeddingText(doc: Pick<KnowledgeDocument, "title" | "content">): string {
  return `${doc.title}\n\n${doc.content}`;
}

/**
 * Document lifecycle for the knowledge base. The store holds the canonical
 * document; the index holds its vector plus a metadata copy used to filter
 * searches. Embedding happens before any write, so a failed embedding
 * leaves both sides unchanged.
 */
export class KnowledgeBase {
  private readonly store: SupportStore;
  private readonly llm: LanguageModel;
  private readonly index: KnowledgeIndex;
  private readonly logger: Logger;

  constructor(opts: KnowledgeBaseOptions) {
    this.store = opts.store;
    this.llm = opts.llm;
    this.index = opts.index;
    this.logger = opts.logger;
  }

  /** Store, embed and index every document. Existing ids are replaced. */
  async addDocuments(docs: KnowledgeDocument[]): Promise<number> {
    const chunks: KnowledgeChunk[] = [];
    for (const doc of docs) {
      chunks.push({ ...doc, embedding: await this.llm.embed(embeddingText(doc)) });
    }
    for (const doc of docs) {
      await this.store.saveKnowledgeDocument(doc);
    }
    await this.index.upsert(chunks);
    this.logger.info({ count: chunks.length }, "📚 Knowledge documents added");
    return chunks.length;
  }

  /**
   * Apply `patch`. A changed title or content is re-embedded; a category
   * change alone only rewrites the index metadata. Unknown ids give undefined.
   */
  async updateDocument(
    id: string,
    patch: KnowledgeDocumentPatch,
  ): Promise<KnowledgeDocument | undefined> {
    const current = await this.store.getKnowledgeDocument(id);
    if (!current) {
      this.logger.warn({ id }, "⚠️ Knowledge document not found for update");
      return undefined;
    }

    const next: KnowledgeDocument = {
      ...current,
      title: patch.title ?? current.title,
      content: patch.content ?? current.content,
      category: patch.category ?? current.category,
    };
    const reembed = next.title !== current.title || next.content !== current.content;

    if (reembed) {
      const embedding = await this.llm.embed(embeddingText(next));
      await this.store.saveKnowledgeDocument(next);
      await this.index.upsert([{ ...next, embedding }]);
    } else {
      await this.store.saveKnowledgeDocument(next);
      await this.index.updateMetadata(next);
    }

    this.logger.info({ id, reembedded: reembed }, "📝 Knowledge document updated");
    return next;
  }

  /** Soft delete: the document stays stored but drops out of search. */
  async deactivateDocument(id: string): Promise<boolean> {
    const current = await this.store.getKnowledgeDocument(id);
    if (!current) {
      this.logger.warn({ id }, "⚠️ Knowledge document not found for deletion");
      return false;
    }
    if (!current.active) return true;

    const next = { ...current, active: false };
    await this.store.saveKnowledgeDocument(next);
    await this.index.updateMetadata(next);
    this.logger.info({ id }, "🗑️ Knowledge document deactivated");
    return true;
  }

  /** Active document only. */
  async getDocument(id: string): Promise<KnowledgeDocument | undefined> {
    const doc = await this.store.getKnowledgeDocument(id);
    return doc?.active ? doc : undefined;
  }

  async stats(): Promise<KnowledgeStats> {
    const counts = await this.store.countActiveKnowledgeDocuments();
    const byCategory: Record<KnowledgeCategory, number> = {
      faq: counts.faq ?? 0,
      documentation: counts.documentation ?? 0,
      policy: counts.policy ?? 0,
      troubleshooting: counts.troubleshooting ?? 0,
    };
    return {
      totalDocuments: Object.values(byCategory).reduce((sum, n) => sum + n, 0),
      byCategory,
    };
  }
}
