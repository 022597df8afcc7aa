// ── Knowledge Base: Shared Types ────────────────────────

export const KNOWLEDGE_CATEGORIES = [
  "faq",
  "documentation",
  "policy",
  "troubleshooting",
] as const;

export type KnowledgeCategory = (typeof KNOWLEDGE_CATEGORIES)[number];

export interface KnowledgeDocument {
  id: string;
  title: string;
  content: string;
  category: KnowledgeCategory;
  active: boolean;
}

/** Fields an update may change; title or content changes re-embed. */
export type KnowledgeDocumentPatch = Partial<
  Pick<KnowledgeDocument, "title" | "content" | "category">
>;

export interface KnowledgeStats {
  /** Active documents only. */
  totalDocuments: number;
  byCategory: Record<KnowledgeCategory, number>;
}

export interface KnowledgeChunk extends KnowledgeDocument {
  embedding: number[];
}

export interface KnowledgeMatch {
  id: string;
  title: string;
  content: string;
  category: string;
  /** Cosine similarity, higher is closer. */
  score: number;
}

export interface KnowledgeFilter {
  active: true;
  category?: KnowledgeCategory;
}

/** Similarity search over knowledge chunks. */
export interface KnowledgeIndex {
  /** Top `topK` matches, best first. */
  search(
    vector: number[],
    topK: number,
    filter: KnowledgeFilter,
  ): Promise<KnowledgeMatch[]>;
  upsert(chunks: KnowledgeChunk[]): Promise<void>;
  /** Rewrite a record's metadata, keeping its vector. */
  updateMetadata(doc: KnowledgeDocument): Promise<void>;
}
