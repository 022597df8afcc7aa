import type { Logger } from "../logger.js";
import type {
  Conversation,
  ConversationStatus,
  Message,
  MessageMetadata,
  MessageRole,
  SupportStore,
} from "../store/types.js";
import type { VolatileCache } from "./types.js";

// ── Conversation Memory: sliding window over store + cache ─

/** What the cache holds per conversation. */
export interface CachedHistory {
  /** How many messages were requested from the store. */
  depth: number;
  /** Oldest first; fewer than `depth` means this is the whole history. */
  messages: Message[];
  /** Store's latest message sequence when the snapshot was taken. */
  latestSequence: number;
}

export interface ConversationMemoryOptions {
  store: SupportStore;
  cache: VolatileCache<CachedHistory>;
  /** Max messages `getContext` ever returns. */
  windowSize: number;
  cacheTtlSeconds: number;
  logger: Logger;
}

export interface ConversationSummary {
  conversationId: string;
  status: ConversationStatus;
  customerId: string | null;
  messageCount: number;
  createdAt: string;
  updatedAt: string;
}

export function historyCacheKey(conversationId: string): string {
  return `conversation:${conversationId}:history`;
}

/**
 * Bounded, ordered message history per conversation.
 *
 * Reads go cache-first; a miss loads the recent history from the store and
 * repopulates the cache. Writes go to the store and then drop the cache
 * entry. The cache is never patched in place, so a concurrent reader can
 * only ever see a snapshot the store produced.
 *
 * A cached snapshot is served only while its `latestSequence` still matches
 * the store, so writes made through another process (with its own cache)
 * are seen on the next read.
 */
export class ConversationMemory {
  private readonly store: SupportStore;
  private readonly cache: VolatileCache<CachedHistory>;
  private readonly cacheTtlSeconds: number;
  private readonly logger: Logger;
  private windowSize: number;

  constructor(opts: ConversationMemoryOptions) {
    this.store = opts.store;
    this.cache = opts.cache;
    this.cacheTtlSeconds = opts.cacheTtlSeconds;
    this.logger = opts.logger;
    this.windowSize = Math.max(0, opts.windowSize);
  }

  get configuredWindowSize(): number {
    return this.windowSize;
  }

  /** Changes how many messages `getContext` returns. History is untouched. */
  setWindowSize(size: number): void {
    this.windowSize = Math.max(0, Math.floor(size));
  }

  /** The most recent `limit` messages (capped at the window size), oldest first. */
  async getContext(
    conversationId: string,
    limit: number = this.windowSize,
  ): Promise<Message[]> {
    const count = Math.max(0, Math.min(Math.floor(limit), this.windowSize));
    if (count === 0) return [];

    const key = historyCacheKey(conversationId);
    const cached = await this.readCache(key);
    // Read before loading: a write landing in between only costs a reload
    const latestSequence = await this.store.latestMessageSequence(conversationId);
    if (
      cached &&
      cached.latestSequence === latestSequence &&
      (cached.depth >= count || cached.messages.length < cached.depth)
    ) {
      this.logger.debug({ conversationId, hit: true }, "Memory context");
      return cached.messages.slice(-count);
    }

    const depth = Math.max(count, this.windowSize);
    const messages = await this.store.loadRecentMessages(conversationId, depth);
    await this.writeCache(key, { depth, messages, latestSequence });

    this.logger.debug(
      { conversationId, hit: false, loaded: messages.length },
      "Memory context",
    );
    return messages.slice(-count);
  }

  /**
   * Durably write one message, then invalidate the cached history.
   * Store failures propagate as StorageUnavailableError.
   */
  async append(
    conversationId: string,
    role: MessageRole,
    content: string,
    metadata?: MessageMetadata,
  ): Promise<Message> {
    const message = await this.store.insertMessage({
      conversationId,
      role,
      content,
      metadata,
    });
    await this.invalidate(conversationId);
    return message;
  }

  async invalidate(conversationId: string): Promise<void> {
    try {
      await this.cache.delete(historyCacheKey(conversationId));
    } catch (err) {
      // Entry still expires after cacheTtlSeconds
      this.logger.error(
        { conversationId, err },
        "❌ Memory cache invalidation failed",
      );
    }
  }

  /**
   * Create the conversation if needed and link the customer. The email is
   * kept so an unknown customer can be linked once their account exists.
   */
  async open(
    conversationId: string,
    customerId?: string | null,
    customerEmail?: string,
  ): Promise<Conversation> {
    return this.store.ensureConversation(
      conversationId,
      customerId ?? null,
      customerEmail ?? null,
    );
  }

  async setStatus(
    conversationId: string,
    status: ConversationStatus,
  ): Promise<void> {
    await this.store.setConversationStatus(conversationId, status);
  }

  async close(conversationId: string): Promise<void> {
    await this.store.setConversationStatus(conversationId, "closed");
    await this.invalidate(conversationId);
    this.logger.info({ conversationId }, "Conversation closed");
  }

  async getSummary(
    conversationId: string,
  ): Promise<ConversationSummary | undefined> {
    const conversation = await this.store.getConversation(conversationId);
    if (!conversation) return undefined;
    return {
      conversationId,
      status: conversation.status,
      customerId: conversation.customerId,
      messageCount: await this.store.countMessages(conversationId),
      createdAt: new Date(conversation.createdAt).toISOString(),
      updatedAt: new Date(conversation.updatedAt).toISOString(),
    };
  }

  // ── Cache I/O; failures degrade to a store read ───────

  private async readCache(key: string): Promise<CachedHistory | undefined> {
    try {
      return await this.cache.get(key);
    } catch (err) {
      this.logger.warn({ key, err }, "⚠️ Memory cache read failed");
      return undefined;
    }
  }

  private async writeCache(key: string, value: CachedHistory): Promise<void> {
    try {
      await this.cache.set(key, value, this.cacheTtlSeconds);
    } catch (err) {
      this.logger.warn({ key, err }, "⚠️ Memory cache write failed");
    }
  }
}
