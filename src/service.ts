import { AgentOrchestrator, type TurnResult } from "./agent/orchestrator.js";
import { RouterAgent } from "./agent/router.js";
import { createSpecialists } from "./agent/specialists.js";
import type { AppConfig } from "./config.js";
import { describeError, TurnFailedError } from "./errors.js";
import { KnowledgeBase } from "./knowledge/knowledge-base.js";
import {
  DisabledKnowledgeIndex,
  PineconeKnowledgeIndex,
} from "./knowledge/pinecone.js";
import type { KnowledgeIndex } from "./knowledge/types.js";
import { OpenAiLanguageModel } from "./llm/openai.js";
import { buildPrompts } from "./llm/prompts.js";
import type { LanguageModel } from "./llm/types.js";
import { log, type Logger } from "./logger.js";
import { TtlCache } from "./memory/cache.js";
import {
  ConversationMemory,
  type CachedHistory,
  type ConversationSummary,
} from "./memory/conversation-memory.js";
import { SqliteConversationLock } from "./memory/lock.js";
import type { VolatileCache } from "./memory/types.js";
import { SupportDB } from "./store/db.js";
import { SqliteSupportStore } from "./store/support-store.js";
import type { SupportStore } from "./store/types.js";
import { TaskRunner, type TaskHandle, type TaskStatus } from "./tasks/task-runner.js";
import { createSupportTools } from "./tools/index.js";
import { UsageTracker } from "./usage/tracker.js";

// ── Support Service: composition root ───────────────────

export interface ChatRequest {
  conversationId: string;
  message: string;
  customerEmail?: string;
  correlationId?: string;
}

/** Collaborators a caller may supply instead of the configured defaults. */
export interface SupportServiceOverrides {
  llm?: LanguageModel;
  knowledge?: KnowledgeIndex;
  cache?: VolatileCache<CachedHistory>;
  logger?: Logger;
}

export class SupportService {
  constructor(
    readonly store: SupportStore,
    readonly memory: ConversationMemory,
    readonly orchestrator: AgentOrchestrator,
    readonly llm: LanguageModel,
    readonly knowledge: KnowledgeBase,
    readonly usage: UsageTracker,
    private readonly tasks: TaskRunner<TurnResult>,
    private readonly db: SupportDB,
    private readonly logger: Logger,
  ) {}

  /**
   * Run one turn in the background. A turn that ends `failed` reads back as
   * a task failure whose reason is the customer-facing reply.
   */
  submit(request: ChatRequest): TaskHandle {
    return this.tasks.submit(async () => {
      const result = await this.handle(request);
      if (result.status === "failed") {
        throw new TurnFailedError(result.error?.code ?? "TURN_FAILED", result.content);
      }
      return result;
    });
  }

  status(taskId: string): TaskStatus<TurnResult> | undefined {
    return this.tasks.status(taskId);
  }

  /** Run one turn and wait for it. Never rejects. */
  async handle(request: ChatRequest): Promise<TurnResult> {
    const customerId = await this.resolveCustomerId(request);
    return this.orchestrator.processMessage({
      conversationId: request.conversationId,
      message: request.message,
      customerEmail: request.customerEmail?.trim().toLowerCase() || undefined,
      customerId,
      correlationId: request.correlationId,
    });
  }

  getSummary(conversationId: string): Promise<ConversationSummary | undefined> {
    return this.memory.getSummary(conversationId);
  }

  closeConversation(conversationId: string): Promise<void> {
    return this.memory.close(conversationId);
  }

  /** Wait for in-flight turns, then close the database. */
  async close(): Promise<void> {
    await this.tasks.drain();
    this.db.close();
    this.logger.info("🗄️ Support service closed");
  }

  /** An unknown email leaves the conversation unlinked. */
  private async resolveCustomerId(request: ChatRequest): Promise<string | null> {
    const email = request.customerEmail?.trim().toLowerCase();
    if (!email) return null;
    try {
      const customer = await this.store.findCustomer(email);
      if (!customer) {
        this.logger.warn({ email }, "⚠️ Customer not found for conversation");
      }
      return customer?.id ?? null;
    } catch (err) {
      this.logger.warn(
        { email, error: describeError(err) },
        "⚠️ Customer lookup failed; conversation left unlinked",
      );
      return null;
    }
  }
}

export function createSupportService(
  config: AppConfig,
  overrides: SupportServiceOverrides = {},
): SupportService {
  const logger = overrides.logger ?? log;
  const usage = new UsageTracker();

  const llm =
    overrides.llm ??
    new OpenAiLanguageModel({
      apiKey: config.openAiApiKey,
      baseURL: config.openAiBaseUrl,
      model: config.llmModel,
      embeddingModel: config.embeddingModel,
      temperature: config.llmTemperature,
      timeoutMs: config.llmTimeoutMs,
      maxRetries: config.llmMaxRetries,
      usage,
    });

  const knowledgeIndex = overrides.knowledge ?? createKnowledgeIndex(config, logger);

  const db = new SupportDB(config.databasePath);
  const store = new SqliteSupportStore(db);
  const memory = new ConversationMemory({
    store,
    cache: overrides.cache ?? new TtlCache<CachedHistory>(),
    windowSize: config.contextWindowSize,
    cacheTtlSeconds: config.memoryCacheTtlSeconds,
    logger,
  });

  const prompts = buildPrompts(config.productName);
  const tools = createSupportTools({
    store,
    llm,
    knowledge: knowledgeIndex,
    knowledgeTopK: config.knowledgeTopK,
    timeoutMs: config.toolTimeoutMs,
    logger,
  });
  logger.info({ tools: tools.names() }, "🔧 Tools registered");

  const orchestrator = new AgentOrchestrator({
    memory,
    lock: new SqliteConversationLock(db),
    router: new RouterAgent({
      llm,
      systemPrompt: prompts.router,
      confidenceThreshold: config.routerConfidenceThreshold,
      contextMessages: config.routerContextMessages,
      logger,
    }),
    specialists: createSpecialists(llm, prompts, logger),
    tools,
    timeoutMs: config.orchestrationTimeoutMs,
    logger,
  });

  return new SupportService(
    store,
    memory,
    orchestrator,
    llm,
    new KnowledgeBase({ store, llm, index: knowledgeIndex, logger }),
    usage,
    new TaskRunner<TurnResult>({ logger }),
    db,
    logger,
  );
}

function createKnowledgeIndex(config: AppConfig, logger: Logger): KnowledgeIndex {
  if (config.pineconeApiKey && config.pineconeIndex) {
    return new PineconeKnowledgeIndex(config.pineconeApiKey, config.pineconeIndex);
  }
  logger.warn("⚠️ PINECONE_API_KEY / PINECONE_INDEX not set; knowledge search disabled");
  return new DisabledKnowledgeIndex();
}
