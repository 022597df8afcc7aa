import { randomUUID } from "node:crypto";
import {
  describeError,
  OrchestrationTimeoutError,
  SupportError,
  type SupportErrorCode,
} from "../errors.js";
import type { Logger } from "../logger.js";
import type { ConversationMemory } from "../memory/conversation-memory.js";
import type { ConversationLock, ReleaseLock } from "../memory/types.js";
import type {
  Message,
  MessageMetadata,
  ToolInvocationSummary,
} from "../store/types.js";
import type { ToolRegistry } from "../tools/registry.js";
import type { RouterAgent } from "./router.js";
import { TurnStateMachine, type TurnState } from "./turn-state.js";
import type {
  AgentReply,
  AgentType,
  RoutingDecision,
  SpecialistTable,
} from "./types.js";

/** Extra lease time beyond the dispatch time box, covering memory writes. */
const DEFAULT_LOCK_GRACE_MS = 5_000;

export const FAILURE_REPLY =
  "I'm sorry, something went wrong while handling your message. " +
  "Please try again in a moment. If the problem continues, our support team can help directly.";

export interface OrchestratorOptions {
  memory: ConversationMemory;
  lock: ConversationLock;
  router: RouterAgent;
  specialists: SpecialistTable;
  tools: ToolRegistry;
  /** Wall-clock budget for routing plus specialist dispatch. */
  timeoutMs: number;
  lockGraceMs?: number;
  logger: Logger;
}

export interface TurnInput {
  conversationId: string;
  message: string;
  customerEmail?: string;
  /** Linked to the conversation when it is first opened. */
  customerId?: string | null;
  correlationId?: string;
}

export interface TurnResult {
  conversationId: string;
  correlationId: string;
  status: "completed" | "escalated" | "failed";
  content: string;
  agentType?: AgentType;
  routing?: RoutingDecision;
  toolsUsed: ToolInvocationSummary[];
  /** States visited, starting at `received`. */
  transitions: TurnState[];
  latencyMs: number;
  error?: { code: SupportErrorCode | "UNEXPECTED"; message: string };
}

interface Dispatched {
  routing: RoutingDecision;
  reply: AgentReply;
}

export function conversationLockKey(conversationId: string): string {
  return `conversation:${conversationId}`;
}

/**
 * Runs one inbound message through the pipeline:
 *   lock → load context → route → dispatch → append user + assistant → unlock
 *
 * At most one run per conversation holds the lock at a time, so a second
 * run's context load sees the first run's writes.
 */
export class AgentOrchestrator {
  private readonly memory: ConversationMemory;
  private readonly lock: ConversationLock;
  private readonly router: RouterAgent;
  private readonly specialists: SpecialistTable;
  private readonly tools: ToolRegistry;
  private readonly timeoutMs: number;
  private readonly holdMs: number;
  private readonly logger: Logger;

  constructor(opts: OrchestratorOptions) {
    this.memory = opts.memory;
    this.lock = opts.lock;
    this.router = opts.router;
    this.specialists = opts.specialists;
    this.tools = opts.tools;
    this.timeoutMs = opts.timeoutMs;
    this.holdMs = opts.timeoutMs + (opts.lockGraceMs ?? DEFAULT_LOCK_GRACE_MS);
    this.logger = opts.logger;
  }

  async processMessage(input: TurnInput): Promise<TurnResult> {
    const startTime = Date.now();
    const { conversationId, message } = input;
    const correlationId = input.correlationId ?? randomUUID();
    const logger = this.logger.child({ conversationId, correlationId });
    const machine = new TurnStateMachine(logger);

    let release: ReleaseLock | undefined;
    let userRecorded = false;
    let routing: RoutingDecision | undefined;

    logger.info({ length: message.length }, "📨 Turn received");

    try {
      release = await this.lock.acquire(
        conversationLockKey(conversationId),
        this.holdMs,
        this.holdMs,
      );

      await this.memory.open(conversationId, input.customerId, input.customerEmail);
      const context = await this.memory.getContext(conversationId);

      const dispatched = await this.timeBox((signal) =>
        this.routeAndDispatch(input, correlationId, context, machine, logger, signal),
      );
      routing = dispatched.routing;
      const { reply } = dispatched;
      const toolsUsed = summarizeTools(reply);

      await this.memory.append(conversationId, "user", message, { correlationId });
      userRecorded = true;

      const metadata: MessageMetadata = {
        agentType: reply.agentType,
        toolsUsed,
        correlationId,
        routing: { confidence: routing.confidence, source: routing.source },
      };
      await this.memory.append(conversationId, "assistant", reply.content, metadata);

      if (machine.state === "escalated") {
        await this.memory.setStatus(conversationId, "escalated");
      } else {
        machine.transition("completed");
      }

      const latencyMs = Date.now() - startTime;
      logger.info(
        {
          agentType: reply.agentType,
          state: machine.state,
          tools: toolsUsed.length,
          latencyMs,
        },
        "✅ Turn finished",
      );

      return {
        conversationId,
        correlationId,
        status: machine.state === "escalated" ? "escalated" : "completed",
        content: reply.content,
        agentType: reply.agentType,
        routing,
        toolsUsed,
        transitions: machine.transitions,
        latencyMs,
      };
    } catch (err) {
      machine.fail();
      logger.error({ error: describeError(err) }, "❌ Turn failed");

      // The inbound message is kept whenever this run held the lock.
      if (release && !userRecorded) {
        await this.recordUserMessage(conversationId, message, correlationId, logger);
      }

      return {
        conversationId,
        correlationId,
        status: "failed",
        content: FAILURE_REPLY,
        agentType: routing?.target,
        routing,
        toolsUsed: [],
        transitions: machine.transitions,
        latencyMs: Date.now() - startTime,
        error: {
          code: err instanceof SupportError ? err.code : "UNEXPECTED",
          message: describeError(err),
        },
      };
    } finally {
      if (release) {
        await release().catch((err: unknown) =>
          logger.error({ error: describeError(err) }, "❌ Lock release failed"),
        );
      }
    }
  }

  private async routeAndDispatch(
    input: TurnInput,
    correlationId: string,
    context: Message[],
    machine: TurnStateMachine,
    logger: Logger,
    signal: AbortSignal,
  ): Promise<Dispatched> {
    const routing = await this.router.route(input.message, context, signal);
    machine.transition("routed");
    logger.info(
      {
        target: routing.target,
        confidence: routing.confidence,
        source: routing.source,
      },
      "🧭 Routed",
    );

    machine.transition(routing.target === "escalation" ? "escalated" : "processing");

    const specialist = this.specialists[routing.target];
    const reply = await specialist.handle(
      {
        message: input.message,
        context,
        conversationId: input.conversationId,
        correlationId,
        customerEmail: input.customerEmail,
        routing,
        signal,
      },
      this.tools,
    );

    return { routing, reply };
  }

  /** Race `work` against the dispatch budget; abort it when the budget runs out. */
  private async timeBox<T>(work: (signal: AbortSignal) => Promise<T>): Promise<T> {
    const controller = new AbortController();
    const running = work(controller.signal);
    let timer: NodeJS.Timeout | undefined;

    try {
      return await Promise.race<T>([
        running,
        new Promise<never>((_, reject) => {
          timer = setTimeout(() => {
            controller.abort();
            reject(new OrchestrationTimeoutError(this.timeoutMs));
          }, this.timeoutMs);
        }),
      ]);
    } catch (err) {
      // The abandoned run may still settle; keep its rejection observed.
      running.catch((late: unknown) =>
        this.logger.debug({ error: describeError(late) }, "Abandoned dispatch settled"),
      );
      throw err;
    } finally {
      clearTimeout(timer);
    }
  }

  private async recordUserMessage(
    conversationId: string,
    message: string,
    correlationId: string,
    logger: Logger,
  ): Promise<void> {
    try {
      await this.memory.append(conversationId, "user", message, { correlationId });
    } catch (err) {
      logger.error(
        { error: describeError(err) },
        "❌ Could not record user message after failure",
      );
    }
  }
}

function summarizeTools(reply: AgentReply): ToolInvocationSummary[] {
  return reply.tools.map((t) => ({
    name: t.name,
    success: t.success,
    notFound: t.notFound,
    durationMs: t.durationMs,
  }));
}
