// ── Public API ───────────────────────────────────────────

export {
  createSupportService,
  SupportService,
  type ChatRequest,
  type SupportServiceOverrides,
} from "./service.js";
export { loadConfig, loadConfigFromDotenv, type AppConfig } from "./config.js";
export {
  AgentOrchestrator,
  FAILURE_REPLY,
  type TurnInput,
  type TurnResult,
} from "./agent/orchestrator.js";
export { RouterAgent, keywordFallback, FALLBACK_CONFIDENCE } from "./agent/router.js";
export { createSpecialists } from "./agent/specialists.js";
export type { TurnState } from "./agent/turn-state.js";
export type {
  AgentReply,
  AgentRequest,
  AgentType,
  RoutingDecision,
  SpecialistAgent,
  SpecialistTable,
} from "./agent/types.js";
export { ConversationMemory, type ConversationSummary } from "./memory/conversation-memory.js";
export type { ConversationLock, VolatileCache } from "./memory/types.js";
export type { LanguageModel, CompletionRequest } from "./llm/types.js";
export type {
  KnowledgeIndex,
  KnowledgeDocument,
  KnowledgeDocumentPatch,
  KnowledgeMatch,
  KnowledgeStats,
} from "./knowledge/types.js";
export { KnowledgeBase } from "./knowledge/knowledge-base.js";
export type { SupportStore, Message, Conversation } from "./store/types.js";
export { ToolRegistry } from "./tools/registry.js";
export type { ToolName } from "./tools/schemas.js";
export type { ToolResult } from "./tools/types.js";
export type { TaskHandle, TaskStatus } from "./tasks/task-runner.js";
export * from "./errors.js";
