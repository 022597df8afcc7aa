import dotenv from "dotenv";
import { ConfigError } from "./errors.js";

// ── Helpers ──────────────────────────────────────────────

type Env = Record<string, string | undefined>;

function requireEnv(env: Env, key: string): string {
  const value = env[key]?.trim();
  if (!value) {
    throw new ConfigError(
      `Missing required environment variable: ${key}. Copy .env.example to .env and fill in your values.`,
    );
  }
  return value;
}

function intEnv(env: Env, key: string, fallback: number, min = 1): number {
  const raw = env[key]?.trim();
  if (!raw) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigError(`${key} must be an integer >= ${min} (got "${raw}")`);
  }
  return value;
}

function floatEnv(
  env: Env,
  key: string,
  fallback: number,
  min: number,
  max: number,
): number {
  const raw = env[key]?.trim();
  if (!raw) return fallback;
  const value = Number(raw);
  if (Number.isNaN(value) || value < min || value > max) {
    throw new ConfigError(
      `${key} must be a number between ${min} and ${max} (got "${raw}")`,
    );
  }
  return value;
}

// ── Config ───────────────────────────────────────────────

export interface AppConfig {
  openAiApiKey: string;
  openAiBaseUrl: string | undefined;
  llmModel: string;
  embeddingModel: string;
  llmTemperature: number;
  llmTimeoutMs: number;
  llmMaxRetries: number;

  // ── Memory & routing ──────────────────────────────────
  contextWindowSize: number;
  memoryCacheTtlSeconds: number;
  routerConfidenceThreshold: number;
  routerContextMessages: number;
  orchestrationTimeoutMs: number;
  toolTimeoutMs: number;

  // ── Storage ───────────────────────────────────────────
  databasePath: string;

  // ── Knowledge base ────────────────────────────────────
  pineconeApiKey: string;
  pineconeIndex: string;
  knowledgeTopK: number;

  // ── Housekeeping ──────────────────────────────────────
  productName: string;
  staleConversationDays: number;
  cleanupCron: string;
}

/**
 * Build the application config from environment variables.
 * Throws ConfigError on a missing or out-of-range value.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  return {
    openAiApiKey: requireEnv(env, "OPENAI_API_KEY"),
    openAiBaseUrl: env.OPENAI_BASE_URL?.trim() || undefined,
    llmModel: env.LLM_MODEL?.trim() || "gpt-4o-mini",
    embeddingModel: env.EMBEDDING_MODEL?.trim() || "text-embedding-3-small",
    llmTemperature: floatEnv(env, "LLM_TEMPERATURE", 0.3, 0, 2),
    llmTimeoutMs: intEnv(env, "LLM_TIMEOUT_MS", 30_000),
    llmMaxRetries: intEnv(env, "LLM_MAX_RETRIES", 3, 0),

    contextWindowSize: intEnv(env, "CONTEXT_WINDOW_SIZE", 15),
    memoryCacheTtlSeconds: intEnv(env, "MEMORY_CACHE_TTL_SECONDS", 300),
    routerConfidenceThreshold: floatEnv(
      env,
      "ROUTER_CONFIDENCE_THRESHOLD",
      0.5,
      0,
      1,
    ),
    routerContextMessages: intEnv(env, "ROUTER_CONTEXT_MESSAGES", 4, 0),
    orchestrationTimeoutMs: intEnv(env, "ORCHESTRATION_TIMEOUT_MS", 60_000),
    toolTimeoutMs: intEnv(env, "TOOL_TIMEOUT_MS", 15_000),

    databasePath: env.DATABASE_PATH?.trim() || "./data/support.db",

    pineconeApiKey: env.PINECONE_API_KEY?.trim() || "", // Optional, enables knowledge search
    pineconeIndex: env.PINECONE_INDEX?.trim() || "",
    knowledgeTopK: intEnv(env, "KNOWLEDGE_TOP_K", 3),

    productName: env.PRODUCT_NAME?.trim() || "Taskline",
    staleConversationDays: intEnv(env, "STALE_CONVERSATION_DAYS", 30),
    cleanupCron: env.CLEANUP_CRON?.trim() || "0 3 * * *",
  };
}

/** Read `.env` into process.env, then build the config. */
export function loadConfigFromDotenv(): AppConfig {
  dotenv.config();
  return loadConfig(process.env);
}
