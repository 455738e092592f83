import dotenv from "dotenv";

dotenv.config();

// ── Helpers ──────────────────────────────────────────────

type Env = Record<string, string | undefined>;

function intEnv(env: Env, key: string, fallback: number): number {
  const parsed = parseInt(env[key] ?? "", 10);
  return isNaN(parsed) ? fallback : parsed;
}

function floatEnv(env: Env, key: string, fallback: number): number {
  const parsed = parseFloat(env[key] ?? "");
  return isNaN(parsed) ? fallback : parsed;
}

/**
 * Read a variable the process cannot start without. Exits with a hint
 * pointing at .env.example, the same way the terminal host reports it.
 */
export function requireEnv(key: string, env: Env = process.env): string {
  const value = env[key];
  if (!value) {
    console.error(`❌ Missing required environment variable: ${key}`);
    console.error(`   Copy .env.example to .env and fill in your values.`);
    process.exit(1);
  }
  return value;
}

// ── Config ───────────────────────────────────────────────

export type EmbeddingBackend = "hashing" | "openai";
export type FinalAnswerMode = "provider" | "replay";

export interface AssistantConfig {
  userId: string;

  // ── Provider ──────────────────────────────────────────
  apiKey: string;
  baseUrl: string;
  llmModel: string;
  summaryModel: string;
  llmTemperature: number;
  providerTimeoutMs: number;

  // ── Embeddings ────────────────────────────────────────
  embeddingBackend: EmbeddingBackend;
  embeddingModel: string;
  embeddingDimension: number;

  // ── Turn ──────────────────────────────────────────────
  maxToolRounds: number;
  toolTimeoutMs: number;
  contextTokenBudget: number;
  maxQueuedTurns: number;
  /** "replay" re-emits the probe's answer instead of a second, streaming call */
  finalAnswer: FinalAnswerMode;

  // ── Memory ────────────────────────────────────────────
  memoryDir: string;
  memoryTopK: number;
  memoryMinScore: number;
  compressThreshold: number;
  compressKeepRecent: number;
  tombstoneRebuildRatio: number;
  maintenanceCron: string;

  // ── Prompt cache ──────────────────────────────────────
  promptCacheMaxEntries: number;
  promptCacheTtlMs: number;

  auditLogPath: string;
}

export function loadConfig(env: Env = process.env): AssistantConfig {
  const llmModel = env.LLM_MODEL || "anthropic/claude-sonnet-4-20250514";
  return {
    userId: env.USER_ID || "default",

    apiKey: env.OPENROUTER_API_KEY || "",
    baseUrl: env.OPENROUTER_BASE_URL || "https://openrouter.ai/api/v1",
    llmModel,
    summaryModel: env.SUMMARY_MODEL || llmModel,
    llmTemperature: floatEnv(env, "LLM_TEMPERATURE", 0.7),
    providerTimeoutMs: intEnv(env, "PROVIDER_TIMEOUT_MS", 60_000),

    embeddingBackend: env.EMBEDDING_PROVIDER === "openai" ? "openai" : "hashing",
    embeddingModel: env.EMBEDDING_MODEL || "text-embedding-3-small",
    embeddingDimension: intEnv(env, "EMBEDDING_DIMENSION", 512),

    maxToolRounds: intEnv(env, "MAX_TOOL_ROUNDS", 5),
    toolTimeoutMs: intEnv(env, "TOOL_TIMEOUT_MS", 30_000),
    contextTokenBudget: intEnv(env, "CONTEXT_TOKEN_BUDGET", 4000),
    maxQueuedTurns: intEnv(env, "MAX_QUEUED_TURNS", 3),
    finalAnswer: env.FINAL_ANSWER_MODE === "replay" ? "replay" : "provider",

    memoryDir: env.MEMORY_DIR || ".assistant/memory",
    memoryTopK: intEnv(env, "MEMORY_TOP_K", 5),
    memoryMinScore: floatEnv(env, "MEMORY_MIN_SCORE", 0.35),
    compressThreshold: intEnv(env, "COMPRESS_THRESHOLD", 15),
    compressKeepRecent: intEnv(env, "COMPRESS_KEEP_RECENT", 5),
    tombstoneRebuildRatio: floatEnv(env, "TOMBSTONE_REBUILD_RATIO", 0.25),
    maintenanceCron: env.MAINTENANCE_CRON || "*/10 * * * *",

    promptCacheMaxEntries: intEnv(env, "PROMPT_CACHE_MAX_ENTRIES", 50),
    promptCacheTtlMs: intEnv(env, "PROMPT_CACHE_TTL_MS", 60 * 60 * 1000),

    auditLogPath: env.AUDIT_LOG_PATH || ".assistant/logs/tool_audit.jsonl",
  };
}
