import { dirname, join } from "path";
import { AssistantSession } from "./agent/session.js";
import { PromptCache } from "./cache/prompt-cache.js";
import type { AssistantConfig } from "./config.js";
import { TokenEstimator } from "./context/token-estimator.js";
import { createOpenAIClient, OpenAIChatProvider } from "./llm/openai-provider.js";
import { loadIdentity } from "./llm/prompts.js";
import type { LlmProvider } from "./llm/types.js";
import { log } from "./logger.js";
import { createEmbedder, type EmbeddingProvider } from "./memory/embedder.js";
import { MemoryManager } from "./memory/manager.js";
import { AuditLog } from "./tools/audit-log.js";
import { ToolExecutor, type Confirmer } from "./tools/executor.js";
import { registerExportTranscript } from "./tools/export-transcript.js";
import { registerForgetMemory } from "./tools/forget-memory.js";
import { registerGetCurrentTime } from "./tools/get-current-time.js";
import { registerSearchMemory } from "./tools/search-memory.js";
import { UsageTracker } from "./usage/tracker.js";

export * from "./agent/types.js";
export { TurnChannel } from "./agent/channel.js";
export { OrchestrationCoordinator } from "./agent/coordinator.js";
export type { CoordinatorDeps, CoordinatorOptions, TurnInput } from "./agent/coordinator.js";
export { AssistantSession } from "./agent/session.js";
export type { SessionDeps, SessionOptions } from "./agent/session.js";
export { PromptCache } from "./cache/prompt-cache.js";
export { ContextAssembler } from "./context/assembler.js";
export type { AssembledContext } from "./context/assembler.js";
export { TokenEstimator } from "./context/token-estimator.js";
export { loadConfig } from "./config.js";
export type { AssistantConfig } from "./config.js";
export * from "./errors.js";
export { OpenAIChatProvider, createOpenAIClient } from "./llm/openai-provider.js";
export * from "./llm/types.js";
export { HashingEmbedder, OpenAIEmbedder, createEmbedder } from "./memory/embedder.js";
export type { EmbeddingProvider } from "./memory/embedder.js";
export { MemoryManager } from "./memory/manager.js";
export { VectorMemoryStore } from "./memory/vector-store.js";
export * from "./memory/types.js";
export { AuditLog } from "./tools/audit-log.js";
export { ToolExecutor, rejectAll, toolResultContent } from "./tools/executor.js";
export type {
  Confirmer,
  ConfirmRequest,
  ToolDefinition,
  ToolResult,
} from "./tools/executor.js";
export { UsageTracker } from "./usage/tracker.js";

// ── Composition root ─────────────────────────────────────

export interface AssistantOverrides {
  provider?: LlmProvider;
  embedder?: EmbeddingProvider;
  confirmer?: Confirmer;
  /** Directory export_transcript writes into */
  exportDir?: string;
}

/**
 * Wire one session from configuration: provider, three memory tiers,
 * the shipped tools and periodic maintenance. Restores the user tier
 * before returning.
 */
export async function createAssistant(
  config: AssistantConfig,
  overrides: AssistantOverrides = {},
): Promise<AssistantSession> {
  const client =
    overrides.provider && overrides.embedder ? undefined : createOpenAIClient(config);
  const provider =
    overrides.provider ??
    new OpenAIChatProvider(client ?? createOpenAIClient(config), {
      model: config.llmModel,
      temperature: config.llmTemperature,
    });
  const embedder = overrides.embedder ?? createEmbedder(config, client);
  const tracker = new UsageTracker();

  const memory = new MemoryManager({
    embedder,
    dir: config.memoryDir,
    owner: config.userId,
    provider,
    summaryModel: config.summaryModel,
    compressThreshold: config.compressThreshold,
    compressKeepRecent: config.compressKeepRecent,
    rebuildRatio: config.tombstoneRebuildRatio,
    topK: config.memoryTopK,
    minScore: config.memoryMinScore,
    providerTimeoutMs: config.providerTimeoutMs,
    tracker,
  });
  await memory.load();

  const executor = new ToolExecutor({
    confirmer: overrides.confirmer,
    audit: new AuditLog(config.auditLogPath),
    timeoutMs: config.toolTimeoutMs,
  });
  registerGetCurrentTime(executor);
  registerSearchMemory(executor, memory);
  registerForgetMemory(executor, memory);
  registerExportTranscript(
    executor,
    memory,
    overrides.exportDir ?? join(dirname(config.memoryDir), "exports"),
  );
  log.info({ count: executor.definitions().length }, "🔧 Tools registered");

  return new AssistantSession(
    {
      provider,
      memory,
      executor,
      tracker,
      cache: new PromptCache({
        maxEntries: config.promptCacheMaxEntries,
        defaultTtlMs: config.promptCacheTtlMs,
      }),
      estimator: new TokenEstimator(),
    },
    {
      model: config.llmModel,
      identity: loadIdentity(),
      maxToolRounds: config.maxToolRounds,
      providerTimeoutMs: config.providerTimeoutMs,
      contextTokenBudget: config.contextTokenBudget,
      maxQueuedTurns: config.maxQueuedTurns,
      finalAnswer: config.finalAnswer,
      maintenanceCron: config.maintenanceCron,
    },
  );
}
