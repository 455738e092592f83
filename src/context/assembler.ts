import type { PromptCache } from "../cache/prompt-cache.js";
import type { SegmentKind } from "../cache/normalizer.js";
import { INSTRUCTIONS } from "../llm/prompts.js";
import { makeMessage, type Message, type ToolSchema } from "../llm/types.js";
import { moduleLogger } from "../logger.js";
import { buildMemoryContext, type MemorySections } from "../memory/context-builder.js";
import type { ConversationTurn, MemoryContext, SearchHit } from "../memory/types.js";
import type { ToolExecutor } from "../tools/executor.js";
import type { TokenEstimator } from "./token-estimator.js";
import { selectTools } from "./tool-selector.js";

const log = moduleLogger("assembler");

// ── Context Assembler — bounded message list per turn ────

/** Memory hits and summary the assembler may include. */
export type TierContext = MemorySections & Pick<MemoryContext, "summary">;

export interface AssembledContext {
  messages: Message[];
  /** Tool subset for this turn; empty means a tool-free probe */
  tools: ToolSchema[];
  topic: string | undefined;
  estimatedTokens: number;
  budget: number;
  /** Required content alone exceeds the budget */
  overBudget: boolean;
  droppedMemories: number;
  droppedTurns: number;
  /** Fragments served from the prompt cache */
  cachedSections: SegmentKind[];
}

export interface AssemblerOptions {
  cache: PromptCache;
  estimator: TokenEstimator;
  executor: ToolExecutor;
  identity: string;
  instructions?: string;
  /** Token budget for the whole request */
  budget?: number;
  now?: () => number;
}

interface TaggedHit {
  tier: keyof MemorySections;
  hit: SearchHit;
}

export class ContextAssembler {
  private readonly opts: AssemblerOptions;
  private readonly budget: number;

  constructor(opts: AssemblerOptions) {
    this.opts = opts;
    this.budget = opts.budget ?? 4000;
  }

  get estimator(): TokenEstimator {
    return this.opts.estimator;
  }

  /**
   * Priority, highest first: system instructions, selected tool schemas,
   * memories (user tier first), recent turns, the new message. Memories go
   * oldest-first under pressure, then older turns. The new message and the
   * turn right before it are never dropped.
   */
  build(
    history: readonly ConversationTurn[],
    newMessage: string,
    tiers: TierContext,
  ): AssembledContext {
    const { cache, estimator, executor } = this.opts;
    const now = this.opts.now?.() ?? Date.now();
    const cachedSections: SegmentKind[] = [];

    // (1) Stable fragments through the prompt cache
    const identity = cache.getOrCompute("identity", this.opts.identity, () =>
      this.opts.identity.trim(),
    );
    const instructions = cache.getOrCompute(
      "instructions",
      this.opts.instructions ?? INSTRUCTIONS,
      () => (this.opts.instructions ?? INSTRUCTIONS).trim(),
    );
    if (identity.hit) cachedSections.push("identity");
    if (instructions.hit) cachedSections.push("instructions");

    // (2) Tool subset for the detected topic
    const selection = selectTools(newMessage, executor.definitions());
    const tools = executor.schemas(selection.names);
    let toolTokens = 0;
    if (tools.length > 0) {
      // The cached fragment is the canonical catalog text the model is sent
      const catalog = cache.getOrCompute("tools", tools, (normalized) => normalized, {
        validate: (v) => v.startsWith("["),
      });
      if (catalog.hit) cachedSections.push("tools");
      toolTokens = estimator.estimate(catalog.value);
    }

    // (3) Memories, (4) turns: candidates for dropping
    const memories: TaggedHit[] = [
      ...tiers.user.map((hit) => ({ tier: "user" as const, hit })),
      ...tiers.session.map((hit) => ({ tier: "session" as const, hit })),
      ...tiers.context.map((hit) => ({ tier: "context" as const, hit })),
    ];
    let turns = [...history];
    let summary = tiers.summary;
    const required = makeMessage("user", newMessage);

    const assemble = (): { messages: Message[]; tokens: number } => {
      const messages = [
        makeMessage(
          "system",
          this.systemPrompt(identity.value, instructions.value, memories, summary, now),
        ),
        ...turns.flatMap((t) => [
          makeMessage("user", t.user, { timestamp: t.timestamp }),
          makeMessage("assistant", t.assistant, { timestamp: t.timestamp }),
        ]),
        required,
      ];
      return { messages, tokens: estimator.estimateMessages(messages) + toolTokens };
    };

    let droppedMemories = 0;
    let droppedTurns = 0;
    let current = assemble();

    while (current.tokens > this.budget && memories.length > 0) {
      const oldest = memories.reduce((a, b, i) =>
        b.hit.record.createdAt < (memories[a]?.hit.record.createdAt ?? Infinity) ? i : a,
      0);
      memories.splice(oldest, 1);
      droppedMemories++;
      current = assemble();
    }

    while (current.tokens > this.budget && turns.length > 1) {
      turns = turns.slice(1);
      droppedTurns++;
      current = assemble();
    }

    if (current.tokens > this.budget && summary !== undefined) {
      summary = undefined;
      current = assemble();
    }

    const overBudget = current.tokens > this.budget;
    if (overBudget) {
      log.warn(
        { estimated: current.tokens, budget: this.budget },
        "⚠️ Required context exceeds the token budget — sending it whole",
      );
    } else if (droppedMemories > 0 || droppedTurns > 0) {
      log.debug({ droppedMemories, droppedTurns }, "✂️ Context trimmed to budget");
    }

    return {
      messages: current.messages,
      tools,
      topic: selection.topic,
      estimatedTokens: current.tokens,
      budget: this.budget,
      overBudget,
      droppedMemories,
      droppedTurns,
      cachedSections,
    };
  }

  /** Feed real prompt usage back into the estimator. */
  calibrate(estimatedTokens: number, actualPromptTokens: number): void {
    this.opts.estimator.observe(estimatedTokens, actualPromptTokens);
  }

  private systemPrompt(
    identity: string,
    instructions: string,
    memories: readonly TaggedHit[],
    summary: string | undefined,
    now: number,
  ): string {
    const sections: MemorySections = { user: [], session: [], context: [] };
    for (const { tier, hit } of memories) sections[tier].push(hit);

    const parts = [identity, instructions];
    const memoryBlock = buildMemoryContext(sections, now);
    if (memoryBlock) parts.push(memoryBlock);
    if (summary) parts.push(`📝 EARLIER IN THIS CONVERSATION:\n${summary}`);
    return parts.join("\n\n");
  }
}
