import PQueue from "p-queue";
import { errorMessage } from "../errors.js";
import type { LlmProvider } from "../llm/types.js";
import { moduleLogger } from "../logger.js";
import { AbortedError, withDeadline } from "../timeout.js";
import type { UsageTracker } from "../usage/tracker.js";
import { SessionCompressor } from "./compressor.js";
import { ConversationWindow } from "./conversation.js";
import type { EmbeddingProvider } from "./embedder.js";
import type { MemoryContext, SearchOptions, Tier } from "./types.js";
import { VectorMemoryStore, type MaintenanceReport } from "./vector-store.js";

const log = moduleLogger("memory");

// ── Intent detection ─────────────────────────────────────

const REMEMBER_RE =
  /^\s*(?:please\s+)?(?:remember(?:\s+that)?|don'?t\s+forget(?:\s+that)?|note\s+that|keep\s+in\s+mind(?:\s+that)?)[\s,:]+/i;

const SELF_STATEMENT_RE =
  /^\s*(?:i\s+am|i'm|my\s+name\s+is|call\s+me|i\s+prefer|i\s+like|i\s+love|i\s+hate|i\s+use|i\s+work|i\s+live|i\s+need|i\s+always|i\s+never|my\s+favou?rite)\b/i;

const QUESTION_RE = /\?\s*$|^\s*(?:what|who|where|when|why|how|do|does|did|is|are|can|could|would)\b/i;

/** Text after an explicit "remember ..." prefix, or undefined. */
export function rememberIntent(text: string): string | undefined {
  const match = REMEMBER_RE.exec(text);
  if (!match) return undefined;
  const rest = text.slice(match[0].length).trim();
  return rest || undefined;
}

/** A durable statement about the user ("I prefer...", "My name is..."). */
export function isSelfStatement(text: string): boolean {
  return SELF_STATEMENT_RE.test(text) && !QUESTION_RE.test(text);
}

// ── MemoryManager — three tiers + conversation window ───

export interface MemoryManagerOptions {
  embedder: EmbeddingProvider;
  /** Durable directory for the user tier; omit for in-memory only */
  dir?: string;
  owner?: string;
  provider?: LlmProvider;
  summaryModel?: string;
  compressThreshold?: number;
  compressKeepRecent?: number;
  rebuildRatio?: number;
  topK?: number;
  minScore?: number;
  providerTimeoutMs?: number;
  /** Deadline for one embedding call (default: providerTimeoutMs) */
  embedTimeoutMs?: number;
  tracker?: UsageTracker;
}

export interface ContextQueryOptions extends Omit<SearchOptions, "vector"> {
  /** The turn's signal; aborting it stops the query embedding */
  signal?: AbortSignal;
}

export class MemoryManager {
  readonly user: VectorMemoryStore;
  readonly session: VectorMemoryStore;
  readonly context: VectorMemoryStore;
  readonly window = new ConversationWindow();
  readonly compressor: SessionCompressor;

  /** Background work: compression and index maintenance */
  readonly background = new PQueue({ concurrency: 1 });
  /** Serializes turn commits */
  private readonly writeLock = new PQueue({ concurrency: 1 });
  private readonly embedder: EmbeddingProvider;
  private readonly embedTimeoutMs: number;
  private readonly topK: number;
  private readonly minScore: number;

  constructor(opts: MemoryManagerOptions) {
    this.embedder = opts.embedder;
    this.embedTimeoutMs = opts.embedTimeoutMs ?? opts.providerTimeoutMs ?? 60_000;
    const shared = {
      embedder: opts.embedder,
      rebuildRatio: opts.rebuildRatio,
      embedTimeoutMs: this.embedTimeoutMs,
    };
    this.user = new VectorMemoryStore({
      ...shared,
      tier: "user",
      dir: opts.dir,
      owner: opts.owner,
    });
    this.session = new VectorMemoryStore({ ...shared, tier: "session" });
    this.context = new VectorMemoryStore({ ...shared, tier: "context" });
    this.topK = opts.topK ?? 5;
    this.minScore = opts.minScore ?? 0.35;

    this.compressor = new SessionCompressor({
      window: this.window,
      sessionStore: this.session,
      queue: this.background,
      provider: opts.provider,
      model: opts.summaryModel,
      threshold: opts.compressThreshold,
      keepRecent: opts.compressKeepRecent,
      timeoutMs: opts.providerTimeoutMs,
      tracker: opts.tracker,
    });
  }

  /** Restore the durable user tier. */
  async load(): Promise<void> {
    await this.user.load();
  }

  tier(name: Tier): VectorMemoryStore {
    switch (name) {
      case "user":
        return this.user;
      case "session":
        return this.session;
      case "context":
        return this.context;
    }
  }

  // ── Main: gather context before calling the LLM ───────

  async getContext(query: string, opts: ContextQueryOptions = {}): Promise<MemoryContext> {
    const search: SearchOptions = {
      k: opts.k ?? this.topK,
      minScore: opts.minScore ?? this.minScore,
      minImportance: opts.minImportance,
      vector: await this.embedQuery(query, opts.signal),
    };

    const [user, session, context] = await Promise.all(
      [this.user, this.session, this.context].map((store) =>
        store.search(query, search).catch((err: unknown) => {
          log.warn({ tier: store.tier, err: errorMessage(err) }, "⚠️ Memory search failed");
          return [];
        }),
      ),
    );

    // Turns still verbatim in the window would be duplicated as memories
    const recentTurns = this.window.recent();
    const verbatim = new Set(recentTurns.map((t) => qaText(t.user, t.assistant)));

    return {
      user: user ?? [],
      session: session ?? [],
      context: (context ?? []).filter((hit) => !verbatim.has(hit.record.text)),
      recentTurns,
      summary: this.window.summary,
    };
  }

  /**
   * One embedding shared by every tier. `null` sends the tiers to keyword
   * search: nothing to search, or the embedder failed or timed out.
   * Cancellation propagates.
   */
  private async embedQuery(query: string, signal?: AbortSignal): Promise<number[] | null> {
    const searchable = [this.user, this.session, this.context].some(
      (store) => store.count() > 0 && !store.isDegraded(),
    );
    if (!searchable) return null;
    try {
      return await withDeadline(
        (child) => this.embedder.embed(query, child),
        this.embedTimeoutMs,
        { label: "Query embedding", signal },
      );
    } catch (err) {
      if (err instanceof AbortedError) throw err;
      log.warn({ err: errorMessage(err) }, "⚠️ Query embedding failed — keyword search for this turn");
      return null;
    }
  }

  // ── Main: commit a completed exchange ──────────────────

  saveExchange(userMessage: string, assistantMessage: string): Promise<void> {
    return this.writeLock.add(
      async () => {
        const timestamp = Date.now();
        this.window.push({ user: userMessage, assistant: assistantMessage, timestamp });

        await this.context.add(qaText(userMessage, assistantMessage), {
          createdAt: timestamp,
          metadata: { kind: "exchange" },
        });

        const remembered = rememberIntent(userMessage);
        if (remembered !== undefined) {
          await this.user.add(remembered, {
            tags: ["remembered"],
            createdAt: timestamp,
            metadata: { source: "remember_intent" },
          });
          log.info("📌 Remembered on request");
        } else if (isSelfStatement(userMessage)) {
          await this.user.add(userMessage.trim(), {
            tags: ["self_statement"],
            createdAt: timestamp,
            metadata: { source: "self_statement" },
          });
        }

        this.compressor.schedule();
      },
      { throwOnTimeout: true },
    );
  }

  /** Explicit user-tier write. */
  remember(text: string, tags: string[] = []): Promise<string> {
    return this.user.add(text, { tags: ["remembered", ...tags] });
  }

  /** Tombstone a record in whichever tier holds it. */
  async forget(id: string): Promise<boolean> {
    for (const store of [this.user, this.session, this.context]) {
      if (store.get(id)) return store.delete(id);
    }
    return false;
  }

  /** Drop the conversation and both short-lived tiers. The user tier stays. */
  async clearSession(): Promise<void> {
    await this.writeLock.onIdle();
    await this.background.onIdle();
    this.window.clear();
    await Promise.all([this.session.clear(), this.context.clear()]);
    log.info("🧹 Session memory cleared");
  }

  /** Queue maintenance of every tier on the background queue. */
  maintain(): Promise<Record<Tier, MaintenanceReport>> {
    return this.background.add(
      async () => {
        const [user, session, context] = await Promise.all([
          this.user.maintain(),
          this.session.maintain(),
          this.context.maintain(),
        ]);
        return { user, session, context };
      },
      { throwOnTimeout: true },
    );
  }

  /** Wait for pending commits and background work. */
  async idle(): Promise<void> {
    await this.writeLock.onIdle();
    await this.background.onIdle();
    await Promise.all([this.user.idle(), this.session.idle(), this.context.idle()]);
  }

  async close(): Promise<void> {
    await this.idle();
    await this.user.flush();
  }
}

function qaText(user: string, assistant: string): string {
  return `Q: ${user}\nA: ${assistant}`;
}
