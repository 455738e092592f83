import type PQueue from "p-queue";
import { errorMessage } from "../errors.js";
import { SUMMARY_INSTRUCTIONS } from "../llm/prompts.js";
import { makeMessage, type LlmProvider } from "../llm/types.js";
import { moduleLogger } from "../logger.js";
import { withDeadline } from "../timeout.js";
import type { UsageTracker } from "../usage/tracker.js";
import type { ConversationWindow } from "./conversation.js";
import type { ConversationTurn } from "./types.js";
import type { VectorMemoryStore } from "./vector-store.js";

const log = moduleLogger("compressor");

// ── Session compression — runs off the turn path ────────

export const SUMMARY_PREFIX = "[Summary]";

export interface CompressorOptions {
  window: ConversationWindow;
  sessionStore: VectorMemoryStore;
  /** Background maintenance queue shared with the rest of the session */
  queue: PQueue;
  /** Absent provider = rule-based summaries only */
  provider?: LlmProvider;
  model?: string;
  /** Compress once the window holds more than this many turns */
  threshold?: number;
  keepRecent?: number;
  timeoutMs?: number;
  /** Summary calls are accounted under the turn id "background" */
  tracker?: UsageTracker;
}

export class SessionCompressor {
  private readonly opts: CompressorOptions;
  private readonly threshold: number;
  private readonly keepRecent: number;
  private pending = false;
  private runs = 0;

  constructor(opts: CompressorOptions) {
    this.opts = opts;
    this.threshold = opts.threshold ?? 15;
    this.keepRecent = Math.max(1, opts.keepRecent ?? 5);
  }

  get isPending(): boolean {
    return this.pending;
  }

  get completed(): number {
    return this.runs;
  }

  shouldCompress(): boolean {
    return this.opts.window.size > this.threshold;
  }

  /**
   * Queue a compression when the window is over threshold. At most one is
   * in flight; returns false when nothing was queued.
   */
  schedule(): boolean {
    if (this.pending || !this.shouldCompress()) return false;
    this.pending = true;
    void this.opts.queue
      .add(() => this.run())
      .catch((err: unknown) => {
        log.warn({ err: errorMessage(err) }, "⚠️ Session compression failed");
      });
    return true;
  }

  private async run(): Promise<void> {
    try {
      const { window, sessionStore } = this.opts;
      const folded = window.olderThan(this.keepRecent);
      if (folded.length === 0) return;

      const summary = await this.summarize(folded, window.summary);
      window.condense(folded, summary);
      await sessionStore.add(summary, {
        tags: ["summary"],
        metadata: { turns: folded.length },
      });
      this.runs++;
      log.info({ turns: folded.length }, "🗜️ Session history compressed");
    } finally {
      this.pending = false;
    }
  }

  private async summarize(
    turns: readonly ConversationTurn[],
    previous: string | undefined,
  ): Promise<string> {
    const provider = this.opts.provider;
    if (!provider) return simpleSummary(turns);

    const transcript = turns
      .map((t) => `USER: ${t.user}\nASSISTANT: ${t.assistant}`)
      .join("\n");
    const input = previous
      ? `Earlier summary:\n${previous}\n\nNew conversation:\n${transcript}`
      : transcript;

    const messages = [makeMessage("system", SUMMARY_INSTRUCTIONS), makeMessage("user", input)];
    const started = Date.now();
    try {
      const result = await withDeadline(
        (signal) =>
          provider.probe(messages, undefined, {
            signal,
            model: this.opts.model,
            maxTokens: 512,
          }),
        this.opts.timeoutMs ?? 60_000,
        { label: "Summary call" },
      );
      this.opts.tracker?.record({
        turnId: "background",
        kind: "summary",
        model: this.opts.model ?? provider.name,
        messages,
        hasTools: false,
        usage: result.usage,
        latencyMs: Date.now() - started,
      });
      const text = result.kind === "content" ? result.content.trim() : "";
      if (text) return `${SUMMARY_PREFIX} ${text}`;
      log.warn("⚠️ Summary call returned no text — using simple summary");
    } catch (err) {
      log.warn({ err: errorMessage(err) }, "⚠️ Summary call failed — using simple summary");
    }
    return simpleSummary(turns);
  }
}

/** Summary without a provider: question count plus the first few topics. */
export function simpleSummary(turns: readonly ConversationTurn[]): string {
  const topics = turns
    .map((t) => t.user.trim())
    .filter(Boolean)
    .map((u) => (u.length > 30 ? `${u.slice(0, 30)}...` : u));

  const shown =
    topics.length > 3
      ? [...topics.slice(0, 3), `and ${topics.length - 3} more`]
      : topics;

  let summary = `The user asked ${turns.length} question(s) earlier`;
  if (shown.length > 0) summary += `, covering: ${shown.join(", ")}`;
  return `${SUMMARY_PREFIX} ${summary}`;
}
