import { createHash } from "crypto";
import type { Message, Usage } from "../llm/types.js";
import { moduleLogger } from "../logger.js";

const log = moduleLogger("usage");

// ── Usage Tracking ───────────────────────────────────────
// Records every provider call: kind, model, tokens, cost estimate, latency,
// and a payload hash so an identical request repeated within one turn is
// flagged. In-memory, per session.

export type CallKind = "probe" | "stream" | "summary";

export interface UsageEntry {
  timestamp: Date;
  turnId: string;
  kind: CallKind;
  model: string;
  hasTools: boolean;
  messageCount: number;
  payloadHash: string;
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
  latencyMs: number;
  costEstimate: number; // USD estimate
  /** Same turn, kind and payload as an earlier call */
  duplicate: boolean;
}

export interface CallRecord {
  turnId: string;
  kind: CallKind;
  model: string;
  messages: readonly Message[];
  hasTools: boolean;
  usage?: Usage;
  latencyMs: number;
}

// Rough per-1K-token pricing for common models (input/output)
const PRICING: Record<string, { input: number; output: number }> = {
  "anthropic/claude-sonnet-4-20250514": { input: 0.003, output: 0.015 },
  "openai/gpt-4o": { input: 0.0025, output: 0.01 },
  "openai/gpt-4o-mini": { input: 0.00015, output: 0.0006 },
  "meta-llama/llama-3.3-70b-instruct:free": { input: 0, output: 0 },
  "google/gemini-2.0-flash-exp:free": { input: 0, output: 0 },
};

/** Role and content only: timestamps never make two payloads differ. */
export function hashPayload(messages: readonly Message[], hasTools: boolean): string {
  const simplified = messages.map((m) => [m.role, m.content, m.toolCallId ?? "", m.toolCalls?.map((c) => c.id) ?? []]);
  return createHash("sha256")
    .update(JSON.stringify({ simplified, hasTools }))
    .digest("hex");
}

export class UsageTracker {
  private entries: UsageEntry[] = [];
  private readonly startTime = new Date();

  record(call: CallRecord): UsageEntry {
    const pricing = PRICING[call.model] ?? { input: 0.001, output: 0.005 };
    const inputTokens = call.usage?.promptTokens ?? 0;
    const outputTokens = call.usage?.completionTokens ?? 0;
    const payloadHash = hashPayload(call.messages, call.hasTools);

    const duplicate = this.entries.some(
      (e) => e.turnId === call.turnId && e.kind === call.kind && e.payloadHash === payloadHash,
    );
    if (duplicate) {
      log.warn(
        { turnId: call.turnId, kind: call.kind, hash: payloadHash.slice(0, 16) },
        "⚠️ Duplicate provider call with an identical payload",
      );
    }

    const entry: UsageEntry = {
      timestamp: new Date(),
      turnId: call.turnId,
      kind: call.kind,
      model: call.model,
      hasTools: call.hasTools,
      messageCount: call.messages.length,
      payloadHash,
      inputTokens,
      outputTokens,
      totalTokens: call.usage?.totalTokens ?? inputTokens + outputTokens,
      latencyMs: call.latencyMs,
      costEstimate:
        (inputTokens / 1000) * pricing.input + (outputTokens / 1000) * pricing.output,
      duplicate,
    };

    this.entries.push(entry);
    return entry;
  }

  /** Entries for one turn, or all of them. */
  calls(turnId?: string): readonly UsageEntry[] {
    return turnId === undefined ? this.entries : this.entries.filter((e) => e.turnId === turnId);
  }

  duplicates(): UsageEntry[] {
    return this.entries.filter((e) => e.duplicate);
  }

  /** Summary stats for the /usage command. */
  getSummary(): string {
    const last = this.entries[this.entries.length - 1];
    if (!last) {
      return "📊 No usage data yet. Send a message first!";
    }

    const totalCalls = this.entries.length;
    const totalInput = this.entries.reduce((s, e) => s + e.inputTokens, 0);
    const totalOutput = this.entries.reduce((s, e) => s + e.outputTokens, 0);
    const totalCost = this.entries.reduce((s, e) => s + e.costEstimate, 0);
    const avgLatency = this.entries.reduce((s, e) => s + e.latencyMs, 0) / totalCalls;
    const byKind = (kind: CallKind): number => this.entries.filter((e) => e.kind === kind).length;

    return [
      "📊 Usage Stats",
      "────────────────────",
      `⏱ Uptime: ${this.getUptime()}`,
      `🤖 Model: ${last.model}`,
      `📞 Total calls: ${totalCalls} (probe ${byKind("probe")}, stream ${byKind("stream")}, summary ${byKind("summary")})`,
      `📥 Input tokens: ${totalInput.toLocaleString()}`,
      `📤 Output tokens: ${totalOutput.toLocaleString()}`,
      `📦 Total tokens: ${(totalInput + totalOutput).toLocaleString()}`,
      `⚡ Avg latency: ${Math.round(avgLatency)}ms`,
      `💰 Est. cost: $${totalCost.toFixed(6)}`,
      `🔁 Duplicate calls: ${this.duplicates().length}`,
    ].join("\n");
  }

  getUptime(): string {
    const ms = Date.now() - this.startTime.getTime();
    const secs = Math.floor(ms / 1000);
    const mins = Math.floor(secs / 60);
    const hours = Math.floor(mins / 60);

    if (hours > 0) return `${hours}h ${mins % 60}m`;
    if (mins > 0) return `${mins}m ${secs % 60}s`;
    return `${secs}s`;
  }

  getCallCount(): number {
    return this.entries.length;
  }
}
