import type { Message, ToolSchema } from "../llm/types.js";

// ── Token estimation — heuristic, calibrated from usage ──
// Never authoritative. The provider's usage counters are the truth; every
// observation nudges `factor` toward them.

/** Tokens per character for each character class. */
export const CHAR_CLASS_WEIGHTS = {
  cjk: 1.0,
  word: 0.25,
  space: 0.05,
  other: 0.5,
} as const;

/** Fixed framing cost of one chat message (role, separators). */
export const MESSAGE_OVERHEAD = 4;

const CJK_RE = /[\u3040-\u30ff\u3400-\u4dbf\u4e00-\u9fff\uac00-\ud7af\uf900-\ufaff]/;
const WORD_RE = /[\p{L}\p{N}_]/u;
const SPACE_RE = /\s/;

export interface EstimatorOptions {
  /** EMA weight of each new observation (0..1). */
  alpha?: number;
  minFactor?: number;
  maxFactor?: number;
}

export class TokenEstimator {
  private factor = 1;
  private samples = 0;
  private readonly alpha: number;
  private readonly minFactor: number;
  private readonly maxFactor: number;

  constructor(opts: EstimatorOptions = {}) {
    this.alpha = opts.alpha ?? 0.2;
    this.minFactor = opts.minFactor ?? 0.5;
    this.maxFactor = opts.maxFactor ?? 2;
  }

  /** Uncalibrated weighted character count. */
  raw(text: string): number {
    let total = 0;
    for (const ch of text) {
      if (CJK_RE.test(ch)) total += CHAR_CLASS_WEIGHTS.cjk;
      else if (WORD_RE.test(ch)) total += CHAR_CLASS_WEIGHTS.word;
      else if (SPACE_RE.test(ch)) total += CHAR_CLASS_WEIGHTS.space;
      else total += CHAR_CLASS_WEIGHTS.other;
    }
    return total;
  }

  estimate(text: string): number {
    if (!text) return 0;
    return Math.ceil(this.raw(text) * this.factor);
  }

  estimateMessage(message: Message): number {
    let total = MESSAGE_OVERHEAD + this.estimate(message.content);
    for (const call of message.toolCalls ?? []) {
      total += this.estimate(call.name) + this.estimate(call.arguments);
    }
    return total;
  }

  estimateMessages(messages: readonly Message[]): number {
    return messages.reduce((sum, m) => sum + this.estimateMessage(m), 0);
  }

  estimateTools(tools: readonly ToolSchema[]): number {
    return tools.reduce(
      (sum, t) =>
        sum +
        this.estimate(t.function.name) +
        this.estimate(t.function.description) +
        this.estimate(JSON.stringify(t.function.parameters)),
      0,
    );
  }

  /**
   * Feed back a real usage counter for a prompt we had estimated. The
   * implied correction is blended into `factor` with an EMA and clamped.
   */
  observe(estimatedTokens: number, actualTokens: number): void {
    if (estimatedTokens <= 0 || actualTokens <= 0) return;
    const implied = this.factor * (actualTokens / estimatedTokens);
    const next = this.factor + this.alpha * (implied - this.factor);
    this.factor = Math.min(this.maxFactor, Math.max(this.minFactor, next));
    this.samples++;
  }

  get calibration(): { factor: number; samples: number } {
    return { factor: this.factor, samples: this.samples };
  }
}
