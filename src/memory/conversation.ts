import type { ConversationTurn } from "./types.js";

// ── Conversation window — verbatim turns + condensed summary ─

export class ConversationWindow {
  private turns: ConversationTurn[] = [];
  private condensed: string | undefined;
  /** Turns folded into `condensed` so far, across all compressions */
  private condensedCount = 0;

  push(turn: ConversationTurn): void {
    this.turns.push(turn);
  }

  /** Verbatim turns, oldest first. */
  recent(limit?: number): ConversationTurn[] {
    return limit === undefined ? [...this.turns] : this.turns.slice(-limit);
  }

  get size(): number {
    return this.turns.length;
  }

  get summary(): string | undefined {
    return this.condensed;
  }

  get summarizedTurns(): number {
    return this.condensedCount;
  }

  /** Turns that would be condensed if everything but the newest `keep` goes. */
  olderThan(keep: number): ConversationTurn[] {
    return this.turns.length > keep ? this.turns.slice(0, this.turns.length - keep) : [];
  }

  /**
   * Replace the given oldest turns with `summary`. Turns added while the
   * summary was being produced stay in the window.
   */
  condense(folded: readonly ConversationTurn[], summary: string): void {
    const drop = folded.filter((t) => this.turns.includes(t)).length;
    this.turns = this.turns.slice(drop);
    this.condensed = summary;
    this.condensedCount += drop;
  }

  clear(): void {
    this.turns = [];
    this.condensed = undefined;
    this.condensedCount = 0;
  }

  /** Markdown transcript, summary first. */
  toMarkdown(title = "Conversation"): string {
    const parts = [`# ${title}`];
    if (this.condensed) {
      parts.push(`## Earlier (summary of ${this.condensedCount} turns)\n\n${this.condensed}`);
    }
    for (const turn of this.turns) {
      const at = new Date(turn.timestamp).toISOString();
      parts.push(`## ${at}\n\n**User:** ${turn.user}\n\n**Assistant:** ${turn.assistant}`);
    }
    return `${parts.join("\n\n")}\n`;
  }
}
