// ── Memory Module — Shared Types ─────────────────────────

export type Tier = "user" | "session" | "context";

export const TIERS: readonly Tier[] = ["user", "session", "context"];

export type RecordMetadata = Record<string, string | number | boolean>;

export interface MemoryRecord {
  id: string;
  text: string;
  /** Empty while the record waits to be (re-)embedded. */
  vector: number[];
  tier: Tier;
  importance: number; // 0..1
  createdAt: number; // Unix ms
  tags: string[];
  metadata: RecordMetadata;
  /** Tombstone: hidden from search until maintenance reclaims it */
  deleted: boolean;
}

export interface AddOptions {
  tags?: string[];
  metadata?: RecordMetadata;
  /** Skips the importance rules when set */
  importance?: number;
  createdAt?: number;
}

export interface SearchHit {
  record: MemoryRecord;
  score: number;
  /** "vector" normally, "keyword" while the store runs degraded */
  via: "vector" | "keyword";
}

export interface SearchOptions {
  k?: number;
  minScore?: number;
  minImportance?: number;
  /**
   * Query vector embedded by the caller, so several tiers share one
   * embedding call. `null` means embedding failed: rank by keyword overlap.
   */
  vector?: number[] | null;
}

export interface ConversationTurn {
  user: string;
  assistant: string;
  timestamp: number; // Unix ms
}

export interface MemoryContext {
  user: SearchHit[];
  session: SearchHit[];
  context: SearchHit[];
  /** Verbatim turns still in the window, oldest first */
  recentTurns: ConversationTurn[];
  /** Condensed summary of turns that left the window */
  summary: string | undefined;
}
