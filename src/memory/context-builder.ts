import type { MemoryContext, SearchHit } from "./types.js";

// ── Context Builder — render retrieved memories ──────────

/** Max characters of one memory shown to the model */
const MAX_MEMORY_CHARS = 200;

export type MemorySections = Pick<MemoryContext, "user" | "session" | "context">;

/**
 * Render memory hits as system-prompt blocks, user tier first. Within a
 * block, entries run oldest → newest. Empty tiers produce no block.
 */
export function buildMemoryContext(ctx: MemorySections, now = Date.now()): string {
  const parts: string[] = [];

  if (ctx.user.length > 0) {
    parts.push(`📋 KNOWN ABOUT THE USER:\n${renderHits(ctx.user, now)}`);
  }
  if (ctx.session.length > 0) {
    parts.push(`🗂️ EARLIER IN THIS SESSION:\n${renderHits(ctx.session, now)}`);
  }
  if (ctx.context.length > 0) {
    parts.push(
      `🧠 RELEVANT PAST EXCHANGES (retrieved semantically):\n${renderHits(ctx.context, now)}`,
    );
  }

  return parts.join("\n\n");
}

/** One hit as a single bullet line. */
export function renderHit(hit: SearchHit, now = Date.now()): string {
  const text = hit.record.text.replace(/\s+/g, " ").trim();
  const clipped = text.length > MAX_MEMORY_CHARS ? `${text.slice(0, MAX_MEMORY_CHARS)}…` : text;
  return `• [${formatAgo(hit.record.createdAt, now)}] ${clipped}`;
}

function renderHits(hits: readonly SearchHit[], now: number): string {
  return [...hits]
    .sort((a, b) => a.record.createdAt - b.record.createdAt)
    .map((h) => renderHit(h, now))
    .join("\n");
}

/** Format a Unix ms timestamp as a human-readable "X ago" string. */
export function formatAgo(ts: number, now = Date.now()): string {
  const diffSec = Math.floor((now - ts) / 1000);
  if (diffSec < 60) return "just now";
  const diffMin = Math.floor(diffSec / 60);
  if (diffMin < 60) return `${diffMin}m ago`;
  const diffHr = Math.floor(diffMin / 60);
  if (diffHr < 24) return `${diffHr}h ago`;
  const diffDay = Math.floor(diffHr / 24);
  if (diffDay < 30) return `${diffDay}d ago`;
  const diffMo = Math.floor(diffDay / 30);
  return `${diffMo}mo ago`;
}
