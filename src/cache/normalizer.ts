import { createHash } from "crypto";
import type { ToolSchema } from "../llm/types.js";

// ── Content normalization for cache addressing ──────────
// Two prompts that differ only in volatile fields must hash to the same key.

export type SegmentKind = "instructions" | "identity" | "tools";

const VOLATILE_PATTERNS: [RegExp, string][] = [
  // ISO-8601 date-times, with optional seconds, fraction and zone
  [
    /\b\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:?\d{2})?/g,
    "<timestamp>",
  ],
  // session_id=..., requestId: "...", trace-id ...
  [
    /\b(session|request|trace|turn|conversation)[_-]?id\b(\s*[:=]\s*)["']?[\w.-]+["']?/gi,
    "$1_id$2<id>",
  ],
  [/\b[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}\b/gi, "<id>"],
  // Unix epoch in ms (13 digits) or s (10 digits starting with 1)
  [/\b1\d{12}\b/g, "<timestamp>"],
  [/\b1\d{9}\b/g, "<timestamp>"],
  // Wall-clock times with seconds
  [/\b\d{1,2}:\d{2}:\d{2}\b/g, "<time>"],
];

export function normalizeText(text: string): string {
  let out = text.replace(/\r\n?/g, "\n");
  for (const [pattern, replacement] of VOLATILE_PATTERNS) {
    out = out.replace(pattern, replacement);
  }
  return out
    .split("\n")
    .map((line) => line.replace(/[ \t]+/g, " ").trimEnd())
    .join("\n")
    .replace(/\n{3,}/g, "\n\n")
    .trim();
}

export function normalizeTools(tools: readonly ToolSchema[]): string {
  if (tools.length === 0) return "";
  const sorted = [...tools].sort((a, b) =>
    a.function.name.localeCompare(b.function.name),
  );
  return stableStringify(sorted);
}

export function normalize(kind: "tools", content: readonly ToolSchema[]): string;
export function normalize(kind: SegmentKind, content: string): string;
export function normalize(
  kind: SegmentKind,
  content: string | readonly ToolSchema[],
): string {
  if (typeof content === "string") {
    return kind === "tools" ? content.trim() : normalizeText(content);
  }
  return normalizeTools(content);
}

/** SHA-256 of the normalized content, first 16 hex chars. */
export function hashContent(normalized: string): string {
  return createHash("sha256").update(normalized, "utf8").digest("hex").slice(0, 16);
}

export function keyFor(kind: SegmentKind, normalized: string): string {
  return `${kind}:${hashContent(normalized)}`;
}

export function cacheKey(kind: "tools", content: readonly ToolSchema[]): string;
export function cacheKey(kind: SegmentKind, content: string): string;
export function cacheKey(
  kind: SegmentKind,
  content: string | readonly ToolSchema[],
): string {
  const normalized =
    typeof content === "string"
      ? normalize(kind, content)
      : normalize("tools", content);
  return keyFor(kind, normalized);
}

/** JSON with object keys sorted at every depth. */
export function stableStringify(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map((v) => stableStringify(v)).join(",")}]`;
  }
  if (value !== null && typeof value === "object") {
    const entries = Object.entries(value)
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return `{${entries
      .map(([k, v]) => `${JSON.stringify(k)}:${stableStringify(v)}`)
      .join(",")}}`;
  }
  return JSON.stringify(value) ?? "null";
}
