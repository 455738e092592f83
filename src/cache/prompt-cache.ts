import { moduleLogger } from "../logger.js";
import { hashContent, keyFor, normalize, type SegmentKind } from "./normalizer.js";
import type { ToolSchema } from "../llm/types.js";

const log = moduleLogger("prompt-cache");

// ── Prompt Cache — content-addressed stable fragments ────

export interface CacheEntry {
  key: string;
  kind: SegmentKind;
  value: string;
  /** Hash of `value`, checked on every read. */
  checksum: string;
  createdAt: number;
  /** 0 = never expires */
  ttlMs: number;
  hitCount: number;
  estimatedTokens: number;
}

export interface CacheStats {
  entries: number;
  hits: number;
  misses: number;
  hitRate: number;
  evictions: number;
  tokensSaved: number;
}

export interface PromptCacheOptions {
  maxEntries?: number;
  defaultTtlMs?: number;
  estimateTokens?: (text: string) => number;
  now?: () => number;
}

export interface CacheLookup {
  key: string;
  value: string;
  hit: boolean;
}

type Content = string | readonly ToolSchema[];

export class PromptCache {
  // Map iteration order doubles as LRU order: oldest first
  private readonly entries = new Map<string, CacheEntry>();
  private readonly maxEntries: number;
  private readonly defaultTtlMs: number;
  private readonly estimateTokens: (text: string) => number;
  private readonly now: () => number;

  private hits = 0;
  private misses = 0;
  private evictions = 0;
  private tokensSaved = 0;

  constructor(opts: PromptCacheOptions = {}) {
    this.maxEntries = Math.max(1, opts.maxEntries ?? 50);
    this.defaultTtlMs = opts.defaultTtlMs ?? 60 * 60 * 1000;
    this.estimateTokens = opts.estimateTokens ?? ((t) => Math.ceil(t.length / 4));
    this.now = opts.now ?? Date.now;
  }

  /** Look up a fragment. Expired or corrupted entries count as a miss. */
  get(kind: SegmentKind, content: Content): CacheEntry | undefined {
    return this.lookup(this.keyOf(kind, content));
  }

  put(
    kind: SegmentKind,
    content: Content,
    value: string,
    ttlMs = this.defaultTtlMs,
  ): CacheEntry {
    return this.store(this.keyOf(kind, content), kind, value, ttlMs);
  }

  /**
   * Return the cached fragment or compute, store and return it. A failed
   * `validate` drops the entry and recomputes, so a bad entry costs one
   * recompute and never fails the caller.
   */
  getOrCompute(
    kind: SegmentKind,
    content: Content,
    compute: (normalized: string) => string,
    opts: { ttlMs?: number; validate?: (value: string) => boolean } = {},
  ): CacheLookup {
    const normalized = this.normalizeContent(kind, content);
    const key = keyFor(kind, normalized);

    const existing = this.lookup(key);
    if (existing) {
      if (!opts.validate || opts.validate(existing.value)) {
        return { key, value: existing.value, hit: true };
      }
      log.warn({ key }, "⚠️ Cached fragment failed validation — recomputing");
      this.entries.delete(key);
    }

    const value = compute(normalized);
    this.store(key, kind, value, opts.ttlMs ?? this.defaultTtlMs);
    return { key, value, hit: false };
  }

  invalidate(kind: SegmentKind, content: Content): boolean {
    return this.entries.delete(this.keyOf(kind, content));
  }

  clear(): void {
    this.entries.clear();
    this.hits = 0;
    this.misses = 0;
    this.evictions = 0;
    this.tokensSaved = 0;
  }

  stats(): CacheStats {
    const total = this.hits + this.misses;
    return {
      entries: this.entries.size,
      hits: this.hits,
      misses: this.misses,
      hitRate: total > 0 ? this.hits / total : 0,
      evictions: this.evictions,
      tokensSaved: this.tokensSaved,
    };
  }

  // ── Internals ──────────────────────────────────────────

  private normalizeContent(kind: SegmentKind, content: Content): string {
    return typeof content === "string"
      ? normalize(kind, content)
      : normalize("tools", content);
  }

  private keyOf(kind: SegmentKind, content: Content): string {
    return keyFor(kind, this.normalizeContent(kind, content));
  }

  private lookup(key: string): CacheEntry | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      this.misses++;
      return undefined;
    }

    if (entry.ttlMs > 0 && this.now() - entry.createdAt > entry.ttlMs) {
      this.entries.delete(key);
      this.misses++;
      return undefined;
    }

    if (hashContent(entry.value) !== entry.checksum) {
      log.warn({ key }, "⚠️ Corrupted cache entry dropped");
      this.entries.delete(key);
      this.misses++;
      return undefined;
    }

    // Touch: move to the most-recently-used end
    this.entries.delete(key);
    this.entries.set(key, entry);
    entry.hitCount++;
    this.hits++;
    this.tokensSaved += entry.estimatedTokens;
    return entry;
  }

  private store(
    key: string,
    kind: SegmentKind,
    value: string,
    ttlMs: number,
  ): CacheEntry {
    const entry: CacheEntry = {
      key,
      kind,
      value,
      checksum: hashContent(value),
      createdAt: this.now(),
      ttlMs,
      hitCount: 0,
      estimatedTokens: this.estimateTokens(value),
    };

    this.entries.delete(key);
    this.entries.set(key, entry);

    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
      this.evictions++;
    }
    return entry;
  }
}
