import { describe, it, expect } from "vitest";
import { cacheKey, normalize, stableStringify } from "../src/cache/normalizer.js";
import { PromptCache } from "../src/cache/prompt-cache.js";
import type { ToolSchema } from "../src/llm/types.js";

function schema(name: string): ToolSchema {
  return {
    type: "function",
    function: { name, description: `${name} tool`, parameters: { type: "object", properties: {} } },
  };
}

describe("normalize", () => {
  it("replaces timestamps and collapses blank lines", () => {
    const text = "Today is 2024-05-01T10:30:00Z.\r\n\r\n\r\nBe brief.  ";
    expect(normalize("instructions", text)).toBe("Today is <timestamp>.\n\nBe brief.");
  });

  it("gives one key to prompts that differ only in volatile fields", () => {
    const a = cacheKey("instructions", "session_id=abc123 at 2024-01-01 09:00");
    const b = cacheKey("instructions", "session_id=zz9 at 2025-12-31 23:59");
    expect(a).toBe(b);
    expect(a.startsWith("instructions:")).toBe(true);
  });

  it("keeps different segment kinds apart", () => {
    expect(cacheKey("identity", "You are helpful.")).not.toBe(
      cacheKey("instructions", "You are helpful."),
    );
  });

  it("ignores tool order", () => {
    const forward = cacheKey("tools", [schema("alpha"), schema("beta")]);
    const reverse = cacheKey("tools", [schema("beta"), schema("alpha")]);
    expect(forward).toBe(reverse);
  });

  it("sorts object keys at every depth", () => {
    expect(stableStringify({ b: 1, a: { d: [2, { f: 3, e: 4 }], c: undefined } })).toBe(
      '{"a":{"d":[2,{"e":4,"f":3}]},"b":1}',
    );
  });
});

describe("PromptCache", () => {
  function clock(start = 0): { now: () => number; advance: (ms: number) => void } {
    let t = start;
    return { now: () => t, advance: (ms) => (t += ms) };
  }

  // ── Hits and misses ────────────────────────────────────

  it("computes once and serves the second lookup from cache", () => {
    const cache = new PromptCache();
    let computed = 0;
    const compute = (normalized: string): string => {
      computed++;
      return normalized;
    };

    const first = cache.getOrCompute("identity", "You are helpful.", compute);
    const second = cache.getOrCompute("identity", "You are helpful.", compute);

    expect(first.hit).toBe(false);
    expect(second.hit).toBe(true);
    expect(second.value).toBe("You are helpful.");
    expect(computed).toBe(1);
    expect(cache.stats()).toEqual({
      entries: 1,
      hits: 1,
      misses: 1,
      hitRate: 0.5,
      evictions: 0,
      tokensSaved: 4,
    });
  });

  it("treats an entry older than its TTL as a miss", () => {
    const c = clock();
    const cache = new PromptCache({ now: c.now });
    cache.put("instructions", "Be brief.", "Be brief.", 1000);

    c.advance(1000);
    expect(cache.get("instructions", "Be brief.")).toBeDefined();

    c.advance(1);
    expect(cache.get("instructions", "Be brief.")).toBeUndefined();
    expect(cache.stats().entries).toBe(0);
  });

  it("never expires an entry stored with ttl 0", () => {
    const c = clock();
    const cache = new PromptCache({ now: c.now });
    cache.put("identity", "Stable", "Stable", 0);
    c.advance(10 * 365 * 24 * 3600 * 1000);
    expect(cache.get("identity", "Stable")?.value).toBe("Stable");
  });

  // ── Eviction ───────────────────────────────────────────

  it("evicts the least recently used entry past maxEntries", () => {
    const cache = new PromptCache({ maxEntries: 2 });
    cache.put("identity", "a", "A");
    cache.put("identity", "b", "B");
    expect(cache.get("identity", "a")?.value).toBe("A");

    cache.put("identity", "c", "C");

    expect(cache.get("identity", "b")).toBeUndefined();
    expect(cache.get("identity", "a")?.value).toBe("A");
    expect(cache.get("identity", "c")?.value).toBe("C");
    expect(cache.stats().evictions).toBe(1);
  });

  // ── Integrity ──────────────────────────────────────────

  it("drops an entry whose value no longer matches its checksum", () => {
    const cache = new PromptCache();
    const entry = cache.put("instructions", "Rules", "Rules");
    entry.value = "Tampered";

    expect(cache.get("instructions", "Rules")).toBeUndefined();
    expect(cache.stats().entries).toBe(0);
  });

  it("recomputes when the cached value fails validation", () => {
    const cache = new PromptCache();
    cache.put("tools", "[]", "not a catalog");
    let computed = 0;

    const result = cache.getOrCompute(
      "tools",
      "[]",
      (normalized) => {
        computed++;
        return normalized;
      },
      { validate: (v) => v.startsWith("[") },
    );

    expect(result).toMatchObject({ hit: false, value: "[]" });
    expect(computed).toBe(1);
  });

  it("invalidate removes one fragment", () => {
    const cache = new PromptCache();
    cache.put("identity", "x", "X");
    expect(cache.invalidate("identity", "x")).toBe(true);
    expect(cache.invalidate("identity", "x")).toBe(false);
  });
});
