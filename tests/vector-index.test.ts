import { describe, it, expect } from "vitest";
import { HashingEmbedder } from "../src/memory/embedder.js";
import { LshIndex } from "../src/memory/vector-index.js";

const embedder = new HashingEmbedder(64);

function indexOf(texts: Record<string, string>): LshIndex {
  const index = new LshIndex({ dimension: 64, tables: 4, bits: 6 });
  for (const [id, text] of Object.entries(texts)) index.add(id, embedder.embedSync(text));
  return index;
}

describe("LshIndex", () => {
  it("returns an identical vector first with score 1", () => {
    const index = indexOf({ a: "invoice overdue reminder", b: "garden tomato seedlings" });

    const [top] = index.search(embedder.embedSync("invoice overdue reminder"), 1);

    expect(top?.id).toBe("a");
    expect(top?.score).toBeCloseTo(1);
  });

  it("honours the accept filter", () => {
    const index = indexOf({ a: "invoice overdue reminder", b: "garden tomato seedlings" });

    const hits = index.search(embedder.embedSync("invoice overdue reminder"), 5, (id) => id !== "a");

    expect(hits.map((h) => h.id)).toEqual(["b"]);
  });

  it("drops removed ids", () => {
    const index = indexOf({ a: "one thing", b: "another thing" });

    expect(index.remove("a")).toBe(true);
    expect(index.remove("a")).toBe(false);
    expect(index.size).toBe(1);
    expect(index.has("a")).toBe(false);
  });

  it("rejects a vector of the wrong length", () => {
    const index = new LshIndex({ dimension: 64 });
    expect(() => index.add("x", [1, 0, 0])).toThrow(
      "Vector dimension mismatch: expected 64, got 3",
    );
  });

  it("restores from a snapshot with the same answers", () => {
    const index = indexOf({ a: "invoice overdue reminder", b: "garden tomato seedlings" });
    const restored = LshIndex.fromJSON(index.toJSON());
    const query = embedder.embedSync("tomato garden");

    expect(restored.size).toBe(2);
    expect(restored.search(query, 2)).toEqual(index.search(query, 2));
  });
});
