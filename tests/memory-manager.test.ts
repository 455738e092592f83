import { describe, it, expect } from "vitest";
import PQueue from "p-queue";
import { SessionCompressor, simpleSummary } from "../src/memory/compressor.js";
import { ConversationWindow } from "../src/memory/conversation.js";
import { HashingEmbedder, type EmbeddingProvider } from "../src/memory/embedder.js";
import { MemoryManager, isSelfStatement, rememberIntent } from "../src/memory/manager.js";
import type { ConversationTurn } from "../src/memory/types.js";
import { VectorMemoryStore } from "../src/memory/vector-store.js";
import { AbortedError } from "../src/timeout.js";
import { UsageTracker } from "../src/usage/tracker.js";
import { FakeProvider, content } from "./helpers/fakes.js";

/** Counts calls; while `hanging`, waits until the call's signal aborts. */
class CountingEmbedder implements EmbeddingProvider {
  readonly dimension = 256;
  calls = 0;
  hanging = false;
  private readonly inner = new HashingEmbedder(256);

  async embed(text: string, signal?: AbortSignal): Promise<number[]> {
    this.calls++;
    if (!this.hanging) return this.inner.embed(text);
    return new Promise((_, reject) => {
      signal?.addEventListener("abort", () => reject(new Error("embedding aborted")), {
        once: true,
      });
    });
  }
}

function turn(user: string, i = 0): ConversationTurn {
  return { user, assistant: `answer to ${user}`, timestamp: 1_000 + i };
}

function windowWith(count: number): ConversationWindow {
  const window = new ConversationWindow();
  for (let i = 0; i < count; i++) window.push(turn(`question ${i}`, i));
  return window;
}

describe("intent detection", () => {
  it("extracts the text after a remember prefix", () => {
    expect(rememberIntent("Please remember that my locker is 42")).toBe("my locker is 42");
    expect(rememberIntent("Don't forget: buy milk")).toBe("buy milk");
    expect(rememberIntent("remember")).toBeUndefined();
    expect(rememberIntent("Do you remember me?")).toBeUndefined();
  });

  it("recognizes statements about the user, not questions", () => {
    expect(isSelfStatement("I prefer tea in the morning")).toBe(true);
    expect(isSelfStatement("My name is Sam")).toBe(true);
    expect(isSelfStatement("I am tired?")).toBe(false);
    expect(isSelfStatement("The weather is nice")).toBe(false);
  });
});

describe("simpleSummary", () => {
  it("counts questions and lists the first three topics", () => {
    const turns = [
      turn("Where should we go for the company offsite?"),
      turn("Book a table"),
      turn("Check the weather"),
      turn("Draft an email"),
      turn("Plan the agenda"),
    ];

    expect(simpleSummary(turns)).toBe(
      "[Summary] The user asked 5 question(s) earlier, covering: " +
        "Where should we go for the com..., Book a table, Check the weather, and 2 more",
    );
  });
});

describe("SessionCompressor", () => {
  it("queues at most one compression at a time", async () => {
    const queue = new PQueue({ concurrency: 1, autoStart: false });
    const window = windowWith(5);
    const store = new VectorMemoryStore({ tier: "session", embedder: new HashingEmbedder() });
    const compressor = new SessionCompressor({
      window,
      sessionStore: store,
      queue,
      threshold: 3,
      keepRecent: 2,
    });

    expect(compressor.schedule()).toBe(true);
    expect(compressor.schedule()).toBe(false);
    expect(compressor.isPending).toBe(true);

    queue.start();
    await queue.onIdle();

    expect(compressor.completed).toBe(1);
    expect(compressor.isPending).toBe(false);
    expect(window.size).toBe(2);
    expect(window.summarizedTurns).toBe(3);
    expect(store.list().map((r) => r.text)).toEqual([
      "[Summary] The user asked 3 question(s) earlier, covering: question 0, question 1, question 2",
    ]);
  });

  it("does nothing under the threshold", () => {
    const compressor = new SessionCompressor({
      window: windowWith(3),
      sessionStore: new VectorMemoryStore({ tier: "session", embedder: new HashingEmbedder() }),
      queue: new PQueue({ concurrency: 1 }),
      threshold: 3,
    });
    expect(compressor.schedule()).toBe(false);
  });

  it("uses the provider's summary and accounts the call", async () => {
    const queue = new PQueue({ concurrency: 1 });
    const window = windowWith(4);
    const tracker = new UsageTracker();
    const provider = new FakeProvider([content(" They planned a trip to Lisbon. ")]);
    const compressor = new SessionCompressor({
      window,
      sessionStore: new VectorMemoryStore({ tier: "session", embedder: new HashingEmbedder() }),
      queue,
      provider,
      model: "summary-model",
      threshold: 3,
      keepRecent: 1,
      tracker,
    });

    compressor.schedule();
    await queue.onIdle();

    expect(window.summary).toBe("[Summary] They planned a trip to Lisbon.");
    expect(provider.probes[0]?.tools).toBeUndefined();
    expect(tracker.calls("background").map((e) => [e.kind, e.model])).toEqual([
      ["summary", "summary-model"],
    ]);
  });

  it("falls back to the rule-based summary when the provider fails", async () => {
    const queue = new PQueue({ concurrency: 1 });
    const window = windowWith(4);
    const compressor = new SessionCompressor({
      window,
      sessionStore: new VectorMemoryStore({ tier: "session", embedder: new HashingEmbedder() }),
      queue,
      provider: new FakeProvider([new Error("provider down")]),
      threshold: 3,
      keepRecent: 1,
    });

    compressor.schedule();
    await queue.onIdle();

    expect(window.summary).toBe(
      "[Summary] The user asked 3 question(s) earlier, covering: question 0, question 1, question 2",
    );
  });
});

describe("MemoryManager", () => {
  function manager(): MemoryManager {
    return new MemoryManager({
      embedder: new HashingEmbedder(),
      compressThreshold: 3,
      compressKeepRecent: 1,
    });
  }

  // ── Commits ────────────────────────────────────────────

  it("routes exchanges to the context tier and statements to the user tier", async () => {
    const memory = manager();

    await memory.saveExchange("Remember that the wifi password is on the router", "Noted.");
    await memory.saveExchange("My name is Sam", "Nice to meet you, Sam.");
    await memory.saveExchange("What is two plus two?", "Four.");

    expect(memory.context.count()).toBe(3);
    expect(memory.user.list().map((r) => [r.text, r.tags])).toEqual([
      ["the wifi password is on the router", ["remembered"]],
      ["My name is Sam", ["self_statement"]],
    ]);
  });

  it("compresses the window in the background once over threshold", async () => {
    const memory = manager();

    for (const text of ["alpha", "beta", "gamma", "delta"]) {
      await memory.saveExchange(text, "ok");
    }
    await memory.idle();

    expect(memory.window.recent().map((t) => t.user)).toEqual(["delta"]);
    expect(memory.window.summary).toBe(
      "[Summary] The user asked 3 question(s) earlier, covering: alpha, beta, gamma",
    );
    expect(memory.session.count()).toBe(1);
  });

  // ── Retrieval ──────────────────────────────────────────

  it("leaves out exchanges still verbatim in the window", async () => {
    const memory = manager();
    await memory.saveExchange("deploy the staging cluster", "Deployed.");

    const recalled = await memory.getContext("deploy the staging cluster");

    expect(recalled.context).toEqual([]);
    expect(recalled.recentTurns.map((t) => t.user)).toEqual(["deploy the staging cluster"]);
  });

  it("embeds the query once for all tiers", async () => {
    const embedder = new CountingEmbedder();
    const memory = new MemoryManager({ embedder });
    await memory.remember("Parking spot is B12");
    await memory.saveExchange("Where did I park?", "Level two.");
    embedder.calls = 0;

    const recalled = await memory.getContext("parking spot", { minScore: 0 });

    expect(embedder.calls).toBe(1);
    expect(recalled.user.map((h) => [h.record.text, h.via])).toEqual([
      ["Parking spot is B12", "vector"],
    ]);
  });

  it("skips the embedding call when no tier holds a record", async () => {
    const embedder = new CountingEmbedder();
    const memory = new MemoryManager({ embedder });

    await memory.getContext("anything at all");

    expect(embedder.calls).toBe(0);
  });

  it("falls back to keyword search when the query embedding times out", async () => {
    const embedder = new CountingEmbedder();
    const memory = new MemoryManager({ embedder, embedTimeoutMs: 20 });
    await memory.remember("Parking spot is B12");
    embedder.hanging = true;

    const recalled = await memory.getContext("parking spot");

    expect(recalled.user.map((h) => [h.record.text, h.via, h.score])).toEqual([
      ["Parking spot is B12", "keyword", 1],
    ]);
  });

  it("stops waiting for the embedding when the caller cancels", async () => {
    const embedder = new CountingEmbedder();
    const memory = new MemoryManager({ embedder });
    await memory.remember("Parking spot is B12");
    embedder.hanging = true;
    const controller = new AbortController();

    const pending = memory.getContext("parking spot", { signal: controller.signal });
    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(AbortedError);
  });

  // ── Lifecycle ──────────────────────────────────────────

  it("forgets a record by id in whichever tier holds it", async () => {
    const memory = manager();
    const id = await memory.remember("Parking spot is B12");

    expect(await memory.forget(id)).toBe(true);
    expect(await memory.forget(id)).toBe(false);
    expect(await memory.forget("no-such-id")).toBe(false);
    expect(memory.user.count()).toBe(0);
  });

  it("clears the session but keeps the user tier", async () => {
    const memory = manager();
    await memory.saveExchange("I prefer window seats", "Got it.");

    await memory.clearSession();

    expect(memory.window.size).toBe(0);
    expect(memory.context.count()).toBe(0);
    expect(memory.user.count()).toBe(1);
  });

  it("maintains every tier", async () => {
    const memory = manager();
    const reports = await memory.maintain();
    expect(Object.keys(reports)).toEqual(["user", "session", "context"]);
    expect(reports.user).toEqual({ reembedded: 0, rebuilt: false, reclaimed: 0 });
  });
});
