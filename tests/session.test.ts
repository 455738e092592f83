import { afterEach, describe, it, expect } from "vitest";
import { z } from "zod";
import { AssistantSession } from "../src/agent/session.js";
import { SessionBusyError } from "../src/errors.js";
import { HashingEmbedder, type EmbeddingProvider } from "../src/memory/embedder.js";
import { MemoryManager } from "../src/memory/manager.js";
import { ToolExecutor } from "../src/tools/executor.js";
import { registerGetCurrentTime } from "../src/tools/get-current-time.js";
import { FakeProvider, collect, content, toolCall, type ProbeStep } from "./helpers/fakes.js";

interface Gate {
  wait: Promise<void>;
  open: () => void;
}

function gate(): Gate {
  let open = (): void => undefined;
  const wait = new Promise<void>((resolve) => {
    open = resolve;
  });
  return { wait, open };
}

/** A probe step that answers only once the gate opens. */
function gated(g: Gate, text = "draft"): ProbeStep {
  return async () => {
    await g.wait;
    return content(text);
  };
}

const sessions: AssistantSession[] = [];

function open(probes: ProbeStep[] = []): { session: AssistantSession; provider: FakeProvider } {
  const provider = new FakeProvider(probes);
  const memory = new MemoryManager({ embedder: new HashingEmbedder() });
  const executor = new ToolExecutor();
  registerGetCurrentTime(executor);
  const session = new AssistantSession(
    { provider, memory, executor },
    { model: "test-model", maxQueuedTurns: 3 },
  );
  sessions.push(session);
  return { session, provider };
}

afterEach(async () => {
  await Promise.all(sessions.splice(0).map((s) => s.close()));
});

describe("AssistantSession", () => {
  // ── Single turn ────────────────────────────────────────

  it("streams a turn to completion through the handle", async () => {
    const { session } = open();

    const handle = session.send("hello");
    const events = await collect(handle.events);
    const outcome = await handle.outcome;

    expect(outcome.state).toBe("DONE");
    expect(outcome.response).toBe("Hello there");
    expect(outcome.turnId).toBe(handle.id);
    expect(events.at(-1)?.type).toBe("done");
    expect(session.memory.window.recent().map((t) => [t.user, t.assistant])).toEqual([
      ["hello", "Hello there"],
    ]);
  });

  // ── Queueing ───────────────────────────────────────────

  it("runs turns one at a time in arrival order", async () => {
    const g = gate();
    const { session, provider } = open([gated(g)]);

    const handles = ["one", "two", "three", "four"].map((text) => session.send(text));
    expect(session.pending).toBe(4);

    g.open();
    const outcomes = await Promise.all(handles.map((h) => h.outcome));

    expect(outcomes.map((o) => o.state)).toEqual(["DONE", "DONE", "DONE", "DONE"]);
    expect(session.memory.window.recent().map((t) => t.user)).toEqual([
      "one",
      "two",
      "three",
      "four",
    ]);
    expect(provider.probes).toHaveLength(4);
    expect(session.pending).toBe(0);
  });

  it("rejects a message once the queue is full", async () => {
    const g = gate();
    const { session } = open([gated(g)]);

    const handles = ["one", "two", "three", "four"].map((text) => session.send(text));

    expect(() => session.send("five")).toThrow(SessionBusyError);
    expect(() => session.send("five")).toThrow(
      "A turn is already running and 3 message(s) are waiting. Try again when it finishes.",
    );

    g.open();
    await Promise.all(handles.map((h) => h.outcome));
  });

  it("cancels a queued turn before it reaches the provider", async () => {
    const g = gate();
    const { session, provider } = open([gated(g)]);

    const first = session.send("one");
    const second = session.send("two");
    second.cancel();
    g.open();

    const [a, b] = await Promise.all([first.outcome, second.outcome]);
    const events = await collect(second.events);

    expect(a.state).toBe("DONE");
    expect(b.state).toBe("CANCELLED");
    expect(b.providerCalls).toBe(0);
    expect(events.map((e) => e.type)).toEqual(["cancelled"]);
    expect(provider.probes).toHaveLength(1);
    expect(session.memory.window.recent().map((t) => t.user)).toEqual(["one"]);
  });

  it("cancels a turn while it waits on the query embedding", async () => {
    const started = gate();
    const inner = new HashingEmbedder();
    let hanging = false;
    const embedder: EmbeddingProvider = {
      dimension: inner.dimension,
      embed: (text, signal) => {
        if (!hanging) return inner.embed(text);
        started.open();
        return new Promise((_, reject) => {
          signal?.addEventListener("abort", () => reject(new Error("embedding aborted")), {
            once: true,
          });
        });
      },
    };
    const provider = new FakeProvider();
    const memory = new MemoryManager({ embedder });
    await memory.remember("Parking spot is B12");
    hanging = true;
    const session = new AssistantSession(
      { provider, memory, executor: new ToolExecutor() },
      { model: "test-model" },
    );
    sessions.push(session);

    const handle = session.send("Where is my parking spot?");
    await started.wait;
    handle.cancel();
    const outcome = await handle.outcome;

    expect(outcome.state).toBe("CANCELLED");
    expect(outcome.providerCalls).toBe(0);
    expect(provider.probes).toHaveLength(0);
  });

  it("refuses new turns after close", async () => {
    const { session } = open();
    await session.close();
    expect(() => session.send("late")).toThrow("Session is closed");
  });

  // ── Tool calls across turns ────────────────────────────

  it("runs a tool call id that the backend reuses on a later turn", async () => {
    const provider = new FakeProvider([
      toolCall("call_0", "lookup", { q: "weather in Oslo" }),
      content("Cold in Oslo"),
      toolCall("call_0", "lookup", { q: "weather in Lima" }),
      content("Mild in Lima"),
    ]);
    const executor = new ToolExecutor();
    const seen: string[] = [];
    executor.register(
      {
        name: "lookup",
        description: "Look something up",
        parameters: z.object({ q: z.string() }),
        permission: "read",
        alwaysAvailable: true,
      },
      async ({ q }) => {
        seen.push(q);
        return { found: q };
      },
    );
    const session = new AssistantSession(
      { provider, memory: new MemoryManager({ embedder: new HashingEmbedder() }), executor },
      { model: "test-model" },
    );
    sessions.push(session);

    await session.ask("What is the weather in Oslo?");
    await session.ask("And in Lima?");

    expect(seen).toEqual(["weather in Oslo", "weather in Lima"]);
    expect(provider.probes).toHaveLength(4);
    expect(provider.probes[3]?.messages.at(-1)?.content).toBe('{"found":"weather in Lima"}');
  });

  // ── Memory across turns ────────────────────────────────

  it("recalls a remembered preference several turns later", async () => {
    const { session } = open();

    await session.ask("Remember I prefer dark roast coffee");
    for (const text of [
      "What is the capital of France?",
      "Convert 10 miles to kilometres",
      "Suggest a name for a cat",
      "How tall is a giraffe?",
      "Summarize the plot of a heist movie",
      "Give me a haiku about rain",
    ]) {
      await session.ask(text);
    }

    const recalled = await session.memory.getContext("What do I prefer?");

    expect(recalled.user.map((h) => h.record.text)).toEqual(["I prefer dark roast coffee"]);
    expect(recalled.user[0]?.record.tags).toContain("remembered");
    expect(recalled.user[0]?.score).toBeGreaterThan(0.35);
  });
});
