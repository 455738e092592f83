import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { readFile } from "fs/promises";
import { join } from "path";
import { z } from "zod";
import { ToolExecutionError, ValidationError } from "../src/errors.js";
import { AuditLog, summarizeResult } from "../src/tools/audit-log.js";
import { ToolExecutor, toolResultContent, type ToolResult } from "../src/tools/executor.js";
import { RecordingConfirmer, tempDir } from "./helpers/fakes.js";

const noteArgs = z.object({ text: z.string().min(1) });

function withNoteTool(executor: ToolExecutor): string[] {
  const written: string[] = [];
  executor.register(
    {
      name: "save_note",
      description: "Save a note",
      parameters: noteArgs,
      permission: "write",
      preview: ({ text }) => `Save note: "${text}"`,
    },
    async ({ text }) => {
      written.push(text);
      return { saved: text };
    },
  );
  return written;
}

function withEchoTool(executor: ToolExecutor): { runs: number } {
  const counter = { runs: 0 };
  executor.register(
    {
      name: "echo",
      description: "Echo the input",
      parameters: z.object({ value: z.number().int() }),
      permission: "read",
    },
    async ({ value }) => {
      counter.runs++;
      return { value };
    },
  );
  return counter;
}

function errorOf(result: ToolResult): ToolExecutionError | ValidationError {
  if (result.status !== "error") throw new Error(`expected an error, got ${result.status}`);
  return result.error;
}

describe("ToolExecutor", () => {
  // ── Registry ───────────────────────────────────────────

  it("exposes JSON schemas without the dialect marker", () => {
    const executor = new ToolExecutor();
    withEchoTool(executor);

    const [schema] = executor.schemas();
    expect(schema?.function.name).toBe("echo");
    expect(schema?.function.parameters).toMatchObject({
      type: "object",
      properties: { value: { type: "integer" } },
      required: ["value"],
    });
    expect(schema?.function.parameters).not.toHaveProperty("$schema");
  });

  it("refuses a duplicate registration", () => {
    const executor = new ToolExecutor();
    withEchoTool(executor);
    expect(() => withEchoTool(executor)).toThrow('Tool "echo" is already registered');
  });

  // ── Validation ─────────────────────────────────────────

  it("returns a validation error for an unknown tool", async () => {
    const executor = new ToolExecutor();
    const result = await executor.invoke({ id: "c1", name: "missing", arguments: "{}" });

    const error = errorOf(result);
    expect(error).toBeInstanceOf(ValidationError);
    expect(error.message).toBe("Unknown tool: missing");
  });

  it("rejects arguments that are not JSON", async () => {
    const executor = new ToolExecutor();
    const counter = withEchoTool(executor);

    const result = await executor.invoke({ id: "c1", name: "echo", arguments: "{value: 1" });

    expect(errorOf(result).message).toBe('Arguments for "echo" are not valid JSON');
    expect(counter.runs).toBe(0);
  });

  it("rejects arguments that fail the schema, naming the field", async () => {
    const executor = new ToolExecutor();
    const counter = withEchoTool(executor);

    const result = await executor.invoke({ id: "c1", name: "echo", arguments: '{"value":"x"}' });

    const error = errorOf(result);
    expect(error).toBeInstanceOf(ValidationError);
    expect(error instanceof ValidationError && error.issues[0]?.startsWith("value: ")).toBe(true);
    expect(counter.runs).toBe(0);
  });

  it("accepts pre-parsed arguments", async () => {
    const executor = new ToolExecutor();
    withEchoTool(executor);
    const result = await executor.invoke({ id: "c1", name: "echo", arguments: { value: 7 } });
    expect(result).toEqual({ status: "ok", data: { value: 7 } });
  });

  // ── Failures ───────────────────────────────────────────

  it("wraps a handler exception as ToolExecutionError", async () => {
    const executor = new ToolExecutor();
    executor.register(
      { name: "boom", description: "", parameters: z.object({}), permission: "read" },
      async () => {
        throw new Error("disk full");
      },
    );

    const error = errorOf(await executor.invoke({ id: "c1", name: "boom", arguments: "" }));
    expect(error).toBeInstanceOf(ToolExecutionError);
    expect(error.message).toBe('Tool "boom" failed: disk full');
  });

  it("times out a slow handler", async () => {
    const executor = new ToolExecutor({ timeoutMs: 20 });
    executor.register(
      { name: "slow", description: "", parameters: z.object({}), permission: "read" },
      () => new Promise(() => undefined),
    );

    const error = errorOf(await executor.invoke({ id: "c1", name: "slow", arguments: "{}" }));
    expect(error.message).toBe('Tool "slow" failed: Tool "slow" timed out after 0s');
  });

  it("reports a cancelled turn as cancelled", async () => {
    const executor = new ToolExecutor();
    const controller = new AbortController();
    executor.register(
      { name: "wait", description: "", parameters: z.object({}), permission: "read" },
      () => new Promise(() => undefined),
    );

    const pending = executor.invoke({ id: "c1", name: "wait", arguments: "{}" }, controller.signal);
    controller.abort();

    expect(await pending).toEqual({ status: "cancelled", reason: "The turn was cancelled." });
  });

  // ── Idempotency ────────────────────────────────────────

  it("runs a repeated call id only once", async () => {
    const executor = new ToolExecutor();
    const counter = withEchoTool(executor);

    const first = await executor.invoke({ id: "same", name: "echo", arguments: '{"value":1}' });
    const second = await executor.invoke({ id: "same", name: "echo", arguments: '{"value":1}' });

    expect(second).toBe(first);
    expect(counter.runs).toBe(1);
    expect(executor.history()).toHaveLength(1);
  });

  it("runs a reused call id again under another scope", async () => {
    const executor = new ToolExecutor();
    const counter = withEchoTool(executor);

    await executor.invoke({ id: "call_0", name: "echo", arguments: '{"value":1}' }, undefined, "turn-1");
    const second = await executor.invoke(
      { id: "call_0", name: "echo", arguments: '{"value":2}' },
      undefined,
      "turn-2",
    );

    expect(second).toEqual({ status: "ok", data: { value: 2 } });
    expect(counter.runs).toBe(2);
  });

  it("runs a call id again once its scope is released", async () => {
    const executor = new ToolExecutor();
    const counter = withEchoTool(executor);

    await executor.invoke({ id: "c1", name: "echo", arguments: '{"value":1}' }, undefined, "turn-1");
    executor.release("turn-1");
    await executor.invoke({ id: "c1", name: "echo", arguments: '{"value":1}' }, undefined, "turn-1");

    expect(counter.runs).toBe(2);
  });

  it("keeps only the most recent invocations in history", async () => {
    const executor = new ToolExecutor({ historyLimit: 2 });
    withEchoTool(executor);

    for (const value of [1, 2, 3]) {
      await executor.invoke({ id: `c${value}`, name: "echo", arguments: { value } });
    }

    expect(executor.history().map((h) => h.callId)).toEqual(["c2", "c3"]);
  });
});

describe("ToolExecutor write confirmation", () => {
  let dir: { path: string; cleanup: () => Promise<void> };

  beforeEach(async () => {
    dir = await tempDir();
  });

  afterEach(async () => {
    await dir.cleanup();
  });

  it("declines writes when no confirmer is attached", async () => {
    const executor = new ToolExecutor();
    const written = withNoteTool(executor);

    const result = await executor.invoke({ id: "c1", name: "save_note", arguments: '{"text":"hi"}' });

    expect(result).toEqual({ status: "cancelled", reason: "The user declined this action." });
    expect(written).toEqual([]);
  });

  it("has no side effect and no audit record when the user rejects", async () => {
    const audit = new AuditLog(join(dir.path, "audit.jsonl"));
    const confirmer = new RecordingConfirmer("rejected");
    const executor = new ToolExecutor({ confirmer, audit });
    const written = withNoteTool(executor);

    const result = await executor.invoke({ id: "c1", name: "save_note", arguments: '{"text":"hi"}' });

    expect(result.status).toBe("cancelled");
    expect(written).toEqual([]);
    expect(confirmer.requests).toEqual([
      { tool: "save_note", arguments: { text: "hi" }, preview: 'Save note: "hi"' },
    ]);
    expect(audit.list()).toEqual([]);
    await expect(readFile(join(dir.path, "audit.jsonl"), "utf-8")).rejects.toThrow();
  });

  it("audits an accepted write", async () => {
    const path = join(dir.path, "logs", "audit.jsonl");
    const audit = new AuditLog(path);
    const executor = new ToolExecutor({
      confirmer: new RecordingConfirmer("accepted", "alice"),
      audit,
      now: () => Date.UTC(2024, 0, 2, 3, 4, 5),
    });
    const written = withNoteTool(executor);

    const result = await executor.invoke({ id: "c1", name: "save_note", arguments: '{"text":"hi"}' });

    expect(result).toEqual({ status: "ok", data: { saved: "hi" } });
    expect(written).toEqual(["hi"]);
    const lines = (await readFile(path, "utf-8")).trim().split("\n");
    expect(lines).toHaveLength(1);
    const entry: unknown = JSON.parse(lines[0] ?? "");
    expect(entry).toEqual({
      tool: "save_note",
      arguments: { text: "hi" },
      confirmed_by: "alice",
      timestamp: "2024-01-02T03:04:05.000Z",
      result_summary: 'ok: {"saved":"hi"}',
    });
  });

  it("never audits read tools", async () => {
    const audit = new AuditLog();
    const executor = new ToolExecutor({ audit });
    withEchoTool(executor);
    await executor.invoke({ id: "c1", name: "echo", arguments: '{"value":2}' });
    expect(audit.list()).toEqual([]);
  });
});

describe("tool result rendering", () => {
  it("serializes errors with their kind and issues", () => {
    const content = toolResultContent({
      status: "error",
      error: new ValidationError("Invalid arguments for \"echo\"", ["value: expected number"]),
    });
    expect(JSON.parse(content)).toEqual({
      error: 'Invalid arguments for "echo"',
      kind: "validation",
      issues: ["value: expected number"],
    });
  });

  it("clips long audit summaries", () => {
    const summary = summarizeResult({ status: "ok", data: "x".repeat(500) });
    expect(summary).toBe(`ok: ${"x".repeat(196)}…`);
  });
});
