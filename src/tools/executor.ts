import { z } from "zod";
import { ToolExecutionError, ValidationError, errorMessage } from "../errors.js";
import type { ToolSchema } from "../llm/types.js";
import { moduleLogger } from "../logger.js";
import { AbortedError, withDeadline } from "../timeout.js";
import type { AuditLog } from "./audit-log.js";

const log = moduleLogger("tools");

// ── Tool Definition ──────────────────────────────────────

export type Permission = "read" | "write";

export interface ToolDefinition<S extends z.ZodType = z.ZodType> {
  name: string;
  description: string;
  /** Argument schema. Its JSON Schema is what the model sees. */
  parameters: S;
  permission: Permission;
  /** Keywords that make this tool relevant to a message */
  topics?: string[];
  /** Offered on every turn regardless of topic */
  alwaysAvailable?: boolean;
  /** Human-readable summary shown before a WRITE runs */
  preview?: (args: z.infer<S>) => string;
  timeoutMs?: number;
}

export interface ToolContext {
  callId: string;
  signal: AbortSignal;
}

export type ToolHandler<A> = (args: A, ctx: ToolContext) => Promise<unknown>;

// ── Confirmation boundary ────────────────────────────────

export type ConfirmDecision = "accepted" | "rejected";

export interface ConfirmRequest {
  tool: string;
  arguments: unknown;
  preview: string;
}

export interface Confirmer {
  /** Recorded as `confirmed_by` in the audit log */
  readonly id: string;
  confirm(request: ConfirmRequest, signal?: AbortSignal): Promise<ConfirmDecision>;
}

/** Used when no UI is attached: every WRITE is declined. */
export const rejectAll: Confirmer = {
  id: "none",
  confirm: async () => "rejected",
};

// ── Results ──────────────────────────────────────────────

export type ToolResult =
  | { status: "ok"; data: unknown }
  | { status: "error"; error: ToolExecutionError | ValidationError }
  | { status: "cancelled"; reason: string };

export interface ToolCall {
  id: string;
  name: string;
  /** JSON text as the model produced it, or an already-parsed object */
  arguments: string | Record<string, unknown>;
}

export interface ToolInvocation {
  callId: string;
  tool: string;
  arguments: unknown;
  result: ToolResult;
  startedAt: number;
  finishedAt: number;
}

/** Text fed back to the model as the tool message content. */
export function toolResultContent(result: ToolResult): string {
  switch (result.status) {
    case "ok":
      return typeof result.data === "string" ? result.data : JSON.stringify(result.data ?? null);
    case "error":
      return JSON.stringify({
        error: result.error.message,
        kind: result.error.code,
        ...(result.error instanceof ValidationError && result.error.issues.length > 0
          ? { issues: result.error.issues }
          : {}),
      });
    case "cancelled":
      return JSON.stringify({ cancelled: true, reason: result.reason });
  }
}

// ── Tool Executor ────────────────────────────────────────

/** Registry view of a tool, without its schema or preview */
export type ToolInfo = Pick<
  ToolDefinition,
  "name" | "description" | "permission" | "topics" | "alwaysAvailable" | "timeoutMs"
>;

type BoundCall =
  | { ok: true; args: unknown; preview: () => string; run: (ctx: ToolContext) => Promise<unknown> }
  | { ok: false; issues: string[] };

interface RegisteredTool {
  info: ToolInfo;
  schema: ToolSchema;
  /** Validate raw arguments and bind them to the handler */
  bind: (raw: unknown) => BoundCall;
}

export interface ToolExecutorOptions {
  confirmer?: Confirmer;
  audit?: AuditLog;
  /** Default per-call deadline */
  timeoutMs?: number;
  /** Invocations kept for `history()`, oldest dropped first (default 200) */
  historyLimit?: number;
  now?: () => number;
}

export class ToolExecutor {
  private readonly tools = new Map<string, RegisteredTool>();
  /** Call ids seen per scope (one scope per turn) */
  private readonly calls = new Map<string, Map<string, Promise<ToolResult>>>();
  private readonly log: ToolInvocation[] = [];
  private readonly historyLimit: number;
  private readonly confirmer: Confirmer;
  private readonly audit: AuditLog | undefined;
  private readonly timeoutMs: number;
  private readonly now: () => number;

  constructor(opts: ToolExecutorOptions = {}) {
    this.confirmer = opts.confirmer ?? rejectAll;
    this.audit = opts.audit;
    this.timeoutMs = opts.timeoutMs ?? 30_000;
    this.historyLimit = opts.historyLimit ?? 200;
    this.now = opts.now ?? Date.now;
  }

  register<S extends z.ZodType>(
    definition: ToolDefinition<S>,
    handler: ToolHandler<z.infer<S>>,
  ): void {
    if (this.tools.has(definition.name)) {
      throw new Error(`Tool "${definition.name}" is already registered`);
    }
    const { $schema: _dialect, ...parameters } = z.toJSONSchema(definition.parameters);

    const { name, description, permission, topics, alwaysAvailable, timeoutMs } = definition;
    this.tools.set(name, {
      info: { name, description, permission, topics, alwaysAvailable, timeoutMs },
      schema: {
        type: "function",
        function: { name, description, parameters },
      },
      bind: (raw) => {
        const parsed = definition.parameters.safeParse(raw);
        if (!parsed.success) {
          return {
            ok: false,
            issues: parsed.error.issues.map(
              (i) => `${i.path.length > 0 ? i.path.join(".") : "(root)"}: ${i.message}`,
            ),
          };
        }
        const args = parsed.data;
        return {
          ok: true,
          args,
          preview: () =>
            definition.preview ? definition.preview(args) : `${name}(${JSON.stringify(args)})`,
          run: (ctx) => handler(args, ctx),
        };
      },
    });
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  definitions(): ToolInfo[] {
    return [...this.tools.values()].map((t) => t.info);
  }

  /** Schemas in the OpenAI function-calling format, optionally a subset. */
  schemas(names?: readonly string[]): ToolSchema[] {
    const all = [...this.tools.values()];
    const picked = names ? all.filter((t) => names.includes(t.info.name)) : all;
    return picked.map((t) => t.schema);
  }

  history(): readonly ToolInvocation[] {
    return this.log;
  }

  /**
   * Validate, confirm (WRITE) and run one call. Never throws. A call id seen
   * before in the same scope returns the first result without running the
   * handler again; ids do not carry over between scopes.
   */
  invoke(call: ToolCall, signal?: AbortSignal, scope = "default"): Promise<ToolResult> {
    let seen = this.calls.get(scope);
    if (!seen) {
      seen = new Map();
      this.calls.set(scope, seen);
    }
    const existing = seen.get(call.id);
    if (existing) {
      log.debug({ callId: call.id, tool: call.name, scope }, "Repeated tool call id — returning recorded result");
      return existing;
    }
    const pending = this.execute(call, signal);
    seen.set(call.id, pending);
    return pending;
  }

  /** Forget the call ids recorded under a scope once its turn has ended. */
  release(scope: string): void {
    this.calls.delete(scope);
  }

  // ── Internals ──────────────────────────────────────────

  private async execute(call: ToolCall, signal?: AbortSignal): Promise<ToolResult> {
    const startedAt = this.now();
    let args: unknown = call.arguments;
    const finish = (result: ToolResult): ToolResult => {
      this.log.push({
        callId: call.id,
        tool: call.name,
        arguments: args,
        result,
        startedAt,
        finishedAt: this.now(),
      });
      if (this.log.length > this.historyLimit) {
        this.log.splice(0, this.log.length - this.historyLimit);
      }
      return result;
    };

    const tool = this.tools.get(call.name);
    if (!tool) {
      return finish({
        status: "error",
        error: new ValidationError(`Unknown tool: ${call.name}`, [
          `available: ${[...this.tools.keys()].join(", ") || "none"}`,
        ]),
      });
    }

    if (typeof call.arguments === "string") {
      const text = call.arguments.trim();
      try {
        args = text ? JSON.parse(text) : {};
      } catch (err) {
        return finish({
          status: "error",
          error: new ValidationError(`Arguments for "${call.name}" are not valid JSON`, [
            errorMessage(err),
          ]),
        });
      }
    }

    const bound = tool.bind(args);
    if (!bound.ok) {
      log.warn({ tool: call.name, issues: bound.issues }, "⚠️ Tool arguments rejected");
      return finish({
        status: "error",
        error: new ValidationError(`Invalid arguments for "${call.name}"`, bound.issues),
      });
    }
    args = bound.args;

    const { info } = tool;
    let confirmedBy = "auto";
    if (info.permission === "write") {
      const preview = bound.preview();
      let decision: ConfirmDecision;
      try {
        decision = await this.confirmer.confirm(
          { tool: call.name, arguments: args, preview },
          signal,
        );
      } catch (err) {
        log.warn({ tool: call.name, err: errorMessage(err) }, "⚠️ Confirmation failed — treating as rejected");
        decision = "rejected";
      }
      if (decision !== "accepted") {
        log.info({ tool: call.name }, "🚫 Write tool declined by user");
        return finish({ status: "cancelled", reason: "The user declined this action." });
      }
      confirmedBy = this.confirmer.id;
    }

    const timeoutMs = info.timeoutMs ?? this.timeoutMs;
    let result: ToolResult;
    try {
      log.debug({ tool: call.name, callId: call.id }, "🔧 Running tool");
      const data = await withDeadline(
        (child) => bound.run({ callId: call.id, signal: child }),
        timeoutMs,
        { label: `Tool "${call.name}"`, signal },
      );
      result = { status: "ok", data };
    } catch (err) {
      if (err instanceof AbortedError) {
        result = { status: "cancelled", reason: "The turn was cancelled." };
      } else {
        const message = errorMessage(err);
        log.error({ tool: call.name, error: message }, "❌ Tool execution failed");
        result = {
          status: "error",
          error: new ToolExecutionError(call.name, `Tool "${call.name}" failed: ${message}`, err),
        };
      }
    }

    if (info.permission === "write" && this.audit) {
      await this.audit.record({
        tool: call.name,
        arguments: args,
        confirmedBy,
        timestamp: this.now(),
        result,
      });
    }
    return finish(result);
  }
}
