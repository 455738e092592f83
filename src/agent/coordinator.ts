import type { AssembledContext } from "../context/assembler.js";
import {
  AssistantError,
  LoopBoundExceededError,
  TransientProviderError,
  UnsupportedCapabilityError,
  classifyProviderError,
  errorMessage,
  toUserMessage,
} from "../errors.js";
import {
  makeMessage,
  type LlmProvider,
  type Message,
  type ProbeResult,
  type ToolSchema,
  type Usage,
} from "../llm/types.js";
import { moduleLogger } from "../logger.js";
import { AbortedError, TimeoutError, withDeadline } from "../timeout.js";
import { toolResultContent, type ToolExecutor } from "../tools/executor.js";
import type { CallKind, UsageTracker } from "../usage/tracker.js";
import { TurnChannel } from "./channel.js";
import type { TerminalState, TurnEvent, TurnOutcome, TurnState } from "./types.js";

const log = moduleLogger("coordinator");

// ── Orchestration Coordinator — one instance per turn ───
// IDLE → PROBING → (EXECUTING_TOOLS → PROBING)* → STREAMING → DONE,
// with FAILED and CANCELLED reachable from any non-terminal state.

/** Commits a completed exchange. Only called on DONE. */
export interface ExchangeWriter {
  saveExchange(userMessage: string, assistantMessage: string): Promise<void>;
}

export interface CoordinatorDeps {
  provider: LlmProvider;
  executor: ToolExecutor;
  memory: ExchangeWriter;
  tracker: UsageTracker;
  /** Receives (estimated, actual) prompt tokens of the first probe */
  calibrate?: (estimatedTokens: number, actualTokens: number) => void;
}

export interface CoordinatorOptions {
  model: string;
  maxToolRounds?: number;
  /** Deadline for a probe, and the longest gap between two stream chunks */
  providerTimeoutMs?: number;
  maxTokens?: number;
  /**
   * "provider": the answer comes from a streaming call.
   * "replay": the probe's content is re-emitted in chunks, saving one call.
   */
  finalAnswer?: "provider" | "replay";
}

export interface TurnInput {
  turnId: string;
  userMessage: string;
  context: AssembledContext;
  /** Channel the caller already holds; a fresh one otherwise */
  events?: TurnChannel<TurnEvent>;
  /** Caller-side cancellation */
  signal?: AbortSignal;
}

const EMPTY_ANSWER = "I couldn't find a clear answer. Please try rephrasing your question.";
const REPLAY_CHUNK_CHARS = 16;

export class OrchestrationCoordinator {
  readonly turnId: string;
  readonly events: TurnChannel<TurnEvent>;

  private state: TurnState = "IDLE";
  private toolsEnabled: boolean;
  private downgraded = false;
  private readonly controller = new AbortController();
  private readonly messages: Message[];
  private readonly tools: ToolSchema[];
  private readonly maxToolRounds: number;
  private readonly timeoutMs: number;
  private started: Promise<TurnOutcome> | undefined;

  private rounds = 0;
  private toolCalls = 0;
  private providerCalls = 0;
  private inputTokens = 0;
  private outputTokens = 0;
  private response = "";

  constructor(
    private readonly deps: CoordinatorDeps,
    private readonly opts: CoordinatorOptions,
    private readonly input: TurnInput,
  ) {
    this.turnId = input.turnId;
    this.events = input.events ?? new TurnChannel<TurnEvent>();
    this.messages = [...input.context.messages];
    this.tools = input.context.tools;
    this.toolsEnabled = this.tools.length > 0;
    this.maxToolRounds = opts.maxToolRounds ?? 5;
    this.timeoutMs = opts.providerTimeoutMs ?? 60_000;
  }

  get currentState(): TurnState {
    return this.state;
  }

  /** Abort open calls. No-op once the turn is terminal. */
  cancel(reason = "cancelled by caller"): void {
    if (this.controller.signal.aborted || this.isFinished()) return;
    log.info({ turnId: this.turnId, reason }, "🛑 Turn cancel requested");
    this.controller.abort();
  }

  /** Drive the turn to a terminal state. Never rejects; idempotent. */
  run(): Promise<TurnOutcome> {
    this.started ??= this.drive();
    return this.started;
  }

  // ── Main loop ──────────────────────────────────────────

  private async drive(): Promise<TurnOutcome> {
    const startTime = Date.now();
    const external = this.input.signal;
    const onExternalAbort = (): void => this.cancel("caller signal aborted");
    if (external?.aborted) this.controller.abort();
    external?.addEventListener("abort", onExternalAbort, { once: true });
    try {
      return await this.runStates(startTime);
    } finally {
      external?.removeEventListener("abort", onExternalAbort);
      this.deps.executor.release(this.turnId);
    }
  }

  private async runStates(startTime: number): Promise<TurnOutcome> {
    try {
      this.ensureActive();
      this.transition("PROBING");
      const content = await this.probeLoop();

      this.transition("STREAMING");
      this.response = await this.produceAnswer(content);
      this.ensureActive();

      this.transition("DONE");
      try {
        await this.deps.memory.saveExchange(this.input.userMessage, this.response);
      } catch (err) {
        log.warn({ err: errorMessage(err) }, "⚠️ Memory write failed — answer delivered without it");
      }
      return this.finish("DONE", startTime);
    } catch (raw) {
      if (raw instanceof AbortedError || this.controller.signal.aborted) {
        this.transition("CANCELLED");
        return this.finish("CANCELLED", startTime);
      }
      const error = toTaxonomy(raw);
      log.error(
        { turnId: this.turnId, code: error.code, retryable: error.retryable },
        `❌ Turn failed: ${error.message}`,
      );
      this.transition("FAILED");
      return this.finish("FAILED", startTime, error);
    }
  }

  /** Probe until the model answers in plain content. Returns that content. */
  private async probeLoop(): Promise<string> {
    for (;;) {
      const result = await this.probe();

      if (result.kind === "content" || !this.toolsEnabled) {
        return result.content ?? "";
      }

      if (this.rounds >= this.maxToolRounds) {
        throw new LoopBoundExceededError(this.rounds);
      }
      this.rounds++;

      this.transition("EXECUTING_TOOLS");
      this.messages.push(
        makeMessage("assistant", result.content ?? "", { toolCalls: result.toolCalls }),
      );

      for (const call of result.toolCalls) {
        this.ensureActive();
        this.toolCalls++;
        log.info({ tool: call.name, callId: call.id }, "  🔧 Tool call");
        this.emit({ type: "tool_start", callId: call.id, tool: call.name, arguments: call.arguments });

        const toolResult = await this.deps.executor.invoke(
          call,
          this.controller.signal,
          this.turnId,
        );
        this.emit({ type: "tool_result", callId: call.id, tool: call.name, result: toolResult });
        this.messages.push(
          makeMessage("tool", toolResultContent(toolResult), {
            toolCallId: call.id,
            name: call.name,
          }),
        );
      }

      this.ensureActive();
      this.transition("PROBING");
    }
  }

  /**
   * One probing call. A capability rejection while tools are on switches
   * the turn to tool-free probing exactly once.
   */
  private async probe(): Promise<ProbeResult> {
    for (;;) {
      const tools = this.toolsEnabled ? this.tools : undefined;
      const snapshot = [...this.messages];
      const started = Date.now();
      try {
        this.providerCalls++;
        const result = await withDeadline(
          (signal) =>
            this.deps.provider.probe(snapshot, tools, {
              signal,
              model: this.opts.model,
              maxTokens: this.opts.maxTokens,
            }),
          this.timeoutMs,
          { label: "Probe call", signal: this.controller.signal },
        );
        this.account("probe", snapshot, tools !== undefined, result.usage, started);
        if (this.providerCalls === 1 && result.usage) {
          this.deps.calibrate?.(this.input.context.estimatedTokens, result.usage.promptTokens);
        }
        return result;
      } catch (raw) {
        this.account("probe", snapshot, tools !== undefined, undefined, started);
        const error = raw instanceof AbortedError ? raw : toTaxonomy(raw);
        if (error instanceof UnsupportedCapabilityError && this.downgrade()) continue;
        throw error;
      }
    }
  }

  private async produceAnswer(probeContent: string): Promise<string> {
    if (this.opts.finalAnswer === "replay") return this.replay(probeContent);

    for (;;) {
      let streamed: string;
      try {
        streamed = (await this.stream()).trim();
      } catch (raw) {
        const error = raw instanceof AbortedError ? raw : toTaxonomy(raw);
        // Nothing was streamed yet, so a tool-free retry cannot duplicate output
        if (error instanceof UnsupportedCapabilityError && this.downgrade()) continue;
        throw error;
      }
      if (streamed) return streamed;
      if (!probeContent.trim()) return EMPTY_ANSWER;
      log.warn({ turnId: this.turnId }, "⚠️ Stream carried no text — replaying the probe answer");
      return this.replay(probeContent);
    }
  }

  /** Re-emit already generated text as delta events. */
  private replay(text: string): string {
    for (let i = 0; i < text.length; i += REPLAY_CHUNK_CHARS) {
      this.ensureActive();
      this.emit({ type: "delta", text: text.slice(i, i + REPLAY_CHUNK_CHARS) });
    }
    return text.trim() || EMPTY_ANSWER;
  }

  /** Streaming call with an idle deadline between chunks. */
  private async stream(): Promise<string> {
    const tools = this.toolsEnabled ? this.tools : undefined;
    const snapshot = [...this.messages];
    const started = Date.now();
    const streamAbort = new AbortController();
    const onTurnAbort = (): void => streamAbort.abort();
    this.controller.signal.addEventListener("abort", onTurnAbort, { once: true });

    let text = "";
    let usage: Usage | undefined;
    this.providerCalls++;
    try {
      const iterator = this.deps.provider
        .stream(snapshot, tools, {
          signal: streamAbort.signal,
          model: this.opts.model,
          maxTokens: this.opts.maxTokens,
        })
        [Symbol.asyncIterator]();

      for (;;) {
        const next = await withDeadline(() => iterator.next(), this.timeoutMs, {
          label: "Stream",
          signal: this.controller.signal,
        });
        if (next.done) break;
        const chunk = next.value;
        if (chunk.type === "delta") {
          text += chunk.text;
          this.emit({ type: "delta", text: chunk.text });
        } else {
          usage = chunk.usage;
        }
      }
      return text;
    } catch (err) {
      streamAbort.abort();
      throw err;
    } finally {
      this.controller.signal.removeEventListener("abort", onTurnAbort);
      this.account("stream", snapshot, tools !== undefined, usage, started);
    }
  }

  // ── Helpers ────────────────────────────────────────────

  /** Single-fire PROBING_WITH_TOOLS → PROBING_NO_TOOLS. */
  private downgrade(): boolean {
    if (this.downgraded || !this.toolsEnabled) return false;
    this.downgraded = true;
    this.toolsEnabled = false;
    log.warn({ turnId: this.turnId }, "  ⚠️ Provider rejected tools — continuing this turn without them");
    this.emit({ type: "state", state: this.state, toolsEnabled: false });
    return true;
  }

  private account(
    kind: CallKind,
    messages: readonly Message[],
    hasTools: boolean,
    usage: Usage | undefined,
    started: number,
  ): void {
    this.deps.tracker.record({
      turnId: this.turnId,
      kind,
      model: this.opts.model,
      messages,
      hasTools,
      usage,
      latencyMs: Date.now() - started,
    });
    if (usage) {
      this.inputTokens += usage.promptTokens;
      this.outputTokens += usage.completionTokens;
      this.emit({ type: "usage", kind, usage });
    }
  }

  private ensureActive(): void {
    if (this.controller.signal.aborted) throw new AbortedError(`Turn ${this.turnId}`);
  }

  private isFinished(): boolean {
    return this.state === "DONE" || this.state === "FAILED" || this.state === "CANCELLED";
  }

  private transition(next: TurnState): void {
    if (this.isFinished()) return;
    log.debug({ turnId: this.turnId, from: this.state, to: next }, "Turn state");
    this.state = next;
    this.emit({ type: "state", state: next, toolsEnabled: this.toolsEnabled });
  }

  private emit(event: TurnEvent): void {
    this.events.push(event);
  }

  private finish(state: TerminalState, startTime: number, error?: AssistantError): TurnOutcome {
    const outcome: TurnOutcome = {
      turnId: this.turnId,
      state,
      response:
        state === "DONE" ? this.response : state === "CANCELLED" ? "" : toUserMessage(error),
      toolCalls: this.toolCalls,
      iterations: this.rounds,
      providerCalls: this.providerCalls,
      downgraded: this.downgraded,
      inputTokens: this.inputTokens,
      outputTokens: this.outputTokens,
      latencyMs: Date.now() - startTime,
      error,
      retryable: error?.retryable ?? false,
    };

    const type = state === "DONE" ? "done" : state === "FAILED" ? "failed" : "cancelled";
    this.emit({ type, outcome });
    this.events.close();
    return outcome;
  }
}

/** Any thrown value → the error taxonomy. Deadlines are transient. */
function toTaxonomy(raw: unknown): AssistantError {
  if (raw instanceof TimeoutError) {
    return new TransientProviderError(raw.message, undefined, raw);
  }
  return classifyProviderError(raw);
}
