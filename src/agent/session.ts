import { randomUUID } from "crypto";
import type { ScheduledTask } from "node-cron";
import PQueue from "p-queue";
import { PromptCache } from "../cache/prompt-cache.js";
import { ContextAssembler } from "../context/assembler.js";
import { TokenEstimator } from "../context/token-estimator.js";
import { SessionBusyError, classifyProviderError, toUserMessage } from "../errors.js";
import { DEFAULT_IDENTITY } from "../llm/prompts.js";
import type { LlmProvider } from "../llm/types.js";
import { moduleLogger } from "../logger.js";
import { startMaintenance } from "../memory/maintenance.js";
import type { MemoryManager } from "../memory/manager.js";
import type { ToolExecutor } from "../tools/executor.js";
import { AbortedError } from "../timeout.js";
import { UsageTracker } from "../usage/tracker.js";
import { TurnChannel } from "./channel.js";
import { OrchestrationCoordinator, type CoordinatorOptions } from "./coordinator.js";
import type { TurnEvent, TurnHandle, TurnOutcome } from "./types.js";

const log = moduleLogger("session");

// ── Assistant Session — one conversation, one turn at a time ──

export interface SessionDeps {
  provider: LlmProvider;
  memory: MemoryManager;
  executor: ToolExecutor;
  cache?: PromptCache;
  estimator?: TokenEstimator;
  tracker?: UsageTracker;
}

export interface SessionOptions extends CoordinatorOptions {
  identity?: string;
  instructions?: string;
  contextTokenBudget?: number;
  /** Messages allowed to wait behind the active turn */
  maxQueuedTurns?: number;
  /** node-cron expression for index maintenance; omit to disable */
  maintenanceCron?: string;
  now?: () => number;
}

interface PendingTurn {
  id: string;
  text: string;
  channel: TurnChannel<TurnEvent>;
  controller: AbortController;
}

export class AssistantSession {
  readonly cache: PromptCache;
  readonly tracker: UsageTracker;
  readonly assembler: ContextAssembler;

  private readonly turns = new PQueue({ concurrency: 1 });
  private readonly maxQueued: number;
  private readonly maintenance: ScheduledTask | undefined;
  private inFlight = 0;
  private closed = false;

  constructor(
    private readonly deps: SessionDeps,
    private readonly opts: SessionOptions,
  ) {
    this.cache = deps.cache ?? new PromptCache();
    this.tracker = deps.tracker ?? new UsageTracker();
    this.maxQueued = opts.maxQueuedTurns ?? 3;
    this.assembler = new ContextAssembler({
      cache: this.cache,
      estimator: deps.estimator ?? new TokenEstimator(),
      executor: deps.executor,
      identity: opts.identity ?? DEFAULT_IDENTITY,
      instructions: opts.instructions,
      budget: opts.contextTokenBudget,
      now: opts.now,
    });
    this.maintenance = opts.maintenanceCron
      ? startMaintenance(deps.memory, opts.maintenanceCron)
      : undefined;
  }

  get memory(): MemoryManager {
    return this.deps.memory;
  }

  /** Turns accepted and not yet finished, the active one included. */
  get pending(): number {
    return this.inFlight;
  }

  /**
   * Start a turn, or queue it behind the active one. Throws
   * SessionBusyError when the queue is already full.
   */
  send(text: string): TurnHandle {
    if (this.closed) {
      throw new Error("Session is closed");
    }
    if (this.inFlight > this.maxQueued) {
      const waiting = this.inFlight - 1;
      log.warn({ waiting }, "⏳ Turn rejected — session queue full");
      throw new SessionBusyError(waiting);
    }

    const turn: PendingTurn = {
      id: randomUUID(),
      text,
      channel: new TurnChannel<TurnEvent>(),
      controller: new AbortController(),
    };
    if (this.inFlight > 0) {
      log.debug({ turnId: turn.id, position: this.inFlight }, "Turn queued");
    }
    this.inFlight++;

    const outcome = this.turns
      .add(() => this.runTurn(turn), { throwOnTimeout: true })
      .finally(() => {
        this.inFlight--;
      });

    return {
      id: turn.id,
      events: turn.channel,
      outcome,
      cancel: (reason?: string) => {
        if (turn.controller.signal.aborted) return;
        log.debug({ turnId: turn.id, reason }, "Cancel requested");
        turn.controller.abort();
      },
    };
  }

  /** Convenience: run a turn and wait for its outcome. */
  ask(text: string): Promise<TurnOutcome> {
    return this.send(text).outcome;
  }

  /** Stop maintenance, wait for queued turns and background work, flush memory. */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.maintenance?.stop();
    await this.turns.onIdle();
    await this.deps.memory.close();
    log.info("👋 Session closed");
  }

  // ── Turn ───────────────────────────────────────────────

  private async runTurn(turn: PendingTurn): Promise<TurnOutcome> {
    const startTime = Date.now();
    if (turn.controller.signal.aborted) {
      return this.settle(turn, "CANCELLED", startTime);
    }

    try {
      const { memory, provider, executor } = this.deps;
      const recalled = await memory.getContext(turn.text, { signal: turn.controller.signal });
      if (turn.controller.signal.aborted) {
        return this.settle(turn, "CANCELLED", startTime);
      }
      const context = this.assembler.build(recalled.recentTurns, turn.text, recalled);
      log.debug(
        {
          turnId: turn.id,
          tokens: context.estimatedTokens,
          tools: context.tools.length,
          topic: context.topic,
          cached: context.cachedSections,
        },
        "Context assembled",
      );

      const coordinator = new OrchestrationCoordinator(
        {
          provider,
          executor,
          memory,
          tracker: this.tracker,
          calibrate: (estimated, actual) => this.assembler.calibrate(estimated, actual),
        },
        this.opts,
        {
          turnId: turn.id,
          userMessage: turn.text,
          context,
          events: turn.channel,
          signal: turn.controller.signal,
        },
      );
      return await coordinator.run();
    } catch (err) {
      if (err instanceof AbortedError || turn.controller.signal.aborted) {
        return this.settle(turn, "CANCELLED", startTime);
      }
      log.error({ turnId: turn.id, err: toUserMessage(err) }, "❌ Turn could not start");
      return this.settle(turn, "FAILED", startTime, err);
    }
  }

  /** Terminal outcome for a turn that never reached the coordinator. */
  private settle(
    turn: PendingTurn,
    state: "FAILED" | "CANCELLED",
    startTime: number,
    cause?: unknown,
  ): TurnOutcome {
    const error = state === "FAILED" ? classifyProviderError(cause) : undefined;
    const outcome: TurnOutcome = {
      turnId: turn.id,
      state,
      response: error ? toUserMessage(error) : "",
      toolCalls: 0,
      iterations: 0,
      providerCalls: 0,
      downgraded: false,
      inputTokens: 0,
      outputTokens: 0,
      latencyMs: Date.now() - startTime,
      error,
      retryable: error?.retryable ?? false,
    };
    turn.channel.push({ type: state === "FAILED" ? "failed" : "cancelled", outcome });
    turn.channel.close();
    return outcome;
  }
}
