import type { AssistantError } from "../errors.js";
import type { Usage } from "../llm/types.js";
import type { ToolResult } from "../tools/executor.js";
import type { CallKind } from "../usage/tracker.js";

// ── Turn state machine ───────────────────────────────────

export type TurnState =
  | "IDLE"
  | "PROBING"
  | "EXECUTING_TOOLS"
  | "STREAMING"
  | "DONE"
  | "FAILED"
  | "CANCELLED";

export type TerminalState = Extract<TurnState, "DONE" | "FAILED" | "CANCELLED">;

export function isTerminal(state: TurnState): state is TerminalState {
  return state === "DONE" || state === "FAILED" || state === "CANCELLED";
}

export interface TurnOutcome {
  turnId: string;
  state: TerminalState;
  /** The final text response, or the user-facing error text. */
  response: string;
  /** Number of tool calls made during this turn. */
  toolCalls: number;
  /** Tool rounds taken (probe → tools → probe). */
  iterations: number;
  /** Provider calls issued (probes + stream). */
  providerCalls: number;
  /** Tools were dropped after a capability rejection. */
  downgraded: boolean;
  /** Total input tokens used. */
  inputTokens: number;
  /** Total output tokens used. */
  outputTokens: number;
  /** Total latency in milliseconds. */
  latencyMs: number;
  error?: AssistantError;
  /** Worth sending the same message again */
  retryable: boolean;
}

// ── Events published to the caller ───────────────────────

export type TurnEvent =
  | { type: "state"; state: TurnState; toolsEnabled: boolean }
  | { type: "tool_start"; callId: string; tool: string; arguments: string }
  | { type: "tool_result"; callId: string; tool: string; result: ToolResult }
  | { type: "delta"; text: string }
  | { type: "usage"; kind: CallKind; usage: Usage }
  | { type: "done"; outcome: TurnOutcome }
  | { type: "failed"; outcome: TurnOutcome }
  | { type: "cancelled"; outcome: TurnOutcome };

export interface TurnHandle {
  readonly id: string;
  /** Events in order; ends after the terminal event. */
  readonly events: AsyncIterable<TurnEvent>;
  /** Resolves once the turn reaches a terminal state. Never rejects. */
  readonly outcome: Promise<TurnOutcome>;
  cancel(reason?: string): void;
}
