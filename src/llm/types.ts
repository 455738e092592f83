// ── Provider contract ────────────────────────────────────
// The coordinator only ever talks to an LlmProvider; vendor SDK types stay
// inside the adapter.

export type Role = "user" | "assistant" | "system" | "tool";

export interface ToolCallRequest {
  id: string;
  name: string;
  /** Raw JSON string exactly as the model produced it. */
  arguments: string;
}

export interface Message {
  role: Role;
  content: string;
  timestamp: number; // Unix ms
  /** Present on assistant messages that requested tools. */
  toolCalls?: ToolCallRequest[];
  /** Present on tool messages: the call this result answers. */
  toolCallId?: string;
  name?: string;
}

export interface Usage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

/** OpenAI function-calling shape — what the model sees for each tool. */
export interface ToolSchema {
  type: "function";
  function: {
    name: string;
    description: string;
    parameters: Record<string, unknown>;
  };
}

export type ProbeResult =
  | { kind: "content"; content: string; usage?: Usage }
  | {
      kind: "tool_calls";
      toolCalls: ToolCallRequest[];
      content?: string;
      usage?: Usage;
    };

export type StreamChunk =
  | { type: "delta"; text: string }
  | { type: "usage"; usage: Usage };

export interface CallOptions {
  signal?: AbortSignal;
  model?: string;
  maxTokens?: number;
}

export interface LlmProvider {
  readonly name: string;
  /** Non-streaming call whose job is to detect tool intent. */
  probe(
    messages: Message[],
    tools: ToolSchema[] | undefined,
    opts?: CallOptions,
  ): Promise<ProbeResult>;
  /** Streaming call for the final answer. Errors surface from iteration. */
  stream(
    messages: Message[],
    tools: ToolSchema[] | undefined,
    opts?: CallOptions,
  ): AsyncIterable<StreamChunk>;
}

export function makeMessage(
  role: Role,
  content: string,
  extra: Partial<Omit<Message, "role" | "content">> = {},
): Message {
  return { role, content, timestamp: Date.now(), ...extra };
}
