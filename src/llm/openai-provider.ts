import OpenAI from "openai";
import type {
  ChatCompletion,
  ChatCompletionChunk,
  ChatCompletionCreateParamsNonStreaming,
  ChatCompletionCreateParamsStreaming,
  ChatCompletionMessageParam,
  ChatCompletionTool,
} from "openai/resources/chat/completions.js";
import type { AssistantConfig } from "../config.js";
import { classifyProviderError, errorMessage, ProviderError } from "../errors.js";
import { moduleLogger } from "../logger.js";
import { withRetry } from "./retry.js";
import type {
  CallOptions,
  LlmProvider,
  Message,
  ProbeResult,
  StreamChunk,
  ToolSchema,
  Usage,
} from "./types.js";

const log = moduleLogger("provider");

// OpenRouter (and most local gateways) speak the OpenAI-compatible API
export function createOpenAIClient(
  config: Pick<AssistantConfig, "apiKey" | "baseUrl">,
): OpenAI {
  return new OpenAI({
    baseURL: config.baseUrl,
    apiKey: config.apiKey,
    // Retries are ours (withRetry) so the budget is visible in one place
    maxRetries: 0,
    defaultHeaders: {
      "X-Title": "Assistant Core",
    },
  });
}

/** The part of the OpenAI client the provider calls. */
export interface ChatCompletionsClient {
  chat: {
    completions: {
      create(
        body: ChatCompletionCreateParamsNonStreaming,
        options?: { signal?: AbortSignal },
      ): Promise<ChatCompletion>;
      create(
        body: ChatCompletionCreateParamsStreaming,
        options?: { signal?: AbortSignal },
      ): Promise<AsyncIterable<ChatCompletionChunk>>;
    };
  };
}

export interface OpenAIProviderOptions {
  model: string;
  temperature?: number;
  maxTokens?: number;
  maxRetries?: number;
}

export class OpenAIChatProvider implements LlmProvider {
  readonly name = "openai-compatible";

  constructor(
    private readonly client: ChatCompletionsClient,
    private readonly opts: OpenAIProviderOptions,
  ) {}

  async probe(
    messages: Message[],
    tools: ToolSchema[] | undefined,
    callOpts: CallOptions = {},
  ): Promise<ProbeResult> {
    const model = callOpts.model ?? this.opts.model;
    const response = await withRetry(
      () =>
        this.client.chat.completions.create(
          {
            model,
            max_tokens: callOpts.maxTokens ?? this.opts.maxTokens ?? 4096,
            temperature: this.opts.temperature,
            messages: toOpenAIMessages(messages),
            ...(tools && tools.length > 0 ? { tools: toOpenAITools(tools) } : {}),
          },
          { signal: callOpts.signal },
        ),
      {
        label: `probe (${model})`,
        maxRetries: this.opts.maxRetries,
        signal: callOpts.signal,
      },
    );

    const usage = toUsage(response.usage);
    const choice = response.choices[0];
    if (!choice) {
      throw new ProviderError("Provider returned no choices");
    }

    const message = choice.message;
    if (message.tool_calls && message.tool_calls.length > 0) {
      return {
        kind: "tool_calls",
        toolCalls: message.tool_calls.map((tc) => ({
          id: tc.id,
          name: tc.function.name,
          arguments: tc.function.arguments || "{}",
        })),
        content: message.content ?? undefined,
        usage,
      };
    }
    return { kind: "content", content: message.content ?? "", usage };
  }

  async *stream(
    messages: Message[],
    tools: ToolSchema[] | undefined,
    callOpts: CallOptions = {},
  ): AsyncIterable<StreamChunk> {
    const model = callOpts.model ?? this.opts.model;
    const stream = await withRetry(
      () =>
        this.client.chat.completions.create(
          {
            model,
            max_tokens: callOpts.maxTokens ?? this.opts.maxTokens ?? 4096,
            temperature: this.opts.temperature,
            messages: toOpenAIMessages(messages),
            ...(tools && tools.length > 0 ? { tools: toOpenAITools(tools) } : {}),
            stream: true,
            stream_options: { include_usage: true },
          },
          { signal: callOpts.signal },
        ),
      {
        label: `stream (${model})`,
        maxRetries: this.opts.maxRetries,
        signal: callOpts.signal,
      },
    );

    try {
      for await (const chunk of stream) {
        const text = chunk.choices[0]?.delta?.content;
        if (text) yield { type: "delta", text };
        const usage = toUsage(chunk.usage);
        if (usage) yield { type: "usage", usage };
      }
    } catch (error) {
      // Mid-stream failures are never retried: part of the answer is out
      log.warn({ err: errorMessage(error) }, "⚠️ Stream interrupted");
      throw classifyProviderError(error);
    }
  }
}

// ── Conversions ──────────────────────────────────────────

export function toOpenAIMessages(
  messages: Message[],
): ChatCompletionMessageParam[] {
  return messages.map((m): ChatCompletionMessageParam => {
    switch (m.role) {
      case "system":
        return { role: "system", content: m.content };
      case "user":
        return { role: "user", content: m.content };
      case "tool":
        return {
          role: "tool",
          tool_call_id: m.toolCallId ?? "",
          content: m.content,
        };
      case "assistant":
        if (m.toolCalls && m.toolCalls.length > 0) {
          return {
            role: "assistant",
            content: m.content || null,
            tool_calls: m.toolCalls.map((tc) => ({
              id: tc.id,
              type: "function" as const,
              function: { name: tc.name, arguments: tc.arguments },
            })),
          };
        }
        return { role: "assistant", content: m.content };
    }
  });
}

function toOpenAITools(tools: ToolSchema[]): ChatCompletionTool[] {
  return tools.map((t) => ({
    type: "function" as const,
    function: {
      name: t.function.name,
      description: t.function.description,
      parameters: t.function.parameters,
    },
  }));
}

function toUsage(
  usage:
    | { prompt_tokens?: number; completion_tokens?: number; total_tokens?: number }
    | null
    | undefined,
): Usage | undefined {
  if (!usage) return undefined;
  const promptTokens = usage.prompt_tokens ?? 0;
  const completionTokens = usage.completion_tokens ?? 0;
  return {
    promptTokens,
    completionTokens,
    totalTokens: usage.total_tokens ?? promptTokens + completionTokens,
  };
}
