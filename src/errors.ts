// ── Error Taxonomy ───────────────────────────────────────
// Every component boundary converts raw exceptions into one of these.

export type ErrorCode =
  | "transient_provider"
  | "unsupported_capability"
  | "provider"
  | "tool_execution"
  | "validation"
  | "index_unavailable"
  | "loop_bound_exceeded"
  | "session_busy";

export class AssistantError extends Error {
  readonly code: ErrorCode;
  readonly retryable: boolean;

  constructor(
    code: ErrorCode,
    message: string,
    opts: { retryable?: boolean; cause?: unknown } = {},
  ) {
    super(message, { cause: opts.cause });
    this.name = new.target.name;
    this.code = code;
    this.retryable = opts.retryable ?? false;
  }
}

/** Timeout, rate limit, 5xx or a dropped connection. */
export class TransientProviderError extends AssistantError {
  readonly status: number | undefined;

  constructor(message: string, status?: number, cause?: unknown) {
    super("transient_provider", message, { retryable: true, cause });
    this.status = status;
  }
}

/** The provider refused a request because it carried tool schemas. */
export class UnsupportedCapabilityError extends AssistantError {
  constructor(message: string, cause?: unknown) {
    super("unsupported_capability", message, { cause });
  }
}

/** Any other provider failure (auth, bad request, malformed response). */
export class ProviderError extends AssistantError {
  readonly status: number | undefined;

  constructor(message: string, status?: number, cause?: unknown) {
    super("provider", message, { cause });
    this.status = status;
  }
}

export class ToolExecutionError extends AssistantError {
  readonly tool: string;

  constructor(tool: string, message: string, cause?: unknown) {
    super("tool_execution", message, { cause });
    this.tool = tool;
  }
}

export class ValidationError extends AssistantError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super("validation", message);
    this.issues = issues;
  }
}

export class IndexUnavailableError extends AssistantError {
  constructor(message: string, cause?: unknown) {
    super("index_unavailable", message, { cause });
  }
}

export class LoopBoundExceededError extends AssistantError {
  readonly rounds: number;

  constructor(rounds: number) {
    super(
      "loop_bound_exceeded",
      `Too many tool rounds (${rounds}). Stopped before the model could loop forever.`,
    );
    this.rounds = rounds;
  }
}

export class SessionBusyError extends AssistantError {
  constructor(queued: number) {
    super(
      "session_busy",
      `A turn is already running and ${queued} message(s) are waiting. Try again when it finishes.`,
    );
  }
}

// ── Result ───────────────────────────────────────────────

export type Result<T, E = AssistantError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

// ── Provider error classification ────────────────────────

const TRANSIENT_STATUSES = new Set([408, 409, 429, 500, 502, 503, 504]);
const CAPABILITY_RE =
  /does not support tools|tool use|tool[_ ]?choice|function[_ ]?call|\btools?\b.*not supported|no endpoints found that support/i;

export function getStatusCode(error: unknown): number | undefined {
  if (typeof error !== "object" || error === null) return undefined;
  // OpenAI SDK errors carry `status`; some HTTP clients use `statusCode`
  if ("status" in error && typeof error.status === "number") {
    return error.status;
  }
  if ("statusCode" in error && typeof error.statusCode === "number") {
    return error.statusCode;
  }
  return undefined;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Map whatever the provider SDK threw onto the taxonomy above. */
export function classifyProviderError(error: unknown): AssistantError {
  if (error instanceof AssistantError) return error;

  const status = getStatusCode(error);
  const msg = errorMessage(error);

  if (status !== undefined && TRANSIENT_STATUSES.has(status)) {
    return new TransientProviderError(msg, status, error);
  }
  if (
    error instanceof TypeError ||
    /ECONNRESET|ETIMEDOUT|ECONNREFUSED|EAI_AGAIN|socket hang up|timed out|connection error/i.test(
      msg,
    )
  ) {
    return new TransientProviderError(msg, status, error);
  }
  if (
    (status === undefined || status === 400 || status === 404 || status === 422) &&
    CAPABILITY_RE.test(msg)
  ) {
    return new UnsupportedCapabilityError(msg, error);
  }
  return new ProviderError(msg, status, error);
}

// ── User-facing messages ─────────────────────────────────

export function toUserMessage(error: unknown): string {
  if (error instanceof LoopBoundExceededError) {
    return `⚠️ Too many tool rounds (${error.rounds}). I stopped to avoid looping — try asking more specifically.`;
  }
  if (error instanceof SessionBusyError) {
    return `⏳ ${error.message}`;
  }

  const status = getStatusCode(error);
  if (status === 429) {
    return "⚠️ Rate limit hit — too many requests. Try again in a minute.";
  }
  if (status === 503 || status === 502) {
    return "⚠️ The AI service is temporarily down. Give it a minute and try again.";
  }
  if (status === 401) {
    return "🔑 Authentication failed. The API key may be invalid or expired.";
  }

  const msg = errorMessage(error);
  if (msg.includes("ECONNRESET") || msg.includes("ETIMEDOUT")) {
    return "⚠️ Network connection failed. Check your internet and try again.";
  }
  if (msg.includes("timed out")) {
    return "⚠️ Request timed out. The operation took too long — try again.";
  }

  return `⚠️ Something went wrong: ${msg.slice(0, 150)}`;
}
