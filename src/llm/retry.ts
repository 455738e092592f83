// ── Retry with Exponential Backoff ───────────────────────────────────

import { classifyProviderError, getStatusCode } from "../errors.js";
import { AbortedError } from "../timeout.js";
import { log } from "../logger.js";

export interface RetryOptions {
  /** Max number of retry attempts (default: 2) */
  maxRetries?: number;
  /** Base delay in ms (default: 1000) — doubles each retry */
  baseDelayMs?: number;
  /** Label for logging (e.g. "probe") */
  label?: string;
  /** Stops waiting between attempts as soon as the turn is cancelled */
  signal?: AbortSignal;
}

const DEFAULT_OPTIONS = {
  maxRetries: 2,
  baseDelayMs: 1000,
  label: "API call",
};

/**
 * Wraps an async provider call with exponential backoff.
 * Only errors classified as transient are retried; everything else, including
 * capability rejections, is rethrown on the first failure in its classified
 * form so the caller never sees a raw SDK error.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  opts: RetryOptions = {},
): Promise<T> {
  const maxRetries = opts.maxRetries ?? DEFAULT_OPTIONS.maxRetries;
  const baseDelayMs = opts.baseDelayMs ?? DEFAULT_OPTIONS.baseDelayMs;
  const label = opts.label ?? DEFAULT_OPTIONS.label;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error: unknown) {
      if (error instanceof AbortedError || opts.signal?.aborted) throw error;

      const classified = classifyProviderError(error);
      if (!classified.retryable || attempt >= maxRetries) {
        throw classified;
      }

      const delayMs = baseDelayMs * Math.pow(2, attempt);
      log.warn(
        {
          label,
          status: getStatusCode(error),
          delayMs,
          attempt: attempt + 1,
          maxRetries,
        },
        "⚠️ Retrying API call",
      );
      await sleep(delayMs, opts.signal);
    }
  }
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    const onAbort = () => {
      clearTimeout(timer);
      reject(new AbortedError("retry backoff"));
    };
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
