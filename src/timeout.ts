// ── Deadlines for a single network call or tool run ─────

export class TimeoutError extends Error {
  constructor(label: string, ms: number) {
    super(`${label} timed out after ${Math.round(ms / 100) / 10}s`);
    this.name = "TimeoutError";
  }
}

export class AbortedError extends Error {
  constructor(label: string) {
    super(`${label} was cancelled`);
    this.name = "AbortedError";
  }
}

export interface DeadlineOptions {
  label: string;
  /** Parent signal — aborting it aborts the call immediately. */
  signal?: AbortSignal;
}

/**
 * Run `fn` with its own AbortSignal that fires after `ms` or when the
 * parent signal aborts, whichever comes first. The returned promise settles
 * at that moment even if `fn` ignores its signal.
 */
export async function withDeadline<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  ms: number,
  opts: DeadlineOptions,
): Promise<T> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;
  let onParentAbort: (() => void) | undefined;

  if (opts.signal?.aborted) {
    throw new AbortedError(opts.label);
  }

  const guard = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new TimeoutError(opts.label, ms));
    }, ms);
    if (opts.signal) {
      onParentAbort = () => {
        controller.abort();
        reject(new AbortedError(opts.label));
      };
      opts.signal.addEventListener("abort", onParentAbort, { once: true });
    }
  });

  try {
    return await Promise.race([fn(controller.signal), guard]);
  } finally {
    clearTimeout(timer);
    if (opts.signal && onParentAbort) {
      opts.signal.removeEventListener("abort", onParentAbort);
    }
  }
}
