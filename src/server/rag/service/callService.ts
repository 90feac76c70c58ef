import { RagError, isTransientError, toRagError } from "../errors.ts";
import { debugRag, logRagWarn } from "../log.ts";

export interface CallServiceOptions {
  /** Per-attempt timeout. */
  timeoutMs: number;
  /** Extra attempts after a transient failure. Default 1. */
  retries?: number;
  /** Caller cancellation; never retried. */
  signal?: AbortSignal;
  label?: string;
}

async function attempt<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  label: string,
  parent?: AbortSignal,
): Promise<T> {
  const abortController = new AbortController();
  let timedOut = false;
  let rejectDeadline: (error: RagError) => void = () => {};
  // Settles the attempt even when fn ignores its signal and never returns.
  const deadline = new Promise<never>((_resolve, reject) => {
    rejectDeadline = reject;
  });

  const timeout = setTimeout(() => {
    timedOut = true;
    abortController.abort();
    rejectDeadline(new RagError("timeout", `${label} timed out after ${timeoutMs}ms`));
  }, timeoutMs);

  const onParentAbort = (): void => {
    abortController.abort();
    rejectDeadline(new RagError("aborted", `${label} was cancelled`));
  };
  parent?.addEventListener("abort", onParentAbort, { once: true });

  const work = (async () => fn(abortController.signal))();
  // A call that loses the race may still reject later.
  void work.catch((error: unknown) => {
    debugRag("rag.service", "late_failure", { label, error: toRagError(error).message });
  });

  try {
    return await Promise.race([work, deadline]);
  } catch (error: unknown) {
    if (timedOut) {
      throw new RagError("timeout", `${label} timed out after ${timeoutMs}ms`, { cause: error });
    }
    if (parent?.aborted) {
      throw new RagError("aborted", `${label} was cancelled`, { cause: error });
    }
    throw toRagError(error);
  } finally {
    clearTimeout(timeout);
    parent?.removeEventListener("abort", onParentAbort);
  }
}

/**
 * Runs an external-service call with a bounded timeout per attempt and
 * retries transient failures (unavailable, rate limited, timed out).
 * Errors are always surfaced as RagError.
 */
export async function callService<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  opts: CallServiceOptions,
): Promise<T> {
  const label = opts.label ?? "service call";
  const retriesRaw = opts.retries ?? 1;
  const retries = Number.isInteger(retriesRaw) && retriesRaw >= 0 ? retriesRaw : 1;

  if (opts.signal?.aborted) {
    throw new RagError("aborted", `${label} was cancelled`);
  }

  let lastError: RagError | null = null;
  for (let i = 0; i <= retries; i++) {
    try {
      return await attempt(fn, opts.timeoutMs, label, opts.signal);
    } catch (error: unknown) {
      lastError = toRagError(error);
      if (!isTransientError(lastError) || opts.signal?.aborted || i === retries) {
        throw lastError;
      }
      logRagWarn("rag.service", `${label} failed (${lastError.kind}), retrying: ${lastError.message}`);
    }
  }

  throw lastError ?? new RagError("unknown", `${label} failed`);
}
