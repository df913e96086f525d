/**
 * Timeout + retry budget for calls that cross a capability boundary
 * (embeddings, completions).
 *
 * Each attempt gets its own AbortSignal, aborted when the attempt times out
 * or when the caller's signal aborts. Caller cancellation is never retried.
 */

import { CancelledError, TimeoutError, getErrorMessage } from "../utils/errorHandler";

export type ResiliencePolicy = {
  label: string;
  timeoutMs: number;
  maxRetries: number;
};

async function runAttempt<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  policy: ResiliencePolicy,
  outer?: AbortSignal,
): Promise<T> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;
  let onOuterAbort: (() => void) | undefined;

  const interrupted = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = new TimeoutError(policy.label, policy.timeoutMs);
      controller.abort(error);
      reject(error);
    }, policy.timeoutMs);

    onOuterAbort = () => {
      const error = new CancelledError(policy.label);
      controller.abort(error);
      reject(error);
    };
    outer?.addEventListener("abort", onOuterAbort, { once: true });
  });

  try {
    return await Promise.race([operation(controller.signal), interrupted]);
  } finally {
    clearTimeout(timer);
    if (onOuterAbort) outer?.removeEventListener("abort", onOuterAbort);
  }
}

export async function withResilience<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  policy: ResiliencePolicy,
  signal?: AbortSignal,
): Promise<T> {
  let lastError: unknown;

  for (let attempt = 0; attempt <= policy.maxRetries; attempt++) {
    if (signal?.aborted) throw new CancelledError(policy.label);

    try {
      return await runAttempt(operation, policy, signal);
    } catch (error) {
      if (signal?.aborted) throw error;
      lastError = error;
      console.warn(
        `[${policy.label}] Attempt ${attempt + 1}/${policy.maxRetries + 1} failed: ${getErrorMessage(error)}`,
      );
    }
  }

  throw lastError;
}
