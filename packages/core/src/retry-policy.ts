import { FsError, toFsError } from "./errors";
import type { RetrySettings } from "./index";

export interface RetryPolicy {
  /** Total attempts, the first one included */
  maxAttempts: number;
  baseDelayMs: number;
  factor: number;
  maxDelayMs: number;
}

export type RetryDecision = { retry: true; delayMs: number } | { retry: false };

export const computeBackoffDelay = (policy: RetryPolicy, attempt: number): number => {
  const exponent = Math.max(0, attempt - 1);
  return Math.min(policy.maxDelayMs, Math.round(policy.baseDelayMs * policy.factor ** exponent));
};

/**
 * Only connectivity failures are retried; `attempt` is the number of attempts
 * already made.
 */
export const decideRetry = (policy: RetryPolicy, attempt: number, error: unknown): RetryDecision => {
  if (!toFsError(error).retryable || attempt >= policy.maxAttempts) {
    return { retry: false };
  }

  return { retry: true, delayMs: computeBackoffDelay(policy, attempt) };
};

/** Connection establishment: `attempts` counts every try. */
export const connectRetryPolicy = (settings: RetrySettings): RetryPolicy => ({
  maxAttempts: settings.attempts,
  baseDelayMs: settings.baseDelayMs,
  factor: settings.factor,
  maxDelayMs: settings.maxDelayMs
});

/** Transfer items: `attempts` counts retries after the first try. */
export const itemRetryPolicy = (settings: RetrySettings): RetryPolicy => ({
  maxAttempts: settings.attempts + 1,
  baseDelayMs: settings.baseDelayMs,
  factor: settings.factor,
  maxDelayMs: settings.maxDelayMs
});

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export const sleep: Sleep = async (ms, signal) => {
  if (signal?.aborted) {
    throw FsError.cancelled();
  }

  if (ms <= 0) {
    return;
  }

  await new Promise<void>((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer);
      reject(FsError.cancelled());
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);

    signal?.addEventListener("abort", onAbort, { once: true });
  });
};

export interface RetryRunOptions {
  signal?: AbortSignal;
  sleep?: Sleep;
  onRetry?: (attempt: number, delayMs: number, error: FsError) => void;
}

export const runWithRetry = async <T>(
  task: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  options: RetryRunOptions = {}
): Promise<T> => {
  const wait = options.sleep ?? sleep;
  let attempt = 0;

  for (;;) {
    attempt += 1;
    try {
      return await task(attempt);
    } catch (error) {
      const decision = decideRetry(policy, attempt, error);
      if (!decision.retry || options.signal?.aborted) {
        throw toFsError(error);
      }

      options.onRetry?.(attempt, decision.delayMs, toFsError(error));
      await wait(decision.delayMs, options.signal);
    }
  }
};
