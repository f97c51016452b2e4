export type RetryPolicy = {
  /** Wait before each attempt; the length is the attempt cap. */
  readonly delaysMs: readonly number[];
};

export const DEFAULT_RETRY_POLICY: RetryPolicy = { delaysMs: [0, 2000, 5000, 10000] };

export const createRetryPolicy = (delaysMs: readonly number[]): RetryPolicy => {
  if (delaysMs.length === 0 || delaysMs.some((delay) => !Number.isFinite(delay) || delay < 0)) {
    throw new Error("Retry policy needs at least one non-negative delay.");
  }
  return { delaysMs: [...delaysMs] };
};

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

export type AttemptFailure = { attempt: number; delayMs: number; error: unknown };

/**
 * Runs `attempt` once per policy step until it succeeds.
 * Throws the last failure when every step failed.
 */
export const runWithRetry = async <T>(
  policy: RetryPolicy,
  attempt: (index: number) => Promise<T>,
  options: { wait?: Sleep; onFailure?: (failure: AttemptFailure) => void } = {}
): Promise<T> => {
  const wait = options.wait ?? sleep;
  let lastError: unknown = new Error("Retry policy has no attempts.");
  for (const [index, delayMs] of policy.delaysMs.entries()) {
    if (delayMs > 0) {
      await wait(delayMs);
    }
    try {
      return await attempt(index + 1);
    } catch (error) {
      lastError = error;
      options.onFailure?.({ attempt: index + 1, delayMs, error });
    }
  }
  throw lastError;
};
