export type RetryVerdict =
  | { retry: false }
  | {
      retry: true;
      delayMs?: number; // server-provided wait, still capped by maxDelayMs
    };

export type RetryAttemptInfo = {
  attempt: number;
  maxAttempts: number;
  error: unknown;
};

export type RetryPolicy = {
  maxAttempts: number;      // total tries, first one included
  baseDelayMs: number;
  maxDelayMs: number;
  classify: (err: unknown) => RetryVerdict;
  onRetry?: (info: RetryAttemptInfo & { delayMs: number }) => void;
  onGiveUp?: (info: RetryAttemptInfo) => void;
  jitterRatio?: number;
  randomFn?: () => number;
  sleep?: (ms: number) => Promise<void>;
};

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

const clamp01 = (value: number) => Math.min(1, Math.max(0, value));

export const computeRetryDelayMs = (
  failedAttempt: number,
  verdict: Extract<RetryVerdict, { retry: true }>,
  policy: Pick<RetryPolicy, "baseDelayMs" | "maxDelayMs" | "jitterRatio" | "randomFn">
): number => {
  const hinted =
    typeof verdict.delayMs === "number" && Number.isFinite(verdict.delayMs) && verdict.delayMs >= 0
      ? verdict.delayMs
      : undefined;
  const backoff = Math.min(policy.maxDelayMs, hinted ?? policy.baseDelayMs * 2 ** (failedAttempt - 1));
  const jitter = Math.floor(backoff * clamp01(policy.jitterRatio ?? 0.2) * clamp01((policy.randomFn ?? Math.random)()));
  return backoff + jitter;
};

export const withRetry = async <T>(fn: (attempt: number) => Promise<T>, policy: RetryPolicy): Promise<T> => {
  if (!Number.isInteger(policy.maxAttempts) || policy.maxAttempts < 1) {
    throw new Error("maxAttempts must be an integer >= 1");
  }
  const sleep = policy.sleep ?? defaultSleep;

  for (let attempt = 1; ; attempt += 1) {
    try {
      return await fn(attempt);
    } catch (err) {
      const verdict = policy.classify(err);
      if (!verdict.retry || attempt >= policy.maxAttempts) {
        policy.onGiveUp?.({ attempt, maxAttempts: policy.maxAttempts, error: err });
        throw err;
      }

      const delayMs = computeRetryDelayMs(attempt, verdict, policy);
      policy.onRetry?.({ attempt, maxAttempts: policy.maxAttempts, delayMs, error: err });
      await sleep(delayMs);
    }
  }
};
