export class StageTimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(label: string, timeoutMs: number) {
    super(`${label} did not finish within ${timeoutMs}ms`);
    this.name = "StageTimeoutError";
    this.timeoutMs = timeoutMs;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Races `task` against a timer. The task itself is not cancelled; its late
 * result is ignored once the timer has fired.
 */
export const withTimeout = async <T>(task: () => Promise<T>, timeoutMs: number, label: string): Promise<T> => {
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    throw new StageTimeoutError(label, Math.max(0, timeoutMs));
  }

  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => reject(new StageTimeoutError(label, timeoutMs)), timeoutMs);
  });

  try {
    return await Promise.race([task(), timeout]);
  } finally {
    clearTimeout(timer);
  }
};
