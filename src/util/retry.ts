export class SleepAbortedError extends Error {
  constructor() {
    super("sleep aborted");
    this.name = "SleepAbortedError";
  }
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) return Promise.reject(new SleepAbortedError());
  return new Promise((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer);
      reject(new SleepAbortedError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

export interface RetryOptions {
  initialDelayMs?: number;
  backoffMultiplier?: number;
  maxDelayMs?: number;
  addJitter?: boolean;
  maxJitterMs?: number;
  random?: () => number;
}

/**
 * Delay before retry number `attempt` (zero based): doubles from
 * `initialDelayMs`, gains up to `maxJitterMs` of random jitter, and never
 * exceeds `maxDelayMs`.
 */
export function calculateBackoffDelay(attempt: number, options: RetryOptions = {}): number {
  const {
    initialDelayMs = 500,
    backoffMultiplier = 2,
    maxDelayMs = 15000,
    addJitter = true,
    maxJitterMs = 300,
    random = Math.random
  } = options;

  const baseDelay = initialDelayMs * Math.pow(backoffMultiplier, attempt);
  const jitter = addJitter ? Math.floor(random() * maxJitterMs) : 0;

  return Math.min(baseDelay + jitter, maxDelayMs);
}
