export interface RetryOptions {
  readonly maxAttempts?: number;
  readonly baseDelayMs?: number;
  readonly maxDelayMs?: number;
  readonly signal?: AbortSignal;
  /** Return false to give up immediately on this error. */
  readonly shouldRetry?: (err: unknown) => boolean;
  /** Called before each backoff sleep; `attempt` is the one that just failed. */
  readonly onRetry?: (err: unknown, attempt: number, delayMs: number) => void;
  readonly random?: () => number;
}

/**
 * Full-range exponential backoff, halved by jitter at worst:
 * attempt n sleeps between 50% and 100% of min(base * 2^n, max).
 */
export function backoffDelay(
  attempt: number,
  baseMs: number,
  maxMs: number,
  random: () => number = Math.random,
): number {
  const ceiling = Math.min(baseMs * 2 ** attempt, maxMs);
  return Math.round(ceiling * (0.5 + random() * 0.5));
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

export async function retry<T>(fn: (attempt: number) => Promise<T>, opts: RetryOptions = {}): Promise<T> {
  const { maxAttempts = 3, baseDelayMs = 500, maxDelayMs = 10_000, signal } = opts;

  for (let attempt = 0; ; attempt++) {
    signal?.throwIfAborted();
    try {
      return await fn(attempt);
    } catch (err) {
      const last = attempt + 1 >= maxAttempts;
      if (last || opts.shouldRetry?.(err) === false) throw err;

      const wait = backoffDelay(attempt, baseDelayMs, maxDelayMs, opts.random);
      opts.onRetry?.(err, attempt, wait);
      await sleep(wait, signal);
    }
  }
}
