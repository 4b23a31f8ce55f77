export type RetryBackoffOptions = {
  retries: number; // retries after the first attempt
  baseDelayMs: number;
  maxDelayMs: number;
  jitterMs?: number;
  isRetryable?: (err: unknown) => boolean;
  onRetry?: (info: { attempt: number; retriesLeft: number; delayMs: number; error: unknown }) => void;
  sleepFn?: (ms: number) => Promise<void>;
};

export type RetryOutcome<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; error: unknown; attempts: number };

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function backoffDelay(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
  const raw = baseDelayMs * 2 ** Math.max(0, attempt - 1);
  if (!Number.isFinite(raw)) return maxDelayMs;
  return Math.min(maxDelayMs, Math.max(baseDelayMs, raw));
}

/**
 * Run `fn` until it resolves or the retry budget is spent.
 * Never throws; the last error is returned in the outcome.
 */
export async function retryWithBackoff<T>(
  fn: (attempt: number) => Promise<T>,
  opts: RetryBackoffOptions
): Promise<RetryOutcome<T>> {
  const retries = Math.max(0, Math.floor(opts.retries));
  const baseDelayMs = Math.max(0, Math.floor(opts.baseDelayMs));
  const maxDelayMs = Math.max(baseDelayMs, Math.floor(opts.maxDelayMs));
  const jitterMs = Math.max(0, Math.floor(opts.jitterMs ?? 0));
  const isRetryable = opts.isRetryable ?? (() => true);
  const sleepFn = opts.sleepFn ?? sleep;

  let lastError: unknown = null;
  for (let attempt = 1; attempt <= retries + 1; attempt += 1) {
    try {
      return { ok: true, value: await fn(attempt), attempts: attempt };
    } catch (err) {
      lastError = err;
      const retriesLeft = retries + 1 - attempt;
      if (retriesLeft <= 0 || !isRetryable(err)) {
        return { ok: false, error: err, attempts: attempt };
      }
      const jitter = jitterMs > 0 ? Math.floor(Math.random() * jitterMs) : 0;
      const delayMs = backoffDelay(attempt, baseDelayMs, maxDelayMs) + jitter;
      opts.onRetry?.({ attempt, retriesLeft, delayMs, error: err });
      if (delayMs > 0) await sleepFn(delayMs);
    }
  }

  return { ok: false, error: lastError, attempts: retries + 1 };
}
