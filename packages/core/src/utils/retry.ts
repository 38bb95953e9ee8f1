export type RetryConfig = {
  /** Total attempts including the first (default: 1, i.e. no retries). */
  attempts?: number;
  /** Fixed pause between attempts (default: 0). */
  delayMs?: number;
};

export type RetryContext = {
  attempt: number;
  attempts: number;
  delayMs?: number;
};

export async function sleep(ms: number): Promise<void> {
  await new Promise<void>((resolve) => setTimeout(resolve, ms));
}

/**
 * Run `fn` until it succeeds, the error is not retryable, or attempts run out.
 *
 * The pause between attempts is constant. `resolveDelayMs` may stretch it for a
 * particular error (a rate limit telling us how long to wait).
 */
export async function withRetries<T>(
  fn: (ctx: RetryContext) => Promise<T>,
  cfg: RetryConfig | undefined,
  isRetryable: (err: unknown) => boolean,
  resolveDelayMs?: (err: unknown, defaultMs: number) => number
): Promise<T> {
  const attempts = Math.max(1, Math.floor(cfg?.attempts ?? 1));
  const baseDelayMs = Math.max(0, cfg?.delayMs ?? 0);

  let lastError: unknown;
  let delayMs = 0;
  for (let attempt = 1; attempt <= attempts; attempt++) {
    if (delayMs > 0) {
      await sleep(delayMs);
    }

    try {
      return await fn({ attempt, attempts, delayMs: delayMs > 0 ? delayMs : undefined });
    } catch (err) {
      lastError = err;
      if (attempt >= attempts || !isRetryable(err)) {
        throw err;
      }
      delayMs = resolveDelayMs ? Math.max(0, resolveDelayMs(err, baseDelayMs)) : baseDelayMs;
    }
  }

  // Should be unreachable.
  throw lastError;
}
