import * as log from '../utils/logger.js';

// ── Policy ───────────────────────────────────────────────────

export interface RetryPolicy {
  /** Total attempts, including the first. */
  attempts: number;
  /** Linear backoff step when the provider gives no Retry-After. */
  baseDelayMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = { attempts: 3, baseDelayMs: 5_000 };

// ── Signal ───────────────────────────────────────────────────

/** Raised by a provider call that hit a rate limit. Anything else is not retried. */
export class RateLimitedError extends Error {
  constructor(
    readonly provider: string,
    readonly retryAfterMs?: number | undefined,
  ) {
    super(`${provider} API rate limit exceeded`);
    this.name = 'RateLimitedError';
  }
}

export function parseRetryAfter(header: string | null): number | undefined {
  if (header === null) return undefined;
  const seconds = Number.parseFloat(header);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds * 1000 : undefined;
}

// ── Wrapper ──────────────────────────────────────────────────

export async function withRateLimitRetry<T>(
  call: () => Promise<T>,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY,
): Promise<T> {
  for (let attempt = 1; ; attempt++) {
    try {
      return await call();
    } catch (err) {
      if (!(err instanceof RateLimitedError) || attempt >= policy.attempts) throw err;

      const waitMs = err.retryAfterMs ?? attempt * policy.baseDelayMs;
      log.warn(
        `[llm] ${err.provider} rate limited, retry ${String(attempt)}/${String(policy.attempts - 1)} in ${String(Math.round(waitMs / 1000))}s`,
      );
      await new Promise((r) => setTimeout(r, waitMs));
    }
  }
}
