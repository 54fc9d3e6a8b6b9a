export const TOO_MANY_REQUESTS = 429;
export const TRANSIENT_STATUS_CODES: ReadonlySet<number> = new Set([TOO_MANY_REQUESTS, 503, 504]);

export interface RetryPolicy {
  initialBackoffSeconds: number;
  maxBackoffSeconds: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  initialBackoffSeconds: 1,
  maxBackoffSeconds: 30,
};

export interface RetryPlan {
  waitSeconds: number;
  /** Number of backoff-based waits taken once this plan is followed. */
  nextBackoffStep: number;
}

export function backoffSeconds(policy: RetryPolicy, backoffStep: number): number {
  return Math.min(policy.initialBackoffSeconds * 2 ** backoffStep, policy.maxBackoffSeconds);
}

/**
 * A server hint wins and leaves the backoff where it was; otherwise the next
 * exponential step is used and consumed.
 */
export function planRetry(
  policy: RetryPolicy,
  backoffStep: number,
  retryAfterSeconds: number | undefined,
): RetryPlan {
  if (retryAfterSeconds !== undefined) {
    return { waitSeconds: retryAfterSeconds, nextBackoffStep: backoffStep };
  }
  return { waitSeconds: backoffSeconds(policy, backoffStep), nextBackoffStep: backoffStep + 1 };
}

/** Numeric seconds only; HTTP dates and garbage are ignored. */
export function parseRetryAfter(header: string | string[] | undefined): number | undefined {
  const raw = Array.isArray(header) ? header[0] : header;
  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }
  const seconds = Number(raw.trim());
  return Number.isFinite(seconds) && seconds >= 0 ? seconds : undefined;
}

/**
 * POST and PATCH may already have taken effect when the gateway answers 503 or
 * 504, so only a 429 is retried for them unless the caller vouches otherwise.
 */
export function isRetryable(statusCode: number, idempotent: boolean): boolean {
  if (!TRANSIENT_STATUS_CODES.has(statusCode)) {
    return false;
  }
  return idempotent || statusCode === TOO_MANY_REQUESTS;
}
