// ---------------------------------------------------------------------------
// Retry policy — bounded exponential backoff with jitter
// ---------------------------------------------------------------------------

import { DEFAULT_MAX_RETRIES, RETRYABLE_STATUS_CODES } from "./protocol";
import type { RetryOptions } from "./protocol";

export const DEFAULT_RETRY: RetryOptions = {
  maxRetries: DEFAULT_MAX_RETRIES,
  baseDelayMs: 1_000,
  maxDelayMs: 30_000,
  jitterMs: 1_000,
};

export function resolveRetryOptions(
  retry?: Partial<RetryOptions>,
  maxRetries?: number,
): RetryOptions {
  const resolved: RetryOptions = { ...DEFAULT_RETRY, ...retry };
  if (maxRetries !== undefined) {
    resolved.maxRetries = maxRetries;
  }
  resolved.maxRetries = Math.max(0, Math.floor(resolved.maxRetries));
  return resolved;
}

export function isRetryableStatus(status: number): boolean {
  return RETRYABLE_STATUS_CODES.has(status);
}

/**
 * Delay before retry number `attempt` (1-based):
 * `min(base * 2^(attempt-1), max) + jitter`.
 * A server-provided `Retry-After` (seconds) replaces the exponential part.
 */
export function computeBackoffDelay(
  attempt: number,
  options: RetryOptions,
  retryAfterSeconds?: number,
  random: () => number = Math.random,
): number {
  if (retryAfterSeconds !== undefined) {
    return Math.min(retryAfterSeconds * 1_000, options.maxDelayMs);
  }
  const exponential = Math.min(
    options.baseDelayMs * Math.pow(2, attempt - 1),
    options.maxDelayMs,
  );
  const jitter = options.jitterMs > 0 ? Math.floor(random() * options.jitterMs) : 0;
  return exponential + jitter;
}

/** Parse a `Retry-After` header given in seconds. HTTP-date values are ignored. */
export function parseRetryAfter(header: string | null): number | undefined {
  if (header === null || header.trim() === "") {
    return undefined;
  }
  const seconds = Number(header);
  if (!Number.isFinite(seconds) || seconds < 0) {
    return undefined;
  }
  return seconds;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
