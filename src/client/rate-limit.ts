import { TooManyRequestsError } from './errors.js';
import { sleep } from './backoff.js';
import type { Logger } from '../logger.js';

/**
 * Rate-limit quotas reported by the provider on every response.
 *
 * The provider allows 5,000 requests per hour and 250 per minute; only the
 * hourly figure is sent, so the per-minute quota is derived from it.
 */
export interface RateLimitState {
  requestsPerMinute: number;
  requestsPerHour: number;
  remaining: number;
  // Relative wait from the Retry-After header, 0 when absent
  retryAfterMs: number;
  // Epoch millis at which the oldest counted request expires
  resetAt: number;
}

const MINUTES_PER_HOUR_QUOTA = 20;

function parseNonNegativeInt(value: string | undefined): number | null {
  if (value === undefined || value.trim() === '') return null;
  const n = Number(value);
  if (!Number.isFinite(n) || n < 0) return null;
  return Math.floor(n);
}

// Retry-After can be:
//   - a decimal integer (seconds to wait)
//   - an HTTP-date string (absolute datetime)
// Returns null if the header is absent or unparseable.
export function parseRetryAfter(value: string | undefined, now = Date.now()): number | null {
  if (value === undefined) return null;
  const header = value.trim();
  if (!header) return null;

  // Try integer seconds first
  const seconds = Number(header);
  if (Number.isFinite(seconds)) {
    return Math.max(0, Math.floor(seconds * 1000));
  }

  // Try HTTP-date
  const ts = new Date(header).getTime();
  if (!Number.isNaN(ts)) {
    return Math.max(0, ts - now);
  }

  return null;
}

/**
 * Reads the provider's rate-limit headers. Missing or malformed values read as
 * zero so the computed sleep is zero and the next request produces its own error.
 *
 * `headers` must have lower-case names.
 */
export function parseRateLimit(headers: Record<string, string>, now = Date.now()): RateLimitState {
  const requestsPerHour = parseNonNegativeInt(headers['ratelimit-limit']) ?? 0;
  const resetSeconds = parseNonNegativeInt(headers['ratelimit-reset']);
  return {
    requestsPerHour,
    requestsPerMinute: Math.floor(requestsPerHour / MINUTES_PER_HOUR_QUOTA),
    remaining: parseNonNegativeInt(headers['ratelimit-remaining']) ?? 0,
    retryAfterMs: parseRetryAfter(headers['retry-after'], now) ?? 0,
    resetAt: resetSeconds === null ? now : resetSeconds * 1000,
  };
}

/**
 * How long the client has to wait before it may send another request.
 *
 * A positive Retry-After wins because it is the server's immediate instruction;
 * otherwise the wait lasts until the reset instant. Never negative.
 */
export function getSleepDuration(retryAfterMs: number, resetAt: number, now = Date.now()): number {
  if (retryAfterMs > 0) return retryAfterMs;
  return Math.max(0, resetAt - now);
}

export function toTooManyRequestsError(headers: Record<string, string>, now = Date.now()): TooManyRequestsError {
  const state = parseRateLimit(headers, now);
  return new TooManyRequestsError(state, getSleepDuration(state.retryAfterMs, state.resetAt, now), now);
}

export interface WithRateLimitOptions {
  maxAttempts?: number;
  signal?: AbortSignal;
  logger?: Pick<Logger, 'debug'>;
}

/**
 * withRateLimit — opt-in retry on 429 for callers that choose that policy.
 *
 * On TooManyRequestsError: sleeps for the duration the server asked for, then retries.
 * After maxAttempts attempts the last TooManyRequestsError is rethrown.
 * All other errors are re-thrown immediately without retry.
 */
export async function withRateLimit<T>(
  fn: () => Promise<T>,
  options: WithRateLimitOptions = {},
): Promise<T> {
  const maxAttempts = options.maxAttempts ?? 4;
  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (!(error instanceof TooManyRequestsError) || attempt >= maxAttempts) throw error;
      const waitMs = error.getSleepDuration();
      options.logger?.debug({ attempt, waitMs }, 'Rate limited; waiting before retrying');
      await sleep(waitMs, options.signal);
    }
  }
}
