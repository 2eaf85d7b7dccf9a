import { describe, it, expect, vi } from 'vitest';
import { TooManyRequestsError } from '../client/errors.js';
import {
  getSleepDuration,
  parseRateLimit,
  parseRetryAfter,
  toTooManyRequestsError,
  withRateLimit,
} from '../client/rate-limit.js';

const NOW = Date.UTC(2026, 0, 1, 12, 0, 0);

// ---------------------------------------------------------------------------
// parseRetryAfter
// ---------------------------------------------------------------------------

describe('parseRetryAfter', () => {
  it('reads delta seconds', () => {
    expect(parseRetryAfter('5', NOW)).toBe(5_000);
  });

  it('reads an HTTP-date relative to now', () => {
    expect(parseRetryAfter('Thu, 01 Jan 2026 12:00:30 GMT', NOW)).toBe(30_000);
  });

  it('clamps a date in the past to zero', () => {
    expect(parseRetryAfter('Thu, 01 Jan 2026 11:00:00 GMT', NOW)).toBe(0);
  });

  it('returns null for a missing or unparseable header', () => {
    expect(parseRetryAfter(undefined, NOW)).toBeNull();
    expect(parseRetryAfter('', NOW)).toBeNull();
    expect(parseRetryAfter('soon', NOW)).toBeNull();
  });
});

// ---------------------------------------------------------------------------
// parseRateLimit
// ---------------------------------------------------------------------------

describe('parseRateLimit', () => {
  it('derives the per-minute quota from the hourly one', () => {
    const state = parseRateLimit(
      { 'ratelimit-limit': '5000', 'ratelimit-remaining': '4990', 'ratelimit-reset': '1767268860' },
      NOW,
    );
    expect(state).toEqual({
      requestsPerHour: 5000,
      requestsPerMinute: 250,
      remaining: 4990,
      retryAfterMs: 0,
      resetAt: 1767268860_000,
    });
  });

  it('reads missing headers as zero and resets now', () => {
    const state = parseRateLimit({}, NOW);
    expect(state).toEqual({ requestsPerHour: 0, requestsPerMinute: 0, remaining: 0, retryAfterMs: 0, resetAt: NOW });
  });

  it('ignores malformed values', () => {
    const state = parseRateLimit({ 'ratelimit-limit': 'lots', 'ratelimit-remaining': '-3' }, NOW);
    expect(state.requestsPerHour).toBe(0);
    expect(state.remaining).toBe(0);
  });
});

// ---------------------------------------------------------------------------
// getSleepDuration
// ---------------------------------------------------------------------------

describe('getSleepDuration', () => {
  it('never returns a negative duration', () => {
    const retryAfters = [0, 1, 500, 60_000];
    const resetOffsets = [-3_600_000, -1, 0, 1, 45_000];
    for (const retryAfterMs of retryAfters) {
      for (const offset of resetOffsets) {
        expect(getSleepDuration(retryAfterMs, NOW + offset, NOW)).toBeGreaterThanOrEqual(0);
      }
    }
  });

  it('prefers Retry-After over the reset instant when both are positive', () => {
    expect(getSleepDuration(5_000, NOW + 60_000, NOW)).toBe(5_000);
  });

  it('waits until the reset instant without Retry-After', () => {
    expect(getSleepDuration(0, NOW + 42_000, NOW)).toBe(42_000);
  });

  it('returns zero once the reset instant has passed', () => {
    expect(getSleepDuration(0, NOW - 1_000, NOW)).toBe(0);
  });
});

describe('toTooManyRequestsError', () => {
  it('carries the quotas and the Retry-After wait', () => {
    const error = toTooManyRequestsError(
      { 'ratelimit-limit': '5000', 'ratelimit-reset': String(NOW / 1000 + 60), 'retry-after': '5' },
      NOW,
    );
    expect(error).toBeInstanceOf(TooManyRequestsError);
    expect(error.requestsPerHour).toBe(5000);
    expect(error.requestsPerMinute).toBe(250);
    expect(error.resetAt).toBe(NOW + 60_000);
    expect(error.sleepDurationMs).toBe(5_000);
    expect(error.retryAfterAt).toBe(NOW + 5_000);
    expect(error.message).toBe('The client must wait 5000ms to make another request');
  });

  it('has no Retry-After instant when the header is missing', () => {
    const error = toTooManyRequestsError({ 'ratelimit-reset': String(NOW / 1000 + 30) }, NOW);
    expect(error.retryAfterAt).toBeNull();
    expect(error.sleepDurationMs).toBe(30_000);
  });

  it('counts down the wait from when the response was received', () => {
    const error = toTooManyRequestsError({ 'retry-after': '5' }, NOW);
    expect(error.getSleepDuration(NOW + 2_000)).toBe(3_000);
    expect(error.getSleepDuration(NOW + 9_000)).toBe(0);
  });
});

// ---------------------------------------------------------------------------
// withRateLimit
// ---------------------------------------------------------------------------

describe('withRateLimit', () => {
  const rateLimited = () => toTooManyRequestsError({ 'retry-after': '0' });

  it('retries after a 429 and returns the eventual result', async () => {
    const fn = vi.fn<() => Promise<string>>()
      .mockRejectedValueOnce(rateLimited())
      .mockResolvedValueOnce('ok');
    await expect(withRateLimit(fn)).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it('rethrows the last 429 after maxAttempts', async () => {
    const fn = vi.fn<() => Promise<string>>().mockImplementation(() => Promise.reject(rateLimited()));
    await expect(withRateLimit(fn, { maxAttempts: 3 })).rejects.toBeInstanceOf(TooManyRequestsError);
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('does not retry other errors', async () => {
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(new Error('boom'));
    await expect(withRateLimit(fn)).rejects.toThrow('boom');
    expect(fn).toHaveBeenCalledTimes(1);
  });
});
