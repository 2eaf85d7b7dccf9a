/**
 * backoff.ts — Geometric retry delays for polling loops.
 *
 * Each polling loop owns one RetryDelay; the sequence is
 * initialMs, initialMs × m, initialMs × m², … capped at maxMs.
 */

import { InterruptedError } from './errors.js';

export interface RetryDelayOptions {
  initialMs: number;
  maxMs: number;
  multiplier: number;
}

// Delays used while waiting on clusters, databases and droplets.
export const DEFAULT_POLL_DELAY: Readonly<RetryDelayOptions> = {
  initialMs: 3_000,
  maxMs: 30_000,
  multiplier: 2,
};

/**
 * Sleep for the given number of milliseconds.
 *
 * Rejects with InterruptedError as soon as `signal` aborts, including when it
 * has already aborted.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new InterruptedError(undefined, { cause: signal.reason }));
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new InterruptedError(undefined, { cause: signal?.reason }));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, Math.max(0, ms));
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export class RetryDelay {
  private readonly initialMs: number;
  private readonly maxMs: number;
  private readonly multiplier: number;
  private current: number | null = null;

  constructor(options: RetryDelayOptions = DEFAULT_POLL_DELAY) {
    const { initialMs, maxMs, multiplier } = options;
    if (!Number.isFinite(initialMs) || initialMs < 0) {
      throw new RangeError(`initialMs must be a non-negative number. Got: ${initialMs}`);
    }
    if (!Number.isFinite(maxMs) || maxMs < initialMs) {
      throw new RangeError(`maxMs (${maxMs}) must be greater than or equal to initialMs (${initialMs})`);
    }
    if (!Number.isFinite(multiplier) || multiplier < 1) {
      throw new RangeError(`multiplier must be at least 1. Got: ${multiplier}`);
    }
    this.initialMs = initialMs;
    this.maxMs = maxMs;
    this.multiplier = multiplier;
  }

  /**
   * Returns the delay to wait before the next attempt and advances the sequence.
   */
  next(): number {
    this.current = this.current === null
      ? this.initialMs
      : Math.min(this.current * this.multiplier, this.maxMs);
    return this.current;
  }

  /**
   * Sleeps for next() milliseconds, or for `capMs` if that is shorter.
   * Resolves with the time actually slept.
   */
  async sleep(signal?: AbortSignal, capMs = Number.POSITIVE_INFINITY): Promise<number> {
    const delay = Math.max(0, Math.min(this.next(), capMs));
    await sleep(delay, signal);
    return delay;
  }
}
