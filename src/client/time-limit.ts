/**
 * The maximum amount of time that a blocking operation may run for.
 *
 * The deadline is fixed when the limit is created. Once the time elapses the
 * operation must stop and report a timeout that quotes getTimeQuota().
 */
export class TimeLimit {
  private readonly quotaMs: number;
  private readonly deadline: number;
  private readonly now: () => number;

  constructor(quotaMs: number, now: () => number = Date.now) {
    if (!Number.isFinite(quotaMs) || quotaMs < 0) {
      throw new RangeError(`quotaMs must be a non-negative number. Got: ${quotaMs}`);
    }
    this.quotaMs = quotaMs;
    this.now = now;
    this.deadline = now() + quotaMs;
  }

  getTimeQuota(): number {
    return this.quotaMs;
  }

  // Negative once the deadline has passed
  getTimeLeft(): number {
    return this.deadline - this.now();
  }

  isExpired(): boolean {
    return this.getTimeLeft() <= 0;
  }
}
