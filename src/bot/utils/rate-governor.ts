export const HOUR_MS = 60 * 60 * 1000;

/**
 * Sliding-window call budget for outbound feed requests.
 *
 * Keeps the timestamps of granted calls; a call is granted while fewer than
 * `maxCalls` fall inside the trailing window. `maxCalls <= 0` disables the cap.
 */
export class RateGovernor {
  private readonly maxCalls: number;
  private readonly windowMs: number;
  private timestamps: number[] = [];

  constructor(maxCalls: number, windowMs: number = HOUR_MS) {
    this.maxCalls = maxCalls;
    this.windowMs = windowMs;
  }

  tryAcquire(now: number): boolean {
    this.prune(now);
    if (this.maxCalls > 0 && this.timestamps.length >= this.maxCalls) {
      return false;
    }
    this.timestamps.push(now);
    return true;
  }

  count(now: number): number {
    this.prune(now);
    return this.timestamps.length;
  }

  /**
   * Milliseconds until the next call would be granted (0 if one would be now).
   */
  waitTime(now: number): number {
    this.prune(now);
    if (this.maxCalls <= 0 || this.timestamps.length < this.maxCalls) {
      return 0;
    }
    const oldest = this.timestamps[this.timestamps.length - this.maxCalls];
    return Math.max(0, oldest + this.windowMs - now);
  }

  limit(): number {
    return this.maxCalls;
  }

  private prune(now: number): void {
    const cutoff = now - this.windowMs;
    this.timestamps = this.timestamps.filter((t) => t > cutoff);
  }
}
