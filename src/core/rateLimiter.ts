/** Per-connection limit on inbound user messages over a sliding time window. */
export class SlidingWindowRateLimiter {
  private readonly accepted: number[] = [];

  constructor(
    private readonly maxMessages: number,
    private readonly windowMs: number,
    private readonly now: () => number = Date.now,
  ) {}

  tryAcquire(): boolean {
    const at = this.now();
    this.evictBefore(at - this.windowMs);

    if (this.accepted.length >= this.maxMessages) {
      return false;
    }

    this.accepted.push(at);
    return true;
  }

  /** Milliseconds until the oldest accepted message leaves the window. */
  retryAfterMs(): number {
    const oldest = this.accepted[0];
    if (oldest === undefined || this.accepted.length < this.maxMessages) {
      return 0;
    }
    return Math.max(0, oldest + this.windowMs - this.now());
  }

  private evictBefore(threshold: number): void {
    while (this.accepted.length > 0 && this.accepted[0] < threshold) {
      this.accepted.shift();
    }
  }
}
