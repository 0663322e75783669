/**
 * Minimum-interval request spacing for E-utilities.
 *
 * Callers are queued on a promise chain, so concurrent fetches leave the
 * client no faster than one request per interval.
 */

export class RequestRateLimiter {
  private lastRequestAt = 0;
  private queue: Promise<void> = Promise.resolve();

  constructor(
    private readonly minIntervalMs: number,
    private readonly now: () => number = Date.now,
    private readonly sleep: (ms: number) => Promise<void> = (ms) =>
      new Promise((resolve) => setTimeout(resolve, ms))
  ) {}

  /** Resolves when the caller may send its request */
  acquire(): Promise<void> {
    const turn = this.queue.then(async () => {
      const wait = this.lastRequestAt + this.minIntervalMs - this.now();
      if (wait > 0) {
        await this.sleep(wait);
      }
      this.lastRequestAt = this.now();
    });
    this.queue = turn;
    return turn;
  }

  getStatus(): { minIntervalMs: number; lastRequestAt: number } {
    return { minIntervalMs: this.minIntervalMs, lastRequestAt: this.lastRequestAt };
  }

  reset(): void {
    this.lastRequestAt = 0;
    this.queue = Promise.resolve();
  }
}
