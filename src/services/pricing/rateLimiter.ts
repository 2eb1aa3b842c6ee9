const defaultSleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Minimum spacing between outbound calls. Callers await `wait()` before each
 * request; the first call never waits.
 */
export class RateLimiter {
  private last = Number.NEGATIVE_INFINITY;

  constructor(
    private readonly minIntervalMs: number,
    private readonly now: () => number = Date.now,
    private readonly sleep: (ms: number) => Promise<void> = defaultSleep,
  ) {}

  async wait(): Promise<void> {
    let current = this.now();
    const remaining = this.minIntervalMs - (current - this.last);
    if (remaining > 0) {
      await this.sleep(remaining);
      current = this.now();
    }
    this.last = current;
  }
}
