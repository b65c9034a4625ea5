export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise((r) => setTimeout(r, ms));

export class RateLimiter {
  private last: number | null = null;
  private tail: Promise<void> = Promise.resolve();

  constructor(
    private readonly minIntervalMs = 1000,
    private readonly pause: Sleep = sleep,
    private readonly now: () => number = Date.now,
  ) {}

  // The first call goes through immediately; later calls wait out the interval.
  async wait(): Promise<void> {
    if (this.last !== null) {
      const elapsed = this.now() - this.last;
      if (elapsed < this.minIntervalMs) {
        await this.pause(this.minIntervalMs - elapsed);
      }
    }
    this.last = this.now();
  }

  /**
   * Runs tasks one at a time. The interval is measured from the end of the
   * previous task, so a slow request still leaves a full pause before the next.
   */
  run<T>(task: () => Promise<T>): Promise<T> {
    const result = this.tail.then(async () => {
      await this.wait();
      try {
        return await task();
      } finally {
        this.last = this.now();
      }
    });
    this.tail = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }
}
