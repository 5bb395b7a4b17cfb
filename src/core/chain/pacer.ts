export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Fixed-interval pacing for sequential calls: the first `next()` returns at
 * once, every later one waits `intervalMs` first. No backoff.
 */
export class Pacer {
  private intervalMs: number;
  private wait: Sleep;
  private calls = 0;

  constructor(intervalMs: number, wait: Sleep = sleep) {
    this.intervalMs = intervalMs;
    this.wait = wait;
  }

  async next(): Promise<void> {
    if (this.calls > 0 && this.intervalMs > 0) {
      await this.wait(this.intervalMs);
    }
    this.calls++;
  }

  get count(): number {
    return this.calls;
  }
}
