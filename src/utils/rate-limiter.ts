export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Token bucket shared by every request a fare source makes. Calls are
 * serialized, so parallel routes queue up instead of bursting past the
 * provider's quota.
 */
export class RateLimiter {
  private tokens: number;
  private last_refill: number;
  private queue: Promise<void> = Promise.resolve();
  private readonly max_tokens: number;
  private readonly refill_rate: number; // tokens per second
  private readonly clock: () => number;
  private readonly wait: Sleep;

  constructor(max_tokens: number, refill_rate: number, clock: () => number = Date.now, wait: Sleep = sleep) {
    this.max_tokens = max_tokens;
    this.tokens = max_tokens;
    this.refill_rate = refill_rate;
    this.clock = clock;
    this.wait = wait;
    this.last_refill = clock();
  }

  acquire(): Promise<void> {
    const next = this.queue.then(() => this.take());
    this.queue = next;
    return next;
  }

  private async take(): Promise<void> {
    this.refill();
    if (this.tokens < 1) {
      await this.wait(((1 - this.tokens) / this.refill_rate) * 1000);
      this.refill();
    }
    this.tokens -= 1;
  }

  private refill(): void {
    const now = this.clock();
    const elapsed_s = (now - this.last_refill) / 1000;
    this.tokens = Math.min(this.max_tokens, this.tokens + elapsed_s * this.refill_rate);
    this.last_refill = now;
  }
}
