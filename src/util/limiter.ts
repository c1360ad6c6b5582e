import { sleep } from "./abort.js";

const POLL_MS = 50;

export class TokenBucketLimiter {
  private capacity: number;
  private tokens: number;
  private refillRatePerSec: number;
  private last: number;
  private readonly now: () => number;

  constructor(rps = 5, now: () => number = Date.now) {
    this.capacity = Math.max(1, rps);
    this.tokens = this.capacity;
    this.refillRatePerSec = rps;
    this.now = now;
    this.last = now();
  }

  private refill(): void {
    const now = this.now();
    const elapsed = (now - this.last) / 1000;
    this.last = now;
    this.tokens = Math.min(this.capacity, this.tokens + elapsed * this.refillRatePerSec);
  }

  /** Takes a token if one is available right now. */
  tryTake(): boolean {
    this.refill();
    if (this.tokens < 1) return false;
    this.tokens -= 1;
    return true;
  }

  async take(signal?: AbortSignal): Promise<void> {
    while (!this.tryTake()) {
      await sleep(POLL_MS, signal);
    }
  }
}
