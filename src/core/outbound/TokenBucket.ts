import { systemClock, type Clock } from '../../utils/clock.js';

/**
 * Global send ceiling shared by every chat queue. Refills continuously at
 * `ratePerSecond` up to `capacity` tokens; one token per message.
 */
export class TokenBucket {
  private tokens: number;
  private refilledAt: number;
  private readonly capacity: number;

  constructor(
    private readonly ratePerSecond: number,
    private readonly clock: Clock = systemClock,
    capacity?: number
  ) {
    if (!(ratePerSecond > 0)) {
      throw new RangeError(`ratePerSecond must be positive, got ${ratePerSecond}`);
    }
    this.capacity = capacity ?? Math.max(1, Math.floor(ratePerSecond));
    this.tokens = this.capacity;
    this.refilledAt = clock.now();
  }

  /** Takes a token if one is available. Otherwise returns the ms until one will be. */
  tryTake(): number {
    this.refill();
    if (this.tokens >= 1) {
      this.tokens -= 1;
      return 0;
    }
    return Math.ceil(((1 - this.tokens) * 1000) / this.ratePerSecond);
  }

  /** Waits for a token. Resolves false when `signal` aborts first. */
  async acquire(signal?: AbortSignal): Promise<boolean> {
    for (;;) {
      if (signal?.aborted) {
        return false;
      }
      const wait = this.tryTake();
      if (wait === 0) {
        return true;
      }
      await this.clock.sleep(wait, signal);
    }
  }

  private refill(): void {
    const now = this.clock.now();
    const elapsed = now - this.refilledAt;
    if (elapsed > 0) {
      this.tokens = Math.min(this.capacity, this.tokens + (elapsed * this.ratePerSecond) / 1000);
      this.refilledAt = now;
    }
  }
}
