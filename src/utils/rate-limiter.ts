/**
 * Minimum spacing between request starts, shared by concurrent callers
 */

import { sleep } from './retry.js';

export class RateLimiter {
  private nextSlotAt = 0;

  constructor(
    private readonly minIntervalMs: number,
    private readonly now: () => number = Date.now
  ) {}

  /**
   * Reserve the next free start slot and wait for it.
   * Slots are handed out synchronously, so concurrent callers never share one.
   */
  async waitForSlot(): Promise<void> {
    const now = this.now();
    const slot = Math.max(now, this.nextSlotAt);
    this.nextSlotAt = slot + this.minIntervalMs;

    const waitTime = slot - now;
    if (waitTime > 0) {
      await sleep(waitTime);
    }
  }
}
