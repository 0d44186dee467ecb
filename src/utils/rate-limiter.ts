/**
 * Minimum-interval limiter shared by every page load of a fetcher
 */

import { sleep } from './retry.js';

export class RateLimiter {
  private lastCallTime = 0;
  private queue: Promise<void> = Promise.resolve();

  constructor(private readonly minIntervalMs: number) {}

  /**
   * Resolves when the caller may proceed; concurrent callers are served in order
   */
  waitForSlot(): Promise<void> {
    const slot = this.queue.then(async () => {
      const waitTime = Math.max(0, this.minIntervalMs - (Date.now() - this.lastCallTime));
      if (waitTime > 0) {
        await sleep(waitTime);
      }
      this.lastCallTime = Date.now();
    });
    this.queue = slot;
    return slot;
  }
}
