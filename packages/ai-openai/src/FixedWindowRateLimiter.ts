import type { RateLimiter } from '@doc-quiz/core';

/**
 * In-process token bucket keyed by budget and window start. Counters for
 * windows that have already closed are dropped on the next call.
 */
export class FixedWindowRateLimiter implements RateLimiter {
  private readonly counters = new Map<string, { windowStart: number; count: number }>();

  async tryConsume(opts: {
    budget: string;
    windowSeconds: number;
    limit: number;
    now?: Date;
  }): Promise<boolean> {
    const nowMs = (opts.now ?? new Date()).getTime();
    const windowMs = opts.windowSeconds * 1000;
    const windowStart = Math.floor(nowMs / windowMs) * windowMs;

    const current = this.counters.get(opts.budget);
    const counter =
      current && current.windowStart === windowStart ? current : { windowStart, count: 0 };

    if (counter.count >= opts.limit) {
      this.counters.set(opts.budget, counter);
      return false;
    }

    counter.count += 1;
    this.counters.set(opts.budget, counter);
    return true;
  }
}
