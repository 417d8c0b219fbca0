/**
 * Sliding window rate limiter keyed by client (IP address).
 * Only accepted requests count against the window.
 */

import type { RateLimitConfig, RateLimitResult } from './types.js';

export class RateLimiter {
  private requests: Map<string, number[]> = new Map();
  private config: RateLimitConfig;
  private now: () => number;

  constructor(config: RateLimitConfig, now: () => number = Date.now) {
    this.config = config;
    this.now = now;
  }

  /**
   * Check if a request is allowed and record it if so
   */
  check(key: string): RateLimitResult {
    const now = this.now();
    const windowStart = now - this.config.windowMs;

    // Drop timestamps that left the window
    const timestamps = (this.requests.get(key) ?? []).filter((t) => t > windowStart);

    const firstTimestamp = timestamps[0];
    const resetAt = firstTimestamp !== undefined
      ? firstTimestamp + this.config.windowMs
      : now + this.config.windowMs;

    if (timestamps.length >= this.config.maxRequests) {
      this.requests.set(key, timestamps);
      return { allowed: false, remaining: 0, resetAt };
    }

    timestamps.push(now);
    this.requests.set(key, timestamps);

    return {
      allowed: true,
      remaining: this.config.maxRequests - timestamps.length,
      resetAt,
    };
  }

  /**
   * Forget keys with no requests left in the window
   */
  prune(): void {
    const windowStart = this.now() - this.config.windowMs;
    for (const [key, timestamps] of this.requests) {
      if (timestamps.every((t) => t <= windowStart)) {
        this.requests.delete(key);
      }
    }
  }

  get trackedKeys(): number {
    return this.requests.size;
  }
}
