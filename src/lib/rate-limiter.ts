/**
 * Rate limit tracker for GitHub GraphQL API.
 *
 * GitHub GraphQL uses a point-based rate limit system (5000 points/hour).
 * Remaining points are tracked from the `rateLimit` field the client
 * injects into every query. Near the limit the tracker waits for the
 * reset; once the budget is exhausted and the reset is further away than
 * the caller is willing to wait, requests fail fast as
 * RemoteUnavailableError.
 */

import type { RateLimitInfo } from "../types.js";
import { RemoteUnavailableError } from "./errors.js";

export interface RateLimiterOptions {
  /** Remaining points at which a warning is logged (default: 100) */
  warningThreshold?: number;
  /** Remaining points at which requests wait for the reset (default: 50) */
  blockThreshold?: number;
  /** Longest single wait before giving up (default: 60s) */
  maxWaitMs?: number;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

export interface RateLimitStatus {
  remaining: number;
  resetAt: Date;
  isLow: boolean;
  isCritical: boolean;
}

export class RateLimiter {
  private remaining: number = 5000;
  private resetAt: Date = new Date(0);
  private readonly warningThreshold: number;
  private readonly blockThreshold: number;
  private readonly maxWaitMs: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => number;

  constructor(options: RateLimiterOptions = {}) {
    this.warningThreshold = options.warningThreshold ?? 100;
    this.blockThreshold = options.blockThreshold ?? 50;
    this.maxWaitMs = options.maxWaitMs ?? 60_000;
    this.sleep =
      options.sleep ?? ((ms) => new Promise((resolve) => setTimeout(resolve, ms)));
    this.now = options.now ?? Date.now;
  }

  update(rateLimitInfo: RateLimitInfo): void {
    this.remaining = rateLimitInfo.remaining;
    this.resetAt = new Date(rateLimitInfo.resetAt);
  }

  /**
   * Check rate limit before making a request.
   * Waits when critically low, throws when exhausted past `maxWaitMs`.
   */
  async checkBeforeRequest(): Promise<void> {
    if (this.remaining > this.warningThreshold) {
      return;
    }

    const msUntilReset = this.resetAt.getTime() - this.now();
    if (msUntilReset <= 0) {
      // Window has rolled over; the next response refreshes the count.
      return;
    }

    if (this.remaining === 0 && msUntilReset > this.maxWaitMs) {
      throw new RemoteUnavailableError(
        `GitHub rate limit exhausted until ${this.resetAt.toISOString()}`,
      );
    }

    if (this.remaining <= this.blockThreshold) {
      const waitMs = Math.min(msUntilReset, this.maxWaitMs);
      console.error(
        `[rate-limiter] Rate limit critically low (${this.remaining} remaining). ` +
          `Waiting ${Math.ceil(waitMs / 1000)}s until reset at ${this.resetAt.toISOString()}`,
      );
      await this.sleep(waitMs);
      return;
    }

    console.error(
      `[rate-limiter] Rate limit approaching threshold (${this.remaining} remaining). ` +
        `Resets at ${this.resetAt.toISOString()}`,
    );
  }

  getStatus(): RateLimitStatus {
    return {
      remaining: this.remaining,
      resetAt: this.resetAt,
      isLow: this.remaining <= this.warningThreshold,
      isCritical: this.remaining <= this.blockThreshold,
    };
  }
}
