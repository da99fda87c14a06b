/**
 * Rate Limiter
 *
 * Token bucket shared by the batch workers in front of every page fetch.
 * Waiters are served one at a time in arrival order, and each takes a
 * single token, so the bucket never goes below zero however many
 * workers are waiting.
 */
import config from "../config";
import { logger } from "../monitoring/logger";

export class RateLimiter {
  private tokens: number;
  private readonly maxTokens: number;
  private readonly refillRate: number; // tokens per ms
  private lastRefill: number;
  private queue: Promise<void> = Promise.resolve();

  constructor(
    maxRequestsPerWindow: number = config.rateLimitMax,
    windowMs: number = config.rateLimitDurationMs
  ) {
    this.maxTokens = maxRequestsPerWindow;
    this.tokens = maxRequestsPerWindow;
    this.refillRate = maxRequestsPerWindow / windowMs;
    this.lastRefill = Date.now();
  }

  /**
   * Wait for this caller's turn and take one token.
   * Returns the time waited in ms.
   */
  async waitForToken(): Promise<number> {
    const startedAt = Date.now();
    const turn = this.queue.then(() => this.takeToken());
    this.queue = turn;
    await turn;
    return Date.now() - startedAt;
  }

  private async takeToken(): Promise<void> {
    this.refill();

    while (this.tokens < 1) {
      const waitMs = Math.ceil((1 - this.tokens) / this.refillRate);
      logger.debug({ waitMs }, "Rate limited, waiting for token");
      await new Promise((resolve) => setTimeout(resolve, waitMs));
      this.refill();
    }

    this.tokens -= 1;
  }

  private refill(): void {
    const now = Date.now();
    const elapsed = now - this.lastRefill;
    this.tokens = Math.min(this.maxTokens, this.tokens + elapsed * this.refillRate);
    this.lastRefill = now;
  }
}
