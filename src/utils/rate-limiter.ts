import type { SourceId } from '../adapters/types.js';
import { createChildLogger } from './logger.js';

const logger = createChildLogger('rate-limiter');

/**
 * Token bucket shared by every request one source makes. Callers that find
 * the bucket empty reserve the next token anyway, so concurrent requests are
 * released one interval apart in call order. A rate below one request per
 * second still allows a single request up front.
 */
export class RateLimiter {
  private tokens: number;
  private updatedAt: number;
  private readonly capacity: number;

  constructor(
    readonly source: SourceId,
    private readonly requestsPerSecond: number
  ) {
    if (!(requestsPerSecond > 0)) {
      throw new RangeError(`Rate for ${source} must be positive, got ${requestsPerSecond}`);
    }
    this.capacity = Math.max(1, requestsPerSecond);
    this.tokens = this.capacity;
    this.updatedAt = Date.now();
  }

  async acquire(): Promise<void> {
    const delay = this.reserve();
    if (delay <= 0) {
      return;
    }

    logger.debug({ source: this.source, delay }, 'Rate limited, waiting');
    await new Promise<void>((resolve) => setTimeout(resolve, delay));
  }

  /** Takes a token, possibly into debt, and returns how long the caller must wait in ms. */
  private reserve(): number {
    const now = Date.now();
    const refilled = ((now - this.updatedAt) / 1000) * this.requestsPerSecond;

    this.tokens = Math.min(this.capacity, this.tokens + refilled) - 1;
    this.updatedAt = now;

    return this.tokens >= 0 ? 0 : (-this.tokens / this.requestsPerSecond) * 1000;
  }
}

/** One limiter per source, created on first use. */
export class RateLimiterRegistry {
  private readonly limiters = new Map<SourceId, RateLimiter>();

  get(source: SourceId, requestsPerSecond: number): RateLimiter {
    const existing = this.limiters.get(source);
    if (existing) {
      return existing;
    }

    const limiter = new RateLimiter(source, requestsPerSecond);
    this.limiters.set(source, limiter);
    return limiter;
  }
}
