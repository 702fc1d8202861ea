import { Logger } from './logger';

export interface RateLimitConfig {
  maxRequests: number;
  windowMs: number;
}

export interface RateLimitResult {
  allowed: boolean;
  remaining: number;
  resetTime: Date;
  totalHits: number;
  /** Whole seconds until the window resets; 0 when allowed */
  retryAfterSeconds: number;
}

interface RequestTracker {
  count: number;
  resetTime: Date;
}

/**
 * Fixed-window limiter keyed by user id. Created once by the bot and
 * handed to whoever needs it.
 */
export class RateLimiter {
  private readonly store = new Map<string, RequestTracker>();
  private readonly logger: Logger;
  private readonly cleanupInterval: NodeJS.Timeout;

  constructor(
    private readonly config: RateLimitConfig,
    logger?: Logger,
  ) {
    this.logger = logger ?? new Logger();

    // Cleanup expired entries every 5 minutes
    this.cleanupInterval = setInterval(() => {
      this.cleanup();
    }, 5 * 60 * 1000);
    this.cleanupInterval.unref();
  }

  /**
   * Record a request and report whether it fits in the current window
   */
  public checkLimit(identifier: string): RateLimitResult {
    const now = new Date();
    let tracker = this.store.get(identifier);

    if (!tracker || tracker.resetTime <= now) {
      const resetTime = new Date(now.getTime() + this.config.windowMs);
      tracker = { count: 1, resetTime };
      this.store.set(identifier, tracker);

      return {
        allowed: true,
        remaining: this.config.maxRequests - 1,
        resetTime,
        totalHits: 1,
        retryAfterSeconds: 0,
      };
    }

    if (tracker.count >= this.config.maxRequests) {
      return {
        allowed: false,
        remaining: 0,
        resetTime: tracker.resetTime,
        totalHits: tracker.count,
        retryAfterSeconds: Math.max(1, Math.ceil((tracker.resetTime.getTime() - now.getTime()) / 1000)),
      };
    }

    tracker.count++;

    return {
      allowed: true,
      remaining: this.config.maxRequests - tracker.count,
      resetTime: tracker.resetTime,
      totalHits: tracker.count,
      retryAfterSeconds: 0,
    };
  }

  private cleanup(): void {
    const now = new Date();
    let cleaned = 0;

    for (const [key, tracker] of this.store.entries()) {
      if (tracker.resetTime <= now) {
        this.store.delete(key);
        cleaned++;
      }
    }

    if (cleaned > 0) {
      this.logger.debug(`Rate limiter cleanup: removed ${cleaned} expired entries`);
    }
  }

  public destroy(): void {
    clearInterval(this.cleanupInterval);
    this.store.clear();
  }
}
