/**
 * Sliding Window Rate Limiter
 *
 * One timestamp window per client key, kept in process memory. The
 * redirect app constructs its own and shuts it down on exit.
 */

export interface RateLimiterOptions {
  /** Requests allowed per window */
  limit: number;
  windowMs: number;
  /** Background eviction period; 0 disables it (default: 5 minutes) */
  sweepIntervalMs?: number;
  now?: () => number;
}

export interface RateLimitDecision {
  allowed: boolean;
  limit: number;
  remaining: number;
  /** Milliseconds until the oldest request leaves the window; 0 when allowed */
  retryAfterMs: number;
}

const DEFAULT_SWEEP_INTERVAL_MS = 5 * 60 * 1000;

export class SlidingWindowRateLimiter {
  readonly limit: number;
  readonly windowMs: number;
  private readonly windows = new Map<string, number[]>();
  private readonly now: () => number;
  private sweepTimer: NodeJS.Timeout | null = null;

  constructor(options: RateLimiterOptions) {
    if (!Number.isInteger(options.limit) || options.limit < 1) {
      throw new RangeError(`Rate limit must be a positive integer, got ${options.limit}`);
    }
    if (options.windowMs <= 0) {
      throw new RangeError(`Rate limit window must be positive, got ${options.windowMs}`);
    }

    this.limit = options.limit;
    this.windowMs = options.windowMs;
    this.now = options.now ?? Date.now;

    const sweepIntervalMs = options.sweepIntervalMs ?? DEFAULT_SWEEP_INTERVAL_MS;
    if (sweepIntervalMs > 0) {
      this.sweepTimer = setInterval(() => this.sweep(), sweepIntervalMs);
      this.sweepTimer.unref();
    }
  }

  /** Keys currently tracked */
  get size(): number {
    return this.windows.size;
  }

  /**
   * Record a request for `key` if it fits in the window.
   */
  allow(key: string): RateLimitDecision {
    const now = this.now();
    const cutoff = now - this.windowMs;
    const recent = (this.windows.get(key) ?? []).filter((at) => at > cutoff);

    if (recent.length >= this.limit) {
      this.windows.set(key, recent);
      const oldest = recent[0] ?? now;
      return {
        allowed: false,
        limit: this.limit,
        remaining: 0,
        retryAfterMs: Math.max(0, oldest + this.windowMs - now),
      };
    }

    recent.push(now);
    this.windows.set(key, recent);
    return {
      allowed: true,
      limit: this.limit,
      remaining: this.limit - recent.length,
      retryAfterMs: 0,
    };
  }

  /**
   * Drop timestamps older than twice the window, and keys left empty.
   * Returns the number of keys removed.
   */
  sweep(): number {
    const cutoff = this.now() - this.windowMs * 2;
    let removed = 0;

    for (const [key, times] of this.windows) {
      const kept = times.filter((at) => at > cutoff);
      if (kept.length === 0) {
        this.windows.delete(key);
        removed++;
      } else if (kept.length !== times.length) {
        this.windows.set(key, kept);
      }
    }

    return removed;
  }

  shutdown(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
    this.windows.clear();
  }
}

/**
 * Client key: the API key when one is presented, the address otherwise.
 */
export function rateLimitKey(apiKey: string | undefined, ip: string): string {
  return apiKey ? `api:${apiKey}` : `ip:${ip}`;
}
