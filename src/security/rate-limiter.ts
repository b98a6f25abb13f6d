import { env } from '../config/env';
import { logger } from '../observability/logger';
import { rateLimitRejections } from '../observability/metrics';

export interface RateLimitResult {
  allowed: boolean;
  remaining: number;
  retryAfterMs: number;
}

export interface RateLimiterOptions {
  maxRequests: number;
  windowMs: number;
  /** Milliseconds since epoch */
  clock: () => number;
  cleanupIntervalMs: number;
}

/**
 * Sliding-log rate limiter keyed by client. A request is admitted while fewer than
 * maxRequests admitted timestamps fall inside the trailing window; rejections are not logged
 * into the window.
 */
export class RateLimiter {
  private readonly admitted = new Map<string, number[]>();
  private readonly options: RateLimiterOptions;
  private cleanupTimer: NodeJS.Timeout | null;

  constructor(options: Partial<RateLimiterOptions> = {}) {
    this.options = {
      maxRequests: options.maxRequests ?? env.rateLimit.maxRequests,
      windowMs: options.windowMs ?? env.rateLimit.windowSeconds * 1000,
      clock: options.clock ?? Date.now,
      cleanupIntervalMs: options.cleanupIntervalMs ?? 5 * 60 * 1000,
    };
    this.cleanupTimer = setInterval(() => this.cleanup(), this.options.cleanupIntervalMs);
    this.cleanupTimer.unref();
  }

  check(key: string): RateLimitResult {
    const { maxRequests, windowMs } = this.options;
    const now = this.options.clock();
    const recent = this.inWindow(key, now);

    if (recent.length >= maxRequests) {
      this.admitted.set(key, recent);
      const oldest = recent[0] ?? now;
      rateLimitRejections.inc();
      logger.warn({ key, count: recent.length, limit: maxRequests }, 'Rate limit exceeded');
      return { allowed: false, remaining: 0, retryAfterMs: Math.max(0, oldest + windowMs - now) };
    }

    recent.push(now);
    this.admitted.set(key, recent);
    return { allowed: true, remaining: maxRequests - recent.length, retryAfterMs: 0 };
  }

  /** Number of client keys currently tracked */
  get trackedKeys(): number {
    return this.admitted.size;
  }

  stop(): void {
    if (this.cleanupTimer) {
      clearInterval(this.cleanupTimer);
      this.cleanupTimer = null;
    }
  }

  /** Drop keys whose whole log has aged out of the window */
  cleanup(): void {
    const now = this.options.clock();
    for (const key of [...this.admitted.keys()]) {
      if (this.inWindow(key, now).length === 0) {
        this.admitted.delete(key);
      }
    }
  }

  private inWindow(key: string, now: number): number[] {
    const cutoff = now - this.options.windowMs;
    return (this.admitted.get(key) ?? []).filter((ts) => ts > cutoff);
  }
}
