import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { RATE_LIMIT_CONFIG } from '../config.js';

// ============================================================================
// SIMPLE IN-MEMORY RATE LIMITER
// No external dependencies, sliding window approach
// ============================================================================

export interface RateLimitOptions {
  windowMs: number;
  maxRequests: number;
  cleanupIntervalMs: number;
}

export type RateLimitDecision = { allowed: true } | { allowed: false; retryAfterSec: number };

export class SlidingWindowLimiter {
  private readonly requestStore = new Map<string, number[]>(); // caller or IP -> timestamps

  constructor(private readonly options: Pick<RateLimitOptions, 'windowMs' | 'maxRequests'>) {}

  hit(key: string, now: number): RateLimitDecision {
    const windowStart = now - this.options.windowMs;
    const recent = (this.requestStore.get(key) ?? []).filter(timestamp => timestamp > windowStart);

    if (recent.length >= this.options.maxRequests) {
      this.requestStore.set(key, recent);
      const retryAfterMs = recent[0] + this.options.windowMs - now;
      return { allowed: false, retryAfterSec: Math.ceil(retryAfterMs / 1000) };
    }

    recent.push(now);
    this.requestStore.set(key, recent);
    return { allowed: true };
  }

  /** Drop timestamps older than the window and keys left empty */
  cleanup(now: number): void {
    const cutoff = now - this.options.windowMs;
    for (const [key, timestamps] of this.requestStore) {
      const recent = timestamps.filter(timestamp => timestamp > cutoff);
      if (recent.length === 0) {
        this.requestStore.delete(key);
      } else {
        this.requestStore.set(key, recent);
      }
    }
  }

  get trackedKeys(): number {
    return this.requestStore.size;
  }
}

/**
 * Rate limiting middleware
 * Limits mutating requests per caller identity (or IP when anonymous)
 */
export function createRateLimiter(options: RateLimitOptions): RequestHandler {
  const limiter = new SlidingWindowLimiter(options);

  // Periodic cleanup of old entries to prevent memory leak
  const cleanup = setInterval(() => limiter.cleanup(Date.now()), options.cleanupIntervalMs);
  cleanup.unref();

  return (req: Request, res: Response, next: NextFunction): void => {
    const key = req.metadata?.caller || req.metadata?.ip_address || req.ip || 'unknown';
    const decision = limiter.hit(key, Date.now());

    if (!decision.allowed) {
      res.status(429).json({
        error: 'Too many requests',
        message: `Rate limit exceeded. Maximum ${options.maxRequests} requests per ${options.windowMs / 1000} seconds.`,
        retryAfter: decision.retryAfterSec,
      });
      return;
    }

    next();
  };
}

export const rateLimiter = createRateLimiter(RATE_LIMIT_CONFIG);
