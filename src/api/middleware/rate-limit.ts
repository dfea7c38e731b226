import { Request, Response, NextFunction, RequestHandler } from 'express';

/**
 * Simple in-memory rate limiter
 * Fixed window per client IP; a backup to rate limiting at the proxy
 */

interface RateLimitEntry {
  count: number;
  resetTime: number;
}

export interface RateLimitOptions {
  windowMs: number;
  maxRequests: number;
  now?: () => number;
}

// req.ip honours the app's `trust proxy` hops, so client-set
// X-Forwarded-For entries beyond them are ignored
function clientIp(req: Request): string {
  return req.ip || req.socket.remoteAddress || 'unknown';
}

/**
 * Rate limiting middleware
 * Tracks requests per IP and returns 429 if limit exceeded
 */
export function createRateLimiter(options: RateLimitOptions): RequestHandler {
  const store = new Map<string, RateLimitEntry>();
  const now = options.now ?? Date.now;
  let nextSweep = now() + options.windowMs;

  return (req: Request, res: Response, next: NextFunction): void => {
    const current = now();

    // Expired entries are dropped lazily, at most once per window
    if (current > nextSweep) {
      for (const [key, entry] of store.entries()) {
        if (current > entry.resetTime) store.delete(key);
      }
      nextSweep = current + options.windowMs;
    }

    const ip = clientIp(req);
    const entry = store.get(ip);

    if (!entry || current > entry.resetTime) {
      store.set(ip, { count: 1, resetTime: current + options.windowMs });
      next();
      return;
    }

    if (entry.count >= options.maxRequests) {
      const retryAfter = Math.ceil((entry.resetTime - current) / 1000);
      res.set('Retry-After', retryAfter.toString());
      res.status(429).json({
        error: 'Too many requests, please try again later',
        code: 'RATE_LIMIT_EXCEEDED',
        retryAfter,
      });
      return;
    }

    entry.count++;
    next();
  };
}
