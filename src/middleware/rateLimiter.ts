// src/middleware/rateLimiter.ts
import { Request, Response, NextFunction, RequestHandler } from "express";
import { sendError } from "./responseHelper";

interface RateLimitEntry {
  count: number;
  resetAt: number;
}

/**
 * Simple in-memory fixed-window rate limiter.
 */
export class RateLimiter {
  private store = new Map<string, RateLimitEntry>();

  constructor(cleanupEveryMs: number = 60000) {
    // Never keep the process alive just for cleanup
    setInterval(() => this.cleanup(), cleanupEveryMs).unref();
  }

  private cleanup() {
    const now = Date.now();
    for (const [key, entry] of this.store.entries()) {
      if (entry.resetAt < now) {
        this.store.delete(key);
      }
    }
  }

  check(
    key: string,
    windowMs: number,
    maxRequests: number,
    now: number = Date.now()
  ): { allowed: boolean; remaining: number; resetAt: number } {
    const entry = this.store.get(key);

    if (!entry || entry.resetAt < now) {
      // New window
      const resetAt = now + windowMs;
      this.store.set(key, { count: 1, resetAt });
      return { allowed: true, remaining: maxRequests - 1, resetAt };
    }

    if (entry.count >= maxRequests) {
      return { allowed: false, remaining: 0, resetAt: entry.resetAt };
    }

    entry.count++;
    return { allowed: true, remaining: maxRequests - entry.count, resetAt: entry.resetAt };
  }
}

export interface RateLimitOptions {
  windowMs: number;
  maxRequests: number;
  message?: string;
}

function clientKey(req: Request): string {
  // Use X-Forwarded-For for proxied requests, fallback to IP
  const forwarded = req.headers["x-forwarded-for"];
  const ip = Array.isArray(forwarded) ? forwarded[0] : forwarded?.split(",")[0]?.trim();
  return ip || req.ip || req.socket.remoteAddress || "unknown";
}

/**
 * Rate limiting middleware.
 * Limits requests per client IP (first X-Forwarded-For hop when proxied).
 */
export function rateLimitMiddleware(options: RateLimitOptions): RequestHandler {
  const { windowMs, maxRequests, message = "Too many requests, please try again later" } = options;
  const limiter = new RateLimiter(windowMs);

  return (req: Request, res: Response, next: NextFunction) => {
    const result = limiter.check(clientKey(req), windowMs, maxRequests);

    res.setHeader("X-RateLimit-Limit", maxRequests);
    res.setHeader("X-RateLimit-Remaining", result.remaining);
    res.setHeader("X-RateLimit-Reset", Math.ceil(result.resetAt / 1000));

    if (!result.allowed) {
      const retryAfter = Math.ceil((result.resetAt - Date.now()) / 1000);
      res.setHeader("Retry-After", retryAfter);
      sendError(res, message, 429, { retryAfter });
      return;
    }

    next();
  };
}
