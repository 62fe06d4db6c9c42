import type { NextFunction, Request, Response } from "express";

interface RateLimitWindow {
  count: number;
  resetAt: number;
}

export interface RateLimitOptions {
  windowMs: number;
  maxRequests: number;
}

const DEFAULT_LIMIT: RateLimitOptions = { windowMs: 10000, maxRequests: 5 };

/**
 * Fixed-window limiter keyed by client address and mount point, so every
 * route below the mount shares one budget per client.
 * Each call owns its window map; the sweep timer does not hold the process open.
 */
export function rateLimit(options: RateLimitOptions = DEFAULT_LIMIT) {
  const windows = new Map<string, RateLimitWindow>();

  const sweep = setInterval(() => {
    const now = Date.now();
    for (const [key, window] of windows.entries()) {
      if (now > window.resetAt) {
        windows.delete(key);
      }
    }
  }, 60000);
  sweep.unref();

  return (req: Request, res: Response, next: NextFunction): void => {
    const key = `${req.ip ?? "unknown"}:${req.baseUrl}`;
    const now = Date.now();

    let window = windows.get(key);

    if (!window || now > window.resetAt) {
      window = {
        count: 0,
        resetAt: now + options.windowMs,
      };
      windows.set(key, window);
    }

    window.count++;

    if (window.count > options.maxRequests) {
      const retryAfter = Math.ceil((window.resetAt - now) / 1000);
      res.set("Retry-After", retryAfter.toString());
      res.status(429).json({
        ok: false,
        error: { code: "RATE_LIMITED", message: "Too many requests" },
        retryAfter,
      });
      return;
    }

    next();
  };
}
