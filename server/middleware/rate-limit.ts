import type { Request, RequestHandler } from "express";

export type RateLimitOptions = {
  /** Requests allowed per window and client; 0 disables the limiter. */
  max: number;
  windowMs?: number;
  scope: string;
  keyGenerator?: (req: Request) => string;
  now?: () => number;
};

type RateLimitEntry = {
  count: number;
  resetAt: number;
};

const resolveClientKey = (req: Request): string => {
  const forwarded = req.headers["x-forwarded-for"];
  if (typeof forwarded === "string" && forwarded.length > 0) {
    return forwarded.split(",")[0]?.trim() || req.ip || "unknown";
  }
  return req.ip || "unknown";
};

export const createRateLimiter = (options: RateLimitOptions): RequestHandler => {
  const store = new Map<string, RateLimitEntry>();
  const windowMs = Math.max(1000, options.windowMs ?? 60_000);
  const max = Math.max(0, Math.floor(options.max));
  const keyFn = options.keyGenerator ?? resolveClientKey;
  const now = options.now ?? Date.now;

  const sweep = (at: number) => {
    for (const [key, entry] of store.entries()) {
      if (entry.resetAt <= at) {
        store.delete(key);
      }
    }
  };

  return (req, res, next) => {
    if (max <= 0) {
      next();
      return;
    }
    const at = now();
    if (store.size > 1024) sweep(at);
    const key = keyFn(req);
    const entry = store.get(key);
    if (!entry || entry.resetAt <= at) {
      store.set(key, { count: 1, resetAt: at + windowMs });
      res.setHeader("X-RateLimit-Limit", String(max));
      res.setHeader("X-RateLimit-Remaining", String(max - 1));
      next();
      return;
    }

    entry.count += 1;
    res.setHeader("X-RateLimit-Limit", String(max));
    res.setHeader("X-RateLimit-Remaining", String(Math.max(0, max - entry.count)));
    if (entry.count > max) {
      const retryAfterMs = Math.max(0, entry.resetAt - at);
      res.setHeader("Retry-After", String(Math.ceil(retryAfterMs / 1000)));
      res.status(429).json({
        error: "rate_limited",
        message: `Too many ${options.scope} requests. Please retry shortly.`,
        retryAfterMs,
      });
      return;
    }
    next();
  };
};
