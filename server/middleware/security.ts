/**
 * Security Middleware
 *
 * Security headers for every response and a per-caller rate limit on the
 * query endpoints.
 */

import type { NextFunction, Request, RequestHandler, Response } from "express";
import { RATE_LIMIT_CONSTANTS } from "../config/constants";
import { RateLimitError } from "../utils/errorHandler";
import { logWarn } from "../utils/logger";

/**
 * Security headers middleware.
 * The API serves JSON only, so the content policy allows nothing else.
 */
export function addSecurityHeaders(_req: Request, res: Response, next: NextFunction) {
  res.setHeader("X-Frame-Options", "DENY");
  res.setHeader("X-Content-Type-Options", "nosniff");
  res.setHeader("Referrer-Policy", "no-referrer");
  res.setHeader("Content-Security-Policy", "default-src 'none'; frame-ancestors 'none'");
  res.setHeader("Cache-Control", "no-store");
  next();
}

export type RateLimitEntry = { count: number; resetTime: number };

export type QueryRateLimitOptions = {
  maxRequests: number;
  windowMs?: number;
  now?: () => number;
  /** Per-caller windows; a fresh map when omitted. */
  attempts?: Map<string, RateLimitEntry>;
};

/**
 * Caller key: the callerId in the body when present, else the client IP.
 */
export function rateLimitKey(req: Request): string {
  const body: unknown = req.body;
  if (typeof body === "object" && body !== null && "callerId" in body && typeof body.callerId === "string" && body.callerId) {
    return `caller:${body.callerId}`;
  }
  return `ip:${req.ip || "unknown"}`;
}

/**
 * Fixed-window limiter. Over the limit the request fails with RateLimitError
 * carrying the seconds until the window resets. Expired windows are swept at
 * most once per window length.
 */
export function createQueryRateLimit(options: QueryRateLimitOptions): RequestHandler {
  const windowMs = options.windowMs ?? RATE_LIMIT_CONSTANTS.QUERY_WINDOW_MS;
  const now = options.now ?? Date.now;
  const attempts = options.attempts ?? new Map<string, RateLimitEntry>();
  let lastSweep = now();

  const sweep = (current: number) => {
    for (const [key, entry] of attempts) {
      if (current >= entry.resetTime) attempts.delete(key);
    }
    lastSweep = current;
  };

  return (req: Request, _res: Response, next: NextFunction) => {
    const key = rateLimitKey(req);
    const current = now();
    if (current - lastSweep >= windowMs) {
      sweep(current);
    }
    const entry = attempts.get(key);

    if (!entry || current >= entry.resetTime) {
      attempts.set(key, { count: 1, resetTime: current + windowMs });
      return next();
    }

    if (entry.count >= options.maxRequests) {
      const retryAfter = Math.ceil((entry.resetTime - current) / 1000);
      logWarn(`[Security] Rate limit exceeded for ${key}`, { retryAfter });
      return next(new RateLimitError("Too many queries, please slow down", retryAfter));
    }

    entry.count++;
    next();
  };
}
