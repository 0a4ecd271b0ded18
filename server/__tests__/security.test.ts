import { describe, it, expect, vi, beforeEach, type Mock } from "vitest";
import type { Request, Response } from "express";
import { addSecurityHeaders, createQueryRateLimit, rateLimitKey, type RateLimitEntry } from "../middleware/security";
import { RateLimitError } from "../utils/errorHandler";

describe("Security Middleware", () => {
  let mockRes: Partial<Response>;
  let mockNext: Mock<(err?: unknown) => void>;

  beforeEach(() => {
    mockRes = {
      setHeader: vi.fn(),
      status: vi.fn().mockReturnThis(),
      json: vi.fn(),
      set: vi.fn(),
    };
    mockNext = vi.fn<(err?: unknown) => void>();
  });

  function request(body: unknown, ip = "10.0.0.1"): Request {
    const req: Partial<Request> = { body, ip };
    return req as Request;
  }

  describe("addSecurityHeaders", () => {
    it("should add all required security headers", () => {
      addSecurityHeaders(request({}), mockRes as Response, mockNext);

      expect(mockRes.setHeader).toHaveBeenCalledWith("X-Frame-Options", "DENY");
      expect(mockRes.setHeader).toHaveBeenCalledWith("X-Content-Type-Options", "nosniff");
      expect(mockRes.setHeader).toHaveBeenCalledWith("Referrer-Policy", "no-referrer");
      expect(mockRes.setHeader).toHaveBeenCalledWith("Content-Security-Policy", "default-src 'none'; frame-ancestors 'none'");
      expect(mockRes.setHeader).toHaveBeenCalledWith("Cache-Control", "no-store");
      expect(mockNext).toHaveBeenCalledWith();
    });
  });

  describe("rateLimitKey", () => {
    it("prefers the caller id from the body", () => {
      expect(rateLimitKey(request({ callerId: "caller-1" }))).toBe("caller:caller-1");
    });

    it("falls back to the client IP", () => {
      expect(rateLimitKey(request({ question: "q" }))).toBe("ip:10.0.0.1");
      expect(rateLimitKey(request(undefined))).toBe("ip:10.0.0.1");
    });
  });

  describe("createQueryRateLimit", () => {
    it("allows requests up to the limit", () => {
      const limiter = createQueryRateLimit({ maxRequests: 2, now: () => 1_000 });

      limiter(request({ callerId: "a" }), mockRes as Response, mockNext);
      limiter(request({ callerId: "a" }), mockRes as Response, mockNext);

      expect(mockNext).toHaveBeenCalledTimes(2);
      expect(mockNext).toHaveBeenNthCalledWith(2);
    });

    it("rejects the request over the limit with Retry-After seconds", () => {
      const limiter = createQueryRateLimit({ maxRequests: 1, windowMs: 60_000, now: () => 10_000 });

      limiter(request({ callerId: "a" }), mockRes as Response, mockNext);
      limiter(request({ callerId: "a" }), mockRes as Response, mockNext);

      const error = mockNext.mock.calls[1][0];
      expect(error).toBeInstanceOf(RateLimitError);
      expect(error instanceof RateLimitError && error.retryAfterSeconds).toBe(60);
    });

    it("counts callers separately", () => {
      const limiter = createQueryRateLimit({ maxRequests: 1, now: () => 0 });

      limiter(request({ callerId: "a" }), mockRes as Response, mockNext);
      limiter(request({ callerId: "b" }), mockRes as Response, mockNext);

      expect(mockNext).toHaveBeenNthCalledWith(1);
      expect(mockNext).toHaveBeenNthCalledWith(2);
    });

    it("opens a new window after the old one expires", () => {
      let clock = 0;
      const limiter = createQueryRateLimit({ maxRequests: 1, windowMs: 1_000, now: () => clock });

      limiter(request({ callerId: "a" }), mockRes as Response, mockNext);
      clock = 1_000;
      limiter(request({ callerId: "a" }), mockRes as Response, mockNext);

      expect(mockNext).toHaveBeenNthCalledWith(2);
    });

    it("drops callers whose window has expired", () => {
      let clock = 0;
      const attempts = new Map<string, RateLimitEntry>();
      const limiter = createQueryRateLimit({ maxRequests: 5, windowMs: 1_000, now: () => clock, attempts });

      limiter(request({ callerId: "a" }), mockRes as Response, mockNext);
      clock = 900;
      limiter(request({ callerId: "b" }), mockRes as Response, mockNext);
      clock = 1_200;
      limiter(request({ callerId: "c" }), mockRes as Response, mockNext);

      expect(Array.from(attempts.keys())).toEqual(["caller:b", "caller:c"]);
      expect(attempts.get("caller:b")).toEqual({ count: 1, resetTime: 1_900 });
    });
  });
});
