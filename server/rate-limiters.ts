import rateLimit, { type Options } from "express-rate-limit";
import type { Request, Response } from "express";

interface RateLimitResponse {
  success: false;
  message: string;
  code: "RATE_LIMIT_EXCEEDED";
  retryAfter?: number;
}

const createRateLimitHandler = (message: string) => {
  return (_req: Request, res: Response): void => {
    const retryAfter = res.getHeader('Retry-After');
    const response: RateLimitResponse = {
      success: false,
      message,
      code: "RATE_LIMIT_EXCEEDED",
    };

    if (retryAfter) {
      response.retryAfter = typeof retryAfter === 'string' ? parseInt(retryAfter, 10) : Number(retryAfter);
    }

    res.status(429).json(response);
  };
};

const baseConfig: Partial<Options> = {
  standardHeaders: true,
  legacyHeaders: false,
  skipSuccessfulRequests: false,
};

export const generalApiLimiter = rateLimit({
  ...baseConfig,
  windowMs: 15 * 60 * 1000,
  max: 300,
  handler: createRateLimitHandler("Too many requests from this IP, please try again after 15 minutes"),
  skip: (req) => {
    return !req.originalUrl.startsWith('/api');
  }
});

export const searchQueryLimiter = rateLimit({
  ...baseConfig,
  windowMs: 15 * 60 * 1000,
  max: 150,
  handler: createRateLimitHandler("Too many search requests from this IP, please try again after 15 minutes"),
});

// Inquiries and test-drive bookings come from the public site
export const leadCreationLimiter = rateLimit({
  ...baseConfig,
  windowMs: 60 * 60 * 1000,
  max: 30,
  handler: createRateLimitHandler("Too many inquiry or test drive requests from this IP, please try again after 1 hour"),
  skipSuccessfulRequests: false,
});

export const writeLimiter = rateLimit({
  ...baseConfig,
  windowMs: 15 * 60 * 1000,
  max: 200,
  handler: createRateLimitHandler("Too many write requests from this IP, please try again after 15 minutes"),
});

export const transactionLimiter = rateLimit({
  ...baseConfig,
  windowMs: 15 * 60 * 1000,
  max: 100,
  handler: createRateLimitHandler("Too many sale or rental requests from this IP, please try again after 15 minutes"),
});

export const healthCheckLimiter = rateLimit({
  ...baseConfig,
  windowMs: 1 * 60 * 1000,
  max: 60,
  handler: createRateLimitHandler("Too many health check requests from this IP, please try again after 1 minute"),
});
