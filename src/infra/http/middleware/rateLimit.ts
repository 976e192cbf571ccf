import rateLimit from 'express-rate-limit';
import type { ErrorResponse } from './errorHandler.js';

export interface RateLimitOptions {
  windowMs: number;
  max: number;
}

/**
 * API rate limiter keyed by client IP.
 * Uses in-memory store (resets on server restart).
 */
export function createRateLimiter(options: RateLimitOptions) {
  return rateLimit({
    windowMs: options.windowMs,
    limit: options.max,
    standardHeaders: true,
    legacyHeaders: false,
    handler: (_req, res, _next, limiterOptions) => {
      const response: ErrorResponse = {
        code: 'TOO_MANY_REQUESTS',
        message: 'Too many requests, please try again later.',
      };
      res.status(limiterOptions.statusCode).json(response);
    },
  });
}
