/**
 * rateLimiter.ts
 * Rate limiting middleware for the generation endpoint
 */

import type { Request, RequestHandler, Response } from 'express';
import rateLimit from 'express-rate-limit';

import type { SecurityConfig } from '../config/schema.js';
import { logger } from '../utils/logger.js';

export interface RateLimitConfig {
  windowMs: number;
  maxRequests: number;
}

/**
 * Requests are keyed by client IP
 */
export function createRateLimiter(config: RateLimitConfig): RequestHandler {
  return rateLimit({
    windowMs: config.windowMs,
    max: config.maxRequests,
    standardHeaders: true, // Return rate limit info in the `RateLimit-*` headers
    legacyHeaders: false,
    handler: (req: Request, res: Response) => {
      logger.warn(`Rate limit exceeded for ${req.ip}`, {
        path: req.path,
        method: req.method,
      });

      res.status(429).json({
        error: 'Too many requests',
        message: 'Rate limit exceeded. Please try again later.',
        retryAfter: Math.ceil(config.windowMs / 1000),
      });
    },
    skip: (req: Request) => req.path === '/health',
  });
}

export function createGenerateRateLimiter(security: SecurityConfig): RequestHandler {
  return createRateLimiter({
    windowMs: security.rateLimitWindowMs,
    maxRequests: security.rateLimitMax,
  });
}
