// src/rateLimiters/generalRateLimiter.ts

import { AppConfig } from 'App/config/config';
import { Request, RequestHandler } from 'express';
import rateLimit from 'express-rate-limit';

const WINDOW_MS = 15 * 60 * 1000; // 15 minutes

export interface RateLimiters {
  /** POST /authenticate: password guessing is the thing to slow down. */
  auth: RequestHandler;
  /** Everything else. Snapshot polling at 1 Hz stays well below it. */
  general: RequestHandler;
}

const limiter = (max: number, message: string): RequestHandler =>
  rateLimit({
    windowMs: WINDOW_MS,
    max,
    keyGenerator: (req: Request) => req.ip || 'unknown',
    standardHeaders: true,
    legacyHeaders: false,
    message: { code: 'TOO_MANY_REQUESTS', message },
  });

/** Per-IP limiters, sized from AUTH_RATE_LIMIT and RATE_LIMIT. */
export const createRateLimiters = (
  config: Pick<AppConfig, 'authRateLimit' | 'rateLimit'>,
): RateLimiters => ({
  auth: limiter(
    config.authRateLimit,
    'Too many authentication attempts, please try again later.',
  ),
  general: limiter(config.rateLimit, 'Too many requests, please try again later.'),
});
