import type { RequestHandler } from 'express';
import rateLimit from 'express-rate-limit';

type RateLimiterOptions = {
  enabled: boolean;
  windowMs: number;
  limit: number;
};

const passThrough: RequestHandler = (_req, _res, next) => next();

// In-memory store, keyed by client IP. Multi-instance deployments need a shared store.
export const createRateLimiter = ({ enabled, windowMs, limit }: RateLimiterOptions): RequestHandler => {
  if (!enabled) return passThrough;

  return rateLimit({
    windowMs,
    limit,
    standardHeaders: true,
    legacyHeaders: false,
    message: { success: false, message: 'too many requests, try again later' },
  });
};
