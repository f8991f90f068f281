import rateLimit from 'express-rate-limit';

/**
 * General API rate limiter (60 requests per minute per client).
 * Uses in-memory store (resets on server restart).
 */
export function apiRateLimiter(max = 60) {
  return rateLimit({
    windowMs: 60 * 1000,
    max,
    message: { code: 'RATE_LIMITED', message: 'Too many requests, please try again later.' },
    standardHeaders: true,
    legacyHeaders: false,
  });
}
