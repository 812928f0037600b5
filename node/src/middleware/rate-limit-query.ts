// node/src/middleware/rate-limit-query.ts — query endpoint rate limiter
import rateLimit from 'express-rate-limit';

// POST /api/query: 20 requests per client per minute
export const queryRateLimiter = rateLimit({
  windowMs: 60 * 1000,
  limit: 20,
  standardHeaders: true,
  legacyHeaders: false,
});
