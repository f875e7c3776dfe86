// node/src/middleware/rate-limit-query.ts — research and calculator rate limiters
import rateLimit from 'express-rate-limit';
import { createErrorResponse } from '@/utils/errorResponse';

// A research run holds the model for minutes; keep the per-IP budget small.
export const researchRateLimiter = rateLimit({
  windowMs: 60 * 1000, // 1 minute
  limit: 10,
  standardHeaders: true,
  legacyHeaders: false,
  message: createErrorResponse('Too many research requests, try again in a minute', undefined, 'RATE_LIMITED'),
});

export const calculateRateLimiter = rateLimit({
  windowMs: 60 * 1000,
  limit: 120,
  standardHeaders: true,
  legacyHeaders: false,
  message: createErrorResponse('Too many requests', undefined, 'RATE_LIMITED'),
});
