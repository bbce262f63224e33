/**
 * Rate Limiters
 *
 * Division generation is CPU-bound, so it gets its own per-IP limit.
 */
import rateLimit from 'express-rate-limit';

export const generateLimiter = rateLimit({
  windowMs: 60 * 1000, // 1 minute
  max: 30, // 30 generations per minute per IP
  standardHeaders: 'draft-7',
  legacyHeaders: false,
  message: { error: 'Too many division requests, please try again later' },
});
