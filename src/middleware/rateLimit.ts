import { rateLimit } from 'express-rate-limit';
import { env } from '../config/env.js';

// An object message goes through res.json, so the 429 keeps the response envelope.
const rateLimitedMessage = {
  error: { code: 'RATE_LIMITED', message: 'Too many requests, please try again later.' }
};

export const apiRateLimit = rateLimit({
  windowMs: 15 * 60 * 1000,
  limit: env.RATE_LIMIT_MAX,
  standardHeaders: true,
  legacyHeaders: true,
  message: rateLimitedMessage
});

// Each assessment fans out to two upstream calls.
export const assessmentRateLimit = rateLimit({
  windowMs: 60 * 1000,
  limit: 30,
  standardHeaders: true,
  legacyHeaders: true,
  message: rateLimitedMessage
});
