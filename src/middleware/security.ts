import { Request, Response, NextFunction } from 'express';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import type { AppConfig } from '../config/config';

/**
 * Security headers. JSON-only API, so the CSP forbids everything.
 */
export const securityHeaders = helmet({
  contentSecurityPolicy: {
    useDefaults: false,
    directives: {
      defaultSrc: ["'none'"],
      frameAncestors: ["'none'"]
    }
  },
  frameguard: { action: 'deny' },
  referrerPolicy: { policy: 'no-referrer' },
  hsts: process.env.NODE_ENV === 'production'
});

/**
 * Texts are secrets: keep them out of every cache
 */
export const noStore = (req: Request, res: Response, next: NextFunction) => {
  res.setHeader('Cache-Control', 'no-cache, no-store, must-revalidate');
  res.setHeader('Pragma', 'no-cache');
  next();
};

/**
 * Per-IP rate limiting
 */
export const createRateLimiter = (rateLimiting: AppConfig['rateLimiting']) => rateLimit({
  windowMs: rateLimiting.windowMs,
  limit: rateLimiting.maxRequests,
  message: {
    error: 'Too many requests, please try again later'
  },
  standardHeaders: true,
  legacyHeaders: false
});
