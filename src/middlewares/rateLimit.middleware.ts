import { Response, NextFunction } from 'express';
import { AuthRequest } from '../types/request.types';
import { logger } from '../utils/logging';
import { ResponseHandler } from '../utils/response';

interface RateLimitEntry {
  count: number;
  resetTime: number;
}

export interface RateLimitOptions {
  windowMs: number;
  maxRequests: number;
  message?: string;
  enabled?: boolean;
  now?: () => number;
  // Shared bucket for every path under a router; defaults to the request path
  keyPrefix?: string;
}

/**
 * Get client identifier for rate limiting: the user when authenticated,
 * otherwise the IP address
 */
const getClientId = (req: AuthRequest): string => {
  return req.user ? `user:${req.user.id}` : req.ip || 'unknown';
};

/**
 * Fixed-window in-memory limiter. Each call gets its own store; expired
 * entries are dropped when the store is next touched.
 */
export const rateLimit = ({
  windowMs,
  maxRequests,
  message,
  enabled = true,
  now = Date.now,
  keyPrefix,
}: RateLimitOptions) => {
  const store = new Map<string, RateLimitEntry>();
  let nextSweep = 0;

  const sweep = (current: number) => {
    if (current < nextSweep) {
      return;
    }
    for (const [key, entry] of store) {
      if (entry.resetTime <= current) {
        store.delete(key);
      }
    }
    nextSweep = current + windowMs;
  };

  return (req: AuthRequest, res: Response, next: NextFunction) => {
    if (!enabled) {
      return next();
    }

    const current = now();
    sweep(current);

    const clientId = getClientId(req);
    const key = `${keyPrefix ?? `${req.baseUrl}${req.path}`}:${clientId}`;

    let entry = store.get(key);
    if (!entry || entry.resetTime <= current) {
      entry = { count: 0, resetTime: current + windowMs };
      store.set(key, entry);
    }

    entry.count++;

    res.setHeader('X-RateLimit-Limit', maxRequests.toString());
    res.setHeader('X-RateLimit-Remaining', Math.max(0, maxRequests - entry.count).toString());
    res.setHeader('X-RateLimit-Reset', new Date(entry.resetTime).toISOString());

    if (entry.count > maxRequests) {
      const retryAfter = Math.ceil((entry.resetTime - current) / 1000);

      logger.warn('[Rate Limit Exceeded]', {
        clientId,
        path: req.originalUrl,
        count: entry.count,
        limit: maxRequests,
      });

      return ResponseHandler.tooManyRequests(
        res,
        message || `Too many requests. Try again in ${retryAfter} seconds.`,
        retryAfter
      );
    }

    next();
  };
};

/**
 * Limiters used by the routers. Built per app so tests get fresh stores.
 */
export const createRateLimiters = (enabled: boolean) => ({
  // /auth/me and /auth/avatar: 1 request per 20 seconds
  profile: rateLimit({ windowMs: 20 * 1000, maxRequests: 1, enabled }),

  // contact endpoints: 10 requests per minute
  contacts: rateLimit({ windowMs: 60 * 1000, maxRequests: 10, enabled, keyPrefix: 'contacts' }),

  // login/register attempts: 5 per 15 minutes
  auth: rateLimit({
    windowMs: 15 * 60 * 1000,
    maxRequests: 5,
    message: 'Too many login attempts. Try again in 15 minutes.',
    enabled,
  }),
});

export type RateLimiters = ReturnType<typeof createRateLimiters>;
