import type { NextFunction, Request, RequestHandler, Response } from 'express';
import { fail, logger } from 'saga-messaging';
import { policyForPath, RateLimiterRegistry } from '../../rateLimit/policies';

/** `user:<id>` from x-user-id, else `ip:<address>` (first x-forwarded-for hop first). */
export function identityOf(req: Request): string {
  const userId = req.header('x-user-id')?.trim();
  if (userId) return `user:${userId}`;
  const forwarded = req.header('x-forwarded-for')?.split(',')[0]?.trim();
  return `ip:${forwarded || req.ip || 'unknown'}`;
}

export function rateLimit(registry: RateLimiterRegistry): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const policy = policyForPath(req.path);
    const identity = identityOf(req);
    void registry.acquire(policy, identity).then(
      (lease) => {
        if (lease.acquired) return next();
        const retryAfter = Math.max(1, Math.ceil(lease.retryAfterMs / 1000));
        logger.warn({ policy, identity, retryAfter }, '[Gateway] rate limit exceeded');
        res.setHeader('Retry-After', String(retryAfter));
        res.status(429).json(fail('Too many requests. Please try again later.', ['rate_limit_exceeded']));
      },
      (err: unknown) => next(err)
    );
  };
}
