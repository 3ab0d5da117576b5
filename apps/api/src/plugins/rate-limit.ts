import { type FastifyRequest, type FastifyReply } from 'fastify';
import { AppError, ErrorCode, createLogger } from '@gatehouse/shared';

const logger = createLogger({ name: 'api:rate-limit' });

interface RateLimitBucket {
  count: number;
  resetAt: number;
}

export interface RateLimitOptions {
  windowMs: number;
  maxRequests: number;
}

/**
 * In-memory fixed-window limiter keyed by client IP. Buckets are per process; several API
 * instances each count separately.
 */
export function createRateLimiter(opts: RateLimitOptions) {
  const buckets = new Map<string, RateLimitBucket>();

  setInterval(() => {
    const now = Date.now();
    for (const [key, bucket] of buckets) {
      if (bucket.resetAt <= now) {
        buckets.delete(key);
      }
    }
  }, opts.windowMs).unref();

  return async function rateLimit(request: FastifyRequest, reply: FastifyReply) {
    const key = request.ip || 'unknown';
    const now = Date.now();

    let bucket = buckets.get(key);
    if (!bucket || bucket.resetAt <= now) {
      bucket = { count: 0, resetAt: now + opts.windowMs };
      buckets.set(key, bucket);
    }

    bucket.count++;
    if (bucket.count > opts.maxRequests) {
      logger.warn({ requestId: request.id, url: request.url }, 'Rate limit exceeded');
      reply.header('retry-after', String(Math.ceil((bucket.resetAt - now) / 1000)));
      throw new AppError(ErrorCode.RATE_LIMITED, 'Too many requests, please try again later');
    }
  };
}
