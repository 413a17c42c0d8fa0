import type { Request, Response, NextFunction, RequestHandler } from 'express';
import {
  RateLimiterAbstract,
  RateLimiterMemory,
  RateLimiterRedis,
  RateLimiterRes
} from 'rate-limiter-flexible';
import { createClient } from 'redis';
import { Logger } from '../utils/Logger';

export interface RateLimitOptions {
  points: number;
  duration: number;
  redisUrl?: string;
}

export interface RateLimit {
  middleware: RequestHandler;
  close(): Promise<void>;
}

const logger = new Logger('RateLimitMiddleware');

/** Per-IP limiter; Redis-backed when a URL is configured so limits hold across instances. */
export const createRateLimit = (options: RateLimitOptions): RateLimit => {
  let limiter: RateLimiterAbstract;
  let close = async (): Promise<void> => {};

  if (options.redisUrl) {
    const redis = createClient({ url: options.redisUrl });
    redis.on('error', (error) => logger.error('Redis rate limiter error:', error));
    redis.connect().catch((error: unknown) => logger.error('Failed to connect rate limiter to Redis:', error));

    limiter = new RateLimiterRedis({
      storeClient: redis,
      useRedisPackage: true,
      keyPrefix: 'gradient_coordinator_rate_limit',
      points: options.points,
      duration: options.duration
    });
    close = async () => {
      await redis.quit();
    };
  } else {
    limiter = new RateLimiterMemory({
      keyPrefix: 'gradient_coordinator_rate_limit',
      points: options.points,
      duration: options.duration
    });
  }

  const middleware = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const key = req.ip || 'unknown';
      await limiter.consume(key);
      next();
    } catch (rejection: unknown) {
      if (!(rejection instanceof RateLimiterRes)) {
        next(rejection);
        return;
      }
      const secs = Math.round(rejection.msBeforeNext / 1000) || 1;
      res.set('Retry-After', String(secs));
      res.status(429).json({
        success: false,
        error: 'Too many requests',
        code: 'RATE_LIMITED',
        retryAfter: secs,
        timestamp: new Date()
      });
    }
  };

  return {
    middleware: (req, res, next) => {
      middleware(req, res, next).catch(next);
    },
    close
  };
};
