import { Request, Response, NextFunction, RequestHandler } from 'express';
import { RedisService } from '@/config/redis';
import logger from '@/config/logger';

/** Fixed-window counter; RedisService in production. */
export interface RateLimitCounter {
  incr(key: string): Promise<number>;
  expire(key: string, seconds: number): Promise<boolean>;
}

export interface RateLimitOptions {
  windowMs: number;
  maxRequests: number;
  keyGenerator?: (req: Request) => string;
  counter?: RateLimitCounter;
}

export function getRateLimitOptionsFromEnv(): RateLimitOptions {
  return {
    windowMs: parseInt(process.env.RATE_LIMIT_WINDOW_MS || '60000'), // 1 minute
    maxRequests: parseInt(process.env.RATE_LIMIT_MAX_REQUESTS || '100')
  };
}

export function createRateLimiter(options: RateLimitOptions): RequestHandler {
  const counter = options.counter ?? RedisService.getInstance();
  const windowSeconds = Math.ceil(options.windowMs / 1000);

  return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    const key = options.keyGenerator ?
      options.keyGenerator(req) :
      `rate_limit:${req.ip}`;

    let current: number;
    try {
      current = await counter.incr(key);
      if (current === 1) {
        await counter.expire(key, windowSeconds);
      }
    } catch (error) {
      // Redis недоступен: пропускаем запрос, но фиксируем в логах
      logger.error('Rate limiter error:', error);
      next();
      return;
    }

    res.set({
      'X-RateLimit-Limit': options.maxRequests.toString(),
      'X-RateLimit-Remaining': Math.max(0, options.maxRequests - current).toString(),
    });

    if (current > options.maxRequests) {
      logger.warn('Rate limit exceeded', {
        ip: req.ip,
        path: req.path,
        current
      });

      res.set('Retry-After', windowSeconds.toString());
      res.status(429).json({
        success: false,
        error: {
          code: 'RATE_LIMIT_EXCEEDED',
          message: 'Too many requests. Please try again later.'
        },
        timestamp: new Date()
      });
      return;
    }

    next();
  };
}
