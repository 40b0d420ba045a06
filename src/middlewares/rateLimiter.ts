import type { MiddlewareHandler } from "hono";
import { logger } from "../utils/logger";

/** The two Redis commands the limiter needs; an ioredis client satisfies it. */
export interface RateLimitCounter {
  incr(key: string): Promise<number>;
  pexpire(key: string, milliseconds: number): Promise<number>;
}

interface RateLimitConfig {
  redis: RateLimitCounter;
  windowMs: number;
  max: number;
  keyPrefix?: string;
}

// Fixed-window counter per client address, shared across instances through Redis.
export const rateLimiter = (config: RateLimitConfig): MiddlewareHandler => {
  const { redis, windowMs, max, keyPrefix = "rl" } = config;

  return async (c, next) => {
    const ip = c.req.header("x-forwarded-for") ?? "unknown";
    const key = `${keyPrefix}:${ip}`;

    let count = 0;
    try {
      count = await redis.incr(key);
      if (count === 1) {
        await redis.pexpire(key, windowMs);
      }
    } catch (err) {
      // Fail open: Redis being down must not block transfers
      logger.error({ err }, "Rate limiter error");
      count = 0;
    }

    if (count > max) {
      logger.warn({ ip, key }, "Rate limit exceeded");
      return c.json({ error: "Too many requests", code: "RATE_LIMITED" }, 429);
    }

    await next();
  };
};
