import Redis from "ioredis";
import { logger } from "../utils/logger";

export function createRedis(redisUrl: string): Redis {
  const redis = new Redis(redisUrl, {
    maxRetriesPerRequest: 3,
  });

  redis.on("connect", () => {
    logger.info("Connected to Redis");
  });

  redis.on("error", (err) => {
    logger.error(err, "Redis error");
  });

  return redis;
}
