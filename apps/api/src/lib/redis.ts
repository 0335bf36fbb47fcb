import { Redis } from "ioredis";
import { getConfig } from "./config.js";
import { logger } from "./logger.js";

let _redis: Redis | null = null;

/**
 * Shared ioredis connection for BullMQ queues and workers.
 * `maxRetriesPerRequest` must be null: BullMQ workers block on Redis
 * commands and refuse connections that would retry them.
 */
export function getRedisClient(): Redis {
  if (!_redis) {
    _redis = new Redis(getConfig().redisUrl, {
      maxRetriesPerRequest: null,
      enableReadyCheck: true,
    });

    _redis.on("error", (err) => {
      logger.error({ err }, "[redis] connection error");
    });
  }

  return _redis;
}

export async function closeRedisClient(): Promise<void> {
  if (_redis) {
    await _redis.quit();
    _redis = null;
  }
}
