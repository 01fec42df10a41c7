/**
 * Redis connection settings for the job store.
 */

import Redis, { type RedisOptions } from "ioredis";
import { createLogger } from "../utils/logger";

const logger = createLogger("Redis");

export function getRedisConfig(redisUrl: string): RedisOptions {
  const url = new URL(redisUrl);
  return {
    host: url.hostname,
    port: parseInt(url.port) || 6379,
    password: url.password || process.env.REDIS_PASSWORD || undefined,
    username: url.username || undefined,
    db: parseInt(url.pathname?.slice(1) || "0") || 0,
    tls: url.protocol === "rediss:" ? {} : undefined,
    maxRetriesPerRequest: 3,
    retryStrategy: (times: number) => {
      if (times > 10) {
        logger.error("Redis connection failed after 10 retries");
        return null;
      }
      const delay = Math.min(times * 200, 5000);
      logger.warn(`Redis reconnecting in ${delay}ms (attempt ${times})`);
      return delay;
    },
    reconnectOnError: (err: Error) => err.message.includes("READONLY"),
    enableReadyCheck: true,
    lazyConnect: false,
    connectTimeout: 10000,
    commandTimeout: 5000,
  };
}

export function createRedisClient(redisUrl: string): Redis {
  const client = new Redis(getRedisConfig(redisUrl));

  client.on("ready", () => {
    logger.info("Redis ready");
  });

  client.on("error", (err: Error) => {
    logger.error("Redis error", { error: err.message });
  });

  client.on("close", () => {
    logger.warn("Redis connection closed");
  });

  return client;
}

export async function closeRedisClient(client: Redis): Promise<void> {
  if (client.status === "end") return;
  await client.quit();
  logger.info("Redis connection closed");
}
