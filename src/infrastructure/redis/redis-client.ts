import { Redis } from 'ioredis';
import type { Logger } from 'pino';

/**
 * Opens the shared ioredis connection.
 *
 * Connects eagerly so startup fails fast when Redis is unreachable.
 */
export async function createRedisClient(redisUrl: string, log: Logger): Promise<Redis> {
  const redis = new Redis(redisUrl, {
    maxRetriesPerRequest: null, // required for streams (no auto-fail)
    enableReadyCheck: true,
    lazyConnect: true,
  });

  await redis.connect();
  log.info('Redis connected');
  return redis;
}
