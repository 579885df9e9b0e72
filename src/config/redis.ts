import Redis from 'ioredis';

let redisClient: Redis | null = null;

/**
 * Get or create the Redis client used for the recommendation cache.
 * Returns null when no Redis URL is configured.
 */
export function getRedisClient(redisUrl: string | undefined = process.env.REDIS_URL): Redis | null {
  if (redisClient) {
    return redisClient;
  }

  if (!redisUrl) {
    return null;
  }

  redisClient = new Redis(redisUrl, {
    enableReadyCheck: false,
    enableOfflineQueue: false,
    maxRetriesPerRequest: 1,
    lazyConnect: true
  });

  redisClient.on('error', (error) => {
    console.error('Redis connection error:', error);
  });

  redisClient.on('connect', () => {
    console.log('✅ Connected to Redis');
  });

  return redisClient;
}

/**
 * Close Redis client connection
 */
export async function closeRedisClient(): Promise<void> {
  if (redisClient) {
    await redisClient.quit();
    redisClient = null;
  }
}
