import redisClient, { isRedisReady } from "../config/redis";

export const CACHE_TTL = {
  SHORT: 300, // 5 minutes
  LONG: 86400, // 24 hours (categories)
};

export const CACHE_KEYS = {
  categories: (offset: number, limit: number) =>
    `categories:list:${offset}:${limit}`,
  blacklist: (jti: string) => `blacklist:${jti}`,
};

export class CacheService {
  static async get<T>(key: string): Promise<T | null> {
    if (!isRedisReady()) return null;
    try {
      const data = await redisClient.get(key);
      return data ? JSON.parse(data) : null;
    } catch (error) {
      console.error(`Cache Get Error [${key}]:`, error);
      return null;
    }
  }

  static async set(
    key: string,
    value: unknown,
    ttl: number = CACHE_TTL.SHORT,
  ): Promise<void> {
    if (!isRedisReady()) return;
    try {
      await redisClient.set(key, JSON.stringify(value), {
        EX: ttl,
      });
    } catch (error) {
      console.error(`Cache Set Error [${key}]:`, error);
    }
  }

  static async deleteByPattern(pattern: string): Promise<void> {
    if (!isRedisReady()) return;
    try {
      const keys = await redisClient.keys(pattern);
      if (keys.length > 0) {
        await redisClient.del(keys);
      }
    } catch (error) {
      console.error(`Cache DeletePattern Error [${pattern}]:`, error);
    }
  }
}
