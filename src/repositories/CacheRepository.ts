import { Redis } from 'ioredis';
import { RecommendationResponse } from '../types/models';
import { validateRecommendationResponse } from '../models/validation';

export interface RecommendationCacheKey {
  datasetVersion: number;
  likedItem: string;
  topK: number;
  boostFactor: number;
}

/**
 * CacheRepository handles Redis caching of recommendation responses.
 * Without a client every lookup is a miss and every write is skipped.
 */
export class CacheRepository {
  private readonly RECOMMENDATION_TTL: number;

  constructor(private redis: Redis | null, ttlSeconds: number = 1800) {
    this.RECOMMENDATION_TTL = ttlSeconds;
  }

  get isEnabled(): boolean {
    return this.redis !== null;
  }

  /**
   * Cache a recommendation response
   */
  async cacheRecommendation(key: RecommendationCacheKey, response: RecommendationResponse): Promise<void> {
    if (!this.redis) return;
    try {
      await this.redis.setex(this.getRecommendationKey(key), this.RECOMMENDATION_TTL, JSON.stringify(response));
    } catch (error) {
      console.error('❌ Failed to cache recommendation:', error);
      // Don't throw - caching failures shouldn't break the request
    }
  }

  /**
   * Get a cached recommendation response
   */
  async getCachedRecommendation(key: RecommendationCacheKey): Promise<RecommendationResponse | null> {
    if (!this.redis) return null;
    try {
      const cached = await this.redis.get(this.getRecommendationKey(key));
      if (!cached) return null;

      const { value, error } = validateRecommendationResponse(JSON.parse(cached));
      if (error || !value) {
        console.error('❌ Discarding malformed cached recommendation:', error?.message);
        return null;
      }
      return value;
    } catch (error) {
      console.error('❌ Failed to get cached recommendation:', error);
      return null;
    }
  }

  /**
   * Drop every cached recommendation, whatever dataset version produced it
   */
  async clearRecommendations(): Promise<number> {
    if (!this.redis) return 0;
    try {
      const keys = await this.redis.keys('recommendation:*');
      if (keys.length === 0) return 0;
      return await this.redis.del(...keys);
    } catch (error) {
      console.error('❌ Failed to clear recommendation cache:', error);
      return 0;
    }
  }

  // Private helper methods
  private getRecommendationKey(key: RecommendationCacheKey): string {
    return `recommendation:v${key.datasetVersion}:${encodeURIComponent(key.likedItem)}:${key.topK}:${key.boostFactor}`;
  }
}
