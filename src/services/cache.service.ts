import { redis } from '../config/redis';
import { VehicleListing } from '../types/capabilities';
import { logger } from '../utils/logger';
import { errorMessage } from '../utils/errors';

const KEY_PREFIX = 'search:';

function isListing(value: unknown): value is VehicleListing {
  if (typeof value !== 'object' || value === null) return false;
  return (
    typeof Reflect.get(value, 'id') === 'string' &&
    typeof Reflect.get(value, 'make') === 'string' &&
    typeof Reflect.get(value, 'model') === 'string' &&
    typeof Reflect.get(value, 'year') === 'number' &&
    typeof Reflect.get(value, 'price') === 'number'
  );
}

/** Redis cache for search results. Cache faults are logged and treated as misses. */
export class SearchCacheService {
  constructor(private readonly ttlSeconds: number) {}

  async get(key: string): Promise<VehicleListing[] | null> {
    if (this.ttlSeconds === 0) return null;
    try {
      const data = await redis.get(`${KEY_PREFIX}${key}`);
      if (!data) return null;
      const parsed: unknown = JSON.parse(data);
      return Array.isArray(parsed) && parsed.every(isListing) ? parsed : null;
    } catch (error) {
      logger.warn('Cache get failed', { key, error: errorMessage(error) });
      return null;
    }
  }

  async set(key: string, listings: VehicleListing[]): Promise<void> {
    if (this.ttlSeconds === 0) return;
    try {
      await redis.set(`${KEY_PREFIX}${key}`, JSON.stringify(listings), { EX: this.ttlSeconds });
    } catch (error) {
      logger.warn('Cache set failed', { key, error: errorMessage(error) });
    }
  }
}
