import { RecordFilter, RecordStore, VehicleListing, VehicleSearchProvider } from '../types/capabilities';
import { SearchCriteria } from '../types/session';
import { SearchCacheService } from './cache.service';
import { logger } from '../utils/logger';

const DEFAULT_LIMIT = 5;

export function criteriaKey(criteria: SearchCriteria): string {
  return [
    criteria.make?.toLowerCase() ?? '*',
    criteria.model?.toLowerCase() ?? '*',
    criteria.minYear ?? '*',
    criteria.maxPrice ?? '*',
    criteria.limit ?? DEFAULT_LIMIT,
  ].join('|');
}

function dedupeKey(listing: VehicleListing): string {
  return [listing.make, listing.model, listing.year, listing.price, listing.location ?? '']
    .map((part) => String(part).trim().toLowerCase())
    .join('|');
}

/** Drops repeats of (make, model, year, price, location), case-insensitively, and sorts by price. */
export function dedupeListings(listings: VehicleListing[]): VehicleListing[] {
  const seen = new Set<string>();
  const unique: VehicleListing[] = [];

  for (const listing of listings) {
    const key = dedupeKey(listing);
    if (seen.has(key)) continue;
    seen.add(key);
    unique.push(listing);
  }

  return unique.sort((a, b) => a.price - b.price);
}

export class InventorySearchService implements VehicleSearchProvider {
  constructor(
    private readonly store: RecordStore,
    private readonly cache: SearchCacheService | null = null
  ) {}

  async search(criteria: SearchCriteria): Promise<VehicleListing[]> {
    const key = criteriaKey(criteria);

    const cached = await this.cache?.get(key);
    if (cached) {
      logger.debug('Search served from cache', { key, results: cached.length });
      return cached;
    }

    const filter: RecordFilter = {};
    if (criteria.make) filter.make = criteria.make;
    if (criteria.model) filter.model = criteria.model;
    if (criteria.maxPrice !== undefined) filter.price = { lte: criteria.maxPrice };
    if (criteria.minYear !== undefined) filter.year = { gte: criteria.minYear };

    const records = await this.store.find('vehicles', { filter, sort: { field: 'price', direction: 'asc' } });
    const results = dedupeListings(records).slice(0, criteria.limit ?? DEFAULT_LIMIT);

    logger.info('Vehicle search completed', { key, found: records.length, returned: results.length });

    await this.cache?.set(key, results);
    return results;
  }
}
