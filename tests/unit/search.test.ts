jest.mock('../../src/config/redis', () => ({
  redis: {
    get: jest.fn(),
    set: jest.fn(),
  },
}));

jest.mock('../../src/utils/logger', () => ({
  logger: {
    info: jest.fn(),
    debug: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

import { InventorySearchService, criteriaKey, dedupeListings } from '../../src/services/search.service';
import { SearchCacheService } from '../../src/services/cache.service';
import { MemoryRecordStore } from '../../src/services/store/memory.store';
import { VehicleListing } from '../../src/types/capabilities';
import vehicles from '../../src/data/vehicles.json';

const { redis: mockRedis }: { redis: { get: jest.Mock; set: jest.Mock } } = jest.requireMock('../../src/config/redis');
const mockGet = mockRedis.get;
const mockSet = mockRedis.set;

async function seededStore(listings: VehicleListing[] = vehicles): Promise<MemoryRecordStore> {
  const store = new MemoryRecordStore();
  for (const listing of listings) {
    await store.put('vehicles', listing.id, listing);
  }
  return store;
}

describe('dedupeListings', () => {
  it('should drop case-insensitive repeats and sort by price', () => {
    const listings: VehicleListing[] = [
      { id: 'a', make: 'Ferrari', model: 'Roma', year: 2022, price: 189950, location: 'London' },
      { id: 'b', make: 'FERRARI', model: 'roma ', year: 2022, price: 189950, location: 'london' },
      { id: 'c', make: 'Ferrari', model: 'Portofino', year: 2020, price: 164000, location: 'Birmingham' },
    ];

    expect(dedupeListings(listings).map((listing) => listing.id)).toEqual(['c', 'a']);
  });
});

describe('criteriaKey', () => {
  it('should normalise case and fill defaults', () => {
    expect(criteriaKey({ make: 'Ferrari' })).toBe('ferrari|*|*|*|5');
    expect(criteriaKey({ make: 'ferrari', model: 'Roma', minYear: 2021, maxPrice: 200000, limit: 3 })).toBe(
      'ferrari|roma|2021|200000|3'
    );
  });
});

describe('InventorySearchService', () => {
  it('should return matching stock cheapest first', async () => {
    const search = new InventorySearchService(await seededStore());

    const results = await search.search({ make: 'ferrari' });

    expect(results.map((listing) => listing.model)).toEqual(['Portofino', 'Roma', 'F8 Tributo', '296 GTB']);
  });

  it('should apply year and price bounds', async () => {
    const search = new InventorySearchService(await seededStore());

    const results = await search.search({ make: 'Ferrari', minYear: 2021, maxPrice: 230000 });

    expect(results.map((listing) => listing.model)).toEqual(['Roma', 'F8 Tributo']);
  });

  it('should cap results at the limit', async () => {
    const search = new InventorySearchService(await seededStore());

    expect(await search.search({ make: 'Ferrari', limit: 2 })).toHaveLength(2);
  });

  it('should return an empty list when nothing matches', async () => {
    const search = new InventorySearchService(await seededStore());

    expect(await search.search({ make: 'Ferrari', model: 'Purosangue' })).toEqual([]);
  });

  describe('with a cache', () => {
    beforeEach(() => {
      mockGet.mockReset();
      mockSet.mockReset();
    });

    it('should serve cached results without touching the store', async () => {
      const cached: VehicleListing[] = [{ id: 'x', make: 'Ferrari', model: 'Roma', year: 2022, price: 1 }];
      mockGet.mockResolvedValueOnce(JSON.stringify(cached));
      const store = await seededStore();
      const find = jest.spyOn(store, 'find');

      const results = await new InventorySearchService(store, new SearchCacheService(300)).search({ make: 'Ferrari' });

      expect(results).toEqual(cached);
      expect(find).not.toHaveBeenCalled();
      expect(mockGet).toHaveBeenCalledWith('search:ferrari|*|*|*|5');
    });

    it('should store fresh results with the ttl', async () => {
      mockGet.mockResolvedValueOnce(null);
      mockSet.mockResolvedValueOnce('OK');

      const results = await new InventorySearchService(await seededStore(), new SearchCacheService(300)).search({
        make: 'Ferrari',
        limit: 1,
      });

      expect(mockSet).toHaveBeenCalledWith('search:ferrari|*|*|*|1', JSON.stringify(results), { EX: 300 });
    });

    it('should treat cache faults as misses', async () => {
      mockGet.mockRejectedValueOnce(new Error('redis down'));
      mockSet.mockRejectedValueOnce(new Error('redis down'));

      const results = await new InventorySearchService(await seededStore(), new SearchCacheService(300)).search({
        make: 'Ferrari',
      });

      expect(results).toHaveLength(4);
    });

    it('should ignore cached data of the wrong shape', async () => {
      mockGet.mockResolvedValueOnce(JSON.stringify([{ id: 1 }]));

      await expect(new SearchCacheService(300).get('k')).resolves.toBeNull();
    });

    it('should skip redis entirely when the ttl is zero', async () => {
      const cache = new SearchCacheService(0);

      await expect(cache.get('k')).resolves.toBeNull();
      await cache.set('k', []);
      expect(mockGet).not.toHaveBeenCalled();
      expect(mockSet).not.toHaveBeenCalled();
    });
  });
});
