jest.mock('../../src/config/database', () => ({
  query: jest.fn(),
}));

jest.mock('../../src/utils/logger', () => ({
  logger: {
    info: jest.fn(),
    debug: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

import { DatabaseService, buildFilterSql } from '../../src/services/database.service';
import { MemoryRecordStore } from '../../src/services/store/memory.store';
import { compareValues, matchesFilter, readPath } from '../../src/services/store/filters';
import { VehicleListing } from '../../src/types/capabilities';
import { PersistenceError, ServiceError, ValidationError } from '../../src/utils/errors';

const { query: mockQuery }: { query: jest.Mock } = jest.requireMock('../../src/config/database');

const roma: VehicleListing = { id: 'veh-2', make: 'Ferrari', model: 'Roma', year: 2022, price: 189950, location: 'London' };
const f8: VehicleListing = { id: 'veh-3', make: 'Ferrari', model: 'F8 Tributo', year: 2021, price: 229995, location: 'Surrey' };
const macan: VehicleListing = { id: 'veh-9', make: 'Porsche', model: 'Macan', year: 2019, price: 45000 };

describe('filters', () => {
  it('should read dotted paths', () => {
    expect(readPath({ customer: { email: 'a@b.co' } }, 'customer.email')).toBe('a@b.co');
    expect(readPath({ customer: null }, 'customer.email')).toBeUndefined();
  });

  it('should reject paths that are not plain identifiers', () => {
    expect(() => readPath({}, "data'); drop table documents;--")).toThrow(ValidationError);
  });

  it('should compare strings case-insensitively for equality', () => {
    expect(matchesFilter(roma, { make: 'ferrari' })).toBe(true);
    expect(matchesFilter(roma, { make: 'porsche' })).toBe(false);
  });

  it('should apply range bounds', () => {
    expect(matchesFilter(roma, { price: { lte: 200000 }, year: { gte: 2022 } })).toBe(true);
    expect(matchesFilter(f8, { price: { lt: 229995 } })).toBe(false);
    expect(matchesFilter(macan, { mileage: { gte: 0 } })).toBe(false);
  });

  it('should sort missing values last', () => {
    expect([3, null, 1].sort(compareValues)).toEqual([1, 3, null]);
  });
});

describe('MemoryRecordStore', () => {
  let store: MemoryRecordStore;

  beforeEach(async () => {
    store = new MemoryRecordStore();
    for (const listing of [f8, macan, roma]) {
      await store.put('vehicles', listing.id, listing);
    }
  });

  it('should filter, sort and limit', async () => {
    const found = await store.find('vehicles', {
      filter: { make: 'FERRARI' },
      sort: { field: 'price', direction: 'desc' },
      limit: 1,
    });

    expect(found).toEqual([f8]);
  });

  it('should hand out copies', async () => {
    const copy = await store.get('vehicles', 'veh-2');
    if (!copy) throw new Error('expected a vehicle');
    copy.price = 1;

    expect((await store.get('vehicles', 'veh-2'))?.price).toBe(189950);
  });

  it('should delete records', async () => {
    expect(await store.delete('vehicles', 'veh-9')).toBe(true);
    expect(await store.delete('vehicles', 'veh-9')).toBe(false);
    expect(store.count('vehicles')).toBe(2);
  });
});

describe('buildFilterSql', () => {
  it('should bind every path and value as a parameter', () => {
    const params: unknown[] = ['vehicles'];
    const { clauses } = buildFilterSql({ make: 'Ferrari', price: { lte: 200000 }, year: 2021, sold: false }, params);

    expect(clauses).toEqual([
      'lower(data #>> $2::text[]) = lower($3)',
      '(data #>> $4::text[])::numeric <= $5',
      '(data #>> $6::text[])::numeric = $7',
      'data #>> $8::text[] = $9',
    ]);
    expect(params).toEqual(['vehicles', ['make'], 'Ferrari', ['price'], 200000, ['year'], 2021, ['sold'], 'false']);
  });

  it('should compare string bounds as text', () => {
    const params: unknown[] = ['orders'];
    const { clauses } = buildFilterSql({ createdAt: { gte: '2026-01-01' } }, params);

    expect(clauses).toEqual(['data #>> $2::text[] >= $3']);
  });
});

describe('DatabaseService', () => {
  const database = new DatabaseService();

  beforeEach(() => {
    mockQuery.mockReset();
  });

  it('should build a parameterised find', async () => {
    mockQuery.mockResolvedValueOnce({ rows: [{ data: roma }], rowCount: 1 });

    const found = await database.find('vehicles', {
      filter: { make: 'Ferrari' },
      sort: { field: 'price', direction: 'asc' },
      limit: 5,
    });

    expect(found).toEqual([roma]);
    expect(mockQuery).toHaveBeenCalledWith(
      'SELECT data FROM documents WHERE collection = $1 AND lower(data #>> $2::text[]) = lower($3) ORDER BY data #> $4::text[] ASC NULLS LAST LIMIT $5',
      ['vehicles', ['make'], 'Ferrari', ['price'], 5]
    );
  });

  it('should return null for a missing document', async () => {
    mockQuery.mockResolvedValueOnce({ rows: [], rowCount: 0 });

    await expect(database.get('orders', 'ORD-RA-2026-AAAAA')).resolves.toBeNull();
  });

  it('should raise a PersistenceError when a write fails', async () => {
    mockQuery.mockRejectedValueOnce(new Error('connection reset'));

    await expect(database.put('vehicles', roma.id, roma)).rejects.toBeInstanceOf(PersistenceError);
  });

  it('should raise a retryable ServiceError when a read fails', async () => {
    mockQuery.mockRejectedValueOnce(new Error('connection reset'));

    const failure = database.find('vehicles');
    await expect(failure).rejects.toBeInstanceOf(ServiceError);
    await expect(failure).rejects.toMatchObject({ retryable: true, operation: 'find' });
  });
});
