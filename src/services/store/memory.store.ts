import { CollectionName, Collections, FindOptions, RecordStore } from '../../types/capabilities';
import { compareValues, matchesFilter, readPath } from './filters';

type CollectionMaps = { [C in CollectionName]: Map<string, Collections[C]> };

/**
 * In-process record store. Used when no DATABASE_URL is configured and by the
 * test suite. Records are deep-copied on the way in and out so callers never
 * share references with the store.
 */
export class MemoryRecordStore implements RecordStore {
  private collections: CollectionMaps = {
    sessions: new Map(),
    orders: new Map(),
    appointments: new Map(),
    listings: new Map(),
    vehicles: new Map(),
  };

  async get<C extends CollectionName>(collection: C, key: string): Promise<Collections[C] | null> {
    const record = this.collections[collection].get(key);
    return record === undefined ? null : structuredClone(record);
  }

  async put<C extends CollectionName>(collection: C, key: string, record: Collections[C]): Promise<void> {
    this.collections[collection].set(key, structuredClone(record));
  }

  async find<C extends CollectionName>(collection: C, options: FindOptions = {}): Promise<Collections[C][]> {
    let records = Array.from(this.collections[collection].values());

    const { filter, sort, limit } = options;
    if (filter) {
      records = records.filter((record) => matchesFilter(record, filter));
    }
    if (sort) {
      const direction = sort.direction === 'desc' ? -1 : 1;
      records.sort((a, b) => direction * compareValues(readPath(a, sort.field), readPath(b, sort.field)));
    }
    if (limit !== undefined) {
      records = records.slice(0, limit);
    }
    return records.map((record) => structuredClone(record));
  }

  async delete(collection: CollectionName, key: string): Promise<boolean> {
    return this.collections[collection].delete(key);
  }

  count(collection: CollectionName): number {
    return this.collections[collection].size;
  }
}
