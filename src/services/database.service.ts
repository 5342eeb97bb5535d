import { query } from '../config/database';
import { CollectionName, Collections, FindOptions, RecordFilter, RecordStore } from '../types/capabilities';
import { PersistenceError, ServiceError, toError } from '../utils/errors';
import { logger } from '../utils/logger';
import { assertFieldPath, isRangeFilter } from './store/filters';

const RANGE_OPERATORS = { gt: '>', gte: '>=', lt: '<', lte: '<=' } as const;

interface SqlFragment {
  clauses: string[];
  params: unknown[];
}

/** Translates a filter into WHERE clauses over the JSONB `data` column. */
export function buildFilterSql(filter: RecordFilter, params: unknown[]): SqlFragment {
  const clauses: string[] = [];

  for (const [path, expected] of Object.entries(filter)) {
    params.push(assertFieldPath(path));
    const field = `data #>> $${params.length}::text[]`;

    if (isRangeFilter(expected)) {
      for (const operator of ['gt', 'gte', 'lt', 'lte'] as const) {
        const bound = expected[operator];
        if (bound === undefined) continue;
        params.push(bound);
        clauses.push(
          typeof bound === 'number'
            ? `(${field})::numeric ${RANGE_OPERATORS[operator]} $${params.length}`
            : `${field} ${RANGE_OPERATORS[operator]} $${params.length}`
        );
      }
    } else if (typeof expected === 'number') {
      params.push(expected);
      clauses.push(`(${field})::numeric = $${params.length}`);
    } else if (typeof expected === 'boolean') {
      params.push(String(expected));
      clauses.push(`${field} = $${params.length}`);
    } else {
      params.push(expected);
      clauses.push(`lower(${field}) = lower($${params.length})`);
    }
  }

  return { clauses, params };
}

/**
 * Postgres-backed record store: one JSONB document per (collection, key)
 * in the `documents` table.
 */
export class DatabaseService implements RecordStore {
  async get<C extends CollectionName>(collection: C, key: string): Promise<Collections[C] | null> {
    try {
      const result = await query<{ data: Collections[C] }>(
        'SELECT data FROM documents WHERE collection = $1 AND key = $2',
        [collection, key]
      );
      return result.rows[0]?.data ?? null;
    } catch (error) {
      throw new ServiceError('RecordStore', 'get', toError(error), true);
    }
  }

  async put<C extends CollectionName>(collection: C, key: string, record: Collections[C]): Promise<void> {
    try {
      await query(
        `INSERT INTO documents (collection, key, data)
         VALUES ($1, $2, $3)
         ON CONFLICT (collection, key)
         DO UPDATE SET data = EXCLUDED.data, updated_at = NOW()`,
        [collection, key, JSON.stringify(record)]
      );
    } catch (error) {
      logger.error('Record write failed', { collection, key, error: toError(error).message });
      throw new PersistenceError(`put:${collection}`, toError(error));
    }
  }

  async find<C extends CollectionName>(collection: C, options: FindOptions = {}): Promise<Collections[C][]> {
    const params: unknown[] = [collection];
    const where = ['collection = $1'];

    if (options.filter) {
      where.push(...buildFilterSql(options.filter, params).clauses);
    }

    let sql = `SELECT data FROM documents WHERE ${where.join(' AND ')}`;

    if (options.sort) {
      params.push(assertFieldPath(options.sort.field));
      const direction = options.sort.direction === 'desc' ? 'DESC' : 'ASC';
      sql += ` ORDER BY data #> $${params.length}::text[] ${direction} NULLS LAST`;
    } else {
      sql += ' ORDER BY created_at ASC';
    }

    if (options.limit !== undefined) {
      params.push(options.limit);
      sql += ` LIMIT $${params.length}`;
    }

    try {
      const result = await query<{ data: Collections[C] }>(sql, params);
      return result.rows.map((row) => row.data);
    } catch (error) {
      throw new ServiceError('RecordStore', 'find', toError(error), true);
    }
  }

  async delete(collection: CollectionName, key: string): Promise<boolean> {
    try {
      const result = await query('DELETE FROM documents WHERE collection = $1 AND key = $2', [collection, key]);
      return (result.rowCount ?? 0) > 0;
    } catch (error) {
      throw new PersistenceError(`delete:${collection}`, toError(error));
    }
  }
}
