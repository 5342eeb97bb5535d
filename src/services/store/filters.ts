import { Comparable, FilterValue, RangeFilter, RecordFilter } from '../../types/capabilities';
import { ValidationError } from '../../utils/errors';

const FIELD_PATH = /^[A-Za-z_][A-Za-z0-9_]*(?:\.[A-Za-z_][A-Za-z0-9_]*)*$/;

export function assertFieldPath(path: string): string[] {
  if (!FIELD_PATH.test(path)) {
    throw new ValidationError(`Invalid field path: ${path}`);
  }
  return path.split('.');
}

export function readPath(document: unknown, path: string): unknown {
  let current: unknown = document;
  for (const segment of assertFieldPath(path)) {
    if (typeof current !== 'object' || current === null) return undefined;
    current = Reflect.get(current, segment);
  }
  return current;
}

export function isRangeFilter(value: FilterValue): value is RangeFilter {
  return typeof value === 'object' && value !== null;
}

function isComparable(value: unknown): value is Comparable {
  return typeof value === 'number' || typeof value === 'string';
}

/** Orders numbers numerically and strings lexically; missing values sort last. */
export function compareValues(a: unknown, b: unknown): number {
  const aMissing = !isComparable(a);
  const bMissing = !isComparable(b);
  if (aMissing || bMissing) return aMissing === bMissing ? 0 : aMissing ? 1 : -1;
  if (typeof a === 'number' && typeof b === 'number') return a - b;
  const left = String(a);
  const right = String(b);
  return left < right ? -1 : left > right ? 1 : 0;
}

function matchesRange(value: unknown, range: RangeFilter): boolean {
  if (!isComparable(value)) return false;
  if (range.gt !== undefined && !(compareValues(value, range.gt) > 0)) return false;
  if (range.gte !== undefined && !(compareValues(value, range.gte) >= 0)) return false;
  if (range.lt !== undefined && !(compareValues(value, range.lt) < 0)) return false;
  if (range.lte !== undefined && !(compareValues(value, range.lte) <= 0)) return false;
  return true;
}

function matchesEquality(value: unknown, expected: string | number | boolean): boolean {
  if (typeof value === 'string' && typeof expected === 'string') {
    return value.toLowerCase() === expected.toLowerCase();
  }
  return value === expected;
}

/** String equality is case-insensitive so lookups by make or email behave the same in every store. */
export function matchesFilter(document: unknown, filter: RecordFilter): boolean {
  return Object.entries(filter).every(([path, expected]) => {
    const value = readPath(document, path);
    return isRangeFilter(expected) ? matchesRange(value, expected) : matchesEquality(value, expected);
  });
}
