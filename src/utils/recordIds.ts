import { v4 as uuidv4 } from 'uuid';
import { RecordKind } from '../types/records';

export const RECORD_PREFIXES: Record<RecordKind, string> = {
  order: 'ORD',
  appointment: 'SVC',
  listing: 'LST',
};

export const RECORD_ID_PATTERN = /^(ORD|SVC|LST)-RA-\d{4}-[A-Z0-9]{5}$/;

/** `<PREFIX>-RA-<yyyy>-<5 uppercase alphanumerics>` */
export function generateRecordId(kind: RecordKind, now: Date = new Date()): string {
  const suffix = uuidv4().replace(/-/g, '').slice(0, 5).toUpperCase();
  return `${RECORD_PREFIXES[kind]}-RA-${now.getFullYear()}-${suffix}`;
}

export function kindFromRecordId(recordId: string): RecordKind | null {
  const prefix = recordId.split('-')[0];
  const entry = Object.entries(RECORD_PREFIXES).find(([, value]) => value === prefix);
  if (!entry) return null;
  const [kind] = entry;
  return kind === 'order' || kind === 'appointment' || kind === 'listing' ? kind : null;
}
