import { DiffEntry, FieldMap, StoredRecord } from '../types/ingest';
import { normalizeIncoming, normalizeStored } from './normalize';

/**
 * Fields whose staged value differs from the stored record, sorted by name.
 * Absent staged values are never diffed: an empty cell does not clear a
 * stored value.
 */
export function computeDiff(
  fields: Readonly<FieldMap>,
  stored: Readonly<StoredRecord> | null,
  zone: string,
  confirmed: readonly string[] = []
): DiffEntry[] {
  const accepted = new Set(confirmed);
  const entries: DiffEntry[] = [];

  for (const [field, value] of Object.entries(fields)) {
    if (value.kind === 'absent') continue;
    const incoming = normalizeIncoming(value, zone);
    const current = normalizeStored(stored?.[field], zone, value.kind === 'datetime');
    if (incoming === current) continue;
    entries.push({ field, stored: current, incoming, confirmed: accepted.has(field) });
  }

  return entries.sort((a, b) => (a.field < b.field ? -1 : a.field > b.field ? 1 : 0));
}
