import { FieldValue, StoredValue } from '../types/ingest';
import { civilToUtc, hasExplicitZone, isCivilDateTime, zonedIsoToUtc } from '../time/civil';

// Both sides of a comparison are reduced to one canonical string:
// absent, null and "" are all "", datetimes become UTC ISO, numbers use the
// shortest decimal form and booleans read "true" / "false".

function civilAsUtc(civil: string, zone: string): string {
  const instant = civilToUtc(civil, zone);
  return instant.ok ? instant.utc : civil;
}

export function normalizeIncoming(value: FieldValue, zone: string): string {
  switch (value.kind) {
    case 'absent':
      return '';
    case 'string':
      return value.value;
    case 'integer':
    case 'float':
      return String(value.value);
    case 'boolean':
      return value.value ? 'true' : 'false';
    case 'datetime':
      return civilAsUtc(value.value, zone);
  }
}

/**
 * Normalize a stored value. Stored text is only read as a datetime when the
 * incoming side is one, so plain strings that look like dates stay strings.
 */
export function normalizeStored(value: StoredValue | undefined, zone: string, asDateTime = false): string {
  if (value === undefined || value === null) return '';
  if (typeof value === 'boolean') return value ? 'true' : 'false';
  if (typeof value === 'number') return String(value);
  if (value === '' || !asDateTime) return value;

  const text = value.trim();
  if (hasExplicitZone(text)) {
    return zonedIsoToUtc(text) ?? value;
  }
  const civil = text.replace(' ', 'T');
  return isCivilDateTime(civil) ? civilAsUtc(civil, zone) : value;
}

/** The verbatim value written to the record store */
export function toStoredValue(value: FieldValue): StoredValue {
  return value.kind === 'absent' ? null : value.value;
}
