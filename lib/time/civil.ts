import { DateTime, IANAZone } from 'luxon';

/**
 * Civil (timezone-naive) datetimes are carried as `yyyy-MM-ddTHH:mm:ss`
 * strings. They are only promoted to an instant when compared, using one
 * reference zone for every value.
 */

export const CIVIL_FORMAT = "yyyy-MM-dd'T'HH:mm:ss";
const UTC_FORMAT = "yyyy-MM-dd'T'HH:mm:ss'Z'";

const HOUR_MS = 60 * 60 * 1000;

// Layouts accepted from free-text cells. Month-first for slash dates.
const TEXT_LAYOUTS = [
  'yyyy-MM-dd HH:mm:ss',
  'yyyy-MM-dd HH:mm',
  'M/d/yyyy H:mm:ss',
  'M/d/yyyy H:mm',
  'M/d/yyyy h:mm a',
  'M/d/yyyy',
  'd-MMM-yyyy',
  'MMM d, yyyy',
];

const EXPLICIT_ZONE = /(?:\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?\s*(?:[zZ]|[+-]\d{2}(?::?\d{2})?)|\b(?:UTC|GMT)\b|\b[A-Za-z]+\/[A-Za-z_]+\b)\s*$/;

export type CivilParse =
  | { ok: true; value: string }
  | { ok: false; reason: 'timezone' | 'unparseable' };

export type CivilInstant =
  | { ok: true; utc: string }
  | { ok: false; reason: 'ambiguous' | 'nonexistent' | 'invalid' };

export function hasExplicitZone(text: string): boolean {
  return EXPLICIT_ZONE.test(text.trim());
}

/** Parse free text into a civil datetime. Text naming an offset or zone is refused. */
export function parseCivilDateTime(text: string): CivilParse {
  const trimmed = text.trim();
  if (trimmed.length === 0) {
    return { ok: false, reason: 'unparseable' };
  }
  if (hasExplicitZone(trimmed)) {
    return { ok: false, reason: 'timezone' };
  }

  // parsing in UTC keeps wall-clock fields exactly as written
  if (/^\d{4}-\d{2}-\d{2}(?:T|$)/.test(trimmed)) {
    const iso = DateTime.fromISO(trimmed, { zone: 'utc' });
    if (iso.isValid) {
      return { ok: true, value: iso.toFormat(CIVIL_FORMAT) };
    }
  }
  for (const layout of TEXT_LAYOUTS) {
    const dt = DateTime.fromFormat(trimmed, layout, { zone: 'utc', locale: 'en-US' });
    if (dt.isValid) {
      return { ok: true, value: dt.toFormat(CIVIL_FORMAT) };
    }
  }
  return { ok: false, reason: 'unparseable' };
}

export function isCivilDateTime(value: string): boolean {
  return /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}$/.test(value) && DateTime.fromISO(value, { zone: 'utc' }).isValid;
}

export function civilFromParts(parts: {
  year: number;
  month: number;
  day: number;
  hour?: number;
  minute?: number;
  second?: number;
}): string | null {
  const dt = DateTime.fromObject(
    {
      year: parts.year,
      month: parts.month,
      day: parts.day,
      hour: parts.hour ?? 0,
      minute: parts.minute ?? 0,
      second: parts.second ?? 0,
    },
    { zone: 'utc' }
  );
  return dt.isValid ? dt.toFormat(CIVIL_FORMAT) : null;
}

export function assertValidZone(zoneName: string): IANAZone {
  const zone = IANAZone.create(zoneName);
  if (!zone.isValid) {
    throw new Error(`Unknown IANA time zone: ${zoneName}`);
  }
  return zone;
}

/**
 * Map a civil datetime in `zoneName` to a UTC instant. Wall times that occur
 * twice (DST fall-back) or never (spring-forward) have no single instant.
 */
export function civilToUtc(civil: string, zoneName: string): CivilInstant {
  const zone = assertValidZone(zoneName);
  const wall = DateTime.fromISO(civil, { zone: 'utc' });
  if (!wall.isValid) {
    return { ok: false, reason: 'invalid' };
  }
  const wallMs = wall.toMillis();

  const offsets = new Set([
    zone.offset(wallMs - 12 * HOUR_MS),
    zone.offset(wallMs),
    zone.offset(wallMs + 12 * HOUR_MS),
  ]);
  const instants = new Set<number>();
  for (const offset of offsets) {
    const instant = wallMs - offset * 60 * 1000;
    if (zone.offset(instant) === offset) {
      instants.add(instant);
    }
  }

  if (instants.size === 0) return { ok: false, reason: 'nonexistent' };
  if (instants.size > 1) return { ok: false, reason: 'ambiguous' };
  const [instant] = [...instants];
  return { ok: true, utc: DateTime.fromMillis(instant, { zone: 'utc' }).toFormat(UTC_FORMAT) };
}

/** Normalize an ISO string carrying its own offset to UTC */
export function zonedIsoToUtc(text: string): string | null {
  const dt = DateTime.fromISO(text.trim(), { setZone: true });
  return dt.isValid ? dt.toUTC().toFormat(UTC_FORMAT) : null;
}
