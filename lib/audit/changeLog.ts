import { z } from 'zod';
import { StoredRecord, StoredValue } from '../types/ingest';
import { storedValueSchema } from '../types/schemas';
import { appendJsonArray, readJsonArray } from '../storage/fsStore';

export interface ChangeEntry {
  id: number;
  field: string;
  oldValue: StoredValue;
  newValue: StoredValue;
  user: string;
  comments: string;
  timestamp: string;
}

export interface ChangeContext {
  user?: string;
  comments?: string;
}

const changeSchema = z.object({
  id: z.number().int(),
  field: z.string(),
  oldValue: storedValueSchema,
  newValue: storedValueSchema,
  user: z.string(),
  comments: z.string(),
  timestamp: z.string(),
});

/** null -> null and null -> "" carry no information */
function isNoise(oldValue: StoredValue, newValue: StoredValue): boolean {
  if (oldValue === newValue) return true;
  return oldValue === null && newValue === '';
}

/**
 * Per-field changes between a stored record and a patch, skipping no-op
 * and placeholder updates.
 */
export function describeChanges(
  id: number,
  before: StoredRecord | null,
  patch: StoredRecord,
  context: ChangeContext,
  at: Date
): ChangeEntry[] {
  const entries: ChangeEntry[] = [];
  for (const [field, newValue] of Object.entries(patch)) {
    const oldValue = before?.[field] ?? null;
    if (isNoise(oldValue, newValue)) continue;
    entries.push({
      id,
      field,
      oldValue,
      newValue,
      user: context.user ?? 'anonymous',
      comments: context.comments ?? '',
      timestamp: at.toISOString(),
    });
  }
  return entries;
}

/** Append-only audit trail of field updates made to stored records */
export class ChangeLog {
  constructor(
    private readonly file: string,
    private readonly now: () => Date = () => new Date()
  ) {}

  async append(id: number, before: StoredRecord | null, patch: StoredRecord, context: ChangeContext = {}): Promise<ChangeEntry[]> {
    const entries = describeChanges(id, before, patch, context, this.now());
    if (entries.length > 0) {
      await appendJsonArray(this.file, entries);
    }
    return entries;
  }

  async entries(id?: number): Promise<ChangeEntry[]> {
    const raw = await readJsonArray(this.file);
    const all = raw.flatMap(item => {
      const parsed = changeSchema.safeParse(item);
      return parsed.success ? [parsed.data] : [];
    });
    return id === undefined ? all : all.filter(e => e.id === id);
  }
}
