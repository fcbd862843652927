import * as path from 'path';
import { z } from 'zod';
import { StoredRecord } from '../types/ingest';
import { Failure, errorMessage, fail } from '../types/result';
import { storedValueSchema } from '../types/schemas';
import { readJsonFile, writeJsonAtomic } from './fsStore';

export type RecordStoreErrorKind = 'integrity' | 'validation';

/** Failure raised by a record store adapter */
export class RecordStoreError extends Error {
  constructor(
    readonly kind: RecordStoreErrorKind,
    message: string
  ) {
    super(message);
    this.name = 'RecordStoreError';
  }
}

/** Keyed record storage. `upsert` merges the given fields into the record. */
export interface RecordStore {
  get(id: number): Promise<StoredRecord | null>;
  upsert(id: number, fields: StoredRecord): Promise<void>;
}

const storedRecord = z.record(storedValueSchema);
const recordFile = z.object({ id: z.number().int().positive(), fields: storedRecord });

/** One JSON document per identity key */
export class FsRecordStore implements RecordStore {
  constructor(private readonly dir: string) {}

  private fileFor(id: number): string {
    return path.join(this.dir, `${id}.json`);
  }

  async get(id: number): Promise<StoredRecord | null> {
    let raw: unknown;
    try {
      raw = await readJsonFile(this.fileFor(id));
    } catch (error) {
      throw new RecordStoreError('integrity', `Cannot read record ${id}: ${errorMessage(error)}`);
    }
    if (raw === null) return null;

    const parsed = recordFile.safeParse(raw);
    if (!parsed.success || parsed.data.id !== id) {
      throw new RecordStoreError('integrity', `Record file for ${id} is corrupt`);
    }
    return parsed.data.fields;
  }

  async upsert(id: number, fields: StoredRecord): Promise<void> {
    if (!Number.isSafeInteger(id) || id <= 0) {
      throw new RecordStoreError('validation', `Record id must be a positive integer, got ${id}`);
    }
    const patch = storedRecord.safeParse(fields);
    if (!patch.success) {
      const issue = patch.error.issues[0];
      throw new RecordStoreError('validation', `Field "${issue.path.join('.')}" is not a storable value`);
    }

    const existing = await this.get(id);
    try {
      await writeJsonAtomic(this.fileFor(id), { id, fields: { ...(existing ?? {}), ...patch.data } });
    } catch (error) {
      throw new RecordStoreError('integrity', `Cannot write record ${id}: ${errorMessage(error)}`);
    }
  }
}

/** Translate a store failure into the caller-facing error kinds */
export function storeFailure(error: unknown, action: string): Failure<'database_error' | 'validation_error'> {
  if (error instanceof RecordStoreError && error.kind === 'validation') {
    return fail('validation_error', `${action} rejected: ${error.message}`);
  }
  return fail('database_error', `${action} failed: ${errorMessage(error)}`);
}
