import { StagedRecord, StoredRecord } from '../types/ingest';
import { Failure, errorMessage, fail } from '../types/result';
import { RecordStore, storeFailure } from '../storage/recordStore';
import { OnExistingArtifact, StagingConflictError, StagingStore } from '../storage/stagingStore';
import { ChangeLog, ChangeContext } from '../audit/changeLog';
import { computeDiff } from '../reconciliation/diff';
import { toStoredValue } from '../reconciliation/normalize';
import { extractIdentity } from '../ingestion/identity';

export interface PersistenceConfig {
  /** Commit straight to the record store */
  autoConfirm: boolean;
  /** Write a staged artifact for later review */
  persistStagingArtifact: boolean;
  /** Commit every payload field instead of only the changed ones */
  fullFieldOverwrite: boolean;
  onExistingArtifact?: OnExistingArtifact;
}

export type PersistErrorKind = 'validation_error' | 'database_error' | 'file_error';

export type PersistenceOutcome =
  | {
      ok: true;
      id: number;
      stagedArtifactRef?: string;
      committedFields: string[];
      dryRun: boolean;
      message: string;
    }
  | (Failure<PersistErrorKind> & { id?: number; stagedArtifactRef?: string });

export interface PersistenceRouterDeps {
  records: RecordStore;
  staging: StagingStore;
  changeLog?: ChangeLog;
  referenceZone: string;
  identityField: string;
}

/**
 * Sends a staged record to the staging area, the record store, both, or
 * neither. The artifact is written first; the first failure ends the route.
 */
export class PersistenceRouter {
  constructor(private readonly deps: PersistenceRouterDeps) {}

  private checkRecord(record: StagedRecord): Failure<'validation_error'> | null {
    if (!Number.isSafeInteger(record.id) || record.id <= 0) {
      return fail('validation_error', `Record id must be a positive integer, got ${record.id}`);
    }
    const present = Object.values(record.fields).filter(v => v.kind !== 'absent');
    if (present.length === 0) {
      return fail('validation_error', `Record ${record.id} has no field values to persist`);
    }
    const declared = extractIdentity(record.fields, this.deps.identityField);
    if (declared.ok && declared.value !== record.id) {
      return fail('validation_error', `Payload ${this.deps.identityField} ${declared.value} does not match record id ${record.id}`);
    }
    return null;
  }

  /** The patch a commit writes; absent values only appear under full overwrite */
  buildPatch(record: StagedRecord, stored: StoredRecord | null, fullFieldOverwrite: boolean): StoredRecord {
    const patch: StoredRecord = {};
    if (fullFieldOverwrite) {
      for (const [field, value] of Object.entries(record.fields)) {
        patch[field] = toStoredValue(value);
      }
      return patch;
    }
    for (const entry of computeDiff(record.fields, stored, this.deps.referenceZone)) {
      patch[entry.field] = toStoredValue(record.fields[entry.field]);
    }
    return patch;
  }

  async route(record: StagedRecord, config: PersistenceConfig, context: ChangeContext = {}): Promise<PersistenceOutcome> {
    const invalid = this.checkRecord(record);
    if (invalid) return { ...invalid, id: record.id };

    if (!config.autoConfirm && !config.persistStagingArtifact) {
      console.log(`[persist] Dry run for ${record.id}; nothing written`);
      return { ok: true, id: record.id, committedFields: [], dryRun: true, message: 'Dry run: nothing persisted' };
    }

    let stagedArtifactRef: string | undefined;
    if (config.persistStagingArtifact) {
      try {
        stagedArtifactRef = await this.deps.staging.save(record, config.onExistingArtifact);
      } catch (error) {
        if (error instanceof StagingConflictError) {
          return { ...fail('validation_error', error.message), id: record.id };
        }
        console.error(`[persist] Staging artifact for ${record.id} not written:`, error);
        return { ...fail('file_error', `Could not write staged artifact: ${errorMessage(error)}`), id: record.id };
      }
      console.log(`[persist] Staged ${record.id} at ${stagedArtifactRef}`);
    }

    let committedFields: string[] = [];
    if (config.autoConfirm) {
      let stored: StoredRecord | null;
      try {
        stored = await this.deps.records.get(record.id);
      } catch (error) {
        return { ...storeFailure(error, `Reading record ${record.id}`), id: record.id, stagedArtifactRef };
      }

      const patch = this.buildPatch(record, stored, config.fullFieldOverwrite);
      committedFields = Object.keys(patch);
      if (committedFields.length > 0) {
        try {
          await this.deps.records.upsert(record.id, patch);
        } catch (error) {
          console.error(`[persist] Commit of ${record.id} failed:`, error);
          return { ...storeFailure(error, `Writing record ${record.id}`), id: record.id, stagedArtifactRef };
        }
        await this.logChanges(record.id, stored, patch, context);
      }
      console.log(`[persist] Committed ${committedFields.length} field(s) to ${record.id}`);
    }

    const parts = [
      stagedArtifactRef ? 'staged for review' : null,
      config.autoConfirm ? `${committedFields.length} field(s) committed` : null,
    ].filter((p): p is string => p !== null);

    return {
      ok: true,
      id: record.id,
      stagedArtifactRef,
      committedFields,
      dryRun: false,
      message: `Record ${record.id}: ${parts.join(', ')}`,
    };
  }

  private async logChanges(id: number, before: StoredRecord | null, patch: StoredRecord, context: ChangeContext): Promise<void> {
    if (!this.deps.changeLog) return;
    try {
      await this.deps.changeLog.append(id, before, patch, context);
    } catch (error) {
      console.warn(`[persist] Change log not updated for ${id}: ${errorMessage(error)}`);
    }
  }
}
