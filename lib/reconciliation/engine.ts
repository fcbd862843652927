import { DiffEntry, FieldMap, StoredRecord } from '../types/ingest';
import { Failure, Result, errorMessage, fail, ok } from '../types/result';
import { RecordStore, storeFailure } from '../storage/recordStore';
import { StagedArtifact, StagingStore } from '../storage/stagingStore';
import { ChangeContext, ChangeLog } from '../audit/changeLog';
import { computeDiff } from './diff';
import { toStoredValue } from './normalize';

export type ReconciliationState = 'pending' | 'partially_confirmed' | 'converged';

export type ReconcileErrorKind = 'validation_error' | 'database_error' | 'file_error';

export type ReconciliationOutcome =
  | {
      ok: true;
      id: number;
      state: ReconciliationState;
      remainingDiffCount: number;
      appliedFields: string[];
      artifactRef: string;
      message: string;
    }
  | (Failure<ReconcileErrorKind> & { remainingDiffCount?: number; state?: ReconciliationState });

export interface ReviewView {
  artifact: StagedArtifact;
  stored: StoredRecord | null;
  diffs: DiffEntry[];
  state: ReconciliationState;
}

export interface PendingSummary {
  id: number;
  sector: string;
  sourceFilename: string;
  capturedAt: string;
  revision: number;
  confirmedFields: string[];
  location: string;
}

export interface ReconciliationEngineDeps {
  records: RecordStore;
  staging: StagingStore;
  changeLog?: ChangeLog;
  referenceZone: string;
}

function hasOwn(fields: Readonly<FieldMap>, name: string): boolean {
  return Object.prototype.hasOwnProperty.call(fields, name);
}

export function stateOf(diffs: readonly DiffEntry[], confirmedFields: readonly string[]): ReconciliationState {
  if (diffs.length === 0) return 'converged';
  return confirmedFields.length > 0 ? 'partially_confirmed' : 'pending';
}

/**
 * Staged-record review per identity key. Each apply writes the accepted
 * fields in one upsert and recomputes the remaining diff locally.
 */
export class ReconciliationEngine {
  constructor(private readonly deps: ReconciliationEngineDeps) {}

  diff(fields: Readonly<FieldMap>, stored: Readonly<StoredRecord> | null, confirmed: readonly string[] = []): DiffEntry[] {
    return computeDiff(fields, stored, this.deps.referenceZone, confirmed);
  }

  private async findArtifact(id: number): Promise<Result<StagedArtifact, 'validation_error' | 'file_error'>> {
    let artifact: StagedArtifact | null;
    try {
      artifact = await this.deps.staging.find(id);
    } catch (error) {
      return fail('file_error', `Staged artifact for ${id} is unreadable: ${errorMessage(error)}`);
    }
    return artifact ? ok(artifact) : fail('validation_error', `No staged record awaiting review for ${id}`);
  }

  async review(id: number): Promise<Result<ReviewView, ReconcileErrorKind>> {
    const found = await this.findArtifact(id);
    if (!found.ok) return found;
    const artifact = found.value;

    let stored: StoredRecord | null;
    try {
      stored = await this.deps.records.get(id);
    } catch (error) {
      return storeFailure(error, `Reading record ${id}`);
    }
    const diffs = this.diff(artifact.record.fields, stored, artifact.confirmedFields);
    return ok({ artifact, stored, diffs, state: stateOf(diffs, artifact.confirmedFields) });
  }

  /**
   * Accept staged values for the named fields. The write is all-or-nothing;
   * the artifact is then rewritten, or moved to processed once nothing
   * differs.
   */
  async apply(id: number, acceptedFields: readonly string[], context: ChangeContext = {}): Promise<ReconciliationOutcome> {
    const found = await this.findArtifact(id);
    if (!found.ok) return found;
    const artifact = found.value;
    const fields = artifact.record.fields;

    const unknown = acceptedFields.filter(name => !hasOwn(fields, name) || fields[name].kind === 'absent');
    if (unknown.length > 0) {
      return fail('validation_error', `Not in the staged payload for ${id}: ${unknown.join(', ')}`);
    }

    let stored: StoredRecord | null;
    try {
      stored = await this.deps.records.get(id);
    } catch (error) {
      return storeFailure(error, `Reading record ${id}`);
    }

    const patch: StoredRecord = {};
    for (const name of acceptedFields) {
      patch[name] = toStoredValue(fields[name]);
    }
    if (acceptedFields.length > 0) {
      try {
        await this.deps.records.upsert(id, patch);
      } catch (error) {
        console.error(`[reconcile] Upsert for ${id} failed:`, error);
        return storeFailure(error, `Writing record ${id}`);
      }
      await this.logChanges(id, stored, patch, context);
    }

    const updated: StoredRecord = { ...(stored ?? {}), ...patch };
    const confirmed = [...new Set([...artifact.confirmedFields, ...acceptedFields])].sort();
    const remaining = this.diff(fields, updated, confirmed);
    const state = stateOf(remaining, confirmed);
    const applied = [...acceptedFields];

    try {
      if (state === 'converged') {
        const processed = await this.deps.staging.markProcessed(artifact);
        console.log(`[reconcile] ${id} converged; artifact moved to ${processed}`);
        return { ok: true, id, state, remainingDiffCount: 0, appliedFields: applied, artifactRef: processed, message: `Record ${id} converged` };
      }
      const rewritten = acceptedFields.length > 0 ? await this.deps.staging.update(artifact, confirmed) : artifact;
      return {
        ok: true,
        id,
        state,
        remainingDiffCount: remaining.length,
        appliedFields: applied,
        artifactRef: rewritten.location,
        message: `Record ${id}: ${remaining.length} difference(s) remain`,
      };
    } catch (error) {
      // the record store write stands; only the artifact bookkeeping failed
      return {
        ...fail('file_error', `Applied to ${id} but the staged artifact was not updated: ${errorMessage(error)}`),
        remainingDiffCount: remaining.length,
        state,
      };
    }
  }

  /** Drop a staged artifact without touching the stored record */
  async discard(id: number): Promise<Result<string, 'validation_error' | 'file_error'>> {
    const found = await this.findArtifact(id);
    if (!found.ok) return found;
    try {
      await this.deps.staging.remove(found.value);
    } catch (error) {
      return fail('file_error', `Could not discard ${found.value.location}: ${errorMessage(error)}`);
    }
    console.log(`[reconcile] Discarded staged record ${id}`);
    return ok(found.value.location);
  }

  async listPending(): Promise<PendingSummary[]> {
    const artifacts = await this.deps.staging.list();
    return artifacts.map(a => ({
      id: a.record.id,
      sector: a.record.sector,
      sourceFilename: a.record.sourceFilename,
      capturedAt: a.record.capture.capturedAt,
      revision: a.revision,
      confirmedFields: a.confirmedFields,
      location: a.location,
    }));
  }

  private async logChanges(id: number, before: StoredRecord | null, patch: StoredRecord, context: ChangeContext): Promise<void> {
    if (!this.deps.changeLog) return;
    try {
      await this.deps.changeLog.append(id, before, patch, context);
    } catch (error) {
      console.warn(`[reconcile] Change log not updated for ${id}: ${errorMessage(error)}`);
    }
  }
}
