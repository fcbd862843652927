import * as fs from 'fs';
import * as path from 'path';
import { DateTime } from 'luxon';
import { z } from 'zod';
import { StagedRecord } from '../types/ingest';
import { diagnosticSchema, fieldValueSchema } from '../types/schemas';
import { createStagedRecord } from '../ingestion/staged';
import { isNotFound, readJsonFile, writeJsonAtomic } from './fsStore';

export const ARTIFACT_FORMAT = 'staged-record';
export const ARTIFACT_VERSION = 1;

const ARTIFACT_NAME = /^id_(\d+)_ts_(\d{8}_\d{6})\.json$/;

export type OnExistingArtifact = 'supersede' | 'reject';

/** A staged record on disk plus its review progress */
export interface StagedArtifact {
  record: StagedRecord;
  confirmedFields: string[];
  revision: number;
  location: string;
}

/** Raised when an artifact already exists and the policy is to reject */
export class StagingConflictError extends Error {
  constructor(readonly id: number, readonly existing: string) {
    super(`A staged artifact for ${id} already exists at ${existing}`);
    this.name = 'StagingConflictError';
  }
}

const artifactDocument = z.object({
  format: z.literal(ARTIFACT_FORMAT),
  version: z.literal(ARTIFACT_VERSION),
  original_filename: z.string(),
  captured_at: z.string(),
  identity_key: z.number().int().positive(),
  sector: z.string(),
  saved_location: z.string(),
  size_bytes: z.number().int().nonnegative(),
  file_hash: z.string(),
  schema_versions: z.record(z.string()),
  confirmed_fields: z.array(z.string()),
  revision: z.number().int().nonnegative(),
  fields: z.record(fieldValueSchema),
  diagnostics: z.array(diagnosticSchema).default([]),
});

type ArtifactDocument = z.infer<typeof artifactDocument>;

function toDocument(record: StagedRecord, confirmedFields: readonly string[], revision: number): ArtifactDocument {
  return {
    format: ARTIFACT_FORMAT,
    version: ARTIFACT_VERSION,
    original_filename: record.sourceFilename,
    captured_at: record.capture.capturedAt,
    identity_key: record.id,
    sector: record.sector,
    saved_location: record.savedLocation,
    size_bytes: record.capture.sizeBytes,
    file_hash: record.capture.fileHash,
    schema_versions: { ...record.capture.schemaVersions },
    confirmed_fields: [...confirmedFields],
    revision,
    fields: { ...record.fields },
    diagnostics: record.diagnostics.map(d => ({ ...d })),
  };
}

function fromDocument(doc: ArtifactDocument): StagedRecord {
  return createStagedRecord({
    id: doc.identity_key,
    sector: doc.sector,
    sourceFilename: doc.original_filename,
    savedLocation: doc.saved_location,
    fields: doc.fields,
    capture: {
      capturedAt: doc.captured_at,
      sizeBytes: doc.size_bytes,
      fileHash: doc.file_hash,
      schemaVersions: doc.schema_versions,
    },
    diagnostics: doc.diagnostics,
  });
}

/** `id_{key}_ts_{yyyyMMdd_HHmmss}.json` from the capture time in UTC */
export function artifactFileName(record: StagedRecord): string {
  const captured = DateTime.fromISO(record.capture.capturedAt, { zone: 'utc' });
  const stamp = captured.isValid ? captured.toFormat('yyyyMMdd_HHmmss') : '00000000_000000';
  return `id_${record.id}_ts_${stamp}.json`;
}

/** Parse an artifact document; throws when the file is not a staged record */
export function parseArtifact(raw: unknown, location: string): StagedArtifact {
  const parsed = artifactDocument.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(`${location} is not a staged-record artifact (${issue.path.join('.')}: ${issue.message})`);
  }
  return {
    record: fromDocument(parsed.data),
    confirmedFields: parsed.data.confirmed_fields,
    revision: parsed.data.revision,
    location,
  };
}

/**
 * Staged artifacts awaiting review, one per identity key. Converged
 * artifacts move into the processed directory.
 */
export class StagingStore {
  constructor(
    private readonly dir: string,
    private readonly processedDir: string
  ) {}

  private async artifactNames(): Promise<string[]> {
    try {
      const entries = await fs.promises.readdir(this.dir);
      return entries.filter(name => ARTIFACT_NAME.test(name)).sort();
    } catch (error) {
      if (isNotFound(error)) return [];
      throw error;
    }
  }

  private async namesFor(id: number): Promise<string[]> {
    const names = await this.artifactNames();
    return names.filter(name => ARTIFACT_NAME.exec(name)?.[1] === String(id));
  }

  /** Write a fresh artifact, replacing any earlier one for the same key */
  async save(record: StagedRecord, onExisting: OnExistingArtifact = 'supersede'): Promise<string> {
    const previous = await this.namesFor(record.id);
    if (onExisting === 'reject' && previous.length > 0) {
      throw new StagingConflictError(record.id, path.join(this.dir, previous[previous.length - 1]));
    }

    const fileName = artifactFileName(record);
    const location = await writeJsonAtomic(path.join(this.dir, fileName), toDocument(record, [], 0));

    for (const name of previous) {
      if (name === fileName) continue;
      await fs.promises.unlink(path.join(this.dir, name));
      console.log(`[staging] Superseded ${name} for ${record.id}`);
    }
    return location;
  }

  /** Rewrite an artifact in place with updated review progress */
  async update(artifact: StagedArtifact, confirmedFields: readonly string[]): Promise<StagedArtifact> {
    const revision = artifact.revision + 1;
    await writeJsonAtomic(artifact.location, toDocument(artifact.record, confirmedFields, revision));
    return { ...artifact, confirmedFields: [...confirmedFields], revision };
  }

  async load(location: string): Promise<StagedArtifact | null> {
    const raw = await readJsonFile(location);
    return raw === null ? null : parseArtifact(raw, location);
  }

  /** Latest artifact for an identity key, or null */
  async find(id: number): Promise<StagedArtifact | null> {
    const names = await this.namesFor(id);
    if (names.length === 0) return null;
    return this.load(path.join(this.dir, names[names.length - 1]));
  }

  async list(): Promise<StagedArtifact[]> {
    const artifacts: StagedArtifact[] = [];
    for (const name of await this.artifactNames()) {
      const artifact = await this.load(path.join(this.dir, name));
      if (artifact) artifacts.push(artifact);
    }
    return artifacts;
  }

  /** Move a converged artifact out of the pending area */
  async markProcessed(artifact: StagedArtifact): Promise<string> {
    await fs.promises.mkdir(this.processedDir, { recursive: true });
    const target = path.join(this.processedDir, path.basename(artifact.location));
    await fs.promises.rename(artifact.location, target);
    return target;
  }

  async remove(artifact: StagedArtifact): Promise<void> {
    await fs.promises.unlink(artifact.location);
  }
}
