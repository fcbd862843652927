import * as path from 'path';
import { Diagnostic, NormalizedPayload, RawUpload, StagedRecord } from '../types/ingest';
import { Result, ok, fail, errorMessage } from '../types/result';
import { normalizedPayloadSchema } from '../types/schemas';
import { SchemaCatalog } from '../schema/catalog';
import { BlobStore } from '../storage/blobStore';
import { UploadLog, UploadLogEntry } from '../storage/uploadLog';
import { appendImportAudit, buildImportAudit } from '../audit/importAudit';
import { ExtractOptions } from './extractor';
import { flattenPayload, ingestWorkbook } from './ingestor';
import { extractIdentity } from './identity';
import { calculateFileHash, findPriorUploads } from './deduplication';
import { createStagedRecord } from './staged';
import { WorkbookView, readWorkbook } from './workbook';

export type AssembleErrorKind = 'file_error' | 'conversion_failed' | 'compound_field_invalid' | 'missing_id' | 'invalid_id';

export interface StagingAssemblerDeps {
  blobs: BlobStore;
  catalog: SchemaCatalog;
  uploadLog?: UploadLog;
  /** Import audit reports are appended here when set */
  auditFile?: string;
  now?: () => Date;
}

export interface AssembleOptions extends ExtractOptions {
  identityField: string;
}

interface Converted {
  payload: NormalizedPayload;
  fromWorkbook: boolean;
}

/**
 * Turns one raw upload into a frozen StagedRecord: persist the bytes, convert
 * them to a NormalizedPayload, then resolve the identity key. Any failing
 * stage ends the run without a record.
 */
export class StagingAssembler {
  private readonly now: () => Date;

  constructor(
    private readonly deps: StagingAssemblerDeps,
    private readonly options: AssembleOptions
  ) {
    this.now = deps.now ?? (() => new Date());
  }

  async assemble(upload: RawUpload): Promise<Result<StagedRecord, AssembleErrorKind>> {
    const startedAt = this.now();
    const fileHash = calculateFileHash(upload.bytes);

    let savedLocation: string;
    try {
      savedLocation = await this.deps.blobs.save(upload.filename, upload.bytes);
    } catch (error) {
      console.error(`[ingest] Could not save ${upload.filename}:`, error);
      return fail('file_error', `Could not save upload "${upload.filename}": ${errorMessage(error)}`);
    }
    let prior: UploadLogEntry[] = [];
    if (this.deps.uploadLog) {
      try {
        prior = await findPriorUploads(this.deps.uploadLog, fileHash);
      } catch (error) {
        console.warn(`[ingest] Upload history unavailable: ${errorMessage(error)}`);
      }
    }

    const result = await this.stage(upload, savedLocation, fileHash, startedAt, prior);
    await this.logUpload(upload, savedLocation, fileHash, result);
    return result;
  }

  private async stage(
    upload: RawUpload,
    savedLocation: string,
    fileHash: string,
    startedAt: Date,
    prior: readonly UploadLogEntry[]
  ): Promise<Result<StagedRecord, AssembleErrorKind>> {
    const converted = this.convert(upload);
    if (!converted.ok) return converted;
    const { payload, fromWorkbook } = converted.value;

    const flat = flattenPayload(payload);
    const identity = extractIdentity(flat.fields, this.options.identityField);
    if (!identity.ok) return identity;

    if (fromWorkbook && this.deps.auditFile) {
      const report = buildImportAudit({ filename: upload.filename, payload, catalog: this.deps.catalog, startedAt });
      try {
        await appendImportAudit(this.deps.auditFile, report);
      } catch (error) {
        console.warn(`[ingest] Import audit not written: ${errorMessage(error)}`);
      }
    }

    const diagnostics: Diagnostic[] = [
      ...payload.diagnostics,
      ...payload.tabs.flatMap(tab => tab.diagnostics),
      ...flat.diagnostics,
    ];
    if (prior.length > 0) {
      const last = prior[prior.length - 1];
      diagnostics.push({
        severity: 'info',
        code: 'duplicate_upload',
        message: `Identical file uploaded ${prior.length} time(s) before, last as ${last.originalFilename} at ${last.loggedAt}`,
      });
    }
    const schemaVersions = Object.fromEntries(payload.tabs.map((tab): [string, string] => [tab.tabName, tab.schemaId]));

    return ok(createStagedRecord({
      id: identity.value,
      sector: flat.sector,
      sourceFilename: upload.filename,
      savedLocation,
      fields: flat.fields,
      capture: {
        capturedAt: this.now().toISOString(),
        sizeBytes: upload.bytes.length,
        fileHash,
        schemaVersions,
      },
      diagnostics,
    }));
  }

  private convert(upload: RawUpload): Result<Converted, 'conversion_failed' | 'compound_field_invalid'> {
    const extension = path.extname(upload.filename).toLowerCase();

    if (extension === '.xlsx') {
      let workbook: WorkbookView;
      try {
        workbook = readWorkbook(upload.bytes);
      } catch (error) {
        return fail('conversion_failed', `"${upload.filename}" is not a readable workbook: ${errorMessage(error)}`);
      }
      const ingested = ingestWorkbook(workbook, this.deps.catalog, this.options);
      if (ingested.ok) return ok({ payload: ingested.value, fromWorkbook: true });
      if (ingested.kind === 'compound_field_invalid') return fail(ingested.kind, ingested.message);
      return fail('conversion_failed', ingested.message);
    }

    if (extension === '.json') {
      let raw: unknown;
      try {
        raw = JSON.parse(upload.bytes.toString('utf-8'));
      } catch (error) {
        return fail('conversion_failed', `"${upload.filename}" is not valid JSON: ${errorMessage(error)}`);
      }
      const parsed = normalizedPayloadSchema.safeParse(raw);
      if (!parsed.success) {
        const issue = parsed.error.issues[0];
        return fail('conversion_failed', `"${upload.filename}" is not a payload document (${issue.path.join('.')}: ${issue.message})`);
      }
      return ok({ payload: parsed.data, fromWorkbook: false });
    }

    return fail('conversion_failed', `Unsupported file type "${extension || '(none)'}" for "${upload.filename}"`);
  }

  private async logUpload(
    upload: RawUpload,
    location: string,
    fileHash: string,
    result: Result<StagedRecord, AssembleErrorKind>
  ): Promise<void> {
    if (!this.deps.uploadLog) return;
    try {
      await this.deps.uploadLog.record({
        location,
        originalFilename: upload.filename,
        fileHash,
        status: result.ok ? 'staged' : 'failed',
        description: result.ok ? `Staged record ${result.value.id}` : `${result.kind}: ${result.message}`,
        id: result.ok ? result.value.id : undefined,
      });
    } catch (error) {
      console.warn(`[ingest] Upload log not updated for ${upload.filename}: ${errorMessage(error)}`);
    }
  }
}
