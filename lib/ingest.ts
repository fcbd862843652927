import * as fs from 'fs';
import * as path from 'path';
import { IngestConfig } from './config';
import { DataPaths, changeLogFile, dataPaths, importAuditFile, uploadLogFile } from './paths';
import { Failure, Result, errorMessage, fail } from './types/result';
import { SchemaCatalog } from './schema/catalog';
import { loadSchemaCatalogFromDir } from './schema/sources';
import { assertValidZone } from './time/civil';
import { FsBlobStore } from './storage/blobStore';
import { FsRecordStore, RecordStore } from './storage/recordStore';
import { StagingStore } from './storage/stagingStore';
import { UploadLog } from './storage/uploadLog';
import { ChangeContext, ChangeLog } from './audit/changeLog';
import { StagingAssembler } from './ingestion/pipeline';
import { PersistenceOutcome, PersistenceRouter } from './persistence/router';
import { ReconciliationEngine } from './reconciliation/engine';

export interface IngestService {
  config: IngestConfig;
  paths: DataPaths;
  catalog: SchemaCatalog;
  assembler: StagingAssembler;
  router: PersistenceRouter;
  engine: ReconciliationEngine;
}

/**
 * Wire the stores and components for one data root. A record store can be
 * injected; otherwise records live as JSON files under the data root.
 */
export async function createIngestService(
  config: IngestConfig,
  records?: RecordStore
): Promise<Result<IngestService, 'schema_invalid'>> {
  assertValidZone(config.referenceZone);
  const catalog = await loadSchemaCatalogFromDir(config.schemaDir);
  if (!catalog.ok) return catalog;

  const paths = dataPaths(config.dataRoot);
  const recordStore = records ?? new FsRecordStore(paths.records);
  const staging = new StagingStore(paths.staging, paths.processed);
  const changeLog = new ChangeLog(changeLogFile(paths));

  const assembler = new StagingAssembler(
    {
      blobs: new FsBlobStore(paths.uploads),
      catalog: catalog.value,
      uploadLog: new UploadLog(uploadLogFile(paths)),
      auditFile: importAuditFile(paths),
    },
    { referenceZone: config.referenceZone, identityField: config.identityField }
  );
  const router = new PersistenceRouter({
    records: recordStore,
    staging,
    changeLog,
    referenceZone: config.referenceZone,
    identityField: config.identityField,
  });
  const engine = new ReconciliationEngine({ records: recordStore, staging, changeLog, referenceZone: config.referenceZone });

  console.log(`[ingest] Loaded ${catalog.value.names().length} schema(s) from ${config.schemaDir}`);
  return { ok: true, value: { config, paths, catalog: catalog.value, assembler, router, engine } };
}

/** Read a file from disk, assemble it, and route it with the configured switches */
export async function ingestFile(
  service: IngestService,
  filePath: string,
  context: ChangeContext = {}
): Promise<PersistenceOutcome | Failure> {
  let bytes: Buffer;
  try {
    bytes = await fs.promises.readFile(filePath);
  } catch (error) {
    return fail('file_error', `Cannot read ${filePath}: ${errorMessage(error)}`);
  }

  const staged = await service.assembler.assemble({ filename: path.basename(filePath), bytes });
  if (!staged.ok) {
    console.warn(`[ingest] ${path.basename(filePath)} rejected (${staged.kind}): ${staged.message}`);
    return staged;
  }
  for (const d of staged.value.diagnostics.filter(item => item.severity === 'warning')) {
    console.warn(`[ingest] ${d.tab ? `${d.tab}/` : ''}${d.field ?? ''}: ${d.message}`);
  }

  const { config } = service;
  return service.router.route(
    staged.value,
    {
      autoConfirm: config.autoConfirm,
      persistStagingArtifact: config.persistStagingArtifact,
      fullFieldOverwrite: config.fullFieldOverwrite,
      onExistingArtifact: config.onExistingArtifact,
    },
    context
  );
}
