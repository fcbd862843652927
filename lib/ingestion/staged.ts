import { CaptureMeta, Diagnostic, FieldMap, StagedRecord } from '../types/ingest';

export interface StagedRecordInput {
  id: number;
  sector: string;
  sourceFilename: string;
  savedLocation: string;
  fields: FieldMap;
  capture: CaptureMeta;
  diagnostics: readonly Diagnostic[];
}

/** Build a StagedRecord with every nested object copied and frozen */
export function createStagedRecord(input: StagedRecordInput): StagedRecord {
  const fields: FieldMap = {};
  for (const [name, value] of Object.entries(input.fields)) {
    fields[name] = Object.freeze({ ...value });
  }
  return Object.freeze({
    id: input.id,
    sector: input.sector,
    sourceFilename: input.sourceFilename,
    savedLocation: input.savedLocation,
    fields: Object.freeze(fields),
    capture: Object.freeze({
      ...input.capture,
      schemaVersions: Object.freeze({ ...input.capture.schemaVersions }),
    }),
    diagnostics: Object.freeze(input.diagnostics.map(d => Object.freeze({ ...d }))),
  });
}
