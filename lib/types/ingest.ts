export type ValueType = 'string' | 'integer' | 'float' | 'datetime' | 'boolean';

export const VALUE_TYPES: readonly ValueType[] = ['string', 'integer', 'float', 'datetime', 'boolean'];

export type FieldValue =
  | { kind: 'string'; value: string }
  | { kind: 'integer'; value: number }
  | { kind: 'float'; value: number }
  | { kind: 'datetime'; value: string }   // civil time, yyyy-MM-ddTHH:mm:ss, no offset
  | { kind: 'boolean'; value: boolean }
  | { kind: 'absent' };

export const ABSENT: FieldValue = Object.freeze({ kind: 'absent' });

export type FieldMap = Record<string, FieldValue>;

export interface CellAddress {
  column: string;   // A, B, ... AA
  row: number;      // 1-based
}

export interface FieldSpec {
  fieldName: string;
  valueAddress: string;
  labelAddress?: string;
  labelText?: string;
  valueType: ValueType;
  isDropDown: boolean;
}

export interface SchemaVersion {
  id: string;
  fields: readonly FieldSpec[];      // declaration order
  metadata: Record<string, unknown>;
}

/** Raw cached value of one worksheet cell */
export type RawCell =
  | { type: 'empty' }
  | { type: 'string'; value: string }
  | { type: 'number'; value: number }
  | { type: 'boolean'; value: boolean }
  | { type: 'datetime'; value: string }
  | { type: 'error'; value: string };

export const DIAGNOSTIC_CODES = [
  'label_mismatch',
  'value_coerced',
  'coerced_to_absent',
  'datetime_dropped',
  'drop_down_placeholder',
  'schema_alias_applied',
  'tab_skipped',
  'field_collision',
  'sector_missing',
  'duplicate_upload',
] as const;

export type DiagnosticCode = (typeof DIAGNOSTIC_CODES)[number];

export interface Diagnostic {
  severity: 'info' | 'warning';
  code: DiagnosticCode;
  message: string;
  tab?: string;
  field?: string;
  address?: string;
}

export interface ExtractedTab {
  tabName: string;
  schemaId: string;
  fields: FieldMap;
  diagnostics: Diagnostic[];
}

export type MetadataValue = string | number | boolean | null;

export interface NormalizedPayload {
  metadata: Record<string, MetadataValue>;
  schemas: Record<string, string>;   // tab name -> declared schema name
  tabs: ExtractedTab[];
  diagnostics: Diagnostic[];
}

export interface CaptureMeta {
  capturedAt: string;
  sizeBytes: number;
  fileHash: string;
  schemaVersions: Record<string, string>;
}

export interface StagedRecord {
  readonly id: number;
  readonly sector: string;
  readonly sourceFilename: string;
  readonly savedLocation: string;
  readonly fields: Readonly<FieldMap>;
  readonly capture: Readonly<CaptureMeta>;
  readonly diagnostics: readonly Diagnostic[];
}

export type StoredValue = string | number | boolean | null;

export type StoredRecord = Record<string, StoredValue>;

export interface DiffEntry {
  field: string;
  stored: string;
  incoming: string;
  confirmed: boolean;
}

export interface RawUpload {
  filename: string;
  bytes: Buffer;
}
