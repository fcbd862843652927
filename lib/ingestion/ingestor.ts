import { Diagnostic, ExtractedTab, FieldMap, MetadataValue, NormalizedPayload, RawCell } from '../types/ingest';
import { Result, ok, fail } from '../types/result';
import { SchemaCatalog } from '../schema/catalog';
import { offsetCellAddress, parseCellAddress } from '../schema/cellAddress';
import { ExtractOptions, extractTab } from './extractor';
import { WorkbookView } from './workbook';

export const METADATA_TAB = '_json_metadata';
export const SCHEMA_TAB = '_json_schema';
export const KEY_VALUE_ANCHOR = '$B$15';
export const UNKNOWN_SECTOR = 'Unknown';

export type IngestErrorKind = 'schema_manifest_missing' | 'compound_field_invalid';

export interface FlattenedPayload {
  fields: FieldMap;
  sector: string;
  diagnostics: Diagnostic[];
}

function toMetadataValue(cell: RawCell): MetadataValue {
  return cell.type === 'empty' ? null : cell.value;
}

function keyText(cell: RawCell): string {
  return cell.type === 'empty' ? '' : String(cell.value).trim();
}

/**
 * Read a two-column key/value table starting at `anchor` (key column) and
 * walking down until the first blank key.
 */
export function readKeyValuePairs(
  workbook: WorkbookView,
  tabName: string,
  anchor: string = KEY_VALUE_ANCHOR
): Record<string, MetadataValue> {
  const start = parseCellAddress(anchor);
  if (!start.ok) {
    throw new Error(`Key/value anchor must be an absolute address: ${start.message}`);
  }

  const pairs: Record<string, MetadataValue> = {};
  for (let row = 0; ; row++) {
    const keyCell = offsetCellAddress(start.value, row, 0);
    const key = keyText(workbook.cell(tabName, keyCell));
    if (key === '') break;
    pairs[key] = toMetadataValue(workbook.cell(tabName, offsetCellAddress(keyCell, 0, 1)));
  }
  return pairs;
}

/**
 * Walk the schema manifest and extract every listed tab. Tabs that are
 * missing or name an unknown schema are skipped with a warning.
 */
export function ingestWorkbook(
  workbook: WorkbookView,
  catalog: SchemaCatalog,
  options: ExtractOptions
): Result<NormalizedPayload, IngestErrorKind> {
  const sheets = new Set(workbook.sheetNames());
  if (!sheets.has(SCHEMA_TAB)) {
    return fail('schema_manifest_missing', `Workbook has no "${SCHEMA_TAB}" tab`);
  }

  const metadata = sheets.has(METADATA_TAB) ? readKeyValuePairs(workbook, METADATA_TAB) : {};
  const manifest = readKeyValuePairs(workbook, SCHEMA_TAB);

  const schemas: Record<string, string> = {};
  const tabs: ExtractedTab[] = [];
  const diagnostics: Diagnostic[] = [];
  const skip = (tab: string, message: string) => {
    console.warn(`[ingest] Skipping tab "${tab}": ${message}`);
    diagnostics.push({ severity: 'warning', code: 'tab_skipped', message, tab });
  };

  for (const [tabName, declared] of Object.entries(manifest)) {
    const schemaName = declared === null ? '' : String(declared).trim();
    schemas[tabName] = schemaName;

    if (schemaName === '') {
      skip(tabName, 'manifest entry has no schema name');
      continue;
    }
    if (!sheets.has(tabName)) {
      skip(tabName, 'worksheet not found');
      continue;
    }
    const resolved = catalog.resolve(schemaName);
    if (!resolved.ok) {
      skip(tabName, resolved.message);
      continue;
    }
    if (resolved.value.aliasedFrom !== undefined) {
      diagnostics.push({
        severity: 'info',
        code: 'schema_alias_applied',
        message: `Schema "${resolved.value.aliasedFrom}" resolved to "${resolved.value.schema.id}"`,
        tab: tabName,
      });
    }

    const extracted = extractTab(workbook, tabName, resolved.value.schema, options);
    if (!extracted.ok) return extracted;
    tabs.push(extracted.value);
  }

  return ok({ metadata, schemas, tabs, diagnostics });
}

/**
 * Merge extracted tabs into one field map in manifest order. The first tab
 * to define a field keeps it.
 */
export function flattenPayload(payload: NormalizedPayload): FlattenedPayload {
  const fields: FieldMap = {};
  const owner = new Map<string, string>();
  const diagnostics: Diagnostic[] = [];

  for (const tab of payload.tabs) {
    for (const [name, value] of Object.entries(tab.fields)) {
      const first = owner.get(name);
      if (first !== undefined) {
        diagnostics.push({
          severity: 'warning',
          code: 'field_collision',
          message: `Field also defined on tab "${first}"; keeping that value`,
          tab: tab.tabName,
          field: name,
        });
        continue;
      }
      owner.set(name, tab.tabName);
      fields[name] = value;
    }
  }

  const rawSector = payload.metadata.sector ?? payload.metadata.Sector ?? null;
  let sector = rawSector === null ? '' : String(rawSector).trim();
  if (sector === '') {
    sector = UNKNOWN_SECTOR;
    console.warn(`[ingest] No sector in workbook metadata; using "${UNKNOWN_SECTOR}"`);
    diagnostics.push({
      severity: 'warning',
      code: 'sector_missing',
      message: `No sector in ${METADATA_TAB}; recorded as "${UNKNOWN_SECTOR}"`,
    });
  }

  return { fields, sector, diagnostics };
}
