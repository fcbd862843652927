import * as fs from 'fs';
import * as path from 'path';
import { DateTime } from 'luxon';
import { Diagnostic, FieldValue, NormalizedPayload } from '../types/ingest';
import { SchemaCatalog } from '../schema/catalog';
import { sortFieldSpecsByPosition } from '../schema/cellAddress';

export interface ImportAuditInput {
  filename: string;
  payload: NormalizedPayload;
  catalog: SchemaCatalog;
  startedAt: Date;
  context?: string;
}

const PAD = 14;

function pad(label: string): string {
  return label.padEnd(PAD);
}

function show(value: FieldValue | undefined): string {
  if (value === undefined) return '<not extracted>';
  if (value.kind === 'absent') return '<absent>';
  return `${JSON.stringify(value.value)} (${value.kind})`;
}

function fieldNotes(diagnostics: readonly Diagnostic[], field: string): string[] {
  return diagnostics.filter(d => d.field === field).map(d => `${d.severity}: ${d.message}`);
}

/**
 * Human-readable per-field report of one workbook import, laid out in
 * worksheet order so it can be read beside the sheet.
 */
export function buildImportAudit(input: ImportAuditInput): string {
  const { payload, catalog } = input;
  const started = DateTime.fromJSDate(input.startedAt, { zone: 'utc' }).toFormat('yyyy-MM-dd HH:mm:ss');
  const lines = [`Import of file named ${input.filename} began at ${started} UTC.`];
  if (input.context) lines.push(`Context: ${input.context}`);
  lines.push('');
  lines.push('Schema manifest:');
  lines.push(JSON.stringify(payload.schemas, null, 2));
  lines.push('Workbook metadata:');
  lines.push(JSON.stringify(payload.metadata, null, 2));
  lines.push('');

  for (const tab of payload.tabs) {
    lines.push(`=== Tab "${tab.tabName}" (schema ${tab.schemaId}) ===`);
    const resolved = catalog.resolve(tab.schemaId);
    if (!resolved.ok) {
      lines.push(`  schema no longer in catalog: ${resolved.message}`);
      continue;
    }
    for (const spec of sortFieldSpecsByPosition(resolved.value.schema.fields)) {
      lines.push(`  ${pad('field')}${spec.fieldName}`);
      lines.push(`    ${pad('address')}${spec.valueAddress}`);
      if (spec.labelText !== undefined) lines.push(`    ${pad('label')}${spec.labelText}`);
      lines.push(`    ${pad('type')}${spec.valueType}${spec.isDropDown ? ' (drop-down)' : ''}`);
      lines.push(`    ${pad('value')}${show(tab.fields[spec.fieldName])}`);
      for (const note of fieldNotes(tab.diagnostics, spec.fieldName)) {
        lines.push(`    ${pad('note')}${note}`);
      }
    }
    lines.push('');
  }

  const general = payload.diagnostics.map(d => `  ${d.severity}: ${d.tab ? `[${d.tab}] ` : ''}${d.message}`);
  if (general.length > 0) {
    lines.push('Workbook notes:', ...general, '');
  }
  return lines.join('\n');
}

export async function appendImportAudit(file: string, report: string): Promise<void> {
  await fs.promises.mkdir(path.dirname(file), { recursive: true });
  await fs.promises.appendFile(file, `${report}\n`);
}
