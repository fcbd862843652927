import { Diagnostic, ExtractedTab, FieldMap, FieldSpec, RawCell, SchemaVersion } from '../types/ingest';
import { Result, ok } from '../types/result';
import { parseCellAddress } from '../schema/cellAddress';
import { civilToUtc } from '../time/civil';
import { coerceCell } from './coerce';
import { CompoundRule, DEFAULT_COMPOUND_RULES, expandCompoundFields } from './compound';
import { WorkbookView } from './workbook';

export const DROP_DOWN_PLACEHOLDER = 'Please Select';

export interface ExtractOptions {
  /** IANA zone civil datetimes are interpreted in */
  referenceZone: string;
  compoundRules?: readonly CompoundRule[];
  dropDownPlaceholder?: string;
}

function cellText(cell: RawCell): string {
  return cell.type === 'empty' ? '' : String(cell.value).trim();
}

function readCell(workbook: WorkbookView, tabName: string, address: string): RawCell {
  const parsed = parseCellAddress(address);
  if (!parsed.ok) {
    // addresses are validated when the catalog loads
    throw new Error(`Invalid address "${address}" reached extraction: ${parsed.message}`);
  }
  return workbook.cell(tabName, parsed.value);
}

function checkLabel(workbook: WorkbookView, tabName: string, spec: FieldSpec): Diagnostic | null {
  if (spec.labelAddress === undefined || spec.labelText === undefined) return null;
  const found = cellText(readCell(workbook, tabName, spec.labelAddress));
  const expected = spec.labelText.trim();
  if (found === expected) return null;
  return {
    severity: 'warning',
    code: 'label_mismatch',
    message: `Expected label "${expected}" but found "${found}"`,
    tab: tabName,
    field: spec.fieldName,
    address: spec.labelAddress,
  };
}

/**
 * Extract one worksheet through a schema. Field problems become diagnostics;
 * only a malformed compound value fails the tab.
 */
export function extractTab(
  workbook: WorkbookView,
  tabName: string,
  schema: SchemaVersion,
  options: ExtractOptions
): Result<ExtractedTab, 'compound_field_invalid'> {
  const placeholder = options.dropDownPlaceholder ?? DROP_DOWN_PLACEHOLDER;
  const diagnostics: Diagnostic[] = [];
  const fields: FieldMap = {};

  for (const spec of schema.fields) {
    const at = { tab: tabName, field: spec.fieldName, address: spec.valueAddress };

    const labelIssue = checkLabel(workbook, tabName, spec);
    if (labelIssue) diagnostics.push(labelIssue);

    const coerced = coerceCell(readCell(workbook, tabName, spec.valueAddress), spec.valueType);
    let value = coerced.value;
    if (coerced.note) diagnostics.push({ ...coerced.note, ...at });

    if (value.kind === 'datetime') {
      const instant = civilToUtc(value.value, options.referenceZone);
      if (!instant.ok) {
        diagnostics.push({
          severity: 'warning',
          code: 'datetime_dropped',
          message: `Dropped ${value.value}: ${instant.reason} in ${options.referenceZone}`,
          ...at,
        });
        value = { kind: 'absent' };
      }
    }

    if (spec.isDropDown && value.kind === 'string' && value.value.trim() === placeholder) {
      diagnostics.push({
        severity: 'info',
        code: 'drop_down_placeholder',
        message: `Drop-down still shows "${placeholder}"`,
        ...at,
      });
    }

    fields[spec.fieldName] = value;
  }

  const expanded = expandCompoundFields(fields, options.compoundRules ?? DEFAULT_COMPOUND_RULES);
  if (!expanded.ok) {
    return { ...expanded, message: `Tab "${tabName}": ${expanded.message}` };
  }

  return ok({ tabName, schemaId: schema.id, fields: expanded.value, diagnostics });
}
