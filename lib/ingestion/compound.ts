import { FieldMap, FieldValue } from '../types/ingest';
import { Result, ok, fail } from '../types/result';

/** One synthetic field that splits into several atomic fields */
export interface CompoundRule {
  source: string;
  targets: readonly string[];
  separator: string;
  valueType: 'float' | 'string';
}

export const DEFAULT_COMPOUND_RULES: readonly CompoundRule[] = [
  { source: 'lat_and_long', targets: ['lat_arb', 'long_arb'], separator: ',', valueType: 'float' },
];

const NUMBER_TEXT = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

function hasOwn(fields: FieldMap, name: string): boolean {
  return Object.prototype.hasOwnProperty.call(fields, name);
}

function sourceText(value: FieldValue): string | null {
  return value.kind === 'absent' ? null : String(value.value);
}

function partValue(rule: CompoundRule, part: string): FieldValue | null {
  if (rule.valueType === 'string') {
    return { kind: 'string', value: part };
  }
  if (!NUMBER_TEXT.test(part)) return null;
  const n = Number(part);
  return Number.isFinite(n) ? { kind: 'float', value: n } : null;
}

/**
 * Replace each configured synthetic field with its parts. The input map is
 * not modified; key order is kept with targets taking the source's slot.
 */
export function expandCompoundFields(
  fields: FieldMap,
  rules: readonly CompoundRule[]
): Result<FieldMap, 'compound_field_invalid'> {
  let current = fields;

  for (const rule of rules) {
    if (!hasOwn(current, rule.source)) continue;
    const text = sourceText(current[rule.source]);

    let expansion: FieldMap = {};
    if (text !== null) {
      const parts = text.split(rule.separator).map(p => p.trim());
      if (parts.length !== rule.targets.length) {
        return fail(
          'compound_field_invalid',
          `${rule.source}: expected ${rule.targets.length} parts separated by "${rule.separator}", got ${parts.length} in "${text}"`
        );
      }
      for (let i = 0; i < parts.length; i++) {
        const value = partValue(rule, parts[i]);
        if (!value) {
          return fail('compound_field_invalid', `${rule.source}: part "${parts[i]}" is not a valid ${rule.valueType}`);
        }
        expansion = { ...expansion, [rule.targets[i]]: value };
      }
    }

    const next: FieldMap = {};
    for (const [key, value] of Object.entries(current)) {
      if (key === rule.source) {
        Object.assign(next, expansion);
      } else if (!hasOwn(expansion, key)) {
        next[key] = value;
      }
    }
    current = next;
  }

  return ok(current);
}
