import { ABSENT, DiagnosticCode, FieldValue, RawCell, ValueType } from '../types/ingest';
import { parseCivilDateTime } from '../time/civil';

export interface CoercionNote {
  severity: 'info' | 'warning';
  code: DiagnosticCode;
  message: string;
}

export interface Coerced {
  value: FieldValue;
  note?: CoercionNote;
}

const INTEGER_TEXT = /^[+-]?\d+$/;
const DECIMAL_TEXT = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const TRUE_TEXT = new Set(['true', 'yes', 'y', '1']);
const FALSE_TEXT = new Set(['false', 'no', 'n', '0']);

function describe(raw: RawCell): string {
  return raw.type === 'empty' ? '<empty>' : `${raw.type} "${String(raw.value)}"`;
}

function converted(value: FieldValue, raw: RawCell, type: ValueType): Coerced {
  return {
    value,
    note: { severity: 'info', code: 'value_coerced', message: `Converted ${describe(raw)} to ${type}` },
  };
}

function dropped(raw: RawCell, type: ValueType, why: string): Coerced {
  return {
    value: ABSENT,
    note: { severity: 'warning', code: 'coerced_to_absent', message: `Cannot use ${describe(raw)} as ${type}: ${why}` },
  };
}

function toInteger(raw: RawCell): Coerced {
  switch (raw.type) {
    case 'number':
      if (Number.isSafeInteger(raw.value)) return { value: { kind: 'integer', value: raw.value } };
      return dropped(raw, 'integer', 'not a whole number');
    case 'string': {
      const text = raw.value.trim();
      if (INTEGER_TEXT.test(text)) {
        const n = Number(text);
        if (Number.isSafeInteger(n)) return converted({ kind: 'integer', value: n }, raw, 'integer');
        return dropped(raw, 'integer', 'outside the safe integer range');
      }
      if (DECIMAL_TEXT.test(text) && Number.isSafeInteger(Number(text))) {
        return converted({ kind: 'integer', value: Number(text) }, raw, 'integer');
      }
      return dropped(raw, 'integer', 'not an integer');
    }
    default:
      return dropped(raw, 'integer', 'incompatible cell type');
  }
}

function toFloat(raw: RawCell): Coerced {
  switch (raw.type) {
    case 'number':
      return { value: { kind: 'float', value: raw.value } };
    case 'string': {
      const text = raw.value.trim();
      if (DECIMAL_TEXT.test(text)) {
        const n = Number(text);
        if (Number.isFinite(n)) return converted({ kind: 'float', value: n }, raw, 'float');
      }
      return dropped(raw, 'float', 'not a number');
    }
    default:
      return dropped(raw, 'float', 'incompatible cell type');
  }
}

function toBoolean(raw: RawCell): Coerced {
  switch (raw.type) {
    case 'boolean':
      return { value: { kind: 'boolean', value: raw.value } };
    case 'number':
      if (raw.value === 1 || raw.value === 0) {
        return converted({ kind: 'boolean', value: raw.value === 1 }, raw, 'boolean');
      }
      return dropped(raw, 'boolean', 'only 1 and 0 convert');
    case 'string': {
      const text = raw.value.trim().toLowerCase();
      if (TRUE_TEXT.has(text)) return converted({ kind: 'boolean', value: true }, raw, 'boolean');
      if (FALSE_TEXT.has(text)) return converted({ kind: 'boolean', value: false }, raw, 'boolean');
      return dropped(raw, 'boolean', 'not a yes/no value');
    }
    default:
      return dropped(raw, 'boolean', 'incompatible cell type');
  }
}

function toDateTime(raw: RawCell): Coerced {
  switch (raw.type) {
    case 'datetime':
      return { value: { kind: 'datetime', value: raw.value } };
    case 'string': {
      const parsed = parseCivilDateTime(raw.value);
      if (parsed.ok) return converted({ kind: 'datetime', value: parsed.value }, raw, 'datetime');
      if (parsed.reason === 'timezone') {
        return {
          value: ABSENT,
          note: {
            severity: 'warning',
            code: 'datetime_dropped',
            message: `Dropped ${describe(raw)}: datetimes must be civil time without an offset or zone`,
          },
        };
      }
      return dropped(raw, 'datetime', 'unrecognized date layout');
    }
    default:
      return dropped(raw, 'datetime', 'incompatible cell type');
  }
}

function toText(raw: RawCell): Coerced {
  switch (raw.type) {
    case 'string':
      return { value: { kind: 'string', value: raw.value } };
    case 'number':
    case 'boolean':
    case 'datetime':
      return converted({ kind: 'string', value: String(raw.value) }, raw, 'string');
    default:
      return dropped(raw, 'string', 'incompatible cell type');
  }
}

/**
 * Convert one cached cell value to the schema's expected type. Blank cells and
 * blank text are absent; anything that cannot convert safely becomes absent
 * with a warning instead of a guessed value.
 */
export function coerceCell(raw: RawCell, type: ValueType): Coerced {
  if (raw.type === 'empty') return { value: ABSENT };
  if (raw.type === 'string' && raw.value.trim() === '') return { value: ABSENT };
  if (raw.type === 'error') return dropped(raw, type, 'cell holds a spreadsheet error');

  switch (type) {
    case 'string':
      return toText(raw);
    case 'integer':
      return toInteger(raw);
    case 'float':
      return toFloat(raw);
    case 'boolean':
      return toBoolean(raw);
    case 'datetime':
      return toDateTime(raw);
  }
}
