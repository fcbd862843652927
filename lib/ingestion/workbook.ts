import * as XLSX from 'xlsx';
import { CellAddress, RawCell } from '../types/ingest';
import { toA1 } from '../schema/cellAddress';
import { civilFromParts } from '../time/civil';

/** Read-only view over a workbook's cached cell values */
export interface WorkbookView {
  sheetNames(): string[];
  cell(sheet: string, address: CellAddress): RawCell;
}

const EMPTY: RawCell = { type: 'empty' };

function dateFromSerial(serial: number, date1904: boolean): RawCell {
  const code = XLSX.SSF.parse_date_code(serial, { date1904 });
  const civil = code
    ? civilFromParts({ year: code.y, month: code.m, day: code.d, hour: code.H, minute: code.M, second: code.S })
    : null;
  return civil ? { type: 'datetime', value: civil } : { type: 'number', value: serial };
}

function dateFromJs(date: Date): RawCell {
  const civil = civilFromParts({
    year: date.getFullYear(),
    month: date.getMonth() + 1,
    day: date.getDate(),
    hour: date.getHours(),
    minute: date.getMinutes(),
    second: date.getSeconds(),
  });
  return civil ? { type: 'datetime', value: civil } : { type: 'error', value: 'invalid date' };
}

/** Map one SheetJS cell object to its cached value; formulas are never evaluated */
export function toRawCell(cell: XLSX.CellObject | undefined, date1904 = false): RawCell {
  if (!cell) return EMPTY;
  const v = cell.v;

  switch (cell.t) {
    case 's':
      return typeof v === 'string' ? { type: 'string', value: v } : EMPTY;
    case 'b':
      return typeof v === 'boolean' ? { type: 'boolean', value: v } : EMPTY;
    case 'e':
      return { type: 'error', value: cell.w ?? String(v ?? '#ERR') };
    case 'd':
      if (v instanceof Date) return dateFromJs(v);
      return typeof v === 'string' ? { type: 'string', value: v } : EMPTY;
    case 'n': {
      if (typeof v !== 'number') return EMPTY;
      if (cell.z !== undefined && XLSX.SSF.is_date(cell.z)) {
        return dateFromSerial(v, date1904);
      }
      return { type: 'number', value: v };
    }
    default:
      return EMPTY;
  }
}

export function fromXlsxWorkbook(wb: XLSX.WorkBook): WorkbookView {
  const date1904 = wb.Workbook?.WBProps?.date1904 ?? false;
  return {
    sheetNames: () => [...wb.SheetNames],
    cell(sheet, address) {
      const ws = wb.Sheets[sheet];
      if (!ws) return EMPTY;
      return toRawCell(ws[toA1(address)], date1904);
    },
  };
}

/**
 * Parse an .xlsx buffer. Number formats are kept so date-formatted serials
 * can be told apart from plain numbers.
 */
export function readWorkbook(bytes: Buffer): WorkbookView {
  const wb = XLSX.read(bytes, { type: 'buffer', cellNF: true, cellFormula: false });
  return fromXlsxWorkbook(wb);
}
