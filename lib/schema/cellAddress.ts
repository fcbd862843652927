import { CellAddress, FieldSpec } from '../types/ingest';
import { Result, ok, fail } from '../types/result';

const ABSOLUTE_ADDRESS = /^\$([A-Z]+)\$([1-9][0-9]*)$/;

/**
 * Parse an absolute worksheet address such as "$AA$15".
 * Relative or mixed forms ("A1", "$A1", "A$1") are rejected.
 */
export function parseCellAddress(address: string): Result<CellAddress, 'malformed_address'> {
  const match = ABSOLUTE_ADDRESS.exec(address);
  if (!match) {
    return fail('malformed_address', `Cell address must be absolute like "$A$1": "${address}"`);
  }
  const row = Number(match[2]);
  if (!Number.isSafeInteger(row)) {
    return fail('malformed_address', `Row out of range in cell address: "${address}"`);
  }
  return ok({ column: match[1], row });
}

/** A=1, Z=26, AA=27 */
export function columnToIndex(column: string): number {
  let index = 0;
  for (const char of column) {
    index = index * 26 + (char.charCodeAt(0) - 64);
  }
  return index;
}

export function indexToColumn(index: number): string {
  if (!Number.isInteger(index) || index < 1) {
    throw new RangeError(`Column index must be a positive integer, got ${index}`);
  }
  let column = '';
  let n = index;
  while (n > 0) {
    const rem = (n - 1) % 26;
    column = String.fromCharCode(65 + rem) + column;
    n = Math.floor((n - 1) / 26);
  }
  return column;
}

export function formatCellAddress(cell: CellAddress): string {
  return `$${cell.column}$${cell.row}`;
}

/** Unanchored reference ("AA15") used for direct worksheet lookups */
export function toA1(cell: CellAddress): string {
  return `${cell.column}${cell.row}`;
}

export function offsetCellAddress(cell: CellAddress, rows: number, columns: number): CellAddress {
  const row = cell.row + rows;
  const columnIndex = columnToIndex(cell.column) + columns;
  if (row < 1 || columnIndex < 1) {
    throw new RangeError(`Offset (${rows}, ${columns}) from ${formatCellAddress(cell)} leaves the worksheet`);
  }
  return { column: indexToColumn(columnIndex), row };
}

/**
 * Order two cells by worksheet position. Ties on the primary axis fall back to
 * the other axis so the ordering is total.
 */
export function compareCellAddresses(a: CellAddress, b: CellAddress, by: 'row' | 'column'): number {
  const rowDelta = a.row - b.row;
  const columnDelta = columnToIndex(a.column) - columnToIndex(b.column);
  if (by === 'row') {
    return rowDelta !== 0 ? rowDelta : columnDelta;
  }
  return columnDelta !== 0 ? columnDelta : rowDelta;
}

/** Field specs sorted by where their value cells sit on the worksheet */
export function sortFieldSpecsByPosition(fields: readonly FieldSpec[], by: 'row' | 'column' = 'row'): FieldSpec[] {
  const positioned = fields.map(spec => {
    const parsed = parseCellAddress(spec.valueAddress);
    if (!parsed.ok) {
      // catalog validation guarantees well-formed addresses
      throw new Error(`Field "${spec.fieldName}" carries an invalid address: ${parsed.message}`);
    }
    return { spec, cell: parsed.value };
  });
  positioned.sort((a, b) => compareCellAddresses(a.cell, b.cell, by));
  return positioned.map(p => p.spec);
}
