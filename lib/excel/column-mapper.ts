/**
 * Column Mapper
 *
 * Resolves column letters and looks up name-column values per row.
 * Cell values come from SheetJS (xlsx), which formats numbers and dates the
 * way Excel displays them; the drawing layer SheetJS skips is handled by
 * workbook-reader.ts.
 */

import * as XLSX from 'xlsx';
import { InvalidColumnSelectionError, UnsupportedFormatError, errorMessage } from '../errors';
import type { ColumnSelection } from '../types';

/** Last addressable worksheet column (XFD) as a 0-based index */
export const MAX_COLUMN_INDEX = 16383;

// ============================================================================
// Column Letters
// ============================================================================

/**
 * Convert a column letter to a 0-based index (A→0, Z→25, AA→26).
 * Returns null for anything that is not a column inside A..XFD.
 */
export function columnLetterToIndex(letter: string): number | null {
  const normalized = letter.trim().toUpperCase();
  if (!/^[A-Z]{1,3}$/.test(normalized)) return null;

  let result = 0;
  for (const char of normalized) {
    result = result * 26 + (char.charCodeAt(0) - 64);
  }
  const index = result - 1;
  return index <= MAX_COLUMN_INDEX ? index : null;
}

/** Convert 0-based column index to Excel letter (0→A, 25→Z, 26→AA) */
export function columnIndexToLetter(col: number): string {
  let result = '';
  let c = col;
  while (c >= 0) {
    result = String.fromCharCode((c % 26) + 65) + result;
    c = Math.floor(c / 26) - 1;
  }
  return result;
}

/**
 * Validate and normalize an image/name column pair.
 *
 * @throws InvalidColumnSelectionError when a letter is outside A..XFD or both are the same
 */
export function validateColumnSelection(selection: ColumnSelection): ColumnSelection {
  const imageColumn = selection.imageColumn.trim().toUpperCase();
  const nameColumn = selection.nameColumn.trim().toUpperCase();

  for (const [label, value] of [['Image', imageColumn], ['Name', nameColumn]] as const) {
    if (columnLetterToIndex(value) === null) {
      throw new InvalidColumnSelectionError(
        `${label} column "${value}" is not a valid column. Use letters A to XFD, e.g. "A" or "AB".`,
        { imageColumn, nameColumn }
      );
    }
  }

  if (imageColumn === nameColumn) {
    throw new InvalidColumnSelectionError(
      `Image and name columns must be different (both are "${imageColumn}").`,
      { imageColumn, nameColumn }
    );
  }

  return { imageColumn, nameColumn };
}

// ============================================================================
// Row Name Index
// ============================================================================

function isCellObject(value: unknown): value is XLSX.CellObject {
  return typeof value === 'object' && value !== null && 't' in value;
}

function cellText(cell: XLSX.CellObject): string {
  if (cell.t === 'z') return '';
  if (typeof cell.w === 'string') return cell.w;
  if (cell.v === undefined || cell.v === null) return '';
  return cell.v instanceof Date ? cell.v.toISOString() : String(cell.v);
}

/**
 * Values of one column keyed by 1-based row number.
 * Rows without a value read as the empty string.
 */
export class RowNameIndex {
  private readonly values: Map<number, string>;

  private constructor(readonly column: string, values: Map<number, string>) {
    this.values = values;
  }

  static fromSheet(sheet: XLSX.WorkSheet, column: string): RowNameIndex {
    const values = new Map<number, string>();
    const targetCol = columnLetterToIndex(column);

    if (targetCol !== null) {
      for (const key of Object.keys(sheet)) {
        if (key.startsWith('!')) continue;
        const cell: unknown = sheet[key];
        if (!isCellObject(cell)) continue;

        const address = XLSX.utils.decode_cell(key);
        if (address.c !== targetCol) continue;
        values.set(address.r + 1, cellText(cell));
      }
    }

    return new RowNameIndex(column, values);
  }

  static empty(column: string): RowNameIndex {
    return new RowNameIndex(column, new Map());
  }

  get(row: number): string {
    return this.values.get(row) ?? '';
  }

  get size(): number {
    return this.values.size;
  }
}

// ============================================================================
// Workbook Cells
// ============================================================================

export interface SheetCells {
  /** Sheet names in workbook order */
  sheetNames: string[];
  /** Build the index for one column of one sheet */
  columnIndex(sheetName: string, column: string): RowNameIndex;
}

/**
 * Read cell values of an .xlsx buffer.
 *
 * Call only after openWorkbook accepted the bytes: SheetJS parses arbitrary
 * bytes as CSV and does not return on some damaged deflate streams.
 */
export function readSheetCells(data: Buffer, fileName?: string): SheetCells {
  let workbook: XLSX.WorkBook;
  try {
    workbook = XLSX.read(data, {
      type: 'buffer',
      cellFormula: false,
      cellHTML: false,
      cellStyles: false,
      cellDates: true,
    });
  } catch (err) {
    throw new UnsupportedFormatError(
      `Could not read cells of ${fileName ?? 'workbook'}: ${errorMessage(err)}`,
      { fileName, cause: err instanceof Error ? err : undefined }
    );
  }

  const cache = new Map<string, RowNameIndex>();

  return {
    sheetNames: workbook.SheetNames,
    columnIndex(sheetName: string, column: string): RowNameIndex {
      const key = `${sheetName}\u0000${column}`;
      const cached = cache.get(key);
      if (cached) return cached;

      const sheet = workbook.Sheets[sheetName];
      const index = sheet ? RowNameIndex.fromSheet(sheet, column) : RowNameIndex.empty(column);
      cache.set(key, index);
      return index;
    },
  };
}
