/**
 * Column Mapper tests
 *
 * Run: node --import tsx --test tests/column-mapper-test.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import * as XLSX from 'xlsx';
import {
  MAX_COLUMN_INDEX,
  RowNameIndex,
  columnIndexToLetter,
  columnLetterToIndex,
  readSheetCells,
  validateColumnSelection,
} from '../lib/excel/column-mapper';
import { InvalidColumnSelectionError } from '../lib/errors';
import { buildWorkbook } from './helpers/workbook-fixture';

describe('columnLetterToIndex', () => {
  it('maps single and multi-letter columns', () => {
    assert.equal(columnLetterToIndex('A'), 0);
    assert.equal(columnLetterToIndex('Z'), 25);
    assert.equal(columnLetterToIndex('AA'), 26);
    assert.equal(columnLetterToIndex('AZ'), 51);
    assert.equal(columnLetterToIndex('XFD'), MAX_COLUMN_INDEX);
  });

  it('ignores case and surrounding whitespace', () => {
    assert.equal(columnLetterToIndex(' b '), 1);
  });

  it('rejects letters past XFD and non-letters', () => {
    assert.equal(columnLetterToIndex('XFE'), null);
    assert.equal(columnLetterToIndex('ZZZ'), null);
    assert.equal(columnLetterToIndex('AAAA'), null);
    assert.equal(columnLetterToIndex('A1'), null);
    assert.equal(columnLetterToIndex(''), null);
  });
});

describe('columnIndexToLetter', () => {
  it('inverts columnLetterToIndex', () => {
    assert.equal(columnIndexToLetter(0), 'A');
    assert.equal(columnIndexToLetter(25), 'Z');
    assert.equal(columnIndexToLetter(26), 'AA');
    assert.equal(columnIndexToLetter(701), 'ZZ');
    assert.equal(columnIndexToLetter(702), 'AAA');
    assert.equal(columnIndexToLetter(MAX_COLUMN_INDEX), 'XFD');
  });
});

describe('validateColumnSelection', () => {
  it('normalizes letters to upper case', () => {
    assert.deepEqual(
      validateColumnSelection({ imageColumn: ' a', nameColumn: 'ab ' }),
      { imageColumn: 'A', nameColumn: 'AB' }
    );
  });

  it('rejects an invalid image column', () => {
    assert.throws(
      () => validateColumnSelection({ imageColumn: '1', nameColumn: 'B' }),
      (err: unknown) => {
        assert.ok(err instanceof InvalidColumnSelectionError);
        assert.equal(err.message, 'Image column "1" is not a valid column. Use letters A to XFD, e.g. "A" or "AB".');
        assert.equal(err.statusCode, 400);
        return true;
      }
    );
  });

  it('rejects an invalid name column', () => {
    assert.throws(
      () => validateColumnSelection({ imageColumn: 'A', nameColumn: 'XFE' }),
      { name: 'InvalidColumnSelectionError', message: 'Name column "XFE" is not a valid column. Use letters A to XFD, e.g. "A" or "AB".' }
    );
  });

  it('rejects the same column twice, ignoring case', () => {
    assert.throws(
      () => validateColumnSelection({ imageColumn: 'c', nameColumn: 'C' }),
      { message: 'Image and name columns must be different (both are "C").' }
    );
  });
});

describe('RowNameIndex', () => {
  it('reads one column keyed by 1-based row', () => {
    const sheet = XLSX.utils.aoa_to_sheet([
      ['photo', 'Bolt'],
      ['photo', 42],
      ['photo'],
    ]);
    const index = RowNameIndex.fromSheet(sheet, 'B');

    assert.equal(index.size, 2);
    assert.equal(index.get(1), 'Bolt');
    assert.equal(index.get(2), '42');
    assert.equal(index.get(3), '');
    assert.equal(index.get(99), '');
  });

  it('is empty for a column past XFD', () => {
    const sheet = XLSX.utils.aoa_to_sheet([['x']]);
    assert.equal(RowNameIndex.fromSheet(sheet, 'ZZZZ').size, 0);
  });
});

describe('readSheetCells', () => {
  it('indexes a named sheet of an .xlsx buffer', async () => {
    const data = await buildWorkbook([
      { name: 'Parts', cells: { A1: 'ignored', B1: 'Hex bolt', B3: 1200 } },
      { name: 'Other', cells: { B1: 'elsewhere' } },
    ]);

    const cells = readSheetCells(data, 'parts.xlsx');
    assert.deepEqual(cells.sheetNames, ['Parts', 'Other']);

    const names = cells.columnIndex('Parts', 'B');
    assert.equal(names.get(1), 'Hex bolt');
    assert.equal(names.get(2), '');
    assert.equal(names.get(3), '1200');
    assert.equal(cells.columnIndex('Other', 'B').get(1), 'elsewhere');
  });

  it('returns the same index for repeated lookups', async () => {
    const data = await buildWorkbook([{ name: 'S', cells: { B1: 'x' } }]);
    const cells = readSheetCells(data);
    assert.equal(cells.columnIndex('S', 'B'), cells.columnIndex('S', 'B'));
  });

  it('gives an empty index for an unknown sheet', async () => {
    const data = await buildWorkbook([{ name: 'S', cells: { B1: 'x' } }]);
    assert.equal(readSheetCells(data).columnIndex('Missing', 'B').size, 0);
  });
});
