/**
 * Tests for the layout spreadsheet converter. Workbooks are built in memory.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { Workbook } from 'exceljs';
import {
  LayoutSheetError,
  MissingColumnError,
  convertLayoutSheet,
  convertLayoutWorkbook,
  readLayoutRows,
} from '../lib/tools/layout-sheet-converter';

type CellInput = string | number | null;

function buildWorkbook(rows: CellInput[][]): Workbook {
  const workbook = new Workbook();
  const sheet = workbook.addWorksheet('Layout');
  for (const row of rows) {
    sheet.addRow(row);
  }
  return workbook;
}

const LAYOUT_ROWS: CellInput[][] = [
  ['Item', 'Field', 'Size', 'Position'],
  ['Header', 'Record Type', 1, '1-1'],
  [null, 'Member ID (Primary)', 10, '2-11'],
  [null, 'Date-Of-Birth', '8', '12-19'],
  ['Detail', 'Notes', null, '20-29'],
  [null, 'Amount', 'ten', '30-39'],
  [null, ' Zip Code ', 5, ' 40-44 '],
];

describe('convertLayoutWorkbook', () => {
  test('should convert complete rows and skip invalid sizes without reusing numbers', () => {
    expect(convertLayoutWorkbook(buildWorkbook(LAYOUT_ROWS))).toEqual({
      detail: {
        '1': { fieldName: 'RecordType', dataType: 'string', size: 1, pos: '1-1' },
        '2': { fieldName: 'MemberIDPrimary', dataType: 'string', size: 10, pos: '2-11' },
        '3': { fieldName: 'DateOfBirth', dataType: 'string', size: 8, pos: '12-19' },
        '5': { fieldName: 'ZipCode', dataType: 'string', size: 5, pos: '40-44' },
      },
    });
  });

  test('should trim header names', () => {
    const workbook = buildWorkbook([
      [' Item ', 'Field ', ' Size', 'Position'],
      ['A', 'Claim Number', 12, '1-12'],
    ]);

    expect(convertLayoutWorkbook(workbook).detail['1']).toEqual({
      fieldName: 'ClaimNumber',
      dataType: 'string',
      size: 12,
      pos: '1-12',
    });
  });

  test('should raise MissingColumnError for a missing Position column', () => {
    const workbook = buildWorkbook([
      ['Item', 'Field', 'Size'],
      ['A', 'Claim Number', 12],
    ]);

    expect(() => convertLayoutWorkbook(workbook)).toThrow(MissingColumnError);
    expect(() => convertLayoutWorkbook(workbook)).toThrow('Missing expected column: Position');
  });

  test('should report a missing Item column first', () => {
    const workbook = buildWorkbook([
      ['Field', 'Size'],
      ['Claim Number', 12],
    ]);

    try {
      convertLayoutWorkbook(workbook);
      throw new Error('expected convertLayoutWorkbook to throw');
    } catch (error) {
      expect(error).toBeInstanceOf(MissingColumnError);
      expect(error).toHaveProperty('column', 'Item');
      expect(error).toHaveProperty('message', "'Item' column not found");
    }
  });

  test('should reject a workbook without worksheets', () => {
    expect(() => convertLayoutWorkbook(new Workbook())).toThrow(LayoutSheetError);
  });
});

describe('readLayoutRows', () => {
  test('should forward-fill the Item column', () => {
    const workbook = buildWorkbook(LAYOUT_ROWS);

    const rows = readLayoutRows(workbook.worksheets[0]);

    expect(rows.map((row) => row.item)).toEqual(['Header', 'Header', 'Header', 'Detail', 'Detail', 'Detail']);
    expect(rows[3].size).toBeUndefined();
  });
});

describe('convertLayoutSheet', () => {
  let tempDir: string;

  beforeAll(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'layout-sheet-'));
  });

  afterAll(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  test('should read the first worksheet of an xlsx file', async () => {
    const filePath = path.join(tempDir, 'layout.xlsx');
    await buildWorkbook(LAYOUT_ROWS).xlsx.writeFile(filePath);

    const document = await convertLayoutSheet(filePath);

    expect(Object.keys(document.detail)).toEqual(['1', '2', '3', '5']);
  });

  test('should raise LayoutSheetError for an unreadable file', async () => {
    await expect(convertLayoutSheet(path.join(tempDir, 'missing.xlsx'))).rejects.toThrow(LayoutSheetError);
  });
});
