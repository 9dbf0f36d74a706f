/**
 * Whole-sheet read and write for the `.xlsx` tables the pipeline keeps
 */

import { renameSync, rmSync, writeFileSync } from 'fs';
import ExcelJS from 'exceljs';
import type { Fill } from 'exceljs';
import { FileIOError } from './errors.js';
import { errorMessage } from './logger.js';

export interface SheetRow {
  /** 1-based worksheet row number */
  number: number;
  values: string[];
}

export interface SheetData {
  headers: string[];
  rows: SheetRow[];
}

export interface WriteSheetOptions {
  sheetName?: string;
  highlight?: (values: readonly string[]) => boolean;
}

const HIGHLIGHT_FILL: Fill = {
  type: 'pattern',
  pattern: 'solid',
  fgColor: { argb: 'FFFF0000' },
};

/**
 * First worksheet as text. Blank rows are dropped; row numbers are kept
 * so issues can point at the sheet.
 */
export async function readSheet(path: string): Promise<SheetData> {
  const workbook = new ExcelJS.Workbook();
  try {
    await workbook.xlsx.readFile(path);
  } catch (error) {
    throw new FileIOError(`Cannot read spreadsheet ${path}: ${errorMessage(error)}`, path, error);
  }

  const sheet = workbook.worksheets[0];
  if (!sheet) return { headers: [], rows: [] };

  const headerRow = sheet.getRow(1);
  const headers: string[] = [];
  for (let column = 1; column <= sheet.columnCount; column++) {
    headers.push(headerRow.getCell(column).text.trim());
  }
  while (headers.length > 0 && headers[headers.length - 1] === '') {
    headers.pop();
  }

  const rows: SheetRow[] = [];
  for (let number = 2; number <= sheet.rowCount; number++) {
    const row = sheet.getRow(number);
    const values = headers.map((_, index) => row.getCell(index + 1).text);
    if (values.every(value => value.trim() === '')) continue;
    rows.push({ number, values });
  }

  return { headers, rows };
}

/**
 * Replace the file with a single worksheet holding `data`
 */
export async function writeSheet(path: string, data: SheetData, options: WriteSheetOptions = {}): Promise<void> {
  const workbook = new ExcelJS.Workbook();
  const sheet = workbook.addWorksheet(options.sheetName ?? 'Sheet1');

  sheet.addRow(data.headers);
  sheet.getRow(1).font = { bold: true };

  for (const { values } of data.rows) {
    const row = sheet.addRow(values);
    if (options.highlight?.(values)) {
      for (let column = 1; column <= data.headers.length; column++) {
        row.getCell(column).fill = HIGHLIGHT_FILL;
      }
    }
  }

  const temporary = `${path}.partial`;
  try {
    const buffer = await workbook.xlsx.writeBuffer();
    writeFileSync(temporary, Buffer.from(buffer));
    renameSync(temporary, path);
  } catch (error) {
    rmSync(temporary, { force: true });
    throw new FileIOError(`Cannot write spreadsheet ${path}: ${errorMessage(error)}`, path, error);
  }
}
