import fs from 'fs-extra';
import * as XLSX from 'xlsx';

import { requireInputFile, toPosixRelative } from './io.js';

export interface SheetReadOptions {
  sheet: string;
  /** Physical rows above the header row (title banners, notes). */
  skipRows?: number;
  /** Rows between the header and the first data row (sub-headers). */
  skipAfterHeader?: number;
  /** Positional names that replace the sheet's own header cells. */
  columnNames?: string[];
}

export type SheetRow = Record<string, string>;

export interface SheetTable {
  header: string[];
  rows: SheetRow[];
}

function cellText(cell: unknown): string {
  if (cell === null || cell === undefined) {
    return '';
  }
  return String(cell);
}

export function readSheetTable(
  workbook: XLSX.WorkBook,
  options: SheetReadOptions,
  label = 'workbook'
): SheetTable {
  const sheet = workbook.Sheets[options.sheet];
  if (!sheet) {
    throw new Error(
      `Sheet '${options.sheet}' not found in ${label}. Available sheets: ${workbook.SheetNames.join(', ')}`
    );
  }

  const matrix = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
    header: 1,
    defval: '',
    raw: false,
    blankrows: true
  });

  const table = matrix.slice(options.skipRows ?? 0);
  if (table.length === 0) {
    return { header: options.columnNames ?? [], rows: [] };
  }

  const header = options.columnNames ?? table[0].map((cell) => cellText(cell).trim());
  const rows = table.slice(1 + (options.skipAfterHeader ?? 0)).map((cells) => {
    const row: SheetRow = {};
    header.forEach((name, index) => {
      row[name] = cellText(cells[index]);
    });
    return row;
  });

  return { header, rows };
}

export async function readWorkbookSheet(
  filePath: string,
  options: SheetReadOptions
): Promise<SheetTable> {
  await requireInputFile(filePath, 'Input workbook');
  const buffer = await fs.readFile(filePath);
  const workbook = XLSX.read(buffer, { type: 'buffer' });
  return readSheetTable(workbook, options, toPosixRelative(filePath));
}

export function assertColumns(table: SheetTable, columns: string[], label: string): void {
  const missing = columns.filter((column) => !table.header.includes(column));
  if (missing.length === 0) {
    return;
  }

  throw new Error(
    `${label} is missing column(s): ${missing.map((column) => JSON.stringify(column)).join(', ')}`
  );
}
