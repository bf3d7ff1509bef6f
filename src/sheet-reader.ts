import { cleanString, columnNumber, parseNumber } from './cell-utils';
import { CellValue, SheetGrid, Workbook } from './types';

export type ColumnRef = string | number;

// Read-only accessor over a sheet grid using spreadsheet addressing (1-based rows, A/B/C columns)
export class SheetReader {
  readonly name: string;
  private readonly rows: ReadonlyArray<ReadonlyArray<CellValue>>;

  constructor(sheet: SheetGrid) {
    this.name = sheet.name;
    this.rows = sheet.rows;
  }

  get rowCount(): number {
    return this.rows.length;
  }

  get columnCount(): number {
    return this.rows.reduce((max, row) => Math.max(max, row.length), 0);
  }

  value(col: ColumnRef, row: number): CellValue {
    const colIndex = (typeof col === 'number' ? col : columnNumber(col)) - 1;
    if (row < 1 || colIndex < 0) return null;
    const cells = this.rows[row - 1];
    if (!cells) return null;
    const value = cells[colIndex];
    return value === undefined ? null : value;
  }

  number(col: ColumnRef, row: number): number {
    return parseNumber(this.value(col, row));
  }

  text(col: ColumnRef, row: number): string {
    const value = this.value(col, row);
    return typeof value === 'string' ? value : '';
  }

  // Cell content as display text, '' for empty cells
  display(col: ColumnRef, row: number): string {
    return cleanString(this.value(col, row));
  }

  // First value in the given columns that is a positive number
  firstPositive(cols: readonly ColumnRef[], row: number): number {
    for (const col of cols) {
      const v = this.number(col, row);
      if (v > 0) return v;
    }
    return 0;
  }
}

export function findSheet(workbook: Workbook, name: string): SheetReader | null {
  const sheet = workbook.sheets.find(s => s.name === name);
  return sheet ? new SheetReader(sheet) : null;
}

export function sheetNames(workbook: Workbook): string[] {
  return workbook.sheets.map(s => s.name);
}
