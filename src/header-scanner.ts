import { excelSerialToDate, isExcelSerialDate } from './cell-utils';
import { SheetReader } from './sheet-reader';
import { CellValue, ProjectIdentity } from './types';

const LABEL_COL = 'B';
const VALUE_COLS = ['C', 'D', 'E'] as const;
const DATE_LABEL_COL = 'F';
const DATE_VALUE_COLS = ['G', 'H'] as const;

const PROJECT_LABEL = 'proyecto';
const AUTHOR_LABEL = 'elaborado';
const DATE_LABEL = 'fecha';

export interface HeaderWindow {
  firstRow: number;
  lastRow: number;
}

function firstFilled(sheet: SheetReader, row: number): string {
  for (const col of VALUE_COLS) {
    const text = sheet.display(col, row);
    if (text) return text;
  }
  return '';
}

function asDate(value: CellValue, allowSerial: boolean): Date | null {
  if (value instanceof Date && !Number.isNaN(value.getTime())) return value;
  if (allowSerial && isExcelSerialDate(value)) return excelSerialToDate(value);
  return null;
}

function scanDate(sheet: SheetReader, row: number): Date | null {
  const hasDateLabel = sheet.text(DATE_LABEL_COL, row).toLowerCase().includes(DATE_LABEL);
  for (const col of DATE_VALUE_COLS) {
    // a bare serial number is only trusted next to a "Fecha" label
    const date = asDate(sheet.value(col, row), hasDateLabel);
    if (date) return date;
  }
  return null;
}

// Label/value pairs in the title block: "Proyecto:" | <name>, "Elaborado por:" | <author>, "Fecha:" | <date>
export function scanHeader(sheet: SheetReader, window: HeaderWindow): ProjectIdentity {
  let projectName = '';
  let author = '';
  let date: Date | null = null;

  for (let row = window.firstRow; row <= window.lastRow; row++) {
    const label = sheet.text(LABEL_COL, row).toLowerCase();

    if (!projectName && label.includes(PROJECT_LABEL)) {
      projectName = firstFilled(sheet, row);
    }
    if (!author && label.includes(AUTHOR_LABEL)) {
      author = firstFilled(sheet, row);
    }
    if (!date) {
      date = scanDate(sheet, row);
    }
  }

  return { projectName, author, date };
}
