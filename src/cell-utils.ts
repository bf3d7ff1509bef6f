import { EXCEL_SERIAL_MAX, EXCEL_SERIAL_MIN } from './constants';
import { CellValue } from './types';

const EXCEL_EPOCH_UTC = Date.UTC(1899, 11, 30);
const DAY_MS = 24 * 60 * 60 * 1000;

// Column letter to 1-based number. A -> 1, Z -> 26, AA -> 27
export function columnNumber(letters: string): number {
  let result = 0;
  for (const ch of letters.toUpperCase()) {
    result = result * 26 + (ch.charCodeAt(0) - 64);
  }
  return result;
}

// 1-based column number to letter. 1 -> A, 27 -> AA
export function columnLetter(col: number): string {
  let result = '';
  let n = col;
  while (n > 0) {
    const rem = (n - 1) % 26;
    result = String.fromCharCode(65 + rem) + result;
    n = Math.floor((n - 1) / 26);
  }
  return result;
}

export function cleanString(value: CellValue): string {
  if (value === null) {
    return '';
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  return String(value).trim();
}

export function isNumericText(value: string): boolean {
  const trimmed = value.trim();
  return trimmed !== '' && Number.isFinite(Number(trimmed));
}

// Numbers pass through, text is parsed without thousands separators, anything else is 0
export function parseNumber(value: CellValue): number {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : 0;
  }
  if (typeof value === 'string') {
    const cleaned = value.replace(/,/g, '').trim();
    if (cleaned === '') return 0;
    const num = Number(cleaned);
    return Number.isFinite(num) ? num : 0;
  }
  return 0;
}

export function isExcelSerialDate(value: CellValue): value is number {
  return typeof value === 'number' && value > EXCEL_SERIAL_MIN && value < EXCEL_SERIAL_MAX;
}

export function excelSerialToDate(serial: number): Date {
  return new Date(EXCEL_EPOCH_UTC + Math.trunc(serial) * DAY_MS);
}

// Upper-cased with accents removed: "Valorización" -> "VALORIZACION"
export function foldLabel(value: string): string {
  return value
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')
    .toUpperCase()
    .trim();
}
