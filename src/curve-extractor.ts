import { cleanString, foldLabel } from './cell-utils';
import { MONTH_ABBREVS } from './constants';
import { SheetReader } from './sheet-reader';
import { CellValue, MonthPoint, ProgressSeries } from './types';

export interface CurveColumns {
  contractual: number;
  valorizado: number;
  proyectado: number | null;
}

export interface CurveSheetResult {
  curve: ProgressSeries;
  columns: CurveColumns;
  corrections: string[];
}

// PROG in A-E, EJEC in G-K, no forecast group unless a header says so
export const DEFAULT_CURVE_COLUMNS: CurveColumns = Object.freeze({ contractual: 1, valorizado: 7, proyectado: null });

const HEADER_ROW = 1;
const HEADER_SCAN_COLS = 21; // A-U
const FIRST_DATA_ROW = 6;
const TOTAL_LABEL = 'TOTAL';

const GROUP_KEYWORDS: ReadonlyArray<readonly [keyof CurveColumns, readonly string[]]> = Object.freeze([
  ['contractual', Object.freeze(['PROGRAMAD', 'CONTRACTUAL'])],
  ['valorizado', Object.freeze(['EJECUTAD', 'VALORIZAD'])],
  ['proyectado', Object.freeze(['PLANIFICAD', 'PROYECTAD'])],
]);

export function detectCurveColumns(sheet: SheetReader): CurveColumns {
  const columns: CurveColumns = { ...DEFAULT_CURVE_COLUMNS };
  const found = new Set<keyof CurveColumns>();

  for (let col = 1; col <= HEADER_SCAN_COLS; col++) {
    const header = foldLabel(sheet.text(col, HEADER_ROW));
    if (!header) continue;

    for (const [group, keywords] of GROUP_KEYWORDS) {
      if (!found.has(group) && keywords.some(k => header.includes(k))) {
        columns[group] = col;
        found.add(group);
        break;
      }
    }
  }

  return columns;
}

function monthLabel(value: CellValue): string {
  if (value instanceof Date) {
    return `${MONTH_ABBREVS[value.getUTCMonth()]} ${value.getUTCFullYear()}`;
  }
  return cleanString(value);
}

function isEmptyMonth(value: CellValue): boolean {
  return value === null || value === '' || value === 0 || value === false;
}

function readPoint(sheet: SheetReader, startCol: number, row: number, fallbackMes: string): MonthPoint {
  const mes = monthLabel(sheet.value(startCol, row));
  return {
    mes: mes || fallbackMes,
    parcial: sheet.number(startCol + 1, row),
    acumulado: sheet.number(startCol + 2, row),
    parcialPct: sheet.number(startCol + 3, row),
    acumPct: sheet.number(startCol + 4, row),
  };
}

/**
 * Cumulative columns never go down. Applies a running maximum over the first
 * `count` points and reports whether anything changed.
 */
export function enforceCumulative(points: ReadonlyArray<MonthPoint>, count: number): { points: MonthPoint[]; corrected: boolean } {
  let corrected = false;
  let maxAcum = 0;
  let maxPct = 0;

  const result = points.map((point, index) => {
    if (index >= count) return point;

    const acumulado = Math.max(point.acumulado, maxAcum);
    const acumPct = Math.max(point.acumPct, maxPct);
    maxAcum = acumulado;
    maxPct = acumPct;

    if (acumulado === point.acumulado && acumPct === point.acumPct) return point;
    corrected = true;
    return { ...point, acumulado, acumPct };
  });

  return { points: result, corrected };
}

// CURVA: monthly contractual / executed / forecast progress
export function extractCurveSheet(sheet: SheetReader): CurveSheetResult {
  const columns = detectCurveColumns(sheet);
  const contractual: MonthPoint[] = [];
  const valorizado: MonthPoint[] = [];
  const proyectado: MonthPoint[] | null = columns.proyectado === null ? null : [];
  let mesActualIndex = -1;
  let total = 0;

  for (let row = FIRST_DATA_ROW; row <= sheet.rowCount; row++) {
    const rawMes = sheet.value(columns.contractual, row);
    if (isEmptyMonth(rawMes)) continue;

    const mes = monthLabel(rawMes);
    if (!mes) continue;

    if (mes.toUpperCase() === TOTAL_LABEL) {
      total = sheet.number(columns.contractual + 1, row) || sheet.number(columns.contractual + 2, row);
      continue;
    }

    contractual.push(readPoint(sheet, columns.contractual, row, mes));

    const executed = readPoint(sheet, columns.valorizado, row, mes);
    valorizado.push(executed);
    if (executed.parcial > 0 || executed.acumulado > 0) {
      mesActualIndex = contractual.length - 1;
    }

    if (proyectado && columns.proyectado !== null) {
      proyectado.push(readPoint(sheet, columns.proyectado, row, mes));
    }
  }

  const corrections: string[] = [];
  const fixedContractual = enforceCumulative(contractual, contractual.length);
  if (fixedContractual.corrected) {
    corrections.push('contractual: acumulado decreciente corregido');
  }
  const fixedValorizado = enforceCumulative(valorizado, mesActualIndex + 1);
  if (fixedValorizado.corrected) {
    corrections.push('valorizado: acumulado decreciente corregido');
  }
  let fixedProyectado: MonthPoint[] | null = null;
  if (proyectado) {
    // blank trailing forecast months stay blank
    const filled = proyectado.reduce((last, p, i) => (p.acumulado > 0 || p.acumPct > 0 ? i : last), -1);
    const fixed = enforceCumulative(proyectado, filled + 1);
    if (fixed.corrected) {
      corrections.push('proyectado: acumulado decreciente corregido');
    }
    fixedProyectado = fixed.points;
  }

  if (total === 0 && contractual.length > 0) {
    total = fixedContractual.points[fixedContractual.points.length - 1].acumulado;
  }

  return {
    curve: {
      contractual: fixedContractual.points,
      valorizado: fixedValorizado.points,
      proyectado: fixedProyectado,
      mesActualIndex,
      total,
    },
    columns,
    corrections,
  };
}
