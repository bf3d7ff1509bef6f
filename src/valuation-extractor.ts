import { foldLabel } from './cell-utils';
import { scanHeader } from './header-scanner';
import { SheetReader } from './sheet-reader';
import { ProjectIdentity, ValuationSummary } from './types';

export interface ValuationSheetResult {
  identity: ProjectIdentity;
  summary: ValuationSummary;
}

const FIRST_SUMMARY_ROW = 10;
const LABEL_COLS = ['C', 'B', 'D'] as const;
const AMOUNT_COLS = ['G', 'F', 'H'] as const;
const MIN_LABEL_LENGTH = 3;
const DIRECT_COST_MAX_LENGTH = 25;

const PERCENT_IN_LABEL = /\(([\d.]+)%?\)/;

export const EMPTY_VALUATION: ValuationSummary = Object.freeze({
  costoDirecto: 0,
  gastosGenerales: 0,
  ggPercent: 0,
  utilidad: 0,
  utilPercent: 0,
  totalValorizacion: 0,
});

type MutableValuation = { -readonly [K in keyof ValuationSummary]: ValuationSummary[K] };

export type SummaryLabel = 'costoDirecto' | 'gastosGenerales' | 'utilidad' | 'totalValorizacion';

// Which summary lines a label names. "TOTAL COSTO DIRECTO" is not the direct cost line
export function classifySummaryLabel(label: string): SummaryLabel[] {
  const upper = foldLabel(label);
  const kinds: SummaryLabel[] = [];

  if (
    upper === 'COSTO DIRECTO' ||
    (upper.includes('COSTO DIRECTO') &&
      !upper.includes('GASTOS') &&
      !upper.includes('TOTAL') &&
      upper.length < DIRECT_COST_MAX_LENGTH)
  ) {
    kinds.push('costoDirecto');
  }
  if (upper.includes('GASTOS GENERALES')) {
    kinds.push('gastosGenerales');
  }
  if (upper.includes('UTILIDAD') && !upper.includes('TOTAL')) {
    kinds.push('utilidad');
  }
  if (upper.includes('TOTAL') && upper.includes('VALORIZ')) {
    kinds.push('totalValorizacion');
  }
  return kinds;
}

// "GASTOS GENERALES (12.5%)" -> 12.5
export function percentFromLabel(label: string): number | null {
  const match = PERCENT_IN_LABEL.exec(label);
  if (!match) return null;
  const pct = Number(match[1]);
  return Number.isFinite(pct) ? pct : null;
}

function labelAt(sheet: SheetReader, row: number): string | null {
  for (const col of LABEL_COLS) {
    const text = sheet.text(col, row);
    if (text.trim().length > MIN_LABEL_LENGTH) return text;
  }
  return null;
}

/**
 * Two-way amount/percent repair against the direct cost. Amounts are derived
 * first (only when zero), then percentages (only when zero), so a real 0 %
 * line with an amount gets a recomputed percentage.
 */
export function repairValuation(summary: ValuationSummary): ValuationSummary {
  const cd = summary.costoDirecto;
  if (cd <= 0) return summary;

  let { gastosGenerales, utilidad, ggPercent, utilPercent } = summary;

  if (gastosGenerales === 0 && ggPercent > 0) {
    gastosGenerales = cd * (ggPercent / 100);
  }
  if (utilidad === 0 && utilPercent > 0) {
    utilidad = cd * (utilPercent / 100);
  }
  if (!ggPercent) {
    ggPercent = (gastosGenerales / cd) * 100;
  }
  if (!utilPercent) {
    utilPercent = (utilidad / cd) * 100;
  }

  return { ...summary, gastosGenerales, utilidad, ggPercent, utilPercent };
}

function scanEarlyDirectCost(sheet: SheetReader): number {
  let costoDirecto = 0;
  for (let row = 2; row <= 9; row++) {
    if (foldLabel(sheet.text('F', row)).includes('COSTO DIRECTO')) {
      costoDirecto = sheet.number('G', row);
    }
  }
  return costoDirecto;
}

export function scanSummaryLines(sheet: SheetReader, initial: ValuationSummary): ValuationSummary {
  const summary: MutableValuation = { ...initial };

  for (let row = FIRST_SUMMARY_ROW; row <= sheet.rowCount; row++) {
    const label = labelAt(sheet, row);
    if (!label) continue;

    for (const kind of classifySummaryLabel(label)) {
      const amount = sheet.firstPositive(AMOUNT_COLS, row);
      if (amount > 0) {
        summary[kind] = amount;
      }

      const pct = percentFromLabel(label);
      if (pct !== null && kind === 'gastosGenerales') summary.ggPercent = pct;
      if (pct !== null && kind === 'utilidad') summary.utilPercent = pct;
    }
  }

  return summary;
}

// RVAL: what was billed this period
export function extractValuationSheet(sheet: SheetReader): ValuationSheetResult {
  const identity = scanHeader(sheet, { firstRow: 2, lastRow: 9 });
  const scanned = scanSummaryLines(sheet, { ...EMPTY_VALUATION, costoDirecto: scanEarlyDirectCost(sheet) });

  return { identity, summary: repairValuation(scanned) };
}
