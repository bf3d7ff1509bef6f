import { foldLabel, isNumericText, parseNumber } from './cell-utils';
import { COST_CATEGORIES, CostCategory, STAFF_KEYWORD } from './constants';
import { scanHeader } from './header-scanner';
import { SheetReader } from './sheet-reader';
import { CellValue, CostBreakdown, ProjectIdentity } from './types';

export type CostAmounts = Omit<CostBreakdown, 'totalCD' | 'totalGG'>;

export interface CostRow {
  row: number;
  key: CellValue; // column B: item number or category title
  description: CellValue; // column C
  amount: CellValue; // column D
}

export interface SkippedHeader {
  row: number;
  text: string;
  category: CostCategory;
}

export interface CostScanState {
  readonly category: CostCategory | null;
  readonly amounts: CostAmounts;
  readonly skipped: ReadonlyArray<SkippedHeader>;
}

export interface NegativeAmount {
  field: keyof CostAmounts;
  amount: number;
}

export interface CostSheetResult {
  identity: ProjectIdentity;
  breakdown: CostBreakdown;
  skipped: ReadonlyArray<SkippedHeader>;
  negative: ReadonlyArray<NegativeAmount>; // credit notes larger than the category
}

const FIRST_DATA_ROW = 10;

export const EMPTY_COST_AMOUNTS: CostAmounts = Object.freeze({
  personalObrero: 0,
  materiales: 0,
  alquileres: 0,
  subcontratos: 0,
  costosVarios: 0,
  planillaStaff: 0,
  otrosGG: 0,
});

export function matchCostCategory(text: string): CostCategory | null {
  const upper = foldLabel(text);
  const match = COST_CATEGORIES.find(([keyword]) => upper.includes(keyword));
  return match ? match[1] : null;
}

function isItemKey(key: CellValue): boolean {
  if (typeof key === 'number') return Number.isFinite(key);
  return typeof key === 'string' && isNumericText(key);
}

function addAmount(amounts: CostAmounts, category: CostCategory, description: CellValue, amount: number): CostAmounts {
  if (category === 'gg') {
    const desc = typeof description === 'string' ? description.toLowerCase() : '';
    return desc.includes(STAFF_KEYWORD)
      ? { ...amounts, planillaStaff: amounts.planillaStaff + amount }
      : { ...amounts, otrosGG: amounts.otrosGG + amount };
  }
  return { ...amounts, [category]: amounts[category] + amount };
}

/**
 * One step of the category-block scan. A text key selects the active category,
 * unknown titles leave it unchanged. A numeric key with a non-zero amount adds to
 * the active category.
 */
export function reduceCostRow(state: CostScanState, row: CostRow): CostScanState {
  const { key } = row;

  if (typeof key === 'string' && !isNumericText(key)) {
    const text = key.trim();
    if (!text) return state;

    const category = matchCostCategory(text);
    if (category) {
      return { ...state, category };
    }
    if (state.category) {
      return { ...state, skipped: [...state.skipped, { row: row.row, text, category: state.category }] };
    }
    return state;
  }

  const amount = parseNumber(row.amount);
  if (!isItemKey(key) || amount === 0 || !state.category) {
    return state;
  }

  return { ...state, amounts: addAmount(state.amounts, state.category, row.description, amount) };
}

// Categories whose items sum to less than zero
export function findNegativeAmounts(amounts: CostAmounts): NegativeAmount[] {
  const fields: ReadonlyArray<keyof CostAmounts> = [
    'personalObrero',
    'materiales',
    'alquileres',
    'subcontratos',
    'costosVarios',
    'planillaStaff',
    'otrosGG',
  ];
  return fields.filter(field => amounts[field] < 0).map(field => ({ field, amount: amounts[field] }));
}

export function withCostTotals(amounts: CostAmounts): CostBreakdown {
  return {
    personalObrero: amounts.personalObrero,
    materiales: amounts.materiales,
    alquileres: amounts.alquileres,
    subcontratos: amounts.subcontratos,
    costosVarios: amounts.costosVarios,
    planillaStaff: amounts.planillaStaff,
    otrosGG: amounts.otrosGG,
    totalCD:
      amounts.personalObrero + amounts.materiales + amounts.alquileres + amounts.subcontratos + amounts.costosVarios,
    totalGG: amounts.planillaStaff + amounts.otrosGG,
  };
}

export function readCostRows(sheet: SheetReader): CostRow[] {
  const rows: CostRow[] = [];
  for (let row = FIRST_DATA_ROW; row <= sheet.rowCount; row++) {
    rows.push({
      row,
      key: sheet.value('B', row),
      description: sheet.value('C', row),
      amount: sheet.value('D', row),
    });
  }
  return rows;
}

// RES-COSTO: executed cost per category
export function extractCostSheet(sheet: SheetReader): CostSheetResult {
  const identity = scanHeader(sheet, { firstRow: 2, lastRow: 8 });

  const initial: CostScanState = { category: null, amounts: EMPTY_COST_AMOUNTS, skipped: [] };
  const final = readCostRows(sheet).reduce(reduceCostRow, initial);

  return {
    identity,
    breakdown: withCostTotals(final.amounts),
    skipped: final.skipped,
    negative: findNegativeAmounts(final.amounts),
  };
}
