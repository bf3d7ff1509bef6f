import { IGV_RATE } from './constants';
import { CostBreakdown, ValuationSummary } from './types';

export type VarianceState = 'GAIN' | 'LOSS';

export interface VarianceRow {
  valorized: number;
  executed: number;
  variance: number; // valorized - executed
  variancePct: number; // against executed, 0 when nothing was executed
  state: VarianceState; // a zero variance is not a loss
}

export interface ComparativeAnalysis {
  directCost: VarianceRow;
  overhead: VarianceRow;
  total: VarianceRow;
}

export interface ValuationCut {
  subtotal: number;
  tax: number;
  taxRate: number;
  totalWithTax: number;
}

export function compareAmounts(valorized: number, executed: number): VarianceRow {
  const variance = valorized - executed;
  return {
    valorized,
    executed,
    variance,
    variancePct: executed !== 0 ? (variance / executed) * 100 : 0,
    state: variance >= 0 ? 'GAIN' : 'LOSS',
  };
}

export function buildComparativeAnalysis(resCosto: CostBreakdown, rval: ValuationSummary): ComparativeAnalysis {
  return {
    directCost: compareAmounts(rval.costoDirecto, resCosto.totalCD),
    overhead: compareAmounts(rval.gastosGenerales, resCosto.totalGG),
    total: compareAmounts(rval.costoDirecto + rval.gastosGenerales, resCosto.totalCD + resCosto.totalGG),
  };
}

// subtotal = CD + GG + utility, IGV on top
export function computeValuationCut(rval: ValuationSummary): ValuationCut {
  const subtotal = rval.costoDirecto + rval.gastosGenerales + rval.utilidad;
  const tax = subtotal * IGV_RATE;
  return { subtotal, tax, taxRate: IGV_RATE, totalWithTax: subtotal + tax };
}
