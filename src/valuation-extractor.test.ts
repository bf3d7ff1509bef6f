import { describe, expect, it } from 'vitest';
import { readerFrom, VALUATION_CELLS } from './testing/workbook-fixtures';
import {
  classifySummaryLabel,
  EMPTY_VALUATION,
  extractValuationSheet,
  percentFromLabel,
  repairValuation,
} from './valuation-extractor';

describe('classifySummaryLabel', () => {
  it('recognises the direct cost line only when it is not a total', () => {
    expect(classifySummaryLabel('COSTO DIRECTO')).toEqual(['costoDirecto']);
    expect(classifySummaryLabel('Costo Directo Valorizado')).toEqual(['costoDirecto']);
    expect(classifySummaryLabel('TOTAL COSTO DIRECTO')).toEqual([]);
    expect(classifySummaryLabel('COSTO DIRECTO ACUMULADO AL CORTE')).toEqual([]);
  });

  it('recognises overhead, utility and the valuation total', () => {
    expect(classifySummaryLabel('Gastos Generales (12.5%)')).toEqual(['gastosGenerales']);
    expect(classifySummaryLabel('UTILIDAD (8%)')).toEqual(['utilidad']);
    expect(classifySummaryLabel('TOTAL UTILIDAD')).toEqual([]);
    expect(classifySummaryLabel('Total Valorización')).toEqual(['totalValorizacion']);
  });
});

describe('percentFromLabel', () => {
  it('reads the percentage in parentheses', () => {
    expect(percentFromLabel('GASTOS GENERALES (12.5%)')).toBe(12.5);
    expect(percentFromLabel('UTILIDAD (10)')).toBe(10);
  });

  it('returns null when there is none', () => {
    expect(percentFromLabel('GASTOS GENERALES')).toBeNull();
    expect(percentFromLabel('GASTOS GENERALES (aprox.)')).toBeNull();
  });
});

describe('repairValuation', () => {
  it('derives a missing percentage from the amount', () => {
    const repaired = repairValuation({
      ...EMPTY_VALUATION,
      costoDirecto: 150000,
      gastosGenerales: 25000,
      utilidad: 15000,
      utilPercent: 10,
    });
    expect(repaired.ggPercent).toBeCloseTo(16.67, 2);
    expect(repaired.utilPercent).toBe(10);
  });

  it('derives a missing amount from the percentage', () => {
    const repaired = repairValuation({ ...EMPTY_VALUATION, costoDirecto: 200000, ggPercent: 12.5 });
    expect(repaired.gastosGenerales).toBe(25000);
    expect(repaired.ggPercent).toBe(12.5);
  });

  it('leaves everything alone without a direct cost', () => {
    const summary = { ...EMPTY_VALUATION, gastosGenerales: 5000 };
    expect(repairValuation(summary)).toBe(summary);
  });

  it('keeps a zero percentage when the amount is zero too', () => {
    const repaired = repairValuation({ ...EMPTY_VALUATION, costoDirecto: 100000 });
    expect(repaired.ggPercent).toBe(0);
    expect(repaired.gastosGenerales).toBe(0);
  });
});

describe('extractValuationSheet', () => {
  it('reads the summary lines and fills in the overhead percentage', () => {
    const { summary } = extractValuationSheet(readerFrom('RVAL', VALUATION_CELLS));

    expect(summary.costoDirecto).toBe(150000);
    expect(summary.gastosGenerales).toBe(25000);
    expect(summary.ggPercent).toBeCloseTo(16.67, 2);
    expect(summary.utilidad).toBe(15000);
    expect(summary.utilPercent).toBe(10);
    expect(summary.totalValorizacion).toBe(224200);
  });

  it('falls back to the direct cost in the title block', () => {
    const { summary } = extractValuationSheet(readerFrom('RVAL', { F4: 'Costo Directo', G4: 80000 }));
    expect(summary.costoDirecto).toBe(80000);
  });

  it('takes the project name from the next filled column', () => {
    const { identity } = extractValuationSheet(readerFrom('RVAL', VALUATION_CELLS));
    expect(identity.projectName).toBe('Obra de respaldo');
    expect(identity.date).toBeNull();
  });
});
