import { describe, expect, it } from 'vitest';
import { extractCurveSheet } from './curve-extractor';
import {
  buildChartWindow,
  CHART_INSUFFICIENT_DATA,
  CHART_NO_PERCENT_DATA,
  computeYMax,
  maxObservedPct,
  renderSCurveChart,
} from './s-curve-chart';
import { CURVE_CELLS, readerFrom } from './testing/workbook-fixtures';
import { MonthPoint, ProgressSeries } from './types';

function point(mes: string, acumPct: number): MonthPoint {
  return { mes, parcial: 0, acumulado: acumPct * 1000, parcialPct: 0, acumPct };
}

function series(pcts: number[], mesActualIndex: number): ProgressSeries {
  const contractual = pcts.map((pct, i) => point(`M${i + 1} 2026`, pct));
  return { contractual, valorizado: contractual, proyectado: null, mesActualIndex, total: 1000 };
}

function count(haystack: string, needle: string): number {
  return haystack.split(needle).length - 1;
}

const sampleCurve = extractCurveSheet(readerFrom('CURVA', CURVE_CELLS)).curve;

describe('computeYMax', () => {
  it('rounds up to the grid step and adds headroom', () => {
    expect(computeYMax(37.3)).toBe(42);
    expect(computeYMax(40)).toBe(42);
    expect(computeYMax(100)).toBe(102);
    expect(computeYMax(0.1)).toBe(7);
  });

  it('always leaves room above the highest point', () => {
    for (const pct of [0.5, 12, 49.99, 73.2, 100]) {
      const yMax = computeYMax(pct);
      expect(yMax).toBeGreaterThan(pct);
      expect((yMax - 2) % 5).toBe(0);
    }
  });
});

describe('buildChartWindow', () => {
  it('shows two months past the current one', () => {
    const months = buildChartWindow(series([0, 0.1, 0.2, 0.3, 0.4, 0.5, 0.6, 0.7], 2));
    expect(months.map(m => m.index)).toEqual([0, 1, 2, 3, 4]);
    expect(months.map(m => m.isProyeccion)).toEqual([false, false, false, true, true]);
    expect(months.filter(m => m.isMesActual).map(m => m.index)).toEqual([2]);
  });

  it('clips the window to the series', () => {
    expect(buildChartWindow(series([0, 0.5, 1], 2))).toHaveLength(3);
  });

  it('treats every month as forecast before anything is executed', () => {
    const months = buildChartWindow(series([0, 0.2, 0.4, 0.6], -1));
    expect(months).toHaveLength(2);
    expect(months.every(m => m.isProyeccion && !m.isMesActual)).toBe(true);
  });

  it('attaches the forecast points when present', () => {
    const months = buildChartWindow(sampleCurve);
    expect(months.map(m => m.plan?.acumPct)).toEqual([0, 0.09, 0.28, 0.58, 1]);
    expect(maxObservedPct(months)).toBe(100);
  });
});

describe('renderSCurveChart', () => {
  it('returns the placeholder for a single month', () => {
    const months = buildChartWindow(series([0.4], 0));
    expect(renderSCurveChart(months, false)).toBe(CHART_INSUFFICIENT_DATA);
  });

  it('returns the placeholder when every percentage is zero', () => {
    const months = buildChartWindow(series([0, 0, 0], 1));
    expect(renderSCurveChart(months, false)).toBe(CHART_NO_PERCENT_DATA);
  });

  it('draws the curves, the deviation and the current month badges', () => {
    const svg = renderSCurveChart(buildChartWindow(sampleCurve), true);

    expect(svg.startsWith('<svg width="100%" viewBox="0 0 730 420"')).toBe(true);
    expect(svg.endsWith('</svg>')).toBe(true);
    expect(count(svg, '>HOY</text>')).toBe(1);
    expect(count(svg, '>-5.00%</text>')).toBe(1);
    expect(count(svg, '>30.00%</text>')).toBe(1);
    expect(count(svg, '>25.00%</text>')).toBe(1);
    expect(count(svg, '>28.00%</text>')).toBe(1);
    expect(count(svg, 'PROYECCI&Oacute;N')).toBe(1);
  });

  it('dashes the contractual line after the current month and the forecast line', () => {
    const svg = renderSCurveChart(buildChartWindow(sampleCurve), true);
    expect(count(svg, 'stroke-dasharray="8,5"')).toBe(2);
    expect(count(svg, '>60.0%</text>')).toBe(1);
    expect(count(svg, '>100.0%</text>')).toBe(1);
  });

  it('leaves out the forecast series when asked to', () => {
    const svg = renderSCurveChart(buildChartWindow(sampleCurve), false);
    expect(count(svg, 'stroke-dasharray="8,5"')).toBe(1);
    expect(svg).not.toContain('>28.00%</text>');
  });

  it('splits month labels over two lines', () => {
    const svg = renderSCurveChart(buildChartWindow(sampleCurve), true);
    expect(count(svg, 'font-weight="400">INICIO</text>')).toBe(1);
    expect(count(svg, 'font-weight="700">FEB</text>')).toBe(1);
    expect(count(svg, '>2026</text>')).toBe(4);
  });
});
