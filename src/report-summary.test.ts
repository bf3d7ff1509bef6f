import { describe, expect, it } from 'vitest';
import { extract } from './project-extractor';
import { buildReportSummary, formatProcessedAt, scheduleState, summarizeCurve } from './report-summary';
import { recordingLogger, sampleWorkbook } from './testing/workbook-fixtures';
import { ProjectRecord } from './types';

const processedAt = new Date(Date.UTC(2026, 9, 19, 19, 5));

function sampleRecord(withCurve = true): ProjectRecord {
  return extract(sampleWorkbook({ withCurve }), { logger: recordingLogger() });
}

describe('scheduleState', () => {
  it('classifies the contractual minus executed deviation', () => {
    expect(scheduleState(-0.02)).toBe('ADELANTADO');
    expect(scheduleState(0.05)).toBe('ATRASADO');
    expect(scheduleState(0.005)).toBe('EN TIEMPO');
    expect(scheduleState(0)).toBe('EN TIEMPO');
  });
});

describe('formatProcessedAt', () => {
  it('shows the time five hours behind UTC', () => {
    expect(formatProcessedAt(processedAt)).toBe('19/10/2026 14:05');
    expect(formatProcessedAt(new Date(Date.UTC(2026, 0, 1, 3, 0)))).toBe('31/12/2025 22:00');
  });
});

describe('summarizeCurve', () => {
  it('keeps the contract total before anything is executed', () => {
    const point = { mes: 'ENE 2026', parcial: 500000, acumulado: 500000, parcialPct: 0.5, acumPct: 0.5 };
    expect(
      summarizeCurve({ contractual: [point], valorizado: [point], proyectado: null, mesActualIndex: -1, total: 1000000 })
    ).toEqual({ totalContractual: 1000000 });
  });

  it('has no forecast values without a forecast series', () => {
    const point = { mes: 'ENE 2026', parcial: 500, acumulado: 500, parcialPct: 0.5, acumPct: 0.5 };
    const summary = summarizeCurve({
      contractual: [point],
      valorizado: [{ ...point, acumPct: 0.6 }],
      proyectado: null,
      mesActualIndex: 0,
      total: 1000,
    });
    expect(summary.actual?.planAcumPct).toBeUndefined();
    expect(summary.actual?.estado).toBe('ADELANTADO');
  });
});

describe('buildReportSummary', () => {
  it('collects the valuation, the executed costs and the shares', () => {
    const summary = buildReportSummary(sampleRecord(), {
      projectKey: 'BEETHOVEN',
      fileName: 'reporte.html',
      processedAt,
    });

    expect(summary.obra).toBe('BEETHOVEN');
    expect(summary.proyecto).toBe('Edificio Multifamiliar Beethoven');
    expect(summary.fechaReporte).toBe('22/02/2026');
    expect(summary.fechaProcesado).toBe('19/10/2026 14:05');
    expect(summary.link).toBe('');
    expect(summary.subTotal).toBe(190000);
    expect(summary.igvPercent).toBe(18);
    expect(summary.totalValorizacion).toBe(224200);
    expect(summary.totalCdEjecutado).toBe(150000);
    expect(summary.cdShares?.materiales).toBeCloseTo(66.67, 2);
    expect(summary.ggShares).toEqual({ planillaStaff: 80, otrosGG: 20 });
  });

  it('reports an even result as neutral', () => {
    const summary = buildReportSummary(sampleRecord(), { projectKey: 'B', fileName: 'r.html', processedAt });
    expect(summary.analisis.cd).toEqual({
      valorizacion: 150000,
      ejecutado: 150000,
      variacion: 0,
      variacionPct: 0,
      estado: 'NEUTRO',
    });
    expect(summary.analisis.total.estado).toBe('NEUTRO');
  });

  it('measures the stored variance against the valuation', () => {
    const base = sampleRecord(false);
    const record: ProjectRecord = { ...base, resCosto: { ...base.resCosto, totalCD: 140000 } };
    const summary = buildReportSummary(record, { projectKey: 'B', fileName: 'r.html', processedAt });

    expect(summary.analisis.cd.variacion).toBe(10000);
    expect(summary.analisis.cd.variacionPct).toBeCloseTo(6.6667, 4);
    expect(summary.analisis.cd.estado).toBe('GANANCIA');
    expect(summary.analisis.total.variacionPct).toBeCloseTo(5.7143, 4);
  });

  it('stores a zero percentage when nothing was valued', () => {
    const base = sampleRecord(false);
    const record: ProjectRecord = { ...base, rval: { ...base.rval, gastosGenerales: 0 } };
    const summary = buildReportSummary(record, { projectKey: 'B', fileName: 'r.html', processedAt });

    expect(summary.analisis.gg.variacion).toBe(-25000);
    expect(summary.analisis.gg.variacionPct).toBe(0);
    expect(summary.analisis.gg.estado).toBe('PERDIDA');
  });

  it('keeps the contract total when no month has been executed', () => {
    const base = sampleRecord();
    const curva = base.curva;
    if (!curva) throw new Error('sample workbook has a curve');
    const record: ProjectRecord = { ...base, curva: { ...curva, mesActualIndex: -1 } };
    const summary = buildReportSummary(record, { projectKey: 'B', fileName: 'r.html', processedAt });

    expect(summary.tieneCurva).toBe(true);
    expect(summary.curva).toEqual({ totalContractual: 1000000 });
  });

  it('includes the current month of the curve', () => {
    const summary = buildReportSummary(sampleRecord(), { projectKey: 'B', fileName: 'r.html', processedAt });

    expect(summary.tieneCurva).toBe(true);
    expect(summary.curva?.totalContractual).toBe(1000000);
    expect(summary.curva?.actual?.mes).toBe('FEB 2026');
    expect(summary.curva?.actual?.progAcumPct).toBe(0.3);
    expect(summary.curva?.actual?.ejecAcumMonto).toBe(250000);
    expect(summary.curva?.actual?.planAcumPct).toBe(0.28);
    expect(summary.curva?.actual?.estado).toBe('ATRASADO');
  });

  it('omits the curve block without a curve sheet', () => {
    const summary = buildReportSummary(sampleRecord(false), { projectKey: 'B', fileName: 'r.html', processedAt });
    expect(summary.tieneCurva).toBe(false);
    expect(summary.curva).toBeUndefined();
  });

  it('computes the total with tax when the sheet has none', () => {
    const base = sampleRecord(false);
    const record: ProjectRecord = { ...base, rval: { ...base.rval, totalValorizacion: 0 } };
    const summary = buildReportSummary(record, { projectKey: 'B', fileName: 'r.html', processedAt });
    expect(summary.totalValorizacion).toBeCloseTo(224200, 6);
  });
});
