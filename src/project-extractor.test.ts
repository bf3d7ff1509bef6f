import { describe, expect, it } from 'vitest';
import { SchemaError } from './errors';
import { detectProjectName, extract, getShortName } from './project-extractor';
import {
  COST_CELLS,
  recordingLogger,
  REPORT_DATE,
  sampleWorkbook,
  sheetFrom,
  VALUATION_CELLS,
  workbookOf,
} from './testing/workbook-fixtures';

describe('getShortName', () => {
  it('uses the known project code inside the name', () => {
    expect(getShortName('Edificio Multifamiliar Beethoven')).toBe('BEETHOVEN');
    expect(getShortName('Residencial Alma Mater II')).toBe('ALMA MATER');
  });

  it('prefers the longer biomedical code', () => {
    expect(getShortName('Centro de Ciencias Biomedicas')).toBe('BIOMEDICAS');
  });

  it('truncates unknown names and defaults empty ones', () => {
    expect(getShortName('Condominio Los Jardines de San Isidro')).toBe('Condominio Los Jardines de San');
    expect(getShortName('')).toBe('PROYECTO');
  });
});

describe('extract', () => {
  it('builds the whole record from the three sheets', () => {
    const record = extract(sampleWorkbook(), { logger: recordingLogger() });

    expect(record.resCosto.totalCD).toBe(150000);
    expect(record.resCosto.totalGG).toBe(25000);
    expect(record.rval.ggPercent).toBeCloseTo(16.67, 2);
    expect(record.curva?.mesActualIndex).toBe(2);
    expect(record.projectName).toBe('Edificio Multifamiliar Beethoven');
    expect(record.shortName).toBe('BEETHOVEN');
    expect(record.author).toBe('Ing. Prueba');
    expect(record.date).toEqual(REPORT_DATE);
  });

  it('returns a frozen record', () => {
    const record = extract(sampleWorkbook(), { logger: recordingLogger() });
    expect(Object.isFrozen(record)).toBe(true);
    expect(Object.isFrozen(record.resCosto)).toBe(true);
    expect(Object.isFrozen(record.curva?.contractual)).toBe(true);
  });

  it('warns about titles that keep the previous category', () => {
    const logger = recordingLogger();
    extract(sampleWorkbook(), { logger });
    expect(logger.warnings).toEqual([
      '  [EXCEL] RES-COSTO fila 16: titulo no reconocido "Observaciones", se mantiene la categoria materiales',
    ]);
  });

  it('warns when credit notes leave a category below zero', () => {
    const logger = recordingLogger();
    const workbook = workbookOf(
      sheetFrom('RES-COSTO', { B10: 'SUBCONTRATO', B11: 1, D11: 1000, B12: 2, D12: -1500 }),
      sheetFrom('RVAL', {})
    );
    const record = extract(workbook, { now: REPORT_DATE, logger });

    expect(record.resCosto.subcontratos).toBe(-500);
    expect(logger.warnings).toEqual(['  [EXCEL] RES-COSTO: subcontratos termina en negativo (-500.00)']);
  });

  it('works without the curve sheet', () => {
    const logger = recordingLogger();
    const record = extract(sampleWorkbook({ withCurve: false }), { logger });
    expect(record.curva).toBeNull();
    expect(logger.logs).toEqual(['  [EXCEL] Hoja CURVA no encontrada (hojas: RES-COSTO, RVAL). Reporte sin Curva S.']);
  });

  it('falls back to the valuation sheet, then to the given date', () => {
    const now = new Date(Date.UTC(2026, 9, 19));
    const workbook = workbookOf(sheetFrom('RES-COSTO', { B10: 'MATERIALES' }), sheetFrom('RVAL', VALUATION_CELLS));
    const record = extract(workbook, { now, logger: recordingLogger() });

    expect(record.projectName).toBe('Obra de respaldo');
    expect(record.shortName).toBe('Obra de respaldo');
    expect(record.author).toBe('');
    expect(record.date).toEqual(now);
  });

  it('uses the default name when no sheet has one', () => {
    const workbook = workbookOf(sheetFrom('RES-COSTO', {}), sheetFrom('RVAL', {}));
    const record = extract(workbook, { now: REPORT_DATE, logger: recordingLogger() });
    expect(record.projectName).toBe('PROYECTO');
    expect(record.shortName).toBe('PROYECTO');
  });

  it('rejects a workbook without the cost sheet', () => {
    const workbook = workbookOf(sheetFrom('RVAL', VALUATION_CELLS));
    expect(() => extract(workbook)).toThrow(SchemaError);
    expect(() => extract(workbook)).toThrow('No se encontro la pestana "RES-COSTO" en el archivo.');
  });

  it('rejects a workbook without the valuation sheet', () => {
    const workbook = workbookOf(sheetFrom('RES-COSTO', COST_CELLS), sheetFrom('CURVA', {}));
    try {
      extract(workbook);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(SchemaError);
      expect(error instanceof SchemaError && error.sheetName).toBe('RVAL');
    }
  });
});

describe('detectProjectName', () => {
  it('reads the cost sheet first', () => {
    expect(detectProjectName(sampleWorkbook())).toBe('Edificio Multifamiliar Beethoven');
  });

  it('falls back to the valuation sheet', () => {
    const workbook = workbookOf(sheetFrom('RVAL', VALUATION_CELLS));
    expect(detectProjectName(workbook)).toBe('Obra de respaldo');
  });

  it('returns null when no title block names the project', () => {
    expect(detectProjectName(workbookOf(sheetFrom('CURVA', {})))).toBeNull();
  });
});
