import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { FileExporter } from './file-exporter';
import { extract } from './project-extractor';
import { buildReportSummary } from './report-summary';
import { recordingLogger, RecordingLogger, sampleWorkbook } from './testing/workbook-fixtures';

describe('FileExporter', () => {
  let outputDir: string;
  let logger: RecordingLogger;
  let exporter: FileExporter;

  beforeEach(() => {
    outputDir = path.join(fs.mkdtempSync(path.join(os.tmpdir(), 'valuation-report-')), 'salida');
    logger = recordingLogger();
    exporter = new FileExporter(logger);
  });

  afterEach(() => {
    fs.rmSync(path.dirname(outputDir), { recursive: true, force: true });
  });

  function summaryFor(projectKey: string) {
    const record = extract(sampleWorkbook(), { logger: recordingLogger() });
    return buildReportSummary(record, {
      projectKey,
      fileName: `${projectKey}.html`,
      processedAt: new Date(Date.UTC(2026, 9, 19, 15, 30)),
    });
  }

  it('writes the report into a new directory', () => {
    const filePath = exporter.exportReport({ html: '<p>ok</p>', fileName: 'reporte.html' }, outputDir);

    expect(filePath).toBe(path.join(outputDir, 'reporte.html'));
    expect(fs.readFileSync(filePath, 'utf8')).toBe('<p>ok</p>');
    expect(logger.logs).toEqual([`  [REPORTE] HTML guardado: ${filePath}`]);
  });

  it('keeps one summary per project', () => {
    const processedAt = new Date(Date.UTC(2026, 9, 19, 15, 30));
    exporter.saveSummary(summaryFor('BEETHOVEN'), outputDir, processedAt);
    exporter.saveSummary(summaryFor('FRANKLIN'), outputDir, processedAt);
    exporter.saveSummary(summaryFor('BEETHOVEN'), outputDir, processedAt);

    const index = exporter.loadSummaryIndex(outputDir);
    expect(Object.keys(index.reportes)).toEqual(['BEETHOVEN', 'FRANKLIN']);
    expect(index.ultimaActualizacion).toBe('19/10/2026 10:30');
    expect(index.reportes.FRANKLIN.filename).toBe('FRANKLIN.html');
  });

  it('starts over when the summary file is not valid', () => {
    fs.mkdirSync(outputDir, { recursive: true });
    fs.writeFileSync(path.join(outputDir, 'resumen.json'), '{ not json', 'utf8');

    const index = exporter.loadSummaryIndex(outputDir);
    expect(index).toEqual({ ultimaActualizacion: '', reportes: {} });
    expect(logger.warnings).toHaveLength(1);
    expect(logger.warnings[0].startsWith('  [RESUMEN] No se pudo leer ')).toBe(true);
  });

  it('starts over when the summary file has another shape', () => {
    fs.mkdirSync(outputDir, { recursive: true });
    const filePath = path.join(outputDir, 'resumen.json');
    fs.writeFileSync(filePath, JSON.stringify([1, 2, 3]), 'utf8');

    expect(exporter.loadSummaryIndex(outputDir)).toEqual({ ultimaActualizacion: '', reportes: {} });
    expect(logger.warnings).toEqual([`  [RESUMEN] ${filePath} no tiene el formato esperado, se crea uno nuevo.`]);
  });

  it('prints the extracted figures', () => {
    exporter.printDataSummary(extract(sampleWorkbook(), { logger: recordingLogger() }));
    expect(logger.logs).toContain('Costo directo ejecutado: 150,000.00');
    expect(logger.logs).toContain('Gastos generales valorizados: 25,000.00 (16.67%)');
    expect(logger.logs).toContain('Curva S: 5 meses, mes actual #3');
  });
});
