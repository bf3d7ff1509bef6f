import * as fs from 'fs';
import * as path from 'path';
import { SUMMARY_FILE_NAME } from './constants';
import { fmt, fmtPct } from './report-format';
import { formatProcessedAt, ReportSummary } from './report-summary';
import { Logger, ProjectRecord, RenderedReport } from './types';

export interface SummaryIndex {
  ultimaActualizacion: string;
  reportes: Record<string, ReportSummary>;
}

function emptyIndex(): SummaryIndex {
  return { ultimaActualizacion: '', reportes: {} };
}

function isSummaryIndex(value: unknown): value is SummaryIndex {
  if (typeof value !== 'object' || value === null) return false;
  if (!('reportes' in value) || !('ultimaActualizacion' in value)) return false;
  return typeof value.ultimaActualizacion === 'string' && typeof value.reportes === 'object' && value.reportes !== null;
}

export class FileExporter {
  constructor(private readonly logger: Logger = console) {}

  private ensureDir(outputDir: string): void {
    if (!fs.existsSync(outputDir)) {
      fs.mkdirSync(outputDir, { recursive: true });
    }
  }

  // returns the written path
  exportReport(report: RenderedReport, outputDir: string): string {
    this.ensureDir(outputDir);
    const filePath = path.join(outputDir, report.fileName);
    fs.writeFileSync(filePath, report.html, 'utf8');
    this.logger.log(`  [REPORTE] HTML guardado: ${filePath}`);
    return filePath;
  }

  loadSummaryIndex(outputDir: string): SummaryIndex {
    const filePath = path.join(outputDir, SUMMARY_FILE_NAME);
    if (!fs.existsSync(filePath)) {
      return emptyIndex();
    }

    try {
      const parsed: unknown = JSON.parse(fs.readFileSync(filePath, 'utf8'));
      if (isSummaryIndex(parsed)) {
        return parsed;
      }
      this.logger.warn(`  [RESUMEN] ${filePath} no tiene el formato esperado, se crea uno nuevo.`);
    } catch (error) {
      this.logger.warn(`  [RESUMEN] No se pudo leer ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
    }
    return emptyIndex();
  }

  // Adds or replaces the summary of one project in resumen.json
  saveSummary(summary: ReportSummary, outputDir: string, processedAt: Date): string {
    this.ensureDir(outputDir);
    const index = this.loadSummaryIndex(outputDir);
    index.reportes[summary.obra] = summary;
    index.ultimaActualizacion = formatProcessedAt(processedAt);

    const filePath = path.join(outputDir, SUMMARY_FILE_NAME);
    fs.writeFileSync(filePath, JSON.stringify(index, null, 2), 'utf8');
    this.logger.log(`  [RESUMEN] Datos guardados para ${summary.obra}`);
    return filePath;
  }

  // step summary for the command line
  printDataSummary(record: ProjectRecord): void {
    const rc = record.resCosto;
    const rv = record.rval;
    this.logger.log('\n=== Datos extraidos ===');
    this.logger.log(`Proyecto: ${record.projectName} (${record.shortName})`);
    this.logger.log(`Costo directo ejecutado: ${fmt(rc.totalCD)}`);
    this.logger.log(`Gastos generales ejecutados: ${fmt(rc.totalGG)}`);
    this.logger.log(`Costo directo valorizado: ${fmt(rv.costoDirecto)}`);
    this.logger.log(`Gastos generales valorizados: ${fmt(rv.gastosGenerales)} (${fmtPct(rv.ggPercent)})`);
    this.logger.log(`Utilidad: ${fmt(rv.utilidad)} (${fmtPct(rv.utilPercent)})`);
    if (record.curva) {
      this.logger.log(`Curva S: ${record.curva.contractual.length} meses, mes actual #${record.curva.mesActualIndex + 1}`);
    } else {
      this.logger.log('Curva S: sin datos');
    }
  }
}
