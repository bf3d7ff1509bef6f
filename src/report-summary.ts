import { buildComparativeAnalysis, computeValuationCut, VarianceRow } from './comparative-analysis';
import { REPORT_UTC_OFFSET_HOURS } from './constants';
import { formatDateNumeric } from './report-format';
import { ProgressSeries, ProjectRecord } from './types';

export type SummaryState = 'GANANCIA' | 'PERDIDA' | 'NEUTRO';
export type ScheduleState = 'ADELANTADO' | 'ATRASADO' | 'EN TIEMPO';

const SCHEDULE_TOLERANCE = 0.01; // fraction of the contract, one percentage point

export interface SummaryComparison {
  valorizacion: number;
  ejecutado: number;
  variacion: number;
  variacionPct: number;
  estado: SummaryState;
}

export interface CurrentMonthSummary {
  mes: string;
  progAcumPct: number;
  progAcumMonto: number;
  ejecAcumPct: number;
  ejecAcumMonto: number;
  planAcumPct?: number;
  planAcumMonto?: number;
  desvioPct: number; // contractual - executed, as a fraction
  estado: ScheduleState;
}

export interface CurveSummary {
  totalContractual: number;
  actual?: CurrentMonthSummary; // absent until a month has been executed
}

export interface ReportSummary {
  obra: string;
  proyecto: string;
  fechaReporte: string;
  fechaProcesado: string;
  filename: string;
  link: string;

  // valuation cut
  costoDirecto: number;
  gastosGenerales: number;
  ggPercent: number;
  utilidad: number;
  utilPercent: number;
  subTotal: number;
  igv: number;
  igvPercent: number;
  totalValorizacion: number;

  // executed direct cost, shares in percent of totalCdEjecutado
  personalObrero: number;
  materiales: number;
  alquileres: number;
  subcontratos: number;
  costosVarios: number;
  totalCdEjecutado: number;
  cdShares: Record<'personalObrero' | 'materiales' | 'alquileres' | 'subcontratos' | 'costosVarios', number> | null;

  // executed overhead
  planillaStaff: number;
  otrosGG: number;
  totalGgEjecutado: number;
  ggShares: Record<'planillaStaff' | 'otrosGG', number> | null;

  analisis: {
    cd: SummaryComparison;
    gg: SummaryComparison;
    total: SummaryComparison;
  };

  tieneCurva: boolean;
  curva?: CurveSummary;
}

export interface SummaryOptions {
  projectKey: string;
  fileName: string;
  link?: string;
  processedAt: Date;
}

function summaryState(variance: number): SummaryState {
  if (variance > 0) return 'GANANCIA';
  if (variance < 0) return 'PERDIDA';
  return 'NEUTRO';
}

// stored percentages are against the valuation, unlike the report table
function toComparison(row: VarianceRow): SummaryComparison {
  return {
    valorizacion: row.valorized,
    ejecutado: row.executed,
    variacion: row.variance,
    variacionPct: row.valorized > 0 ? (row.variance / row.valorized) * 100 : 0,
    estado: summaryState(row.variance),
  };
}

export function scheduleState(deviation: number): ScheduleState {
  if (deviation < 0) return 'ADELANTADO';
  if (deviation > SCHEDULE_TOLERANCE) return 'ATRASADO';
  return 'EN TIEMPO';
}

function share(part: number, total: number): number {
  return (part / total) * 100;
}

// "19/10/2026 14:05" in report local time
export function formatProcessedAt(date: Date): string {
  const local = new Date(date.getTime() + REPORT_UTC_OFFSET_HOURS * 60 * 60 * 1000);
  const hours = String(local.getUTCHours()).padStart(2, '0');
  const minutes = String(local.getUTCMinutes()).padStart(2, '0');
  return `${formatDateNumeric(local)} ${hours}:${minutes}`;
}

export function summarizeCurve(curva: ProgressSeries): CurveSummary {
  const summary: CurveSummary = { totalContractual: curva.total };
  const idx = curva.mesActualIndex;
  if (idx < 0 || idx >= curva.contractual.length || idx >= curva.valorizado.length) {
    return summary;
  }

  const prog = curva.contractual[idx];
  const ejec = curva.valorizado[idx];
  const desvioPct = prog.acumPct - ejec.acumPct;
  const actual: CurrentMonthSummary = {
    mes: prog.mes,
    progAcumPct: prog.acumPct,
    progAcumMonto: prog.acumulado,
    ejecAcumPct: ejec.acumPct,
    ejecAcumMonto: ejec.acumulado,
    desvioPct,
    estado: scheduleState(desvioPct),
  };

  if (curva.proyectado && idx < curva.proyectado.length) {
    actual.planAcumPct = curva.proyectado[idx].acumPct;
    actual.planAcumMonto = curva.proyectado[idx].acumulado;
  }
  summary.actual = actual;
  return summary;
}

// Everything the chat bot and the weekly digest read about one processed report
export function buildReportSummary(record: ProjectRecord, options: SummaryOptions): ReportSummary {
  const rc = record.resCosto;
  const rv = record.rval;
  const cut = computeValuationCut(rv);
  const analysis = buildComparativeAnalysis(rc, rv);

  const summary: ReportSummary = {
    obra: options.projectKey,
    proyecto: record.projectName,
    fechaReporte: formatDateNumeric(record.date),
    fechaProcesado: formatProcessedAt(options.processedAt),
    filename: options.fileName,
    link: options.link ?? '',

    costoDirecto: rv.costoDirecto,
    gastosGenerales: rv.gastosGenerales,
    ggPercent: rv.ggPercent,
    utilidad: rv.utilidad,
    utilPercent: rv.utilPercent,
    subTotal: cut.subtotal,
    igv: cut.tax,
    igvPercent: cut.taxRate * 100,
    // the sheet total wins when it was found
    totalValorizacion: rv.totalValorizacion || cut.totalWithTax,

    personalObrero: rc.personalObrero,
    materiales: rc.materiales,
    alquileres: rc.alquileres,
    subcontratos: rc.subcontratos,
    costosVarios: rc.costosVarios,
    totalCdEjecutado: rc.totalCD,
    cdShares:
      rc.totalCD > 0
        ? {
            personalObrero: share(rc.personalObrero, rc.totalCD),
            materiales: share(rc.materiales, rc.totalCD),
            alquileres: share(rc.alquileres, rc.totalCD),
            subcontratos: share(rc.subcontratos, rc.totalCD),
            costosVarios: share(rc.costosVarios, rc.totalCD),
          }
        : null,

    planillaStaff: rc.planillaStaff,
    otrosGG: rc.otrosGG,
    totalGgEjecutado: rc.totalGG,
    ggShares:
      rc.totalGG > 0
        ? { planillaStaff: share(rc.planillaStaff, rc.totalGG), otrosGG: share(rc.otrosGG, rc.totalGG) }
        : null,

    analisis: {
      cd: toComparison(analysis.directCost),
      gg: toComparison(analysis.overhead),
      total: toComparison(analysis.total),
    },

    tieneCurva: record.curva !== null,
  };

  if (record.curva) {
    summary.curva = summarizeCurve(record.curva);
  }
  return summary;
}
