export type CellValue = number | string | Date | boolean | null;

export interface SheetGrid {
  readonly name: string;
  // rows[0] is spreadsheet row 1, rows[r][0] is column A
  readonly rows: ReadonlyArray<ReadonlyArray<CellValue>>;
}

export interface Workbook {
  readonly sheets: ReadonlyArray<SheetGrid>;
}

export interface Logger {
  log(message: string): void;
  warn(message: string): void;
}

export interface CostBreakdown {
  readonly personalObrero: number;
  readonly materiales: number;
  readonly alquileres: number;
  readonly subcontratos: number;
  readonly costosVarios: number;
  readonly planillaStaff: number;
  readonly otrosGG: number;
  readonly totalCD: number; // personalObrero + materiales + alquileres + subcontratos + costosVarios
  readonly totalGG: number; // planillaStaff + otrosGG
}

export interface ValuationSummary {
  readonly costoDirecto: number;
  readonly gastosGenerales: number;
  readonly ggPercent: number; // 16.67 means 16.67 %
  readonly utilidad: number;
  readonly utilPercent: number;
  readonly totalValorizacion: number; // 0 if not found
}

export interface MonthPoint {
  readonly mes: string;
  readonly parcial: number;
  readonly acumulado: number;
  readonly parcialPct: number; // fraction, 0.05 means 5 %
  readonly acumPct: number; // fraction
}

export interface ProgressSeries {
  readonly contractual: ReadonlyArray<MonthPoint>;
  readonly valorizado: ReadonlyArray<MonthPoint>;
  readonly proyectado: ReadonlyArray<MonthPoint> | null;
  readonly mesActualIndex: number; // -1 when nothing has been executed yet
  readonly total: number;
}

export interface ProjectIdentity {
  readonly projectName: string;
  readonly date: Date | null;
  readonly author: string;
}

export interface ProjectRecord {
  readonly resCosto: CostBreakdown;
  readonly rval: ValuationSummary;
  readonly curva: ProgressSeries | null;
  readonly projectName: string;
  readonly shortName: string;
  readonly date: Date;
  readonly author: string;
}

export interface RenderedReport {
  readonly html: string;
  readonly fileName: string;
}
