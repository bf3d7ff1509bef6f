import { CostBreakdown } from './types';

export const SHEET_RES_COSTO = 'RES-COSTO';
export const SHEET_RVAL = 'RVAL';
export const SHEET_CURVA = 'CURVA';

export type CostCategory = Exclude<keyof CostBreakdown, 'totalCD' | 'totalGG' | 'planillaStaff' | 'otrosGG'> | 'gg';

// first match wins
export const COST_CATEGORIES: ReadonlyArray<readonly [string, CostCategory]> = Object.freeze([
  ['PERSONAL DE OBRERO', 'personalObrero'],
  ['MATERIALES', 'materiales'],
  ['ALQUILERES', 'alquileres'],
  ['SUBCONTRATO', 'subcontratos'],
  ['COSTOS VARIOS', 'costosVarios'],
  ['COSTO DE OBRA GG', 'gg'],
] as const);

export const STAFF_KEYWORD = 'staff';

export const KNOWN_SHORT_NAMES: readonly string[] = Object.freeze([
  'ALMA MATER',
  'MARA',
  'CENEPA',
  'BEETHOVEN',
  'BIOMEDICAS',
  'BIOMEDIC',
  'FRANKLIN',
  'ROOSEVELT',
]);

export const SHORT_NAME_MAX_LENGTH = 30;
export const DEFAULT_PROJECT_NAME = 'PROYECTO';

export const MONTH_NAMES: readonly string[] = Object.freeze([
  'Enero',
  'Febrero',
  'Marzo',
  'Abril',
  'Mayo',
  'Junio',
  'Julio',
  'Agosto',
  'Setiembre',
  'Octubre',
  'Noviembre',
  'Diciembre',
]);

export const MONTH_ABBREVS: readonly string[] = Object.freeze([
  'Ene',
  'Feb',
  'Mar',
  'Abr',
  'May',
  'Jun',
  'Jul',
  'Ago',
  'Set',
  'Oct',
  'Nov',
  'Dic',
]);

// serial day numbers accepted as dates (2009 to 2064)
export const EXCEL_SERIAL_MIN = 40000;
export const EXCEL_SERIAL_MAX = 60000;

export const IGV_RATE = 0.18;

export const REPORT_CODE = 'COS-PR02-FR02';
export const REPORT_FILE_PREFIX = `${REPORT_CODE}_VAL_SEMANAL`;

// processing timestamps are shown in Lima time
export const REPORT_UTC_OFFSET_HOURS = -5;

export const SUMMARY_FILE_NAME = 'resumen.json';
