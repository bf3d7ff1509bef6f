import {
  DEFAULT_PROJECT_NAME,
  KNOWN_SHORT_NAMES,
  SHEET_CURVA,
  SHEET_RES_COSTO,
  SHEET_RVAL,
  SHORT_NAME_MAX_LENGTH,
} from './constants';
import { extractCostSheet } from './cost-extractor';
import { extractCurveSheet } from './curve-extractor';
import { SchemaError } from './errors';
import { scanHeader } from './header-scanner';
import { fmt } from './report-format';
import { findSheet, sheetNames } from './sheet-reader';
import { extractValuationSheet } from './valuation-extractor';
import { Logger, ProgressSeries, ProjectRecord, Workbook } from './types';

export interface ExtractOptions {
  now?: Date; // date used when no sheet carries one
  logger?: Logger;
}

export function getShortName(fullName: string): string {
  const upper = fullName.toUpperCase();
  const known = KNOWN_SHORT_NAMES.find(name => upper.includes(name));
  if (known) return known;
  return fullName ? fullName.slice(0, SHORT_NAME_MAX_LENGTH) : DEFAULT_PROJECT_NAME;
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !(value instanceof Date) && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

export function extract(workbook: Workbook, options: ExtractOptions = {}): ProjectRecord {
  const logger = options.logger ?? console;

  const costSheet = findSheet(workbook, SHEET_RES_COSTO);
  const valuationSheet = findSheet(workbook, SHEET_RVAL);
  if (!costSheet) throw new SchemaError(SHEET_RES_COSTO);
  if (!valuationSheet) throw new SchemaError(SHEET_RVAL);

  const cost = extractCostSheet(costSheet);
  for (const skipped of cost.skipped) {
    logger.warn(
      `  [EXCEL] ${SHEET_RES_COSTO} fila ${skipped.row}: titulo no reconocido "${skipped.text}", se mantiene la categoria ${skipped.category}`
    );
  }

  for (const { field, amount } of cost.negative) {
    logger.warn(`  [EXCEL] ${SHEET_RES_COSTO}: ${field} termina en negativo (${fmt(amount)})`);
  }

  const valuation = extractValuationSheet(valuationSheet);

  let curva: ProgressSeries | null = null;
  const curveSheet = findSheet(workbook, SHEET_CURVA);
  if (curveSheet) {
    const result = extractCurveSheet(curveSheet);
    for (const correction of result.corrections) {
      logger.warn(`  [EXCEL] ${SHEET_CURVA}: ${correction}`);
    }
    curva = result.curve;
    logger.log(`  [EXCEL] Hoja ${SHEET_CURVA} encontrada (${result.curve.contractual.length} meses).`);
  } else {
    logger.log(
      `  [EXCEL] Hoja ${SHEET_CURVA} no encontrada (hojas: ${sheetNames(workbook).slice(0, 5).join(', ')}). Reporte sin Curva S.`
    );
  }

  const projectName = cost.identity.projectName || valuation.identity.projectName || DEFAULT_PROJECT_NAME;

  return deepFreeze({
    resCosto: cost.breakdown,
    rval: valuation.summary,
    curva,
    projectName,
    shortName: getShortName(projectName),
    date: cost.identity.date ?? valuation.identity.date ?? options.now ?? new Date(),
    author: cost.identity.author || valuation.identity.author || '',
  });
}

// Project name from the title block alone, null when neither sheet has one
export function detectProjectName(workbook: Workbook): string | null {
  const windows: ReadonlyArray<readonly [string, number]> = [
    [SHEET_RES_COSTO, 8],
    [SHEET_RVAL, 9],
  ];
  for (const [name, lastRow] of windows) {
    const sheet = findSheet(workbook, name);
    if (!sheet) continue;
    const { projectName } = scanHeader(sheet, { firstRow: 2, lastRow });
    if (projectName) return projectName;
  }
  return null;
}
