import * as ExcelJS from 'exceljs';
import { CellValue, Logger, SheetGrid, Workbook } from './types';

export type WorkbookData = Parameters<ExcelJS.Xlsx['load']>[0];

function normalizeResult(result: ExcelJS.CellFormulaValue['result']): CellValue {
  if (result === undefined || result === null) return null;
  if (typeof result === 'object' && !(result instanceof Date)) return null; // #DIV/0!, #REF! ...
  return result;
}

// Cached value of a cell the way a data-only reader sees it
export function normalizeCellValue(value: ExcelJS.CellValue): CellValue {
  if (value === null || value === undefined) return null;
  if (typeof value === 'number' || typeof value === 'string' || typeof value === 'boolean') return value;
  if (value instanceof Date) return value;

  if ('richText' in value) {
    return value.richText.map(rt => rt.text).join('');
  }
  if ('error' in value) {
    return null;
  }
  if ('hyperlink' in value) {
    return value.text;
  }
  if ('result' in value) {
    return normalizeResult(value.result);
  }
  return null;
}

export function worksheetToGrid(worksheet: ExcelJS.Worksheet): SheetGrid {
  const rows: CellValue[][] = [];
  const colCount = worksheet.columnCount;

  for (let row = 1; row <= worksheet.rowCount; row++) {
    const cells: CellValue[] = [];
    for (let col = 1; col <= colCount; col++) {
      const cell = worksheet.getCell(row, col);
      // only the top-left cell of a merged range carries the value
      cells.push(cell.type === ExcelJS.ValueType.Merge ? null : normalizeCellValue(cell.value));
    }
    rows.push(cells);
  }

  return { name: worksheet.name, rows };
}

export function toWorkbook(workbook: ExcelJS.Workbook): Workbook {
  return { sheets: workbook.worksheets.map(worksheetToGrid) };
}

export async function loadWorkbookFile(filePath: string, logger: Logger = console): Promise<Workbook> {
  const workbook = new ExcelJS.Workbook();
  await workbook.xlsx.readFile(filePath);
  logger.log(`  [EXCEL] Archivo cargado: ${filePath} (${workbook.worksheets.length} hojas)`);
  return toWorkbook(workbook);
}

export async function loadWorkbookData(data: WorkbookData): Promise<Workbook> {
  const workbook = new ExcelJS.Workbook();
  await workbook.xlsx.load(data);
  return toWorkbook(workbook);
}
