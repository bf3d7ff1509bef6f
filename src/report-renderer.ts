import { REPORT_CODE } from './constants';
import { buildReportFileName } from './report-format';
import { renderCurvePage, renderValuationPage } from './report-pages';
import { REPORT_CSS } from './report-styles';
import { Logger, ProjectRecord, RenderedReport } from './types';

export interface RenderOptions {
  logger?: Logger;
}

function wrapStandaloneHtml(body: string): string {
  return `<!DOCTYPE html>
<html lang="es">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>${REPORT_CODE} Reporte Valorizaci&oacute;n Semanal</title>
  <style>${REPORT_CSS}</style>
</head>
<body>
${body}
</body>
</html>`;
}

/**
 * Standalone HTML report for one extracted workbook. The valuation page is
 * always present, the S curve page only when the workbook had a CURVA sheet.
 */
export function render(record: ProjectRecord, options: RenderOptions = {}): RenderedReport {
  const logger = options.logger ?? console;

  let body = renderValuationPage(record);
  if (record.curva) {
    body += renderCurvePage(record, record.curva);
  } else {
    logger.log('  [REPORTE] Sin datos de CURVA - reporte de 1 pagina.');
  }

  return {
    html: wrapStandaloneHtml(body),
    fileName: buildReportFileName(record.shortName, record.date),
  };
}
