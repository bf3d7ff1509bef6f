#!/usr/bin/env node
import * as path from 'path';
import { FileExporter } from './file-exporter';
import { extract } from './project-extractor';
import { render } from './report-renderer';
import { buildReportSummary } from './report-summary';
import { loadWorkbookFile } from './workbook-loader';

export { SchemaError } from './errors';
export { detectProjectName, extract, getShortName } from './project-extractor';
export { render } from './report-renderer';
export { buildReportSummary } from './report-summary';
export { loadWorkbookData, loadWorkbookFile } from './workbook-loader';
export { spreadLabels } from './label-layout';
export { FileExporter } from './file-exporter';
export * from './types';

async function main(argv: string[] = process.argv.slice(2)): Promise<void> {
  try {
    console.log('=== Reporte de valorizacion semanal ===');

    // input file is required, output directory is optional
    if (!argv[0]) {
      console.error('Uso: valuation-report <archivo.xlsx> [directorio-salida]');
      process.exit(1);
    }

    const inputFile = path.resolve(argv[0]);
    const outputDir = path.resolve(argv[1] ?? path.join(__dirname, '../output'));

    console.log(`Archivo de entrada: ${inputFile}`);
    console.log(`Directorio de salida: ${outputDir}`);

    // step 1: read the workbook
    console.log('\nPaso 1: cargar el libro Excel...');
    const workbook = await loadWorkbookFile(inputFile);

    // step 2: extract the three sheets
    console.log('\nPaso 2: extraer RES-COSTO, RVAL y CURVA...');
    const record = extract(workbook);

    const exporter = new FileExporter();
    exporter.printDataSummary(record);

    // step 3: render and write the HTML report
    console.log('\nPaso 3: generar el reporte HTML...');
    const report = render(record);
    exporter.exportReport(report, outputDir);

    // step 4: merge this report into resumen.json
    console.log('\nPaso 4: actualizar el resumen...');
    const processedAt = new Date();
    const summary = buildReportSummary(record, {
      projectKey: record.shortName,
      fileName: report.fileName,
      processedAt,
    });
    exporter.saveSummary(summary, outputDir, processedAt);

    console.log('\n=== Listo ===');
    console.log(`Reporte: ${report.fileName}`);
  } catch (error) {
    console.error('Error durante el procesamiento:', error);
    process.exit(1);
  }
}

// run when executed directly, not when imported
if (require.main === module) {
  main().catch(console.error);
}

export { main };
