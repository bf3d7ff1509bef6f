import { buildComparativeAnalysis, computeValuationCut, VarianceRow } from './comparative-analysis';
import { REPORT_CODE } from './constants';
import { buildChartWindow, ChartMonth, renderSCurveChart } from './s-curve-chart';
import { escapeHtml, fmt, fmtFraction, fmtPct, formatDate, labelMes } from './report-format';
import { MonthPoint, ProgressSeries, ProjectRecord } from './types';

const DASH = '<span class="dash">&mdash;</span>';

interface AmountLine {
  name: string;
  value: number;
}

function pageHeader(title: string, subtitle: string, record: ProjectRecord): string {
  return `
    <div class="header">
      <div class="header-titles">
        <h1>${title}</h1>
        <h2>${subtitle}</h2>
      </div>
      <div class="header-obra">
        <div><span class="header-obra-label">OBRA:</span> <span class="header-obra-value">${escapeHtml(record.shortName)}</span></div>
        <div class="header-fecha">${formatDate(record.date)}</div>
      </div>
    </div>`;
}

function sectionTitle(numero: string, title: string, style = ''): string {
  const styleAttr = style ? ` style="${style}"` : '';
  return `<div class="section-title"${styleAttr}><span class="numero">${numero}</span>${title}</div>`;
}

function shareRows(lines: readonly AmountLine[], total: number): string {
  return lines
    .map(line => {
      const pct = total > 0 ? fmtPct((line.value / total) * 100) : '0.00%';
      return `<tr><td>${line.name}</td><td class="num">${fmt(line.value)}</td><td class="num">${pct}</td></tr>`;
    })
    .join('');
}

function varianceCard(title: string, row: VarianceRow): string {
  const positive = row.variance >= 0;
  return `
      <div class="card">
        <div class="card-title">${title}</div>
        <div class="card-value ${positive ? 'positivo' : 'negativo'}">${positive ? '+' : ''}${fmtPct(row.variancePct)}</div>
        <div class="card-monto ${positive ? 'ganancia' : 'perdida'}">${positive ? '+' : '-'}S/ ${fmt(Math.abs(row.variance))}</div>
      </div>`;
}

function comparisonRow(concept: string, row: VarianceRow, isTotal = false): string {
  const gain = row.state === 'GAIN';
  const varClass = gain ? 'valor-positivo' : 'valor-negativo';
  const sign = gain ? '+' : '';
  const estado = gain
    ? '<span class="estado-box estado-ganancia">GANANCIA</span>'
    : '<span class="estado-box estado-perdida">P&Eacute;RDIDA</span>';
  const strong = (text: string): string => (isTotal ? `<strong>${text}</strong>` : text);

  return (
    `<tr${isTotal ? ' class="total-row"' : ''}>` +
    `<td>${strong(concept)}</td>` +
    `<td class="num">${strong(fmt(row.valorized))}</td>` +
    `<td class="num">${strong(fmt(row.executed))}</td>` +
    `<td class="num ${varClass}">${strong(`${sign}${fmt(row.variance)}`)}</td>` +
    `<td class="num ${varClass}">${strong(`${sign}${fmtPct(row.variancePct)}`)}</td>` +
    `<td style="text-align:center">${estado}</td>` +
    '</tr>'
  );
}

// Page 1: valuation cut, executed costs and the valuation vs executed comparison
export function renderValuationPage(record: ProjectRecord): string {
  const rc = record.resCosto;
  const rv = record.rval;
  const cut = computeValuationCut(rv);
  const analysis = buildComparativeAnalysis(rc, rv);

  const cdLines: AmountLine[] = [
    { name: 'Costo de Materiales', value: rc.materiales },
    { name: 'Costo de Alquileres', value: rc.alquileres },
    { name: 'Costo de Subcontratos', value: rc.subcontratos },
    { name: 'Costo Varios', value: rc.costosVarios },
    { name: 'Costo Personal Obrero', value: rc.personalObrero },
  ];
  const ggLines: AmountLine[] = [
    { name: 'Planilla Staff', value: rc.planillaStaff },
    { name: 'Otros Gastos Generales', value: rc.otrosGG },
  ];

  return `
  <div class="page">
    ${pageHeader(
      `${REPORT_CODE} REPORTE DE VALORIZACI&Oacute;N SEMANAL`,
      'An&aacute;lisis Comparativo: Valorizaci&oacute;n vs Gastos Ejecutados',
      record
    )}

    ${sectionTitle('1', 'CORTE DE VALORIZACI&Oacute;N')}
    <table>
      <thead><tr><th>Concepto</th><th class="num">Monto (S/)</th><th class="num">Porcentaje</th></tr></thead>
      <tbody>
        <tr><td>Costo Directo</td><td class="num">${fmt(rv.costoDirecto)}</td><td class="num">100.00%</td></tr>
        <tr><td>Gastos Generales</td><td class="num">${fmt(rv.gastosGenerales)}</td><td class="num">${fmtPct(rv.ggPercent)}</td></tr>
        <tr><td>Utilidad</td><td class="num">${fmt(rv.utilidad)}</td><td class="num">${fmtPct(rv.utilPercent)}</td></tr>
        <tr><td>Sub Total</td><td class="num">${fmt(cut.subtotal)}</td><td class="num">&mdash;</td></tr>
        <tr><td>IGV</td><td class="num">${fmt(cut.tax)}</td><td class="num">${fmtPct(cut.taxRate * 100)}</td></tr>
        <tr class="total-row"><td><strong>Total Valorizaci&oacute;n</strong></td><td class="num"><strong>${fmt(cut.totalWithTax)}</strong></td><td class="num">&mdash;</td></tr>
      </tbody>
    </table>

    <div class="two-columns">
      <div>
        ${sectionTitle('2', 'GASTOS EJECUTADOS - COSTO DIRECTO')}
        <table>
          <thead><tr><th>Concepto</th><th class="num">Monto (S/)</th><th class="num">%</th></tr></thead>
          <tbody>
            ${shareRows(cdLines, rc.totalCD)}
            <tr class="total-row"><td><strong>TOTAL CD EJECUTADO</strong></td><td class="num"><strong>${fmt(rc.totalCD)}</strong></td><td class="num"><strong>100.00%</strong></td></tr>
          </tbody>
        </table>
      </div>
      <div>
        ${sectionTitle('3', 'GASTOS GENERALES EJECUTADOS')}
        <table>
          <thead><tr><th>Concepto</th><th class="num">Monto (S/)</th><th class="num">%</th></tr></thead>
          <tbody>
            ${shareRows(ggLines, rc.totalGG)}
            <tr class="total-row"><td><strong>TOTAL GG EJECUTADOS</strong></td><td class="num"><strong>${fmt(rc.totalGG)}</strong></td><td class="num"><strong>100.00%</strong></td></tr>
          </tbody>
        </table>
      </div>
    </div>

    ${sectionTitle('4', 'AN&Aacute;LISIS COMPARATIVO - VALORIZACI&Oacute;N VS GASTOS EJECUTADOS')}
    <div class="cards-container">
      ${varianceCard('COSTO DIRECTO', analysis.directCost)}
      ${varianceCard('GASTOS GENERALES', analysis.overhead)}
      ${varianceCard('VARIACI&Oacute;N TOTAL', analysis.total)}
    </div>
    <table class="tabla-comparativa">
      <thead><tr>
        <th>Concepto</th><th class="num">Valorizaci&oacute;n (S/)</th><th class="num">Ejecutado (S/)</th>
        <th class="num">Variaci&oacute;n (S/)</th><th class="num">Var. (%)</th><th style="text-align:center">Estado</th>
      </tr></thead>
      <tbody>
        ${comparisonRow('Costo Directo', analysis.directCost)}${comparisonRow('Gastos Generales', analysis.overhead)}${comparisonRow('TOTAL', analysis.total, true)}
      </tbody>
    </table>
  </div>`;
}

function summaryCard(kind: string, label: string, point: MonthPoint | null, color: string, extraStyle = ''): string {
  const pct = point ? fmtFraction(point.acumPct) : 'N/D';
  const amount = point ? `S/ ${fmt(point.acumulado)}` : 'Sin datos';
  return `
      <div class="summary-card-curva ${kind}"${extraStyle}>
        <div class="card-label" style="color:${color}">${label}</div>
        <div class="card-pct" style="color:${color}">${pct}</div>
        <div class="card-amt" style="color:${color}">${amount}</div>
      </div>`;
}

function monthRow(month: ChartMonth, hasPlan: boolean): string {
  const rowClass = month.isMesActual ? 'mes-actual' : month.isProyeccion ? 'mes-proyeccion' : '';
  const marker = month.isMesActual ? '<span style="color:#d4a017">&#9679;</span> ' : '';
  const highlight = (color: string): string => (month.isMesActual ? `color:${color};font-weight:700` : '');

  let ejecParcial = DASH;
  let ejecAcum = DASH;
  let planParcial = DASH;
  let planAcum = DASH;
  if (!month.isProyeccion) {
    if (month.ejec) {
      ejecParcial = fmt(month.ejec.parcial);
      ejecAcum = fmtFraction(month.ejec.acumPct);
    }
    if (hasPlan && month.plan) {
      planParcial = fmt(month.plan.parcial);
      planAcum = fmtFraction(month.plan.acumPct);
    }
  }

  return `
        <tr class="${rowClass}">
          <td>${marker}${escapeHtml(labelMes(month.prog.mes))}</td>
          <td class="num">${fmt(month.prog.parcial)}</td>
          <td class="num" style="${highlight('#2c5aa0')}">${fmtFraction(month.prog.acumPct)}</td>
          <td class="num">${ejecParcial}</td>
          <td class="num" style="${highlight('#28a745')}">${ejecAcum}</td>
          <td class="num">${planParcial}</td>
          <td class="num" style="${highlight('#e6a817')}">${planAcum}</td>
        </tr>`;
}

function legend(hasPlan: boolean): string {
  const line = (color: string, label: string): string =>
    `<div class="legend-item"><div class="legend-swatch" style="background:${color}"></div>${label}</div>`;
  const square = (color: string, border: string, label: string): string =>
    `<div class="legend-item"><div class="legend-square" style="background:${color};border:1px solid ${border}"></div>${label}</div>`;

  const items = [line('#2c5aa0', 'Contractual'), line('#28a745', 'Valorizado')];
  if (hasPlan) {
    items.push(
      '<div class="legend-item"><div class="legend-swatch" style="background:repeating-linear-gradient(90deg,#e6a817 0,#e6a817 4px,transparent 4px,transparent 7px)"></div>Proyectado</div>'
    );
  }
  items.push(square('#fff3cd', '#d4a017', 'Mes Actual'));
  items.push(square('#f0f4fa', '#ccc', 'Proyecci&oacute;n'));
  return items.join('');
}

const FULL_MONTH_NOTE =
  '<span class="nota-label">Nota:</span> Los montos y porcentajes <span class="nota-bold">Contractuales</span> corresponden a la valorizaci&oacute;n del <span class="nota-mes">mes completo</span>, no al corte semanal.';

// Page 2: S curve, current month cards and the monthly progress table
export function renderCurvePage(record: ProjectRecord, curva: ProgressSeries): string {
  const hasPlan = curva.proyectado !== null && curva.proyectado.length > 0;
  const months = buildChartWindow(curva);
  const current = Math.max(curva.mesActualIndex, 0);

  const progActual = curva.contractual[current] ?? null;
  const ejecActual = curva.valorizado[current] ?? null;
  const planActual = hasPlan && curva.proyectado ? curva.proyectado[current] ?? null : null;

  const lastMonth = months.length > 0 ? labelMes(months[months.length - 1].prog.mes) : '';
  const zoomLabel = escapeHtml(lastMonth);
  const subtitle = `Contractual vs Valorizado${hasPlan ? ' vs Proyectado' : ''} (CD + GG + Utilidad) &mdash; Zoom: Inicio &rarr; ${zoomLabel}`;

  const cards =
    summaryCard('prog', 'Contractual Acum.', progActual, '#2c5aa0') +
    summaryCard('ejec', 'Valorizado Acum.', ejecActual, '#155724') +
    (hasPlan
      ? summaryCard('plan', 'Proyectado Acum.', planActual, '#856404')
      : summaryCard('prog', 'Proyectado', null, '#999', ' style="opacity:0.5"'));

  return `
  <div class="page">
    ${pageHeader('CURVA S - AVANCE ACUMULADO DEL PROYECTO', subtitle, record)}

    <div class="summary-cards-curva">${cards}
    </div>

    ${sectionTitle('S', `CURVA S - AVANCE ACUMULADO (%) &mdash; ZOOM HASTA ${escapeHtml(lastMonth.toUpperCase())}`, 'margin-top:8px')}
    <div class="chart-container">
      ${renderSCurveChart(months, hasPlan)}
    </div>

    <div class="legend-container">${legend(hasPlan)}</div>

    <div class="nota-mes-completo">${FULL_MONTH_NOTE}</div>

    ${sectionTitle('T', 'DETALLE DE AVANCE MENSUAL (CD + GG + UTILIDAD)', 'margin-top:8px')}
    <table class="table-curva">
      <thead>
        <tr>
          <th rowspan="2" style="border-bottom:2px solid #333">MES</th>
          <th colspan="2" style="background:#e8edf5;color:#2c5aa0;text-align:center;border-bottom:2px solid #2c5aa0">CONTRACTUAL</th>
          <th colspan="2" style="background:#d4edda;color:#155724;text-align:center;border-bottom:2px solid #28a745">VALORIZADO</th>
          <th colspan="2" style="background:#fff3cd;color:#856404;text-align:center;border-bottom:2px solid #e6a817">PROYECTADO</th>
        </tr>
        <tr>
          <th class="num" style="background:#e8edf5;color:#2c5aa0;border-bottom:1px solid #2c5aa0">Parcial (S/)</th>
          <th class="num" style="background:#e8edf5;color:#2c5aa0;border-bottom:1px solid #2c5aa0">Acum.(%)</th>
          <th class="num" style="background:#d4edda;color:#155724;border-bottom:1px solid #28a745">Parcial (S/)</th>
          <th class="num" style="background:#d4edda;color:#155724;border-bottom:1px solid #28a745">Acum.(%)</th>
          <th class="num" style="background:#fff3cd;color:#856404;border-bottom:1px solid #e6a817">Parcial (S/)</th>
          <th class="num" style="background:#fff3cd;color:#856404;border-bottom:1px solid #e6a817">Acum.(%)</th>
        </tr>
      </thead>
      <tbody>${months.map(m => monthRow(m, hasPlan)).join('')}
      </tbody>
    </table>

    <div class="nota-mes-completo nota-tabla">${FULL_MONTH_NOTE}</div>
  </div>`;
}
