import { BADGE_HEIGHT, MIN_LABEL_SEPARATION, spreadLabels } from './label-layout';
import { escapeHtml, labelMes } from './report-format';
import { MonthPoint, ProgressSeries } from './types';

export interface ChartMonth {
  index: number;
  prog: MonthPoint;
  ejec: MonthPoint | null;
  plan: MonthPoint | null;
  isMesActual: boolean;
  isProyeccion: boolean;
}

interface PlotPoint {
  x: number;
  y: number;
  pct: number;
  idx: number;
}

interface ValueBadge {
  y: number;
  color: string;
  text: string;
}

export const CHART_INSUFFICIENT_DATA = '<p>Datos insuficientes para gr&aacute;fico</p>';
export const CHART_NO_PERCENT_DATA = '<p>Sin datos de porcentaje</p>';

const WIDTH = 730;
const HEIGHT = 420;
const MARGIN = { left: 50, right: 60, top: 25, bottom: 55 } as const;
const CHART_W = WIDTH - MARGIN.left - MARGIN.right;
const CHART_H = HEIGHT - MARGIN.top - MARGIN.bottom;
const GRID_STEP = 5;
const HEADROOM = 2;
const LOOKAHEAD_MONTHS = 2;
const DEVIATION_EPSILON = 0.01;
const VALUE_BADGE_WIDTH = 52;

const COLOR_PROG = '#2c5aa0';
const COLOR_EJEC = '#28a745';
const COLOR_PLAN = '#e6a817';
const COLOR_DEVIATION = '#dc3545';

// SVG coordinates with at most two decimals
function n(value: number): string {
  return String(Math.round(value * 100) / 100);
}

/**
 * Months shown in the chart: project start through two months past the current
 * month, clipped to the series. Months after the current one are forecast.
 */
export function buildChartWindow(curve: ProgressSeries): ChartMonth[] {
  const last = Math.min(curve.mesActualIndex + LOOKAHEAD_MONTHS, curve.contractual.length - 1);
  const hasPlan = curve.proyectado !== null && curve.proyectado.length > 0;
  const months: ChartMonth[] = [];

  for (let i = 0; i <= last; i++) {
    months.push({
      index: i,
      prog: curve.contractual[i],
      ejec: curve.valorizado[i] ?? null,
      plan: hasPlan && curve.proyectado ? curve.proyectado[i] ?? null : null,
      isMesActual: i === curve.mesActualIndex,
      isProyeccion: i > curve.mesActualIndex,
    });
  }
  return months;
}

export function maxObservedPct(months: readonly ChartMonth[]): number {
  let max = 0;
  for (const m of months) {
    max = Math.max(max, m.prog.acumPct * 100);
    if (m.ejec) max = Math.max(max, m.ejec.acumPct * 100);
    if (m.plan) max = Math.max(max, m.plan.acumPct * 100);
  }
  return max;
}

// Rounded up to the next 5 % grid line, plus headroom so the top point never touches the frame
export function computeYMax(maxPct: number): number {
  return Math.ceil(maxPct / GRID_STEP) * GRID_STEP + HEADROOM;
}

function linePath(points: readonly PlotPoint[]): string {
  return points.map((p, i) => `${i === 0 ? 'M' : 'L'}${n(p.x)},${n(p.y)}`).join(' ');
}

function areaPath(points: readonly PlotPoint[], baseY: number): string {
  const first = points[0];
  const last = points[points.length - 1];
  const body = points.map(p => ` L${n(p.x)},${n(p.y)}`).join('');
  return `M${n(first.x)},${n(baseY)}${body} L${n(last.x)},${n(baseY)} Z`;
}

export function renderSCurveChart(months: readonly ChartMonth[], hasPlan: boolean): string {
  const count = months.length;
  if (count < 2) {
    return CHART_INSUFFICIENT_DATA;
  }

  const yMax = computeYMax(maxObservedPct(months));
  if (yMax <= HEADROOM) {
    return CHART_NO_PERCENT_DATA;
  }

  const xStep = CHART_W / (count - 1);
  const baseY = MARGIN.top + CHART_H;
  const xPos = (i: number): number => MARGIN.left + i * xStep;
  const yPos = (pct: number): number => MARGIN.top + CHART_H - (pct / yMax) * CHART_H;

  const parts: string[] = [];
  parts.push(
    `<svg width="100%" viewBox="0 0 ${WIDTH} ${HEIGHT}" xmlns="http://www.w3.org/2000/svg" style="font-family:'Segoe UI',sans-serif">`
  );
  parts.push(
    '<defs>' +
      '<linearGradient id="gradProg" x1="0" y1="0" x2="0" y2="1">' +
      `<stop offset="0%" stop-color="${COLOR_PROG}" stop-opacity="0.18"/>` +
      `<stop offset="100%" stop-color="${COLOR_PROG}" stop-opacity="0.02"/>` +
      '</linearGradient>' +
      '<linearGradient id="gradEjec" x1="0" y1="0" x2="0" y2="1">' +
      `<stop offset="0%" stop-color="${COLOR_EJEC}" stop-opacity="0.12"/>` +
      `<stop offset="100%" stop-color="${COLOR_EJEC}" stop-opacity="0.01"/>` +
      '</linearGradient>' +
      '</defs>'
  );

  const projStart = months.findIndex(m => m.isProyeccion);
  const currentIdx = months.findIndex(m => m.isMesActual);

  // zones
  if (currentIdx >= 0) {
    const x1 = Math.max(MARGIN.left, xPos(currentIdx) - xStep / 2);
    const x2 = Math.min(xPos(currentIdx) + xStep / 2, MARGIN.left + CHART_W);
    parts.push(
      `<rect x="${n(x1)}" y="${MARGIN.top}" width="${n(x2 - x1)}" height="${CHART_H}" fill="#fff3cd" opacity="0.45"/>`
    );
  }
  if (projStart >= 0) {
    const projX = xPos(projStart) - xStep / 2;
    parts.push(
      `<rect x="${n(projX)}" y="${MARGIN.top}" width="${n(MARGIN.left + CHART_W - projX)}" height="${CHART_H}" fill="#f5f7fb"/>`
    );
    parts.push(
      `<line x1="${n(projX)}" y1="${MARGIN.top}" x2="${n(projX)}" y2="${baseY}" stroke="#bbb" stroke-dasharray="6,3" stroke-width="1"/>`
    );
    parts.push(
      `<text x="${n((projX + MARGIN.left + CHART_W) / 2)}" y="${MARGIN.top + 14}" text-anchor="middle" font-size="10" fill="#aaa" font-weight="700" letter-spacing="1">PROYECCI&Oacute;N</text>`
    );
  }

  // grid, major line every 10 %
  for (let pct = 0; pct <= yMax; pct += GRID_STEP) {
    const y = yPos(pct);
    const major = pct % 10 === 0;
    parts.push(
      `<line x1="${MARGIN.left}" y1="${n(y)}" x2="${MARGIN.left + CHART_W}" y2="${n(y)}" stroke="${major ? '#ddd' : '#eee'}" stroke-width="${major ? 1 : 0.5}"/>`
    );
    parts.push(
      `<text x="${MARGIN.left - 8}" y="${n(y + 4)}" text-anchor="end" font-size="${major ? 10 : 9}" fill="${major ? '#666' : '#aaa'}" font-weight="${major ? 600 : 400}">${pct}%</text>`
    );
  }

  // axes
  parts.push(
    `<line x1="${MARGIN.left}" y1="${MARGIN.top}" x2="${MARGIN.left}" y2="${baseY}" stroke="#ddd" stroke-width="1"/>`
  );
  parts.push(
    `<line x1="${MARGIN.left}" y1="${baseY}" x2="${MARGIN.left + CHART_W}" y2="${baseY}" stroke="#bbb" stroke-width="1"/>`
  );

  // month labels, two lines: "ENE" / "2025"
  months.forEach((m, i) => {
    const x = n(xPos(i));
    const [first, second] = labelMes(m.prog.mes).split(' ');
    const isCurrent = i === currentIdx;
    const color = isCurrent ? '#856404' : m.isProyeccion ? '#aaa' : '#555';
    const weight = isCurrent ? 700 : 400;
    parts.push(`<line x1="${x}" y1="${baseY}" x2="${x}" y2="${baseY + 4}" stroke="#bbb"/>`);
    parts.push(
      `<text x="${x}" y="${baseY + 16}" text-anchor="middle" font-size="9.5" fill="${color}" font-weight="${weight}">${escapeHtml(first)}</text>`
    );
    if (second !== undefined) {
      parts.push(
        `<text x="${x}" y="${baseY + 27}" text-anchor="middle" font-size="8.5" fill="${color}" font-weight="${weight}">${escapeHtml(second)}</text>`
      );
    }
  });

  const progPoints: PlotPoint[] = [];
  const ejecPoints: PlotPoint[] = [];
  const planPoints: PlotPoint[] = [];

  months.forEach((m, i) => {
    const progPct = m.prog.acumPct * 100;
    progPoints.push({ x: xPos(i), y: yPos(progPct), pct: progPct, idx: i });

    if (i <= currentIdx) {
      const ejecPct = (m.ejec?.acumPct ?? 0) * 100;
      ejecPoints.push({ x: xPos(i), y: yPos(ejecPct), pct: ejecPct, idx: i });
    }
    if (hasPlan && m.plan) {
      const planPct = m.plan.acumPct * 100;
      if (planPct > 0 || i === 0) {
        planPoints.push({ x: xPos(i), y: yPos(planPct), pct: planPct, idx: i });
      }
    }
  });

  const solidEnd = projStart >= 0 ? projStart : progPoints.length;

  // area fills
  const progArea = progPoints.slice(0, solidEnd);
  if (progArea.length > 0) {
    parts.push(`<path d="${areaPath(progArea, baseY)}" fill="url(#gradProg)"/>`);
  }
  if (ejecPoints.length > 1) {
    parts.push(`<path d="${areaPath(ejecPoints, baseY)}" fill="url(#gradEjec)"/>`);
  }

  // contractual: solid up to the forecast boundary, dashed after it
  if (solidEnd > 0) {
    parts.push(
      `<path d="${linePath(progPoints.slice(0, solidEnd))}" fill="none" stroke="${COLOR_PROG}" stroke-width="3" stroke-linejoin="round"/>`
    );
  }
  const dashedStart = Math.max(solidEnd - 1, 0);
  if (solidEnd < progPoints.length && progPoints.length - dashedStart > 1) {
    parts.push(
      `<path d="${linePath(progPoints.slice(dashedStart))}" fill="none" stroke="${COLOR_PROG}" stroke-width="2.5" stroke-dasharray="8,5" stroke-linejoin="round"/>`
    );
  }
  if (ejecPoints.length > 1) {
    parts.push(
      `<path d="${linePath(ejecPoints)}" fill="none" stroke="${COLOR_EJEC}" stroke-width="3" stroke-linejoin="round"/>`
    );
  }
  if (planPoints.length > 1) {
    parts.push(
      `<path d="${linePath(planPoints)}" fill="none" stroke="${COLOR_PLAN}" stroke-width="2.5" stroke-dasharray="8,5" stroke-linejoin="round"/>`
    );
  }

  // data points
  progPoints.forEach((p, i) => {
    const isCurrent = months[i].isMesActual;
    const halo = isCurrent ? ' stroke="white" stroke-width="3"' : '';
    parts.push(
      `<circle cx="${n(p.x)}" cy="${n(p.y)}" r="${isCurrent ? 7 : 4.5}" fill="${COLOR_PROG}" opacity="${months[i].isProyeccion ? 0.45 : 1}"${halo}/>`
    );
  });
  for (const p of ejecPoints) {
    const isCurrent = p.idx === currentIdx;
    const halo = isCurrent ? ' stroke="white" stroke-width="3"' : '';
    parts.push(`<circle cx="${n(p.x)}" cy="${n(p.y)}" r="${isCurrent ? 7 : 4.5}" fill="${COLOR_EJEC}"${halo}/>`);
  }
  for (const p of planPoints) {
    parts.push(`<circle cx="${n(p.x)}" cy="${n(p.y)}" r="4.5" fill="${COLOR_PLAN}"/>`);
  }

  if (currentIdx >= 0) {
    parts.push(renderCurrentMonthMarkers(months[currentIdx], xPos(currentIdx), yPos, hasPlan));
  }

  // faded value tags on forecast months
  months.forEach((m, i) => {
    if (!m.isProyeccion) return;
    const p = progPoints[i];
    parts.push(
      `<rect x="${n(p.x - 22)}" y="${n(p.y - 20)}" width="44" height="16" rx="3" fill="${COLOR_PROG}" opacity="0.25"/>`
    );
    parts.push(
      `<text x="${n(p.x)}" y="${n(p.y - 9)}" text-anchor="middle" font-size="9.5" fill="${COLOR_PROG}" opacity="0.8" font-weight="600">${p.pct.toFixed(1)}%</text>`
    );
  });

  parts.push('</svg>');
  return parts.join('');
}

// Deviation bracket, value badges and the "HOY" marker for the current month
function renderCurrentMonthMarkers(
  month: ChartMonth,
  mx: number,
  yPos: (pct: number) => number,
  hasPlan: boolean
): string {
  const parts: string[] = [];
  const progPct = month.prog.acumPct * 100;
  const ejecPct = (month.ejec?.acumPct ?? 0) * 100;
  const progY = yPos(progPct);
  const ejecY = yPos(ejecPct);
  const deviation = progPct - ejecPct;

  if (Math.abs(deviation) > DEVIATION_EPSILON) {
    const y1 = Math.min(progY, ejecY);
    const y2 = Math.max(progY, ejecY);
    const bx = mx - 16;
    const stroke = `stroke="${COLOR_DEVIATION}" stroke-width="2.5"`;
    parts.push(`<line x1="${n(bx)}" y1="${n(y1)}" x2="${n(bx)}" y2="${n(y2)}" ${stroke}/>`);
    parts.push(`<line x1="${n(bx - 5)}" y1="${n(y1)}" x2="${n(bx + 5)}" y2="${n(y1)}" ${stroke}/>`);
    parts.push(`<line x1="${n(bx - 5)}" y1="${n(y2)}" x2="${n(bx + 5)}" y2="${n(y2)}" ${stroke}/>`);

    // behind schedule reads as negative
    const text = `${deviation > 0 ? '-' : '+'}${Math.abs(deviation).toFixed(2)}%`;
    const badgeY = (y1 + y2) / 2;
    const badgeW = text.length * 6.5 + 10;
    parts.push(
      `<rect x="${n(bx - badgeW + 2)}" y="${n(badgeY - 10)}" width="${n(badgeW)}" height="20" rx="4" fill="#f8d7da" stroke="${COLOR_DEVIATION}" stroke-width="1"/>`
    );
    parts.push(
      `<text x="${n(bx - badgeW / 2 + 2)}" y="${n(badgeY + 4)}" text-anchor="middle" font-size="10" fill="${COLOR_DEVIATION}" font-weight="700">${text}</text>`
    );
  }

  const badges: ValueBadge[] = [
    { y: progY, color: COLOR_PROG, text: `${progPct.toFixed(2)}%` },
    { y: ejecY, color: COLOR_EJEC, text: `${ejecPct.toFixed(2)}%` },
  ];
  if (hasPlan && month.plan) {
    const planPct = month.plan.acumPct * 100;
    badges.push({ y: yPos(planPct), color: COLOR_PLAN, text: `${planPct.toFixed(2)}%` });
  }

  const badgeX = mx + 12;
  for (const badge of spreadLabels(badges, MIN_LABEL_SEPARATION)) {
    parts.push(
      `<rect x="${n(badgeX)}" y="${n(badge.y - BADGE_HEIGHT / 2)}" width="${VALUE_BADGE_WIDTH}" height="${BADGE_HEIGHT}" rx="4" fill="${badge.color}"/>`
    );
    parts.push(
      `<text x="${n(badgeX + VALUE_BADGE_WIDTH / 2)}" y="${n(badge.y + 4)}" text-anchor="middle" font-size="10" fill="white" font-weight="700">${badge.text}</text>`
    );
  }

  const baseY = MARGIN.top + CHART_H;
  parts.push(
    `<rect x="${n(mx - 16)}" y="${baseY + 34}" width="32" height="18" rx="5" fill="#fff3cd" stroke="#d4a017" stroke-width="1.2"/>`
  );
  parts.push(
    `<text x="${n(mx)}" y="${baseY + 46}" text-anchor="middle" font-size="10" fill="#856404" font-weight="700">HOY</text>`
  );

  return parts.join('');
}
