import { MONTH_ABBREVS, MONTH_NAMES, REPORT_FILE_PREFIX } from './constants';

const HTML_ESCAPES: Readonly<Record<string, string>> = Object.freeze({
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
});

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, ch => HTML_ESCAPES[ch] ?? ch);
}

// 1234567.891 -> "1,234,567.89"
export function fmt(n: number): string {
  if (!Number.isFinite(n)) return '0.00';
  const [integer, decimals] = Math.abs(n).toFixed(2).split('.');
  const grouped = integer.replace(/\B(?=(\d{3})+(?!\d))/g, ',');
  return `${n < 0 ? '-' : ''}${grouped}.${decimals}`;
}

// percent value with two decimals: 16.666 -> "16.67%"
export function fmtPct(pct: number): string {
  return `${(Number.isFinite(pct) ? pct : 0).toFixed(2)}%`;
}

// fraction as percent: 0.1234 -> "12.34%"
export function fmtFraction(fraction: number): string {
  return fmtPct(fraction * 100);
}

// "22 de Febrero de 2026"
export function formatDate(date: Date): string {
  return `${date.getUTCDate()} de ${MONTH_NAMES[date.getUTCMonth()]} de ${date.getUTCFullYear()}`;
}

// "22-Feb-2026"
export function formatDateShort(date: Date): string {
  const day = String(date.getUTCDate()).padStart(2, '0');
  return `${day}-${MONTH_ABBREVS[date.getUTCMonth()]}-${date.getUTCFullYear()}`;
}

// "22/02/2026"
export function formatDateNumeric(date: Date): string {
  const day = String(date.getUTCDate()).padStart(2, '0');
  const month = String(date.getUTCMonth() + 1).padStart(2, '0');
  return `${day}/${month}/${date.getUTCFullYear()}`;
}

// "INICIO 05/01/2025" -> "INICIO"
export function labelMes(mes: string): string {
  return mes.replace(/INICIO \d+\/\d+\/\d+/, 'INICIO');
}

export function buildReportFileName(shortName: string, date: Date): string {
  const obra = (shortName.trim() || 'REPORTE').replace(/\s+/g, '_');
  return `${REPORT_FILE_PREFIX}_${obra}_${formatDateShort(date)}.html`;
}
