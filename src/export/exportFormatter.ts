/**
 * Plain-text export of the whole ledger. Pure: reads periods and rates, returns a
 * string, touches nothing.
 */
import { actualEarnings } from '../domain/computations.js';
import { formatCurrency, formatHours } from '../domain/format.js';
import { totalHours } from '../domain/period.js';
import { effectiveHourlyRate } from '../domain/rateConfig.js';
import type { Period, RateConfig } from '../domain/types.js';

export const EXPORT_TITLE = 'Hours Ledger Data Export';
export const CSV_HEADER = 'Period,Date,Hours,Note,Logged_At';

/** Quote a CSV field when it contains a separator, quote or line break */
export function csvField(value: string): string {
  if (!/[",\r\n]/.test(value)) return value;
  return `"${value.replace(/"/g, '""')}"`;
}

export function exportRateLine(config: RateConfig): string {
  const head = `Rate: ${formatCurrency(effectiveHourlyRate(config))}/hr (Base: ${formatCurrency(config.baseRate)}`;
  return config.includeTips ? `${head}, Tips: ${formatCurrency(config.avgTipRate)})` : `${head}, Tips excluded)`;
}

export function formatExport(periods: readonly Period[], config: RateConfig, generatedAt: Date): string {
  const ordered = [...periods].sort((a, b) => a.startDate.localeCompare(b.startDate));

  const lines = [
    EXPORT_TITLE,
    `Generated: ${generatedAt.toISOString()}`,
    exportRateLine(config),
    '='.repeat(50),
    CSV_HEADER,
  ];

  for (const period of ordered) {
    const entries = [...period.entries].sort((a, b) => a.date.localeCompare(b.date));
    for (const e of entries) {
      lines.push([period.startDate, e.date, String(e.hours), csvField(e.note), e.createdAt].join(','));
    }
  }

  if (ordered.length > 0) {
    lines.push('');
    for (const period of ordered) {
      const end = period.endDate ?? 'active';
      lines.push(
        `Period ${period.startDate} to ${end}: ${formatHours(totalHours(period))}, ${formatCurrency(actualEarnings(period, config))}`,
      );
    }
  }

  return lines.join('\n');
}
