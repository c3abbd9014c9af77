/**
 * Pure earnings computations.
 * No DB, no clock: only data in, data out.
 */
import { effectiveHourlyRate } from './rateConfig.js';
import { totalHours } from './period.js';
import type { Entry, Period, PeriodSummary, RateConfig } from './types.js';

/** Earned so far: logged hours × effective rate, full precision */
export function actualEarnings(period: Period, config: RateConfig): number {
  return totalHours(period) * effectiveHourlyRate(config);
}

/**
 * What the period would pay at targetHours. A missing or non-positive target
 * projects 0 instead of failing.
 */
export function projectedEarnings(_period: Period | null, config: RateConfig, targetHours: number): number {
  if (!Number.isFinite(targetHours) || targetHours <= 0) return 0;
  return targetHours * effectiveHourlyRate(config);
}

/** Earnings of a single entry (the "+ $x today" figure after logging) */
export function entryEarnings(entry: Entry, config: RateConfig): number {
  return entry.hours * effectiveHourlyRate(config);
}

/** Totals for the period card; an absent period summarizes as empty */
export function periodSummary(
  period: Period | null,
  config: RateConfig,
  targetHours: number,
): PeriodSummary {
  const hours = period ? totalHours(period) : 0;
  const target = Number.isFinite(targetHours) && targetHours > 0 ? targetHours : 0;

  return {
    periodId: period?.id ?? null,
    startDate: period?.startDate ?? null,
    entryCount: period?.entries.length ?? 0,
    totalHours: hours,
    actualEarnings: period ? actualEarnings(period, config) : 0,
    targetHours: target,
    projectedEarnings: projectedEarnings(period, config, target),
    progress: target === 0 ? 0 : Math.min(hours / target, 1),
  };
}
