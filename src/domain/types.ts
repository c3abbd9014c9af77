/**
 * Domain types for the hours ledger.
 * Pure data. No DB, no HTTP, no IO.
 */

/** YYYY-MM-DD string */
export type IsoDate = string;

/** Wage model used for every earnings computation */
export interface RateConfig {
  baseRate: number;          // currency per hour
  includeTips: boolean;
  avgTipRate: number;        // per hour; kept even while tips are excluded
}

/** Fields accepted by a rate update; omitted fields keep their current value */
export type RateConfigInput = Partial<RateConfig>;

/** One logged work session */
export interface Entry {
  id: string;
  date: IsoDate;
  hours: number;             // > 0
  note: string;              // '' when none
  createdAt: string;         // ISO timestamp
}

export interface EntryInput {
  date?: IsoDate;
  hours: number;
  note?: string;
}

/** A span of work accumulating entries; active while endDate is null */
export interface Period {
  id: string;
  startDate: IsoDate;
  endDate: IsoDate | null;
  entries: readonly Entry[];  // insertion order, not sorted by date
}

/** Committed ledger state handed to readers */
export interface LedgerSnapshot {
  periods: readonly Period[];
  rateConfig: RateConfig;
  activePeriodId: string | null;
}

/** Display totals for one period */
export interface PeriodSummary {
  periodId: string | null;
  startDate: IsoDate | null;
  entryCount: number;
  totalHours: number;
  actualEarnings: number;
  targetHours: number;
  projectedEarnings: number;
  progress: number;          // 0–1, share of targetHours already logged
}

/** Default settings for first-time users */
export const DEFAULT_RATE_CONFIG: RateConfig = Object.freeze({
  baseRate: 7.0,
  includeTips: false,
  avgTipRate: 23.15,
});
