/**
 * Durable storage contract consumed by the Ledger.
 *
 * Every write is atomic: it either fully applies or leaves nothing observable on
 * the next loadAll(). Writes report failure through GatewayResult instead of
 * throwing, so the ledger can decide how to roll back.
 */
import type { Entry, Period, RateConfig } from '../domain/types.js';

export type GatewayResult = { ok: true } | { ok: false; error: string };

export interface LoadedLedger {
  periods: Period[];            // insertion order
  rateConfig: RateConfig;
  activePeriodId: string | null;
}

export interface PersistenceGateway {
  loadAll(): Promise<LoadedLedger>;
  saveEntry(periodId: string, entry: Entry): Promise<GatewayResult>;
  /** Insert or update a period's boundaries; an open period becomes the stored active one */
  savePeriodBoundary(period: Period): Promise<GatewayResult>;
  /** Drop a period and its entries (used to undo an implicit start) */
  removePeriod(periodId: string): Promise<GatewayResult>;
  saveRateConfig(config: RateConfig): Promise<GatewayResult>;
  /** Replace all stored state with an empty ledger and default settings */
  clear(): Promise<GatewayResult>;
}

export const OK: GatewayResult = { ok: true };

export function failure(error: unknown): GatewayResult {
  return { ok: false, error: error instanceof Error ? error.message : String(error) };
}
