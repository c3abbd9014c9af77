/**
 * The Ledger owns the ordered periods and the current rate configuration.
 *
 * State is an immutable snapshot. A mutation validates, builds the next snapshot,
 * writes it through the gateway, and only then swaps it in; a failed write throws
 * PersistenceError and leaves the previous snapshot current. Mutations are chained
 * on a single promise so overlapping calls run one at a time.
 */
import { InvalidEntryError, PersistenceError, errorMessage } from './errors.js';
import { isIsoDate, today } from './format.js';
import { generateId, type IdGenerator } from './ids.js';
import { addEntry, closePeriod, createPeriod, isActive, validateEntryInput } from './period.js';
import { updateRateConfig as nextRateConfig } from './rateConfig.js';
import {
  DEFAULT_RATE_CONFIG,
  type Entry,
  type EntryInput,
  type IsoDate,
  type LedgerSnapshot,
  type Period,
  type RateConfig,
  type RateConfigInput,
} from './types.js';
import type { GatewayResult, LoadedLedger, PersistenceGateway } from '../db/gateway.js';

export interface LedgerOptions {
  newId?: IdGenerator;
  now?: () => Date;
}

export interface RecentEntriesOptions {
  includeClosed?: boolean;
}

const EMPTY_PERIODS: readonly Period[] = Object.freeze([]);

function freezeSnapshot(periods: readonly Period[], rateConfig: RateConfig): LedgerSnapshot {
  const last = periods.length > 0 ? periods[periods.length - 1] : null;
  return Object.freeze({
    periods: Object.freeze([...periods]),
    rateConfig: Object.freeze({ ...rateConfig }),
    activePeriodId: last && isActive(last) ? last.id : null,
  });
}

function emptySnapshot(): LedgerSnapshot {
  return freezeSnapshot(EMPTY_PERIODS, DEFAULT_RATE_CONFIG);
}

/**
 * Check stored state against the active-period invariant: at most one open
 * period, and it must be the last one. Returns a reason when the state is unusable.
 */
export function invariantViolation(periods: readonly Period[]): string | null {
  const open = periods.filter(isActive);
  if (open.length > 1) return `${open.length} periods are open`;
  if (open.length === 1 && periods[periods.length - 1] !== open[0]) {
    return `open period ${open[0].id} is not the latest`;
  }
  return null;
}

function freezePeriod(period: Period): Period {
  return Object.freeze({
    ...period,
    entries: Object.freeze(period.entries.map((e) => Object.freeze({ ...e }))),
  });
}

function requireOk(result: GatewayResult, operation: string): void {
  if (!result.ok) throw new PersistenceError(operation, result.error);
}

export class Ledger {
  private state: LedgerSnapshot;
  private queue: Promise<void> = Promise.resolve();
  private readonly gateway: PersistenceGateway;
  private readonly newId: IdGenerator;
  private readonly now: () => Date;

  private constructor(gateway: PersistenceGateway, state: LedgerSnapshot, options: LedgerOptions) {
    this.gateway = gateway;
    this.state = state;
    this.newId = options.newId ?? generateId;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Build a ledger from stored state. A store that cannot be read, or that breaks
   * the active-period invariant, yields an empty ledger with default rates.
   */
  static async load(gateway: PersistenceGateway, options: LedgerOptions = {}): Promise<Ledger> {
    let loaded: LoadedLedger;
    try {
      loaded = await gateway.loadAll();
    } catch (error) {
      console.warn('[Ledger] Could not load stored data, starting empty:', errorMessage(error));
      return new Ledger(gateway, emptySnapshot(), options);
    }

    const violation = invariantViolation(loaded.periods);
    if (violation) {
      console.warn(`[Ledger] Stored periods are inconsistent (${violation}), starting empty`);
      return new Ledger(gateway, emptySnapshot(), options);
    }

    const snapshot = freezeSnapshot(loaded.periods.map(freezePeriod), loaded.rateConfig);
    if (snapshot.activePeriodId !== loaded.activePeriodId) {
      console.warn(
        `[Ledger] Stored active period ${loaded.activePeriodId ?? 'none'} does not match open period ${snapshot.activePeriodId ?? 'none'}`,
      );
    }
    console.log(`[Ledger] Loaded ${snapshot.periods.length} period(s)`);
    return new Ledger(gateway, snapshot, options);
  }

  // --- Reads: always the last committed snapshot ---

  snapshot(): LedgerSnapshot {
    return this.state;
  }

  periods(): readonly Period[] {
    return this.state.periods;
  }

  rateConfig(): RateConfig {
    return this.state.rateConfig;
  }

  activePeriod(): Period | null {
    const { periods, activePeriodId } = this.state;
    return activePeriodId === null ? null : periods[periods.length - 1];
  }

  /** Most recently logged first, capped at limit */
  recentEntries(limit: number, { includeClosed = false }: RecentEntriesOptions = {}): Entry[] {
    const cap = Math.floor(limit);
    if (!Number.isFinite(cap) || cap <= 0) return [];

    const active = this.activePeriod();
    const sources = includeClosed ? this.state.periods : active ? [active] : [];
    const result: Entry[] = [];

    for (let i = sources.length - 1; i >= 0; i--) {
      const entries = sources[i].entries;
      for (let j = entries.length - 1; j >= 0; j--) {
        result.push(entries[j]);
        if (result.length >= cap) return result;
      }
    }
    return result;
  }

  // --- Mutations ---

  /**
   * Close the active period (if any) at startDate and open a new one from there.
   * startDate defaults to today.
   */
  startNewPeriod(startDate?: IsoDate): Promise<Period> {
    return this.exclusive(async () => {
      const start = startDate ?? today(this.now());
      const previous = this.activePeriod();
      if (previous && isIsoDate(start) && start < previous.startDate) {
        throw new InvalidEntryError(`New period cannot start before ${previous.startDate}`);
      }

      const opened = createPeriod(start, this.newId);
      let closed: Period | null = null;
      if (previous) {
        closed = closePeriod(previous, start);
        requireOk(await this.gateway.savePeriodBoundary(closed), 'close the active period');
      }

      const result = await this.gateway.savePeriodBoundary(opened);
      if (!result.ok) {
        if (previous) await this.compensate(() => this.gateway.savePeriodBoundary(previous), 'reopen previous period');
        throw new PersistenceError('start a new period', result.error);
      }

      const kept = closed ? [...this.state.periods.slice(0, -1), closed] : this.state.periods;
      this.commit([...kept, opened], this.state.rateConfig);
      console.log(`[Ledger] Started period ${opened.id} on ${start}`);
      return opened;
    });
  }

  /**
   * Append an entry to the active period, opening one that starts on the entry's
   * date when none is active.
   */
  logHours(input: EntryInput): Promise<Entry> {
    return this.exclusive(async () => {
      validateEntryInput(input);
      const now = this.now();
      const date = input.date ?? today(now);

      let target = this.activePeriod();
      let implicit: Period | null = null;
      if (!target) {
        implicit = createPeriod(date, this.newId);
        requireOk(await this.gateway.savePeriodBoundary(implicit), 'start a new period');
        target = implicit;
      }

      const { period, entry } = addEntry(target, { ...input, date }, { newId: this.newId, now });

      const result = await this.gateway.saveEntry(period.id, entry);
      if (!result.ok) {
        if (implicit) {
          const periodId = implicit.id;
          await this.compensate(() => this.gateway.removePeriod(periodId), 'remove implicit period');
        }
        throw new PersistenceError('log hours', result.error);
      }

      const kept = implicit ? this.state.periods : this.state.periods.slice(0, -1);
      this.commit([...kept, period], this.state.rateConfig);
      return entry;
    });
  }

  /** Validate, persist, then install the new rate configuration */
  updateRateConfig(input: RateConfigInput): Promise<RateConfig> {
    return this.exclusive(async () => {
      const next = nextRateConfig(this.state.rateConfig, input);
      requireOk(await this.gateway.saveRateConfig(next), 'save rate settings');
      this.commit(this.state.periods, next);
      return this.state.rateConfig;
    });
  }

  /** Remove every period and restore default rates, on disk and in memory */
  clearAllData(): Promise<void> {
    return this.exclusive(async () => {
      requireOk(await this.gateway.clear(), 'clear data');
      this.state = emptySnapshot();
      console.log('[Ledger] All data cleared');
    });
  }

  // --- Internals ---

  private commit(periods: readonly Period[], rateConfig: RateConfig): void {
    this.state = freezeSnapshot(periods, rateConfig);
  }

  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task);
    // The caller receives the rejection through `run`; the queue only orders tasks.
    this.queue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  /** Undo an earlier write of a failed multi-step mutation */
  private async compensate(undo: () => Promise<GatewayResult>, label: string): Promise<void> {
    const result = await undo();
    if (!result.ok) {
      console.error(`[Ledger] Could not ${label}; stored data may differ until restart: ${result.error}`);
    }
  }
}
