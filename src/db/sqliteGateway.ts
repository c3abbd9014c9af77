/**
 * SQLite-backed PersistenceGateway (better-sqlite3).
 *
 * Tables: periods, entries, and a single-row settings table holding the current
 * rate configuration and the id of the active period. Each gateway call runs in
 * one transaction.
 */
import type Database from 'better-sqlite3';
import { DEFAULT_RATE_CONFIG, type Entry, type Period, type RateConfig } from '../domain/types.js';
import { OK, failure, type GatewayResult, type LoadedLedger, type PersistenceGateway } from './gateway.js';

interface PeriodRow {
  id: string;
  start_date: string;
  end_date: string | null;
}

interface EntryRow {
  id: string;
  period_id: string;
  date: string;
  hours: number;
  note: string;
  created_at: string;
}

interface SettingsRow {
  base_rate: number;
  include_tips: number;
  avg_tip_rate: number;
  active_period_id: string | null;
}

function columnNames(db: Database.Database, table: string): Set<string> {
  const cols = db.prepare<[string], { name: string }>('SELECT name FROM pragma_table_info(?)').all(table);
  return new Set(cols.map((c) => c.name));
}

/** Create tables if missing and apply additive migrations */
export function initSchema(db: Database.Database): void {
  db.pragma('foreign_keys = ON');

  db.exec(`
    CREATE TABLE IF NOT EXISTS periods (
      id TEXT PRIMARY KEY,
      seq INTEGER NOT NULL,
      start_date TEXT NOT NULL,
      end_date TEXT DEFAULT NULL,
      created_at TEXT DEFAULT (datetime('now'))
    )
  `);

  db.exec(`
    CREATE TABLE IF NOT EXISTS entries (
      id TEXT PRIMARY KEY,
      period_id TEXT NOT NULL REFERENCES periods(id) ON DELETE CASCADE,
      seq INTEGER NOT NULL,
      date TEXT NOT NULL,
      hours REAL NOT NULL CHECK (hours > 0),
      note TEXT NOT NULL DEFAULT '',
      created_at TEXT NOT NULL
    )
  `);

  db.exec(`CREATE INDEX IF NOT EXISTS idx_entries_period ON entries(period_id, seq)`);

  // Settings table (single-row)
  db.exec(`
    CREATE TABLE IF NOT EXISTS settings (
      id INTEGER PRIMARY KEY CHECK (id = 1),
      base_rate REAL NOT NULL DEFAULT ${DEFAULT_RATE_CONFIG.baseRate},
      include_tips INTEGER NOT NULL DEFAULT ${DEFAULT_RATE_CONFIG.includeTips ? 1 : 0},
      avg_tip_rate REAL NOT NULL DEFAULT ${DEFAULT_RATE_CONFIG.avgTipRate}
    )
  `);

  // Migrate: active period pointer was added after the first settings layout
  if (!columnNames(db, 'settings').has('active_period_id')) {
    db.exec(`ALTER TABLE settings ADD COLUMN active_period_id TEXT DEFAULT NULL`);
  }

  db.exec(`INSERT OR IGNORE INTO settings (id) VALUES (1)`);
}

export class SqliteGateway implements PersistenceGateway {
  private readonly db: Database.Database;

  constructor(db: Database.Database) {
    this.db = db;
    initSchema(db);
  }

  async loadAll(): Promise<LoadedLedger> {
    const settings = this.db
      .prepare<[], SettingsRow>('SELECT base_rate, include_tips, avg_tip_rate, active_period_id FROM settings WHERE id = 1')
      .get();
    const periodRows = this.db
      .prepare<[], PeriodRow>('SELECT id, start_date, end_date FROM periods ORDER BY seq')
      .all();
    const entryRows = this.db
      .prepare<[], EntryRow>('SELECT id, period_id, date, hours, note, created_at FROM entries ORDER BY period_id, seq')
      .all();

    const entriesByPeriod = new Map<string, Entry[]>();
    for (const row of entryRows) {
      const list = entriesByPeriod.get(row.period_id) ?? [];
      list.push({ id: row.id, date: row.date, hours: row.hours, note: row.note, createdAt: row.created_at });
      entriesByPeriod.set(row.period_id, list);
    }

    const periods: Period[] = periodRows.map((row) => ({
      id: row.id,
      startDate: row.start_date,
      endDate: row.end_date,
      entries: entriesByPeriod.get(row.id) ?? [],
    }));

    const rateConfig: RateConfig = settings
      ? { baseRate: settings.base_rate, includeTips: settings.include_tips === 1, avgTipRate: settings.avg_tip_rate }
      : { ...DEFAULT_RATE_CONFIG };

    return { periods, rateConfig, activePeriodId: settings?.active_period_id ?? null };
  }

  async saveEntry(periodId: string, entry: Entry): Promise<GatewayResult> {
    return this.write(() => {
      const period = this.db
        .prepare<[string], { end_date: string | null }>('SELECT end_date FROM periods WHERE id = ?')
        .get(periodId);
      if (!period) throw new Error(`Period ${periodId} does not exist`);
      if (period.end_date !== null) throw new Error(`Period ${periodId} is closed`);

      this.db.prepare(`
        INSERT INTO entries (id, period_id, seq, date, hours, note, created_at)
        VALUES (?, ?, (SELECT COALESCE(MAX(seq), 0) + 1 FROM entries WHERE period_id = ?), ?, ?, ?, ?)
      `).run(entry.id, periodId, periodId, entry.date, entry.hours, entry.note, entry.createdAt);
    });
  }

  async savePeriodBoundary(period: Period): Promise<GatewayResult> {
    return this.write(() => {
      this.db.prepare(`
        INSERT INTO periods (id, seq, start_date, end_date)
        VALUES (?, (SELECT COALESCE(MAX(seq), 0) + 1 FROM periods), ?, ?)
        ON CONFLICT(id) DO UPDATE SET
          start_date = excluded.start_date,
          end_date = excluded.end_date
      `).run(period.id, period.startDate, period.endDate);

      if (period.endDate === null) {
        this.db.prepare('UPDATE settings SET active_period_id = ? WHERE id = 1').run(period.id);
      } else {
        this.db.prepare('UPDATE settings SET active_period_id = NULL WHERE id = 1 AND active_period_id = ?').run(period.id);
      }
    });
  }

  async removePeriod(periodId: string): Promise<GatewayResult> {
    return this.write(() => {
      this.db.prepare('DELETE FROM entries WHERE period_id = ?').run(periodId);
      this.db.prepare('DELETE FROM periods WHERE id = ?').run(periodId);
      this.db.prepare('UPDATE settings SET active_period_id = NULL WHERE id = 1 AND active_period_id = ?').run(periodId);
    });
  }

  async saveRateConfig(config: RateConfig): Promise<GatewayResult> {
    return this.write(() => {
      this.db.prepare(`
        UPDATE settings SET base_rate = ?, include_tips = ?, avg_tip_rate = ?
        WHERE id = 1
      `).run(config.baseRate, config.includeTips ? 1 : 0, config.avgTipRate);
    });
  }

  async clear(): Promise<GatewayResult> {
    return this.write(() => {
      this.db.exec('DELETE FROM entries');
      this.db.exec('DELETE FROM periods');
      this.db.prepare(`
        UPDATE settings SET base_rate = ?, include_tips = ?, avg_tip_rate = ?, active_period_id = NULL
        WHERE id = 1
      `).run(DEFAULT_RATE_CONFIG.baseRate, DEFAULT_RATE_CONFIG.includeTips ? 1 : 0, DEFAULT_RATE_CONFIG.avgTipRate);
    });
  }

  /** Run fn as one transaction; any error becomes a failed result */
  private write(fn: () => void): GatewayResult {
    try {
      this.db.transaction(fn)();
      return OK;
    } catch (error) {
      console.error('[SQLite] Write failed:', error);
      return failure(error);
    }
  }
}
